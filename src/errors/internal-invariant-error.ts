import { TableError } from "./base.ts";

/** Invariants the merge path checks on the join engine's output */
export type MergeInvariant = "UnconsumedEngineColumn";

/**
 * Raised when the library or a join engine breaks its own contract.
 *
 * This is a defect, not bad user input: it is thrown rather than returned
 * in a Result, so callers cannot mistake it for a recoverable failure.
 */
export class InternalInvariantError extends TableError {
	readonly invariant: MergeInvariant;

	/** Column names that triggered the violation */
	readonly columns: readonly string[];

	constructor(invariant: MergeInvariant, columns: readonly string[]) {
		super(
			`Internal invariant violated (${invariant}): join engine returned unplaced columns ${columns.map((c) => `'${c}'`).join(", ")}`,
			{ hint: "The join engine output does not match the merge contract" },
		);
		this.name = "InternalInvariantError";
		this.invariant = invariant;
		this.columns = columns;
	}

	protected override _getDetail(): string {
		return `${this.columns.length} column(s) left after assembly`;
	}
}
