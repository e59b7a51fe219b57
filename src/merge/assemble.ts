/**
 * Rebuilds the merge result from the engine's flat output.
 *
 * The engine output is treated as a pool of named columns. Each step
 * takes columns out of the pool; anything left at the end means the
 * engine returned a column this layer cannot place.
 */

import { Column, type Scalar } from "../core/column.ts";
import { Table } from "../core/table.ts";
import { InternalInvariantError } from "../errors/internal-invariant-error.ts";
import { rewrapCodes } from "../ops/categories.ts";
import type { CategoricalDType } from "../types/dtypes.ts";
import { ErrorCode, err, type Result } from "../types/error.ts";
import type { CodeSubstitution } from "./types.ts";

/** What the assembler needs to know about the inputs of the join */
export interface AssemblyPlan {
	/** Left column names after renaming, before any codes column was added */
	readonly lhsNames: readonly string[];
	/** Right column names after renaming, before any codes column was added */
	readonly rhsNames: readonly string[];
	readonly leftOn: readonly string[];
	readonly rightOn: readonly string[];
	readonly substitutions: readonly CodeSubstitution[];
	/** Categorical columns of both tables handed to the engine, by name */
	readonly categoricals: ReadonlyMap<string, CategoricalDType>;
	readonly sort: boolean;
}

/**
 * Assemble the final table.
 *
 * Fails only when a column cannot be rebuilt; throws
 * InternalInvariantError when engine columns are left unplaced.
 */
export function assembleResult(output: Table, plan: AssemblyPlan): Result<Table> {
	const pool = new Map(output.entries());

	for (const substitution of plan.substitutions) {
		const codes = pool.get(substitution.codesColumn);
		pool.delete(substitution.codesColumn);
		const key = pool.get(substitution.column);
		if (!key) continue;
		const rebuilt = rebuildCategorical(key, codes, substitution.dtype);
		if (rebuilt.error !== ErrorCode.None) {
			return err(rebuilt.error, `key '${substitution.column}'`);
		}
		pool.set(substitution.column, rebuilt.value);
	}

	for (const [name, dtype] of plan.categoricals) {
		const column = pool.get(name);
		if (!column) continue;
		const wrapped = rewrapCodes(column, dtype);
		if (wrapped.error !== ErrorCode.None) {
			return err(wrapped.error, `column '${name}'`);
		}
		pool.set(name, wrapped.value);
	}

	const take = (names: Iterable<string>): [string, Column][] => {
		const taken: [string, Column][] = [];
		for (const name of names) {
			const column = pool.get(name);
			if (!column) continue;
			pool.delete(name);
			taken.push([name, column]);
		}
		return taken;
	};

	let columns: [string, Column][];
	if (plan.sort) {
		const leftKeys = new Set(plan.leftOn);
		const rightKeys = new Set(plan.rightOn);
		const leftRest = take(plan.lhsNames.filter((name) => !leftKeys.has(name)));
		const keys = take(
			[...plan.lhsNames, ...plan.rhsNames].filter((name) => leftKeys.has(name) || rightKeys.has(name)),
		);
		const rightRest = take(plan.rhsNames.filter((name) => !rightKeys.has(name)));
		columns = [...byName(leftRest), ...byName(keys), ...byName(rightRest)];
	} else {
		columns = take([...plan.lhsNames, ...plan.rhsNames]);
	}

	if (pool.size > 0) {
		throw new InternalInvariantError("UnconsumedEngineColumn", [...pool.keys()]);
	}

	return Table.fromColumns(columns, output.index);
}

function byName(columns: [string, Column][]): [string, Column][] {
	return columns.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Categorical key from the joined values and the returned codes.
 *
 * Rows with a code decode through it. Rows without one (the unmatched
 * side of an outer join) are encoded from the joined key value; values
 * outside the categories become null.
 */
function rebuildCategorical(
	key: Column,
	codes: Column | undefined,
	dtype: CategoricalDType,
): Result<Column> {
	const values: (Scalar | null)[] = new Array(key.length);
	for (let i = 0; i < key.length; i++) {
		const code = codes?.get(i) ?? null;
		values[i] = code === null ? key.get(i) : dtype.categories.get(Number(code));
	}
	return Column.categorical(values, {
		categories: dtype.categories,
		ordered: dtype.ordered,
	});
}
