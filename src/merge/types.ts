/**
 * Shared types for the merge path.
 */

import type { Table } from "../core/table.ts";
import type { CategoricalDType, DType } from "../types/dtypes.ts";
import type { JoinEngine } from "./engine.ts";

/** Join kinds `merge()` accepts */
export type MergeHow = "left" | "inner" | "outer";

/**
 * Join kinds the casting rules understand. `right` is only reachable
 * through `unify()` directly; `merge()` rejects it.
 */
export type JoinHow = MergeHow | "right";

export type Side = "left" | "right";

/** Options of a single merge call */
export interface MergeOptions {
	/** Column name(s) present in both tables to join on */
	on?: string | readonly string[];
	/** Left table column(s) to join on */
	leftOn?: string | readonly string[];
	/** Right table column(s) to join on */
	rightOn?: string | readonly string[];
	/** Use the left table's index as its join key */
	leftIndex?: boolean;
	/** Use the right table's index as its join key */
	rightIndex?: boolean;
	/** Join kind; defaults to the configured `defaultHow` */
	how?: string;
	/** Suffixes for overlapping column names [left, right] */
	suffixes?: readonly [string, string];
	/** Order columns by partition and name instead of by input order */
	sort?: boolean;
	/** Join engine for this call; defaults to the configured engine */
	engine?: JoinEngine;
	/** Receives precision-loss warnings; defaults to the configured handler */
	onWarning?: (warning: MergeWarning) => void;
}

/** Non-fatal notice that a key was upcast to a common supertype */
export interface MergeWarning {
	readonly code: "precision-loss";
	/** Key column that could not be cast safely */
	readonly column: string;
	readonly side: Side;
	/** Dtype of that column */
	readonly from: DType;
	/** Dtype the join kind asked for */
	readonly requested: DType;
	/** Supertype used instead */
	readonly upcast: DType;
	readonly message: string;
}

/** A categorical key joined through its integer codes */
export interface CodeSubstitution {
	/** Key column name (post-rename) on its own side */
	readonly column: string;
	readonly side: Side;
	/** Name of the temporary codes column */
	readonly codesColumn: string;
	/** The key's dtype before unification */
	readonly dtype: CategoricalDType;
}

/** Both tables after a preparation step, with the keys they now use */
export interface PreparedInputs {
	readonly left: Table;
	readonly right: Table;
	readonly leftOn: readonly string[];
	readonly rightOn: readonly string[];
}
