/**
 * Join engine contract.
 *
 * The merge path prepares both tables (renamed, cast, codes columns
 * added) and hands them to an engine, which performs the physical join
 * and returns one flat table. Column-name collisions in that table are
 * resolved by the merge path, not the engine.
 */

import type { Table } from "../core/table.ts";
import type { Result } from "../types/error.ts";
import type { MergeHow } from "./types.ts";

/** Which key a side joins on: named columns or its index */
export type JoinKeys =
	| { readonly kind: "columns"; readonly names: readonly string[] }
	| { readonly kind: "index" };

export interface JoinRequest {
	readonly left: Table;
	readonly right: Table;
	readonly leftKeys: JoinKeys;
	readonly rightKeys: JoinKeys;
	readonly how: MergeHow;
	/** Carry the left index key into the output index */
	readonly materializeLeftIndex: boolean;
	/** Carry the right index key into the output index */
	readonly materializeRightIndex: boolean;
}

/**
 * Executes a physical join.
 *
 * The output holds each congruent key pair (same name on both sides)
 * once, every other left column, then every other right column. Rows
 * follow `how`: unmatched sides of an outer or left join are null.
 * A call either returns the full result or fails; it is never retried.
 */
export interface JoinEngine {
	join(request: JoinRequest): Result<Table>;
}

/** Column-key helper */
export function columnKeys(names: readonly string[]): JoinKeys {
	return { kind: "columns", names };
}

/** Index-key helper */
export const INDEX_KEYS: JoinKeys = { kind: "index" };
