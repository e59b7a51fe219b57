/**
 * Structural checks on a merge request.
 *
 * Runs before any renaming or casting and never touches the tables.
 */

import type { Table } from "../core/table.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import type { MergeHow } from "./types.ts";

const MERGE_KINDS: readonly string[] = ["left", "inner", "outer"] satisfies MergeHow[];

/** Merge options after list normalization */
export interface MergeRequest {
	readonly on: readonly string[] | null;
	readonly leftOn: readonly string[];
	readonly rightOn: readonly string[];
	readonly leftIndex: boolean;
	readonly rightIndex: boolean;
	readonly how: string;
	readonly suffixes: readonly [string, string];
}

export function isMergeHow(how: string): how is MergeHow {
	return MERGE_KINDS.includes(how);
}

/** Column names present in both tables, in left-table order */
export function sharedColumnNames(lhs: Table, rhs: Table): string[] {
	return lhs.columnNames.filter((name) => rhs.has(name));
}

/**
 * Whether `name` is a congruent key: used at the same position in both
 * key lists.
 */
export function isCongruentKey(
	name: string,
	leftOn: readonly string[],
	rightOn: readonly string[],
): boolean {
	const position = leftOn.indexOf(name);
	return position !== -1 && rightOn.indexOf(name) === position;
}

/**
 * The key lists a request resolves to: `on` for both sides, the explicit
 * lists, or (with no keys and no index flags) every shared name.
 */
export function effectiveKeys(
	lhs: Table,
	rhs: Table,
	request: MergeRequest,
): { leftOn: readonly string[]; rightOn: readonly string[] } {
	if (request.on && request.on.length > 0) {
		return { leftOn: request.on, rightOn: request.on };
	}
	const noKeys = request.leftOn.length === 0 && request.rightOn.length === 0;
	if (noKeys && !request.leftIndex && !request.rightIndex) {
		const shared = sharedColumnNames(lhs, rhs);
		return { leftOn: shared, rightOn: shared };
	}
	return { leftOn: request.leftOn, rightOn: request.rightOn };
}

/**
 * Check a merge request for structural legality.
 *
 * Failure codes, in the order they are checked: UnsupportedKeyStructure,
 * UnsupportedJoinKind, AmbiguousKeySpec, KeyCountMismatch, NoJoinKeys,
 * AmbiguousOverlap, MissingKey. An index join with more than one key per
 * side is also UnsupportedKeyStructure, reported after the key count.
 */
export function validateMerge(lhs: Table, rhs: Table, request: MergeRequest): Result<void> {
	if (lhs.index?.isComposite || rhs.index?.isComposite) {
		return err(ErrorCode.UnsupportedKeyStructure);
	}

	if (!isMergeHow(request.how)) {
		return err(ErrorCode.UnsupportedJoinKind, `'${request.how}'`);
	}

	const on = request.on ?? [];
	if (on.length > 0 && (request.leftOn.length > 0 || request.rightOn.length > 0)) {
		return err(ErrorCode.AmbiguousKeySpec);
	}

	const leftCount = (on.length || request.leftOn.length) + (request.leftIndex ? 1 : 0);
	const rightCount = (on.length || request.rightOn.length) + (request.rightIndex ? 1 : 0);
	if (leftCount !== rightCount) {
		return err(ErrorCode.KeyCountMismatch, `${leftCount} left vs ${rightCount} right`);
	}
	if ((request.leftIndex || request.rightIndex) && leftCount !== 1) {
		return err(ErrorCode.UnsupportedKeyStructure, "an index join takes exactly one key per side");
	}

	const shared = sharedColumnNames(lhs, rhs);
	if (leftCount === 0 && shared.length === 0) {
		return err(ErrorCode.NoJoinKeys);
	}

	const [lsuffix, rsuffix] = request.suffixes;
	if (!lsuffix && !rsuffix) {
		const { leftOn, rightOn } = effectiveKeys(lhs, rhs, request);
		const overlap = shared.find((name) => !isCongruentKey(name, leftOn, rightOn));
		if (overlap !== undefined) {
			return err(ErrorCode.AmbiguousOverlap, `'${overlap}'`);
		}
	}

	for (const key of on) {
		if (!lhs.has(key) || !rhs.has(key)) {
			return err(ErrorCode.MissingKey, `'${key}' not in both tables`);
		}
	}
	for (const key of request.leftOn) {
		if (!lhs.has(key)) {
			return err(ErrorCode.MissingKey, `'${key}' not in left table`);
		}
	}
	for (const key of request.rightOn) {
		if (!rhs.has(key)) {
			return err(ErrorCode.MissingKey, `'${key}' not in right table`);
		}
	}

	return ok(undefined);
}
