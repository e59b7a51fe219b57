/**
 * In-process hash join engine.
 *
 * The right side is the build side: its keys are hashed once, then the
 * left side is streamed through and probed. Output rows follow left row
 * order; an outer join appends unmatched right rows at the end.
 * Null keys never match.
 */

import { Column, type Scalar } from "../core/column.ts";
import { Table, TableIndex } from "../core/table.ts";
import { dtypeEquals, formatDType } from "../types/dtypes.ts";
import { ErrorCode, err, forward, ok, type Result } from "../types/error.ts";
import { rowKey } from "../utils/keys.ts";
import { createLogger } from "../utils/logger.ts";
import type { JoinEngine, JoinKeys, JoinRequest } from "./engine.ts";

const log = createLogger("engine");

/** Row pairs produced by the probe phase; -1 marks a missing side */
interface MatchPairs {
	readonly left: Int32Array;
	readonly right: Int32Array;
}

export class HashJoinEngine implements JoinEngine {
	join(request: JoinRequest): Result<Table> {
		const leftKeys = resolveKeyColumns(request.left, request.leftKeys);
		if (leftKeys.error !== ErrorCode.None) return forward(leftKeys);
		const rightKeys = resolveKeyColumns(request.right, request.rightKeys);
		if (rightKeys.error !== ErrorCode.None) return forward(rightKeys);

		if (leftKeys.value.length !== rightKeys.value.length) {
			return err(ErrorCode.KeyCountMismatch);
		}
		for (const [i, leftKey] of leftKeys.value.entries()) {
			const rightKey = rightKeys.value[i];
			if (!rightKey || !dtypeEquals(leftKey.dtype, rightKey.dtype)) {
				return err(
					ErrorCode.TypeMismatch,
					`key ${i}: ${formatDType(leftKey.dtype)} vs ${rightKey ? formatDType(rightKey.dtype) : "missing"}`,
				);
			}
		}

		const pairs = matchRows(leftKeys.value, rightKeys.value, request.how);
		log(
			"%s join: %d x %d rows -> %d rows",
			request.how,
			request.left.rowCount,
			request.right.rowCount,
			pairs.left.length,
		);

		const congruent = congruentNames(request.leftKeys, request.rightKeys);
		const output: [string, Column][] = [];
		const seen = new Set<string>();

		for (const [name, column] of request.left.entries()) {
			const gathered = column.take(pairs.left);
			if (congruent.has(name)) {
				const other = request.right.column(name);
				if (other.error !== ErrorCode.None) return forward(other);
				const merged = coalesce(gathered, other.value.take(pairs.right));
				if (merged.error !== ErrorCode.None) return forward(merged);
				output.push([name, merged.value]);
			} else {
				output.push([name, gathered]);
			}
			seen.add(name);
		}

		for (const [name, column] of request.right.entries()) {
			if (congruent.has(name)) continue;
			if (seen.has(name)) {
				return err(ErrorCode.DuplicateColumn, name);
			}
			output.push([name, column.take(pairs.right)]);
			seen.add(name);
		}

		const index = outputIndex(request, leftKeys.value, rightKeys.value, pairs);
		if (index.error !== ErrorCode.None) return forward(index);
		return Table.fromColumns(output, index.value);
	}
}

/** Key columns of one side, in key order */
function resolveKeyColumns(table: Table, keys: JoinKeys): Result<Column[]> {
	if (keys.kind === "index") {
		const index = table.index ?? TableIndex.range(table.rowCount);
		const key = index.key;
		if (!key) {
			return err(ErrorCode.UnsupportedKeyStructure);
		}
		return ok([key]);
	}
	const columns: Column[] = [];
	for (const name of keys.names) {
		const column = table.column(name);
		if (column.error !== ErrorCode.None) {
			return err(ErrorCode.MissingKey, name);
		}
		columns.push(column.value);
	}
	return ok(columns);
}

function keyAt(columns: readonly Column[], row: number): string | null {
	const values: Scalar[] = [];
	for (const column of columns) {
		const value = column.get(row);
		if (value === null) return null;
		values.push(value);
	}
	return rowKey(values);
}

function matchRows(
	leftKeys: readonly Column[],
	rightKeys: readonly Column[],
	how: JoinRequest["how"],
): MatchPairs {
	const leftRowCount = leftKeys[0]?.length ?? 0;
	const rightRowCount = rightKeys[0]?.length ?? 0;

	// Build phase
	const buckets = new Map<string, number[]>();
	for (let row = 0; row < rightRowCount; row++) {
		const key = keyAt(rightKeys, row);
		if (key === null) continue;
		const bucket = buckets.get(key);
		if (bucket) {
			bucket.push(row);
		} else {
			buckets.set(key, [row]);
		}
	}

	// Probe phase
	const left: number[] = [];
	const right: number[] = [];
	const rightMatched = new Uint8Array(rightRowCount);
	for (let row = 0; row < leftRowCount; row++) {
		const key = keyAt(leftKeys, row);
		const bucket = key === null ? undefined : buckets.get(key);
		if (bucket) {
			for (const match of bucket) {
				left.push(row);
				right.push(match);
				rightMatched[match] = 1;
			}
		} else if (how === "left" || how === "outer") {
			left.push(row);
			right.push(-1);
		}
	}

	if (how === "outer") {
		for (let row = 0; row < rightRowCount; row++) {
			if (rightMatched[row] === 0) {
				left.push(-1);
				right.push(row);
			}
		}
	}

	return { left: Int32Array.from(left), right: Int32Array.from(right) };
}

/** Names used as the key at the same position on both sides */
function congruentNames(leftKeys: JoinKeys, rightKeys: JoinKeys): Set<string> {
	const names = new Set<string>();
	if (leftKeys.kind !== "columns" || rightKeys.kind !== "columns") {
		return names;
	}
	for (const [i, name] of leftKeys.names.entries()) {
		if (rightKeys.names[i] === name) names.add(name);
	}
	return names;
}

/** Row-wise first non-null of two same-dtype columns */
function coalesce(primary: Column, fallback: Column): Result<Column> {
	const values = primary.toArray();
	for (let i = 0; i < values.length; i++) {
		if (values[i] === null) values[i] = fallback.get(i);
	}
	return Column.from(values, primary.dtype);
}

/** The joined key as output index when either side joined on its index */
function outputIndex(
	request: JoinRequest,
	leftKeys: readonly Column[],
	rightKeys: readonly Column[],
	pairs: MatchPairs,
): Result<TableIndex | null> {
	if (!request.materializeLeftIndex && !request.materializeRightIndex) {
		return ok(null);
	}
	const leftKey = leftKeys[0];
	const rightKey = rightKeys[0];
	if (!leftKey || !rightKey) {
		return ok(null);
	}
	const merged = coalesce(leftKey.take(pairs.left), rightKey.take(pairs.right));
	if (merged.error !== ErrorCode.None) return forward(merged);
	const source = request.materializeLeftIndex ? request.left.index : request.right.index;
	return TableIndex.from(merged.value, [source?.names[0] ?? null]);
}
