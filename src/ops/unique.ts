/**
 * Unique/deduplication operations.
 *
 * Removes duplicate rows based on specified columns.
 *
 * Strategy:
 * - Build a row key from the values of the checked columns
 * - Nulls compare equal to each other unless `nullsEqual` is false, in
 *   which case a row with a null in a checked column is always kept;
 *   categoricals compare by value
 * - Output selection vector with the kept occurrence of each row, in
 *   original order
 */

import type { Column } from "../core/column.ts";
import type { Table } from "../core/table.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import { rowKey } from "../utils/keys.ts";

/** Which occurrence of a duplicated row survives; `false` drops them all */
export type KeepOccurrence = "first" | "last" | false;

export interface DropDuplicatesOptions {
	/** Columns that define a duplicate (default: all columns) */
	subset?: readonly string[];
	keep?: KeepOccurrence;
	/** Whether null values match each other (default: true) */
	nullsEqual?: boolean;
}

/**
 * Build a selection vector containing only unique rows.
 */
export function uniqueSelection(
	table: Table,
	options: DropDuplicatesOptions = {},
): Result<{ selection: Int32Array; count: number }> {
	const names = options.subset ?? table.columnNames;
	const columns: Column[] = [];
	for (const name of names) {
		const column = table.column(name);
		if (column.error !== ErrorCode.None) {
			return err(ErrorCode.UnknownColumn, name);
		}
		columns.push(column.value);
	}

	const rowCount = table.rowCount;
	const selection = new Int32Array(rowCount);
	let count = 0;

	// Nothing to compare: every row is kept
	if (columns.length === 0) {
		for (let row = 0; row < rowCount; row++) selection[row] = row;
		return ok({ selection, count: rowCount });
	}

	const nullsEqual = options.nullsEqual ?? true;
	// null marks a row that matches no other row
	const keys = new Array<string | null>(rowCount);
	for (let row = 0; row < rowCount; row++) {
		const values = columns.map((column) => column.get(row));
		keys[row] = !nullsEqual && values.includes(null) ? null : rowKey(values);
	}

	const keep = options.keep ?? "first";

	if (keep === false) {
		const occurrences = new Map<string, number>();
		for (const key of keys) {
			if (key !== null) occurrences.set(key, (occurrences.get(key) ?? 0) + 1);
		}
		for (const [row, key] of keys.entries()) {
			if (key === null || occurrences.get(key) === 1) {
				selection[count] = row;
				count++;
			}
		}
		return ok({ selection, count });
	}

	// Row that survives for each key
	const kept = new Map<string, number>();
	for (const [row, key] of keys.entries()) {
		if (key !== null && (keep === "last" || !kept.has(key))) {
			kept.set(key, row);
		}
	}
	for (const [row, key] of keys.entries()) {
		if (key === null || kept.get(key) === row) {
			selection[count] = row;
			count++;
		}
	}

	return ok({ selection, count });
}

/**
 * Drop duplicate rows.
 *
 * @example
 * ```ts
 * dropDuplicates(table);                                  // whole rows
 * dropDuplicates(table, { subset: ["id"], keep: "last" });
 * dropDuplicates(table, { keep: false });                 // only rows seen once
 * dropDuplicates(table, { nullsEqual: false });           // rows with nulls never match
 * ```
 */
export function dropDuplicates(table: Table, options: DropDuplicatesOptions = {}): Result<Table> {
	const result = uniqueSelection(table, options);
	if (result.error !== ErrorCode.None) {
		return result;
	}
	const { selection, count } = result.value;
	return ok(table.take(selection.subarray(0, count)));
}
