/**
 * Drop null operations.
 *
 * Filters out rows containing null values in specified columns, or
 * columns containing null values in specified rows.
 *
 * Strategy:
 * - Count nulls per row across the checked columns
 * - Build a selection vector of the rows that pass
 * - Gather once; categorical columns keep their categories
 */

import type { Column } from "../core/column.ts";
import type { Table } from "../core/table.ts";
import { ErrorCode, err, forward, ok, type Result } from "../types/error.ts";

/** Options of the default row mode */
export interface DropNullRowsOptions {
	axis?: "rows";
	/** "any": drop rows with any null; "all": drop rows that are entirely null */
	how?: "any" | "all";
	/** Columns to check (default: all columns) */
	subset?: readonly string[];
	/** Keep rows with at least this many non-null values; overrides `how` */
	thresh?: number;
}

/** Options of column mode: whole columns are dropped instead of rows */
export interface DropNullColumnsOptions {
	axis: "columns";
	/** "any": drop columns with any null; "all": drop columns that are entirely null */
	how?: "any" | "all";
	/** Row positions to check (default: all rows) */
	rows?: readonly number[];
	/** Keep columns with at least this many non-null values; overrides `how` */
	thresh?: number;
}

export type DropNullsOptions = DropNullRowsOptions | DropNullColumnsOptions;

/**
 * Build a selection vector of the rows that pass the null check.
 */
export function dropNullSelection(
	table: Table,
	options: DropNullRowsOptions = {},
): Result<{ selection: Int32Array; count: number }> {
	const columns: Column[] = [];
	for (const name of options.subset ?? table.columnNames) {
		const column = table.column(name);
		if (column.error !== ErrorCode.None) {
			return err(ErrorCode.UnknownColumn, name);
		}
		columns.push(column.value);
	}

	const rowCount = table.rowCount;
	const required =
		options.thresh ?? (options.how === "all" ? Math.min(1, columns.length) : columns.length);

	// Pre-allocate selection vector (worst case: all rows pass)
	const selection = new Int32Array(rowCount);
	let count = 0;

	for (let row = 0; row < rowCount; row++) {
		let present = 0;
		for (const column of columns) {
			if (!column.isNull(row)) present++;
		}
		if (present >= required) {
			selection[count] = row;
			count++;
		}
	}

	return ok({ selection, count });
}

/**
 * Names of the columns that pass the null check, in table order.
 */
export function dropNullColumnNames(
	table: Table,
	options: DropNullColumnsOptions,
): Result<string[]> {
	const rowCount = table.rowCount;
	const rows = options.rows ?? Array.from({ length: rowCount }, (_, row) => row);
	const outside = rows.find((row) => !Number.isInteger(row) || row < 0 || row >= rowCount);
	if (outside !== undefined) {
		return err(ErrorCode.InvalidOperand, `row ${outside} of ${rowCount}`);
	}

	const required =
		options.thresh ?? (options.how === "all" ? Math.min(1, rows.length) : rows.length);

	const kept: string[] = [];
	for (const [name, column] of table.entries()) {
		let present = 0;
		for (const row of rows) {
			if (!column.isNull(row)) present++;
		}
		if (present >= required) kept.push(name);
	}
	return ok(kept);
}

/**
 * Drop rows (or, with `axis: "columns"`, columns) containing nulls.
 *
 * @example
 * ```ts
 * dropNulls(table);                          // any null in any column
 * dropNulls(table, { subset: ["id"] });      // null id only
 * dropNulls(table, { how: "all" });          // fully-null rows only
 * dropNulls(table, { axis: "columns" });     // columns with any null
 * ```
 */
export function dropNulls(table: Table, options: DropNullsOptions = {}): Result<Table> {
	if (options.axis === "columns") {
		const names = dropNullColumnNames(table, options);
		if (names.error !== ErrorCode.None) {
			return forward(names);
		}
		return table.select(names.value);
	}

	const result = dropNullSelection(table, options);
	if (result.error !== ErrorCode.None) {
		return forward(result);
	}
	const { selection, count } = result.value;
	return ok(table.take(selection.subarray(0, count)));
}
