/**
 * Categorical restoration.
 *
 * Joins and other physical operators may hand back a categorical column
 * as its raw integer codes. These helpers wrap such columns again.
 */

import { Column } from "../core/column.ts";
import { Table } from "../core/table.ts";
import { type CategoricalDType, isCategoricalDType, isIntegerDType } from "../types/dtypes.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";

/**
 * Wrap an integer codes column with the categories of `dtype`, keeping
 * its null mask. Columns that are not integer are returned unchanged.
 */
export function rewrapCodes(column: Column, dtype: CategoricalDType): Result<Column> {
	if (!isIntegerDType(column.dtype)) {
		return ok(column);
	}
	return Column.fromCodes(dtype.categories, column, dtype.ordered);
}

/**
 * Re-wrap every integer column of `target` whose same-position column in
 * `source` is categorical.
 */
export function copyCategories(target: Table, source: Table): Result<Table> {
	const sourceColumns = source.entries();
	if (sourceColumns.length !== target.columnCount) {
		return err(
			ErrorCode.LengthMismatch,
			`${target.columnCount} target columns vs ${sourceColumns.length} source columns`,
		);
	}

	const entries: [string, Column][] = [];
	for (const [i, [name, column]] of target.entries().entries()) {
		const dtype = sourceColumns[i]?.[1].dtype;
		if (!dtype || !isCategoricalDType(dtype)) {
			entries.push([name, column]);
			continue;
		}
		const wrapped = rewrapCodes(column, dtype);
		if (wrapped.error !== ErrorCode.None) {
			return err(wrapped.error, `column '${name}'`);
		}
		entries.push([name, wrapped.value]);
	}
	return Table.fromColumns(entries, target.index);
}
