/**
 * Fill null operations.
 *
 * Replaces null values in a column with a constant. Returns a new column
 * without a null bitmap; the source column is left untouched.
 */

import { Column, type Scalar } from "../core/column.ts";
import { type DType, DTypeKind, isBigIntDType } from "../types/dtypes.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";

/**
 * Fill null values in a column with a constant value.
 *
 * @param column Column to fill
 * @param fillValue Value to replace nulls with; for categoricals, a category value
 */
export function fillNulls(column: Column, fillValue: Scalar): Result<Column> {
	if (column.nullCount === 0) {
		return ok(column);
	}

	const values = column.toArray().map((value) => value ?? fillValue);
	const categories = column.categories();
	const filled = categories
		? Column.categorical(values, {
				categories,
				ordered: column.ordered() ?? false,
			})
		: Column.from(values, column.dtype);

	if (filled.error !== ErrorCode.None) {
		return err(ErrorCode.InvalidFillValue, String(fillValue));
	}
	if (categories && filled.value.nullCount > 0) {
		// Fill value was not one of the categories
		return err(ErrorCode.InvalidFillValue, String(fillValue));
	}
	return filled;
}

/**
 * The zero value of a dtype: 0, 0n, false, "" or the first category.
 * Returns undefined for a categorical with no categories.
 */
export function neutralValue(dtype: DType): Scalar | undefined {
	switch (dtype.kind) {
		case DTypeKind.Boolean:
			return false;
		case DTypeKind.String:
			return "";
		case DTypeKind.Categorical:
			return dtype.categories.get(0) ?? undefined;
		default:
			return isBigIntDType(dtype) ? 0n : 0;
	}
}

/** Fill nulls with the dtype's neutral value */
export function fillNullsNeutral(column: Column): Result<Column> {
	const neutral = neutralValue(column.dtype);
	if (neutral === undefined) {
		return column.nullCount === 0 ? ok(column) : err(ErrorCode.InvalidFillValue);
	}
	return fillNulls(column, neutral);
}
