/**
 * Column type casting operations.
 *
 * Cast strategies:
 * - Numeric→Numeric: range-checked; integer targets reject fractions,
 *   float targets round to the nearest representable value
 * - String→Numeric/Boolean: parse each value, unparseable values become null
 * - Any→String: render values
 * - Temporal→Temporal: unit conversion, rejecting lost ticks
 * - Categorical→Any: decode through the categories first
 * - Any→Categorical: encode against the target categories, unknown values become null
 *
 * `canCastSafely` answers whether every non-null value survives a cast exactly.
 */

import {
	BIGINT_RANGES,
	Column,
	NUMBER_INT_RANGES,
	type Scalar,
} from "../core/column.ts";
import {
	type DType,
	DTypeKind,
	TIME_UNIT_TICKS,
	type TimeUnit,
	type ValueDType,
	dtypeEquals,
	formatDType,
	isBigIntDType,
	isCategoricalDType,
	isIntegerKind,
	isTemporalDType,
} from "../types/dtypes.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";

/** Outcome of converting one value */
type Converted =
	| { readonly value: Scalar | null; readonly exact: boolean }
	| { readonly error: Exclude<ErrorCode, ErrorCode.None> };

/**
 * Cast a column to a different DType.
 *
 * Fails with CastOverflow when a value does not fit the target (out of
 * range, fractional into an integer, sub-unit ticks into a coarser
 * temporal unit) and with CastNotSupported for kind pairs with no
 * conversion.
 */
export function castColumn(source: Column, target: DType): Result<Column> {
	if (dtypeEquals(source.dtype, target)) {
		return ok(source);
	}

	const from = valueDType(source.dtype);
	const to = valueDType(target);
	const values: (Scalar | null)[] = new Array(source.length);

	for (let i = 0; i < source.length; i++) {
		const value = source.get(i);
		if (value === null) {
			values[i] = null;
			continue;
		}
		const converted = convertValue(value, from, to);
		if ("error" in converted) {
			return err(
				converted.error,
				`${String(value)} from ${formatDType(source.dtype)} to ${formatDType(target)}`,
			);
		}
		values[i] = converted.value;
	}

	if (isCategoricalDType(target)) {
		return Column.categorical(values, {
			categories: target.categories,
			ordered: target.ordered,
		});
	}
	return Column.from(values, target);
}

/**
 * Whether every non-null value of `column` can be cast to `target`
 * without loss.
 */
export function canCastSafely(column: Column, target: DType): boolean {
	if (dtypeEquals(column.dtype, target)) {
		return true;
	}
	if (isCategoricalDType(column.dtype) || isCategoricalDType(target)) {
		return false;
	}
	const from = valueDType(column.dtype);
	const to = valueDType(target);
	for (let i = 0; i < column.length; i++) {
		const value = column.get(i);
		if (value === null) continue;
		const converted = convertValue(value, from, to);
		if ("error" in converted || !converted.exact || converted.value === null) {
			return false;
		}
	}
	return true;
}

/** Categoricals convert through their categories' dtype */
function valueDType(dtype: DType): ValueDType {
	return isCategoricalDType(dtype) ? valueDType(dtype.categories.dtype) : dtype;
}

/** Convert one non-null value between value dtypes */
function convertValue(value: Scalar, from: ValueDType, to: ValueDType): Converted {
	if (dtypeEquals(from, to)) {
		return { value, exact: true };
	}

	if (to.kind === DTypeKind.String) {
		// Rendering is always possible but never reversible by a join
		return { value: String(value), exact: false };
	}

	if (typeof value === "string") {
		return parseValue(value, to);
	}

	if (to.kind === DTypeKind.Boolean) {
		if (typeof value === "boolean") return { value, exact: true };
		if (isTemporalDType(from)) return { error: ErrorCode.CastNotSupported };
		const zero = value === 0 || value === 0n;
		const one = value === 1 || value === 1n;
		return { value: !zero, exact: zero || one };
	}

	if (isTemporalDType(to)) {
		if (isTemporalDType(from)) {
			if (from.kind !== to.kind) return { error: ErrorCode.CastNotSupported };
			return convertTicks(value, from.unit, to.unit);
		}
		if (typeof value === "bigint") return fitBigInt(value, to.kind);
		if (typeof value === "number" && Number.isInteger(value)) {
			return fitBigInt(BigInt(value), to.kind);
		}
		return { error: ErrorCode.CastNotSupported };
	}

	// Numeric targets from here on
	const numeric = typeof value === "boolean" ? (value ? 1 : 0) : value;

	if (isIntegerKind(to.kind)) {
		if (typeof numeric === "bigint") {
			return isBigIntDType(to)
				? fitBigInt(numeric, to.kind)
				: fitNumber(Number(numeric), to.kind, true);
		}
		if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
			return { error: ErrorCode.CastOverflow };
		}
		return isBigIntDType(to)
			? fitBigInt(BigInt(numeric), to.kind)
			: fitNumber(numeric, to.kind, true);
	}

	// Float targets
	const asNumber = Number(numeric);
	let exact = typeof numeric === "bigint" ? BigInt(asNumber) === numeric : true;
	if (to.kind === DTypeKind.Float32) {
		const rounded = Math.fround(asNumber);
		if (Number.isFinite(asNumber) && !Number.isFinite(rounded)) {
			return { error: ErrorCode.CastOverflow };
		}
		exact = exact && (rounded === asNumber || Number.isNaN(asNumber));
		return { value: rounded, exact };
	}
	return { value: asNumber, exact };
}

function fitNumber(value: number, kind: DTypeKind, exact: boolean): Converted {
	const range = NUMBER_INT_RANGES[kind];
	if (range && (value < range[0] || value > range[1])) {
		return { error: ErrorCode.CastOverflow };
	}
	return { value, exact };
}

function fitBigInt(value: bigint, kind: DTypeKind): Converted {
	const range = BIGINT_RANGES[kind];
	if (range && (value < range[0] || value > range[1])) {
		return { error: ErrorCode.CastOverflow };
	}
	return { value, exact: true };
}

function convertTicks(
	value: Scalar,
	from: TimeUnit,
	to: TimeUnit,
): Converted {
	if (typeof value !== "bigint") return { error: ErrorCode.CastNotSupported };
	const fromTicks = TIME_UNIT_TICKS[from];
	const toTicks = TIME_UNIT_TICKS[to];
	if (toTicks >= fromTicks) {
		return fitBigInt(value * (toTicks / fromTicks), DTypeKind.Timestamp);
	}
	const factor = fromTicks / toTicks;
	if (value % factor !== 0n) {
		return { error: ErrorCode.CastOverflow };
	}
	return { value: value / factor, exact: true };
}

/** Parse a string into a non-string value dtype; failures become null */
function parseValue(text: string, to: ValueDType): Converted {
	const trimmed = text.trim();
	if (to.kind === DTypeKind.Boolean) {
		const lower = trimmed.toLowerCase();
		if (lower === "true") return { value: true, exact: true };
		if (lower === "false") return { value: false, exact: true };
		return { value: null, exact: false };
	}
	if (isBigIntDType(to)) {
		if (!/^[+-]?\d+$/.test(trimmed)) return { value: null, exact: false };
		const big = BigInt(trimmed);
		const range = BIGINT_RANGES[to.kind];
		if (range && (big < range[0] || big > range[1])) {
			return { error: ErrorCode.CastOverflow };
		}
		return { value: big, exact: true };
	}
	const num = trimmed === "" ? Number.NaN : Number(trimmed);
	if (Number.isNaN(num)) {
		return { value: null, exact: false };
	}
	if (isIntegerKind(to.kind)) {
		if (!Number.isInteger(num)) return { error: ErrorCode.CastOverflow };
		return fitNumber(num, to.kind, true);
	}
	return {
		value: to.kind === DTypeKind.Float32 ? Math.fround(num) : num,
		exact: true,
	};
}
