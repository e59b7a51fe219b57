/**
 * Data types for table columns.
 *
 * A DType is a closed tagged union discriminated on `kind`:
 * - Fixed-width numerics map to a TypedArray directly
 * - Strings use dictionary encoding (uint32 index into a string table)
 * - Temporal types store int64 ticks at a given resolution
 * - Categoricals store int32 codes into a categories column
 *
 * Nullability is a property of the column (its null bitmap), not the dtype.
 */

import type { Column } from "../core/column.ts";

export enum DTypeKind {
	Int8 = 0,
	Int16 = 1,
	Int32 = 2,
	Int64 = 3,
	UInt8 = 4,
	UInt16 = 5,
	UInt32 = 6,
	UInt64 = 7,
	Float32 = 8,
	Float64 = 9,
	Boolean = 10,
	String = 11,
	Timestamp = 12, // Ticks since epoch (int64)
	Duration = 13, // Ticks (int64)
	Categorical = 14, // Codes (int32) into a categories column
}

/** Resolution of a temporal dtype */
export type TimeUnit = "s" | "ms" | "us" | "ns";

export type SignedIntKind =
	| DTypeKind.Int8
	| DTypeKind.Int16
	| DTypeKind.Int32
	| DTypeKind.Int64;

export type UnsignedIntKind =
	| DTypeKind.UInt8
	| DTypeKind.UInt16
	| DTypeKind.UInt32
	| DTypeKind.UInt64;

export type IntegerKind = SignedIntKind | UnsignedIntKind;
export type FloatKind = DTypeKind.Float32 | DTypeKind.Float64;
export type NumericKind = IntegerKind | FloatKind;
export type TemporalKind = DTypeKind.Timestamp | DTypeKind.Duration;

export interface NumericDType<K extends NumericKind = NumericKind> {
	readonly kind: K;
}

export interface BooleanDType {
	readonly kind: DTypeKind.Boolean;
}

export interface StringDType {
	readonly kind: DTypeKind.String;
}

export interface TemporalDType<K extends TemporalKind = TemporalKind> {
	readonly kind: K;
	readonly unit: TimeUnit;
}

export interface CategoricalDType {
	readonly kind: DTypeKind.Categorical;
	/** Distinct category values; a code `c` stands for `categories.get(c)` */
	readonly categories: Column;
	readonly ordered: boolean;
}

/** Any non-categorical dtype, i.e. one a categories column may have */
export type ValueDType = NumericDType | BooleanDType | StringDType | TemporalDType;

export type DType = ValueDType | CategoricalDType;

/** Bit width of each integer kind */
export const INTEGER_WIDTHS: Record<IntegerKind, 8 | 16 | 32 | 64> = {
	[DTypeKind.Int8]: 8,
	[DTypeKind.Int16]: 16,
	[DTypeKind.Int32]: 32,
	[DTypeKind.Int64]: 64,
	[DTypeKind.UInt8]: 8,
	[DTypeKind.UInt16]: 16,
	[DTypeKind.UInt32]: 32,
	[DTypeKind.UInt64]: 64,
};

/** Ticks per second for each time unit */
export const TIME_UNIT_TICKS: Record<TimeUnit, bigint> = {
	s: 1n,
	ms: 1_000n,
	us: 1_000_000n,
	ns: 1_000_000_000n,
};

function numeric<K extends NumericKind>(kind: K): NumericDType<K> {
	return { kind };
}

/**
 * DType factory with convenient accessors.
 *
 * Usage:
 *   DType.int32              // int32
 *   DType.timestamp("ms")    // millisecond timestamps
 *   DType.categorical(cats)  // unordered categorical over `cats`
 */
export const DType = {
	int8: numeric(DTypeKind.Int8),
	int16: numeric(DTypeKind.Int16),
	int32: numeric(DTypeKind.Int32),
	int64: numeric(DTypeKind.Int64),
	uint8: numeric(DTypeKind.UInt8),
	uint16: numeric(DTypeKind.UInt16),
	uint32: numeric(DTypeKind.UInt32),
	uint64: numeric(DTypeKind.UInt64),
	float32: numeric(DTypeKind.Float32),
	float64: numeric(DTypeKind.Float64),
	boolean: { kind: DTypeKind.Boolean } satisfies BooleanDType,
	string: { kind: DTypeKind.String } satisfies StringDType,

	timestamp(unit: TimeUnit = "ns"): TemporalDType<DTypeKind.Timestamp> {
		return { kind: DTypeKind.Timestamp, unit };
	},

	duration(unit: TimeUnit = "ns"): TemporalDType<DTypeKind.Duration> {
		return { kind: DTypeKind.Duration, unit };
	},

	categorical(categories: Column, ordered = false): CategoricalDType {
		return { kind: DTypeKind.Categorical, categories, ordered };
	},
} as const;

export function isIntegerKind(kind: DTypeKind): kind is IntegerKind {
	return kind >= DTypeKind.Int8 && kind <= DTypeKind.UInt64;
}

export function isSignedKind(kind: DTypeKind): kind is SignedIntKind {
	return kind >= DTypeKind.Int8 && kind <= DTypeKind.Int64;
}

export function isFloatKind(kind: DTypeKind): kind is FloatKind {
	return kind === DTypeKind.Float32 || kind === DTypeKind.Float64;
}

/** Check if a DType is numeric (supports arithmetic) */
export function isNumericDType(dtype: DType): dtype is NumericDType {
	return dtype.kind >= DTypeKind.Int8 && dtype.kind <= DTypeKind.Float64;
}

/** Check if a DType is integer (not floating point) */
export function isIntegerDType(dtype: DType): dtype is NumericDType<IntegerKind> {
	return isIntegerKind(dtype.kind);
}

export function isFloatDType(dtype: DType): dtype is NumericDType<FloatKind> {
	return isFloatKind(dtype.kind);
}

export function isTemporalDType(dtype: DType): dtype is TemporalDType {
	return dtype.kind === DTypeKind.Timestamp || dtype.kind === DTypeKind.Duration;
}

export function isCategoricalDType(dtype: DType): dtype is CategoricalDType {
	return dtype.kind === DTypeKind.Categorical;
}

/** Check if a DType is stored as BigInt values */
export function isBigIntDType(dtype: DType): boolean {
	const kind = dtype.kind;
	return (
		kind === DTypeKind.Int64 ||
		kind === DTypeKind.UInt64 ||
		kind === DTypeKind.Timestamp ||
		kind === DTypeKind.Duration
	);
}

/**
 * Structural dtype equality.
 * Categoricals are equal when their categories hold the same values in the
 * same order and their `ordered` flags agree.
 */
export function dtypeEquals(a: DType, b: DType): boolean {
	if (a === b) return true;
	switch (a.kind) {
		case DTypeKind.Timestamp:
		case DTypeKind.Duration:
			return b.kind === a.kind && "unit" in b && b.unit === a.unit;
		case DTypeKind.Categorical:
			return (
				b.kind === DTypeKind.Categorical &&
				a.ordered === b.ordered &&
				a.categories.equals(b.categories)
			);
		default:
			return a.kind === b.kind;
	}
}

/** Get readable name for DTypeKind */
export function getDTypeName(kind: DTypeKind): string {
	switch (kind) {
		case DTypeKind.Int8:
			return "Int8";
		case DTypeKind.Int16:
			return "Int16";
		case DTypeKind.Int32:
			return "Int32";
		case DTypeKind.Int64:
			return "Int64";
		case DTypeKind.UInt8:
			return "UInt8";
		case DTypeKind.UInt16:
			return "UInt16";
		case DTypeKind.UInt32:
			return "UInt32";
		case DTypeKind.UInt64:
			return "UInt64";
		case DTypeKind.Float32:
			return "Float32";
		case DTypeKind.Float64:
			return "Float64";
		case DTypeKind.Boolean:
			return "Boolean";
		case DTypeKind.String:
			return "String";
		case DTypeKind.Timestamp:
			return "Timestamp";
		case DTypeKind.Duration:
			return "Duration";
		case DTypeKind.Categorical:
			return "Categorical";
		default:
			return "Unknown";
	}
}

/** Render a dtype for messages, e.g. `Timestamp[ms]` or `Categorical[String]` */
export function formatDType(dtype: DType): string {
	switch (dtype.kind) {
		case DTypeKind.Timestamp:
		case DTypeKind.Duration:
			return `${getDTypeName(dtype.kind)}[${dtype.unit}]`;
		case DTypeKind.Categorical:
			return `Categorical[${formatDType(dtype.categories.dtype)}${dtype.ordered ? ", ordered" : ""}]`;
		default:
			return getDTypeName(dtype.kind);
	}
}
