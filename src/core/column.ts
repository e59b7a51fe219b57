/**
 * Column - a typed, nullable, immutable sequence of values.
 *
 * Physical layout by dtype:
 * - numerics, booleans, temporals: one TypedArray slot per row
 * - strings: uint32 indices into a Dictionary
 * - categoricals: int32 codes into the dtype's categories column
 */

import { ColumnBuffer, allocateStorage } from "../buffer/column-buffer.ts";
import { createDictionary, type Dictionary } from "../buffer/dictionary.ts";
import {
	DType,
	DTypeKind,
	dtypeEquals,
	formatDType,
	isBigIntDType,
	isCategoricalDType,
	isIntegerKind,
	type ValueDType,
} from "../types/dtypes.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import { scalarKey } from "../utils/keys.ts";

/** A single non-null value as seen by users */
export type Scalar = number | bigint | boolean | string;

/** Inclusive value ranges of the integer kinds stored as JS numbers */
export const NUMBER_INT_RANGES: Partial<Record<DTypeKind, readonly [number, number]>> = {
	[DTypeKind.Int8]: [-128, 127],
	[DTypeKind.Int16]: [-32768, 32767],
	[DTypeKind.Int32]: [-2147483648, 2147483647],
	[DTypeKind.UInt8]: [0, 255],
	[DTypeKind.UInt16]: [0, 65535],
	[DTypeKind.UInt32]: [0, 4294967295],
};

/** Inclusive value ranges of the integer kinds stored as BigInts */
export const BIGINT_RANGES: Partial<Record<DTypeKind, readonly [bigint, bigint]>> = {
	[DTypeKind.Int64]: [-(2n ** 63n), 2n ** 63n - 1n],
	[DTypeKind.UInt64]: [0n, 2n ** 64n - 1n],
	[DTypeKind.Timestamp]: [-(2n ** 63n), 2n ** 63n - 1n],
	[DTypeKind.Duration]: [-(2n ** 63n), 2n ** 63n - 1n],
};

export interface CategoricalOptions {
	/** Explicit categories; values outside them become null */
	categories?: Column | readonly Scalar[];
	ordered?: boolean;
	/** Value dtype of inferred categories */
	dtype?: ValueDType;
}

export class Column {
	readonly dtype: DType;
	/** @internal */ readonly buffer: ColumnBuffer;
	/** @internal String columns only */ readonly dictionary: Dictionary | null;

	/** @internal */
	constructor(dtype: DType, buffer: ColumnBuffer, dictionary: Dictionary | null = null) {
		this.dtype = dtype;
		this.buffer = buffer;
		this.dictionary = dictionary;
	}

	/* FACTORIES
	/*-----------------------------------------------------
	/* Build columns from JS values
	/* ==================================================== */

	/**
	 * Build a column of the given dtype. `null` and `undefined` become nulls.
	 *
	 * Int64, UInt64 and temporal columns take BigInts or safe integers;
	 * categorical columns take category values.
	 */
	static from(
		values: readonly (Scalar | null | undefined)[],
		dtype: DType,
	): Result<Column> {
		const builder = new ColumnBuilder(dtype, values.length);
		for (const [i, value] of values.entries()) {
			const code = builder.append(value ?? null);
			if (code !== ErrorCode.None) {
				return err(code, `row ${i}: ${String(value)} as ${formatDType(dtype)}`);
			}
		}
		return ok(builder.finish());
	}

	/**
	 * Build a categorical column from values.
	 *
	 * Without explicit categories the distinct non-null values are used,
	 * sorted ascending.
	 */
	static categorical(
		values: readonly (Scalar | null | undefined)[],
		options: CategoricalOptions = {},
	): Result<Column> {
		let categories: Column;
		if (options.categories instanceof Column) {
			categories = options.categories;
		} else {
			const source =
				options.categories ?? distinctSorted(values.filter(isScalar));
			const dtype = options.dtype ?? inferDType(source);
			const built = Column.from(source, dtype);
			if (built.error !== ErrorCode.None) return built;
			categories = built.value;
		}

		const check = validateCategories(categories);
		if (check !== ErrorCode.None) {
			return err(check);
		}

		const dtype = DType.categorical(categories, options.ordered ?? false);
		const lookup = categoryLookup(categories);
		const buffer = new ColumnBuffer(new Int32Array(values.length), false, values.length);
		for (const [i, value] of values.entries()) {
			const code = value === null || value === undefined ? undefined : lookup.get(scalarKey(value));
			if (code === undefined) {
				buffer.setNull(i, true);
			} else {
				buffer.set(i, code);
			}
		}
		return ok(new Column(dtype, buffer));
	}

	/**
	 * Wrap integer codes as a categorical column over `categories`.
	 * Null codes and codes outside the categories become nulls.
	 */
	static fromCodes(
		categories: Column,
		codes: Column,
		ordered = false,
	): Result<Column> {
		if (!isIntegerKind(codes.dtype.kind)) {
			return err(ErrorCode.TypeMismatch, `codes must be integers, got ${formatDType(codes.dtype)}`);
		}
		const check = validateCategories(categories);
		if (check !== ErrorCode.None) {
			return err(check);
		}
		const length = codes.length;
		const buffer = new ColumnBuffer(new Int32Array(length), false, length);
		for (let i = 0; i < length; i++) {
			const raw = codes.isNull(i) ? null : Number(codes.buffer.get(i));
			if (raw === null || raw < 0 || raw >= categories.length) {
				buffer.setNull(i, true);
			} else {
				buffer.set(i, raw);
			}
		}
		return ok(new Column(DType.categorical(categories, ordered), buffer));
	}

	/** A column of `length` nulls */
	static nulls(dtype: DType, length: number): Column {
		const buffer = new ColumnBuffer(allocateStorage(dtype, length), false, length);
		for (let i = 0; i < length; i++) {
			buffer.setNull(i, true);
		}
		return new Column(dtype, buffer, dtype.kind === DTypeKind.String ? createDictionary() : null);
	}

	/* ACCESSORS
	/*-----------------------------------------------------
	/* Read values and metadata
	/* ==================================================== */

	get length(): number {
		return this.buffer.length;
	}

	get nullCount(): number {
		return this.buffer.nullCount;
	}

	isNull(index: number): boolean {
		return this.buffer.isNull(index);
	}

	/** Value at `index`; categoricals are decoded to their category value */
	get(index: number): Scalar | null {
		if (index < 0 || index >= this.length || this.buffer.isNull(index)) {
			return null;
		}
		const raw = this.buffer.get(index);
		const dtype = this.dtype;
		switch (dtype.kind) {
			case DTypeKind.Boolean:
				return raw !== 0;
			case DTypeKind.String:
				return this.dictionary?.getString(Number(raw)) ?? null;
			case DTypeKind.Categorical:
				return dtype.categories.get(Number(raw));
			default:
				return raw;
		}
	}

	toArray(): (Scalar | null)[] {
		const out: (Scalar | null)[] = new Array(this.length);
		for (let i = 0; i < this.length; i++) {
			out[i] = this.get(i);
		}
		return out;
	}

	/** Categories of a categorical column */
	categories(): Column | undefined {
		return isCategoricalDType(this.dtype) ? this.dtype.categories : undefined;
	}

	/** Int32 codes of a categorical column, nulls preserved */
	codes(): Column | undefined {
		if (!isCategoricalDType(this.dtype)) return undefined;
		return new Column(DType.int32, this.buffer);
	}

	/** Orderedness of a categorical column */
	ordered(): boolean | undefined {
		return isCategoricalDType(this.dtype) ? this.dtype.ordered : undefined;
	}

	/* TRANSFORMS
	/*-----------------------------------------------------
	/* Pure operations returning new columns
	/* ==================================================== */

	/** Gather rows by index; -1 yields a null */
	take(indices: Int32Array): Column {
		return new Column(this.dtype, this.buffer.gather(indices), this.dictionary);
	}

	/** Same dtype and the same values and nulls at every row */
	equals(other: Column): boolean {
		if (this === other) return true;
		if (this.length !== other.length || !dtypeEquals(this.dtype, other.dtype)) {
			return false;
		}
		for (let i = 0; i < this.length; i++) {
			if (this.isNull(i) !== other.isNull(i)) return false;
			if (this.get(i) !== other.get(i)) return false;
		}
		return true;
	}
}

/**
 * Appends JS values into the physical layout of a dtype.
 */
export class ColumnBuilder {
	readonly dtype: DType;
	private readonly buffer: ColumnBuffer;
	private readonly dictionary: Dictionary | null;
	private readonly categoryCodes: Map<string, number> | null;

	constructor(dtype: DType, capacity: number) {
		this.dtype = dtype;
		this.buffer = new ColumnBuffer(allocateStorage(dtype, capacity));
		this.dictionary = dtype.kind === DTypeKind.String ? createDictionary() : null;
		this.categoryCodes = isCategoricalDType(dtype) ? categoryLookup(dtype.categories) : null;
	}

	append(value: Scalar | null): ErrorCode {
		if (value === null) {
			return this.buffer.appendNull();
		}
		const physical = this.toPhysical(value);
		if (typeof physical !== "number" && typeof physical !== "bigint") {
			return physical.error;
		}
		return this.buffer.append(physical);
	}

	finish(): Column {
		return new Column(this.dtype, this.buffer, this.dictionary);
	}

	private toPhysical(value: Scalar): number | bigint | { error: Exclude<ErrorCode, ErrorCode.None> } {
		const dtype = this.dtype;
		switch (dtype.kind) {
			case DTypeKind.Boolean:
				return typeof value === "boolean" ? (value ? 1 : 0) : { error: ErrorCode.TypeMismatch };
			case DTypeKind.String:
				return typeof value === "string" && this.dictionary
					? this.dictionary.internString(value)
					: { error: ErrorCode.TypeMismatch };
			case DTypeKind.Categorical: {
				const code = this.categoryCodes?.get(scalarKey(value));
				return code ?? { error: ErrorCode.InvalidCategories };
			}
			case DTypeKind.Float32:
			case DTypeKind.Float64:
				if (typeof value === "number") return value;
				return typeof value === "bigint" ? Number(value) : { error: ErrorCode.TypeMismatch };
			default:
				return isBigIntDType(dtype)
					? toBigInt(value, dtype.kind)
					: toNumberInt(value, dtype.kind);
		}
	}
}

function toBigInt(
	value: Scalar,
	kind: DTypeKind,
): bigint | { error: Exclude<ErrorCode, ErrorCode.None> } {
	let big: bigint;
	if (typeof value === "bigint") {
		big = value;
	} else if (typeof value === "number" && Number.isSafeInteger(value)) {
		big = BigInt(value);
	} else {
		return { error: ErrorCode.TypeMismatch };
	}
	const range = BIGINT_RANGES[kind];
	if (range && (big < range[0] || big > range[1])) {
		return { error: ErrorCode.CastOverflow };
	}
	return big;
}

function toNumberInt(
	value: Scalar,
	kind: DTypeKind,
): number | { error: Exclude<ErrorCode, ErrorCode.None> } {
	const num = typeof value === "bigint" ? Number(value) : value;
	if (typeof num !== "number" || !Number.isInteger(num)) {
		return { error: ErrorCode.TypeMismatch };
	}
	const range = NUMBER_INT_RANGES[kind];
	if (range && (num < range[0] || num > range[1])) {
		return { error: ErrorCode.CastOverflow };
	}
	return num;
}

function isScalar(value: Scalar | null | undefined): value is Scalar {
	return value !== null && value !== undefined;
}

/** Map from category value key to code */
function categoryLookup(categories: Column): Map<string, number> {
	const lookup = new Map<string, number>();
	for (let i = 0; i < categories.length; i++) {
		const value = categories.get(i);
		if (value !== null) lookup.set(scalarKey(value), i);
	}
	return lookup;
}

/** Categories must be plain, non-null and distinct */
function validateCategories(categories: Column): ErrorCode {
	if (isCategoricalDType(categories.dtype) || categories.nullCount > 0) {
		return ErrorCode.InvalidCategories;
	}
	return categoryLookup(categories).size === categories.length
		? ErrorCode.None
		: ErrorCode.InvalidCategories;
}

function distinctSorted(values: readonly Scalar[]): Scalar[] {
	const seen = new Map<string, Scalar>();
	for (const value of values) {
		seen.set(scalarKey(value), value);
	}
	return [...seen.values()].sort(compareScalars);
}

/** Total order on scalars of one type; mixed types order by type name */
export function compareScalars(a: Scalar, b: Scalar): number {
	if (typeof a !== typeof b) {
		return typeof a < typeof b ? -1 : 1;
	}
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

/**
 * Infer a dtype from JS values.
 *
 * Strings, booleans and BigInts map to String, Boolean and Int64. Numbers
 * map to Int32 when they are all integers in range, else Float64.
 */
export function inferDType(values: readonly Scalar[]): ValueDType {
	const first = values[0];
	if (typeof first === "string") return DType.string;
	if (typeof first === "boolean") return DType.boolean;
	if (typeof first === "bigint") return DType.int64;
	const int32 = NUMBER_INT_RANGES[DTypeKind.Int32];
	const allInt32 = values.every(
		(v) =>
			typeof v === "number" &&
			Number.isInteger(v) &&
			int32 !== undefined &&
			v >= int32[0] &&
			v <= int32[1],
	);
	return allInt32 ? DType.int32 : DType.float64;
}
