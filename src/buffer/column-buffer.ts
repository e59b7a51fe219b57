/**
 * Column buffer for storing typed array data.
 *
 * A ColumnBuffer wraps a TypedArray and provides:
 * - Fixed capacity with bounds checking on append
 * - A null bitmap (bit i = 1 means index i is null)
 * - Gather by row indices
 */

import { type DType, DTypeKind } from "../types/dtypes.ts";
import { ErrorCode } from "../types/error.ts";

/** TypedArrays holding JS numbers */
export type NumberArray =
	| Int8Array
	| Int16Array
	| Int32Array
	| Uint8Array
	| Uint16Array
	| Uint32Array
	| Float32Array
	| Float64Array;

/** TypedArrays holding BigInts */
export type BigIntArray = BigInt64Array | BigUint64Array;

export type TypedArray = NumberArray | BigIntArray;

/** Allocate the physical storage for `capacity` values of a dtype */
export function allocateStorage(dtype: DType, capacity: number): TypedArray {
	switch (dtype.kind) {
		case DTypeKind.Int8:
			return new Int8Array(capacity);
		case DTypeKind.Int16:
			return new Int16Array(capacity);
		case DTypeKind.Int32:
		case DTypeKind.Categorical: // codes
			return new Int32Array(capacity);
		case DTypeKind.Int64:
		case DTypeKind.Timestamp:
		case DTypeKind.Duration:
			return new BigInt64Array(capacity);
		case DTypeKind.UInt8:
		case DTypeKind.Boolean:
			return new Uint8Array(capacity);
		case DTypeKind.UInt16:
			return new Uint16Array(capacity);
		case DTypeKind.UInt32:
		case DTypeKind.String: // dictionary indices
			return new Uint32Array(capacity);
		case DTypeKind.UInt64:
			return new BigUint64Array(capacity);
		case DTypeKind.Float32:
			return new Float32Array(capacity);
		case DTypeKind.Float64:
			return new Float64Array(capacity);
	}
}

export function isBigIntArray(data: TypedArray): data is BigIntArray {
	return data instanceof BigInt64Array || data instanceof BigUint64Array;
}

/**
 * A buffer of physical values. Logical meaning (dictionary index,
 * categorical code, ticks) is given by the owning Column's dtype.
 */
export class ColumnBuffer {
	/** The underlying typed array */
	readonly data: TypedArray;

	/** Maximum number of elements */
	readonly capacity: number;

	/** Current number of valid elements */
	private _length: number;

	/** Null bitmap (bit i = 1 means index i is null) */
	private nullBitmap: Uint8Array | null;

	constructor(data: TypedArray, nullable = false, length = 0) {
		this.data = data;
		this.capacity = data.length;
		this._length = length;
		this.nullBitmap = nullable
			? new Uint8Array(Math.ceil(data.length / 8))
			: null;
	}

	/** Current number of valid elements */
	get length(): number {
		return this._length;
	}

	/** Check if column tracks nulls */
	get isNullable(): boolean {
		return this.nullBitmap !== null;
	}

	/** Number of null entries among the valid elements */
	get nullCount(): number {
		if (this.nullBitmap === null) return 0;
		let count = 0;
		for (let i = 0; i < this._length; i++) {
			if (this.isNull(i)) count++;
		}
		return count;
	}

	/** Get the physical value at index (no bounds check) */
	get(index: number): number | bigint {
		return this.data[index] ?? 0;
	}

	/** Set value at index; the value must match the storage flavour */
	set(index: number, value: number | bigint): ErrorCode {
		const data = this.data;
		if (isBigIntArray(data)) {
			if (typeof value !== "bigint") return ErrorCode.TypeMismatch;
			data[index] = value;
		} else {
			if (typeof value !== "number") return ErrorCode.TypeMismatch;
			data[index] = value;
		}
		if (index >= this._length) {
			this._length = index + 1;
		}
		return ErrorCode.None;
	}

	/** Check if value at index is null */
	isNull(index: number): boolean {
		if (this.nullBitmap === null) return false;
		const byteIndex = index >>> 3;
		const bitIndex = index & 7;
		return ((this.nullBitmap[byteIndex] ?? 0) & (1 << bitIndex)) !== 0;
	}

	/** Set null flag at index, enabling null tracking if needed */
	setNull(index: number, isNull: boolean): void {
		if (this.nullBitmap === null) {
			if (!isNull) return;
			this.nullBitmap = new Uint8Array(Math.ceil(this.capacity / 8));
		}
		const byteIndex = index >>> 3;
		const bitIndex = index & 7;
		if (isNull) {
			this.nullBitmap[byteIndex] =
				(this.nullBitmap[byteIndex] ?? 0) | (1 << bitIndex);
		} else {
			this.nullBitmap[byteIndex] =
				(this.nullBitmap[byteIndex] ?? 0) & ~(1 << bitIndex);
		}
	}

	/** Append a value, return success or BufferFull error */
	append(value: number | bigint): ErrorCode {
		if (this._length >= this.capacity) {
			return ErrorCode.BufferFull;
		}
		return this.set(this._length, value);
	}

	/** Append a null value */
	appendNull(): ErrorCode {
		if (this._length >= this.capacity) {
			return ErrorCode.BufferFull;
		}
		this.setNull(this._length, true);
		this._length++;
		return ErrorCode.None;
	}

	/**
	 * Gather rows into a new buffer of the same flavour.
	 * An index of -1 produces a null.
	 */
	gather(indices: Int32Array): ColumnBuffer {
		const out = new ColumnBuffer(
			emptyLike(this.data, indices.length),
			false,
			indices.length,
		);
		const src = this.data;
		const dst = out.data;
		for (let i = 0; i < indices.length; i++) {
			const row = indices[i] ?? -1;
			if (row < 0 || this.isNull(row)) {
				out.setNull(i, true);
				continue;
			}
			if (isBigIntArray(dst)) {
				const v = src[row];
				dst[i] = typeof v === "bigint" ? v : 0n;
			} else {
				const v = src[row];
				dst[i] = typeof v === "number" ? v : 0;
			}
		}
		return out;
	}
}

/** Allocate a zeroed array of the same constructor as `data` */
function emptyLike(data: TypedArray, length: number): TypedArray {
	if (data instanceof Int8Array) return new Int8Array(length);
	if (data instanceof Int16Array) return new Int16Array(length);
	if (data instanceof Int32Array) return new Int32Array(length);
	if (data instanceof Uint8Array) return new Uint8Array(length);
	if (data instanceof Uint16Array) return new Uint16Array(length);
	if (data instanceof Uint32Array) return new Uint32Array(length);
	if (data instanceof Float32Array) return new Float32Array(length);
	if (data instanceof Float64Array) return new Float64Array(length);
	if (data instanceof BigInt64Array) return new BigInt64Array(length);
	return new BigUint64Array(length);
}
