import { describe, expect, test } from "vitest";
import { Column } from "../../src/core/column.ts";
import { canCastSafely, castColumn } from "../../src/ops/cast.ts";
import { DType, dtypeEquals } from "../../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../../src/types/error.ts";

const int32 = (values: (number | null)[]) => unwrap(Column.from(values, DType.int32));

describe("castColumn", () => {
	test("returns the same column for an equal dtype", () => {
		const column = int32([1]);
		expect(unwrap(castColumn(column, DType.int32))).toBe(column);
	});

	test("widens integers and keeps nulls", () => {
		const cast = unwrap(castColumn(int32([1, null]), DType.int64));
		expect(cast.dtype).toBe(DType.int64);
		expect(cast.toArray()).toEqual([1n, null]);
	});

	test("integers to floats", () => {
		expect(unwrap(castColumn(int32([1, 2]), DType.float64)).toArray()).toEqual([1, 2]);
	});

	test("fails on overflow", () => {
		const result = castColumn(int32([1, 300]), DType.int8);
		expect(result.error).toBe(ErrorCode.CastOverflow);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("300 from Int32 to Int8");
		}
	});

	test("fails on fractions into integers", () => {
		const floats = unwrap(Column.from([1.5], DType.float64));
		expect(castColumn(floats, DType.int32).error).toBe(ErrorCode.CastOverflow);
		const whole = unwrap(Column.from([1, 2], DType.float64));
		expect(unwrap(castColumn(whole, DType.int32)).toArray()).toEqual([1, 2]);
	});

	test("parses strings; unparseable values become null", () => {
		const strings = unwrap(Column.from(["12", "abc", " 7 "], DType.string));
		expect(unwrap(castColumn(strings, DType.int32)).toArray()).toEqual([12, null, 7]);
	});

	test("renders values as strings", () => {
		expect(unwrap(castColumn(int32([1, null]), DType.string)).toArray()).toEqual(["1", null]);
	});

	test("converts temporal units", () => {
		const seconds = unwrap(Column.from([1n], DType.timestamp("s")));
		expect(unwrap(castColumn(seconds, DType.timestamp("ms"))).toArray()).toEqual([1000n]);

		const millis = unwrap(Column.from([1500n], DType.timestamp("ms")));
		expect(castColumn(millis, DType.timestamp("s")).error).toBe(ErrorCode.CastOverflow);
	});

	test("timestamps and durations do not convert into each other", () => {
		const seconds = unwrap(Column.from([1n], DType.timestamp("s")));
		expect(castColumn(seconds, DType.duration("s")).error).toBe(ErrorCode.CastNotSupported);
	});

	test("decodes categoricals", () => {
		const categorical = unwrap(Column.categorical(["b", "a", null]));
		const decoded = unwrap(castColumn(categorical, DType.string));
		expect(decoded.dtype).toBe(DType.string);
		expect(decoded.toArray()).toEqual(["b", "a", null]);
	});

	test("encodes into a categorical target", () => {
		const categories = unwrap(Column.from(["a", "b"], DType.string));
		const strings = unwrap(Column.from(["b", "c"], DType.string));
		const encoded = unwrap(castColumn(strings, DType.categorical(categories)));
		expect(dtypeEquals(encoded.dtype, DType.categorical(categories))).toBe(true);
		expect(encoded.toArray()).toEqual(["b", null]);
	});
});

describe("canCastSafely", () => {
	test("holds when every value survives", () => {
		const int64 = unwrap(Column.from([1n, 2n, null], DType.int64));
		expect(canCastSafely(int64, DType.int32)).toBe(true);
		expect(canCastSafely(int32([1, 2]), DType.float32)).toBe(true);
	});

	test("fails on range or precision loss", () => {
		expect(canCastSafely(unwrap(Column.from([2n ** 40n], DType.int64)), DType.int32)).toBe(false);
		expect(canCastSafely(unwrap(Column.from([1.5], DType.float64)), DType.int32)).toBe(false);
		expect(canCastSafely(unwrap(Column.from([0.1], DType.float64)), DType.float32)).toBe(false);
	});

	test("casting to strings is never safe", () => {
		expect(canCastSafely(int32([1]), DType.string)).toBe(false);
	});

	test("categoricals only cast safely to an equal dtype", () => {
		const categorical = unwrap(Column.categorical([1, 2]));
		expect(canCastSafely(categorical, DType.int32)).toBe(false);
		expect(canCastSafely(categorical, categorical.dtype)).toBe(true);
	});
});
