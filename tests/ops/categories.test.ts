import { describe, expect, test } from "vitest";
import { Column } from "../../src/core/column.ts";
import { copyCategories, rewrapCodes } from "../../src/ops/categories.ts";
import { DType, isCategoricalDType } from "../../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../../src/types/error.ts";
import { ints, strings, table } from "../helpers/tables.ts";

describe("rewrapCodes", () => {
	const dtype = DType.categorical(unwrap(Column.from(["p", "q"], DType.string)));

	test("wraps integer codes", () => {
		const codes = unwrap(Column.from([1, null, 0], DType.int32));
		const wrapped = unwrap(rewrapCodes(codes, dtype));
		expect(isCategoricalDType(wrapped.dtype)).toBe(true);
		expect(wrapped.toArray()).toEqual(["q", null, "p"]);
	});

	test("turns out-of-range codes into nulls", () => {
		const codes = unwrap(Column.from([5], DType.int32));
		expect(unwrap(rewrapCodes(codes, dtype)).toArray()).toEqual([null]);
	});

	test("returns non-integer columns unchanged", () => {
		const values = unwrap(Column.from(["p"], DType.string));
		expect(unwrap(rewrapCodes(values, dtype))).toBe(values);
	});
});

describe("copyCategories", () => {
	const source = table({ c: unwrap(Column.categorical(["p", "q"])), n: ints(1, 2) });

	test("re-wraps columns whose source counterpart is categorical", () => {
		const target = table({ c: ints(0, 1), n: ints(7, 8) });
		const result = unwrap(copyCategories(target, source));
		expect(result.toColumns()).toEqual({ c: ["p", "q"], n: [7, 8] });
		expect(unwrap(result.column("n")).dtype).toEqual(DType.int32);
	});

	test("leaves already decoded columns alone", () => {
		const target = table({ c: strings("q", "p"), n: ints(1, 2) });
		expect(unwrap(copyCategories(target, source)).toColumns()).toEqual({ c: ["q", "p"], n: [1, 2] });
	});

	test("requires matching column counts", () => {
		const result = copyCategories(table({ c: ints(0) }), source);
		expect(result.error).toBe(ErrorCode.LengthMismatch);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("1 target columns vs 2 source columns");
		}
	});
});
