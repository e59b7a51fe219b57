import { describe, expect, test } from "vitest";
import { Column } from "../../src/core/column.ts";
import { TableIndex } from "../../src/core/table.ts";
import { type MergeRequest, effectiveKeys, validateMerge } from "../../src/merge/validate.ts";
import { DType } from "../../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../../src/types/error.ts";
import { ints, table } from "../helpers/tables.ts";

function request(overrides: Partial<MergeRequest> = {}): MergeRequest {
	return {
		on: null,
		leftOn: [],
		rightOn: [],
		leftIndex: false,
		rightIndex: false,
		how: "inner",
		suffixes: ["", ""],
		...overrides,
	};
}

const lhs = table({ id: ints(1, 2), x: ints(10, 20) });
const rhs = table({ id: ints(2, 3), y: ints(200, 300) });

describe("validateMerge", () => {
	test("accepts a well-formed request", () => {
		expect(validateMerge(lhs, rhs, request({ on: ["id"] })).error).toBe(ErrorCode.None);
	});

	test("rejects composite indexes before anything else", () => {
		const levels = [
			unwrap(Column.from([1, 2], DType.int32)),
			unwrap(Column.from([3, 4], DType.int32)),
		];
		const composite = unwrap(lhs.withIndex(unwrap(TableIndex.from(levels))));
		const result = validateMerge(composite, rhs, request({ how: "cross" }));
		expect(result.error).toBe(ErrorCode.UnsupportedKeyStructure);
	});

	test("rejects join kinds other than left, inner and outer", () => {
		for (const how of ["right", "cross", ""]) {
			expect(validateMerge(lhs, rhs, request({ how, on: ["id"] })).error).toBe(
				ErrorCode.UnsupportedJoinKind,
			);
		}
		for (const how of ["left", "inner", "outer"]) {
			expect(validateMerge(lhs, rhs, request({ how, on: ["id"] })).error).toBe(ErrorCode.None);
		}
	});

	test("rejects on combined with leftOn or rightOn", () => {
		const result = validateMerge(lhs, rhs, request({ on: ["id"], leftOn: ["id"] }));
		expect(result.error).toBe(ErrorCode.AmbiguousKeySpec);
	});

	test("rejects unequal key counts", () => {
		expect(
			validateMerge(lhs, rhs, request({ leftOn: ["id", "x"], rightOn: ["id"] })).error,
		).toBe(ErrorCode.KeyCountMismatch);
		expect(validateMerge(lhs, rhs, request({ leftIndex: true })).error).toBe(
			ErrorCode.KeyCountMismatch,
		);
		expect(validateMerge(lhs, rhs, request({ on: ["id"], rightIndex: true })).error).toBe(
			ErrorCode.KeyCountMismatch,
		);
	});

	test("rejects index joins with more than one key per side", () => {
		const result = validateMerge(
			lhs,
			rhs,
			request({ leftIndex: true, leftOn: ["x"], rightOn: ["id", "y"] }),
		);
		expect(result.error).toBe(ErrorCode.UnsupportedKeyStructure);
	});

	test("needs keys or shared names", () => {
		const other = table({ z: ints(1) });
		expect(validateMerge(lhs, other, request()).error).toBe(ErrorCode.NoJoinKeys);
	});

	test("self-join on a key with shared non-key columns and no suffixes is ambiguous", () => {
		const result = validateMerge(lhs, lhs, request({ on: ["id"] }));
		expect(result.error).toBe(ErrorCode.AmbiguousOverlap);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("'x'");
		}
	});

	test("a shared name used at different key positions is not congruent", () => {
		const a = table({ p: ints(1), q: ints(2) });
		const b = table({ q: ints(1), p: ints(2) });
		const result = validateMerge(a, b, request({ leftOn: ["p", "q"], rightOn: ["q", "p"] }));
		expect(result.error).toBe(ErrorCode.AmbiguousOverlap);
	});

	test("one non-empty suffix resolves an overlap", () => {
		const result = validateMerge(lhs, lhs, request({ on: ["id"], suffixes: ["", "_r"] }));
		expect(result.error).toBe(ErrorCode.None);
	});

	test("reports missing keys", () => {
		const suffixed = { suffixes: ["_l", "_r"] as const };
		expect(validateMerge(lhs, rhs, request({ on: ["x"], ...suffixed })).error).toBe(
			ErrorCode.MissingKey,
		);
		const result = validateMerge(lhs, rhs, request({ leftOn: ["nope"], rightOn: ["id"], ...suffixed }));
		expect(result.error).toBe(ErrorCode.MissingKey);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("'nope' not in left table");
		}
		expect(
			validateMerge(lhs, rhs, request({ leftOn: ["id"], rightOn: ["x"], ...suffixed })).error,
		).toBe(ErrorCode.MissingKey);
	});
});

describe("effectiveKeys", () => {
	test("on applies to both sides", () => {
		expect(effectiveKeys(lhs, rhs, request({ on: ["id"] }))).toEqual({
			leftOn: ["id"],
			rightOn: ["id"],
		});
	});

	test("no keys means every shared name", () => {
		expect(effectiveKeys(lhs, rhs, request())).toEqual({ leftOn: ["id"], rightOn: ["id"] });
	});

	test("index joins do not infer keys", () => {
		expect(effectiveKeys(lhs, rhs, request({ leftIndex: true, rightIndex: true }))).toEqual({
			leftOn: [],
			rightOn: [],
		});
	});
});
