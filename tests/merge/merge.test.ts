import { afterEach, describe, expect, test, vi } from "vitest";
import { Column } from "../../src/core/column.ts";
import { configure, resetConfig } from "../../src/core/config/config.ts";
import { Table } from "../../src/core/table.ts";
import { InternalInvariantError } from "../../src/errors/internal-invariant-error.ts";
import type { JoinEngine } from "../../src/merge/engine.ts";
import { merge } from "../../src/merge/merge.ts";
import type { MergeWarning } from "../../src/merge/types.ts";
import { DType, DTypeKind, isCategoricalDType } from "../../src/types/dtypes.ts";
import { ErrorCode, ok, unwrap } from "../../src/types/error.ts";
import { ints, strings, table } from "../helpers/tables.ts";

afterEach(() => {
	resetConfig();
});

describe("merge", () => {
	test("suffixes overlapping columns", () => {
		const lhs = table({ id: ints(1, 2, 3), x: ints(10, 20, 30) });
		const rhs = table({ id: ints(2, 3, 4), x: ints(200, 300, 400) });
		const result = unwrap(merge(lhs, rhs, { on: "id", suffixes: ["_l", "_r"] }));
		expect(result.columnNames).toEqual(["id", "x_l", "x_r"]);
		expect(result.toRecords()).toEqual([
			{ id: 2, x_l: 20, x_r: 200 },
			{ id: 3, x_l: 30, x_r: 300 },
		]);
	});

	test("joins on shared names when no keys are given", () => {
		const lhs = table({ id: ints(1, 2), a: strings("p", "q") });
		const rhs = table({ id: ints(2, 1), b: strings("r", "s") });
		const result = unwrap(merge(lhs, rhs));
		expect(result.toColumns()).toEqual({ id: [1, 2], a: ["p", "q"], b: ["s", "r"] });
	});

	test("rejects a self-join without suffixes", () => {
		const t = table({ id: ints(1), v: ints(2) });
		const result = merge(t, t, { on: "id" });
		expect(result.error).toBe(ErrorCode.AmbiguousOverlap);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("'v'");
		}
	});

	test("rejects right joins", () => {
		const t = table({ id: ints(1) });
		const result = merge(t, t, { how: "right" });
		expect(result.error).toBe(ErrorCode.UnsupportedJoinKind);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("'right'");
		}
	});

	test("keeps a categorical key categorical in an inner join", () => {
		const lhs = table({ k: unwrap(Column.categorical([10, 20, 30])), v: ints(1, 2, 3) });
		const rhs = table({ k: { data: [20n, 30n, 40n], dtype: DType.int64 }, w: ints(5, 6, 7) });
		const result = unwrap(merge(lhs, rhs, { on: "k" }));
		expect(result.columnNames).toEqual(["k", "v", "w"]);
		const k = unwrap(result.column("k"));
		expect(k.toArray()).toEqual([20, 30]);
		expect(isCategoricalDType(k.dtype)).toBe(true);
		expect(k.categories()?.dtype).toEqual(DType.int32);
		expect(result.toColumns()).toEqual({ k: [20, 30], v: [2, 3], w: [5, 6] });
	});

	test("re-encodes outer-join keys that arrive without a code", () => {
		const lhs = table({ k: unwrap(Column.categorical(["a", "b"], { categories: ["a", "b", "z"] })) });
		const rhs = table({ k: strings("b", "z", "c"), w: ints(1, 2, 3) });
		const result = unwrap(merge(lhs, rhs, { on: "k", how: "outer" }));
		expect(result.columnNames).toEqual(["k", "w"]);
		// "z" is a known category, "c" is not
		expect(result.toColumns()).toEqual({ k: ["a", "b", "z", null], w: [null, 1, 2, 3] });
	});

	test("restores a categorical left key in a left join", () => {
		const lhs = table({ k: unwrap(Column.categorical(["a", "b", "c"])), v: ints(1, 2, 3) });
		const rhs = table({ k: strings("c", "a"), w: ints(30, 10) });
		const result = unwrap(merge(lhs, rhs, { on: "k", how: "left" }));
		expect(result.toColumns()).toEqual({ k: ["a", "b", "c"], v: [1, 2, 3], w: [10, null, 30] });
		expect(isCategoricalDType(unwrap(result.column("k")).dtype)).toBe(true);
	});

	test("restores a categorical right key in an outer join", () => {
		const lhs = table({ k: strings("a", "x"), v: ints(1, 2) });
		const rhs = table({ k: unwrap(Column.categorical(["b", "a"])), w: ints(5, 6) });
		const result = unwrap(merge(lhs, rhs, { on: "k", how: "outer" }));
		// "x" only exists on the left and is not a category
		expect(result.toColumns()).toEqual({ k: ["a", null, "b"], v: [1, 2, null], w: [6, null, 5] });
		expect(unwrap(result.column("k")).categories()?.toArray()).toEqual(["a", "b"]);
	});

	test("never returns the codes column in sort mode", () => {
		const lhs = table({ k: unwrap(Column.categorical(["a", "b"])), v: ints(1, 2) });
		const rhs = table({ k: strings("b", "a"), w: ints(3, 4) });
		const result = unwrap(merge(lhs, rhs, { on: "k", sort: true }));
		expect(result.columnNames).toEqual(["v", "k", "w"]);
		expect(unwrap(result.column("k")).toArray()).toEqual(["a", "b"]);
	});

	test("picks a codes column name free in both tables", () => {
		const lhs = table({ k: unwrap(Column.categorical(["a", "b"])) });
		const rhs = table({ k: strings("b", "c"), k_codes: ints(7, 8) });
		const result = unwrap(merge(lhs, rhs, { on: "k" }));
		expect(result.toColumns()).toEqual({ k: ["b"], k_codes: [7] });
		expect(isCategoricalDType(unwrap(result.column("k")).dtype)).toBe(true);
	});

	test("suffixes shared names that shadow object properties", () => {
		const one = unwrap(Column.from([1], DType.int32));
		const t = unwrap(Table.fromColumns([["id", one], ["__proto__", one]]));
		const result = unwrap(merge(t, t, { on: "id", suffixes: ["_l", "_r"] }));
		expect(result.columnNames).toEqual(["id", "__proto___l", "__proto___r"]);
	});

	test("composite keys holding the field separator do not match", () => {
		const lhs = table({ a: strings("x\u001fsy"), b: strings("z"), v: ints(1) });
		const rhs = table({ a: strings("x"), b: strings("y\u001fsz"), w: ints(2) });
		expect(unwrap(merge(lhs, rhs, { on: ["a", "b"] })).rowCount).toBe(0);
	});

	test("rejects a categorical key on the side a left join drops", () => {
		const lhs = table({ k: strings("a") });
		const rhs = table({ k: unwrap(Column.categorical(["a"])) });
		const result = merge(lhs, rhs, { on: "k", how: "left" });
		expect(result.error).toBe(ErrorCode.CategoricalDropped);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("key 'k'/'k': categorical right key in a left join");
		}
	});

	test("reports an upcast of a left-join key", () => {
		const onWarning = vi.fn<(warning: MergeWarning) => void>();
		const lhs = table({ k: ints(1, 2) });
		const rhs = table({ k: { data: [1.5, 2], dtype: DType.float64 } });
		const result = unwrap(merge(lhs, rhs, { on: "k", how: "left", onWarning }));

		expect(result.toColumns()).toEqual({ k: [1, 2] });
		expect(unwrap(result.column("k")).dtype).toEqual(DType.float64);
		expect(onWarning).toHaveBeenCalledTimes(1);
		const [warning] = onWarning.mock.calls[0] ?? [];
		expect(warning?.side).toBe("right");
		expect(warning?.upcast.kind).toBe(DTypeKind.Float64);
		expect(warning?.message).toBe(
			"cannot cast right key 'k' from Float64 to Int32 safely, upcasting to Float64",
		);
	});

	test("uses configured default suffixes", () => {
		configure({ defaultSuffixes: ["_a", "_b"] });
		const lhs = table({ id: ints(1), x: ints(1) });
		const rhs = table({ id: ints(1), x: ints(2) });
		const result = unwrap(merge(lhs, rhs, { on: "id" }));
		expect(result.toColumns()).toEqual({ id: [1], x_a: [1], x_b: [2] });
	});

	test("orders columns by partition when sorting", () => {
		const lhs = table({ b: ints(1), a: ints(2), id: ints(3) });
		const rhs = table({ id: ints(3), z: ints(4), y: ints(5) });
		const result = unwrap(merge(lhs, rhs, { on: "id", sort: true }));
		expect(result.columnNames).toEqual(["a", "b", "id", "y", "z"]);
	});

	test("throws when an engine returns an extra column", () => {
		const engine: JoinEngine = {
			join: () => ok(table({ id: ints(1), ghost: ints(0) })),
		};
		const t = table({ id: ints(1) });
		expect(() => merge(t, t, { on: "id", engine })).toThrow(InternalInvariantError);
	});

	test("leaves its inputs untouched", () => {
		const lhs = table({ k: unwrap(Column.categorical(["a", "b"])), x: ints(1, 2) });
		const rhs = table({ k: strings("a"), x: ints(3) });
		unwrap(merge(lhs, rhs, { on: "k", suffixes: ["_l", "_r"] }));
		expect(lhs.columnNames).toEqual(["k", "x"]);
		expect(rhs.columnNames).toEqual(["k", "x"]);
		expect(isCategoricalDType(unwrap(lhs.column("k")).dtype)).toBe(true);
		expect(unwrap(rhs.column("k")).dtype).toEqual(DType.string);
	});

	test("joins the left index against a right column", () => {
		const lhs = table({ a: ints(1, 2, 3, 4) });
		const rhs = table({ id: { data: [2n, 3n], dtype: DType.int64 }, b: ints(20, 30) });
		const result = unwrap(merge(lhs, rhs, { leftIndex: true, rightOn: "id" }));
		expect(result.toColumns()).toEqual({ a: [3, 4], id: [2n, 3n], b: [20, 30] });
		expect(result.index?.key?.toArray()).toEqual([2n, 3n]);
	});

	test("rejects an index join with several keys", () => {
		const t = table({ a: ints(1), b: ints(2) });
		const result = merge(t, t, { leftIndex: true, rightIndex: true, leftOn: "a", rightOn: "b" });
		expect(result.error).toBe(ErrorCode.UnsupportedKeyStructure);
	});
});
