import { describe, expect, test } from "vitest";
import { dropNullColumnNames, dropNullSelection, dropNulls } from "../../src/ops/drop-null.ts";
import { ErrorCode, unwrap } from "../../src/types/error.ts";
import { ints, strings, table } from "../helpers/tables.ts";

describe("dropNulls", () => {
	const t = table({ a: ints(1, null, null), b: strings("x", "y", null) });

	test("drops rows with any null by default", () => {
		expect(unwrap(dropNulls(t)).toColumns()).toEqual({ a: [1], b: ["x"] });
	});

	test("drops only fully-null rows with how=all", () => {
		expect(unwrap(dropNulls(t, { how: "all" })).toColumns()).toEqual({
			a: [1, null],
			b: ["x", "y"],
		});
	});

	test("checks only the subset columns", () => {
		expect(unwrap(dropNulls(t, { subset: ["b"] })).toColumns()).toEqual({
			a: [1, null],
			b: ["x", "y"],
		});
	});

	test("thresh overrides how", () => {
		expect(unwrap(dropNulls(t, { how: "all", thresh: 2 })).rowCount).toBe(1);
	});

	test("selection lists passing rows", () => {
		const { selection, count } = unwrap(dropNullSelection(t, { how: "all" }));
		expect(Array.from(selection.subarray(0, count))).toEqual([0, 1]);
	});

	test("rejects unknown subset columns", () => {
		const result = dropNulls(t, { subset: ["nope"] });
		expect(result.error).toBe(ErrorCode.UnknownColumn);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("nope");
		}
	});
});

describe("dropNulls by column", () => {
	const t = table({
		a: ints(1, null, null),
		b: strings("x", "y", null),
		c: ints(1, 2, 3),
		d: ints(null, null, null),
	});

	test("drops columns with any null", () => {
		expect(unwrap(dropNulls(t, { axis: "columns" })).toColumns()).toEqual({ c: [1, 2, 3] });
	});

	test("drops only fully-null columns with how=all", () => {
		expect(unwrap(dropNulls(t, { axis: "columns", how: "all" })).columnNames).toEqual(["a", "b", "c"]);
	});

	test("checks only the listed rows", () => {
		expect(unwrap(dropNulls(t, { axis: "columns", rows: [0, 1] })).columnNames).toEqual(["b", "c"]);
	});

	test("thresh counts non-null values per column", () => {
		expect(unwrap(dropNullColumnNames(t, { axis: "columns", thresh: 2 }))).toEqual(["b", "c"]);
	});

	test("rejects rows outside the table", () => {
		const result = dropNulls(t, { axis: "columns", rows: [5] });
		expect(result.error).toBe(ErrorCode.InvalidOperand);
		if (result.error !== ErrorCode.None) {
			expect(result.detail).toBe("row 5 of 3");
		}
	});
});
