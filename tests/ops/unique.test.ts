import { describe, expect, test } from "vitest";
import { Table } from "../../src/core/table.ts";
import { dropDuplicates } from "../../src/ops/unique.ts";
import { ErrorCode, unwrap } from "../../src/types/error.ts";
import { ints, strings, table } from "../helpers/tables.ts";

describe("dropDuplicates", () => {
	const t = table({ k: ints(1, 1, 2, 1), v: strings("a", "a", "b", "c") });

	test("keeps the first of each whole-row duplicate", () => {
		expect(unwrap(dropDuplicates(t)).toColumns()).toEqual({ k: [1, 2, 1], v: ["a", "b", "c"] });
	});

	test("keeps the last occurrence in original order", () => {
		expect(unwrap(dropDuplicates(t, { subset: ["k"], keep: "last" })).toColumns()).toEqual({
			k: [2, 1],
			v: ["b", "c"],
		});
	});

	test("keep=false drops every duplicated row", () => {
		expect(unwrap(dropDuplicates(t, { subset: ["k"], keep: false })).toColumns()).toEqual({
			k: [2],
			v: ["b"],
		});
		expect(unwrap(dropDuplicates(t, { keep: false })).toColumns()).toEqual({
			k: [2, 1],
			v: ["b", "c"],
		});
	});

	test("treats nulls as equal", () => {
		const nulls = table({ k: ints(null, null, 1) });
		expect(unwrap(dropDuplicates(nulls)).toColumns()).toEqual({ k: [null, 1] });
	});

	test("keeps every row when there is nothing to compare", () => {
		expect(unwrap(dropDuplicates(t, { subset: [] })).toColumns()).toEqual(t.toColumns());
		expect(unwrap(dropDuplicates(Table.empty())).rowCount).toBe(0);
	});

	test("nullsEqual=false keeps rows with nulls apart", () => {
		const nulls = table({ k: ints(null, null, 1, 1) });
		expect(unwrap(dropDuplicates(nulls, { nullsEqual: false })).toColumns()).toEqual({
			k: [null, null, 1],
		});
		expect(unwrap(dropDuplicates(nulls, { nullsEqual: false, keep: false })).toColumns()).toEqual({
			k: [null, null],
		});
	});

	test("strings holding the field separator do not merge rows", () => {
		const tricky = table({ a: strings("x\u001fsy", "x"), b: strings("z", "y\u001fsz") });
		expect(unwrap(dropDuplicates(tricky)).rowCount).toBe(2);
	});

	test("rejects unknown subset columns", () => {
		expect(dropDuplicates(t, { subset: ["nope"] }).error).toBe(ErrorCode.UnknownColumn);
	});
});
