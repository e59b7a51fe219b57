/**
 * Disambiguates column names shared by both sides of a merge.
 */

import type { Table } from "../core/table.ts";
import { ErrorCode, type Result, err, ok } from "../types/error.ts";
import type { PreparedInputs } from "./types.ts";
import { isCongruentKey, sharedColumnNames } from "./validate.ts";

function renameKeys(keys: readonly string[], mapping: ReadonlyMap<string, string>): string[] {
	return keys.map((key) => mapping.get(key) ?? key);
}

/**
 * Rename every shared, non-congruent column to `name + lsuffix` on the
 * left and `name + rsuffix` on the right, rewriting key lists to match.
 *
 * Returns new tables; the inputs are left as they are.
 */
export function resolveSuffixes(
	lhs: Table,
	rhs: Table,
	leftOn: readonly string[],
	rightOn: readonly string[],
	suffixes: readonly [string, string],
): Result<PreparedInputs> {
	const [lsuffix, rsuffix] = suffixes;
	const leftMapping = new Map<string, string>();
	const rightMapping = new Map<string, string>();

	for (const name of sharedColumnNames(lhs, rhs)) {
		if (isCongruentKey(name, leftOn, rightOn)) continue;
		leftMapping.set(name, `${name}${lsuffix}`);
		rightMapping.set(name, `${name}${rsuffix}`);
	}

	const left = lhs.rename(leftMapping);
	if (left.error !== ErrorCode.None) {
		return err(left.error, `left rename: ${left.detail ?? ""}`);
	}
	const right = rhs.rename(rightMapping);
	if (right.error !== ErrorCode.None) {
		return err(right.error, `right rename: ${right.detail ?? ""}`);
	}

	return ok({
		left: left.value,
		right: right.value,
		leftOn: renameKeys(leftOn, leftMapping),
		rightOn: renameKeys(rightOn, rightMapping),
	});
}
