/**
 * Relational merge of two tables.
 *
 * Pipeline: validate → resolve suffixes → unify key dtypes → engine join
 * → assemble. Every step before the engine works on copies; the input
 * tables are never modified.
 */

import type { Table } from "../core/table.ts";
import { getConfig } from "../core/config/config.ts";
import { type CategoricalDType, isCategoricalDType } from "../types/dtypes.ts";
import { ErrorCode, err, forward, type Result } from "../types/error.ts";
import { createLogger } from "../utils/logger.ts";
import { assembleResult } from "./assemble.ts";
import { INDEX_KEYS, columnKeys } from "./engine.ts";
import { resolveSuffixes } from "./suffix.ts";
import type { MergeOptions } from "./types.ts";
import { unifyIndexKeys, unifyKeys } from "./unify.ts";
import { type MergeRequest, effectiveKeys, isMergeHow, validateMerge } from "./validate.ts";

const log = createLogger("merge");

function toList(keys: string | readonly string[] | undefined): readonly string[] {
	if (keys === undefined) return [];
	return typeof keys === "string" ? [keys] : keys;
}

function categoricalColumns(...tables: Table[]): Map<string, CategoricalDType> {
	const found = new Map<string, CategoricalDType>();
	for (const table of tables) {
		for (const [name, column] of table.entries()) {
			if (isCategoricalDType(column.dtype) && !found.has(name)) {
				found.set(name, column.dtype);
			}
		}
	}
	return found;
}

/**
 * Merge two tables on key columns or indexes.
 *
 * With no keys and no index flags, the tables join on every column name
 * they share. Options left out fall back to the configured defaults.
 *
 * @example
 * ```ts
 * const result = merge(orders, customers, {
 *   on: "customerId",
 *   how: "left",
 *   suffixes: ["_order", "_customer"],
 * });
 * if (result.error !== ErrorCode.None) {
 *   console.error(getErrorMessage(result.error, result.detail));
 * }
 * ```
 *
 * @throws InternalInvariantError when the engine returns a column the
 *   result cannot place
 */
export function merge(lhs: Table, rhs: Table, options: MergeOptions = {}): Result<Table> {
	const config = getConfig();
	const request: MergeRequest = {
		on: options.on === undefined ? null : toList(options.on),
		leftOn: toList(options.leftOn),
		rightOn: toList(options.rightOn),
		leftIndex: options.leftIndex ?? false,
		rightIndex: options.rightIndex ?? false,
		how: options.how ?? config.defaultHow,
		suffixes: options.suffixes ?? config.defaultSuffixes,
	};

	const valid = validateMerge(lhs, rhs, request);
	if (valid.error !== ErrorCode.None) return forward(valid);
	const how = request.how;
	if (!isMergeHow(how)) {
		return err(ErrorCode.UnsupportedJoinKind, `'${how}'`);
	}

	const keys = effectiveKeys(lhs, rhs, request);
	log("%s merge on %o / %o", how, keys.leftOn, keys.rightOn);

	const renamed = resolveSuffixes(lhs, rhs, keys.leftOn, keys.rightOn, request.suffixes);
	if (renamed.error !== ErrorCode.None) return forward(renamed);
	const { leftOn, rightOn } = renamed.value;

	const useIndex = request.leftIndex || request.rightIndex;
	const unified = useIndex
		? unifyIndexKeys(
				renamed.value.left,
				renamed.value.right,
				request.leftIndex ? null : (leftOn[0] ?? null),
				request.rightIndex ? null : (rightOn[0] ?? null),
				how,
			)
		: unifyKeys(renamed.value.left, renamed.value.right, leftOn, rightOn, how);
	if (unified.error !== ErrorCode.None) return forward(unified);
	const { left, right, substitutions, warnings } = unified.value;

	const onWarning = options.onWarning ?? config.onWarning;
	for (const warning of warnings) {
		onWarning(warning);
	}

	const engine = options.engine ?? config.engine;
	const joined = engine.join({
		left,
		right,
		leftKeys: request.leftIndex ? INDEX_KEYS : columnKeys(leftOn),
		rightKeys: request.rightIndex ? INDEX_KEYS : columnKeys(rightOn),
		how,
		materializeLeftIndex: request.leftIndex,
		materializeRightIndex: request.rightIndex,
	});
	if (joined.error !== ErrorCode.None) {
		log("engine failed: %d %s", joined.error, joined.detail ?? "");
		return forward(joined);
	}

	return assembleResult(joined.value, {
		lhsNames: renamed.value.left.columnNames,
		rhsNames: renamed.value.right.columnNames,
		leftOn,
		rightOn,
		substitutions,
		categoricals: categoricalColumns(left, right),
		sort: options.sort ?? config.defaultSort,
	});
}
