/**
 * Key dtype unification.
 *
 * Before the engine runs, every key pair must share one dtype. `unify`
 * decides that dtype for a single pair; `unifyKeys` and `unifyIndexKeys`
 * apply the decisions to both tables.
 */

import type { Column } from "../core/column.ts";
import { type Table, TableIndex } from "../core/table.ts";
import { canCastSafely, castColumn } from "../ops/cast.ts";
import { fillNullsNeutral } from "../ops/fill-null.ts";
import {
	type DType,
	DTypeKind,
	INTEGER_WIDTHS,
	type NumericKind,
	TIME_UNIT_TICKS,
	type ValueDType,
	dtypeEquals,
	formatDType,
	isCategoricalDType,
	isIntegerKind,
	isNumericDType,
	isSignedKind,
	isTemporalDType,
} from "../types/dtypes.ts";
import { ErrorCode, err, forward, ok, type Result } from "../types/error.ts";
import { createLogger } from "../utils/logger.ts";
import type { CodeSubstitution, JoinHow, MergeHow, MergeWarning, Side } from "./types.ts";

const log = createLogger("unify");

/** A cast that had to widen past the dtype the join kind asked for */
export interface Upcast {
	/** Side whose column failed the safe-cast check */
	readonly side: Side;
	readonly from: DType;
	readonly requested: DType;
}

/** Decision for one key pair */
export type Unification =
	| { readonly kind: "cast"; readonly dtype: DType; readonly upcast?: Upcast }
	| { readonly kind: "codes"; readonly dtype: ValueDType; readonly side: Side }
	| { readonly kind: "none" };

/** Both tables after key unification */
export interface UnifiedInputs {
	readonly left: Table;
	readonly right: Table;
	readonly substitutions: readonly CodeSubstitution[];
	readonly warnings: readonly MergeWarning[];
}

const NONE: Unification = { kind: "none" };

/**
 * Compute the dtype both sides of a key pair are cast to.
 *
 * Columns are passed as thunks: only the `left`/`right` rules look at
 * values. Rules, first match wins:
 * 1. equal dtypes: that dtype
 * 2. both categorical: IncompatibleCategories
 * 3. one categorical: CategoricalDropped if `how` drops its side, else
 *    join on its codes with the category values' dtype as target
 * 4. `left`: the left dtype when the null-filled right column casts to it
 *    exactly, else the `inner` result marked as an upcast
 * 5. `right`: mirror of `left`
 * 6. `inner`/`outer`, both numeric: numeric promotion
 * 7. `inner`/`outer`, both temporal of one kind: the finer unit
 * 8. otherwise no unification; the engine rejects the pair
 */
export function unify(
	dtypeL: DType,
	dtypeR: DType,
	how: JoinHow,
	columnL: () => Column,
	columnR: () => Column,
): Result<Unification> {
	if (dtypeEquals(dtypeL, dtypeR)) {
		return ok({ kind: "cast", dtype: dtypeL });
	}

	if (isCategoricalDType(dtypeL) && isCategoricalDType(dtypeR)) {
		return err(ErrorCode.IncompatibleCategories);
	}
	if (isCategoricalDType(dtypeL)) {
		if (how === "right") {
			return err(ErrorCode.CategoricalDropped, "categorical left key in a right join");
		}
		return ok({ kind: "codes", dtype: valueDType(dtypeL), side: "left" });
	}
	if (isCategoricalDType(dtypeR)) {
		if (how === "left") {
			return err(ErrorCode.CategoricalDropped, "categorical right key in a left join");
		}
		return ok({ kind: "codes", dtype: valueDType(dtypeR), side: "right" });
	}
	if (how === "left" || how === "right") {
		const [side, check, requested, from] =
			how === "left"
				? (["right", columnR, dtypeL, dtypeR] as const)
				: (["left", columnL, dtypeR, dtypeL] as const);
		if (castsSafely(check(), requested)) {
			return ok({ kind: "cast", dtype: requested });
		}
		const fallback = unify(dtypeL, dtypeR, "inner", columnL, columnR);
		if (fallback.error !== ErrorCode.None || fallback.value.kind !== "cast") {
			return fallback;
		}
		return ok({
			kind: "cast",
			dtype: fallback.value.dtype,
			upcast: { side, from, requested },
		});
	}

	if (isNumericDType(dtypeL) && isNumericDType(dtypeR)) {
		return ok({ kind: "cast", dtype: { kind: promoteNumeric(dtypeL.kind, dtypeR.kind) } });
	}

	if (isTemporalDType(dtypeL) && isTemporalDType(dtypeR) && dtypeL.kind === dtypeR.kind) {
		const finer = TIME_UNIT_TICKS[dtypeL.unit] >= TIME_UNIT_TICKS[dtypeR.unit] ? dtypeL : dtypeR;
		return ok({ kind: "cast", dtype: finer });
	}

	return ok(NONE);
}

/**
 * Unify every key-column pair and apply the result to both tables.
 *
 * Pairs are visited in order of their left name. A categorical key joined
 * against a plain one gets a `<name>_codes` column on its own side (with a
 * numeric suffix when either table already uses that name) and is decoded
 * to its values for the join; the assembler restores it.
 */
export function unifyKeys(
	lhs: Table,
	rhs: Table,
	leftOn: readonly string[],
	rightOn: readonly string[],
	how: MergeHow,
): Result<UnifiedInputs> {
	const pairs = leftOn
		.map((name, i) => [name, rightOn[i]] as const)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

	let left = lhs;
	let right = rhs;
	const substitutions: CodeSubstitution[] = [];
	const warnings: MergeWarning[] = [];

	for (const [lname, rname] of pairs) {
		if (rname === undefined) {
			return err(ErrorCode.KeyCountMismatch);
		}
		const lcol = left.column(lname);
		if (lcol.error !== ErrorCode.None) return err(ErrorCode.MissingKey, lname);
		const rcol = right.column(rname);
		if (rcol.error !== ErrorCode.None) return err(ErrorCode.MissingKey, rname);

		const dtypeL = lcol.value.dtype;
		const dtypeR = rcol.value.dtype;
		if (dtypeEquals(dtypeL, dtypeR)) continue;

		const decision = unify(
			dtypeL,
			dtypeR,
			how,
			() => lcol.value,
			() => rcol.value,
		);
		if (decision.error !== ErrorCode.None) {
			return err(decision.error, `key '${lname}'/'${rname}'${decision.detail ? `: ${decision.detail}` : ""}`);
		}
		const unification = decision.value;
		if (unification.kind === "none") {
			log("no common dtype for %s/%s (%s, %s)", lname, rname, formatDType(dtypeL), formatDType(dtypeR));
			continue;
		}

		if (unification.kind === "codes") {
			const { side } = unification;
			const added =
				side === "left"
					? addCodesColumn(left, right, lname, lcol.value, side)
					: addCodesColumn(right, left, rname, rcol.value, side);
			if (added.error !== ErrorCode.None) return forward(added);
			if (side === "left") {
				left = added.value.table;
			} else {
				right = added.value.table;
			}
			substitutions.push(added.value.substitution);
		} else if (unification.upcast) {
			const { side, from, requested } = unification.upcast;
			warnings.push(
				precisionWarning(side === "left" ? lname : rname, side, from, requested, unification.dtype),
			);
		}

		const castL = replaceColumn(left, lname, lcol.value, unification.dtype);
		if (castL.error !== ErrorCode.None) return forward(castL);
		const castR = replaceColumn(right, rname, rcol.value, unification.dtype);
		if (castR.error !== ErrorCode.None) return forward(castR);
		left = castL.value;
		right = castR.value;
		log("key %s/%s -> %s", lname, rname, formatDType(unification.dtype));
	}

	return ok({ left, right, substitutions, warnings });
}

/**
 * Unify the key pair of an index join. `null` names the side's index;
 * a string names a key column (mixed index/column joins).
 *
 * Categorical keys are decoded to their values; no codes column is
 * added in this mode.
 */
export function unifyIndexKeys(
	lhs: Table,
	rhs: Table,
	leftKey: string | null,
	rightKey: string | null,
	how: MergeHow,
): Result<UnifiedInputs> {
	const lcol = keyColumn(lhs, leftKey);
	if (lcol.error !== ErrorCode.None) return forward(lcol);
	const rcol = keyColumn(rhs, rightKey);
	if (rcol.error !== ErrorCode.None) return forward(rcol);

	const none: UnifiedInputs = { left: lhs, right: rhs, substitutions: [], warnings: [] };
	if (dtypeEquals(lcol.value.dtype, rcol.value.dtype)) {
		return ok(none);
	}

	const decision = unify(
		lcol.value.dtype,
		rcol.value.dtype,
		how,
		() => lcol.value,
		() => rcol.value,
	);
	if (decision.error !== ErrorCode.None) return forward(decision);
	const unification = decision.value;
	if (unification.kind === "none") {
		return ok(none);
	}

	const warnings: MergeWarning[] = [];
	if (unification.kind === "cast" && unification.upcast) {
		const { side, from, requested } = unification.upcast;
		const table = side === "left" ? lhs : rhs;
		const key = side === "left" ? leftKey : rightKey;
		warnings.push(
			precisionWarning(key ?? table.index?.names[0] ?? "index", side, from, requested, unification.dtype),
		);
	}

	const left = replaceKey(lhs, leftKey, lcol.value, unification.dtype);
	if (left.error !== ErrorCode.None) return forward(left);
	const right = replaceKey(rhs, rightKey, rcol.value, unification.dtype);
	if (right.error !== ErrorCode.None) return forward(right);
	log("index key -> %s", formatDType(unification.dtype));

	return ok({ left: left.value, right: right.value, substitutions: [], warnings });
}

/* PROMOTION
/*-----------------------------------------------------
/* Common supertypes of numeric kinds
/* ==================================================== */

const SIGNED_BY_WIDTH: Readonly<Record<number, NumericKind>> = {
	16: DTypeKind.Int16,
	32: DTypeKind.Int32,
	64: DTypeKind.Int64,
};

function intWidth(kind: NumericKind): number {
	return isIntegerKind(kind) ? INTEGER_WIDTHS[kind] : 0;
}

/**
 * Smallest numeric kind holding every value of both kinds.
 *
 * Signed with unsigned needs a signed kind wider than the unsigned one;
 * UInt64 has none and goes to Float64. Integers up to 16 bits fit in
 * Float32, wider ones need Float64.
 */
export function promoteNumeric(a: NumericKind, b: NumericKind): NumericKind {
	if (a === b) return a;

	const aInt = isIntegerKind(a);
	const bInt = isIntegerKind(b);

	if (!aInt && !bInt) {
		return a === DTypeKind.Float64 || b === DTypeKind.Float64 ? DTypeKind.Float64 : DTypeKind.Float32;
	}

	if (aInt && bInt) {
		if (isSignedKind(a) === isSignedKind(b)) {
			return intWidth(a) >= intWidth(b) ? a : b;
		}
		const signed = isSignedKind(a) ? a : b;
		const unsigned = isSignedKind(a) ? b : a;
		if (intWidth(signed) > intWidth(unsigned)) return signed;
		return SIGNED_BY_WIDTH[intWidth(unsigned) * 2] ?? DTypeKind.Float64;
	}

	const int = aInt ? a : b;
	const float = aInt ? b : a;
	if (float === DTypeKind.Float32 && intWidth(int) <= 16) {
		return DTypeKind.Float32;
	}
	return DTypeKind.Float64;
}

/* HELPERS
/* ==================================================== */

function valueDType(dtype: DType): ValueDType {
	return isCategoricalDType(dtype) ? valueDType(dtype.categories.dtype) : dtype;
}

/** Null-filled safe-cast check of the `left`/`right` rules */
function castsSafely(column: Column, target: DType): boolean {
	const filled = fillNullsNeutral(column);
	return filled.error === ErrorCode.None && canCastSafely(filled.value, target);
}

function precisionWarning(
	column: string,
	side: Side,
	from: DType,
	requested: DType,
	upcast: DType,
): MergeWarning {
	return {
		code: "precision-loss",
		column,
		side,
		from,
		requested,
		upcast,
		message: `cannot cast ${side} key '${column}' from ${formatDType(from)} to ${formatDType(requested)} safely, upcasting to ${formatDType(upcast)}`,
	};
}

/** `<name>_codes`, numbered until neither table has it */
function freeCodesName(name: string, table: Table, other: Table): string {
	const base = `${name}_codes`;
	let candidate = base;
	for (let n = 1; table.has(candidate) || other.has(candidate); n++) {
		candidate = `${base}_${n}`;
	}
	return candidate;
}

function addCodesColumn(
	table: Table,
	other: Table,
	name: string,
	source: Column,
	side: Side,
): Result<{ table: Table; substitution: CodeSubstitution }> {
	const dtype = source.dtype;
	const codes = source.codes();
	if (!isCategoricalDType(dtype) || !codes) {
		return err(ErrorCode.TypeMismatch, `'${name}' is not categorical`);
	}
	const codesColumn = freeCodesName(name, table, other);
	const added = table.withColumn(codesColumn, codes);
	if (added.error !== ErrorCode.None) return forward(added);
	return ok({
		table: added.value,
		substitution: { column: name, side, codesColumn, dtype },
	});
}

function replaceColumn(table: Table, name: string, column: Column, dtype: DType): Result<Table> {
	const cast = castColumn(column, dtype);
	if (cast.error !== ErrorCode.None) {
		return err(cast.error, `key '${name}': ${cast.detail ?? ""}`);
	}
	return cast.value === column ? ok(table) : table.withColumn(name, cast.value);
}

function keyColumn(table: Table, key: string | null): Result<Column> {
	if (key !== null) {
		const column = table.column(key);
		return column.error === ErrorCode.None ? column : err(ErrorCode.MissingKey, key);
	}
	const index = table.index ?? TableIndex.range(table.rowCount);
	return index.key ? ok(index.key) : err(ErrorCode.UnsupportedKeyStructure);
}

function replaceKey(table: Table, key: string | null, column: Column, dtype: DType): Result<Table> {
	if (key !== null) {
		return replaceColumn(table, key, column, dtype);
	}
	const cast = castColumn(column, dtype);
	if (cast.error !== ErrorCode.None) {
		return err(cast.error, `index: ${cast.detail ?? ""}`);
	}
	if (cast.value === column) return ok(table);
	const index = table.index ?? TableIndex.range(table.rowCount);
	return table.withIndex(index.withKey(cast.value));
}
