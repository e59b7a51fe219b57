/**
 * Public exports for the merge module.
 */

export { type AssemblyPlan, assembleResult } from "./assemble.ts";
export {
	INDEX_KEYS,
	type JoinEngine,
	type JoinKeys,
	type JoinRequest,
	columnKeys,
} from "./engine.ts";
export { HashJoinEngine } from "./hash-join-engine.ts";
export { merge } from "./merge.ts";
export { resolveSuffixes } from "./suffix.ts";
export type {
	CodeSubstitution,
	JoinHow,
	MergeHow,
	MergeOptions,
	MergeWarning,
	PreparedInputs,
	Side,
} from "./types.ts";
export {
	type UnifiedInputs,
	type Unification,
	type Upcast,
	promoteNumeric,
	unify,
	unifyIndexKeys,
	unifyKeys,
} from "./unify.ts";
export {
	type MergeRequest,
	effectiveKeys,
	isCongruentKey,
	sharedColumnNames,
	validateMerge,
} from "./validate.ts";
