/**
 * Public exports for the ops module.
 */

// Cast
export { canCastSafely, castColumn } from "./cast.ts";
// Categorical restoration
export { copyCategories, rewrapCodes } from "./categories.ts";
// Null handling
export {
	type DropNullColumnsOptions,
	type DropNullRowsOptions,
	type DropNullsOptions,
	dropNullColumnNames,
	dropNullSelection,
	dropNulls,
} from "./drop-null.ts";
export { fillNulls, fillNullsNeutral, neutralValue } from "./fill-null.ts";
// Deduplication
export {
	type DropDuplicatesOptions,
	dropDuplicates,
	type KeepOccurrence,
	uniqueSelection,
} from "./unique.ts";
