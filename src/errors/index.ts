/**
 * Error module - exports all error types.
 */

export { TableError, type TableErrorOptions } from "./base.ts";
export {
	InternalInvariantError,
	type MergeInvariant,
} from "./internal-invariant-error.ts";
