/**
 * Result-based error handling.
 *
 * Instead of throwing, operations return a discriminated union carrying
 * either a value or an ErrorCode. On the happy path the code is None.
 * A failed result may carry a short `detail` naming the column or key
 * involved.
 */

import { TableError } from "../errors/base.ts";

export enum ErrorCode {
	None = 0,

	// Buffer errors (1-99)
	BufferFull = 1,

	// Table errors (100-199)
	UnknownColumn = 101,
	TypeMismatch = 102,
	DuplicateColumn = 103,
	LengthMismatch = 106,
	InvalidCategories = 107,

	// Operand errors (500-509)
	InvalidOperand = 503,

	// Cast errors (510-519)
	CastNotSupported = 510,
	CastOverflow = 511,
	InvalidFillValue = 512,

	// Merge errors (600-699)
	UnsupportedKeyStructure = 600,
	UnsupportedJoinKind = 601,
	AmbiguousKeySpec = 602,
	KeyCountMismatch = 603,
	NoJoinKeys = 604,
	AmbiguousOverlap = 605,
	MissingKey = 606,
	IncompatibleCategories = 607,
	CategoricalDropped = 608,
}

/** Human-readable error messages */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
	[ErrorCode.None]: "No error",
	[ErrorCode.BufferFull]: "Buffer is full",
	[ErrorCode.UnknownColumn]: "Unknown column",
	[ErrorCode.TypeMismatch]: "Type mismatch",
	[ErrorCode.DuplicateColumn]: "Duplicate column name",
	[ErrorCode.LengthMismatch]: "Columns must all have the same length",
	[ErrorCode.InvalidCategories]: "Categories must be unique, non-null values",
	[ErrorCode.InvalidOperand]: "Invalid operand",
	[ErrorCode.CastNotSupported]: "Cast not supported for this type combination",
	[ErrorCode.CastOverflow]: "Value overflow during cast",
	[ErrorCode.InvalidFillValue]: "Invalid fill value for column type",
	[ErrorCode.UnsupportedKeyStructure]: "Multi-level index joins are not supported",
	[ErrorCode.UnsupportedJoinKind]: "Join kind is not supported",
	[ErrorCode.AmbiguousKeySpec]:
		'Can only pass "on" or "leftOn" and "rightOn", not a combination of both',
	[ErrorCode.KeyCountMismatch]:
		"Merge operands must have the same number of join keys",
	[ErrorCode.NoJoinKeys]: "No common columns to perform merge on",
	[ErrorCode.AmbiguousOverlap]:
		"There are overlapping columns but no suffixes are defined",
	[ErrorCode.MissingKey]: "Join key not found",
	[ErrorCode.IncompatibleCategories]:
		"Left and right categories must be the same",
	[ErrorCode.CategoricalDropped]:
		"Cannot implicitly cast a categorical key dropped by the join",
};

/**
 * Result type for operations that can fail.
 * Discriminated union: check error first, then access value.
 *
 * Usage:
 *   const result = table.column("id");
 *   if (result.error !== ErrorCode.None) {
 *     return result;
 *   }
 *   result.value.length;
 */
export type Result<T> =
	| { readonly value: T; readonly error: ErrorCode.None }
	| {
			readonly value: undefined;
			readonly error: Exclude<ErrorCode, ErrorCode.None>;
			readonly detail?: string;
	  };

/** A failed result, for callers that forward failures unchanged */
export type Failure = Extract<Result<unknown>, { value: undefined }>;

/** Create a successful result */
export function ok<T>(value: T): Result<T> {
	return { value, error: ErrorCode.None };
}

/** Create an error result */
export function err<T>(
	error: Exclude<ErrorCode, ErrorCode.None>,
	detail?: string,
): Result<T> {
	return detail === undefined
		? { value: undefined, error }
		: { value: undefined, error, detail };
}

/** Re-type a failed result so it can be returned from another function */
export function forward<T>(failure: Failure): Result<T> {
	return err(failure.error, failure.detail);
}

/** Check if a result is successful */
export function isOk<T>(
	result: Result<T>,
): result is { value: T; error: ErrorCode.None } {
	return result.error === ErrorCode.None;
}

/** Check if a result is an error */
export function isErr<T>(result: Result<T>): result is Extract<Result<T>, { value: undefined }> {
	return result.error !== ErrorCode.None;
}

/** Get human-readable error message */
export function getErrorMessage(code: ErrorCode, detail?: string): string {
	const message = ERROR_MESSAGES[code] ?? `Unknown error (${code})`;
	return detail === undefined ? message : `${message}: ${detail}`;
}

/**
 * Unwrap a result, throwing a TableError if it failed.
 * Use sparingly - only in tests or at application boundaries.
 */
export function unwrap<T>(result: Result<T>): T {
	if (result.error !== ErrorCode.None) {
		throw new TableError(getErrorMessage(result.error, result.detail), {
			code: result.error,
		});
	}
	return result.value;
}

/**
 * Unwrap a result or return a default value.
 */
export function unwrapOr<T>(result: Result<T>, defaultValue: T): T {
	if (result.error !== ErrorCode.None) {
		return defaultValue;
	}
	return result.value;
}

/**
 * Map over a successful result.
 */
export function mapResult<T, U>(
	result: Result<T>,
	fn: (value: T) => U,
): Result<U> {
	if (result.error !== ErrorCode.None) {
		return forward(result);
	}
	return ok(fn(result.value));
}

/**
 * Chain results (flatMap).
 */
export function andThen<T, U>(
	result: Result<T>,
	fn: (value: T) => Result<U>,
): Result<U> {
	if (result.error !== ErrorCode.None) {
		return forward(result);
	}
	return fn(result.value);
}
