/**
 * Public exports for the types module.
 */

export {
	type BooleanDType,
	type CategoricalDType,
	DType,
	DTypeKind,
	dtypeEquals,
	type FloatKind,
	formatDType,
	getDTypeName,
	INTEGER_WIDTHS,
	type IntegerKind,
	isBigIntDType,
	isCategoricalDType,
	isFloatDType,
	isFloatKind,
	isIntegerDType,
	isIntegerKind,
	isNumericDType,
	isSignedKind,
	isTemporalDType,
	type NumericDType,
	type NumericKind,
	type SignedIntKind,
	type StringDType,
	TIME_UNIT_TICKS,
	type TemporalDType,
	type TemporalKind,
	type TimeUnit,
	type UnsignedIntKind,
	type ValueDType,
} from "./dtypes.ts";

// Error handling
export {
	andThen,
	ERROR_MESSAGES,
	ErrorCode,
	err,
	type Failure,
	forward,
	getErrorMessage,
	isErr,
	isOk,
	mapResult,
	ok,
	type Result,
	unwrap,
	unwrapOr,
} from "./error.ts";
