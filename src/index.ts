/**
 * tablemerge - relational merges for columnar tables.
 *
 * Validates a join request, disambiguates overlapping names, unifies key
 * dtypes (categoricals included), runs a pluggable join engine and
 * reassembles the result in a predictable column order.
 *
 * @example
 * ```ts
 * import { DType, Table, merge, unwrap } from "tablemerge";
 *
 * const left = unwrap(Table.from({
 *   id: { data: [1, 2, 3], dtype: DType.int32 },
 *   x: { data: [10, 20, 30], dtype: DType.int32 },
 * }));
 * const right = unwrap(Table.from({
 *   id: { data: [2, 3, 4], dtype: DType.int32 },
 *   x: { data: [200, 300, 400], dtype: DType.int32 },
 * }));
 *
 * const result = unwrap(merge(left, right, { on: "id", suffixes: ["_l", "_r"] }));
 * result.columnNames; // ["id", "x_l", "x_r"]
 * ```
 */

// Type system and results
export * from "./types/index.ts";

// Data structures
export {
	type CategoricalOptions,
	Column,
	ColumnBuilder,
	compareScalars,
	inferDType,
	type Scalar,
} from "./core/column.ts";
export {
	type ColumnSpec,
	type Row,
	Table,
	TableIndex,
	type TableSpec,
} from "./core/table.ts";

// Merge
export * from "./merge/index.ts";

// Column and row operations
export * from "./ops/index.ts";

// Configuration
export * from "./core/config/index.ts";

// Errors
export * from "./errors/index.ts";

// Logging
export {
	createLogger,
	disableLogging,
	enableLogging,
	isLoggingEnabled,
} from "./utils/logger.ts";
