/**
 * Table - an ordered mapping of unique names to equal-length columns,
 * plus an optional index.
 *
 * Tables are immutable: every transform returns a new Table and leaves
 * the receiver untouched.
 */

import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { DType } from "../types/dtypes.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import { Column, type Scalar } from "./column.ts";

/** Column input accepted by Table.from */
export type ColumnSpec =
	| Column
	| { readonly data: readonly (Scalar | null | undefined)[]; readonly dtype: DType };

export type TableSpec = Record<string, ColumnSpec>;

/** One row, keyed by column name */
export type Row = Record<string, Scalar | null>;

/**
 * Row labels of a table. More than one level makes a composite
 * (multi-level) index.
 */
export class TableIndex {
	readonly levels: readonly Column[];
	readonly names: readonly (string | null)[];

	private constructor(levels: readonly Column[], names: readonly (string | null)[]) {
		this.levels = levels;
		this.names = names;
	}

	static from(
		levels: Column | readonly Column[],
		names?: readonly (string | null)[],
	): Result<TableIndex> {
		const list = levels instanceof Column ? [levels] : [...levels];
		if (list.length === 0) {
			return err(ErrorCode.InvalidOperand, "an index needs at least one level");
		}
		const length = list[0]?.length ?? 0;
		if (list.some((level) => level.length !== length)) {
			return err(ErrorCode.LengthMismatch, "index levels");
		}
		const levelNames = names ?? list.map(() => null);
		if (levelNames.length !== list.length) {
			return err(ErrorCode.LengthMismatch, "index names");
		}
		return ok(new TableIndex(list, levelNames));
	}

	/** Default 0..n-1 labels as Int64 */
	static range(length: number): TableIndex {
		const data = new BigInt64Array(length);
		for (let i = 0; i < length; i++) data[i] = BigInt(i);
		const level = new Column(DType.int64, new ColumnBuffer(data, false, length));
		return new TableIndex([level], [null]);
	}

	get nlevels(): number {
		return this.levels.length;
	}

	get isComposite(): boolean {
		return this.levels.length > 1;
	}

	get length(): number {
		return this.levels[0]?.length ?? 0;
	}

	/** The single level of a non-composite index */
	get key(): Column | undefined {
		return this.isComposite ? undefined : this.levels[0];
	}

	/** Replace the single level, keeping its name */
	withKey(column: Column): TableIndex {
		return new TableIndex([column], [this.names[0] ?? null]);
	}

	take(indices: Int32Array): TableIndex {
		return new TableIndex(
			this.levels.map((level) => level.take(indices)),
			this.names,
		);
	}
}

export class Table {
	private readonly _columns: ReadonlyMap<string, Column>;
	readonly index: TableIndex | null;

	private constructor(columns: ReadonlyMap<string, Column>, index: TableIndex | null) {
		this._columns = columns;
		this.index = index;
	}

	/* STATIC CONSTRUCTORS
	/*-----------------------------------------------------
	/* Factory methods to create Tables
	/* ==================================================== */

	/**
	 * Create a table from column specs.
	 *
	 * Columns follow the spec's property order, so integer-like names such
	 * as `"1"` come first and `__proto__` cannot be written as a literal
	 * key. Use `fromColumns` when names like these must keep their place.
	 *
	 * @example
	 * ```ts
	 * const table = Table.from({
	 *   id: { data: [1, 2, 3], dtype: DType.int32 },
	 *   name: { data: ["a", "b", null], dtype: DType.string },
	 * });
	 * ```
	 */
	static from(spec: TableSpec, index: TableIndex | null = null): Result<Table> {
		const entries: [string, Column][] = [];
		for (const [name, columnSpec] of Object.entries(spec)) {
			if (columnSpec instanceof Column) {
				entries.push([name, columnSpec]);
				continue;
			}
			const built = Column.from(columnSpec.data, columnSpec.dtype);
			if (built.error !== ErrorCode.None) {
				return err(built.error, `column '${name}': ${built.detail ?? ""}`);
			}
			entries.push([name, built.value]);
		}
		return Table.fromColumns(entries, index);
	}

	/** Create a table from (name, column) pairs, in order */
	static fromColumns(
		entries: Iterable<readonly [string, Column]>,
		index: TableIndex | null = null,
	): Result<Table> {
		const columns = new Map<string, Column>();
		let length: number | null = index?.length ?? null;
		for (const [name, column] of entries) {
			if (columns.has(name)) {
				return err(ErrorCode.DuplicateColumn, name);
			}
			if (length !== null && column.length !== length) {
				return err(ErrorCode.LengthMismatch, name);
			}
			length = column.length;
			columns.set(name, column);
		}
		return ok(new Table(columns, index));
	}

	static empty(): Table {
		return new Table(new Map(), null);
	}

	/* PROPERTIES
	/*-----------------------------------------------------
	/* Read-only properties for shape and column access
	/* ==================================================== */

	get columnNames(): string[] {
		return [...this._columns.keys()];
	}

	get columnCount(): number {
		return this._columns.size;
	}

	get rowCount(): number {
		for (const column of this._columns.values()) {
			return column.length;
		}
		return this.index?.length ?? 0;
	}

	has(name: string): boolean {
		return this._columns.has(name);
	}

	column(name: string): Result<Column> {
		const column = this._columns.get(name);
		return column ? ok(column) : err(ErrorCode.UnknownColumn, name);
	}

	entries(): [string, Column][] {
		return [...this._columns.entries()];
	}

	/* TRANSFORMS
	/*-----------------------------------------------------
	/* Pure operations returning new Tables
	/* ==================================================== */

	/** Add a column at the end, or replace one in place */
	withColumn(name: string, column: Column): Result<Table> {
		if (this._columns.size > 0 && column.length !== this.rowCount) {
			return err(ErrorCode.LengthMismatch, name);
		}
		const columns = new Map(this._columns);
		columns.set(name, column);
		return ok(new Table(columns, this.index));
	}

	/** Rename columns, keeping their positions */
	rename(mapping: ReadonlyMap<string, string>): Result<Table> {
		const entries: [string, Column][] = [];
		for (const [name, column] of this._columns) {
			entries.push([mapping.get(name) ?? name, column]);
		}
		return Table.fromColumns(entries, this.index);
	}

	/** Keep only the named columns, in the given order */
	select(names: readonly string[]): Result<Table> {
		const entries: [string, Column][] = [];
		for (const name of names) {
			const column = this._columns.get(name);
			if (!column) return err(ErrorCode.UnknownColumn, name);
			entries.push([name, column]);
		}
		return Table.fromColumns(entries, this.index);
	}

	withIndex(index: TableIndex | null): Result<Table> {
		if (index && this._columns.size > 0 && index.length !== this.rowCount) {
			return err(ErrorCode.LengthMismatch, "index");
		}
		return ok(new Table(this._columns, index));
	}

	/** Gather rows by position; -1 yields a row of nulls */
	take(indices: Int32Array): Table {
		const columns = new Map<string, Column>();
		for (const [name, column] of this._columns) {
			columns.set(name, column.take(indices));
		}
		return new Table(columns, this.index?.take(indices) ?? null);
	}

	/* CONVERSION
	/*-----------------------------------------------------
	/* Export values to plain JS structures
	/* ==================================================== */

	toRecords(): Row[] {
		const rows: Row[] = [];
		for (let i = 0; i < this.rowCount; i++) {
			const row: Row = {};
			for (const [name, column] of this._columns) {
				row[name] = column.get(i);
			}
			rows.push(row);
		}
		return rows;
	}

	toColumns(): Record<string, (Scalar | null)[]> {
		const out: Record<string, (Scalar | null)[]> = {};
		for (const [name, column] of this._columns) {
			out[name] = column.toArray();
		}
		return out;
	}
}
