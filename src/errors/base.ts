import type { ErrorCode } from "../types/error.ts";

export interface TableErrorOptions {
	/** Result code the error was raised from, if any */
	code?: ErrorCode;
	/** Suggestion shown under the message by `format()` */
	hint?: string;
	cause?: unknown;
}

/**
 * Base class for errors thrown by the library.
 *
 * Most operations return a `Result` instead of throwing; a TableError is
 * raised by `unwrap()` at application boundaries and for internal
 * invariant violations.
 */
export class TableError extends Error {
	readonly code: ErrorCode | undefined;
	readonly hint: string | undefined;

	constructor(message: string, options: TableErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = "TableError";
		this.code = options.code;
		this.hint = options.hint;
	}

	protected _getDetail(): string | undefined {
		return undefined;
	}

	/** Multi-line rendering for terminals and logs */
	format(): string {
		const lines = [`${this.name}: ${this.message}`];
		const detail = this._getDetail();
		if (detail) {
			lines.push(`  detail: ${detail}`);
		}
		if (this.hint) {
			lines.push(`  hint: ${this.hint}`);
		}
		return lines.join("\n");
	}
}
