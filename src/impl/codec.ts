/**
 * Result codec.
 *
 * Converts values between application and database representations, and
 * decodes raw driver results into records or generic mappings.
 */

import type {Field} from "./field.js";
import type {Table} from "./table.js";
import {DecodeError} from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A row as returned by a driver: column name → database value.
 */
export type RawRow = Record<string, unknown>;

/**
 * Trusted loader write path. Records implement it; the codec and save()
 * use it to store values without the public write checks.
 */
export const LOAD = Symbol("tessera:load");

export interface LoadTarget {
	[LOAD](name: string, value: unknown): void;
}

/**
 * Anything the codec can instantiate: a model class bound to a table.
 */
export interface ModelConstructor<I extends LoadTarget = LoadTarget> {
	new (): I;
	readonly table: Table;
}

// ============================================================================
// Execution Outcome
// ============================================================================

/**
 * Result of a write statement.
 */
export class ExecutionOutcome {
	/** Number of rows the statement affected */
	readonly affected: number;
	/** Generated key of an auto-increment insert, otherwise null */
	readonly lastId: number | null;

	constructor(affected: number, lastId: number | null = null) {
		this.affected = affected;
		this.lastId = lastId;
		Object.freeze(this);
	}

	toString(): string {
		return `<ExecutionOutcome(affected: ${this.affected}, lastId: ${this.lastId})>`;
	}
}

// ============================================================================
// Fetch Result
// ============================================================================

/**
 * Ordered, read-only sequence of decoded rows.
 */
export class FetchResult<T> implements Iterable<T> {
	readonly #items: readonly T[];

	constructor(items: Iterable<T> = []) {
		this.#items = Object.freeze([...items]);
	}

	get length(): number {
		return this.#items.length;
	}

	/**
	 * Item at a position; negative positions count from the end.
	 */
	at(index: number): T | undefined {
		const i = index < 0 ? this.#items.length + index : index;
		return i >= 0 && i < this.#items.length ? this.#items[i] : undefined;
	}

	includes(value: T): boolean {
		return this.#items.includes(value);
	}

	map<U>(fn: (item: T, index: number) => U): U[] {
		return this.#items.map(fn);
	}

	toArray(): T[] {
		return [...this.#items];
	}

	[Symbol.iterator](): Iterator<T> {
		return this.#items[Symbol.iterator]();
	}

	toString(): string {
		return `<FetchResult(${this.#items.length} rows)>`;
	}
}

// ============================================================================
// Value Encoding/Decoding
// ============================================================================

/**
 * Format a Date as a UTC datetime string: "YYYY-MM-DD HH:MM:SS.mmm".
 * The Z is dropped because MySQL doesn't accept it; decodeValue() restores it.
 */
function formatDateTime(date: Date): string {
	return date.toISOString().replace("T", " ").replace("Z", "");
}

const DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

/**
 * Encode an application value for the database.
 * `field` is undefined for columns the table doesn't declare.
 */
export function encodeValue(field: Field | undefined, value: unknown): unknown {
	if (value === undefined || value === null) {
		return null;
	}
	if (value instanceof Date) {
		return formatDateTime(value);
	}
	if (field?.type === "json") {
		return JSON.stringify(value);
	}
	return value;
}

/**
 * Decode a database value for a declared field.
 */
export function decodeValue(field: Field, value: unknown): unknown {
	if (value === null || value === undefined) {
		return null;
	}

	switch (field.type) {
		case "boolean":
			if (typeof value === "number" || typeof value === "bigint") {
				return Number(value) !== 0;
			}
			if (typeof value === "string") {
				return value === "1" || value === "true";
			}
			return value;

		case "integer":
			return typeof value === "bigint" ? Number(value) : value;

		case "datetime": {
			if (value instanceof Date) {
				return value;
			}
			if (typeof value !== "string") {
				return value;
			}
			const date = new Date(
				DATETIME_PATTERN.test(value) ? value.replace(" ", "T") + "Z" : value,
			);
			if (isNaN(date.getTime())) {
				throw new DecodeError(
					`Invalid date value for field "${field.name}": "${value}" cannot be parsed as a valid date`,
					field.name,
				);
			}
			return date;
		}

		case "json":
			if (typeof value !== "string") {
				// Already parsed (e.g. MySQL JSON columns)
				return value;
			}
			try {
				return JSON.parse(value);
			} catch (error) {
				throw new DecodeError(
					`JSON parse error for field "${field.name}": ${error instanceof Error ? error.message : String(error)}`,
					field.name,
					{cause: error},
				);
			}

		default:
			return value;
	}
}

// ============================================================================
// Result Loading
// ============================================================================

/**
 * Check if a value has the shape of a driver row.
 */
export function isRow(value: unknown): value is RawRow {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		!(value instanceof Date) &&
		!ArrayBuffer.isView(value)
	);
}

function describe(value: unknown): string {
	if (Array.isArray(value)) return "array";
	if (value === null) return "null";
	return typeof value;
}

/**
 * Decode a single-row result into a record.
 *
 * An absent or empty row yields a freshly constructed, unpopulated record.
 * Columns the table doesn't declare are skipped.
 */
export function loadRecord<I extends LoadTarget>(
	row: unknown,
	model: ModelConstructor<I>,
): I {
	if (row === null || row === undefined) {
		return new model();
	}
	if (!isRow(row)) {
		throw new DecodeError(
			`Cannot decode ${describe(row)} as a "${model.table.name}" row`,
		);
	}

	const record = new model();
	const {fields} = model.table;
	for (const [key, value] of Object.entries(row)) {
		const field = fields.get(key);
		if (field) {
			record[LOAD](key, decodeValue(field, value));
		}
	}
	return record;
}

/**
 * Decode a multi-row result into records.
 */
export function loadRecords<I extends LoadTarget>(
	rows: unknown,
	model: ModelConstructor<I>,
): FetchResult<I> {
	if (!Array.isArray(rows)) {
		throw new DecodeError(
			`Cannot decode ${describe(rows)} as a list of "${model.table.name}" rows`,
		);
	}
	return new FetchResult(
		rows.map((row: unknown, i) => {
			if (!isRow(row)) {
				throw new DecodeError(
					`Cannot decode ${describe(row)} at position ${i} as a "${model.table.name}" row`,
				);
			}
			return loadRecord(row, model);
		}),
	);
}

/**
 * Pass a single-row result through as a generic mapping.
 * An absent row yields an empty mapping.
 */
export function loadRow(row: unknown): RawRow {
	if (row === null || row === undefined) {
		return {};
	}
	if (!isRow(row)) {
		throw new DecodeError(`Cannot decode ${describe(row)} as a row`);
	}
	return {...row};
}

/**
 * Pass a multi-row result through as generic mappings.
 *
 * An empty list yields a result holding one empty mapping, not an empty
 * result.
 */
export function loadRows(rows: unknown): FetchResult<RawRow> {
	if (!Array.isArray(rows)) {
		throw new DecodeError(`Cannot decode ${describe(rows)} as a list of rows`);
	}
	if (rows.length === 0) {
		return new FetchResult([{}]);
	}
	return new FetchResult(
		rows.map((row: unknown, i) => {
			if (!isRow(row)) {
				throw new DecodeError(
					`Cannot decode ${describe(row)} at position ${i} as a row`,
				);
			}
			return {...row};
		}),
	);
}

/**
 * Decode any driver result.
 *
 * A single row (or null) decodes with the single-row policy, a list with the
 * multi-row policy. Pass `{raw: true}` to get generic mappings instead of
 * records.
 */
export function load<I extends LoadTarget>(
	result: unknown,
	model: ModelConstructor<I>,
	options: {raw: true},
): RawRow | FetchResult<RawRow>;
export function load<I extends LoadTarget>(
	result: unknown,
	model: ModelConstructor<I>,
	options?: {raw?: false},
): I | FetchResult<I>;
export function load<I extends LoadTarget>(
	result: unknown,
	model: ModelConstructor<I>,
	options: {raw?: boolean} = {},
): I | RawRow | FetchResult<I> | FetchResult<RawRow> {
	if (Array.isArray(result)) {
		return options.raw ? loadRows(result) : loadRecords(result, model);
	}
	if (result === null || result === undefined || isRow(result)) {
		return options.raw ? loadRow(result) : loadRecord(result, model);
	}
	throw new DecodeError(
		`Cannot decode ${describe(result)} as a "${model.table.name}" result`,
	);
}
