/**
 * Row batches for insert and replace statements.
 */

import {InvalidRowError, UnknownFieldError} from "./errors.js";
import {isField, type Field} from "./field.js";
import {isRow, type RawRow} from "./codec.js";
import type {Table} from "./table.js";

/**
 * Rows as accepted by Rows: a single mapping, a list of mappings, or a list
 * of positional tuples (which need explicit columns).
 */
export type RowInput = RawRow | readonly (RawRow | readonly unknown[])[];

export interface RowsOptions {
	/** Columns by name or field; required for tuples */
	columns?: readonly (string | Field)[];
	/** Table the rows belong to; orders and checks mapping keys */
	table?: Table;
}

function columnName(column: string | Field): string {
	if (isField(column)) {
		if (column.name === undefined) {
			throw new InvalidRowError("Cannot use an unnamed field as a column");
		}
		return column.name;
	}
	return column;
}

/**
 * A normalized batch: column names plus value rows aligned to them.
 *
 * @example
 * new Rows([{name: "Alice"}, {name: "Bob", age: 30}], {table: Person.table})
 * // columns: ["name", "age"], values: [["Alice", null], ["Bob", 30]]
 */
export class Rows {
	readonly columns: readonly string[];
	readonly values: readonly (readonly unknown[])[];

	constructor(input: RowInput, options: RowsOptions = {}) {
		const {table} = options;
		const explicit = options.columns?.map(columnName);
		if (table && explicit) {
			for (const name of explicit) {
				if (!table.hasField(name)) {
					throw new UnknownFieldError(table.name, name);
				}
			}
		}

		let columns: string[];
		let values: unknown[][];

		if (Array.isArray(input)) {
			const list: readonly unknown[] = input;
			if (list.length === 0) {
				throw new InvalidRowError("Cannot build rows from an empty list");
			}

			if (list.every((row) => Array.isArray(row))) {
				if (!explicit) {
					throw new InvalidRowError("Positional rows require explicit columns");
				}
				const width = explicit.length;
				columns = explicit;
				values = list.map((row, i) => {
					if (!Array.isArray(row) || row.length !== width) {
						throw new InvalidRowError(
							`Row ${i} has ${Array.isArray(row) ? row.length : 0} values; expected ${width}`,
							i,
						);
					}
					return [...row];
				});
			} else if (list.every(isRow)) {
				const rows = list.filter(isRow);
				const names = explicit ?? collectColumns(rows, table);
				columns = names;
				values = rows.map((row) => alignRow(row, names));
			} else {
				throw new InvalidRowError(
					"Rows must be all mappings or all positional tuples",
				);
			}
		} else if (isRow(input)) {
			columns = explicit ?? collectColumns([input], table);
			values = [alignRow(input, columns)];
		} else {
			throw new InvalidRowError("Rows must be a mapping or a list of rows");
		}

		this.columns = Object.freeze(columns);
		this.values = Object.freeze(values.map((row) => Object.freeze(row)));
		Object.freeze(this);
	}

	get length(): number {
		return this.values.length;
	}
}

/**
 * Union of the mappings' keys: table declaration order when a table is
 * given, else order of first appearance.
 */
function collectColumns(rows: readonly RawRow[], table?: Table): string[] {
	const seen = new Set<string>();
	for (const row of rows) {
		for (const key of Object.keys(row)) {
			if (table && !table.hasField(key)) {
				throw new UnknownFieldError(table.name, key);
			}
			seen.add(key);
		}
	}
	return table ? table.columns.filter((name) => seen.has(name)) : [...seen];
}

function alignRow(row: RawRow, columns: readonly string[]): unknown[] {
	return columns.map((name) => (Object.hasOwn(row, name) ? row[name] : null));
}
