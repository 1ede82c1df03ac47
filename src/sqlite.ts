/**
 * better-sqlite3 driver for tessera
 *
 * Provides a Driver implementation for better-sqlite3 (Node.js).
 * The connection is persistent - call close() when done.
 *
 * Requires: better-sqlite3
 */

import BetterSqlite3 from "better-sqlite3";

import {ExecutionOutcome, type RawRow} from "./impl/codec.js";
import {
	parseOptions,
	SQLiteOptionsSchema,
	type ColumnInfo,
	type Driver,
	type IndexInfo,
	type SQLiteOptions,
	type TableDescription,
} from "./impl/database.js";
import {
	generateAlterDDL,
	generateDDL,
	generateDropDDL,
	type AlterOperation,
} from "./impl/ddl.js";
import {ConstraintViolationError, type ConstraintKind} from "./impl/errors.js";
import {quoteIdent, renderDDL, renderSQL} from "./impl/sql.js";
import type {CreateTableOptions, DropTableOptions, Table} from "./impl/table.js";
import type {Template} from "./impl/template.js";

const DIALECT = "sqlite" as const;

/**
 * Build SQL from template parts using ? placeholders.
 */
function buildSQL(
	strings: TemplateStringsArray,
	values: readonly unknown[],
): {sql: string; params: unknown[]} {
	const {sql, params} = renderSQL(strings, values, DIALECT);
	return {
		sql,
		// better-sqlite3 doesn't accept true/false or undefined
		params: params.map((value) => {
			if (typeof value === "boolean") return value ? 1 : 0;
			return value === undefined ? null : value;
		}),
	};
}

interface TableInfoRow {
	cid: number;
	name: string;
	type: string;
	notnull: number;
	dflt_value: string | null;
	pk: number;
}

interface IndexListRow {
	seq: number;
	name: string;
	unique: number;
	origin: string;
	partial: number;
}

interface IndexInfoRow {
	seqno: number;
	cid: number;
	name: string;
}

interface MasterRow {
	sql: string | null;
}

function constraintKind(code: string, message: string): ConstraintKind {
	if (code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY") {
		return "unique";
	}
	if (code === "SQLITE_CONSTRAINT_FOREIGNKEY") return "foreign_key";
	if (code === "SQLITE_CONSTRAINT_NOTNULL") return "not_null";
	if (code === "SQLITE_CONSTRAINT_CHECK") return "check";
	if (message.includes("UNIQUE")) return "unique";
	if (message.includes("FOREIGN KEY")) return "foreign_key";
	if (message.includes("NOT NULL")) return "not_null";
	if (message.includes("CHECK")) return "check";
	return "unknown";
}

/**
 * SQLite driver using better-sqlite3.
 *
 * @example
 * import SQLiteDriver from "tessera/sqlite";
 * import {Database} from "tessera";
 *
 * const db = new Database(new SQLiteDriver("app.db"));
 *
 * // When done:
 * await db.close();
 */
export default class SQLiteDriver implements Driver {
	readonly dialect = DIALECT;
	#db: BetterSqlite3.Database;

	constructor(path = ":memory:", options: SQLiteOptions = {}) {
		const {foreignKeys, readonly} = parseOptions(
			SQLiteOptionsSchema,
			options,
			"SQLite options",
		);
		this.#db = new BetterSqlite3(path, {readonly});

		// Enable WAL mode for better concurrency
		if (path !== ":memory:" && !readonly) {
			this.#db.pragma("journal_mode = WAL");
		}

		this.#db.pragma(`foreign_keys = ${foreignKeys ? "ON" : "OFF"}`);
	}

	/**
	 * Convert SQLite errors to tessera errors.
	 */
	#handleError(error: unknown): never {
		if (
			error instanceof Error &&
			"code" in error &&
			typeof error.code === "string" &&
			error.code.startsWith("SQLITE_CONSTRAINT")
		) {
			const code = error.code;
			const message = error.message;
			// Example: "UNIQUE constraint failed: users.email"
			const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
			const table = match ? match[1] : undefined;
			const column = match ? match[2] : undefined;

			throw new ConstraintViolationError(
				message,
				{
					kind: constraintKind(code, message),
					constraint: match ? `${table}.${column}` : undefined,
					table,
					column,
				},
				{cause: error},
			);
		}
		throw error;
	}

	async all(
		strings: TemplateStringsArray,
		values: readonly unknown[],
	): Promise<RawRow[]> {
		try {
			const {sql, params} = buildSQL(strings, values);
			return this.#db.prepare<unknown[], RawRow>(sql).all(...params);
		} catch (error) {
			return this.#handleError(error);
		}
	}

	async get(
		strings: TemplateStringsArray,
		values: readonly unknown[],
	): Promise<RawRow | null> {
		try {
			const {sql, params} = buildSQL(strings, values);
			return this.#db.prepare<unknown[], RawRow>(sql).get(...params) ?? null;
		} catch (error) {
			return this.#handleError(error);
		}
	}

	async run(
		strings: TemplateStringsArray,
		values: readonly unknown[],
	): Promise<ExecutionOutcome> {
		try {
			const {sql, params} = buildSQL(strings, values);
			const result = this.#db.prepare(sql).run(...params);
			const lastId = Number(result.lastInsertRowid);
			return new ExecutionOutcome(result.changes, lastId > 0 ? lastId : null);
		} catch (error) {
			return this.#handleError(error);
		}
	}

	async close(): Promise<void> {
		this.#db.close();
	}

	// ==========================================================================
	// Schema Management
	// ==========================================================================

	#exec(templates: readonly Template[]): ExecutionOutcome {
		try {
			let affected = 0;
			for (const template of templates) {
				affected += this.#db.prepare(renderDDL(template, DIALECT)).run().changes;
			}
			return new ExecutionOutcome(affected, null);
		} catch (error) {
			return this.#handleError(error);
		}
	}

	async createTable(
		table: Table,
		options: CreateTableOptions,
	): Promise<ExecutionOutcome> {
		return this.#exec(
			generateDDL(table, {dialect: DIALECT, ifNotExists: options.ifNotExists}),
		);
	}

	async dropTable(
		table: Table,
		options: DropTableOptions,
	): Promise<ExecutionOutcome> {
		return this.#exec([
			generateDropDDL(table, {dialect: DIALECT, ifExists: options.ifExists}),
		]);
	}

	async alterTable(
		table: Table,
		operations: readonly AlterOperation[],
	): Promise<ExecutionOutcome> {
		return this.#exec(generateAlterDDL(table, operations, DIALECT));
	}

	async showTable(table: Table): Promise<TableDescription> {
		const quoted = quoteIdent(table.name, DIALECT);

		const master = this.#db
			.prepare<[string], MasterRow>(
				"SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?",
			)
			.get(table.name);

		const columns: ColumnInfo[] = this.#db
			.prepare<[], TableInfoRow>(`PRAGMA table_info(${quoted})`)
			.all()
			.map((row) => ({
				name: row.name,
				type: row.type,
				nullable: row.notnull === 0 && row.pk === 0,
				primaryKey: row.pk > 0,
				default: row.dflt_value,
			}));

		const indexes: IndexInfo[] = this.#db
			.prepare<[], IndexListRow>(`PRAGMA index_list(${quoted})`)
			.all()
			.filter((row) => row.origin !== "pk")
			.map((row) => ({
				name: row.name,
				unique: row.unique === 1,
				columns: this.#db
					.prepare<[], IndexInfoRow>(
						`PRAGMA index_info(${quoteIdent(row.name, DIALECT)})`,
					)
					.all()
					.sort((a, b) => a.seqno - b.seqno)
					.map((info) => info.name),
			}));

		return {
			name: table.name,
			columns,
			indexes,
			createSyntax: master?.sql ?? null,
		};
	}
}
