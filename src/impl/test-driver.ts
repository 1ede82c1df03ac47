/**
 * In-process driver for tests.
 *
 * Renders every statement it receives and records it, then answers from
 * queues of canned rows and outcomes. No database is involved.
 */

import {ExecutionOutcome, type RawRow} from "./codec.js";
import type {Driver, TableDescription} from "./database.js";
import {
	generateAlterDDL,
	generateDDL,
	generateDropDDL,
	type AlterOperation,
} from "./ddl.js";
import {renderDDL, renderSQL, type RenderedSQL, type SQLDialect} from "./sql.js";
import type {CreateTableOptions, DropTableOptions, Table} from "./table.js";
import type {Template} from "./template.js";

export class TestDriver implements Driver {
	readonly dialect: SQLDialect;
	/** Every statement seen, rendered for the driver's dialect */
	readonly statements: RenderedSQL[] = [];
	/** Row sets handed out by all() and get(), oldest first */
	readonly results: RawRow[][] = [];
	/** Outcomes handed out by run(); defaults to one affected row */
	readonly outcomes: ExecutionOutcome[] = [];
	closed = false;

	constructor(dialect: SQLDialect = "sqlite") {
		this.dialect = dialect;
	}

	#record(strings: TemplateStringsArray, values: readonly unknown[]): void {
		this.statements.push(renderSQL(strings, values, this.dialect));
	}

	#exec(templates: readonly Template[]): ExecutionOutcome {
		for (const template of templates) {
			this.statements.push({sql: renderDDL(template, this.dialect), params: []});
		}
		return new ExecutionOutcome(0);
	}

	async all(
		strings: TemplateStringsArray,
		values: readonly unknown[],
	): Promise<RawRow[]> {
		this.#record(strings, values);
		return this.results.shift() ?? [];
	}

	async get(
		strings: TemplateStringsArray,
		values: readonly unknown[],
	): Promise<RawRow | null> {
		this.#record(strings, values);
		return this.results.shift()?.[0] ?? null;
	}

	async run(
		strings: TemplateStringsArray,
		values: readonly unknown[],
	): Promise<ExecutionOutcome> {
		this.#record(strings, values);
		return this.outcomes.shift() ?? new ExecutionOutcome(1);
	}

	async createTable(
		table: Table,
		options: CreateTableOptions,
	): Promise<ExecutionOutcome> {
		return this.#exec(
			generateDDL(table, {dialect: this.dialect, ifNotExists: options.ifNotExists}),
		);
	}

	async dropTable(
		table: Table,
		options: DropTableOptions,
	): Promise<ExecutionOutcome> {
		return this.#exec([
			generateDropDDL(table, {dialect: this.dialect, ifExists: options.ifExists}),
		]);
	}

	async alterTable(
		table: Table,
		operations: readonly AlterOperation[],
	): Promise<ExecutionOutcome> {
		return this.#exec(generateAlterDDL(table, operations, this.dialect));
	}

	async showTable(table: Table): Promise<TableDescription> {
		return {
			name: table.name,
			columns: [...table.fields].map(([name, field]) => ({
				name,
				type: field.type,
				nullable: field.nullable,
				primaryKey: field.primaryKey,
				default: null,
			})),
			indexes: table.indexes.map((index) => ({
				name: index.name,
				columns: [...index.columns],
				unique: index.unique,
			})),
			createSyntax: null,
		};
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}
