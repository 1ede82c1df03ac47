/**
 * Statement builders.
 *
 * Builders are immutable: chaining methods return a new builder. Building is
 * synchronous and side-effect free; validation failures are thrown at call
 * time. Only the terminal methods (first, all, do) talk to the driver.
 */

import {
	ExecutionOutcome,
	encodeValue,
	loadRecord,
	loadRecords,
	loadRow,
	loadRows,
	type FetchResult,
	type LoadTarget,
	type ModelConstructor,
	type RawRow,
} from "./codec.js";
import type {AlterOperation} from "./ddl.js";
import {generateAlterDDL} from "./ddl.js";
import type {TableDescription} from "./database.js";
import {QueryError, UnknownFieldError, ValidationError} from "./errors.js";
import type {Field} from "./field.js";
import {Rows, type RowInput} from "./rows.js";
import {renderDDL, renderSQL, type RenderedSQL, type SQLDialect} from "./sql.js";
import type {Table} from "./table.js";
import {TemplateBuilder, type Template} from "./template.js";

// ============================================================================
// Conditions
// ============================================================================

export interface ConditionOperators<T> {
	$eq?: T | null;
	$neq?: T | null;
	$lt?: T;
	$lte?: T;
	$gt?: T;
	$gte?: T;
	$like?: string;
	$in?: readonly T[];
	$isNull?: boolean;
}

/**
 * A value means equality (null means IS NULL); an object of $-operators
 * applies each of them.
 */
export type Condition<T> = T | null | ConditionOperators<T>;

/**
 * Conditions keyed by field name, AND-ed together.
 *
 * @example
 * {age: {$gte: 18}, deletedAt: null}
 */
export type Where<V> = {[K in keyof V]?: Condition<V[K]>};

const COMPARISONS: Record<string, string> = {
	$eq: "=",
	$neq: "!=",
	$lt: "<",
	$lte: "<=",
	$gt: ">",
	$gte: ">=",
};

function isOperatorObject(value: unknown): value is Record<string, unknown> {
	if (
		typeof value !== "object" ||
		value === null ||
		Array.isArray(value) ||
		value instanceof Date
	) {
		return false;
	}
	const keys = Object.keys(value);
	return keys.length > 0 && keys.every((key) => key.startsWith("$"));
}

function operatorFragment(
	field: Field,
	column: string,
	operator: string,
	operand: unknown,
): Template {
	const builder = new TemplateBuilder().ident(column);

	switch (operator) {
		case "$isNull":
			return builder.text(operand ? " IS NULL" : " IS NOT NULL").build();

		case "$like":
			return builder.text(" LIKE ").value(operand).build();

		case "$in": {
			if (!Array.isArray(operand)) {
				throw new QueryError(`$in for field "${column}" expects an array`);
			}
			if (operand.length === 0) {
				return new TemplateBuilder().text("1 = 0").build();
			}
			builder.text(" IN (");
			builder.join(operand, (b, item: unknown) =>
				b.value(encodeValue(field, item)),
			);
			return builder.text(")").build();
		}

		default: {
			const comparison = COMPARISONS[operator];
			if (!comparison) {
				throw new QueryError(
					`Unknown operator "${operator}" for field "${column}"`,
				);
			}
			if (operand === null && operator === "$eq") {
				return builder.text(" IS NULL").build();
			}
			if (operand === null && operator === "$neq") {
				return builder.text(" IS NOT NULL").build();
			}
			return builder
				.text(` ${comparison} `)
				.value(encodeValue(field, operand))
				.build();
		}
	}
}

function undefinedCondition(table: Table, condition: string): QueryError {
	return new QueryError(
		`Condition "${condition}" on table "${table.name}" is undefined`,
	);
}

/**
 * Build condition fragments for a where() call.
 * @throws {UnknownFieldError} for fields the table doesn't declare
 * @throws {QueryError} for undefined values; use null to match NULL
 */
export function buildConditions(table: Table, conditions: object): Template[] {
	const fragments: Template[] = [];

	for (const [column, value] of Object.entries(conditions)) {
		const field = table.field(column);
		if (value === undefined) {
			throw undefinedCondition(table, column);
		}

		if (isOperatorObject(value)) {
			for (const [operator, operand] of Object.entries(value)) {
				if (operand === undefined) {
					throw undefinedCondition(table, `${column}.${operator}`);
				}
				fragments.push(operatorFragment(field, column, operator, operand));
			}
		} else if (value === null) {
			fragments.push(new TemplateBuilder().ident(column).text(" IS NULL").build());
		} else {
			fragments.push(
				new TemplateBuilder()
					.ident(column)
					.text(" = ")
					.value(encodeValue(field, value))
					.build(),
			);
		}
	}

	return fragments;
}

function appendWhere(builder: TemplateBuilder, where: readonly Template[]): void {
	if (where.length === 0) return;
	builder.text(" WHERE ");
	builder.join(where, (b, fragment) => b.merge(fragment), " AND ");
}

function render(template: Template, dialect: SQLDialect): RenderedSQL {
	return renderSQL(template.strings, template.values, dialect);
}

// ============================================================================
// Value Validation
// ============================================================================

/**
 * Validate and encode values for the given columns.
 *
 * Null cells are passed through; NOT NULL is left to the database.
 * @throws {ValidationError} listing the failing fields
 */
function prepareValues(
	table: Table,
	columns: readonly string[],
	rows: readonly (readonly unknown[])[],
): unknown[][] {
	const fields = columns.map((column) => table.field(column));
	const fieldErrors: Record<string, string[]> = {};

	const encoded = rows.map((row) =>
		row.map((value, i) => {
			const field = fields[i];
			if (value === null || value === undefined) {
				return null;
			}
			const result = field.validate(value);
			if (!result.success) {
				const column = columns[i];
				(fieldErrors[column] ??= []).push(...result.issues);
				return null;
			}
			return encodeValue(field, result.value);
		}),
	);

	const failed = Object.keys(fieldErrors);
	if (failed.length > 0) {
		throw new ValidationError(
			`Invalid values for table "${table.name}": ${failed.join(", ")}`,
			fieldErrors,
		);
	}
	return encoded;
}

// ============================================================================
// SELECT
// ============================================================================

export type Direction = "asc" | "desc";

export interface SelectState {
	readonly columns: readonly string[];
	readonly distinct: boolean;
	readonly where: readonly Template[];
	readonly orderBy: readonly {column: string; direction: Direction}[];
	readonly limit: number | null;
	readonly offset: number | null;
}

/**
 * Turns driver rows into the select's result type.
 */
export interface Decoder<R> {
	one(row: RawRow | null): R;
	many(rows: RawRow[]): FetchResult<R>;
}

const rawDecoder: Decoder<RawRow> = {one: loadRow, many: loadRows};

function recordDecoder<I extends LoadTarget>(
	model: ModelConstructor<I>,
): Decoder<I> {
	return {
		one: (row) => loadRecord(row, model),
		many: (rows) => loadRecords(rows, model),
	};
}

// Largest signed 64-bit integer, accepted as "no limit" by both dialects
const UNBOUNDED_LIMIT = "9223372036854775807";

function checkCount(name: string, n: number): number {
	if (!Number.isInteger(n) || n < 0) {
		throw new QueryError(`${name} must be a non-negative integer, got ${n}`);
	}
	return n;
}

/**
 * A SELECT in progress. Use Select to start one.
 *
 * I is the record type, V its field values, R what first() and all() yield.
 */
export class SelectQuery<I extends LoadTarget, V extends object, R> {
	readonly #model: ModelConstructor<I>;
	readonly #decoder: Decoder<R>;
	readonly #state: SelectState;

	constructor(
		model: ModelConstructor<I>,
		decoder: Decoder<R>,
		state: SelectState,
	) {
		this.#model = model;
		this.#decoder = decoder;
		this.#state = state;
	}

	#with(patch: Partial<SelectState>): SelectQuery<I, V, R> {
		return new SelectQuery(this.#model, this.#decoder, {
			...this.#state,
			...patch,
		});
	}

	where(conditions: Where<V>): SelectQuery<I, V, R> {
		const fragments = buildConditions(this.#model.table, conditions);
		return this.#with({where: [...this.#state.where, ...fragments]});
	}

	orderBy(
		column: keyof V & string,
		direction: Direction = "asc",
	): SelectQuery<I, V, R> {
		this.#model.table.field(column);
		if (direction !== "asc" && direction !== "desc") {
			throw new QueryError(`Invalid sort direction "${String(direction)}"`);
		}
		return this.#with({
			orderBy: [...this.#state.orderBy, {column, direction}],
		});
	}

	limit(n: number): SelectQuery<I, V, R> {
		return this.#with({limit: checkCount("limit", n)});
	}

	offset(n: number): SelectQuery<I, V, R> {
		return this.#with({offset: checkCount("offset", n)});
	}

	distinct(): SelectQuery<I, V, R> {
		return this.#with({distinct: true});
	}

	/**
	 * Yield plain row mappings instead of records.
	 */
	raw(): SelectQuery<I, V, RawRow> {
		return new SelectQuery(this.#model, rawDecoder, this.#state);
	}

	parts(): Template {
		const {columns, distinct, where, orderBy, limit, offset} = this.#state;
		const builder = new TemplateBuilder().text(
			distinct ? "SELECT DISTINCT " : "SELECT ",
		);
		builder.join(columns, (b, column) => b.ident(column));
		builder.text(" FROM ").ident(this.#model.table.name);
		appendWhere(builder, where);

		if (orderBy.length > 0) {
			builder.text(" ORDER BY ");
			builder.join(orderBy, (b, {column, direction}) =>
				b.ident(column).text(direction === "desc" ? " DESC" : " ASC"),
			);
		}

		// Counts are checked integers, so they are inlined rather than bound
		if (limit !== null) {
			builder.text(` LIMIT ${limit}`);
		} else if (offset !== null) {
			// Both dialects need a LIMIT before OFFSET
			builder.text(` LIMIT ${UNBOUNDED_LIMIT}`);
		}
		if (offset !== null) {
			builder.text(` OFFSET ${offset}`);
		}

		return builder.build();
	}

	toSQL(dialect: SQLDialect): RenderedSQL {
		return render(this.parts(), dialect);
	}

	/**
	 * Fetch the first matching row.
	 */
	async first(): Promise<R> {
		const {strings, values} = this.limit(1).parts();
		const row = await this.#model.table.driver.get(strings, values);
		return this.#decoder.one(row);
	}

	/**
	 * Fetch every matching row.
	 */
	async all(): Promise<FetchResult<R>> {
		const {strings, values} = this.parts();
		const rows = await this.#model.table.driver.all(strings, values);
		return this.#decoder.many(rows);
	}
}

/**
 * SELECT statement yielding records.
 *
 * @example
 * const adults = await new Select(Person).where({age: {$gte: 18}}).all();
 */
export class Select<
	I extends LoadTarget,
	V extends object = RawRow,
> extends SelectQuery<I, V, I> {
	constructor(
		model: ModelConstructor<I>,
		columns: readonly (keyof V & string)[] = [],
		options: {distinct?: boolean} = {},
	) {
		const {table} = model;
		for (const column of columns) {
			table.field(column);
		}
		super(model, recordDecoder(model), {
			columns: columns.length > 0 ? [...columns] : table.columns,
			distinct: options.distinct ?? false,
			where: [],
			orderBy: [],
			limit: null,
			offset: null,
		});
	}
}

// ============================================================================
// INSERT / REPLACE
// ============================================================================

/**
 * Shared implementation of INSERT INTO and REPLACE INTO.
 */
abstract class RowsStatement {
	readonly #table: Table;
	readonly #columns: readonly string[];
	readonly #values: readonly (readonly unknown[])[];
	protected abstract readonly verb: "INSERT" | "REPLACE";

	constructor(table: Table, rows: Rows | RowInput) {
		const batch = rows instanceof Rows ? rows : new Rows(rows, {table});
		for (const column of batch.columns) {
			if (!table.hasField(column)) {
				throw new UnknownFieldError(table.name, column);
			}
		}

		// Fill defaults for declared columns the batch leaves out
		const columns = [...batch.columns];
		const defaulted: Field[] = [];
		for (const [name, field] of table.fields) {
			if (field.hasDefault && !field.autoIncrement && !columns.includes(name)) {
				columns.push(name);
				defaulted.push(field);
			}
		}
		const values = batch.values.map((row) => [
			...row,
			...defaulted.map((field) => field.produceDefault()),
		]);

		this.#table = table;
		this.#columns = columns;
		this.#values = prepareValues(table, columns, values);
	}

	get table(): Table {
		return this.#table;
	}

	parts(): Template {
		const builder = new TemplateBuilder()
			.text(`${this.verb} INTO `)
			.ident(this.#table.name)
			.text(" (");
		builder.join(this.#columns, (b, column) => b.ident(column));
		builder.text(") VALUES ");
		builder.join(this.#values, (b, row) => {
			b.text("(");
			b.join(row, (inner, value: unknown) => inner.value(value));
			b.text(")");
		});
		return builder.build();
	}

	toSQL(dialect: SQLDialect): RenderedSQL {
		return render(this.parts(), dialect);
	}

	async do(): Promise<ExecutionOutcome> {
		const {strings, values} = this.parts();
		const outcome = await this.#table.driver.run(strings, values);
		const {lastId} = outcome;
		if (this.#table.primaryKey.autoIncrement && lastId !== null && lastId > 0) {
			return outcome;
		}
		return new ExecutionOutcome(outcome.affected, null);
	}
}

/**
 * INSERT INTO statement.
 *
 * @example
 * const {lastId} = await new Insert(Person.table, {name: "Alice"}).do();
 */
export class Insert extends RowsStatement {
	protected readonly verb = "INSERT";
}

/**
 * REPLACE INTO statement: inserts, or replaces the row with the same key.
 */
export class Replace extends RowsStatement {
	protected readonly verb = "REPLACE";
}

// ============================================================================
// UPDATE
// ============================================================================

/**
 * UPDATE statement.
 *
 * @example
 * await new Update(Person.table, {age: 31}).where({id: 1}).do();
 */
export class Update<V extends object = RawRow> {
	readonly #table: Table;
	readonly #values: Partial<V>;
	readonly #columns: readonly string[];
	readonly #encoded: readonly unknown[];
	#where: readonly Template[] = [];

	constructor(table: Table, values: Partial<V>) {
		const entries = Object.entries(values).filter(
			([, value]) => value !== undefined,
		);
		if (entries.length === 0) {
			throw new QueryError(`Update of table "${table.name}" has no values`);
		}
		const columns = entries.map(([column]) => column);
		const [encoded] = prepareValues(table, columns, [
			entries.map(([, value]: [string, unknown]) => value),
		]);

		this.#table = table;
		this.#values = values;
		this.#columns = columns;
		this.#encoded = encoded;
	}

	where(conditions: Where<V>): Update<V> {
		const fragments = buildConditions(this.#table, conditions);
		const next = new Update<V>(this.#table, this.#values);
		next.#where = [...this.#where, ...fragments];
		return next;
	}

	parts(): Template {
		const builder = new TemplateBuilder()
			.text("UPDATE ")
			.ident(this.#table.name)
			.text(" SET ");
		const assignments = this.#columns.map(
			(column, i) => [column, this.#encoded[i]] as const,
		);
		builder.join(assignments, (b, [column, value]) => {
			b.ident(column).text(" = ").value(value);
		});
		appendWhere(builder, this.#where);
		return builder.build();
	}

	toSQL(dialect: SQLDialect): RenderedSQL {
		return render(this.parts(), dialect);
	}

	async do(): Promise<ExecutionOutcome> {
		const {strings, values} = this.parts();
		const outcome = await this.#table.driver.run(strings, values);
		return new ExecutionOutcome(outcome.affected, null);
	}
}

// ============================================================================
// DELETE
// ============================================================================

/**
 * DELETE statement. Without where() it deletes every row.
 */
export class Delete<V extends object = RawRow> {
	readonly #table: Table;
	#where: readonly Template[] = [];

	constructor(table: Table) {
		this.#table = table;
	}

	where(conditions: Where<V>): Delete<V> {
		const fragments = buildConditions(this.#table, conditions);
		const next = new Delete<V>(this.#table);
		next.#where = [...this.#where, ...fragments];
		return next;
	}

	parts(): Template {
		const builder = new TemplateBuilder()
			.text("DELETE FROM ")
			.ident(this.#table.name);
		appendWhere(builder, this.#where);
		return builder.build();
	}

	toSQL(dialect: SQLDialect): RenderedSQL {
		return render(this.parts(), dialect);
	}

	async do(): Promise<ExecutionOutcome> {
		const {strings, values} = this.parts();
		const outcome = await this.#table.driver.run(strings, values);
		return new ExecutionOutcome(outcome.affected, null);
	}
}

// ============================================================================
// ALTER / SHOW
// ============================================================================

function namedField(field: Field, action: string): Field {
	if (field.name === undefined) {
		throw new QueryError(`Cannot ${action} a column with an unnamed field`);
	}
	return field;
}

/**
 * ALTER TABLE builder.
 *
 * @example
 * await Person.alter()
 *   .add(column(z.string().optional(), {name: "nickname"}))
 *   .rename("age", "years")
 *   .do();
 */
export class Alter {
	readonly #table: Table;
	#operations: readonly AlterOperation[] = [];

	constructor(table: Table) {
		this.#table = table;
	}

	#with(operation: AlterOperation): Alter {
		const next = new Alter(this.#table);
		next.#operations = [...this.#operations, operation];
		return next;
	}

	add(field: Field, options: {after?: string} = {}): Alter {
		return this.#with({
			kind: "add",
			field: namedField(field, "add"),
			after: options.after,
		});
	}

	drop(column: string): Alter {
		return this.#with({kind: "drop", column});
	}

	modify(field: Field): Alter {
		return this.#with({kind: "modify", field: namedField(field, "modify")});
	}

	rename(from: string, to: string): Alter {
		return this.#with({kind: "rename", from, to});
	}

	get operations(): readonly AlterOperation[] {
		return this.#operations;
	}

	toSQL(dialect: SQLDialect): RenderedSQL {
		const sql = generateAlterDDL(this.#table, this.#operations, dialect)
			.map((template) => renderDDL(template, dialect))
			.join(";\n");
		return {sql, params: []};
	}

	/**
	 * Apply the changes.
	 * @throws {QueryError} when no change was added
	 */
	async do(): Promise<ExecutionOutcome> {
		if (this.#operations.length === 0) {
			throw new QueryError(`Alter of table "${this.#table.name}" has no changes`);
		}
		return this.#table.driver.alterTable(this.#table, this.#operations);
	}
}

/**
 * Describes a table as it currently exists in the database.
 */
export class Show {
	readonly #table: Table;

	constructor(table: Table) {
		this.#table = table;
	}

	async do(): Promise<TableDescription> {
		return this.#table.driver.showTable(this.#table);
	}
}
