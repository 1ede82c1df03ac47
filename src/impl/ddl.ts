/**
 * DDL generation from table definitions.
 *
 * Generates CREATE / DROP / ALTER TABLE statements for SQLite and MySQL as
 * templates with ident markers, one template per statement. Drivers render
 * them with renderDDL().
 */

import type {Field} from "./field.js";
import type {Table} from "./table.js";
import {QueryError} from "./errors.js";
import {quoteLiteral, type SQLDialect} from "./sql.js";
import {TemplateBuilder, type Template} from "./template.js";

export interface DDLOptions {
	dialect?: SQLDialect;
	ifNotExists?: boolean;
}

export interface DropDDLOptions {
	dialect?: SQLDialect;
	ifExists?: boolean;
}

/**
 * A single schema change applied by ALTER TABLE.
 */
export type AlterOperation =
	| {kind: "add"; field: Field; after?: string}
	| {kind: "drop"; column: string}
	| {kind: "modify"; field: Field}
	| {kind: "rename"; from: string; to: string};

// ============================================================================
// Type Mapping
// ============================================================================

/**
 * Map a field to its SQL column type.
 */
export function columnType(field: Field, dialect: SQLDialect): string {
	if (field.columnType) {
		return field.columnType;
	}

	switch (field.type) {
		case "integer":
			return "INTEGER";
		case "real":
			return dialect === "mysql" ? "DOUBLE" : "REAL";
		case "boolean":
			return dialect === "mysql" ? "BOOLEAN" : "INTEGER";
		case "datetime":
			return dialect === "mysql" ? "DATETIME(3)" : "TEXT";
		case "json":
			return dialect === "mysql" ? "JSON" : "TEXT";
		case "text": {
			if (dialect !== "mysql") {
				return "TEXT";
			}
			const {maxLength} = field;
			if (maxLength !== null && maxLength <= 255) {
				return `VARCHAR(${maxLength})`;
			}
			// MySQL can't key a TEXT column without a prefix length
			if (field.primaryKey || field.unique || field.indexed) {
				return "VARCHAR(255)";
			}
			return "TEXT";
		}
	}
}

/**
 * SQL literal for a field's default value, when it has a primitive one.
 */
function defaultLiteral(field: Field, dialect: SQLDialect): string | undefined {
	if (!field.hasDefault || field.autoIncrement) {
		return undefined;
	}
	const value = field.produceDefault();
	if (typeof value === "string") {
		return quoteLiteral(value);
	}
	if (typeof value === "number") {
		return String(value);
	}
	if (typeof value === "boolean") {
		if (dialect === "sqlite") {
			return value ? "1" : "0";
		}
		return value ? "TRUE" : "FALSE";
	}
	return undefined;
}

// ============================================================================
// Column Definitions
// ============================================================================

/**
 * Append `name TYPE [modifiers]` for one column.
 * `inlinePrimaryKey` adds the SQLite inline PRIMARY KEY clause.
 */
function columnDefinition(
	builder: TemplateBuilder,
	name: string,
	field: Field,
	dialect: SQLDialect,
	inlinePrimaryKey: boolean,
): void {
	builder.ident(name);
	let definition = ` ${columnType(field, dialect)}`;

	if (field.autoIncrement) {
		definition +=
			dialect === "sqlite" ? " PRIMARY KEY AUTOINCREMENT" : " AUTO_INCREMENT";
	} else if (inlinePrimaryKey && field.primaryKey && dialect === "sqlite") {
		definition += " PRIMARY KEY";
	}

	if (!field.nullable && !field.hasDefault && !field.autoIncrement) {
		definition += " NOT NULL";
	}

	const defaultValue = defaultLiteral(field, dialect);
	if (defaultValue !== undefined) {
		definition += ` DEFAULT ${defaultValue}`;
	}

	if (field.comment && dialect === "mysql") {
		definition += ` COMMENT ${quoteLiteral(field.comment)}`;
	}

	builder.text(definition);
}

/**
 * Generate a single column definition as a template.
 */
export function generateColumnDDL(
	name: string,
	field: Field,
	dialect: SQLDialect = "sqlite",
): Template {
	const builder = new TemplateBuilder();
	columnDefinition(builder, name, field, dialect, false);
	return builder.build();
}

// ============================================================================
// CREATE TABLE
// ============================================================================

/**
 * Generate CREATE TABLE DDL, followed by CREATE INDEX statements on SQLite.
 * MySQL indexes are declared inside CREATE TABLE, since MySQL has no
 * CREATE INDEX IF NOT EXISTS.
 */
export function generateDDL(table: Table, options: DDLOptions = {}): Template[] {
	const {dialect = "sqlite", ifNotExists = true} = options;
	const exists = ifNotExists ? "IF NOT EXISTS " : "";

	const create = new TemplateBuilder()
		.text(`CREATE TABLE ${exists}`)
		.ident(table.name)
		.text(" (\n  ");

	create.join(
		[...table.fields],
		(builder, [name, field]) =>
			columnDefinition(builder, name, field, dialect, true),
		",\n  ",
	);

	if (dialect === "mysql") {
		create.text(",\n  PRIMARY KEY (").ident(table.primaryKey.name).text(")");
		for (const index of table.indexes) {
			create.text(index.unique ? ",\n  UNIQUE KEY " : ",\n  KEY ");
			create.ident(index.name).text(" (");
			create.join(index.columns, (builder, col) => builder.ident(col));
			create.text(")");
		}
	}

	create.text("\n)");

	if (dialect === "mysql") {
		create.text(` DEFAULT CHARSET=${table.charset ?? "utf8mb4"}`);
		if (table.comment) {
			create.text(` COMMENT=${quoteLiteral(table.comment)}`);
		}
	}

	const statements = [create.build()];

	if (dialect === "sqlite") {
		for (const index of table.indexes) {
			const builder = new TemplateBuilder()
				.text(index.unique ? `CREATE UNIQUE INDEX ${exists}` : `CREATE INDEX ${exists}`)
				.ident(index.name)
				.text(" ON ")
				.ident(table.name)
				.text(" (");
			builder.join(index.columns, (b, col) => b.ident(col));
			statements.push(builder.text(")").build());
		}
	}

	return statements;
}

// ============================================================================
// DROP TABLE
// ============================================================================

export function generateDropDDL(
	table: Table,
	options: DropDDLOptions = {},
): Template {
	const {ifExists = true} = options;
	return new TemplateBuilder()
		.text(ifExists ? "DROP TABLE IF EXISTS " : "DROP TABLE ")
		.ident(table.name)
		.build();
}

// ============================================================================
// ALTER TABLE
// ============================================================================

function fieldName(field: Field): string {
	if (field.name === undefined) {
		throw new QueryError("Cannot alter a column with an unnamed field");
	}
	return field.name;
}

/**
 * Generate ALTER TABLE DDL.
 *
 * MySQL applies every operation in one statement. SQLite takes one operation
 * per statement and cannot modify a column in place.
 *
 * @throws {QueryError} for modify operations on SQLite
 */
export function generateAlterDDL(
	table: Table,
	operations: readonly AlterOperation[],
	dialect: SQLDialect = "sqlite",
): Template[] {
	const appendOperation = (
		builder: TemplateBuilder,
		operation: AlterOperation,
	): void => {
		switch (operation.kind) {
			case "add":
				builder.text("ADD COLUMN ");
				columnDefinition(
					builder,
					fieldName(operation.field),
					operation.field,
					dialect,
					false,
				);
				if (operation.after && dialect === "mysql") {
					builder.text(" AFTER ").ident(operation.after);
				}
				break;
			case "drop":
				builder.text("DROP COLUMN ").ident(operation.column);
				break;
			case "modify":
				if (dialect === "sqlite") {
					throw new QueryError(
						`SQLite cannot modify column "${fieldName(operation.field)}" of table "${table.name}"`,
					);
				}
				builder.text("MODIFY COLUMN ");
				columnDefinition(
					builder,
					fieldName(operation.field),
					operation.field,
					dialect,
					false,
				);
				break;
			case "rename":
				builder
					.text("RENAME COLUMN ")
					.ident(operation.from)
					.text(" TO ")
					.ident(operation.to);
				break;
		}
	};

	if (dialect === "mysql") {
		const builder = new TemplateBuilder()
			.text("ALTER TABLE ")
			.ident(table.name)
			.text(" ");
		builder.join(operations, appendOperation);
		return [builder.build()];
	}

	return operations.map((operation) => {
		const builder = new TemplateBuilder()
			.text("ALTER TABLE ")
			.ident(table.name)
			.text(" ");
		appendOperation(builder, operation);
		return builder.build();
	});
}
