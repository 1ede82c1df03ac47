/**
 * Table metadata and schema registration.
 *
 * A model definition is turned, once, into an immutable Table: its fields in
 * declaration order, exactly one primary key, and validated indexes.
 */

import {z} from "zod";

import {column, isField, type Field} from "./field.js";
import {
	ConnectionError,
	DuplicateFieldError,
	DuplicatePrimaryKeyError,
	InvalidFieldTypeError,
	NoPrimaryKeyError,
	UnknownFieldError,
} from "./errors.js";
import type {ExecutionOutcome} from "./codec.js";
import type {Database, Driver} from "./database.js";
import {Alter, Show} from "./query.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Model shape: each key is a Field or a bare Zod schema.
 */
export type Shape = Record<string, Field | z.ZodType>;

export interface Index {
	readonly name: string;
	readonly columns: readonly string[];
	readonly unique: boolean;
}

export interface IndexDefinition {
	/** Defaults to idx_<table>_<col1>_<col2> */
	name?: string;
	columns: readonly string[];
	unique?: boolean;
}

/**
 * Reserved declaration keys, kept apart from the field shape.
 */
export interface TableOptions {
	/** Table name; defaults to the lower-cased model name */
	table?: string;
	database?: Database;
	indexes?: readonly IndexDefinition[];
	/** Table character set (MySQL) */
	charset?: string;
	/** Table comment */
	comment?: string;
}

export interface PrimaryKey {
	readonly field: Field;
	readonly name: string;
	readonly autoIncrement: boolean;
}

export type SchemaWarningKind = "missing-table-name" | "auto-increment-name";

/**
 * A non-fatal notice raised while registering a model.
 */
export interface SchemaWarning {
	readonly kind: SchemaWarningKind;
	readonly model: string;
	readonly message: string;
}

/**
 * Receives schema warnings. Must not throw.
 */
export type Diagnostics = (warning: SchemaWarning) => void;

export const defaultDiagnostics: Diagnostics = (warning) => {
	console.warn(warning.message);
};

/**
 * Conventional name for an auto-increment primary key.
 */
export const AUTO_INCREMENT_KEY = "id";

/**
 * Names a record instance already uses; a field with one of these names would
 * shadow the member.
 */
export const RESERVED_NAMES: ReadonlySet<string> = new Set([
	"constructor",
	"get",
	"set",
	"save",
	"remove",
	"snapshot",
	"toJSON",
	"toString",
	"table",
]);

// ============================================================================
// Table
// ============================================================================

export interface CreateTableOptions {
	ifNotExists?: boolean;
}

export interface DropTableOptions {
	ifExists?: boolean;
}

/**
 * Read-only view of a table's fields in declaration order.
 */
export class FieldMap implements ReadonlyMap<string, Field> {
	readonly #fields: Map<string, Field>;

	constructor(fields: Iterable<readonly [string, Field]>) {
		this.#fields = new Map(fields);
		Object.freeze(this);
	}

	get size(): number {
		return this.#fields.size;
	}

	get(name: string): Field | undefined {
		return this.#fields.get(name);
	}

	has(name: string): boolean {
		return this.#fields.has(name);
	}

	forEach(
		callback: (field: Field, name: string, map: ReadonlyMap<string, Field>) => void,
		thisArg?: unknown,
	): void {
		for (const [name, field] of this.#fields) {
			callback.call(thisArg, field, name, this);
		}
	}

	keys() {
		return this.#fields.keys();
	}

	values() {
		return this.#fields.values();
	}

	entries() {
		return this.#fields.entries();
	}

	[Symbol.iterator]() {
		return this.#fields[Symbol.iterator]();
	}
}

interface TableInit {
	name: string;
	modelName: string;
	fields: Map<string, Field>;
	primaryKey: PrimaryKey;
	indexes: Index[];
	charset?: string;
	comment?: string;
	database?: Database;
}

/**
 * Immutable table metadata, created by registerTable().
 */
export class Table {
	readonly name: string;
	readonly modelName: string;
	readonly fields: FieldMap;
	readonly columns: readonly string[];
	readonly primaryKey: PrimaryKey;
	readonly indexes: readonly Index[];
	readonly charset: string | undefined;
	readonly comment: string | undefined;
	readonly database: Database | undefined;

	constructor(init: TableInit) {
		this.name = init.name;
		this.modelName = init.modelName;
		this.fields = new FieldMap(init.fields);
		this.columns = Object.freeze([...init.fields.keys()]);
		this.primaryKey = Object.freeze({...init.primaryKey});
		this.indexes = Object.freeze(
			init.indexes.map((index) =>
				Object.freeze({...index, columns: Object.freeze([...index.columns])}),
			),
		);
		this.charset = init.charset;
		this.comment = init.comment;
		this.database = init.database;
		Object.freeze(this);
	}

	/**
	 * Look up a declared field.
	 * @throws {UnknownFieldError} if the table has no such field
	 */
	field(name: string): Field {
		const field = this.fields.get(name);
		if (!field) {
			throw new UnknownFieldError(this.name, name);
		}
		return field;
	}

	hasField(name: string): boolean {
		return this.fields.has(name);
	}

	/**
	 * The driver of the bound database.
	 * @throws {ConnectionError} if no database or driver is bound
	 */
	get driver(): Driver {
		if (!this.database) {
			throw new ConnectionError(
				`Table "${this.name}" is not bound to a database`,
			);
		}
		return this.database.driver;
	}

	async create(options: CreateTableOptions = {}): Promise<ExecutionOutcome> {
		return this.driver.createTable(this, options);
	}

	async drop(options: DropTableOptions = {}): Promise<ExecutionOutcome> {
		return this.driver.dropTable(this, options);
	}

	/**
	 * Start a schema change.
	 *
	 * @example
	 * await Person.table.alter().add(column(z.string(), {name: "nick"})).do();
	 */
	alter(): Alter {
		return new Alter(this);
	}

	/**
	 * Describe the table as it currently exists in the database.
	 */
	show(): Show {
		return new Show(this);
	}

	toString(): string {
		return `<Table(${this.name})>`;
	}
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Resolve a shape entry to a named field.
 */
function resolveField(modelName: string, key: string, value: unknown): Field {
	if (isField(value)) {
		return value.name === undefined ? value.named(key) : value;
	}
	if (value instanceof z.ZodType) {
		return column(value).named(key);
	}
	throw new InvalidFieldTypeError(
		`Invalid field "${key}" in model ${modelName}: expected a field or a Zod schema`,
		modelName,
		key,
	);
}

function isIndexDefinition(value: unknown): value is IndexDefinition {
	return (
		typeof value === "object" &&
		value !== null &&
		"columns" in value &&
		Array.isArray(value.columns)
	);
}

/**
 * Turn a model definition into an immutable Table.
 *
 * @throws {InvalidFieldTypeError} for entries that aren't fields, reserved names
 *   and indexes over unknown fields
 * @throws {DuplicateFieldError} when two fields resolve to the same name
 * @throws {DuplicatePrimaryKeyError} at the second primary key
 * @throws {NoPrimaryKeyError} when no field is a primary key
 */
export function registerTable(
	modelName: string,
	shape: Shape,
	options: TableOptions = {},
	diagnostics: Diagnostics = defaultDiagnostics,
): Table {
	let name = options.table;
	if (!name) {
		name = modelName.toLowerCase();
		diagnostics({
			kind: "missing-table-name",
			model: modelName,
			message: `Model ${modelName} declares no table name; using "${name}"`,
		});
	}

	const fields = new Map<string, Field>();
	let primaryKey: PrimaryKey | undefined;

	for (const [key, value] of Object.entries(shape)) {
		const field = resolveField(modelName, key, value);
		const fieldName = field.name ?? key;

		if (RESERVED_NAMES.has(fieldName)) {
			throw new InvalidFieldTypeError(
				`Field name "${fieldName}" in model ${modelName} is reserved`,
				modelName,
				key,
			);
		}
		if (fields.has(fieldName)) {
			throw new DuplicateFieldError(modelName, fieldName);
		}

		if (field.primaryKey) {
			if (primaryKey) {
				throw new DuplicatePrimaryKeyError(modelName, fieldName);
			}
			primaryKey = {field, name: fieldName, autoIncrement: field.autoIncrement};
			if (field.autoIncrement && fieldName !== AUTO_INCREMENT_KEY) {
				diagnostics({
					kind: "auto-increment-name",
					model: modelName,
					message: `Model ${modelName} uses "${fieldName}" as its auto-increment key; "${AUTO_INCREMENT_KEY}" is expected`,
				});
			}
		}

		fields.set(fieldName, field);
	}

	if (!primaryKey) {
		throw new NoPrimaryKeyError(name);
	}

	const indexes: Index[] = [];
	for (const [fieldName, field] of fields) {
		if (field.unique && !field.primaryKey) {
			indexes.push({
				name: `idx_${name}_${fieldName}`,
				columns: [fieldName],
				unique: true,
			});
		} else if (field.indexed) {
			indexes.push({
				name: `idx_${name}_${fieldName}`,
				columns: [fieldName],
				unique: false,
			});
		}
	}

	for (const definition of options.indexes ?? []) {
		if (!isIndexDefinition(definition) || definition.columns.length === 0) {
			throw new InvalidFieldTypeError(
				`Invalid index in model ${modelName}: expected {columns: [...]}`,
				modelName,
			);
		}
		for (const col of definition.columns) {
			if (typeof col !== "string" || !fields.has(col)) {
				throw new InvalidFieldTypeError(
					`Index in model ${modelName} refers to unknown field "${String(col)}"`,
					modelName,
					String(col),
				);
			}
		}
		indexes.push({
			name: definition.name ?? `idx_${name}_${definition.columns.join("_")}`,
			columns: [...definition.columns],
			unique: definition.unique ?? false,
		});
	}

	return new Table({
		name,
		modelName,
		fields,
		primaryKey,
		indexes,
		charset: options.charset,
		comment: options.comment,
		database: options.database,
	});
}
