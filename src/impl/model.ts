/**
 * Model records and the model() definition hook.
 *
 * model() registers a Table once and returns a class whose instances are
 * records of that table. Field values live in a private map; typed accessors
 * on the prototype route through get() and set().
 */

import type {z} from "zod";

import {
	LOAD,
	type ExecutionOutcome,
	type FetchResult,
	type RawRow,
} from "./codec.js";
import {
	ImmutablePrimaryKeyError,
	RemoveWithoutKeyError,
	SchemaFrozenError,
} from "./errors.js";
import type {Field} from "./field.js";
import {Alter, Delete, Insert, Replace, Select, Show, Update} from "./query.js";
import {Rows} from "./rows.js";
import {
	registerTable,
	type CreateTableOptions,
	type Diagnostics,
	type DropTableOptions,
	type Shape,
	type Table,
	type TableOptions,
} from "./table.js";

// ============================================================================
// Types
// ============================================================================

type FieldValue<F> =
	F extends Field<infer T, string>
		? z.output<T>
		: F extends z.ZodType
			? z.output<F>
			: never;

/**
 * Column name of a shape entry: the field's literal name, else its key.
 */
type FieldKey<K extends string, F> =
	F extends Field<z.ZodType, infer N> ? (string extends N ? K : N) : K;

/**
 * Field values of a shape, keyed by column name.
 */
export type Values<S extends Shape> = {
	[K in keyof S & string as FieldKey<K, S[K]>]: FieldValue<S[K]>;
};

/**
 * Accessor properties of a record; unset fields read as undefined.
 */
export type Fields<V> = {[K in keyof V]: V[K] | undefined};

export type Instance<S extends Shape> = Model<Values<S>> & Fields<Values<S>>;

export interface ModelOptions extends TableOptions {
	/** Receives schema warnings; defaults to console.warn */
	diagnostics?: Diagnostics;
}

function toRow(values: object): RawRow {
	return Object.fromEntries(Object.entries(values));
}

// ============================================================================
// Model
// ============================================================================

/**
 * Base class of every record.
 */
export class Model<V extends object = RawRow> {
	readonly #table: Table;
	readonly #values = new Map<string, unknown>();

	constructor(table: Table, values: Partial<V> = {}) {
		this.#table = table;
		for (const [name, value] of Object.entries(values)) {
			this.set(name, value);
		}
		Object.preventExtensions(this);
	}

	/**
	 * Read a field; undefined when unset.
	 * @throws {UnknownFieldError} if the table has no such field
	 */
	get<K extends keyof V & string>(name: K): V[K] | undefined;
	get(name: string): unknown;
	get(name: string): unknown {
		this.#table.field(name);
		return this.#values.get(name);
	}

	/**
	 * Write a field.
	 * @throws {UnknownFieldError} if the table has no such field
	 * @throws {ImmutablePrimaryKeyError} when writing an auto-increment key
	 */
	set<K extends keyof V & string>(name: K, value: V[K]): void;
	set(name: string, value: unknown): void;
	set(name: string, value: unknown): void {
		const table = this.#table;
		table.field(name);
		if (table.primaryKey.autoIncrement && name === table.primaryKey.name) {
			throw new ImmutablePrimaryKeyError(table.name, name);
		}
		this.#values.set(name, value);
	}

	[LOAD](name: string, value: unknown): void {
		this.#values.set(name, value);
	}

	/**
	 * Field values in declaration order, with defaults for unset fields.
	 * Fields that are still undefined are left out.
	 */
	snapshot(): RawRow {
		const snapshot: RawRow = {};
		for (const [name, field] of this.#table.fields) {
			const value = this.#values.has(name)
				? this.#values.get(name)
				: field.produceDefault();
			if (value !== undefined) {
				snapshot[name] = value;
			}
		}
		return snapshot;
	}

	toJSON(): RawRow {
		return this.snapshot();
	}

	toString(): string {
		const {modelName, name, comment} = this.#table;
		return comment
			? `<${modelName}(table '${name}': ${comment})>`
			: `<${modelName}(table '${name}')>`;
	}

	/**
	 * Write the record with REPLACE INTO. A generated key is stored back on
	 * the record.
	 */
	async save(): Promise<ExecutionOutcome> {
		const table = this.#table;
		const outcome = await new Replace(
			table,
			new Rows(this.snapshot(), {table}),
		).do();
		if (outcome.lastId !== null) {
			this[LOAD](table.primaryKey.name, outcome.lastId);
		}
		return outcome;
	}

	/**
	 * Delete the record's row by primary key.
	 * @throws {RemoveWithoutKeyError} when the key is unset
	 */
	async remove(): Promise<ExecutionOutcome> {
		const table = this.#table;
		const {name} = table.primaryKey;
		const key = this.#values.get(name);
		if (key === undefined || key === null) {
			throw new RemoveWithoutKeyError(table.name);
		}
		return new Delete(table).where({[name]: key}).do();
	}
}

/**
 * Prototype link between a model's accessors and Model.prototype. Assignments
 * to names that no accessor handles end up here and go through set().
 */
const undeclaredWrites = new Proxy<object>(Object.create(Model.prototype), {
	set(target, property, value, receiver) {
		if (typeof property === "string" && receiver instanceof Model) {
			receiver.set(property, value);
			return true;
		}
		return Reflect.set(target, property, value, receiver);
	},
});

// ============================================================================
// Model Classes
// ============================================================================

/**
 * Statement shortcuts every model class carries.
 */
export interface ModelStatics<V extends object, I extends Model<V>> {
	readonly table: Table;
	field(name: keyof V & string): Field;
	get(id: unknown): Promise<I>;
	getMany(
		ids: readonly unknown[],
		columns?: readonly (keyof V & string)[],
	): Promise<FetchResult<I>>;
	add(record: I): Insert;
	addMany(records: readonly I[]): Insert;
	select(...columns: (keyof V & string)[]): Select<I, V>;
	insert(values: Partial<V>): Insert;
	insertMany(
		rows: readonly (Partial<V> | readonly unknown[])[],
		columns?: readonly (keyof V & string)[],
	): Insert;
	update(values: Partial<V>): Update<V>;
	delete(): Delete<V>;
	replace(values: Partial<V>): Replace;
	createTable(options?: CreateTableOptions): Promise<ExecutionOutcome>;
	dropTable(options?: DropTableOptions): Promise<ExecutionOutcome>;
	alter(): Alter;
	show(): Show;
}

export interface ModelClass<S extends Shape>
	extends ModelStatics<Values<S>, Instance<S>> {
	new (values?: Partial<Values<S>>): Instance<S>;
	readonly prototype: Instance<S>;
}

/**
 * Wrap a model class so that it can no longer be changed.
 */
function freezeModel<C extends object>(cls: C, name: string): C {
	const frozen = (property: string | symbol): never => {
		throw new SchemaFrozenError(name, String(property));
	};
	return new Proxy(cls, {
		set: (_target, property) => frozen(property),
		defineProperty: (_target, property) => frozen(property),
		deleteProperty: (_target, property) => frozen(property),
		setPrototypeOf: () => frozen("prototype"),
	});
}

/**
 * Define a model.
 *
 * @example
 * const Person = model("Person", {
 *   id: primary(z.number().int(), {autoIncrement: true}),
 *   name: z.string().max(64),
 *   email: unique(z.string().email()),
 * }, {table: "person", database: db});
 *
 * const {lastId} = await Person.insert({name: "Alice", email: "a@example.com"}).do();
 * const alice = await Person.get(lastId);
 */
export function model<S extends Shape>(
	name: string,
	shape: S,
	options: ModelOptions = {},
): ModelClass<S> {
	type V = Values<S>;
	type I = Instance<S>;

	const {diagnostics, ...tableOptions} = options;
	const table = registerTable(name, shape, tableOptions, diagnostics);
	const key = table.primaryKey.name;

	const Defined = class extends Model<V> {
		constructor(values?: Partial<V>) {
			super(table, values);
		}
	};
	Object.defineProperty(Defined, "name", {value: name});

	for (const column of table.columns) {
		Object.defineProperty(Defined.prototype, column, {
			get(this: Model) {
				return this.get(column);
			},
			set(this: Model, value: unknown) {
				this.set(column, value);
			},
			enumerable: true,
		});
	}
	Object.setPrototypeOf(Defined.prototype, undeclaredWrites);

	const statics: ModelStatics<V, I> = {
		table,
		field: (column) => table.field(column),
		get: async (id) => new Select<I>(self).where({[key]: id}).first(),
		getMany: async (ids, columns = []) =>
			new Select<I>(self, columns).where({[key]: {$in: ids}}).all(),
		add: (record) => new Insert(table, new Rows(record.snapshot(), {table})),
		addMany: (records) =>
			new Insert(
				table,
				new Rows(
					records.map((record) => record.snapshot()),
					{table},
				),
			),
		select: (...columns) => new Select<I, V>(self, columns),
		insert: (values) => new Insert(table, new Rows(toRow(values), {table})),
		insertMany: (rows, columns) =>
			new Insert(
				table,
				new Rows(
					rows.map((row) => (Array.isArray(row) ? [...row] : toRow(row))),
					{table, columns},
				),
			),
		update: (values) => new Update<V>(table, values),
		delete: () => new Delete<V>(table),
		replace: (values) => new Replace(table, new Rows(toRow(values), {table})),
		createTable: (options) => table.create(options),
		dropTable: (options) => table.drop(options),
		alter: () => table.alter(),
		show: () => table.show(),
	};

	// Accessors are defined at runtime, so the class is typed by hand
	const self = freezeModel(
		Object.assign(Defined, statics) as ModelClass<S>,
		name,
	);
	Object.defineProperty(Defined.prototype, "constructor", {value: self});
	Object.freeze(Defined.prototype);
	Object.freeze(Defined);
	return self;
}
