/**
 * Field descriptors.
 *
 * A field pairs a Zod schema (the column's application value) with its
 * database metadata. Fields are immutable; registration names an unnamed
 * field by creating a named copy.
 */

import {z} from "zod";

// ============================================================================
// Types
// ============================================================================

/**
 * Declared type tag of a column, inferred from its Zod schema.
 */
export type FieldType =
	| "text"
	| "integer"
	| "real"
	| "boolean"
	| "datetime"
	| "json";

export interface FieldOptions<N extends string = string> {
	/** Column name; defaults to the key the field is declared under */
	name?: N;
	primaryKey?: boolean;
	/** Implies primaryKey */
	autoIncrement?: boolean;
	unique?: boolean;
	indexed?: boolean;
	/** Explicit column type override for DDL generation */
	columnType?: string;
	comment?: string;
	/** Produces a value for the column when a record leaves it unset */
	default?: () => unknown;
}

// ============================================================================
// Schema Inspection
// ============================================================================

interface UnwrapResult {
	core: unknown;
	nullable: boolean;
}

/**
 * Peel Optional/Nullable/Default wrappers off a schema.
 */
function unwrapType(schema: z.ZodType): UnwrapResult {
	let core: unknown = schema;
	let nullable = false;

	while (true) {
		if (core instanceof z.ZodOptional || core instanceof z.ZodNullable) {
			nullable = true;
			core = core.unwrap();
			continue;
		}
		if (core instanceof z.ZodDefault) {
			core = core.unwrap();
			continue;
		}
		break;
	}

	return {core, nullable};
}

/**
 * Maximum length of a string schema, or null when unbounded or not a string.
 */
function maxLengthOf(schema: z.ZodType): number | null {
	const {core} = unwrapType(schema);
	return core instanceof z.ZodString ? core.maxLength : null;
}

/**
 * Infer the declared type tag of a schema.
 * Unknown schema kinds are stored as text.
 */
export function inferFieldType(schema: z.ZodType): FieldType {
	const {core} = unwrapType(schema);
	if (core instanceof z.ZodNumber) {
		return core.isInt ? "integer" : "real";
	}
	if (core instanceof z.ZodBoolean) return "boolean";
	if (core instanceof z.ZodDate) return "datetime";
	if (core instanceof z.ZodObject || core instanceof z.ZodArray) return "json";
	return "text";
}

// ============================================================================
// Field
// ============================================================================

/**
 * Metadata for one table column.
 *
 * @example
 * new Field(z.number().int(), {primaryKey: true, autoIncrement: true})
 */
export class Field<T extends z.ZodType = z.ZodType, const N extends string = string> {
	readonly name: N | undefined;
	readonly schema: T;
	readonly type: FieldType;
	readonly nullable: boolean;
	readonly maxLength: number | null;
	readonly primaryKey: boolean;
	readonly autoIncrement: boolean;
	readonly unique: boolean;
	readonly indexed: boolean;
	readonly columnType: string | undefined;
	readonly comment: string | undefined;
	readonly #options: FieldOptions<N>;
	readonly #default: (() => unknown) | undefined;

	constructor(schema: T, options: FieldOptions<N> = {}) {
		this.#options = {...options};
		this.name = options.name;
		this.schema = schema;
		this.type = inferFieldType(schema);
		this.nullable = unwrapType(schema).nullable;
		this.maxLength = maxLengthOf(schema);
		this.autoIncrement = options.autoIncrement ?? false;
		this.primaryKey = (options.primaryKey ?? false) || this.autoIncrement;
		this.unique = options.unique ?? false;
		this.indexed = options.indexed ?? false;
		this.columnType = options.columnType;
		this.comment = options.comment;

		if (options.default) {
			this.#default = options.default;
		} else if (schema instanceof z.ZodDefault) {
			this.#default = () => schema.parse(undefined);
		}

		Object.freeze(this);
	}

	/**
	 * Return a copy of this field carrying the given column name.
	 */
	named<M extends string>(name: M): Field<T, M> {
		return new Field(this.schema, {...this.#options, name});
	}

	/**
	 * Whether the field has a default-value producer.
	 */
	get hasDefault(): boolean {
		return this.#default !== undefined;
	}

	/**
	 * Produce the default value, or undefined when the field has none.
	 */
	produceDefault(): unknown {
		return this.#default?.();
	}

	/**
	 * Validate an application value against the field's schema.
	 * Returns the parsed value or the list of issue messages.
	 */
	validate(
		value: unknown,
	): {success: true; value: unknown} | {success: false; issues: string[]} {
		const result = this.schema.safeParse(value);
		if (result.success) {
			return {success: true, value: result.data};
		}
		return {
			success: false,
			issues: result.error.issues.map((issue) => issue.message),
		};
	}
}

/**
 * Check if a value is a field descriptor.
 */
export function isField(value: unknown): value is Field {
	return value instanceof Field;
}

// ============================================================================
// Field Factories
// ============================================================================

/**
 * Declare a plain column.
 *
 * @example
 * nickname: column(z.string().max(32), {name: "nick"})
 */
export function column<T extends z.ZodType, const N extends string = string>(
	schema: T,
	options: FieldOptions<N> = {},
): Field<T, N> {
	return new Field(schema, options);
}

/**
 * Mark a field as the primary key.
 *
 * @example
 * id: primary(z.number().int(), {autoIncrement: true})
 */
export function primary<T extends z.ZodType>(
	schema: T,
	options: {autoIncrement?: boolean} = {},
): Field<T> {
	return new Field(schema, {
		primaryKey: true,
		autoIncrement: options.autoIncrement,
	});
}

/**
 * Mark a field as unique.
 *
 * @example
 * email: unique(z.string().email())
 */
export function unique<T extends z.ZodType>(schema: T): Field<T> {
	return new Field(schema, {unique: true});
}

/**
 * Create an index on this field.
 *
 * @example
 * createdAt: index(z.date())
 */
export function index<T extends z.ZodType>(schema: T): Field<T> {
	return new Field(schema, {indexed: true});
}
