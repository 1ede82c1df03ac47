/**
 * Template utilities for building SQL statements.
 *
 * Statements are built as templates: a strings array plus the values that sit
 * between them, with the invariant strings.length === values.length + 1.
 * Identifiers travel as ident() markers and are quoted by drivers; every other
 * value becomes a bound parameter. Rendering happens in drivers only.
 */

// ============================================================================
// SQL Identifiers
// ============================================================================

const SQL_IDENT = Symbol.for("tessera:ident");

/**
 * SQL identifier (table, column or index name) to be quoted by drivers.
 *
 * - MySQL: backticks (`name`)
 * - SQLite: double quotes ("name")
 */
export interface SQLIdentifier {
	readonly [SQL_IDENT]: true;
	readonly name: string;
}

/**
 * Create an SQL identifier marker.
 */
export function ident(name: string): SQLIdentifier {
	return {[SQL_IDENT]: true, name};
}

/**
 * Check if a value is an SQL identifier marker.
 */
export function isSQLIdentifier(value: unknown): value is SQLIdentifier {
	return (
		value !== null &&
		typeof value === "object" &&
		SQL_IDENT in value &&
		value[SQL_IDENT] === true
	);
}

// ============================================================================
// Templates
// ============================================================================

/**
 * A statement ready to hand to a driver.
 */
export interface Template {
	readonly strings: TemplateStringsArray;
	readonly values: readonly unknown[];
}

/**
 * Build a TemplateStringsArray from string parts.
 * Used to construct templates programmatically while preserving the .raw property.
 */
export function makeTemplate(parts: string[]): TemplateStringsArray {
	return Object.assign([...parts], {raw: parts}) as TemplateStringsArray;
}

/**
 * Accumulates a template one piece at a time.
 *
 * @example
 * new TemplateBuilder()
 *   .text("DELETE FROM ").ident("person")
 *   .text(" WHERE ").ident("id").text(" = ").value(7)
 *   .build();
 * // strings: ["DELETE FROM ", " WHERE ", " = ", ""], values: [ident, ident, 7]
 */
export class TemplateBuilder {
	readonly #strings: string[] = [""];
	readonly #values: unknown[] = [];

	/** Append raw SQL text. */
	text(sql: string): this {
		this.#strings[this.#strings.length - 1] += sql;
		return this;
	}

	/** Append a value slot (a parameter, or a marker the driver resolves). */
	value(value: unknown): this {
		this.#values.push(value);
		this.#strings.push("");
		return this;
	}

	/** Append an identifier to be quoted by the driver. */
	ident(name: string): this {
		return this.value(ident(name));
	}

	/**
	 * Append each item through `each`, separated by `separator`.
	 */
	join<T>(
		items: readonly T[],
		each: (builder: this, item: T) => void,
		separator = ", ",
	): this {
		items.forEach((item, i) => {
			if (i > 0) this.text(separator);
			each(this, item);
		});
		return this;
	}

	/**
	 * Merge another template into this one.
	 * Its first string joins our last string; the rest are pushed in order.
	 */
	merge(template: Template): this {
		const {strings, values} = template;
		this.text(strings[0]);
		for (let i = 0; i < values.length; i++) {
			this.#values.push(values[i]);
			this.#strings.push(strings[i + 1]);
		}
		return this;
	}

	build(): Template {
		return {
			strings: makeTemplate([...this.#strings]),
			values: [...this.#values],
		};
	}
}
