/**
 * Dialect rendering: identifier quoting, DDL literals, and turning templates
 * into SQL text. Builders never quote anything themselves.
 */

import {QueryError} from "./errors.js";
import {isSQLIdentifier, type Template} from "./template.js";

// ============================================================================
// Types
// ============================================================================

export type SQLDialect = "sqlite" | "mysql";

export interface RenderedSQL {
	sql: string;
	params: unknown[];
}

// ============================================================================
// Core Helpers
// ============================================================================

/**
 * Backticks on MySQL, double quotes on SQLite.
 */
export function quoteIdent(name: string, dialect: SQLDialect): string {
	if (dialect === "mysql") {
		return `\`${name.replace(/`/g, "``")}\``;
	}
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Quote a string literal for inlining into DDL.
 */
export function quoteLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render a template to SQL with `?` placeholders.
 * Identifiers are quoted inline; every other value becomes a parameter.
 */
export function renderSQL(
	strings: TemplateStringsArray,
	values: readonly unknown[],
	dialect: SQLDialect,
): RenderedSQL {
	let sql = strings[0];
	const params: unknown[] = [];

	for (let i = 0; i < values.length; i++) {
		const value = values[i];
		if (isSQLIdentifier(value)) {
			sql += quoteIdent(value.name, dialect) + strings[i + 1];
		} else {
			sql += "?" + strings[i + 1];
			params.push(value);
		}
	}

	return {sql, params};
}

/**
 * Render a DDL template. Every value must be an identifier; DDL takes no
 * bound parameters.
 * @throws {QueryError} for any other value
 */
export function renderDDL(template: Template, dialect: SQLDialect): string {
	const {strings, values} = template;
	let sql = strings[0];
	for (let i = 0; i < values.length; i++) {
		const value = values[i];
		if (!isSQLIdentifier(value)) {
			throw new QueryError(`Unexpected value in DDL template: ${String(value)}`);
		}
		sql += quoteIdent(value.name, dialect) + strings[i + 1];
	}
	return sql;
}

