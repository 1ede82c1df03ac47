/**
 * Structured error types.
 *
 * All errors extend DatabaseError, which carries an error code for
 * programmatic handling. Schema and usage errors are thrown synchronously
 * where they are detected; driver failures pass through unchanged apart from
 * constraint violations, which drivers normalize into ConstraintViolationError.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "DUPLICATE_PRIMARY_KEY"
	| "NO_PRIMARY_KEY"
	| "DUPLICATE_FIELD"
	| "INVALID_FIELD_TYPE"
	| "SCHEMA_FROZEN"
	| "UNKNOWN_FIELD"
	| "IMMUTABLE_PRIMARY_KEY"
	| "DECODE_ERROR"
	| "REMOVE_WITHOUT_KEY"
	| "INVALID_ROW"
	| "VALIDATION_ERROR"
	| "QUERY_ERROR"
	| "CONSTRAINT_VIOLATION"
	| "CONNECTION_ERROR";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all errors raised by this package.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Schema Registration Errors
// ============================================================================

/**
 * Thrown when a second field is marked as primary key.
 */
export class DuplicatePrimaryKeyError extends DatabaseError {
	readonly model: string;
	readonly fieldName: string;

	constructor(model: string, fieldName: string, options?: ErrorOptions) {
		super(
			"DUPLICATE_PRIMARY_KEY",
			`Duplicate primary key found for field "${fieldName}" in model ${model}`,
			options,
		);
		this.name = "DuplicatePrimaryKeyError";
		this.model = model;
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when a model declares no primary key.
 */
export class NoPrimaryKeyError extends DatabaseError {
	readonly tableName: string;

	constructor(tableName: string, options?: ErrorOptions) {
		super(
			"NO_PRIMARY_KEY",
			`Primary key not found for table "${tableName}"`,
			options,
		);
		this.name = "NoPrimaryKeyError";
		this.tableName = tableName;
	}
}

/**
 * Thrown when two fields of a model resolve to the same column name.
 */
export class DuplicateFieldError extends DatabaseError {
	readonly model: string;
	readonly fieldName: string;

	constructor(model: string, fieldName: string, options?: ErrorOptions) {
		super(
			"DUPLICATE_FIELD",
			`Duplicate field name "${fieldName}" in model ${model}`,
			options,
		);
		this.name = "DuplicateFieldError";
		this.model = model;
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when a declaration entry is not a field, uses a reserved name,
 * or an index refers to something other than declared fields.
 */
export class InvalidFieldTypeError extends DatabaseError {
	readonly model: string;
	readonly key?: string;

	constructor(
		message: string,
		model: string,
		key?: string,
		options?: ErrorOptions,
	) {
		super("INVALID_FIELD_TYPE", message, options);
		this.name = "InvalidFieldTypeError";
		this.model = model;
		this.key = key;
	}
}

/**
 * Thrown on any attempt to mutate a model class after registration.
 */
export class SchemaFrozenError extends DatabaseError {
	readonly model: string;
	readonly property: string;

	constructor(model: string, property: string, options?: ErrorOptions) {
		super(
			"SCHEMA_FROZEN",
			`Model ${model} is frozen; cannot change "${property}"`,
			options,
		);
		this.name = "SchemaFrozenError";
		this.model = model;
		this.property = property;
	}
}

// ============================================================================
// Record Errors
// ============================================================================

/**
 * Thrown when a read, write or lookup names a field the table doesn't declare.
 */
export class UnknownFieldError extends DatabaseError {
	readonly tableName: string;
	readonly fieldName: string;

	constructor(tableName: string, fieldName: string, options?: ErrorOptions) {
		super(
			"UNKNOWN_FIELD",
			`Table "${tableName}" has no field "${fieldName}"`,
			options,
		);
		this.name = "UnknownFieldError";
		this.tableName = tableName;
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when the primary key of an auto-increment table is written directly.
 */
export class ImmutablePrimaryKeyError extends DatabaseError {
	readonly tableName: string;
	readonly fieldName: string;

	constructor(tableName: string, fieldName: string, options?: ErrorOptions) {
		super(
			"IMMUTABLE_PRIMARY_KEY",
			`AUTO_INCREMENT table "${tableName}" does not allow setting primary key "${fieldName}"`,
			options,
		);
		this.name = "ImmutablePrimaryKeyError";
		this.tableName = tableName;
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when remove() is called on a record whose primary key is unset.
 */
export class RemoveWithoutKeyError extends DatabaseError {
	readonly tableName: string;

	constructor(tableName: string, options?: ErrorOptions) {
		super(
			"REMOVE_WITHOUT_KEY",
			`Cannot remove a "${tableName}" record without a primary key value`,
			options,
		);
		this.name = "RemoveWithoutKeyError";
		this.tableName = tableName;
	}
}

// ============================================================================
// Data Errors
// ============================================================================

/**
 * Thrown when a driver result doesn't match a known shape, or a column
 * value can't be decoded for its field type.
 */
export class DecodeError extends DatabaseError {
	readonly fieldName?: string;

	constructor(message: string, fieldName?: string, options?: ErrorOptions) {
		super("DECODE_ERROR", message, options);
		this.name = "DecodeError";
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when a row batch is malformed (empty, mixed shapes, arity mismatch).
 */
export class InvalidRowError extends DatabaseError {
	readonly row?: number;

	constructor(message: string, row?: number, options?: ErrorOptions) {
		super("INVALID_ROW", message, options);
		this.name = "InvalidRowError";
		this.row = row;
	}
}

/**
 * Thrown when Zod validation fails during insert, replace or update.
 */
export class ValidationError extends DatabaseError {
	readonly fieldErrors: Record<string, string[]>;

	constructor(
		message: string,
		fieldErrors: Record<string, string[]> = {},
		options?: ErrorOptions,
	) {
		super("VALIDATION_ERROR", message, options);
		this.name = "ValidationError";
		this.fieldErrors = fieldErrors;
	}
}

// ============================================================================
// Execution Errors
// ============================================================================

/**
 * Thrown when a statement can't be built or executed as requested.
 */
export class QueryError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("QUERY_ERROR", message, options);
		this.name = "QueryError";
	}
}

export type ConstraintKind =
	| "unique"
	| "foreign_key"
	| "check"
	| "not_null"
	| "unknown";

/**
 * Thrown when a database constraint is violated.
 *
 * Drivers convert their native errors into this shape. Fields other than
 * `kind` are best-effort and may be undefined.
 */
export class ConstraintViolationError extends DatabaseError {
	readonly kind: ConstraintKind;
	readonly constraint?: string;
	readonly table?: string;
	readonly column?: string;

	constructor(
		message: string,
		details: {
			kind: ConstraintKind;
			constraint?: string;
			table?: string;
			column?: string;
		},
		options?: ErrorOptions,
	) {
		super("CONSTRAINT_VIOLATION", message, options);
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
		this.column = details.column;
	}
}

/**
 * Thrown when no driver is available or a connection URL is not understood.
 */
export class ConnectionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
		this.name = "ConnectionError";
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}
