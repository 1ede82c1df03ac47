/**
 * tessera - a small ORM for Node.js
 *
 * Declare models. Build statements. Get records.
 */

export {z} from "zod";

// ============================================================================
// Fields
// ============================================================================

export {
	Field,
	column,
	primary,
	unique,
	index,
	isField,
	inferFieldType,
	type FieldType,
	type FieldOptions,
} from "./impl/field.js";

// ============================================================================
// Tables & Models
// ============================================================================

export {
	Table,
	FieldMap,
	registerTable,
	defaultDiagnostics,
	AUTO_INCREMENT_KEY,
	RESERVED_NAMES,
	type Shape,
	type Index,
	type IndexDefinition,
	type TableOptions,
	type PrimaryKey,
	type SchemaWarning,
	type SchemaWarningKind,
	type Diagnostics,
	type CreateTableOptions,
	type DropTableOptions,
} from "./impl/table.js";

export {
	Model,
	model,
	type ModelClass,
	type ModelStatics,
	type ModelOptions,
	type Values,
	type Fields,
	type Instance,
} from "./impl/model.js";

// ============================================================================
// Statements
// ============================================================================

export {
	Select,
	SelectQuery,
	Insert,
	Replace,
	Update,
	Delete,
	Alter,
	Show,
	type Where,
	type Condition,
	type ConditionOperators,
	type Direction,
	type Decoder,
	type SelectState,
} from "./impl/query.js";

export {Rows, type RowInput, type RowsOptions} from "./impl/rows.js";

// ============================================================================
// Results
// ============================================================================

export {
	load,
	FetchResult,
	ExecutionOutcome,
	encodeValue,
	decodeValue,
	type RawRow,
	type ModelConstructor,
} from "./impl/codec.js";

// ============================================================================
// Database
// ============================================================================

export {
	Database,
	type Driver,
	type TableDescription,
	type ColumnInfo,
	type IndexInfo,
	type ConnectOptions,
	type SQLiteOptions,
	type MySQLOptions,
} from "./impl/database.js";

// ============================================================================
// SQL
// ============================================================================

export {ident, isSQLIdentifier, type SQLIdentifier, type Template} from "./impl/template.js";
export {renderSQL, renderDDL, quoteIdent, type SQLDialect, type RenderedSQL} from "./impl/sql.js";
export {
	generateDDL,
	generateDropDDL,
	generateAlterDDL,
	generateColumnDDL,
	type AlterOperation,
} from "./impl/ddl.js";

// ============================================================================
// Errors
// ============================================================================

export {
	DatabaseError,
	DuplicatePrimaryKeyError,
	NoPrimaryKeyError,
	DuplicateFieldError,
	InvalidFieldTypeError,
	SchemaFrozenError,
	UnknownFieldError,
	ImmutablePrimaryKeyError,
	RemoveWithoutKeyError,
	DecodeError,
	InvalidRowError,
	ValidationError,
	QueryError,
	ConstraintViolationError,
	ConnectionError,
	isDatabaseError,
	hasErrorCode,
	type DatabaseErrorCode,
	type ConstraintKind,
} from "./impl/errors.js";
