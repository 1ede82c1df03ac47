import {describe, test, expect, vi} from "vitest";
import {z} from "zod";
import {column, primary, unique, index} from "./field.js";
import {FieldMap, registerTable, type SchemaWarning} from "./table.js";
import {
	ConnectionError,
	DuplicateFieldError,
	DuplicatePrimaryKeyError,
	InvalidFieldTypeError,
	NoPrimaryKeyError,
	UnknownFieldError,
} from "./errors.js";
import {Database} from "./database.js";

function collect(): {warnings: SchemaWarning[]; sink: (w: SchemaWarning) => void} {
	const warnings: SchemaWarning[] = [];
	return {warnings, sink: (warning) => warnings.push(warning)};
}

describe("registerTable", () => {
	test("fields in declaration order", () => {
		const table = registerTable(
			"Person",
			{
				id: primary(z.number().int(), {autoIncrement: true}),
				name: z.string(),
				email: unique(z.string().email()),
			},
			{table: "person"},
		);

		expect(table.name).toBe("person");
		expect(table.modelName).toBe("Person");
		expect(table.columns).toEqual(["id", "name", "email"]);
		expect(table.primaryKey.name).toBe("id");
		expect(table.primaryKey.autoIncrement).toBe(true);
		expect(table.field("name").name).toBe("name");
		expect(table.field("name").type).toBe("text");
	});

	test("bare schemas become columns named after their key", () => {
		const table = registerTable("Tag", {
			label: primary(z.string()),
			weight: z.number(),
		}, {table: "tag"});
		expect(table.field("weight").name).toBe("weight");
		expect(table.field("weight").type).toBe("real");
	});

	test("explicit field names replace the key", () => {
		const table = registerTable("User", {
			id: primary(z.string()),
			nickname: column(z.string(), {name: "nick"}),
		}, {table: "user"});
		expect(table.columns).toEqual(["id", "nick"]);
		expect(table.hasField("nickname")).toBe(false);
	});

	test("missing table name falls back to lower-cased model name with a warning", () => {
		const {warnings, sink} = collect();
		const table = registerTable("BlogPost", {id: primary(z.string())}, {}, sink);
		expect(table.name).toBe("blogpost");
		expect(warnings).toEqual([
			{
				kind: "missing-table-name",
				model: "BlogPost",
				message: 'Model BlogPost declares no table name; using "blogpost"',
			},
		]);
	});

	test("default sink writes to console.warn", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		try {
			registerTable("Quiet", {id: primary(z.string())});
			expect(warn).toHaveBeenCalledWith(
				'Model Quiet declares no table name; using "quiet"',
			);
		} finally {
			warn.mockRestore();
		}
	});

	test("auto-increment key not named id warns", () => {
		const {warnings, sink} = collect();
		registerTable(
			"Order",
			{orderId: primary(z.number().int(), {autoIncrement: true})},
			{table: "orders"},
			sink,
		);
		expect(warnings).toHaveLength(1);
		expect(warnings[0].kind).toBe("auto-increment-name");
		expect(warnings[0].message).toBe(
			'Model Order uses "orderId" as its auto-increment key; "id" is expected',
		);
	});

	test("no warnings for a complete definition", () => {
		const {warnings, sink} = collect();
		registerTable(
			"Person",
			{id: primary(z.number().int(), {autoIncrement: true})},
			{table: "person"},
			sink,
		);
		expect(warnings).toEqual([]);
	});

	test("no primary key", () => {
		expect(() =>
			registerTable("Loose", {name: z.string()}, {table: "loose"}),
		).toThrow(NoPrimaryKeyError);
	});

	test("two primary keys", () => {
		expect(() =>
			registerTable(
				"Twice",
				{a: primary(z.string()), b: primary(z.string())},
				{table: "twice"},
			),
		).toThrow(DuplicatePrimaryKeyError);
	});

	test("two fields with the same name", () => {
		expect(() =>
			registerTable(
				"Clash",
				{
					id: primary(z.string()),
					title: z.string(),
					heading: column(z.string(), {name: "title"}),
				},
				{table: "clash"},
			),
		).toThrow(DuplicateFieldError);
	});

	test("entries that are not fields", () => {
		const shape = Object.fromEntries([
			["id", primary(z.string())],
			["count", 3],
		]);
		try {
			registerTable("Bad", shape, {table: "bad"});
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidFieldTypeError);
			if (error instanceof InvalidFieldTypeError) {
				expect(error.key).toBe("count");
			}
		}
	});

	test("reserved names", () => {
		expect(() =>
			registerTable(
				"Saver",
				{id: primary(z.string()), save: z.string()},
				{table: "saver"},
			),
		).toThrow(InvalidFieldTypeError);
	});

	test("indexes from field flags come first", () => {
		const table = registerTable(
			"Post",
			{
				id: primary(z.number().int(), {autoIncrement: true}),
				slug: unique(z.string()),
				author: index(z.string()),
				title: z.string(),
			},
			{
				table: "post",
				indexes: [
					{columns: ["author", "title"]},
					{name: "post_title", columns: ["title"], unique: true},
				],
			},
		);
		expect(table.indexes).toEqual([
			{name: "idx_post_slug", columns: ["slug"], unique: true},
			{name: "idx_post_author", columns: ["author"], unique: false},
			{name: "idx_post_author_title", columns: ["author", "title"], unique: false},
			{name: "post_title", columns: ["title"], unique: true},
		]);
	});

	test("indexes over unknown fields", () => {
		expect(() =>
			registerTable(
				"Post",
				{id: primary(z.string())},
				{table: "post", indexes: [{columns: ["missing"]}]},
			),
		).toThrow(InvalidFieldTypeError);
	});

	test("empty index", () => {
		expect(() =>
			registerTable(
				"Post",
				{id: primary(z.string())},
				{table: "post", indexes: [{columns: []}]},
			),
		).toThrow(InvalidFieldTypeError);
	});

	test("table is frozen", () => {
		const table = registerTable("Frozen", {id: primary(z.string())}, {table: "frozen"});
		expect(Object.isFrozen(table)).toBe(true);
		expect(Object.isFrozen(table.columns)).toBe(true);
		expect(Object.isFrozen(table.indexes)).toBe(true);

		expect(table.fields).toBeInstanceOf(FieldMap);
		expect(table.fields).not.toBeInstanceOf(Map);
		expect(Object.isFrozen(table.fields)).toBe(true);
		expect(() => Map.prototype.delete.call(table.fields, "id")).toThrow(TypeError);
		expect(() => Map.prototype.set.call(table.fields, "x", column(z.string()))).toThrow(
			TypeError,
		);
		expect(table.hasField("id")).toBe(true);
		expect(table.fields.size).toBe(1);
		expect([...table.fields.keys()]).toEqual(["id"]);
	});
});

describe("Table", () => {
	const table = registerTable(
		"Person",
		{id: primary(z.string()), name: z.string()},
		{table: "person"},
	);

	test("field lookup", () => {
		expect(table.field("id").primaryKey).toBe(true);
		expect(() => table.field("age")).toThrow(UnknownFieldError);
		expect(() => table.field("age")).toThrow('Table "person" has no field "age"');
	});

	test("I/O without a database", async () => {
		await expect(table.create()).rejects.toThrow(ConnectionError);
		await expect(table.drop()).rejects.toThrow(ConnectionError);
		await expect(table.show().do()).rejects.toThrow(ConnectionError);
	});

	test("I/O with an unbound database", async () => {
		const unbound = registerTable(
			"Person",
			{id: primary(z.string())},
			{table: "person", database: new Database()},
		);
		await expect(unbound.create()).rejects.toThrow(
			"Database is not bound to a driver",
		);
	});

	test("toString", () => {
		expect(String(table)).toBe("<Table(person)>");
	});
});
