import {describe, test, expect, expectTypeOf, beforeEach} from "vitest";
import {z} from "zod";
import {ExecutionOutcome} from "./codec.js";
import {Database} from "./database.js";
import {column, primary} from "./field.js";
import {Model, model} from "./model.js";
import {TestDriver} from "./test-driver.js";
import {
	ImmutablePrimaryKeyError,
	QueryError,
	RemoveWithoutKeyError,
	SchemaFrozenError,
	UnknownFieldError,
} from "./errors.js";

let driver: TestDriver;
const db = new Database();

beforeEach(async () => {
	await db.close();
	driver = new TestDriver();
	db.bind(driver);
});

const Person = model(
	"Person",
	{
		id: primary(z.number().int(), {autoIncrement: true}),
		name: z.string(),
		age: z.number().int().optional(),
	},
	{table: "person", database: db},
);

const Note = model(
	"Note",
	{
		slug: primary(z.string()),
		body: column(z.string(), {name: "text"}),
		status: z.string().default("draft"),
	},
	{table: "note", comment: "Short notes", database: db},
);

describe("records", () => {
	test("accessors read and write field values", () => {
		const person = new Person({name: "Alice"});
		expect(person.name).toBe("Alice");
		expect(person.age).toBeUndefined();
		person.age = 30;
		expect(person.get("age")).toBe(30);
		person.set("name", "Bob");
		expect(person.name).toBe("Bob");
	});

	test("records are instances of their model", () => {
		const person = new Person();
		expect(person).toBeInstanceOf(Person);
		expect(person).toBeInstanceOf(Model);
		expect(Person.name).toBe("Person");
	});

	test("explicit field names become accessor names", () => {
		const note = new Note({slug: "a", text: "hello"});
		expect(note.text).toBe("hello");
		expectTypeOf(note.text).toEqualTypeOf<string | undefined>();
		expect(Note.table.columns).toEqual(["slug", "text", "status"]);
	});

	test("unknown fields", () => {
		const person = new Person();
		expect(() => person.get("nickname")).toThrow(UnknownFieldError);
		expect(() => person.set("nickname", "Al")).toThrow(
			'Table "person" has no field "nickname"',
		);
	});

	test("assigning an undeclared name fails", () => {
		const person = new Person({name: "Alice"});
		expect(() => Reflect.set(person, "nmae", "B")).toThrow(UnknownFieldError);
		expect(() => Object.defineProperty(person, "nmae", {value: "B"})).toThrow(
			TypeError,
		);
		expect(Object.keys(person)).toEqual([]);
		expect(person.snapshot()).toEqual({name: "Alice"});
	});

	test("auto-increment keys cannot be written", () => {
		const person = new Person();
		expect(() => {
			person.id = 3;
		}).toThrow(ImmutablePrimaryKeyError);
		expect(() => new Person({id: 3})).toThrow(ImmutablePrimaryKeyError);
	});

	test("other keys can be written", () => {
		const note = new Note();
		note.slug = "first";
		expect(note.slug).toBe("first");
	});

	test("snapshot fills defaults and leaves out unset fields", () => {
		expect(new Note({slug: "a"}).snapshot()).toEqual({slug: "a", status: "draft"});
		expect(new Person({name: "Alice"}).snapshot()).toEqual({name: "Alice"});
		expect(JSON.stringify(new Person({name: "Alice", age: 3}))).toBe(
			'{"name":"Alice","age":3}',
		);
	});

	test("toString", () => {
		expect(String(new Person())).toBe("<Person(table 'person')>");
		expect(String(new Note())).toBe("<Note(table 'note': Short notes)>");
	});
});

describe("model classes", () => {
	test("are frozen after definition", () => {
		expect(() => Reflect.set(Person, "table", null)).toThrow(SchemaFrozenError);
		expect(() => Object.defineProperty(Person, "extra", {value: 1})).toThrow(
			SchemaFrozenError,
		);
		expect(() => Reflect.deleteProperty(Person, "select")).toThrow(SchemaFrozenError);
		expect(Object.isFrozen(Person.prototype)).toBe(true);
		expect(Object.isFrozen(Person)).toBe(true);
	});

	test("a record's constructor is the frozen model class", () => {
		const cls = new Person().constructor;
		expect(cls).toBe(Person);
		expect(() => Reflect.set(cls, "table", null)).toThrow(SchemaFrozenError);
		expect(() => Reflect.deleteProperty(cls, "get")).toThrow(
			SchemaFrozenError,
		);
		expect(String(Person.table)).toBe("<Table(person)>");
	});

	test("field lookup", () => {
		expect(Person.field("name").type).toBe("text");
		expect(Note.field("text").name).toBe("text");
	});

	test("add() inserts a record's snapshot", () => {
		expect(Person.add(new Person({name: "Dan"})).toSQL("sqlite")).toEqual({
			sql: 'INSERT INTO "person" ("name") VALUES (?)',
			params: ["Dan"],
		});
	});

	test("addMany() takes the union of fields", () => {
		const insert = Person.addMany([
			new Person({name: "A"}),
			new Person({name: "B", age: 5}),
		]);
		expect(insert.toSQL("sqlite")).toEqual({
			sql: 'INSERT INTO "person" ("name", "age") VALUES (?, ?), (?, ?)',
			params: ["A", null, "B", 5],
		});
	});

	test("get() selects by primary key", async () => {
		driver.results.push([{id: 3, name: "Carol"}]);
		const person = await Person.get(3);
		expect(driver.statements).toEqual([
			{
				sql: 'SELECT "id", "name", "age" FROM "person" WHERE "id" = ? LIMIT 1',
				params: [3],
			},
		]);
		expect(person.id).toBe(3);
		expect(person.name).toBe("Carol");
	});

	test("get() with an undefined key fails without a query", async () => {
		await expect(Person.get(undefined)).rejects.toThrow(QueryError);
		await expect(Note.get(undefined)).rejects.toThrow(
			'Condition "slug" on table "note" is undefined',
		);
		expect(driver.statements).toEqual([]);
	});

	test("getMany() selects a list of keys", async () => {
		driver.results.push([{name: "A"}, {name: "B"}]);
		const people = await Person.getMany([1, 2], ["name"]);
		expect(driver.statements[0]).toEqual({
			sql: 'SELECT "name" FROM "person" WHERE "id" IN (?, ?)',
			params: [1, 2],
		});
		expect(people.map((person) => person.name)).toEqual(["A", "B"]);
	});

	test("createTable() and dropTable() go through the driver", async () => {
		await Note.createTable({ifNotExists: false});
		await Note.dropTable();
		expect(driver.statements.map((statement) => statement.sql)).toEqual([
			'CREATE TABLE "note" (\n  "slug" TEXT PRIMARY KEY NOT NULL,\n  "text" TEXT NOT NULL,\n  "status" TEXT DEFAULT \'draft\'\n)',
			'DROP TABLE IF EXISTS "note"',
		]);
	});
});

describe("save and remove", () => {
	test("save() replaces the row and stores the generated key", async () => {
		driver.outcomes.push(new ExecutionOutcome(1, 12));
		const person = new Person({name: "Alice"});
		const outcome = await person.save();
		expect(outcome.lastId).toBe(12);
		expect(person.id).toBe(12);
		expect(driver.statements).toEqual([
			{sql: 'REPLACE INTO "person" ("name") VALUES (?)', params: ["Alice"]},
		]);
	});

	test("save() on a keyed table writes defaults", async () => {
		await new Note({slug: "a", text: "hi"}).save();
		expect(driver.statements[0]).toEqual({
			sql: 'REPLACE INTO "note" ("slug", "text", "status") VALUES (?, ?, ?)',
			params: ["a", "hi", "draft"],
		});
	});

	test("remove() deletes by primary key", async () => {
		const note = new Note({slug: "gone"});
		await note.remove();
		expect(driver.statements[0]).toEqual({
			sql: 'DELETE FROM "note" WHERE "slug" = ?',
			params: ["gone"],
		});
	});

	test("remove() needs a key", async () => {
		await expect(new Person({name: "Alice"}).remove()).rejects.toThrow(
			RemoveWithoutKeyError,
		);
		expect(driver.statements).toEqual([]);
	});

	test("add, then get by the generated key", async () => {
		driver.outcomes.push(new ExecutionOutcome(1, 1));
		const {affected, lastId} = await Person.add(new Person({name: "Alice"})).do();
		expect(affected).toBe(1);
		expect(lastId).toBe(1);

		driver.results.push([{id: 1, name: "Alice"}]);
		const alice = await Person.get(lastId);
		expect(alice.id).toBe(1);
		expect(alice.name).toBe("Alice");
	});
});
