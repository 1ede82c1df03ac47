import {describe, test, expect} from "vitest";
import {z} from "zod";
import {Field, column, primary, unique, index, inferFieldType, isField} from "./field.js";

describe("inferFieldType", () => {
	test("maps zod schemas to type tags", () => {
		expect(inferFieldType(z.string())).toBe("text");
		expect(inferFieldType(z.enum(["a", "b"]))).toBe("text");
		expect(inferFieldType(z.number().int())).toBe("integer");
		expect(inferFieldType(z.number())).toBe("real");
		expect(inferFieldType(z.boolean())).toBe("boolean");
		expect(inferFieldType(z.date())).toBe("datetime");
		expect(inferFieldType(z.object({a: z.string()}))).toBe("json");
		expect(inferFieldType(z.array(z.number()))).toBe("json");
	});

	test("looks through optional, nullable and default wrappers", () => {
		expect(inferFieldType(z.number().int().optional())).toBe("integer");
		expect(inferFieldType(z.boolean().nullable())).toBe("boolean");
		expect(inferFieldType(z.date().default(() => new Date()))).toBe("datetime");
	});
});

describe("Field", () => {
	test("plain column", () => {
		const field = column(z.string().max(32));
		expect(field.name).toBeUndefined();
		expect(field.type).toBe("text");
		expect(field.nullable).toBe(false);
		expect(field.maxLength).toBe(32);
		expect(field.primaryKey).toBe(false);
		expect(field.hasDefault).toBe(false);
	});

	test("optional and nullable schemas are nullable", () => {
		expect(column(z.string().optional()).nullable).toBe(true);
		expect(column(z.string().nullable()).nullable).toBe(true);
	});

	test("autoIncrement implies primary key", () => {
		const field = new Field(z.number().int(), {autoIncrement: true});
		expect(field.primaryKey).toBe(true);
		expect(field.autoIncrement).toBe(true);
	});

	test("factories set flags", () => {
		expect(primary(z.string()).primaryKey).toBe(true);
		expect(primary(z.string()).autoIncrement).toBe(false);
		expect(primary(z.number().int(), {autoIncrement: true}).autoIncrement).toBe(true);
		expect(unique(z.string()).unique).toBe(true);
		expect(index(z.string()).indexed).toBe(true);
	});

	test("named returns a copy", () => {
		const field = unique(z.string());
		const named = field.named("email");
		expect(named.name).toBe("email");
		expect(named.unique).toBe(true);
		expect(field.name).toBeUndefined();
		expect(named).not.toBe(field);
	});

	test("is frozen", () => {
		const field = column(z.string());
		expect(Object.isFrozen(field)).toBe(true);
	});

	test("default from zod schema", () => {
		const field = column(z.string().default("guest"));
		expect(field.hasDefault).toBe(true);
		expect(field.produceDefault()).toBe("guest");
	});

	test("explicit default producer wins", () => {
		let calls = 0;
		const field = column(z.number().int(), {default: () => ++calls});
		expect(field.produceDefault()).toBe(1);
		expect(field.produceDefault()).toBe(2);
	});

	test("produceDefault without a default", () => {
		expect(column(z.string()).produceDefault()).toBeUndefined();
	});

	test("validate", () => {
		const field = column(z.string().max(3));
		expect(field.validate("abc")).toEqual({success: true, value: "abc"});
		const result = field.validate("abcd");
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.issues).toHaveLength(1);
		}
	});

	test("isField", () => {
		expect(isField(column(z.string()))).toBe(true);
		expect(isField(z.string())).toBe(false);
		expect(isField(null)).toBe(false);
	});
});
