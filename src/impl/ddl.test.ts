import {describe, test, expect} from "vitest";
import {z} from "zod";
import {
	columnType,
	generateAlterDDL,
	generateColumnDDL,
	generateDDL,
	generateDropDDL,
} from "./ddl.js";
import {column, primary, unique} from "./field.js";
import {QueryError} from "./errors.js";
import {renderDDL, type SQLDialect} from "./sql.js";
import {registerTable, type Table} from "./table.js";
import {makeTemplate, type Template} from "./template.js";

function render(templates: Template[], dialect: SQLDialect): string[] {
	return templates.map((template) => renderDDL(template, dialect));
}

const posts = registerTable(
	"Post",
	{
		id: primary(z.number().int(), {autoIncrement: true}),
		slug: unique(z.string()),
		title: z.string().max(120),
		views: z.number().int().default(0),
		published: z.boolean().default(false),
		body: z.string().optional(),
	},
	{table: "post", comment: "Blog posts"},
);

const tags = registerTable(
	"Tag",
	{
		label: primary(z.string()),
		weight: z.number().optional(),
	},
	{table: "tag", charset: "latin1"},
);

describe("generateDDL", () => {
	test("SQLite", () => {
		expect(render(generateDDL(posts), "sqlite")).toEqual([
			[
				'CREATE TABLE IF NOT EXISTS "post" (',
				'  "id" INTEGER PRIMARY KEY AUTOINCREMENT,',
				'  "slug" TEXT NOT NULL,',
				'  "title" TEXT NOT NULL,',
				'  "views" INTEGER DEFAULT 0,',
				'  "published" INTEGER DEFAULT 0,',
				'  "body" TEXT',
				")",
			].join("\n"),
			'CREATE UNIQUE INDEX IF NOT EXISTS "idx_post_slug" ON "post" ("slug")',
		]);
	});

	test("MySQL", () => {
		expect(render(generateDDL(posts, {dialect: "mysql"}), "mysql")).toEqual([
			[
				"CREATE TABLE IF NOT EXISTS `post` (",
				"  `id` INTEGER AUTO_INCREMENT,",
				"  `slug` VARCHAR(255) NOT NULL,",
				"  `title` VARCHAR(120) NOT NULL,",
				"  `views` INTEGER DEFAULT 0,",
				"  `published` BOOLEAN DEFAULT FALSE,",
				"  `body` TEXT,",
				"  PRIMARY KEY (`id`),",
				"  UNIQUE KEY `idx_post_slug` (`slug`)",
				") DEFAULT CHARSET=utf8mb4 COMMENT='Blog posts'",
			].join("\n"),
		]);
	});

	test("non-generated primary keys", () => {
		expect(render(generateDDL(tags, {ifNotExists: false}), "sqlite")).toEqual([
			'CREATE TABLE "tag" (\n  "label" TEXT PRIMARY KEY NOT NULL,\n  "weight" REAL\n)',
		]);
		expect(render(generateDDL(tags, {dialect: "mysql"}), "mysql")).toEqual([
			"CREATE TABLE IF NOT EXISTS `tag` (\n  `label` VARCHAR(255) NOT NULL,\n  `weight` DOUBLE,\n  PRIMARY KEY (`label`)\n) DEFAULT CHARSET=latin1",
		]);
	});

	test("composite indexes", () => {
		const table: Table = registerTable(
			"Visit",
			{
				id: primary(z.string()),
				page: z.string(),
				day: z.string(),
			},
			{table: "visit", indexes: [{columns: ["page", "day"], unique: true}]},
		);
		const [, index] = render(generateDDL(table), "sqlite");
		expect(index).toBe(
			'CREATE UNIQUE INDEX IF NOT EXISTS "idx_visit_page_day" ON "visit" ("page", "day")',
		);
	});
});

describe("generateDropDDL", () => {
	test("IF EXISTS by default", () => {
		expect(renderDDL(generateDropDDL(tags), "sqlite")).toBe('DROP TABLE IF EXISTS "tag"');
		expect(renderDDL(generateDropDDL(tags, {ifExists: false}), "mysql")).toBe(
			"DROP TABLE `tag`",
		);
	});

	test("DDL templates take identifiers only", () => {
		const template = {strings: makeTemplate(["DROP TABLE ", ""]), values: [42]};
		expect(() => renderDDL(template, "sqlite")).toThrow(QueryError);
		expect(() => renderDDL(template, "mysql")).toThrow(
			"Unexpected value in DDL template: 42",
		);
		try {
			renderDDL(template, "sqlite");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(QueryError);
			if (error instanceof QueryError) {
				expect(error.code).toBe("QUERY_ERROR");
				expect("sql" in error).toBe(false);
			}
		}
	});
});

describe("generateAlterDDL", () => {
	test("rename in both dialects", () => {
		const operations = [{kind: "rename", from: "weight", to: "score"}] as const;
		expect(render(generateAlterDDL(tags, operations, "sqlite"), "sqlite")).toEqual([
			'ALTER TABLE "tag" RENAME COLUMN "weight" TO "score"',
		]);
		expect(render(generateAlterDDL(tags, operations, "mysql"), "mysql")).toEqual([
			"ALTER TABLE `tag` RENAME COLUMN `weight` TO `score`",
		]);
	});

	test("added columns carry their defaults", () => {
		const rank = column(z.number().int().default(5), {name: "rank"});
		expect(
			render(generateAlterDDL(tags, [{kind: "add", field: rank}], "sqlite"), "sqlite"),
		).toEqual(['ALTER TABLE "tag" ADD COLUMN "rank" INTEGER DEFAULT 5']);
	});
});

describe("columns", () => {
	test("column types", () => {
		const at = column(z.date());
		const meta = column(z.array(z.string()));
		expect(columnType(at, "sqlite")).toBe("TEXT");
		expect(columnType(at, "mysql")).toBe("DATETIME(3)");
		expect(columnType(meta, "sqlite")).toBe("TEXT");
		expect(columnType(meta, "mysql")).toBe("JSON");
		expect(columnType(column(z.string().max(300)), "mysql")).toBe("TEXT");
		expect(columnType(column(z.string(), {columnType: "CHAR(2)"}), "mysql")).toBe(
			"CHAR(2)",
		);
	});

	test("string defaults and comments are quoted", () => {
		const field = column(z.string().default("it's"), {comment: "Who's there"});
		expect(renderDDL(generateColumnDDL("greeting", field, "mysql"), "mysql")).toBe(
			"`greeting` TEXT DEFAULT 'it''s' COMMENT 'Who''s there'",
		);
		expect(renderDDL(generateColumnDDL("greeting", field), "sqlite")).toBe(
			"\"greeting\" TEXT DEFAULT 'it''s'",
		);
	});

	test("defaults without a literal are left to the application", () => {
		const field = column(z.date().default(() => new Date(0)));
		expect(renderDDL(generateColumnDDL("at", field), "sqlite")).toBe('"at" TEXT');
	});
});
