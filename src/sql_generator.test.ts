import { describe, it, expect } from "vitest"
import type { FieldDef, QueryResult, QueryResultRow } from "pg"
import { CollaboratorFailure } from "./config.js"
import { silentLogger } from "./logger.js"
import type { IntrospectedColumn, IntrospectionResult, QueryClient, QueryPool } from "./schema_introspector.js"
import {
	SchemaQueryRunner,
	SqlSchemaAnswerer,
	describeSchema,
	formatRows,
	generateSql,
	isSchemaQuestion,
	validateReadOnlySql,
	type QueryRunner,
} from "./sql_generator.js"

function column(name: string, dataType: string, extra: Partial<IntrospectedColumn> = {}): IntrospectedColumn {
	return {
		column_name: name,
		data_type: dataType,
		is_nullable: false,
		ordinal_position: 1,
		column_default: null,
		comment: null,
		is_pk: false,
		pk_ordinal: null,
		is_fk: false,
		fk_constraint_name: null,
		fk_target_schema: null,
		fk_target_table: null,
		fk_target_column: null,
		sample_values: [],
		...extra,
	}
}

const SCHEMA: IntrospectionResult = {
	database_id: "shop",
	introspected_at: "2024-01-01T00:00:00.000Z",
	fks: [],
	tables: [
		{
			table_schema: "public",
			table_name: "customers",
			table_type: "BASE TABLE",
			comment: null,
			columns: [
				column("id", "integer", { is_pk: true, pk_ordinal: 1 }),
				column("name", "text"),
				column("age", "integer"),
			],
			pk_columns: ["id"],
			fk_count: 0,
			column_count: 3,
			row_count: 2,
			sample_rows: [],
		},
		{
			table_schema: "public",
			table_name: "orders",
			table_type: "BASE TABLE",
			comment: null,
			columns: [
				column("id", "integer", { is_pk: true, pk_ordinal: 1 }),
				column("customer_id", "integer", { is_fk: true, fk_target_table: "customers", fk_target_column: "id" }),
				column("total_amount", "numeric"),
			],
			pk_columns: ["id"],
			fk_count: 1,
			column_count: 3,
			row_count: 3,
			sample_rows: [],
		},
	],
}

function field(name: string): FieldDef {
	return { name, tableID: 0, columnID: 0, dataTypeID: 25, dataTypeSize: -1, dataTypeModifier: -1, format: "text" }
}

class FakePool implements QueryPool {
	queries: string[] = []
	releases = 0
	connects = 0

	constructor(
		private rows: QueryResultRow[],
		private fields: FieldDef[],
		private failWith: string | null = null,
	) {}

	async connect(): Promise<QueryClient> {
		this.connects++
		return {
			query: async (text: string): Promise<QueryResult<QueryResultRow>> => {
				this.queries.push(text)
				if (text.startsWith("SET")) {
					return { command: "SET", rowCount: 0, oid: 0, fields: [], rows: [] }
				}
				if (this.failWith) throw new Error(this.failWith)
				return { command: "SELECT", rowCount: this.rows.length, oid: 0, fields: this.fields, rows: this.rows }
			},
			release: () => {
				this.releases++
			},
		}
	}
}

describe("validateReadOnlySql", () => {
	it("accepts a single SELECT and strips the trailing semicolon", () => {
		expect(validateReadOnlySql("SELECT 1;")).toEqual({ valid: true, sql: "SELECT 1" })
		expect(validateReadOnlySql("WITH t AS (SELECT 1) SELECT * FROM t").valid).toBe(true)
	})

	it("rejects empty input, multiple statements and non-SELECT statements", () => {
		expect(validateReadOnlySql("  ").reason).toBe("Empty statement")
		expect(validateReadOnlySql("SELECT 1; DROP TABLE customers").reason).toBe("Multiple statements are not allowed")
		expect(validateReadOnlySql("DELETE FROM customers").reason).toBe("Only SELECT queries are allowed")
	})

	it("rejects write keywords hidden inside a CTE", () => {
		const result = validateReadOnlySql("WITH d AS (DELETE FROM customers RETURNING *) SELECT * FROM d")
		expect(result).toEqual({
			valid: false,
			sql: "WITH d AS (DELETE FROM customers RETURNING *) SELECT * FROM d",
			reason: "Forbidden keyword: DELETE",
		})
	})

	it("ignores keywords inside literals, quoted identifiers and comments", () => {
		expect(validateReadOnlySql("SELECT 'DROP TABLE x; --'").valid).toBe(true)
		expect(validateReadOnlySql('SELECT * FROM "update"').valid).toBe(true)
		expect(validateReadOnlySql("SELECT 1 /* DELETE; */").valid).toBe(true)
		expect(validateReadOnlySql("SELECT $$;$$").valid).toBe(true)
	})

	it("rejects SELECT INTO and locking clauses", () => {
		expect(validateReadOnlySql("SELECT * INTO customers_copy FROM customers")).toEqual({
			valid: false,
			sql: "SELECT * INTO customers_copy FROM customers",
			reason: "Forbidden keyword: INTO",
		})
		expect(validateReadOnlySql("SELECT * FROM customers FOR UPDATE").reason).toBe(
			"Locking clause not allowed: FOR UPDATE",
		)
		expect(validateReadOnlySql("SELECT * FROM customers\nFOR   SHARE").reason).toBe(
			"Locking clause not allowed: FOR SHARE",
		)
		expect(validateReadOnlySql("SELECT * FROM orders FOR NO KEY UPDATE").reason).toBe(
			"Locking clause not allowed: FOR NO KEY UPDATE",
		)
		expect(validateReadOnlySql("SELECT 'copy into x' AS note").valid).toBe(true)
	})

	it("rejects admin functions", () => {
		expect(validateReadOnlySql("SELECT pg_sleep(5)").reason).toBe("Forbidden function: pg_sleep")
	})
})

describe("generateSql", () => {
	it("counts rows of a mentioned table", () => {
		expect(generateSql("How many customers are there?", SCHEMA)).toEqual({
			sql: 'SELECT COUNT(*) AS count FROM "customers"',
			pattern: "count",
			table: "customers",
		})
	})

	it("aggregates a column, preferring the mentioned table", () => {
		expect(generateSql("What is the average age of customers?", SCHEMA)?.sql).toBe(
			'SELECT AVG("age") AS "average_age" FROM "customers"',
		)
		expect(generateSql("highest total_amount in orders", SCHEMA)?.sql).toBe(
			'SELECT MAX("total_amount") AS "max_total_amount" FROM "orders"',
		)
	})

	it("lists a table with the row cap", () => {
		expect(generateSql("Show me all orders", SCHEMA, 5)).toEqual({
			sql: 'SELECT * FROM "orders" LIMIT 5',
			pattern: "select_all",
			table: "orders",
		})
		expect(generateSql("orders from last week", SCHEMA)?.pattern).toBe("table_mention")
	})

	it("passes literal SQL through", () => {
		expect(generateSql("SELECT COUNT(*) FROM customers;", SCHEMA)).toEqual({
			sql: "SELECT COUNT(*) FROM customers",
			pattern: "literal",
			table: "",
		})
	})

	it("returns null when nothing in the schema matches", () => {
		expect(generateSql("what is the weather", SCHEMA)).toBeNull()
	})
})

describe("describeSchema", () => {
	it("lists tables", () => {
		expect(isSchemaQuestion("What tables are in the database?")).toBe(true)
		expect(describeSchema(SCHEMA, "What tables are in the database?")).toBe(
			"Available tables in the database:\n• customers\n• orders",
		)
	})

	it("describes a mentioned table", () => {
		expect(describeSchema(SCHEMA, "What columns does the orders table have?")).toBe(
			"Schema for 'orders' table (3 rows):\n• id (integer, primary key)\n• customer_id (integer, references customers.id)\n• total_amount (numeric)",
		)
	})

	it("falls back to a per-table overview", () => {
		expect(describeSchema(SCHEMA, "describe the schema")).toBe(
			"customers (2 rows): id, name, age\norders (3 rows): id, customer_id, total_amount",
		)
	})

	it("does not treat literal SQL as a schema question", () => {
		expect(isSchemaQuestion("SELECT columns FROM t")).toBe(false)
	})
})

describe("formatRows", () => {
	it("renders a table with a truncation note", () => {
		expect(formatRows({ columns: ["a", "b"], rows: [{ a: "1", b: null }], rowCount: 3, truncated: true })).toBe(
			"a | b\n-----\n1 | NULL\n(1 of 3 rows shown)",
		)
	})

	it("reports empty results", () => {
		expect(formatRows({ columns: ["a"], rows: [], rowCount: 0, truncated: false })).toBe(
			"Query executed successfully, but returned no results.",
		)
	})
})

describe("SchemaQueryRunner", () => {
	it("sets a statement timeout and formats cells", async () => {
		const pool = new FakePool([{ count: "2" }], [field("count")])
		const runner = new SchemaQueryRunner(pool, silentLogger, { statementTimeoutMs: 5000 })

		const result = await runner.run('SELECT COUNT(*) AS count FROM "customers";')
		expect(result).toEqual({ columns: ["count"], rows: [{ count: "2" }], rowCount: 1, truncated: false })
		expect(pool.queries).toEqual(["SET statement_timeout = 5000", 'SELECT COUNT(*) AS count FROM "customers"'])
		expect(pool.releases).toBe(1)
	})

	it("caps returned rows", async () => {
		const pool = new FakePool([{ id: 1 }, { id: 2 }, { id: 3 }], [field("id")])
		const result = await new SchemaQueryRunner(pool, silentLogger, { maxRows: 2 }).run("SELECT id FROM t")
		expect(result.rows).toEqual([{ id: "1" }, { id: "2" }])
		expect(result.rowCount).toBe(3)
		expect(result.truncated).toBe(true)
	})

	it("refuses unsafe SQL without touching the database", async () => {
		const pool = new FakePool([], [])
		await expect(new SchemaQueryRunner(pool, silentLogger).run("DROP TABLE customers")).rejects.toBeInstanceOf(
			CollaboratorFailure,
		)
		expect(pool.connects).toBe(0)
	})

	it("wraps driver errors and releases the client", async () => {
		const pool = new FakePool([], [], "relation \"t\" does not exist")
		const error = await new SchemaQueryRunner(pool, silentLogger).run("SELECT * FROM t").catch((e: unknown) => e)
		expect(error).toBeInstanceOf(CollaboratorFailure)
		expect(error).toHaveProperty("message", 'Query execution failed: relation "t" does not exist')
		expect(pool.releases).toBe(1)
	})
})

describe("SqlSchemaAnswerer", () => {
	const countSql = 'SELECT COUNT(*) AS count FROM "customers"'
	const preface = `Here's the SQL query to answer your question:\n\n\`\`\`sql\n${countSql}\n\`\`\``

	it("answers schema questions from the introspected schema", async () => {
		const answer = await new SqlSchemaAnswerer(null, silentLogger).answer("What tables are in the database?", SCHEMA)
		expect(answer).toEqual({ text: "Available tables in the database:\n• customers\n• orders" })
	})

	it("shows the query when no database is connected", async () => {
		const answer = await new SqlSchemaAnswerer(null, silentLogger).answer("How many customers are there?", SCHEMA)
		expect(answer).toEqual({ text: `${preface}\n\n(Not executed: no database connection.)`, sql: countSql })
	})

	it("runs the query and appends the result", async () => {
		const runner: QueryRunner = {
			run: async () => ({ columns: ["count"], rows: [{ count: "2" }], rowCount: 1, truncated: false }),
		}
		const answer = await new SqlSchemaAnswerer(runner, silentLogger).answer("How many customers are there?", SCHEMA)
		expect(answer.text).toBe(`${preface}\n\nResult:\ncount\n-----\n2`)
	})

	it("refuses unsafe literal SQL", async () => {
		const answer = await new SqlSchemaAnswerer(null, silentLogger).answer("SELECT 1; DROP TABLE customers", SCHEMA)
		expect(answer).toEqual({
			text: "Refusing to run that query: Multiple statements are not allowed.",
			sql: "SELECT 1; DROP TABLE customers",
		})
	})

	it("lists the tables when no pattern matches", async () => {
		const answer = await new SqlSchemaAnswerer(null, silentLogger).answer("what is the weather", SCHEMA)
		expect(answer.text).toBe(
			"I couldn't map that question onto the schema. Available tables in the database:\n• customers\n• orders",
		)
	})
})
