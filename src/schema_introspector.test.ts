import { describe, it, expect } from "vitest"
import type { QueryResult, QueryResultRow } from "pg"
import { CollaboratorFailure } from "./config.js"
import { silentLogger } from "./logger.js"
import { SchemaIntrospector, asNumber, asBoolean, quoteIdent, type QueryClient, type QueryPool } from "./schema_introspector.js"

function result(rows: QueryResultRow[]): QueryResult<QueryResultRow> {
	return { command: "SELECT", rowCount: rows.length, oid: 0, fields: [], rows }
}

const TABLE_ROWS = [
	{ table_schema: "public", table_name: "customers", table_type: "BASE TABLE", comment: "People who buy things" },
	{ table_schema: "public", table_name: "orders", table_type: "BASE TABLE", comment: null },
]

const COLUMN_ROWS = [
	{
		table_schema: "public", table_name: "customers", column_name: "id", data_type: "integer",
		is_nullable: false, ordinal_position: 1, column_default: null, comment: null, is_pk: true, pk_ordinal: 1,
	},
	{
		table_schema: "public", table_name: "customers", column_name: "name", data_type: "text",
		is_nullable: true, ordinal_position: 2, column_default: null, comment: "Display name", is_pk: false, pk_ordinal: null,
	},
	{
		table_schema: "public", table_name: "orders", column_name: "customer_id", data_type: "integer",
		is_nullable: false, ordinal_position: 1, column_default: null, comment: null, is_pk: false, pk_ordinal: null,
	},
]

const FK_ROWS = [
	{
		constraint_name: "orders_customer_id_fkey",
		table_schema: "public",
		table_name: "orders",
		column_name: "customer_id",
		ref_table_schema: "public",
		ref_table_name: "customers",
		ref_column_name: "id",
	},
]

/**
 * In-process stand-in for pg.Pool: answers by matching the query text.
 */
class FakePool implements QueryPool {
	queries: Array<{ text: string; values?: unknown[] }> = []
	releases = 0
	failOn: string | null = null

	async connect(): Promise<QueryClient> {
		return {
			query: async (text, values) => {
				this.queries.push({ text, values })
				if (this.failOn && text.includes(this.failOn)) {
					throw new Error("permission denied for table orders")
				}
				return result(this.respond(text))
			},
			release: () => {
				this.releases++
			},
		}
	}

	private respond(text: string): QueryResultRow[] {
		if (text.includes("'FOREIGN KEY'")) return FK_ROWS
		if (text.includes("information_schema.columns")) return COLUMN_ROWS
		if (text.includes("information_schema.tables")) return TABLE_ROWS
		if (text.includes("COUNT(*)")) {
			// bigint counts arrive as strings
			return [{ row_count: text.includes('"customers"') ? "2" : "0" }]
		}
		if (text.includes('SELECT DISTINCT "id"')) return [{ value: "1" }, { value: "2" }]
		if (text.includes('SELECT DISTINCT "name"')) return [{ value: "Ada" }]
		if (text.startsWith("SELECT * FROM")) {
			return [
				{ id: 1, name: "Ada" },
				{ id: 2, name: null },
			]
		}
		return []
	}
}

describe("SchemaIntrospector", () => {
	it("merges tables, columns, keys and samples", async () => {
		const pool = new FakePool()
		const schema = await new SchemaIntrospector(pool, silentLogger).introspect("shop")

		expect(schema.database_id).toBe("shop")
		expect(schema.tables.map((t) => t.table_name)).toEqual(["customers", "orders"])
		expect(schema.fks).toHaveLength(1)

		const [customers, orders] = schema.tables
		expect(customers.comment).toBe("People who buy things")
		expect(customers.pk_columns).toEqual(["id"])
		expect(customers.column_count).toBe(2)
		expect(customers.row_count).toBe(2)
		expect(customers.columns[0].sample_values).toEqual(["1", "2"])
		expect(customers.columns[1].sample_values).toEqual(["Ada"])
		expect(customers.columns[1].comment).toBe("Display name")
		expect(customers.sample_rows).toEqual([
			{ id: "1", name: "Ada" },
			{ id: "2", name: null },
		])

		expect(orders.fk_count).toBe(1)
		expect(orders.columns[0].is_fk).toBe(true)
		expect(orders.columns[0].fk_target_table).toBe("customers")
		expect(orders.columns[0].fk_target_column).toBe("id")
		expect(orders.row_count).toBe(0)
		expect(orders.sample_rows).toEqual([])

		expect(pool.releases).toBe(1)
	})

	it("skips sampling empty tables", async () => {
		const pool = new FakePool()
		await new SchemaIntrospector(pool, silentLogger).introspect("shop")
		const ordersSampling = pool.queries.filter(
			(q) => q.text.includes('"orders"') && !q.text.includes("COUNT(*)"),
		)
		expect(ordersSampling).toEqual([])
	})

	it("passes schemas, exclusions and caps as parameters", async () => {
		const pool = new FakePool()
		await new SchemaIntrospector(pool, silentLogger).introspect("shop", {
			schemas: ["public", "sales"],
			excludeTables: ["migrations"],
			sampleValueCap: 2,
			sampleRowLimit: 1,
		})

		expect(pool.queries[0].values).toEqual([["public", "sales"], ["migrations"]])
		const distinct = pool.queries.find((q) => q.text.startsWith('SELECT DISTINCT "id"'))
		expect(distinct?.values).toEqual([2])
		const rows = pool.queries.find((q) => q.text.startsWith("SELECT * FROM"))
		expect(rows?.text).toBe('SELECT * FROM "public"."customers" LIMIT $1')
		expect(rows?.values).toEqual([1])
	})

	it("wraps database errors and still releases the client", async () => {
		const pool = new FakePool()
		pool.failOn = "COUNT(*)"
		const introspector = new SchemaIntrospector(pool, silentLogger)

		const error = await introspector.introspect("shop").catch((e: unknown) => e)
		expect(error).toBeInstanceOf(CollaboratorFailure)
		expect(error).toHaveProperty("collaborator", "schema-introspector")
		expect(error).toHaveProperty("message", "Schema introspection failed: permission denied for table orders")
		expect(pool.releases).toBe(1)
	})
})

describe("row readers", () => {
	it("reads bigint strings as numbers and pg booleans", () => {
		expect(asNumber({ n: "42" }, "n")).toBe(42)
		expect(asNumber({ n: null }, "n")).toBe(0)
		expect(asBoolean({ b: "t" }, "b")).toBe(true)
		expect(asBoolean({ b: false }, "b")).toBe(false)
	})

	it("quotes identifiers", () => {
		expect(quoteIdent('odd"name')).toBe('"odd""name"')
	})
})
