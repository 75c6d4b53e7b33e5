/**
 * Schema Introspector
 *
 * DB-agnostic schema introspection via information_schema + pg_catalog.
 * Extracts tables, columns, PKs, FKs and comments, then samples each table:
 * row count, a few distinct values per column, a few sample rows.
 *
 * The result is the relational source the Chunk Indexer turns into
 * schema-table / schema-column chunks.
 */

import type { QueryResult, QueryResultRow } from "pg"
import { CollaboratorFailure, DEFAULTS, TabularQAError, errorMessage } from "./config.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Pool seam
// ============================================================================

/**
 * The slice of pg.PoolClient the introspector and query runner use.
 * pg.Pool satisfies QueryPool; tests pass an in-process fake.
 */
export interface QueryClient {
	query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>
	release(): void
}

export interface QueryPool {
	connect(): Promise<QueryClient>
}

// ============================================================================
// Row readers
// ============================================================================

export function asString(row: QueryResultRow, key: string): string {
	const value: unknown = row[key]
	return typeof value === "string" ? value : String(value ?? "")
}

export function asNullableString(row: QueryResultRow, key: string): string | null {
	const value: unknown = row[key]
	if (value === null || value === undefined) return null
	return typeof value === "string" ? value : String(value)
}

export function asNumber(row: QueryResultRow, key: string): number {
	const value: unknown = row[key]
	if (typeof value === "number") return value
	// bigint columns (COUNT(*)) arrive as strings
	if (typeof value === "string" && value.trim() !== "") return Number(value)
	return 0
}

export function asBoolean(row: QueryResultRow, key: string): boolean {
	const value: unknown = row[key]
	return value === true || value === "t" || value === "true"
}

/** Render any cell for display in chunk text and answers */
export function formatCell(value: unknown): string | null {
	if (value === null || value === undefined) return null
	if (value instanceof Date) return value.toISOString()
	if (typeof value === "object") return JSON.stringify(value)
	return String(value)
}

export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

// ============================================================================
// Types
// ============================================================================

export interface IntrospectedColumn {
	column_name: string
	data_type: string
	is_nullable: boolean
	ordinal_position: number
	column_default: string | null
	comment: string | null // From pg_description

	// Key info
	is_pk: boolean
	pk_ordinal: number | null

	// FK info
	is_fk: boolean
	fk_constraint_name: string | null
	fk_target_schema: string | null
	fk_target_table: string | null
	fk_target_column: string | null

	/** Distinct non-null values, capped */
	sample_values: string[]
}

export interface IntrospectedTable {
	table_schema: string
	table_name: string
	table_type: string // 'BASE TABLE' | 'VIEW'
	comment: string | null // From pg_description
	columns: IntrospectedColumn[]

	// Computed
	pk_columns: string[]
	fk_count: number
	column_count: number
	row_count: number
	sample_rows: Array<Record<string, string | null>>
}

export interface IntrospectedFK {
	constraint_name: string
	table_schema: string
	table_name: string
	column_name: string
	ref_table_schema: string
	ref_table_name: string
	ref_column_name: string
}

export interface IntrospectionResult {
	database_id: string
	tables: IntrospectedTable[]
	fks: IntrospectedFK[]
	introspected_at: string
}

/** Relational input to the Chunk Indexer */
export type SchemaSource = IntrospectionResult

export interface IntrospectionOptions {
	schemas?: string[]
	/** Tables to exclude (e.g., migration tables) */
	excludeTables?: string[]
	sampleValueCap?: number
	sampleRowLimit?: number
}

interface TableRow {
	table_schema: string
	table_name: string
	table_type: string
	comment: string | null
}

interface ColumnRow {
	table_schema: string
	table_name: string
	column_name: string
	data_type: string
	is_nullable: boolean
	ordinal_position: number
	column_default: string | null
	comment: string | null
	is_pk: boolean
	pk_ordinal: number | null
}

// ============================================================================
// Introspector Class
// ============================================================================

export class SchemaIntrospector {
	private pool: QueryPool
	private logger: Logger

	constructor(pool: QueryPool, logger: Logger) {
		this.pool = pool
		this.logger = logger
	}

	/**
	 * Introspect all tables in the given schemas. Any database error surfaces
	 * as a CollaboratorFailure.
	 */
	async introspect(databaseId: string, options: IntrospectionOptions = {}): Promise<IntrospectionResult> {
		const schemas = options.schemas ?? ["public"]
		const excludeTables = options.excludeTables ?? []
		const sampleValueCap = options.sampleValueCap ?? DEFAULTS.sampleValueCap
		const sampleRowLimit = options.sampleRowLimit ?? DEFAULTS.sampleRowLimit

		const startTime = Date.now()
		this.logger.info("Starting schema introspection", {
			database_id: databaseId,
			schemas,
			exclude_tables: excludeTables,
		})

		let client: QueryClient | null = null

		try {
			client = await this.pool.connect()

			// Step 1: Get all tables
			const tables = await this.getTables(client, schemas, excludeTables)
			this.logger.debug("Tables found", { count: tables.length })

			// Step 2: Get all columns with PK info
			const tableNames = tables.map((t) => t.table_name)
			const columns = await this.getColumns(client, schemas, tableNames)
			this.logger.debug("Columns found", { count: columns.length })

			// Step 3: Get all FK relationships
			const fks = await this.getForeignKeys(client, schemas, tableNames)
			this.logger.debug("Foreign keys found", { count: fks.length })

			// Step 4: Merge columns into tables
			const enrichedTables = this.mergeColumnsIntoTables(tables, columns, fks)

			// Step 5: Row counts and samples
			for (const table of enrichedTables) {
				await this.sampleTable(client, table, sampleValueCap, sampleRowLimit)
			}

			const result: IntrospectionResult = {
				database_id: databaseId,
				tables: enrichedTables,
				fks,
				introspected_at: new Date().toISOString(),
			}

			this.logger.info("Schema introspection complete", {
				database_id: databaseId,
				tables: result.tables.length,
				total_columns: columns.length,
				fks: fks.length,
				latency_ms: Date.now() - startTime,
			})

			return result
		} catch (err) {
			if (err instanceof TabularQAError) throw err
			this.logger.error("Schema introspection failed", { database_id: databaseId, error: errorMessage(err) })
			throw new CollaboratorFailure("schema-introspector", `Schema introspection failed: ${errorMessage(err)}`, {
				database_id: databaseId,
			})
		} finally {
			if (client) {
				client.release()
			}
		}
	}

	/**
	 * Get all tables from information_schema
	 */
	private async getTables(client: QueryClient, schemas: string[], excludeTables: string[]): Promise<TableRow[]> {
		const query = `
			SELECT
				t.table_schema,
				t.table_name,
				t.table_type,
				pg_catalog.obj_description(
					(quote_ident(t.table_schema) || '.' || quote_ident(t.table_name))::regclass,
					'pg_class'
				) AS comment
			FROM information_schema.tables t
			WHERE t.table_schema = ANY($1)
				AND t.table_type IN ('BASE TABLE', 'VIEW')
				AND t.table_name != ALL($2)
			ORDER BY t.table_schema, t.table_name
		`

		const result = await client.query(query, [schemas, excludeTables])
		return result.rows.map((row) => ({
			table_schema: asString(row, "table_schema"),
			table_name: asString(row, "table_name"),
			table_type: asString(row, "table_type"),
			comment: asNullableString(row, "comment"),
		}))
	}

	/**
	 * Get all columns with PK info
	 */
	private async getColumns(client: QueryClient, schemas: string[], tableNames: string[]): Promise<ColumnRow[]> {
		const query = `
			WITH pk_columns AS (
				SELECT
					kcu.table_schema,
					kcu.table_name,
					kcu.column_name,
					kcu.ordinal_position AS pk_ordinal
				FROM information_schema.table_constraints tc
				JOIN information_schema.key_column_usage kcu
					ON tc.constraint_name = kcu.constraint_name
					AND tc.table_schema = kcu.table_schema
				WHERE tc.constraint_type = 'PRIMARY KEY'
					AND tc.table_schema = ANY($1)
			)
			SELECT
				c.table_schema,
				c.table_name,
				c.column_name,
				c.data_type,
				(c.is_nullable = 'YES') AS is_nullable,
				c.ordinal_position,
				c.column_default,
				pg_catalog.col_description(
					(quote_ident(c.table_schema) || '.' || quote_ident(c.table_name))::regclass,
					c.ordinal_position
				) AS comment,
				(pk.column_name IS NOT NULL) AS is_pk,
				pk.pk_ordinal
			FROM information_schema.columns c
			LEFT JOIN pk_columns pk
				ON pk.table_schema = c.table_schema
				AND pk.table_name = c.table_name
				AND pk.column_name = c.column_name
			WHERE c.table_schema = ANY($1)
				AND c.table_name = ANY($2)
			ORDER BY c.table_schema, c.table_name, c.ordinal_position
		`

		const result = await client.query(query, [schemas, tableNames])
		return result.rows.map((row) => {
			const pkOrdinal: unknown = row["pk_ordinal"]
			return {
				table_schema: asString(row, "table_schema"),
				table_name: asString(row, "table_name"),
				column_name: asString(row, "column_name"),
				data_type: asString(row, "data_type"),
				is_nullable: asBoolean(row, "is_nullable"),
				ordinal_position: asNumber(row, "ordinal_position"),
				column_default: asNullableString(row, "column_default"),
				comment: asNullableString(row, "comment"),
				is_pk: asBoolean(row, "is_pk"),
				pk_ordinal: pkOrdinal === null || pkOrdinal === undefined ? null : asNumber(row, "pk_ordinal"),
			}
		})
	}

	/**
	 * Get all foreign key relationships
	 */
	private async getForeignKeys(client: QueryClient, schemas: string[], tableNames: string[]): Promise<IntrospectedFK[]> {
		const query = `
			SELECT
				tc.constraint_name,
				kcu.table_schema,
				kcu.table_name,
				kcu.column_name,
				ccu.table_schema AS ref_table_schema,
				ccu.table_name AS ref_table_name,
				ccu.column_name AS ref_column_name
			FROM information_schema.table_constraints tc
			JOIN information_schema.key_column_usage kcu
				ON tc.constraint_name = kcu.constraint_name
				AND tc.table_schema = kcu.table_schema
			JOIN information_schema.constraint_column_usage ccu
				ON ccu.constraint_name = tc.constraint_name
			WHERE tc.constraint_type = 'FOREIGN KEY'
				AND tc.table_schema = ANY($1)
				AND kcu.table_name = ANY($2)
			ORDER BY kcu.table_schema, kcu.table_name, kcu.column_name
		`

		const result = await client.query(query, [schemas, tableNames])
		return result.rows.map((row) => ({
			constraint_name: asString(row, "constraint_name"),
			table_schema: asString(row, "table_schema"),
			table_name: asString(row, "table_name"),
			column_name: asString(row, "column_name"),
			ref_table_schema: asString(row, "ref_table_schema"),
			ref_table_name: asString(row, "ref_table_name"),
			ref_column_name: asString(row, "ref_column_name"),
		}))
	}

	/**
	 * Fill row_count, sample_rows and per-column sample_values in place
	 */
	private async sampleTable(
		client: QueryClient,
		table: IntrospectedTable,
		sampleValueCap: number,
		sampleRowLimit: number,
	): Promise<void> {
		const qualified = `${quoteIdent(table.table_schema)}.${quoteIdent(table.table_name)}`

		const countResult = await client.query(`SELECT COUNT(*) AS row_count FROM ${qualified}`)
		table.row_count = countResult.rows.length > 0 ? asNumber(countResult.rows[0], "row_count") : 0

		if (table.row_count === 0) return

		for (const column of table.columns) {
			const col = quoteIdent(column.column_name)
			const valuesResult = await client.query(
				`SELECT DISTINCT ${col}::text AS value FROM ${qualified} WHERE ${col} IS NOT NULL ORDER BY 1 LIMIT $1`,
				[sampleValueCap],
			)
			column.sample_values = valuesResult.rows
				.map((row) => asNullableString(row, "value"))
				.filter((v): v is string => v !== null)
		}

		if (sampleRowLimit > 0) {
			const rowsResult = await client.query(`SELECT * FROM ${qualified} LIMIT $1`, [sampleRowLimit])
			table.sample_rows = rowsResult.rows.map((row) => {
				const record: Record<string, string | null> = {}
				for (const column of table.columns) {
					record[column.column_name] = formatCell(row[column.column_name])
				}
				return record
			})
		}

		this.logger.debug("Table sampled", {
			table: table.table_name,
			row_count: table.row_count,
			sample_rows: table.sample_rows.length,
		})
	}

	/**
	 * Merge column and FK data into table structures
	 */
	private mergeColumnsIntoTables(tables: TableRow[], columns: ColumnRow[], fks: IntrospectedFK[]): IntrospectedTable[] {
		// Index FKs by table.column
		const fkIndex = new Map<string, IntrospectedFK>()
		for (const fk of fks) {
			const key = `${fk.table_schema}.${fk.table_name}.${fk.column_name}`
			fkIndex.set(key, fk)
		}

		// Group columns by table
		const columnsByTable = new Map<string, ColumnRow[]>()
		for (const col of columns) {
			const key = `${col.table_schema}.${col.table_name}`
			const existing = columnsByTable.get(key) || []
			existing.push(col)
			columnsByTable.set(key, existing)
		}

		return tables.map((table) => {
			const key = `${table.table_schema}.${table.table_name}`
			const tableCols = columnsByTable.get(key) || []

			const enrichedColumns: IntrospectedColumn[] = tableCols.map((col) => {
				const fk = fkIndex.get(`${col.table_schema}.${col.table_name}.${col.column_name}`)

				return {
					column_name: col.column_name,
					data_type: col.data_type,
					is_nullable: col.is_nullable,
					ordinal_position: col.ordinal_position,
					column_default: col.column_default,
					comment: col.comment,
					is_pk: col.is_pk,
					pk_ordinal: col.pk_ordinal,
					is_fk: !!fk,
					fk_constraint_name: fk?.constraint_name ?? null,
					fk_target_schema: fk?.ref_table_schema ?? null,
					fk_target_table: fk?.ref_table_name ?? null,
					fk_target_column: fk?.ref_column_name ?? null,
					sample_values: [],
				}
			})

			const pkColumns = enrichedColumns
				.filter((c) => c.is_pk)
				.sort((a, b) => (a.pk_ordinal ?? 0) - (b.pk_ordinal ?? 0))
				.map((c) => c.column_name)

			return {
				table_schema: table.table_schema,
				table_name: table.table_name,
				table_type: table.table_type,
				comment: table.comment,
				columns: enrichedColumns,
				pk_columns: pkColumns,
				fk_count: enrichedColumns.filter((c) => c.is_fk).length,
				column_count: enrichedColumns.length,
				row_count: 0,
				sample_rows: [],
			}
		})
	}
}
