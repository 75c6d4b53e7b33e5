/**
 * SQL path of the traditional strategy
 *
 * - Pattern-based NL → SQL over an introspected schema
 * - Read-only guard (single SELECT/WITH statement, no write keywords, no admin functions)
 * - Schema-question answers (table list, table columns, overview)
 * - Query execution through pg with a statement timeout and a row cap
 */

import { CollaboratorFailure, DEFAULTS, TabularQAError, errorMessage } from "./config.js"
import type { Logger } from "./logger.js"
import { formatCell, quoteIdent, type IntrospectedTable, type QueryClient, type QueryPool, type SchemaSource } from "./schema_introspector.js"

// ============================================================================
// Read-only guard
// ============================================================================

/**
 * Keywords that never appear in a read-only query
 * (checked outside strings/comments only)
 */
const DANGEROUS_KEYWORDS = [
	"DROP", "CREATE", "ALTER", "TRUNCATE", "RENAME",
	"INSERT", "UPDATE", "DELETE", "MERGE", "INTO",
	"GRANT", "REVOKE",
	"BEGIN", "COMMIT", "ROLLBACK", "SAVEPOINT",
	"COPY", "EXECUTE", "PREPARE", "VACUUM", "CALL",
]

/** File I/O, sleeps, backend control, external connections */
const DANGEROUS_FUNCTIONS = [
	"pg_read_file", "pg_read_binary_file", "pg_ls_dir", "lo_export", "lo_import",
	"pg_sleep", "pg_terminate_backend", "pg_cancel_backend",
	"dblink", "dblink_connect", "dblink_exec",
	"pg_reload_conf", "pg_rotate_logfile", "pg_stat_reset",
]

export interface SqlGuardResult {
	valid: boolean
	/** Statement with any trailing semicolon removed */
	sql: string
	reason?: string
}

/**
 * Code outside string literals, quoted identifiers and comments, with each
 * skipped span replaced by a single space.
 */
function codeOutsideLiterals(sql: string): string {
	let out = ""
	let i = 0
	const len = sql.length

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		if (char === "-" && next === "-") {
			while (i < len && sql[i] !== "\n") i++
			out += " "
			continue
		}

		if (char === "/" && next === "*") {
			const end = sql.indexOf("*/", i + 2)
			i = end === -1 ? len : end + 2
			out += " "
			continue
		}

		if (char === "'" || char === '"') {
			i++
			while (i < len) {
				if (sql[i] === char) {
					// Doubled quote is an escape
					if (sql[i + 1] === char) {
						i += 2
						continue
					}
					i++
					break
				}
				i++
			}
			out += char === '"' ? " ident " : " "
			continue
		}

		if (char === "$") {
			const tagEnd = sql.indexOf("$", i + 1)
			const tag = tagEnd === -1 ? "" : sql.substring(i, tagEnd + 1)
			if (tag && /^\$\w*\$$/.test(tag)) {
				const close = sql.indexOf(tag, tagEnd + 1)
				i = close === -1 ? len : close + tag.length
				out += " "
				continue
			}
		}

		out += char
		i++
	}

	return out
}

export function validateReadOnlySql(sql: string): SqlGuardResult {
	const trimmed = sql.trim().replace(/;\s*$/, "").trim()
	const code = codeOutsideLiterals(trimmed)

	if (!trimmed) {
		return { valid: false, sql: trimmed, reason: "Empty statement" }
	}
	if (code.includes(";")) {
		return { valid: false, sql: trimmed, reason: "Multiple statements are not allowed" }
	}
	if (!/^\s*(select|with)\b/i.test(code)) {
		return { valid: false, sql: trimmed, reason: "Only SELECT queries are allowed" }
	}
	const upper = code.toUpperCase()
	for (const keyword of DANGEROUS_KEYWORDS) {
		if (new RegExp(`\\b${keyword}\\b`).test(upper)) {
			return { valid: false, sql: trimmed, reason: `Forbidden keyword: ${keyword}` }
		}
	}
	const locking = /\bFOR\s+(NO\s+KEY\s+UPDATE|KEY\s+SHARE|UPDATE|SHARE)\b/.exec(upper)
	if (locking) {
		return { valid: false, sql: trimmed, reason: `Locking clause not allowed: ${locking[0].replace(/\s+/g, " ")}` }
	}
	const lower = code.toLowerCase()
	for (const fn of DANGEROUS_FUNCTIONS) {
		if (new RegExp(`\\b${fn}\\s*\\(`).test(lower)) {
			return { valid: false, sql: trimmed, reason: `Forbidden function: ${fn}` }
		}
	}
	return { valid: true, sql: trimmed }
}

// ============================================================================
// NL → SQL patterns
// ============================================================================

export type SqlPatternName = "literal" | "count" | "average" | "sum" | "max" | "min" | "select_all" | "table_mention"

export interface GeneratedSql {
	sql: string
	pattern: SqlPatternName
	table: string
}

interface AggregatePattern {
	name: "average" | "sum" | "max" | "min"
	fn: string
	alias: string
	regex: RegExp
}

const LITERAL_SQL = /^\s*(select|with)\b/i
const COUNT_PATTERN = /\b(?:how many|count|number of)\s+(?:the\s+)?(\w+)/
const SELECT_ALL_PATTERN = /\b(?:show|list|get|display|view)\s+(?:me\s+)?(?:all\s+)?(?:the\s+)?(\w+)/
const AGGREGATE_PATTERNS: AggregatePattern[] = [
	{ name: "average", fn: "AVG", alias: "average", regex: /\b(?:average|avg|mean)\s+(?:of\s+)?(?:the\s+)?(\w+)/ },
	{ name: "sum", fn: "SUM", alias: "total", regex: /\b(?:total|sum)\s+(?:of\s+)?(?:the\s+)?(\w+)/ },
	{ name: "max", fn: "MAX", alias: "max", regex: /\b(?:highest|maximum|max|largest)\s+(?:of\s+)?(?:the\s+)?(\w+)/ },
	{ name: "min", fn: "MIN", alias: "min", regex: /\b(?:lowest|minimum|min|smallest)\s+(?:of\s+)?(?:the\s+)?(\w+)/ },
]

function singular(word: string): string {
	if (word.endsWith("ies")) return `${word.slice(0, -3)}y`
	if (word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1)
	return word
}

/**
 * Table for a word: exact name, then singular/plural forms, then containment.
 */
export function findTable(word: string, tables: IntrospectedTable[]): IntrospectedTable | null {
	const w = word.toLowerCase()
	if (w.length < 3) return null
	const exact = tables.find((t) => t.table_name.toLowerCase() === w)
	if (exact) return exact
	const stem = singular(w)
	const forms = tables.find((t) => singular(t.table_name.toLowerCase()) === stem)
	if (forms) return forms
	return tables.find((t) => t.table_name.toLowerCase().includes(stem)) ?? null
}

/**
 * Column for a word, searched across all tables; a mentioned table wins ties.
 */
export function findColumn(
	word: string,
	tables: IntrospectedTable[],
	question: string,
): { table: IntrospectedTable; column: string } | null {
	const w = word.toLowerCase()
	const mentioned = tables.filter((t) => question.includes(singular(t.table_name.toLowerCase())))
	const ordered = [...mentioned, ...tables.filter((t) => !mentioned.includes(t))]

	for (const match of [
		(c: string) => c === w,
		(c: string) => c.split("_").includes(w) || c.split("_").includes(singular(w)),
	]) {
		for (const table of ordered) {
			const column = table.columns.find((c) => match(c.column_name.toLowerCase()))
			if (column) return { table, column: column.column_name }
		}
	}
	return null
}

function escapeRegex(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

function tableRef(table: IntrospectedTable): string {
	return table.table_schema === "public"
		? quoteIdent(table.table_name)
		: `${quoteIdent(table.table_schema)}.${quoteIdent(table.table_name)}`
}

/**
 * Map a question onto one SQL pattern. Null when nothing in the schema matches.
 */
export function generateSql(question: string, schema: SchemaSource, maxRows: number = DEFAULTS.maxRows): GeneratedSql | null {
	if (LITERAL_SQL.test(question)) {
		return { sql: question.trim().replace(/;\s*$/, ""), pattern: "literal", table: "" }
	}

	const lower = question.toLowerCase()
	const tables = schema.tables

	const count = COUNT_PATTERN.exec(lower)
	if (count) {
		const table = findTable(count[1], tables)
		if (table) {
			return { sql: `SELECT COUNT(*) AS count FROM ${tableRef(table)}`, pattern: "count", table: table.table_name }
		}
	}

	for (const agg of AGGREGATE_PATTERNS) {
		const match = agg.regex.exec(lower)
		if (!match) continue
		const found = findColumn(match[1], tables, lower)
		if (found) {
			const col = quoteIdent(found.column)
			return {
				sql: `SELECT ${agg.fn}(${col}) AS ${quoteIdent(`${agg.alias}_${found.column}`)} FROM ${tableRef(found.table)}`,
				pattern: agg.name,
				table: found.table.table_name,
			}
		}
	}

	const selectAll = SELECT_ALL_PATTERN.exec(lower)
	if (selectAll) {
		const table = findTable(selectAll[1], tables)
		if (table) {
			return { sql: `SELECT * FROM ${tableRef(table)} LIMIT ${maxRows}`, pattern: "select_all", table: table.table_name }
		}
	}

	const words = lower.split(/[^a-z0-9_]+/).filter(Boolean)
	for (const word of words) {
		const table = findTable(word, tables)
		if (table && (word === table.table_name.toLowerCase() || singular(word) === singular(table.table_name.toLowerCase()))) {
			return { sql: `SELECT * FROM ${tableRef(table)} LIMIT ${maxRows}`, pattern: "table_mention", table: table.table_name }
		}
	}

	return null
}

// ============================================================================
// Schema questions
// ============================================================================

const SCHEMA_QUESTION = /\b(tables|schema|structure|columns|fields)\b/i

export function isSchemaQuestion(question: string): boolean {
	return SCHEMA_QUESTION.test(question) && !LITERAL_SQL.test(question)
}

/**
 * Table list, a mentioned table's columns, or a one-line-per-table overview.
 */
export function describeSchema(schema: SchemaSource, question: string): string {
	const lower = question.toLowerCase()
	if (schema.tables.length === 0) {
		return "The database has no tables."
	}

	for (const table of schema.tables) {
		const name = table.table_name.toLowerCase()
		if (new RegExp(`\\b(${escapeRegex(name)}|${escapeRegex(singular(name))})\\b`).test(lower)) {
			const lines = table.columns.map((c) => {
				const traits = [c.data_type]
				if (c.is_pk) traits.push("primary key")
				if (c.fk_target_table) traits.push(`references ${c.fk_target_table}.${c.fk_target_column ?? ""}`)
				return `• ${c.column_name} (${traits.join(", ")})`
			})
			return `Schema for '${table.table_name}' table (${table.row_count} rows):\n${lines.join("\n")}`
		}
	}

	if (/\btables\b/.test(lower)) {
		return `Available tables in the database:\n${schema.tables.map((t) => `• ${t.table_name}`).join("\n")}`
	}

	return schema.tables
		.map((t) => `${t.table_name} (${t.row_count} rows): ${t.columns.map((c) => c.column_name).join(", ")}`)
		.join("\n")
}

// ============================================================================
// Execution
// ============================================================================

export interface QueryRows {
	columns: string[]
	rows: Array<Record<string, string | null>>
	/** Rows the query returned before the cap */
	rowCount: number
	truncated: boolean
}

export interface QueryRunner {
	run(sql: string): Promise<QueryRows>
}

export function formatRows(result: QueryRows): string {
	if (result.rows.length === 0) {
		return "Query executed successfully, but returned no results."
	}
	const header = result.columns.join(" | ")
	const lines = [header, "-".repeat(header.length)]
	for (const row of result.rows) {
		lines.push(result.columns.map((c) => row[c] ?? "NULL").join(" | "))
	}
	if (result.truncated) {
		lines.push(`(${result.rows.length} of ${result.rowCount} rows shown)`)
	}
	return lines.join("\n")
}

export class SchemaQueryRunner implements QueryRunner {
	private pool: QueryPool
	private logger: Logger
	private maxRows: number
	private statementTimeoutMs: number

	constructor(
		pool: QueryPool,
		logger: Logger,
		options: { maxRows?: number; statementTimeoutMs?: number } = {},
	) {
		this.pool = pool
		this.logger = logger
		this.maxRows = options.maxRows ?? DEFAULTS.maxRows
		this.statementTimeoutMs = options.statementTimeoutMs ?? DEFAULTS.statementTimeoutMs
	}

	async run(sql: string): Promise<QueryRows> {
		const guard = validateReadOnlySql(sql)
		if (!guard.valid) {
			throw new CollaboratorFailure("sql-executor", `Refusing to execute query: ${guard.reason ?? "invalid SQL"}`, { sql })
		}

		const startTime = Date.now()
		let client: QueryClient | null = null
		try {
			client = await this.pool.connect()
			await client.query(`SET statement_timeout = ${this.statementTimeoutMs}`)
			const result = await client.query(guard.sql)

			const columns = result.fields.map((f) => f.name)
			const rows = result.rows.slice(0, this.maxRows).map((row) => {
				const record: Record<string, string | null> = {}
				for (const column of columns) {
					record[column] = formatCell(row[column])
				}
				return record
			})

			this.logger.info("Query executed successfully", {
				rows_returned: result.rows.length,
				execution_time_ms: Date.now() - startTime,
			})

			return { columns, rows, rowCount: result.rows.length, truncated: result.rows.length > this.maxRows }
		} catch (err) {
			if (err instanceof TabularQAError) throw err
			throw new CollaboratorFailure("sql-executor", `Query execution failed: ${errorMessage(err)}`, { sql: guard.sql })
		} finally {
			if (client) {
				client.release()
			}
		}
	}
}

// ============================================================================
// Schema path answerer
// ============================================================================

export interface SchemaAnswer {
	text: string
	sql?: string
}

export interface SchemaAnswerer {
	answer(question: string, schema: SchemaSource): Promise<SchemaAnswer>
}

export class SqlSchemaAnswerer implements SchemaAnswerer {
	private runner: QueryRunner | null
	private logger: Logger
	private maxRows: number

	constructor(runner: QueryRunner | null, logger: Logger, maxRows: number = DEFAULTS.maxRows) {
		this.runner = runner
		this.logger = logger
		this.maxRows = maxRows
	}

	async answer(question: string, schema: SchemaSource): Promise<SchemaAnswer> {
		if (isSchemaQuestion(question)) {
			return { text: describeSchema(schema, question) }
		}

		const generated = generateSql(question, schema, this.maxRows)
		if (!generated) {
			this.logger.debug("No SQL pattern matched", { database_id: schema.database_id })
			return {
				text: `I couldn't map that question onto the schema. ${describeSchema(schema, "tables")}`,
			}
		}

		const guard = validateReadOnlySql(generated.sql)
		if (!guard.valid) {
			return { text: `Refusing to run that query: ${guard.reason ?? "invalid SQL"}.`, sql: guard.sql }
		}

		const preface = `Here's the SQL query to answer your question:\n\n\`\`\`sql\n${guard.sql}\n\`\`\``
		if (!this.runner) {
			return { text: `${preface}\n\n(Not executed: no database connection.)`, sql: guard.sql }
		}

		const rows = await this.runner.run(guard.sql)
		return { text: `${preface}\n\nResult:\n${formatRows(rows)}`, sql: guard.sql }
	}
}
