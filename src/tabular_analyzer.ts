/**
 * Tabular Analyzer
 *
 * Statistics, correlations and aggregates over an in-memory dataset, plus
 * CSV parsing into that dataset shape.
 *
 * analyzeQuestion() answers the simple aggregate questions that the
 * traditional route sends here: average, sum, count, max, min, correlation,
 * distribution, columns, shape, overview.
 */

import * as fs from "fs"
import { parse } from "csv-parse/sync"
import { z } from "zod"
import { CollaboratorFailure, errorMessage } from "./config.js"
import type { Logger } from "./logger.js"
import type {
	AnalysisOperation,
	CellValue,
	ColumnType,
	StatisticsPayload,
	TabularColumn,
	TabularDataset,
} from "./types.js"

// ============================================================================
// CSV Loading
// ============================================================================

const NULL_TOKENS = new Set(["", "na", "n/a", "nan", "null", "none"])
const NUMERIC_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/

const csvRecordsSchema = z.array(z.array(z.string()))

function isNullToken(raw: string): boolean {
	return NULL_TOKENS.has(raw.trim().toLowerCase())
}

export function inferColumnType(values: string[]): ColumnType {
	const present = values.map((v) => v.trim()).filter((v) => !isNullToken(v))
	if (present.length === 0) return "empty"
	if (present.every((v) => NUMERIC_PATTERN.test(v))) return "numeric"
	if (present.every((v) => v.toLowerCase() === "true" || v.toLowerCase() === "false")) return "boolean"
	if (present.every((v) => DATE_PATTERN.test(v) && !isNaN(Date.parse(v)))) return "datetime"
	return "categorical"
}

function toCell(raw: string, type: ColumnType): CellValue {
	const trimmed = raw.trim()
	if (isNullToken(trimmed)) return null
	if (type === "numeric") return Number(trimmed)
	if (type === "boolean") return trimmed.toLowerCase()
	return trimmed
}

/**
 * Parse CSV text (first record is the header) into a typed dataset.
 */
export function parseCsv(text: string, name: string): TabularDataset {
	const parsed: unknown = parse(text, {
		skip_empty_lines: true,
		relax_column_count: true,
		bom: true,
	})
	const records = csvRecordsSchema.parse(parsed)
	if (records.length === 0) {
		return { name, columns: [], rows: [], rowCount: 0 }
	}

	const header = records[0].map((h, i) => h.trim() || `column_${i + 1}`)
	const body = records.slice(1)
	const rawColumns = header.map((_, i) => body.map((r) => r[i] ?? ""))

	const columns: TabularColumn[] = header.map((colName, i) => ({
		name: colName,
		type: inferColumnType(rawColumns[i]),
	}))

	const rows: CellValue[][] = body.map((record) =>
		columns.map((col, i) => toCell(record[i] ?? "", col.type)),
	)

	return { name, columns, rows, rowCount: rows.length }
}

export async function loadCsvFile(filePath: string, name?: string): Promise<TabularDataset> {
	const text = await fs.promises.readFile(filePath, "utf-8")
	const datasetName = name ?? filePath.split(/[\\/]/).pop()?.replace(/\.csv$/i, "") ?? "dataset"
	return parseCsv(text, datasetName)
}

// ============================================================================
// Column Profiles
// ============================================================================

export interface CategoryCount {
	value: string
	count: number
}

export interface ColumnProfile {
	name: string
	type: ColumnType
	nullCount: number
	distinctCount: number
	min: number | null
	max: number | null
	mean: number | null
	sum: number | null
	std: number | null
	/** Most frequent values, count desc then first appearance */
	topCategories: CategoryCount[]
	earliest: string | null
	latest: string | null
}

export function formatNumber(n: number): string {
	return Number.isInteger(n) ? String(n) : n.toFixed(2)
}

export function columnIndex(dataset: TabularDataset, columnName: string): number {
	return dataset.columns.findIndex((c) => c.name === columnName)
}

export function numericValues(dataset: TabularDataset, index: number): number[] {
	const values: number[] = []
	for (const row of dataset.rows) {
		const v = row[index]
		if (typeof v === "number" && !isNaN(v)) values.push(v)
	}
	return values
}

function categoryCounts(dataset: TabularDataset, index: number): CategoryCount[] {
	const counts = new Map<string, number>()
	for (const row of dataset.rows) {
		const v = row[index]
		if (v === null || v === undefined) continue
		const key = String(v)
		counts.set(key, (counts.get(key) ?? 0) + 1)
	}
	// Map keeps first-appearance order, and Array.sort is stable
	return [...counts.entries()]
		.map(([value, count]) => ({ value, count }))
		.sort((a, b) => b.count - a.count)
}

/** Smallest and largest of a non-empty list, without spreading it into arguments */
export function extent(values: number[]): { min: number; max: number } {
	return values.reduce(
		(acc, v) => ({ min: v < acc.min ? v : acc.min, max: v > acc.max ? v : acc.max }),
		{ min: values[0], max: values[0] },
	)
}

export function profileColumn(dataset: TabularDataset, index: number, maxTopCategories: number = 5): ColumnProfile {
	const column = dataset.columns[index]
	const cells = dataset.rows.map((r) => r[index] ?? null)
	const nullCount = cells.filter((c) => c === null).length
	const distinctCount = new Set(cells.filter((c) => c !== null).map((c) => String(c))).size

	const profile: ColumnProfile = {
		name: column.name,
		type: column.type,
		nullCount,
		distinctCount,
		min: null,
		max: null,
		mean: null,
		sum: null,
		std: null,
		topCategories: [],
		earliest: null,
		latest: null,
	}

	if (column.type === "numeric") {
		const values = numericValues(dataset, index)
		if (values.length > 0) {
			const sum = values.reduce((acc, v) => acc + v, 0)
			const mean = sum / values.length
			profile.sum = sum
			profile.mean = mean
			const { min, max } = extent(values)
			profile.min = min
			profile.max = max
			// Sample standard deviation (n - 1)
			profile.std = values.length > 1
				? Math.sqrt(values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (values.length - 1))
				: 0
		}
	} else if (column.type === "datetime") {
		const values = cells.filter((c): c is string => typeof c === "string").sort()
		profile.earliest = values[0] ?? null
		profile.latest = values[values.length - 1] ?? null
	} else if (column.type === "categorical" || column.type === "boolean") {
		profile.topCategories = categoryCounts(dataset, index).slice(0, maxTopCategories)
	}

	return profile
}

// ============================================================================
// Correlations
// ============================================================================

export interface CorrelationPair {
	left: string
	right: string
	coefficient: number
}

/**
 * Pearson correlation over rows where both values are present.
 * Null when fewer than two pairs or either side has zero variance.
 */
export function pearson(xs: number[], ys: number[]): number | null {
	const n = Math.min(xs.length, ys.length)
	if (n < 2) return null
	let sumX = 0
	let sumY = 0
	for (let i = 0; i < n; i++) {
		sumX += xs[i]
		sumY += ys[i]
	}
	const meanX = sumX / n
	const meanY = sumY / n
	let cov = 0
	let varX = 0
	let varY = 0
	for (let i = 0; i < n; i++) {
		const dx = xs[i] - meanX
		const dy = ys[i] - meanY
		cov += dx * dy
		varX += dx * dx
		varY += dy * dy
	}
	if (varX === 0 || varY === 0) return null
	return cov / Math.sqrt(varX * varY)
}

/**
 * All numeric column pairs, strongest absolute correlation first.
 */
export function correlations(dataset: TabularDataset): CorrelationPair[] {
	const numeric = dataset.columns
		.map((c, i) => ({ name: c.name, index: i, type: c.type }))
		.filter((c) => c.type === "numeric")

	const pairs: CorrelationPair[] = []
	for (let i = 0; i < numeric.length; i++) {
		for (let j = i + 1; j < numeric.length; j++) {
			const xs: number[] = []
			const ys: number[] = []
			for (const row of dataset.rows) {
				const x = row[numeric[i].index]
				const y = row[numeric[j].index]
				if (typeof x === "number" && typeof y === "number") {
					xs.push(x)
					ys.push(y)
				}
			}
			const coefficient = pearson(xs, ys)
			if (coefficient !== null) {
				pairs.push({ left: numeric[i].name, right: numeric[j].name, coefficient })
			}
		}
	}
	return pairs.sort((a, b) => Math.abs(b.coefficient) - Math.abs(a.coefficient))
}

// ============================================================================
// Analyzer
// ============================================================================

export interface AnalysisResult {
	text: string
	statistics: StatisticsPayload
}

interface OperationRule {
	operation: AnalysisOperation
	pattern: RegExp
}

/** First match wins */
const OPERATION_RULES: OperationRule[] = [
	{ operation: "average", pattern: /\b(average|avg|mean)\b/ },
	{ operation: "sum", pattern: /\b(sum|total)\b/ },
	{ operation: "count", pattern: /\b(count|how many|number of)\b/ },
	{ operation: "max", pattern: /\b(max|maximum|highest|largest)\b/ },
	{ operation: "min", pattern: /\b(min|minimum|lowest|smallest)\b/ },
	{ operation: "correlation", pattern: /\b(correlations?|relationships?)\b/ },
	{ operation: "distribution", pattern: /\b(distribution|spread)\b/ },
	{ operation: "columns", pattern: /\b(columns|fields)\b/ },
	{ operation: "shape", pattern: /\b(shape|size|dimensions)\b/ },
	{ operation: "overview", pattern: /\b(summary|overview)\b/ },
]

export function detectOperation(question: string): AnalysisOperation {
	const lower = question.toLowerCase()
	for (const rule of OPERATION_RULES) {
		if (rule.pattern.test(lower)) return rule.operation
	}
	return "general"
}

/**
 * First column (in dataset order) whose name appears in the question.
 * Underscores in column names also match spaces ("unit_price" ~ "unit price").
 */
export function findMentionedColumn(dataset: TabularDataset, question: string): TabularColumn | null {
	const lower = question.toLowerCase()
	for (const column of dataset.columns) {
		const name = column.name.toLowerCase()
		if (lower.includes(name) || lower.includes(name.replace(/_/g, " "))) {
			return column
		}
	}
	return null
}

export class TabularAnalyzer {
	private logger: Logger
	private maxTopCategories: number

	constructor(logger: Logger, maxTopCategories: number = 5) {
		this.logger = logger
		this.maxTopCategories = maxTopCategories
	}

	/**
	 * Answer an aggregate question. Throws CollaboratorFailure on unexpected errors.
	 */
	analyzeQuestion(dataset: TabularDataset, question: string): AnalysisResult {
		const operation = detectOperation(question)
		this.logger.debug("Tabular analysis", { dataset: dataset.name, operation })

		if (dataset.rowCount === 0 || dataset.columns.length === 0) {
			return {
				text: `Dataset ${dataset.name} has no rows to analyze.`,
				statistics: { operation, column: null, values: { rows: 0 } },
			}
		}

		try {
			switch (operation) {
				case "average":
				case "sum":
				case "max":
				case "min":
					return this.numericAggregate(dataset, question, operation)
				case "count":
					return this.count(dataset, question)
				case "correlation":
					return this.correlation(dataset)
				case "distribution":
					return this.distribution(dataset, question)
				case "columns":
					return {
						text: `Columns in the dataset: ${dataset.columns.map((c) => c.name).join(", ")}`,
						statistics: {
							operation,
							column: null,
							values: Object.fromEntries(dataset.columns.map((c) => [c.name, c.type])),
						},
					}
				case "shape":
					return {
						text: `Dataset shape: ${dataset.rowCount} rows, ${dataset.columns.length} columns`,
						statistics: {
							operation,
							column: null,
							values: { rows: dataset.rowCount, columns: dataset.columns.length },
						},
					}
				case "overview":
					return this.overview(dataset, operation)
				case "general":
					return this.overview(dataset, operation, question)
			}
		} catch (err) {
			throw new CollaboratorFailure("tabular-analyzer", `Statistic computation failed: ${errorMessage(err)}`, {
				dataset: dataset.name,
				operation,
			})
		}
	}

	/**
	 * Dataset-level observations (data quality, ranges, dominant categories).
	 */
	insights(dataset: TabularDataset): string[] {
		if (dataset.rowCount === 0) return ["No data available for analysis"]

		const insights: string[] = []
		const cells = dataset.rowCount * dataset.columns.length
		const missing = dataset.rows.reduce((acc, row) => acc + row.filter((c) => c === null).length, 0)
		const missingPct = cells === 0 ? 0 : (missing / cells) * 100
		if (missingPct > 10) {
			insights.push(`Data quality concern: ${missingPct.toFixed(1)}% missing values`)
		}

		insights.push(`Dataset contains ${dataset.rowCount} records with ${dataset.columns.length} attributes`)

		dataset.columns.forEach((column, i) => {
			const profile = profileColumn(dataset, i, this.maxTopCategories)
			if (column.type === "numeric" && profile.min !== null && profile.max !== null && (profile.std ?? 0) > 0) {
				insights.push(`${column.name}: Range from ${profile.min.toFixed(2)} to ${profile.max.toFixed(2)}`)
			}
			if (column.type === "categorical" && profile.distinctCount < dataset.rowCount * 0.8 && profile.topCategories.length > 0) {
				insights.push(
					`${column.name}: ${profile.distinctCount} unique values, most common is '${profile.topCategories[0].value}'`,
				)
			}
		})

		return insights
	}

	private numericAggregate(
		dataset: TabularDataset,
		question: string,
		operation: "average" | "sum" | "max" | "min",
	): AnalysisResult {
		const label: Record<typeof operation, string> = {
			average: "Average",
			sum: "Total",
			max: "Maximum",
			min: "Minimum",
		}
		const compute = (values: number[]): number => {
			switch (operation) {
				case "average":
					return values.reduce((a, v) => a + v, 0) / values.length
				case "sum":
					return values.reduce((a, v) => a + v, 0)
				case "max":
					return extent(values).max
				case "min":
					return extent(values).min
			}
		}

		const mentioned = findMentionedColumn(dataset, question)
		const numericCols = dataset.columns.filter((c) => c.type === "numeric")

		if (mentioned && mentioned.type === "numeric") {
			const values = numericValues(dataset, columnIndex(dataset, mentioned.name))
			if (values.length === 0) {
				return {
					text: `Column ${mentioned.name} has no numeric values.`,
					statistics: { operation, column: mentioned.name, values: { [mentioned.name]: null } },
				}
			}
			const result = compute(values)
			return {
				text: `${label[operation]} ${mentioned.name}: ${formatNumber(result)}`,
				statistics: { operation, column: mentioned.name, values: { [mentioned.name]: result } },
			}
		}

		if (numericCols.length === 0) {
			return {
				text: `No numerical columns found for the ${operation} calculation.`,
				statistics: { operation, column: null, values: {} },
			}
		}

		const values: Record<string, number | null> = {}
		const lines: string[] = []
		for (const col of numericCols) {
			const colValues = numericValues(dataset, columnIndex(dataset, col.name))
			const result = colValues.length > 0 ? compute(colValues) : null
			values[col.name] = result
			lines.push(`${col.name}: ${result === null ? "n/a" : formatNumber(result)}`)
		}
		const heading = operation === "average" ? "Averages" : operation === "sum" ? "Totals" : `${label[operation]} values`
		return {
			text: `${heading}:\n${lines.join("\n")}`,
			statistics: { operation, column: null, values },
		}
	}

	private count(dataset: TabularDataset, question: string): AnalysisResult {
		const mentioned = findMentionedColumn(dataset, question)
		if (!mentioned) {
			return {
				text: `Total number of rows: ${dataset.rowCount}`,
				statistics: { operation: "count", column: null, values: { rows: dataset.rowCount } },
			}
		}

		const index = columnIndex(dataset, mentioned.name)
		if (mentioned.type === "numeric") {
			const nonNull = numericValues(dataset, index).length
			return {
				text: `Non-null count for ${mentioned.name}: ${nonNull}`,
				statistics: { operation: "count", column: mentioned.name, values: { non_null: nonNull } },
			}
		}

		const counts = categoryCounts(dataset, index)
		return {
			text: `Value counts for ${mentioned.name}:\n${counts.map((c) => `${c.value}: ${c.count}`).join("\n")}`,
			statistics: {
				operation: "count",
				column: mentioned.name,
				values: Object.fromEntries(counts.map((c) => [c.value, c.count])),
			},
		}
	}

	private correlation(dataset: TabularDataset): AnalysisResult {
		const numericCount = dataset.columns.filter((c) => c.type === "numeric").length
		if (numericCount < 2) {
			return {
				text: "Need at least 2 numerical columns to calculate correlations.",
				statistics: { operation: "correlation", column: null, values: {} },
			}
		}

		const pairs = correlations(dataset).slice(0, 5)
		if (pairs.length === 0) {
			return {
				text: "No correlations could be computed (constant or missing values).",
				statistics: { operation: "correlation", column: null, values: {} },
			}
		}
		return {
			text: `Strongest correlations:\n${pairs.map((p) => `${p.left} - ${p.right}: ${p.coefficient.toFixed(3)}`).join("\n")}`,
			statistics: {
				operation: "correlation",
				column: null,
				values: Object.fromEntries(pairs.map((p) => [`${p.left}~${p.right}`, p.coefficient])),
			},
		}
	}

	private distribution(dataset: TabularDataset, question: string): AnalysisResult {
		const mentioned = findMentionedColumn(dataset, question)
		if (!mentioned) {
			return {
				text: "Please specify which column's distribution you'd like to see.",
				statistics: { operation: "distribution", column: null, values: {} },
			}
		}

		const index = columnIndex(dataset, mentioned.name)
		if (mentioned.type === "numeric") {
			const p = profileColumn(dataset, index, this.maxTopCategories)
			const values: Record<string, number | null> = {
				count: dataset.rowCount - p.nullCount,
				mean: p.mean,
				std: p.std,
				min: p.min,
				max: p.max,
			}
			const lines = Object.entries(values).map(([k, v]) => `${k}: ${v === null ? "n/a" : formatNumber(v)}`)
			return {
				text: `Distribution statistics for ${mentioned.name}:\n${lines.join("\n")}`,
				statistics: { operation: "distribution", column: mentioned.name, values },
			}
		}

		const counts = categoryCounts(dataset, index)
		return {
			text: `Distribution of ${mentioned.name}:\n${counts.map((c) => `${c.value}: ${c.count}`).join("\n")}`,
			statistics: {
				operation: "distribution",
				column: mentioned.name,
				values: Object.fromEntries(counts.map((c) => [c.value, c.count])),
			},
		}
	}

	private overview(dataset: TabularDataset, operation: AnalysisOperation, question?: string): AnalysisResult {
		const numeric = dataset.columns.filter((c) => c.type === "numeric").length
		const categorical = dataset.columns.filter((c) => c.type === "categorical").length
		const missing = dataset.rows.reduce((acc, row) => acc + row.filter((c) => c === null).length, 0)
		const lines = [
			"Dataset Overview:",
			`- Shape: ${dataset.rowCount} rows, ${dataset.columns.length} columns`,
			`- Columns: ${dataset.columns.map((c) => c.name).join(", ")}`,
			`- Numerical columns: ${numeric}`,
			`- Categorical columns: ${categorical}`,
			`- Missing values: ${missing} total`,
			"",
			"Key insights:",
			...this.insights(dataset).map((insight) => `- ${insight}`),
		]
		const prefix = question ? `I understand you're asking about: '${question}'\n\n` : ""
		return {
			text: prefix + lines.join("\n"),
			statistics: {
				operation,
				column: null,
				values: {
					rows: dataset.rowCount,
					columns: dataset.columns.length,
					numeric_columns: numeric,
					categorical_columns: categorical,
					missing_values: missing,
				},
			},
		}
	}
}
