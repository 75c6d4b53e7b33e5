/**
 * Question Classifier
 *
 * Decides whether a question is structured (SQL / statistics) or analytical
 * (needs retrieved context), from a declarative keyword table.
 *
 * score = Σ analytical weights − Σ structured weights
 * isAnalytical ⇔ score > 0; ties go to the traditional path.
 *
 * The same table drives the traditional sub-path: schema markers vs
 * statistic markers.
 */

import * as fs from "fs"
import * as yaml from "js-yaml"
import { fileURLToPath } from "url"
import { z } from "zod"
import { ConfigurationError } from "./config.js"
import type { TraditionalPath } from "./types.js"

// ============================================================================
// Types
// ============================================================================

export type KeywordCategory = "structured-schema" | "structured-statistic" | "analytical"

export interface KeywordRule {
	pattern: string
	weight: number
	category: KeywordCategory
}

export interface Classification {
	isAnalytical: boolean
	matchedKeywords: Set<string>
	/** analytical weight − structured weight */
	score: number
	/** |score| / total matched weight; 0 when nothing matched */
	confidence: number
	schemaWeight: number
	statisticWeight: number
	analyticalWeight: number
}

interface CompiledRule extends KeywordRule {
	regex: RegExp
}

// ============================================================================
// Rule Loading
// ============================================================================

const DEFAULT_RULES_PATH = fileURLToPath(new URL("../config/keyword_rules.yaml", import.meta.url))

const ruleEntrySchema = z.object({
	pattern: z.string().trim().min(1),
	weight: z.number().positive().default(1),
})

const ruleFileSchema = z.object({
	"structured-schema": z.array(ruleEntrySchema).default([]),
	"structured-statistic": z.array(ruleEntrySchema).default([]),
	analytical: z.array(ruleEntrySchema).default([]),
})

/**
 * Load a keyword table from YAML. Categories are the top-level keys.
 */
export function loadKeywordRules(filePath: string = DEFAULT_RULES_PATH): KeywordRule[] {
	let parsed: unknown
	try {
		parsed = yaml.load(fs.readFileSync(filePath, "utf-8"))
	} catch (err) {
		throw new ConfigurationError(`Cannot read keyword rules from ${filePath}: ${String(err)}`, { file: filePath })
	}
	return parseKeywordRules(parsed, filePath)
}

export function parseKeywordRules(raw: unknown, source: string = "inline"): KeywordRule[] {
	const result = ruleFileSchema.safeParse(raw)
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new ConfigurationError(`Invalid keyword rules (${source}): ${issues.join("; ")}`, { source, issues })
	}

	const rules: KeywordRule[] = []
	const seen = new Map<string, KeywordCategory>()
	const categories: KeywordCategory[] = ["structured-schema", "structured-statistic", "analytical"]

	for (const category of categories) {
		for (const entry of result.data[category]) {
			const pattern = entry.pattern.toLowerCase()
			const previous = seen.get(pattern)
			if (previous && previous !== category) {
				throw new ConfigurationError(
					`Keyword "${pattern}" appears in both ${previous} and ${category}`,
					{ source, pattern },
				)
			}
			seen.set(pattern, category)
			rules.push({ pattern, weight: entry.weight, category })
		}
	}

	return rules
}

let defaultRules: KeywordRule[] | null = null

export function getDefaultKeywordRules(): KeywordRule[] {
	if (!defaultRules) {
		defaultRules = loadKeywordRules()
	}
	return defaultRules
}

// ============================================================================
// Matching
// ============================================================================

function escapeRegex(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Word-boundary matcher; multi-word patterns tolerate any whitespace run.
 */
function compilePattern(pattern: string): RegExp {
	const body = pattern.split(/\s+/).map(escapeRegex).join("\\s+")
	return new RegExp(`\\b${body}\\b`, "i")
}

// ============================================================================
// Classifier
// ============================================================================

export class QuestionClassifier {
	private rules: CompiledRule[]

	constructor(rules: KeywordRule[] = getDefaultKeywordRules()) {
		this.rules = rules.map((rule) => ({ ...rule, regex: compilePattern(rule.pattern) }))
	}

	classify(question: string): Classification {
		const matchedKeywords = new Set<string>()
		let schemaWeight = 0
		let statisticWeight = 0
		let analyticalWeight = 0

		for (const rule of this.rules) {
			if (!rule.regex.test(question)) continue
			matchedKeywords.add(rule.pattern)
			switch (rule.category) {
				case "structured-schema":
					schemaWeight += rule.weight
					break
				case "structured-statistic":
					statisticWeight += rule.weight
					break
				case "analytical":
					analyticalWeight += rule.weight
					break
			}
		}

		const structuredWeight = schemaWeight + statisticWeight
		const score = analyticalWeight - structuredWeight
		const total = analyticalWeight + structuredWeight

		return {
			isAnalytical: score > 0,
			matchedKeywords,
			score,
			confidence: total === 0 ? 0 : Math.abs(score) / total,
			schemaWeight,
			statisticWeight,
			analyticalWeight,
		}
	}

	/**
	 * Pick Schema Introspector vs Tabular Analyzer for a traditional answer.
	 * Ambiguous questions go to the tabular path when a tabular dataset is active.
	 */
	traditionalPath(question: string, hasTabularDataset: boolean): TraditionalPath {
		const { schemaWeight, statisticWeight } = this.classify(question)
		if (schemaWeight > statisticWeight) return "schema"
		if (statisticWeight > schemaWeight) return "tabular"
		return hasTabularDataset ? "tabular" : "schema"
	}
}
