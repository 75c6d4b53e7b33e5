/**
 * Routing Orchestrator
 *
 * Per question: Idle → Classifying → Routed(traditional | rag) → Answered.
 *
 * route() picks the strategy (forced modes first, then the classifier, with
 * empty-index fallbacks). answer() dispatches to the traditional path
 * (schema/SQL or tabular statistics) or to retrieval + generation, and always
 * returns an Answer: collaborator failures become a "failed" Answer.
 * Only ConfigurationError escapes.
 */

import { v4 as uuidv4 } from "uuid"
import type { AnswerGenerator } from "./answer_generator.js"
import { ConfigurationError, DEFAULTS, errorMessage, parseForcedMode } from "./config.js"
import type { IndexStore } from "./index_store.js"
import type { Logger } from "./logger.js"
import type { QuestionClassifier } from "./question_classifier.js"
import type { Retriever } from "./retrieval_engine.js"
import type { SchemaSource } from "./schema_introspector.js"
import type { SchemaAnswerer } from "./sql_generator.js"
import type { TabularAnalyzer } from "./tabular_analyzer.js"
import {
	ROUTING_REASONS,
	type Answer,
	type AnswerRecord,
	type ConversationTurn,
	type ForcedMode,
	type OrchestratorState,
	type RetrievalResult,
	type RoutingDecision,
	type StatisticsPayload,
	type TabularDataset,
	type TraditionalPath,
} from "./types.js"

// ============================================================================
// Types
// ============================================================================

/**
 * Everything a call needs, passed explicitly. `mode` is validated at runtime,
 * so untyped callers get a ConfigurationError for anything but the three modes.
 */
export interface AskContext {
	datasetId: string
	mode?: ForcedMode
	tabular?: TabularDataset
	schema?: SchemaSource
	history?: ConversationTurn[]
}

export interface OrchestratorDeps {
	store: IndexStore
	classifier: QuestionClassifier
	retriever: Retriever
	analyzer: TabularAnalyzer
	schemaAnswerer: SchemaAnswerer
	generator: AnswerGenerator
	logger: Logger
}

export interface OrchestratorConfig {
	topK: number
	contextCharLimit: number
	historyTurns: number
}

export interface StrategyComparison {
	question: string
	rag: Answer
	traditional: Answer
	/** The forced-rag run ended up traditional (empty index or nothing retrieved) */
	ragFellBack: boolean
}

interface TraditionalResult {
	text: string
	path: TraditionalPath | null
	sql?: string
	statistics?: StatisticsPayload
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Numbered chunk block in rank order, cut at `limit` characters.
 */
export function assembleContext(results: RetrievalResult[], limit: number): string {
	const block = results.map((r) => `[${r.rank}] (score ${r.score.toFixed(2)}) ${r.chunk.text}`).join("\n")
	return block.length > limit ? `${block.slice(0, limit)}...` : block
}

export function toAnswerRecord(answer: Answer): AnswerRecord {
	const record: AnswerRecord = {
		query_id: answer.queryId,
		text: answer.text,
		strategy: answer.strategy,
		reason: answer.decision.reason,
		trigger: answer.decision.trigger,
		confidence: answer.decision.confidence,
		matched_keywords: answer.decision.matchedKeywords,
		path: answer.path,
		provenance: answer.retrievals.map((r) => ({
			chunk_id: r.chunk.id,
			kind: r.chunk.kind,
			score: r.score,
			rank: r.rank,
		})),
		latency_ms: answer.latencyMs,
	}
	if (answer.sql !== undefined) record.sql = answer.sql
	if (answer.statistics !== undefined) record.statistics = answer.statistics
	return record
}

// ============================================================================
// Orchestrator
// ============================================================================

export class RoutingOrchestrator {
	private deps: OrchestratorDeps
	private config: OrchestratorConfig

	constructor(deps: OrchestratorDeps, config: Partial<OrchestratorConfig> = {}) {
		this.deps = deps
		this.config = {
			topK: config.topK ?? DEFAULTS.topK,
			contextCharLimit: config.contextCharLimit ?? DEFAULTS.contextCharLimit,
			historyTurns: config.historyTurns ?? DEFAULTS.historyTurns,
		}
	}

	/**
	 * Strategy selection. Pure with respect to the question and the index state.
	 */
	route(question: string, context: AskContext): RoutingDecision {
		const mode = parseForcedMode(context.mode)
		const indexed = this.deps.store.hasChunks(context.datasetId)

		if (mode === "force-traditional") {
			return { strategy: "traditional", reason: ROUTING_REASONS.forced, trigger: "forced", confidence: 1, matchedKeywords: [] }
		}

		if (mode === "force-rag") {
			return indexed
				? { strategy: "rag", reason: ROUTING_REASONS.forced, trigger: "forced", confidence: 1, matchedKeywords: [] }
				: { strategy: "traditional", reason: ROUTING_REASONS.ragForcedEmpty, trigger: "forced", confidence: 1, matchedKeywords: [] }
		}

		const classification = this.deps.classifier.classify(question)
		const matchedKeywords = [...classification.matchedKeywords]
		const base = { trigger: "auto-detected" as const, confidence: classification.confidence, matchedKeywords }

		if (classification.isAnalytical) {
			return indexed
				? { ...base, strategy: "rag", reason: ROUTING_REASONS.autoDetected }
				: { ...base, strategy: "traditional", reason: ROUTING_REASONS.noIndexedData }
		}
		return { ...base, strategy: "traditional", reason: ROUTING_REASONS.autoDetected }
	}

	async answer(question: string, context: AskContext): Promise<Answer> {
		const startTime = Date.now()
		const queryId = uuidv4()
		const states: OrchestratorState[] = ["Idle", "Classifying"]
		const { logger } = this.deps

		let decision = this.route(question, context)
		let retrievals: RetrievalResult[] = []

		const finish = (result: Omit<Answer, "queryId" | "decision" | "states" | "latencyMs">): Answer => {
			states.push("Answered")
			const answer: Answer = { queryId, decision, states, latencyMs: Date.now() - startTime, ...result }
			logger.info("Question answered", {
				query_id: queryId,
				dataset_id: context.datasetId,
				strategy: answer.strategy,
				reason: decision.reason,
				path: answer.path,
				chunks: answer.retrievals.length,
				latency_ms: answer.latencyMs,
			})
			return answer
		}

		const fail = (err: unknown, path: TraditionalPath | null): Answer => {
			logger.error("Collaborator failed", {
				query_id: queryId,
				dataset_id: context.datasetId,
				strategy: decision.strategy,
				error: errorMessage(err),
			})
			return finish({
				text: `Unable to answer this question: ${errorMessage(err)}`,
				strategy: "failed",
				retrievals,
				path,
			})
		}

		if (decision.strategy === "rag") {
			try {
				retrievals = await this.deps.retriever.retrieve(context.datasetId, question, this.config.topK)
			} catch (err) {
				if (err instanceof ConfigurationError) throw err
				states.push("Routed(rag)")
				return fail(err, null)
			}
			if (retrievals.length === 0) {
				decision = { ...decision, strategy: "traditional", reason: ROUTING_REASONS.noChunkAboveMinScore }
			}
		}

		if (decision.strategy === "traditional") {
			states.push("Routed(traditional)")
			const path = this.pickPath(question, context)
			try {
				const result = await this.runTraditional(question, context, path)
				return finish({ ...result, strategy: "traditional", retrievals: [] })
			} catch (err) {
				if (err instanceof ConfigurationError) throw err
				return fail(err, path)
			}
		}

		states.push("Routed(rag)")

		const path = this.pickPath(question, context)
		let supplementary: TraditionalResult | null = null
		if (path) {
			try {
				supplementary = await this.runTraditional(question, context, path)
			} catch (err) {
				if (err instanceof ConfigurationError) throw err
				logger.warn("Structured result unavailable for retrieval answer", {
					query_id: queryId,
					path,
					error: errorMessage(err),
				})
			}
		}

		const history = context.history ?? []
		try {
			const text = await this.deps.generator.generate({
				question,
				context: assembleContext(retrievals, this.config.contextCharLimit),
				structured: supplementary?.text,
				history: this.config.historyTurns > 0 ? history.slice(-this.config.historyTurns) : [],
			})
			return finish({
				text,
				strategy: "rag",
				retrievals,
				path: supplementary?.path ?? null,
				sql: supplementary?.sql,
				statistics: supplementary?.statistics,
			})
		} catch (err) {
			if (err instanceof ConfigurationError) throw err
			return fail(err, null)
		}
	}

	/**
	 * Answer under both forced modes for side-by-side evaluation.
	 */
	async compare(question: string, context: AskContext): Promise<StrategyComparison> {
		const rag = await this.answer(question, { ...context, mode: "force-rag" })
		const traditional = await this.answer(question, { ...context, mode: "force-traditional" })
		return { question, rag, traditional, ragFellBack: rag.decision.strategy !== "rag" }
	}

	/**
	 * Schema vs tabular. With only one source loaded, that source answers.
	 */
	private pickPath(question: string, context: AskContext): TraditionalPath | null {
		if (context.schema && context.tabular) {
			return this.deps.classifier.traditionalPath(question, true)
		}
		if (context.tabular) return "tabular"
		if (context.schema) return "schema"
		return null
	}

	private async runTraditional(
		question: string,
		context: AskContext,
		path: TraditionalPath | null,
	): Promise<TraditionalResult> {
		if (path === "tabular" && context.tabular) {
			const result = this.deps.analyzer.analyzeQuestion(context.tabular, question)
			// Schema intent with no database behind the dataset
			const note = !context.schema && this.deps.classifier.traditionalPath(question, true) === "schema"
				? `\n\nNote: this reads as a database question, but dataset "${context.datasetId}" is a CSV file. The answer comes from its statistics.`
				: ""
			return { text: result.text + note, path, statistics: result.statistics }
		}
		if (path === "schema" && context.schema) {
			const result = await this.deps.schemaAnswerer.answer(question, context.schema)
			return { text: result.text, path, sql: result.sql }
		}
		return {
			text: `No data is loaded for dataset "${context.datasetId}". Index a database or a CSV file first.`,
			path: null,
		}
	}
}
