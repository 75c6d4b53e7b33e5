/**
 * Tool handlers over an explicit Engine
 *
 * Each handler takes snake_case tool input and returns a JSON-ready record.
 * server.ts registers them as MCP tools; tests call them directly.
 */

import { HttpAnswerGenerator, TemplateAnswerGenerator, type AnswerGenerator } from "./answer_generator.js"
import { ChunkIndexer } from "./chunk_indexer.js"
import { ConfigurationError, parseForcedMode } from "./config.js"
import type { TabularQAConfig } from "./config/loadConfig.js"
import { EmbeddingSession, HttpEmbeddingBackend, type EmbeddingBackend } from "./embedding_client.js"
import { IndexStore, indexStatus, type IndexStatus } from "./index_store.js"
import { createLogger, type Logger } from "./logger.js"
import { QuestionClassifier } from "./question_classifier.js"
import { RetrievalEngine } from "./retrieval_engine.js"
import { RoutingOrchestrator, toAnswerRecord, type AskContext } from "./routing_orchestrator.js"
import { SchemaIntrospector, type QueryPool } from "./schema_introspector.js"
import { SchemaQueryRunner, SqlSchemaAnswerer } from "./sql_generator.js"
import { TabularAnalyzer, loadCsvFile, parseCsv } from "./tabular_analyzer.js"
import type { AnswerRecord, ConversationTurn, TabularDataset } from "./types.js"

// ============================================================================
// Engine
// ============================================================================

export interface Engine {
	config: TabularQAConfig
	logger: Logger
	store: IndexStore
	embeddings: EmbeddingSession
	indexer: ChunkIndexer
	retriever: RetrievalEngine
	orchestrator: RoutingOrchestrator
	/** Null when no database is configured */
	introspector: SchemaIntrospector | null
}

export interface EngineOptions {
	pool?: QueryPool | null
	logger?: Logger
	/** Overrides the HTTP backend built from config.embedding */
	embeddingBackend?: EmbeddingBackend | null
	/** Overrides the generator built from config.generation */
	generator?: AnswerGenerator
	classifier?: QuestionClassifier
}

export function createEngine(config: TabularQAConfig, options: EngineOptions = {}): Engine {
	const logger = options.logger ?? createLogger(config.logging.level)
	const pool = options.pool ?? null

	const backend =
		options.embeddingBackend !== undefined
			? options.embeddingBackend
			: config.embedding.enabled
				? new HttpEmbeddingBackend({
						baseUrl: config.embedding.url,
						model: config.embedding.model,
						timeoutMs: config.embedding.timeout_ms,
					})
				: null
	const embeddings = new EmbeddingSession(backend, config.embedding.enabled, logger)

	const generator =
		options.generator ??
		(config.generation.enabled
			? new HttpAnswerGenerator({
					baseUrl: config.generation.url,
					model: config.generation.model,
					timeoutMs: config.generation.timeout_ms,
					temperature: config.generation.temperature,
					maxTokens: config.generation.max_tokens,
				})
			: new TemplateAnswerGenerator())

	const store = new IndexStore()
	const indexer = new ChunkIndexer(store, embeddings, logger, {
		sampleValueCap: config.chunking.sample_value_cap,
		maxRowSamples: config.chunking.max_row_samples,
		maxTopCategories: config.chunking.max_top_categories,
		embeddingBatchSize: config.embedding.batch_size,
	})
	const retriever = new RetrievalEngine(store, embeddings, logger, { minScore: config.retrieval.min_score })

	const runner = pool
		? new SchemaQueryRunner(pool, logger, {
				maxRows: config.sql.max_rows,
				statementTimeoutMs: config.sql.statement_timeout_ms,
			})
		: null

	const orchestrator = new RoutingOrchestrator(
		{
			store,
			classifier: options.classifier ?? new QuestionClassifier(),
			retriever,
			analyzer: new TabularAnalyzer(logger, config.chunking.max_top_categories),
			schemaAnswerer: new SqlSchemaAnswerer(runner, logger, config.sql.max_rows),
			generator,
			logger,
		},
		{
			topK: config.retrieval.top_k,
			contextCharLimit: config.generation.context_char_limit,
			historyTurns: config.generation.history_turns,
		},
	)

	return {
		config,
		logger,
		store,
		embeddings,
		indexer,
		retriever,
		orchestrator,
		introspector: pool ? new SchemaIntrospector(pool, logger) : null,
	}
}

// ============================================================================
// Inputs / outputs
// ============================================================================

export interface AskQuestionInput {
	question: string
	dataset_id: string
	mode?: string
	history?: ConversationTurn[]
}

export interface CompareStrategiesInput {
	question: string
	dataset_id: string
}

export interface CompareStrategiesResult {
	question: string
	rag: AnswerRecord
	traditional: AnswerRecord
	rag_fell_back: boolean
}

export interface IndexDatabaseInput {
	dataset_id: string
	schemas?: string[]
	exclude_tables?: string[]
}

export interface IndexCsvInput {
	dataset_id: string
	/** Path to a CSV file readable by the server */
	path?: string
	/** Inline CSV text (header row first) */
	content?: string
	name?: string
}

export interface DatasetIdInput {
	dataset_id: string
}

export interface RetrievalStatusResult {
	embedding_available: boolean
	default_mode: string
	top_k: number
	min_score: number
	database_configured: boolean
	datasets: IndexStatus[]
}

/**
 * Build the per-call context from whatever source the dataset was indexed with.
 */
export function askContext(engine: Engine, datasetId: string, mode: unknown, history?: ConversationTurn[]): AskContext {
	const forced = mode === undefined ? engine.config.routing.default_mode : parseForcedMode(mode)
	const source = engine.indexer.source(datasetId)
	return {
		datasetId,
		mode: forced,
		tabular: source?.kind === "tabular" ? source.dataset : undefined,
		schema: source?.kind === "relational" ? source.schema : undefined,
		history,
	}
}

// ============================================================================
// Handlers
// ============================================================================

export async function askQuestion(engine: Engine, input: AskQuestionInput): Promise<AnswerRecord> {
	const context = askContext(engine, input.dataset_id, input.mode, input.history)
	const answer = await engine.orchestrator.answer(input.question, context)
	return toAnswerRecord(answer)
}

export async function compareStrategies(engine: Engine, input: CompareStrategiesInput): Promise<CompareStrategiesResult> {
	const context = askContext(engine, input.dataset_id, "auto")
	const result = await engine.orchestrator.compare(input.question, context)
	return {
		question: result.question,
		rag: toAnswerRecord(result.rag),
		traditional: toAnswerRecord(result.traditional),
		rag_fell_back: result.ragFellBack,
	}
}

export async function indexDatabase(engine: Engine, input: IndexDatabaseInput): Promise<IndexStatus> {
	if (!engine.introspector) {
		throw new ConfigurationError("No database configured (set database.name or DB_NAME)")
	}
	const schema = await engine.introspector.introspect(input.dataset_id, {
		schemas: input.schemas ?? engine.config.database.schemas,
		excludeTables: input.exclude_tables,
		sampleValueCap: engine.config.chunking.sample_value_cap,
	})
	const index = await engine.indexer.index(input.dataset_id, { kind: "relational", schema })
	return indexStatus(index)
}

export async function indexCsv(engine: Engine, input: IndexCsvInput): Promise<IndexStatus> {
	let dataset: TabularDataset
	if (input.content !== undefined) {
		dataset = parseCsv(input.content, input.name ?? input.dataset_id)
	} else if (input.path !== undefined) {
		dataset = await loadCsvFile(input.path, input.name)
	} else {
		throw new ConfigurationError("index_csv needs either 'path' or 'content'")
	}
	const index = await engine.indexer.index(input.dataset_id, { kind: "tabular", dataset })
	return indexStatus(index)
}

export async function reindexDataset(engine: Engine, input: DatasetIdInput): Promise<IndexStatus> {
	const index = await engine.indexer.reindex(input.dataset_id)
	return indexStatus(index)
}

export function removeDataset(engine: Engine, input: DatasetIdInput): { dataset_id: string; removed: boolean } {
	return { dataset_id: input.dataset_id, removed: engine.indexer.remove(input.dataset_id) }
}

export function retrievalStatus(engine: Engine): RetrievalStatusResult {
	return {
		embedding_available: engine.embeddings.embeddingAvailable,
		default_mode: engine.config.routing.default_mode,
		top_k: engine.config.retrieval.top_k,
		min_score: engine.config.retrieval.min_score,
		database_configured: engine.introspector !== null,
		datasets: engine.store.status(),
	}
}
