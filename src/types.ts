/**
 * Shared types for question routing, chunk indexing and retrieval.
 *
 * Records that come straight out of Postgres keep snake_case field names
 * (see schema_introspector.ts); in-process types use camelCase.
 */

// ============================================================================
// Questions & Modes
// ============================================================================

export type ForcedMode = "auto" | "force-rag" | "force-traditional"

export const FORCED_MODES: readonly ForcedMode[] = ["auto", "force-rag", "force-traditional"]

export interface ConversationTurn {
	question: string
	answer: string
}

// ============================================================================
// Tabular Data
// ============================================================================

export type CellValue = string | number | null

export type ColumnType = "numeric" | "categorical" | "datetime" | "boolean" | "empty"

export interface TabularColumn {
	name: string
	type: ColumnType
}

/**
 * In-memory table. Numeric columns hold numbers, every other column holds
 * strings; missing cells are null.
 */
export interface TabularDataset {
	name: string
	columns: TabularColumn[]
	rows: CellValue[][]
	rowCount: number
}

// ============================================================================
// Chunks & Indexes
// ============================================================================

export type ChunkKind = "schema-table" | "schema-column" | "csv-summary" | "csv-row-sample"

export type ChunkVector =
	| { kind: "embedding"; values: number[] }
	| { kind: "terms"; terms: Map<string, number> }

export interface Chunk {
	readonly id: string
	readonly kind: ChunkKind
	readonly text: string
	readonly datasetId: string
	/** Insertion position inside the owning index; breaks score ties */
	readonly ordinal: number
	readonly vector: ChunkVector
}

export type SimilarityBackend = "embedding" | "keyword"

export type SourceKind = "relational" | "tabular"

export interface Index {
	readonly datasetId: string
	readonly sourceKind: SourceKind
	readonly backend: SimilarityBackend
	readonly chunks: readonly Chunk[]
	readonly builtAt: string
	/** Increments on every rebuild of the same dataset */
	readonly version: number
}

export interface RetrievalResult {
	chunk: Chunk
	/** 0.0 - 1.0 */
	score: number
	/** 1-based */
	rank: number
}

// ============================================================================
// Routing
// ============================================================================

export type Strategy = "traditional" | "rag"

export type RoutingTrigger = "auto-detected" | "forced"

export const ROUTING_REASONS = {
	autoDetected: "auto-detected",
	forced: "forced",
	noIndexedData: "no indexed data",
	ragForcedEmpty: "rag forced but index empty",
	noChunkAboveMinScore: "no chunk above min_score",
} as const

export type RoutingReason = (typeof ROUTING_REASONS)[keyof typeof ROUTING_REASONS]

export interface RoutingDecision {
	strategy: Strategy
	reason: RoutingReason
	trigger: RoutingTrigger
	/** Classifier confidence; 1 for forced decisions */
	confidence: number
	matchedKeywords: string[]
}

export type TraditionalPath = "schema" | "tabular"

export type OrchestratorState =
	| "Idle"
	| "Classifying"
	| "Routed(traditional)"
	| "Routed(rag)"
	| "Answered"

// ============================================================================
// Answers
// ============================================================================

export type AnalysisOperation =
	| "average"
	| "sum"
	| "count"
	| "max"
	| "min"
	| "correlation"
	| "distribution"
	| "columns"
	| "shape"
	| "overview"
	| "general"

export interface StatisticsPayload {
	operation: AnalysisOperation
	column: string | null
	values: Record<string, number | string | null>
}

export interface Answer {
	queryId: string
	text: string
	strategy: Strategy | "failed"
	decision: RoutingDecision
	/** Empty for traditional answers */
	retrievals: RetrievalResult[]
	path: TraditionalPath | null
	sql?: string
	statistics?: StatisticsPayload
	states: OrchestratorState[]
	latencyMs: number
}

/** JSON form handed to front ends */
export interface AnswerRecord {
	query_id: string
	text: string
	strategy: Strategy | "failed"
	reason: RoutingReason
	trigger: RoutingTrigger
	confidence: number
	matched_keywords: string[]
	path: TraditionalPath | null
	provenance: Array<{ chunk_id: string; kind: ChunkKind; score: number; rank: number }>
	sql?: string
	statistics?: StatisticsPayload
	latency_ms: number
}
