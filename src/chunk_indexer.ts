/**
 * Chunk Indexer
 *
 * Turns a relational schema or an in-memory table into self-contained text
 * chunks, attaches a vector to each, and publishes the per-dataset Index.
 *
 * Chunk texts depend only on the source data, so indexing the same data
 * twice yields the same texts in the same order.
 */

import { v4 as uuidv4 } from "uuid"
import { ConfigurationError, DEFAULTS } from "./config.js"
import type { EmbeddingSession } from "./embedding_client.js"
import type { IndexStore } from "./index_store.js"
import type { Logger } from "./logger.js"
import type { IntrospectedColumn, IntrospectedTable, SchemaSource } from "./schema_introspector.js"
import { termVector } from "./similarity.js"
import { formatNumber, profileColumn } from "./tabular_analyzer.js"
import type { CellValue, Chunk, ChunkKind, ChunkVector, Index, SimilarityBackend, TabularDataset } from "./types.js"

// ============================================================================
// Types
// ============================================================================

export type IndexSource =
	| { kind: "relational"; schema: SchemaSource }
	| { kind: "tabular"; dataset: TabularDataset }

export interface ChunkText {
	kind: ChunkKind
	text: string
}

export interface ChunkingOptions {
	sampleValueCap: number
	maxRowSamples: number
	maxTopCategories: number
}

export interface ChunkIndexerConfig extends ChunkingOptions {
	embeddingBatchSize: number
}

const DEFAULT_CHUNKING: ChunkingOptions = {
	sampleValueCap: DEFAULTS.sampleValueCap,
	maxRowSamples: DEFAULTS.maxRowSamples,
	maxTopCategories: DEFAULTS.maxTopCategories,
}

// ============================================================================
// Chunk text builders
// ============================================================================

function tableLabel(table: IntrospectedTable): string {
	return table.table_schema === "public" ? table.table_name : `${table.table_schema}.${table.table_name}`
}

function tableChunk(datasetId: string, table: IntrospectedTable): string {
	const columns = table.columns.map((c) => `${c.column_name} (${c.data_type})`).join(", ")
	let text = `Table ${tableLabel(table)} in dataset ${datasetId} (${table.row_count} rows). Columns: ${columns || "none"}.`
	if (table.pk_columns.length > 0) {
		text += ` Primary key: ${table.pk_columns.join(", ")}.`
	}
	if (table.comment) {
		text += ` ${table.comment}`
	}
	const sample = table.sample_rows[0]
	if (sample) {
		const pairs = Object.entries(sample).map(([k, v]) => `${k}=${v ?? "null"}`)
		text += ` Sample row: ${pairs.join(", ")}.`
	}
	return text
}

function columnChunk(datasetId: string, table: IntrospectedTable, column: IntrospectedColumn, cap: number): string {
	const traits = [`type ${column.data_type}`]
	if (column.is_pk) traits.push("primary key")
	if (column.is_fk && column.fk_target_table && column.fk_target_column) {
		traits.push(`references ${column.fk_target_table}.${column.fk_target_column}`)
	}
	if (column.is_nullable) traits.push("nullable")

	let text = `Column ${tableLabel(table)}.${column.column_name} in dataset ${datasetId}: ${traits.join(", ")}.`
	if (column.comment) {
		text += ` ${column.comment}`
	}
	const samples = column.sample_values.slice(0, cap)
	if (samples.length > 0) {
		text += ` Sample values: ${samples.join(", ")}.`
	}
	return text
}

function schemaChunks(datasetId: string, schema: SchemaSource, options: ChunkingOptions): ChunkText[] {
	const chunks: ChunkText[] = []
	for (const table of schema.tables) {
		chunks.push({ kind: "schema-table", text: tableChunk(datasetId, table) })
		for (const column of table.columns) {
			chunks.push({ kind: "schema-column", text: columnChunk(datasetId, table, column, options.sampleValueCap) })
		}
	}
	return chunks
}

function cellText(value: CellValue): string {
	if (value === null) return "missing"
	return typeof value === "number" ? formatNumber(value) : value
}

/**
 * Evenly spaced row positions, first row always included.
 */
export function sampleRowIndices(rowCount: number, max: number): number[] {
	if (max <= 0 || rowCount <= 0) return []
	if (rowCount <= max) return Array.from({ length: rowCount }, (_, i) => i)
	return Array.from({ length: max }, (_, i) => Math.floor((i * rowCount) / max))
}

function columnSummary(datasetId: string, dataset: TabularDataset, index: number, options: ChunkingOptions): string {
	const p = profileColumn(dataset, index, options.maxTopCategories)
	const parts = [`${p.type}`, `${p.nullCount} missing values`, `${p.distinctCount} distinct values`]

	if (p.type === "numeric" && p.min !== null && p.max !== null && p.mean !== null) {
		parts.push(`min ${formatNumber(p.min)}`, `max ${formatNumber(p.max)}`, `mean ${formatNumber(p.mean)}`)
	} else if (p.type === "datetime" && p.earliest && p.latest) {
		parts.push(`earliest ${p.earliest}`, `latest ${p.latest}`)
	} else if (p.topCategories.length > 0) {
		parts.push(`top values: ${p.topCategories.map((c) => `${c.value} (${c.count})`).join(", ")}`)
	}

	return `Column ${p.name} in dataset ${datasetId}: ${parts.join(", ")}.`
}

function tabularChunks(datasetId: string, dataset: TabularDataset, options: ChunkingOptions): ChunkText[] {
	if (dataset.rowCount === 0 || dataset.columns.length === 0) return []

	const columnList = dataset.columns.map((c) => `${c.name} (${c.type})`).join(", ")
	const chunks: ChunkText[] = [
		{
			kind: "csv-summary",
			text: `Dataset ${datasetId} (${dataset.name}): ${dataset.rowCount} rows, ${dataset.columns.length} columns. Columns: ${columnList}.`,
		},
	]

	dataset.columns.forEach((_, i) => {
		chunks.push({ kind: "csv-summary", text: columnSummary(datasetId, dataset, i, options) })
	})

	for (const rowIndex of sampleRowIndices(dataset.rowCount, options.maxRowSamples)) {
		const row = dataset.rows[rowIndex]
		const pairs = dataset.columns.map((c, i) => `${c.name}=${cellText(row[i] ?? null)}`)
		chunks.push({
			kind: "csv-row-sample",
			text: `Row ${rowIndex + 1} of dataset ${datasetId}: ${pairs.join(", ")}.`,
		})
	}

	return chunks
}

/**
 * Pure chunk text derivation, in index order.
 */
export function buildChunkTexts(
	datasetId: string,
	source: IndexSource,
	options: ChunkingOptions = DEFAULT_CHUNKING,
): ChunkText[] {
	return source.kind === "relational"
		? schemaChunks(datasetId, source.schema, options)
		: tabularChunks(datasetId, source.dataset, options)
}

// ============================================================================
// Indexer
// ============================================================================

export class ChunkIndexer {
	private store: IndexStore
	private embeddings: EmbeddingSession
	private logger: Logger
	private config: ChunkIndexerConfig
	private sources = new Map<string, IndexSource>()
	/** Tail of the build queue per dataset */
	private builds = new Map<string, Promise<Index>>()

	constructor(
		store: IndexStore,
		embeddings: EmbeddingSession,
		logger: Logger,
		config: Partial<ChunkIndexerConfig> = {},
	) {
		this.store = store
		this.embeddings = embeddings
		this.logger = logger
		this.config = {
			...DEFAULT_CHUNKING,
			embeddingBatchSize: DEFAULTS.embeddingBatchSize,
			...config,
		}
	}

	/**
	 * Build and publish the Index for a dataset, replacing any previous one.
	 * Builds of one dataset run one at a time, in request order.
	 */
	async index(datasetId: string, source: IndexSource): Promise<Index> {
		if (!datasetId.trim()) {
			throw new ConfigurationError("Dataset id must not be empty")
		}
		const run = () => this.build(datasetId, source)
		const previous = this.builds.get(datasetId)
		const build = previous ? previous.then(run, run) : run()
		this.builds.set(datasetId, build)
		try {
			return await build
		} finally {
			if (this.builds.get(datasetId) === build) {
				this.builds.delete(datasetId)
			}
		}
	}

	private async build(datasetId: string, source: IndexSource): Promise<Index> {
		const startTime = Date.now()
		this.sources.set(datasetId, source)

		const texts = buildChunkTexts(datasetId, source, this.config)
		const { backend, vectors } = await this.vectorize(texts.map((t) => t.text))

		const chunks: Chunk[] = texts.map((t, ordinal) =>
			Object.freeze({
				id: `${datasetId}:${t.kind}:${uuidv4()}`,
				kind: t.kind,
				text: t.text,
				datasetId,
				ordinal,
				vector: vectors[ordinal],
			}),
		)

		const index: Index = Object.freeze({
			datasetId,
			sourceKind: source.kind,
			backend,
			chunks: Object.freeze(chunks),
			builtAt: new Date().toISOString(),
			version: this.store.nextVersion(datasetId),
		})

		this.store.publish(index)

		this.logger.info("Index built", {
			dataset_id: datasetId,
			source_kind: source.kind,
			backend,
			chunks: chunks.length,
			version: index.version,
			latency_ms: Date.now() - startTime,
		})

		return index
	}

	/**
	 * Rebuild from the last source registered for the dataset.
	 */
	async reindex(datasetId: string): Promise<Index> {
		const source = this.sources.get(datasetId)
		if (!source) {
			throw new ConfigurationError(`Dataset "${datasetId}" has never been indexed`, { dataset_id: datasetId })
		}
		return this.index(datasetId, source)
	}

	remove(datasetId: string): boolean {
		const hadSource = this.sources.delete(datasetId)
		const hadIndex = this.store.remove(datasetId)
		if (hadIndex) {
			this.logger.info("Index removed", { dataset_id: datasetId })
		}
		return hadSource || hadIndex
	}

	source(datasetId: string): IndexSource | undefined {
		return this.sources.get(datasetId)
	}

	private async vectorize(texts: string[]): Promise<{ backend: SimilarityBackend; vectors: ChunkVector[] }> {
		if (texts.length > 0 && (await this.embeddings.checkAvailability())) {
			const embedded = await this.embeddings.embedBatch(texts, this.config.embeddingBatchSize)
			if (embedded) {
				return {
					backend: "embedding",
					vectors: embedded.map((values): ChunkVector => ({ kind: "embedding", values })),
				}
			}
		}
		return {
			backend: "keyword",
			vectors: texts.map((text): ChunkVector => ({ kind: "terms", terms: termVector(text) })),
		}
	}
}
