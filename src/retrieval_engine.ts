/**
 * Retrieval Engine
 *
 * Ranks a dataset's chunks against a question and returns the top K.
 * Results are sorted by descending score; equal scores keep index order.
 */

import { ConfigurationError } from "./config.js"
import type { EmbeddingSession } from "./embedding_client.js"
import type { IndexStore } from "./index_store.js"
import type { Logger } from "./logger.js"
import { similarity as defaultSimilarity, termVector, type SimilarityFunction } from "./similarity.js"
import type { Chunk, ChunkVector, RetrievalResult } from "./types.js"

export interface Retriever {
	retrieve(datasetId: string, question: string, k: number): Promise<RetrievalResult[]>
}

export interface RetrievalOptions {
	/** Results scoring below this are dropped (0 keeps everything) */
	minScore?: number
	similarity?: SimilarityFunction
}

function assertValidK(k: number): void {
	if (!Number.isInteger(k) || k < 1) {
		throw new ConfigurationError(`Retrieval k must be an integer >= 1, got ${k}`, { k })
	}
}

/**
 * Pure ranking. `chunkVector` picks the representation compared for each chunk.
 */
export function rankChunks(
	chunks: readonly Chunk[],
	query: ChunkVector,
	k: number,
	options: {
		minScore?: number
		similarity?: SimilarityFunction
		chunkVector?: (chunk: Chunk) => ChunkVector
	} = {},
): RetrievalResult[] {
	assertValidK(k)
	const score = options.similarity ?? defaultSimilarity
	const vectorOf = options.chunkVector ?? ((chunk: Chunk) => chunk.vector)
	const minScore = options.minScore ?? 0

	return chunks
		.map((chunk) => ({ chunk, score: score(query, vectorOf(chunk)) }))
		.filter((r) => r.score >= minScore)
		.sort((a, b) => b.score - a.score || a.chunk.ordinal - b.chunk.ordinal)
		.slice(0, k)
		.map((r, i) => ({ chunk: r.chunk, score: r.score, rank: i + 1 }))
}

export class RetrievalEngine implements Retriever {
	private store: IndexStore
	private embeddings: EmbeddingSession
	private logger: Logger
	private minScore: number
	private similarity: SimilarityFunction

	constructor(store: IndexStore, embeddings: EmbeddingSession, logger: Logger, options: RetrievalOptions = {}) {
		this.store = store
		this.embeddings = embeddings
		this.logger = logger
		this.minScore = options.minScore ?? 0
		this.similarity = options.similarity ?? defaultSimilarity
	}

	async retrieve(datasetId: string, question: string, k: number): Promise<RetrievalResult[]> {
		assertValidK(k)

		// One read of the reference: a concurrent rebuild swaps in a whole new Index
		const index = this.store.get(datasetId)
		if (!index || index.chunks.length === 0) return []

		const startTime = Date.now()
		let query: ChunkVector | null = null
		let chunkVector: ((chunk: Chunk) => ChunkVector) | undefined

		if (index.backend === "embedding") {
			const values = await this.embeddings.embed(question)
			if (values) {
				query = { kind: "embedding", values }
			} else {
				chunkVector = (chunk) => ({ kind: "terms", terms: termVector(chunk.text) })
			}
		}
		if (!query) {
			query = { kind: "terms", terms: termVector(question) }
		}

		const results = rankChunks(index.chunks, query, k, {
			minScore: this.minScore,
			similarity: this.similarity,
			chunkVector,
		})

		this.logger.debug("Chunks retrieved", {
			dataset_id: datasetId,
			version: index.version,
			backend: query.kind === "embedding" ? "embedding" : "keyword",
			requested: k,
			returned: results.length,
			top_score: results[0]?.score ?? null,
			latency_ms: Date.now() - startTime,
		})

		return results
	}
}
