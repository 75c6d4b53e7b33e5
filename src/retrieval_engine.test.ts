import { describe, it, expect, vi } from "vitest"
import { ChunkIndexer } from "./chunk_indexer.js"
import { ConfigurationError } from "./config.js"
import { EmbeddingSession, type EmbeddingBackend } from "./embedding_client.js"
import { IndexStore } from "./index_store.js"
import { silentLogger } from "./logger.js"
import { RetrievalEngine, rankChunks } from "./retrieval_engine.js"
import { termVector } from "./similarity.js"
import { parseCsv } from "./tabular_analyzer.js"
import type { Chunk } from "./types.js"

const SHOP_CSV = "region,sales\nNorth,100\nSouth,200\nNorth,300\n"

function chunk(ordinal: number, text: string): Chunk {
	return {
		id: `t:csv-summary:${ordinal}`,
		kind: "csv-summary",
		text,
		datasetId: "t",
		ordinal,
		vector: { kind: "terms", terms: termVector(text) },
	}
}

/** Two-dimensional fake: [mentions South, mentions North] */
function regionVector(text: string): number[] {
	return [text.includes("South") ? 1 : 0, text.includes("North") ? 1 : 0]
}

function regionBackend(overrides: Partial<EmbeddingBackend> = {}): EmbeddingBackend {
	return {
		embed: async (text) => regionVector(text),
		embedBatch: async (texts) => texts.map(regionVector),
		isAvailable: async () => true,
		...overrides,
	}
}

async function keywordSetup(): Promise<{ store: IndexStore; indexer: ChunkIndexer; engine: RetrievalEngine }> {
	const store = new IndexStore()
	const session = new EmbeddingSession(null, false, silentLogger)
	const indexer = new ChunkIndexer(store, session, silentLogger)
	await indexer.index("shop", { kind: "tabular", dataset: parseCsv(SHOP_CSV, "shop") })
	return { store, indexer, engine: new RetrievalEngine(store, session, silentLogger) }
}

describe("rankChunks", () => {
	it("sorts by descending score and breaks ties by index order", () => {
		const chunks = [chunk(2, "sales total"), chunk(0, "region sales"), chunk(1, "weather")]
		const results = rankChunks(chunks, { kind: "terms", terms: termVector("sales") }, 3)
		expect(results.map((r) => [r.chunk.ordinal, r.score, r.rank])).toEqual([
			[0, 1, 1],
			[2, 1, 2],
			[1, 0, 3],
		])
	})

	it("drops results under the minimum score", () => {
		const chunks = [chunk(0, "sales"), chunk(1, "weather")]
		const results = rankChunks(chunks, { kind: "terms", terms: termVector("sales") }, 5, { minScore: 0.5 })
		expect(results.map((r) => r.chunk.ordinal)).toEqual([0])
	})

	it("rejects k below 1 or fractional", () => {
		const query = { kind: "terms" as const, terms: termVector("sales") }
		expect(() => rankChunks([], query, 0)).toThrow(ConfigurationError)
		expect(() => rankChunks([], query, 1.5)).toThrow(ConfigurationError)
	})
})

describe("RetrievalEngine — keyword backend", () => {
	it("returns at most k chunks mentioning the question terms", async () => {
		const { engine } = await keywordSetup()
		const results = await engine.retrieve("shop", "sales by region", 2)

		expect(results).toHaveLength(2)
		expect(results.map((r) => r.chunk.ordinal)).toEqual([0, 3])
		expect(results.map((r) => r.rank)).toEqual([1, 2])
		for (const r of results) {
			expect(r.score).toBe(1)
			expect(r.chunk.text).toContain("region")
			expect(r.chunk.text).toContain("sales")
		}
	})

	it("ranks partial matches after full matches", async () => {
		const { engine } = await keywordSetup()
		const results = await engine.retrieve("shop", "sales by region", 10)
		expect(results.map((r) => r.chunk.ordinal)).toEqual([0, 3, 4, 5, 1, 2])
		expect(results.map((r) => r.score)).toEqual([1, 1, 1, 1, 0.5, 0.5])
	})

	it("applies the configured minimum score", async () => {
		const { store } = await keywordSetup()
		const engine = new RetrievalEngine(store, new EmbeddingSession(null, false, silentLogger), silentLogger, {
			minScore: 0.1,
		})
		expect(await engine.retrieve("shop", "weather forecast", 3)).toEqual([])
	})

	it("returns nothing for an unknown or empty dataset", async () => {
		const { indexer, engine } = await keywordSetup()
		await indexer.index("blank", { kind: "tabular", dataset: parseCsv("a\n", "blank") })
		expect(await engine.retrieve("missing", "sales", 3)).toEqual([])
		expect(await engine.retrieve("blank", "sales", 3)).toEqual([])
	})

	it("rejects an invalid k", async () => {
		const { engine } = await keywordSetup()
		await expect(engine.retrieve("shop", "sales", 0)).rejects.toBeInstanceOf(ConfigurationError)
	})

	it("reads the latest published index", async () => {
		const { indexer, engine } = await keywordSetup()
		const rebuilt = await indexer.reindex("shop")
		const [top] = await engine.retrieve("shop", "sales by region", 1)
		expect(top.chunk).toBe(rebuilt.chunks[0])
	})
})

describe("RetrievalEngine — embedding backend", () => {
	it("ranks by cosine similarity of the question embedding", async () => {
		const store = new IndexStore()
		const session = new EmbeddingSession(regionBackend(), true, silentLogger)
		const index = await new ChunkIndexer(store, session, silentLogger).index("shop", {
			kind: "tabular",
			dataset: parseCsv(SHOP_CSV, "shop"),
		})
		expect(index.backend).toBe("embedding")

		const engine = new RetrievalEngine(store, session, silentLogger)
		const results = await engine.retrieve("shop", "South", 2)
		expect(results.map((r) => r.chunk.text)).toEqual([
			"Row 2 of dataset shop: region=South, sales=200.",
			"Column region in dataset shop: categorical, 0 missing values, 2 distinct values, top values: North (2), South (1).",
		])
		expect(results[0].score).toBe(1)
		expect(results[1].score).toBeCloseTo(Math.SQRT1_2, 10)
	})

	it("falls back to keyword scoring of chunk texts when the question cannot be embedded", async () => {
		const store = new IndexStore()
		const embed = vi.fn(async (): Promise<number[]> => {
			throw new Error("service went away")
		})
		const session = new EmbeddingSession(regionBackend({ embed }), true, silentLogger)
		await new ChunkIndexer(store, session, silentLogger).index("shop", {
			kind: "tabular",
			dataset: parseCsv(SHOP_CSV, "shop"),
		})

		const engine = new RetrievalEngine(store, session, silentLogger)
		const results = await engine.retrieve("shop", "sales by region", 2)
		expect(results.map((r) => r.chunk.ordinal)).toEqual([0, 3])
		expect(session.embeddingAvailable).toBe(false)

		await engine.retrieve("shop", "sales", 1)
		expect(embed).toHaveBeenCalledTimes(1)
	})
})
