/**
 * Embedding Sidecar HTTP Client
 *
 * Handles communication with the embedding service:
 * - POST /embed        { text, model }   -> { embedding }
 * - POST /embed_batch  { texts, model }  -> { embeddings }
 * - GET  /health
 *
 * EmbeddingSession wraps a backend with the session-wide capability flag:
 * the first failure is logged once and every later call short-circuits to
 * keyword similarity.
 */

import { EmbeddingUnavailable, TabularQAError, errorMessage } from "./config.js"
import type { Logger } from "./logger.js"

export interface EmbeddingBackend {
	embed(text: string): Promise<number[]>
	embedBatch(texts: string[]): Promise<number[][]>
	isAvailable(): Promise<boolean>
}

export interface HttpEmbeddingConfig {
	baseUrl: string
	model: string
	timeoutMs: number
}

function isNumberArray(value: unknown): value is number[] {
	return Array.isArray(value) && value.every((v) => typeof v === "number")
}

function field(value: unknown, key: string): unknown {
	if (value === null || typeof value !== "object") return undefined
	return Reflect.get(value, key)
}

export class HttpEmbeddingBackend implements EmbeddingBackend {
	private baseUrl: string
	private model: string
	private timeout: number

	constructor(config: HttpEmbeddingConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "")
		this.model = config.model
		this.timeout = config.timeoutMs
	}

	/**
	 * Get embedding for a single text
	 */
	async embed(text: string): Promise<number[]> {
		const data = await this.post("/embed", { text, model: this.model }, this.timeout)
		const embedding = field(data, "embedding")
		if (!isNumberArray(embedding)) {
			throw new EmbeddingUnavailable("Embedding response missing numeric 'embedding' array", { url: this.baseUrl })
		}
		return embedding
	}

	/**
	 * Get embeddings for multiple texts in one request
	 */
	async embedBatch(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) return []
		// Longer timeout for batches: base + 1s per text
		const timeout = Math.min(this.timeout + texts.length * 1000, 300000)
		const data = await this.post("/embed_batch", { texts, model: this.model }, timeout)
		const embeddings = field(data, "embeddings")
		if (!Array.isArray(embeddings) || embeddings.length !== texts.length || !embeddings.every(isNumberArray)) {
			throw new EmbeddingUnavailable(
				`Batch embedding response malformed (expected ${texts.length} vectors)`,
				{ url: this.baseUrl },
			)
		}
		return embeddings
	}

	/**
	 * Health check endpoint. Returns true if the service is reachable and healthy.
	 */
	async isAvailable(): Promise<boolean> {
		try {
			const controller = new AbortController()
			const timeoutId = setTimeout(() => controller.abort(), 5000)
			const response = await fetch(`${this.baseUrl}/health`, {
				method: "GET",
				signal: controller.signal,
			})
			clearTimeout(timeoutId)
			return response.ok
		} catch {
			return false
		}
	}

	private async post(endpoint: string, body: Record<string, unknown>, timeout: number): Promise<unknown> {
		const url = `${this.baseUrl}${endpoint}`

		try {
			const controller = new AbortController()
			const timeoutId = setTimeout(() => controller.abort(), timeout)

			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			clearTimeout(timeoutId)

			if (!response.ok) {
				const errorText = await response.text()
				throw new EmbeddingUnavailable(
					`Embedding request failed: ${response.status} ${errorText}`,
					{ statusCode: response.status, url },
				)
			}

			const data: unknown = await response.json()
			return data
		} catch (error) {
			if (error instanceof Error && error.name === "AbortError") {
				throw new EmbeddingUnavailable(`Embedding request timed out after ${timeout}ms`, { timeout, url })
			}

			if (error instanceof TabularQAError) {
				throw error
			}

			throw new EmbeddingUnavailable(`Cannot reach embedding service at ${this.baseUrl}: ${errorMessage(error)}`, { url })
		}
	}
}

// ============================================================================
// Session capability flag
// ============================================================================

export class EmbeddingSession {
	private backend: EmbeddingBackend | null
	private enabled: boolean
	private logger: Logger
	private downgraded: boolean = false

	constructor(backend: EmbeddingBackend | null, enabled: boolean, logger: Logger) {
		this.backend = backend
		this.enabled = enabled && backend !== null
		this.logger = logger
	}

	/**
	 * Evaluated once per index build; the result is recorded on the index.
	 */
	async checkAvailability(): Promise<boolean> {
		if (!this.backend || !this.enabled || this.downgraded) return false
		const ok = await this.backend.isAvailable()
		if (!ok) {
			this.markUnavailable(new EmbeddingUnavailable("Embedding service health check failed"))
		}
		return ok
	}

	get embeddingAvailable(): boolean {
		return this.backend !== null && this.enabled && !this.downgraded
	}

	/** Returns null once embeddings are unavailable for this session. */
	async embed(text: string): Promise<number[] | null> {
		if (!this.backend || !this.embeddingAvailable) return null
		try {
			return await this.backend.embed(text)
		} catch (err) {
			this.markUnavailable(err)
			return null
		}
	}

	/** Returns null once embeddings are unavailable for this session. */
	async embedBatch(texts: string[], batchSize: number): Promise<number[][] | null> {
		if (!this.backend || !this.embeddingAvailable) return null
		const vectors: number[][] = []
		try {
			for (let i = 0; i < texts.length; i += batchSize) {
				const batch = texts.slice(i, i + batchSize)
				vectors.push(...(await this.backend.embedBatch(batch)))
			}
		} catch (err) {
			this.markUnavailable(err)
			return null
		}
		return vectors
	}

	private markUnavailable(error: unknown): void {
		if (this.downgraded) return
		this.downgraded = true
		this.logger.warn("Embeddings unavailable, using keyword similarity for this session", {
			error: errorMessage(error),
		})
	}
}
