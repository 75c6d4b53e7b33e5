/**
 * Answer generation for the RAG strategy
 *
 * - buildPrompt(): retrieved context + structured result + recent turns → prompt
 * - HttpAnswerGenerator: POST /generate on the LLM sidecar
 * - TemplateAnswerGenerator: renders the context without a model
 */

import { CollaboratorFailure, TabularQAError, errorMessage } from "./config.js"
import type { ConversationTurn } from "./types.js"

export interface GenerationRequest {
	question: string
	/** Numbered chunk block, already truncated */
	context: string
	/** Result of the traditional path, when one was available */
	structured?: string
	history: ConversationTurn[]
}

export interface AnswerGenerator {
	generate(request: GenerationRequest): Promise<string>
}

export const SYSTEM_PROMPT =
	"You are a data analysis assistant. Answer questions about the user's tables using only the provided context. " +
	"Reference specific data points when relevant, and say so when the context does not contain the answer."

export function buildPrompt(request: GenerationRequest): string {
	const sections: string[] = []

	if (request.history.length > 0) {
		const turns = request.history.map((t) => `User: ${t.question}\nAssistant: ${t.answer}`)
		sections.push(`Recent conversation:\n${turns.join("\n")}`)
	}

	sections.push("Based on the following relevant context, please answer the user's question comprehensively:")
	sections.push(`Context:\n${request.context}`)

	if (request.structured) {
		sections.push(`Structured result:\n${request.structured}`)
	}

	sections.push(`User Question: ${request.question}`)
	sections.push("Please provide a detailed answer based on the context above. Reference specific data points when relevant.")

	return sections.join("\n\n")
}

// ============================================================================
// HTTP generator
// ============================================================================

export interface HttpGeneratorConfig {
	baseUrl: string
	model: string
	timeoutMs: number
	temperature: number
	maxTokens: number
}

export class HttpAnswerGenerator implements AnswerGenerator {
	private config: HttpGeneratorConfig

	constructor(config: HttpGeneratorConfig) {
		this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") }
	}

	async generate(request: GenerationRequest): Promise<string> {
		const url = `${this.config.baseUrl}/generate`

		try {
			const controller = new AbortController()
			const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					prompt: buildPrompt(request),
					system: SYSTEM_PROMPT,
					model: this.config.model,
					temperature: this.config.temperature,
					max_tokens: this.config.maxTokens,
				}),
				signal: controller.signal,
			})

			clearTimeout(timeoutId)

			if (!response.ok) {
				const errorText = await response.text()
				throw new CollaboratorFailure("answer-generator", `Generation failed: ${response.status} ${errorText}`, {
					statusCode: response.status,
					url,
				})
			}

			const data: unknown = await response.json()
			const text = data !== null && typeof data === "object" ? Reflect.get(data, "text") : undefined
			if (typeof text !== "string") {
				throw new CollaboratorFailure("answer-generator", "Generation response missing 'text'", { url })
			}
			return text.trim()
		} catch (error) {
			if (error instanceof Error && error.name === "AbortError") {
				throw new TabularQAError("timeout", `Generation timed out after ${this.config.timeoutMs}ms`, true, { url })
			}
			if (error instanceof TabularQAError) {
				throw error
			}
			throw new CollaboratorFailure("answer-generator", `Cannot reach generation service: ${errorMessage(error)}`, { url })
		}
	}
}

// ============================================================================
// Template generator
// ============================================================================

/**
 * Model-free generator: restates the retrieved context and the structured result.
 */
export class TemplateAnswerGenerator implements AnswerGenerator {
	async generate(request: GenerationRequest): Promise<string> {
		const parts = [`Relevant data for "${request.question}":`, request.context]
		if (request.structured) {
			parts.push(`Direct result:\n${request.structured}`)
		}
		return parts.join("\n\n")
	}
}
