/**
 * Constants, defaults and error types for the Tabular QA MCP Server
 *
 * Includes:
 * - Error taxonomy (configuration / collaborator / embedding / timeout)
 * - Forced-mode parsing
 * - Default limits for retrieval, chunking and SQL execution
 */

import { FORCED_MODES, type ForcedMode } from "./types.js"

/**
 * Tabular QA error types
 */
export type TabularQAErrorType = "configuration" | "collaborator" | "embedding" | "timeout"

export class TabularQAError extends Error {
	constructor(
		public type: TabularQAErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "TabularQAError"
	}
}

/**
 * Invalid mode flag, invalid k, malformed rule file. Fatal, never downgraded.
 */
export class ConfigurationError extends TabularQAError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("configuration", message, false, context)
		this.name = "ConfigurationError"
	}
}

/**
 * A collaborator (introspection, statistics, SQL execution, answer generation) threw.
 * The orchestrator turns this into a failed Answer instead of propagating it.
 */
export class CollaboratorFailure extends TabularQAError {
	constructor(
		public collaborator: string,
		message: string,
		context?: Record<string, unknown>,
	) {
		super("collaborator", message, true, { collaborator, ...context })
		this.name = "CollaboratorFailure"
	}
}

/**
 * Embedding backend missing or unreachable. Downgrades similarity to keywords.
 */
export class EmbeddingUnavailable extends TabularQAError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("embedding", message, true, context)
		this.name = "EmbeddingUnavailable"
	}
}

/**
 * Parse a caller-supplied mode flag. Exactly three legal values; undefined means auto.
 */
export function parseForcedMode(value: unknown): ForcedMode {
	if (value === undefined || value === null) return "auto"
	for (const mode of FORCED_MODES) {
		if (value === mode) return mode
	}
	throw new ConfigurationError(
		`Invalid mode "${String(value)}". Expected one of: ${FORCED_MODES.join(", ")}`,
		{ value: String(value) },
	)
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
	topK: 4,
	minScore: 0,
	contextCharLimit: 2000,
	historyTurns: 3,
	sampleValueCap: 5,
	maxRowSamples: 10,
	maxTopCategories: 5,
	sampleRowLimit: 3,
	embeddingBatchSize: 32,
	maxRows: 100,
	statementTimeoutMs: 10000,
}
