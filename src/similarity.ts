/**
 * Similarity functions shared by indexing and retrieval.
 *
 * Two representations:
 * - embedding: fixed-length numeric vector, compared with cosine similarity
 * - terms: term-frequency map, compared with normalized term overlap
 */

import type { ChunkVector } from "./types.js"

export type SimilarityFunction = (query: ChunkVector, candidate: ChunkVector) => number

const STOPWORDS = new Set([
	"a", "an", "and", "are", "as", "at", "be", "by", "can", "do", "does", "for",
	"from", "has", "have", "how", "in", "is", "it", "its", "me", "of", "on", "or",
	"show", "that", "the", "their", "there", "this", "to", "was", "what", "which",
	"with", "you",
])

/**
 * Lowercase, split on anything that is not a letter or digit (underscores split
 * too, so total_amount yields total + amount), drop stopwords and 1-char tokens.
 */
export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.split(/[^\p{L}\p{N}]+/u)
		.filter((t) => t.length > 1 && !STOPWORDS.has(t))
}

export function termVector(text: string): Map<string, number> {
	const terms = new Map<string, number>()
	for (const token of tokenize(text)) {
		terms.set(token, (terms.get(token) ?? 0) + 1)
	}
	return terms
}

/**
 * Cosine similarity clamped to [0, 1]. Mismatched dimensions or zero vectors score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
	if (a.length === 0 || a.length !== b.length) return 0
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	const sim = dot / (Math.sqrt(normA) * Math.sqrt(normB))
	return Math.min(1, Math.max(0, sim))
}

/**
 * Fraction of distinct query terms present in the candidate.
 */
export function termOverlap(query: Map<string, number>, candidate: Map<string, number>): number {
	if (query.size === 0) return 0
	let hits = 0
	for (const term of query.keys()) {
		if (candidate.has(term)) hits++
	}
	return hits / query.size
}

/**
 * Uniform entry point: same-kind vectors use their own measure, mixed kinds score 0.
 */
export const similarity: SimilarityFunction = (query, candidate) => {
	if (query.kind === "embedding" && candidate.kind === "embedding") {
		return cosineSimilarity(query.values, candidate.values)
	}
	if (query.kind === "terms" && candidate.kind === "terms") {
		return termOverlap(query.terms, candidate.terms)
	}
	return 0
}
