/**
 * Index Store
 *
 * Holds the current Index per dataset. Builders publish a complete Index with
 * a single reference swap, so a reader that grabbed the previous reference
 * keeps a whole index (old or new), never a partial one.
 */

import type { Index, SimilarityBackend, SourceKind } from "./types.js"

export interface IndexStatus {
	dataset_id: string
	source_kind: SourceKind
	backend: SimilarityBackend
	chunks: number
	version: number
	built_at: string
}

export function indexStatus(index: Index): IndexStatus {
	return {
		dataset_id: index.datasetId,
		source_kind: index.sourceKind,
		backend: index.backend,
		chunks: index.chunks.length,
		version: index.version,
		built_at: index.builtAt,
	}
}

export class IndexStore {
	private indexes = new Map<string, Index>()

	get(datasetId: string): Index | undefined {
		return this.indexes.get(datasetId)
	}

	/** Version the next build of this dataset should carry */
	nextVersion(datasetId: string): number {
		return (this.indexes.get(datasetId)?.version ?? 0) + 1
	}

	publish(index: Index): Index {
		this.indexes.set(index.datasetId, index)
		return index
	}

	remove(datasetId: string): boolean {
		return this.indexes.delete(datasetId)
	}

	hasChunks(datasetId: string): boolean {
		return (this.indexes.get(datasetId)?.chunks.length ?? 0) > 0
	}

	datasets(): string[] {
		return [...this.indexes.keys()].sort()
	}

	status(): IndexStatus[] {
		return [...this.indexes.values()]
			.sort((a, b) => a.datasetId.localeCompare(b.datasetId))
			.map(indexStatus)
	}
}
