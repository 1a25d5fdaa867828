import { withTimeout } from '../async';
import { clampScore } from './fuser';
import { hasStructuralFilters } from './structural';
import type {
  EmbeddingService,
  Provenance,
  RetrievalScope,
  RetrievedChunk,
  SearchHit,
  StructuralFilters,
  VectorSearchService,
} from './types';

export interface SearchCollaborators {
  embedding: EmbeddingService;
  vectorSearch: VectorSearchService;
  timeouts: { embeddingMs: number; searchMs: number };
}

export function hitsToChunks(hits: readonly SearchHit[], provenance: Provenance): RetrievedChunk[] {
  return hits.map((h) => ({
    id: h.id,
    text: h.text,
    baseScore: clampScore(h.score),
    provenance,
    ...(h.metadata ? { metadata: h.metadata } : {}),
  }));
}

/** Caller filters win over filters detected in the query text. */
export function withStructuralFilters(scope: RetrievalScope, detected: StructuralFilters): RetrievalScope {
  if (!hasStructuralFilters(detected)) return scope;
  return { ...scope, filters: { ...detected, ...scope.filters } };
}

export async function searchByEmbedding(
  collab: SearchCollaborators,
  embedding: number[],
  scope: RetrievalScope,
  topK: number,
  provenance: Provenance
): Promise<RetrievedChunk[]> {
  const hits = await withTimeout('vector_search', collab.timeouts.searchMs, () =>
    collab.vectorSearch.search(embedding, scope, topK)
  );
  return hitsToChunks(hits, provenance);
}

/** Embed then search. Rejects with UpstreamError; callers decide what a failed round means. */
export async function runSearchRound(
  collab: SearchCollaborators,
  text: string,
  scope: RetrievalScope,
  topK: number,
  provenance: Provenance
): Promise<RetrievedChunk[]> {
  const embedding = await withTimeout('embedding', collab.timeouts.embeddingMs, () => collab.embedding.embed(text));
  return searchByEmbedding(collab, embedding, scope, topK, provenance);
}
