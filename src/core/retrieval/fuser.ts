import type { FusedChunk, Provenance, RetrievedChunk, RetrievalStats } from './types';

/** Multipliers for chunks surfaced by 1, 2 and 3+ rounds. */
export interface BoostTable {
  single: number;
  double: number;
  multiple: number;
}

export const DEFAULT_BOOSTS: BoostTable = { single: 1.0, double: 1.3, multiple: 1.5 };

export const DEFAULT_RRF_K = 60;

/** Similarity clamped to [0, 1]; NaN counts as 0. */
export function clampScore(score: number): number {
  if (!(score > 0)) return 0;
  return score > 1 ? 1 : score;
}

export function isMonotonicBoost(boosts: BoostTable): boolean {
  return boosts.single <= boosts.double && boosts.double <= boosts.multiple;
}

export function boost(sourceCount: number, boosts: BoostTable = DEFAULT_BOOSTS): number {
  if (sourceCount >= 3) return boosts.multiple;
  if (sourceCount === 2) return boosts.double;
  return boosts.single;
}

function compareProvenance(a: Provenance, b: Provenance): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Descending fused score, ascending id on ties. */
export function compareFused(a: FusedChunk, b: FusedChunk): number {
  if (b.fusedScore !== a.fusedScore) return b.fusedScore - a.fusedScore;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

interface Accumulator {
  chunk: RetrievedChunk;
  baseScore: number;
  provenance: Set<Provenance>;
}

function accumulate(rounds: readonly RetrievedChunk[][]): Map<string, Accumulator> {
  const byId = new Map<string, Accumulator>();
  for (const round of rounds) {
    for (const chunk of round) {
      const existing = byId.get(chunk.id);
      if (!existing) {
        byId.set(chunk.id, { chunk, baseScore: Math.max(0, chunk.baseScore), provenance: new Set([chunk.provenance]) });
        continue;
      }
      existing.provenance.add(chunk.provenance);
      if (chunk.baseScore > existing.baseScore) existing.baseScore = chunk.baseScore;
    }
  }
  return byId;
}

function toFused(acc: Accumulator, fusedScore: number): FusedChunk {
  const provenance = Array.from(acc.provenance).sort(compareProvenance);
  return {
    id: acc.chunk.id,
    text: acc.chunk.text,
    fusedScore,
    baseScore: acc.baseScore,
    sourceCount: provenance.length,
    provenance,
    ...(acc.chunk.metadata ? { metadata: acc.chunk.metadata } : {}),
  };
}

/**
 * Deduplicate rounds by chunk id and score each chunk as its best base score
 * times the boost for the number of rounds that found it.
 */
export function fuseByProvenance(
  rounds: readonly RetrievedChunk[][],
  limit: number,
  boosts: BoostTable = DEFAULT_BOOSTS
): FusedChunk[] {
  const out: FusedChunk[] = [];
  for (const acc of accumulate(rounds).values()) {
    out.push(toFused(acc, acc.baseScore * boost(acc.provenance.size, boosts)));
  }
  out.sort(compareFused);
  return out.slice(0, Math.max(0, limit));
}

/** Reciprocal Rank Fusion: Σ 1 / (k + rank) over the rounds a chunk appears in, ranks 1-based. */
export function fuseByReciprocalRank(
  rounds: readonly RetrievedChunk[][],
  limit: number,
  k: number = DEFAULT_RRF_K
): FusedChunk[] {
  const rrf = new Map<string, number>();
  for (const round of rounds) {
    const seen = new Set<string>();
    round.forEach((chunk, idx) => {
      if (seen.has(chunk.id)) return;
      seen.add(chunk.id);
      rrf.set(chunk.id, (rrf.get(chunk.id) ?? 0) + 1 / (k + idx + 1));
    });
  }
  const out: FusedChunk[] = [];
  for (const acc of accumulate(rounds).values()) {
    out.push(toFused(acc, rrf.get(acc.chunk.id) ?? 0));
  }
  out.sort(compareFused);
  return out.slice(0, Math.max(0, limit));
}

/** Confidence of a ranked result: mean base score of its first `window` chunks, 0 when empty. */
export function meanTopScore(chunks: readonly FusedChunk[], window: number): number {
  const top = chunks.slice(0, Math.max(1, window));
  if (top.length === 0) return 0;
  return top.reduce((sum, c) => sum + c.baseScore, 0) / top.length;
}

function provenanceKey(p: Provenance): string {
  return typeof p === 'number' ? `sub_${p}` : p;
}

export function summarizeChunks(
  chunks: readonly FusedChunk[],
  rounds: { total: number; failed: number },
  uniqueChunks: number = chunks.length
): RetrievalStats {
  const chunksBySourceCount: Record<string, number> = {};
  const chunksByRound: Record<string, number> = {};
  for (const c of chunks) {
    const sc = String(c.sourceCount);
    chunksBySourceCount[sc] = (chunksBySourceCount[sc] ?? 0) + 1;
    const first = c.provenance[0];
    if (first !== undefined) {
      const key = provenanceKey(first);
      chunksByRound[key] = (chunksByRound[key] ?? 0) + 1;
    }
  }
  const meanFusedScore = chunks.length > 0 ? chunks.reduce((sum, c) => sum + c.fusedScore, 0) / chunks.length : 0;
  const topScore = chunks.reduce((max, c) => Math.max(max, c.fusedScore), 0);
  return {
    rounds: rounds.total,
    roundsFailed: rounds.failed,
    uniqueChunks,
    chunksBySourceCount,
    chunksByRound,
    meanFusedScore,
    topScore,
  };
}
