import { mapBounded } from '../async';
import { InvalidInputError } from '../errors';
import { retrievalLogger, serializeError } from '../log';
import { summarizeDecomposition } from './analyzer';
import { extractComparisonEntities } from './classifier';
import { DEFAULT_BOOSTS, fuseByProvenance, summarizeChunks, type BoostTable } from './fuser';
import { emptyHydeMetadata } from './result';
import { runSearchRound, withStructuralFilters, type SearchCollaborators } from './rounds';
import { detectStructuralReference } from './structural';
import type { ComparisonPair, Decomposition, FusedChunk, RetrievalResult, RetrievalScope, RetrievedChunk } from './types';

const log = retrievalLogger('multihop');

export interface MultihopOptions {
  maxConcurrency: number;
  boosts: BoostTable;
  /** Final truncation for non-comparison queries. */
  topKFinal: number;
}

export const SHARED_PAIR = 'shared';

/**
 * Pair each sub-query (1-based) with the compared entity it names. Sub-queries
 * naming neither side, or both, land in the shared pair.
 */
export function pairComparison(
  query: string,
  subQueries: readonly string[],
  chunks: readonly FusedChunk[]
): { entities: string[]; pairs: ComparisonPair[] } {
  const entities = extractComparisonEntities(query);
  const indicesByEntity = new Map<string, number[]>();
  subQueries.forEach((sq, i) => {
    const lower = sq.toLowerCase();
    const named = entities.filter((e) => lower.includes(e.toLowerCase()));
    const key = named.length === 1 ? named[0] ?? SHARED_PAIR : SHARED_PAIR;
    const list = indicesByEntity.get(key) ?? [];
    list.push(i + 1);
    indicesByEntity.set(key, list);
  });

  const order = [...entities, SHARED_PAIR].filter((key) => indicesByEntity.has(key));
  const pairs = order.map((entity) => {
    const subQueryIndices = indicesByEntity.get(entity) ?? [];
    const chunkIds = chunks
      .filter((c) => c.provenance.some((p) => typeof p === 'number' && subQueryIndices.includes(p)))
      .map((c) => c.id);
    return { entity, subQueryIndices, chunkIds };
  });
  return { entities, pairs };
}

export class MultihopCoordinator {
  constructor(
    private readonly collab: SearchCollaborators,
    private readonly options: MultihopOptions = { maxConcurrency: 4, boosts: DEFAULT_BOOSTS, topKFinal: 30 }
  ) {}

  async retrieve(
    decomposition: Decomposition,
    scope: RetrievalScope,
    topKPerRound: number,
    topKFinal: number = this.options.topKFinal
  ): Promise<RetrievalResult> {
    const subQueries = decomposition.subQueries;
    if (!decomposition.requiresMultihop || subQueries.length === 0) {
      throw new InvalidInputError('multihop retrieval needs a multihop decomposition with sub-queries');
    }

    // Every round runs, including each condition of a conditional query.
    let failed = 0;
    const rounds = await mapBounded(subQueries, this.options.maxConcurrency, async (subQuery, i) => {
      const index = i + 1;
      const roundScope = withStructuralFilters(scope, detectStructuralReference(subQuery));
      try {
        const chunks = await runSearchRound(this.collab, subQuery, roundScope, topKPerRound, index);
        log.debug('multihop_round', { round: index, hits: chunks.length });
        return chunks;
      } catch (e) {
        failed += 1;
        log.warn('multihop_round_failed', { round: index, err: serializeError(e) });
        const empty: RetrievedChunk[] = [];
        return empty;
      }
    });

    const isComparison = decomposition.queryType === 'comparison';
    // Comparisons keep a full page per side so neither side is crowded out.
    const limit = isComparison ? topKPerRound * subQueries.length : topKFinal;
    const unique = new Set(rounds.flatMap((r) => r.map((c) => c.id))).size;
    const chunks = fuseByProvenance(rounds, limit, this.options.boosts);
    const stats = summarizeChunks(chunks, { total: subQueries.length, failed }, unique);

    if (isComparison) {
      stats.comparison = pairComparison(decomposition.query, subQueries, chunks);
    }
    if (decomposition.queryType === 'conditional') {
      stats.conditional = { conditions: subQueries.length, executed: subQueries.length };
    }

    log.info('multihop_retrieval', {
      rounds: subQueries.length,
      rounds_failed: failed,
      unique_chunks: unique,
      returned: chunks.length,
      search_strategy: decomposition.searchStrategy,
    });

    return {
      chunks,
      strategyUsed: 'multihop',
      decomposition: summarizeDecomposition(decomposition),
      hyde: emptyHydeMetadata(),
      stats,
    };
  }
}
