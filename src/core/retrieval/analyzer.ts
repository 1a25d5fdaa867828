import { retrievalLogger, serializeError } from '../log';
import { HeuristicClassifier, LlmClassifier, type Classification, type LlmClassifierOptions, type QueryClassifier } from './classifier';
import { detectStructuralReference } from './structural';
import type {
  ClassifierName,
  Complexity,
  CompletionService,
  Decomposition,
  DecompositionSummary,
  QueryType,
  RetrievalScope,
  SearchStrategy,
} from './types';

const log = retrievalLogger('analyzer');

const COMPLEX_TYPES: ReadonlySet<QueryType> = new Set<QueryType>(['comparison', 'procedural', 'conditional', 'reasoning']);

export function determineSearchStrategy(queryType: QueryType, requiresMultihop: boolean): SearchStrategy {
  if (!requiresMultihop) {
    if (queryType === 'aggregation') return 'exhaustive';
    if (queryType === 'structural') return 'metadata_filtered';
    return 'standard';
  }
  if (queryType === 'comparison') return 'multihop_comparison';
  if (queryType === 'conditional') return 'multihop_conditional';
  if (queryType === 'procedural') return 'multihop_procedural';
  return 'multihop_sequential';
}

export function normalizeSubQueries(subQueries: readonly string[], max: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of subQueries) {
    const sq = String(raw ?? '').trim();
    if (!sq) continue;
    const key = sq.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(sq);
    if (out.length >= max) break;
  }
  return out;
}

export function buildDecomposition(
  query: string,
  classification: Classification,
  classifier: ClassifierName,
  maxSubQueries: number
): Decomposition {
  const subQueries = normalizeSubQueries(classification.subQueries, maxSubQueries);
  const complexity: Complexity =
    COMPLEX_TYPES.has(classification.queryType) || subQueries.length > 1 ? 'complex' : 'simple';
  const requiresMultihop = complexity === 'complex' && subQueries.length > 1;
  return {
    query,
    queryType: classification.queryType,
    complexity,
    requiresMultihop,
    subQueries,
    searchStrategy: determineSearchStrategy(classification.queryType, requiresMultihop),
    classifier,
    reasoning: classification.reasoning,
    structuralFilters: detectStructuralReference(query),
  };
}

export function summarizeDecomposition(d: Decomposition): DecompositionSummary {
  return {
    queryType: d.queryType,
    complexity: d.complexity,
    requiresMultihop: d.requiresMultihop,
    subQueries: [...d.subQueries],
    searchStrategy: d.searchStrategy,
    classifier: d.classifier,
  };
}

/** The LLM classifier when a completion service is wired, the heuristic one otherwise. */
export function createClassifier(
  completion: CompletionService | undefined,
  options: LlmClassifierOptions
): QueryClassifier {
  return completion ? new LlmClassifier(completion, options) : new HeuristicClassifier();
}

export interface QueryAnalyzerOptions {
  classifier: QueryClassifier;
  maxSubQueries: number;
}

export class QueryAnalyzer {
  private readonly fallback = new HeuristicClassifier();

  constructor(private readonly options: QueryAnalyzerOptions) {}

  /** Never rejects: any classifier failure falls back to keyword heuristics. */
  async analyze(query: string, scope: RetrievalScope = {}): Promise<Decomposition> {
    const primary = this.options.classifier;
    let classification: Classification;
    let used: ClassifierName = primary.name;
    try {
      classification = await primary.classify(query, scope);
    } catch (e) {
      log.warn('classification_fallback', { classifier: primary.name, err: serializeError(e) });
      classification = await this.fallback.classify(query, scope);
      used = this.fallback.name;
    }

    const decomposition = buildDecomposition(query, classification, used, this.options.maxSubQueries);
    log.info('query_analyzed', {
      classifier: decomposition.classifier,
      query_type: decomposition.queryType,
      complexity: decomposition.complexity,
      requires_multihop: decomposition.requiresMultihop,
      sub_queries: decomposition.subQueries.length,
      search_strategy: decomposition.searchStrategy,
    });
    return decomposition;
  }
}
