export const QUERY_TYPES = [
  'simple_semantic',
  'structural',
  'comparison',
  'procedural',
  'conditional',
  'aggregation',
  'reasoning',
] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

export type Complexity = 'simple' | 'complex';

export type SearchStrategy =
  | 'standard'
  | 'exhaustive'
  | 'metadata_filtered'
  | 'multihop_comparison'
  | 'multihop_conditional'
  | 'multihop_procedural'
  | 'multihop_sequential';

export type ClassifierName = 'llm' | 'heuristic';

/** Hierarchy references such as "article 5.2" or "chapter IV", numbers normalised. */
export interface StructuralFilters {
  chapter?: string;
  title?: string;
  article?: string;
  section?: string;
  annex?: string;
}

export interface RetrievalScope {
  /** Restrict the search to these documents. */
  documentIds?: string[];
  /** Knowledge area / collection partition. */
  area?: string;
  /** Explicit hierarchy filters supplied by the caller. */
  filters?: StructuralFilters;
}

export interface Decomposition {
  query: string;
  queryType: QueryType;
  complexity: Complexity;
  requiresMultihop: boolean;
  subQueries: string[];
  searchStrategy: SearchStrategy;
  classifier: ClassifierName;
  reasoning: string;
  structuralFilters: StructuralFilters;
}

/** A round tag: 1-based sub-query index, the plain query round, or the hypothetical passage round. */
export type Provenance = number | 'standard' | 'hyde';

export interface RetrievedChunk {
  id: string;
  text: string;
  baseScore: number;
  provenance: Provenance;
  metadata?: Record<string, unknown>;
}

export interface FusedChunk {
  id: string;
  text: string;
  fusedScore: number;
  baseScore: number;
  sourceCount: number;
  provenance: Provenance[];
  metadata?: Record<string, unknown>;
}

export type StrategyUsed = 'standard' | 'multihop' | 'hyde' | 'hyde_fallback';

export type QueryShape = 'objectives' | 'list' | 'numerical' | 'procedural' | 'comparison' | 'definition' | 'generic';

export interface HypotheticalDocument {
  text: string;
  docType: string;
  queryShape: QueryShape;
  generationCost: number;
}

export interface DecompositionSummary {
  queryType: QueryType;
  complexity: Complexity;
  requiresMultihop: boolean;
  subQueries: string[];
  searchStrategy: SearchStrategy;
  classifier: ClassifierName;
}

export type ActivationDecision = 'activate' | 'skip';

export interface HydeMetadata {
  /** Outcome of the activation rule table; null when HyDE was disabled or not evaluated. */
  activation: { decision: ActivationDecision; rule: string } | null;
  used: boolean;
  generationFailed: boolean;
  fallbackTriggered: boolean;
  fallbackAccepted: boolean;
  document: HypotheticalDocument | null;
  standardMeanScore: number | null;
  hydeMeanScore: number | null;
}

export interface ComparisonPair {
  entity: string;
  subQueryIndices: number[];
  chunkIds: string[];
}

export interface RetrievalStats {
  rounds: number;
  roundsFailed: number;
  uniqueChunks: number;
  /** Keyed by source count as a string ("1", "2", "3"...). */
  chunksBySourceCount: Record<string, number>;
  /** Keyed by provenance tag of the first round that surfaced the chunk. */
  chunksByRound: Record<string, number>;
  meanFusedScore: number;
  topScore: number;
  comparison?: { entities: string[]; pairs: ComparisonPair[] };
  conditional?: { conditions: number; executed: number };
}

export type RouterState =
  | 'INIT'
  | 'DECOMPOSE'
  | 'ROUTE'
  | 'MULTIHOP'
  | 'STANDARD_OR_HYDE'
  | 'FALLBACK_CHECK'
  | 'DONE';

export interface RoutingMetadata {
  branch: 'multihop' | 'standard_or_hyde';
  states: RouterState[];
}

export interface RetrievalResult {
  chunks: FusedChunk[];
  strategyUsed: StrategyUsed;
  decomposition: DecompositionSummary | null;
  hyde: HydeMetadata;
  stats: RetrievalStats;
  routing?: RoutingMetadata;
}

export interface SearchHit {
  id: string;
  text: string;
  /** Similarity in [0, 1]; out-of-range scores are clamped when hits enter a round. */
  score: number;
  metadata?: Record<string, unknown>;
}

export interface CompletionOptions {
  maxTokens: number;
  temperature?: number;
  /** Ask the backend for a JSON object. */
  json?: boolean;
}

export interface Completion {
  text: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface CompletionService {
  complete(prompt: string, options: CompletionOptions): Promise<Completion>;
}

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

/** Returns hits ordered by descending score, already filtered by scope. */
export interface VectorSearchService {
  search(embedding: number[], scope: RetrievalScope, topK: number): Promise<SearchHit[]>;
}

export interface RetrieveOptions {
  enableMultihop?: boolean;
  enableHyde?: boolean;
  topKInitial?: number;
  topKFinal?: number;
  docTypeHint?: string;
}
