import { withTimeout } from '../async';
import { retrievalLogger, serializeError } from '../log';
import { buildDecomposition, summarizeDecomposition } from './analyzer';
import { classifyHeuristically } from './classifier';
import { activationCues, hasCue } from './cues';
import { DocTypeRegistry } from './docTypes';
import { fuseByProvenance, fuseByReciprocalRank, meanTopScore, summarizeChunks } from './fuser';
import { buildHypotheticalPrompt, detectQueryShape, tokenBudgetFor } from './prompts';
import { emptyHydeMetadata } from './result';
import { runSearchRound, searchByEmbedding, withStructuralFilters, type SearchCollaborators } from './rounds';
import type { QueryOutcome, UsageStats } from './stats';
import { detectStructuralReference, hasStructuralFilters } from './structural';
import type {
  ActivationDecision,
  CompletionService,
  Decomposition,
  HydeMetadata,
  HypotheticalDocument,
  RetrievalResult,
  RetrievalScope,
  RetrievedChunk,
} from './types';

const log = retrievalLogger('hyde');

export interface HydeCollaborators extends SearchCollaborators {
  completion: CompletionService;
  completionTimeoutMs: number;
}

export interface HydeOptions {
  rrfK: number;
  /** Share of topK given to the hypothetical-passage round; the rest goes to the original query. */
  hydeWeight: number;
  hydeMinK: number;
  originalMinK: number;
  maxTokens: number;
  temperature: number;
  inputTokenPrice: number;
  outputTokenPrice: number;
  fallback: {
    enabled: boolean;
    threshold: number;
    minImprovement: number;
    overrideSkipRules: boolean;
  };
}

// ── Activation ─────────────────────────────────────────────────────────────

export type ActivationRule =
  | 'requires_multihop'
  | 'structural_reference'
  | 'explicit_filters'
  | 'structural_query'
  | 'definition_markers'
  | 'procedural_markers'
  | 'explanation_markers'
  | 'simple_semantic'
  | 'default';

export interface ActivationInput {
  query: string;
  scope: RetrievalScope;
  decomposition: Pick<Decomposition, 'queryType' | 'requiresMultihop'>;
}

interface RuleDef {
  rule: ActivationRule;
  decision: ActivationDecision;
  matches(input: ActivationInput): boolean;
}

// First match wins; skip rules come first.
const ACTIVATION_RULES: RuleDef[] = [
  { rule: 'requires_multihop', decision: 'skip', matches: (i) => i.decomposition.requiresMultihop },
  {
    rule: 'structural_reference',
    decision: 'skip',
    matches: (i) => hasStructuralFilters(detectStructuralReference(i.query)),
  },
  { rule: 'explicit_filters', decision: 'skip', matches: (i) => hasStructuralFilters(i.scope.filters) },
  { rule: 'structural_query', decision: 'skip', matches: (i) => i.decomposition.queryType === 'structural' },
  { rule: 'definition_markers', decision: 'activate', matches: (i) => hasCue(i.query, activationCues.definition) },
  { rule: 'procedural_markers', decision: 'activate', matches: (i) => hasCue(i.query, activationCues.procedural) },
  { rule: 'explanation_markers', decision: 'activate', matches: (i) => hasCue(i.query, activationCues.explanation) },
  { rule: 'simple_semantic', decision: 'activate', matches: (i) => i.decomposition.queryType === 'simple_semantic' },
];

const SKIP_RULES: ReadonlySet<ActivationRule> = new Set<ActivationRule>([
  'requires_multihop',
  'structural_reference',
  'explicit_filters',
  'structural_query',
]);

export function evaluateActivation(input: ActivationInput): { decision: ActivationDecision; rule: ActivationRule } {
  for (const def of ACTIVATION_RULES) {
    if (def.matches(input)) return { decision: def.decision, rule: def.rule };
  }
  return { decision: 'skip', rule: 'default' };
}

export function isSkipRule(rule: ActivationRule): boolean {
  return SKIP_RULES.has(rule);
}

// ── Fallback ───────────────────────────────────────────────────────────────

/** An empty standard result always escalates. */
export function shouldTriggerFallback(standardMean: number, standardCount: number, threshold: number): boolean {
  return standardCount === 0 || standardMean < threshold;
}

/** Means below zero count as zero, so the ratio never favours a worse result. */
export function acceptFallback(standardMean: number, hydeMean: number, hydeCount: number, minImprovement: number): boolean {
  const standard = Math.max(0, standardMean);
  const hyde = Math.max(0, hydeMean);
  return hydeCount > 0 && hyde > 0 && hyde >= minImprovement * standard;
}

// ── Retriever ──────────────────────────────────────────────────────────────

export function hybridRoundSizes(
  topK: number,
  options: Pick<HydeOptions, 'hydeWeight' | 'hydeMinK' | 'originalMinK'>
): { hyde: number; original: number } {
  return {
    hyde: Math.max(options.hydeMinK, Math.floor(options.hydeWeight * topK)),
    original: Math.max(options.originalMinK, Math.floor((1 - options.hydeWeight) * topK)),
  };
}

export interface AdaptiveRequest {
  query: string;
  scope: RetrievalScope;
  decomposition?: Decomposition;
  docTypeHint?: string;
  enableHyde: boolean;
  topKInitial: number;
  topKFinal: number;
}

export interface AdaptiveOutcome {
  result: RetrievalResult;
  /** Whether the confidence check ran after a standard round. */
  fallbackChecked: boolean;
  outcome: QueryOutcome;
}

export class HypotheticalRetriever {
  constructor(
    private readonly collab: HydeCollaborators,
    private readonly options: HydeOptions,
    private readonly registry: DocTypeRegistry = new DocTypeRegistry()
  ) {}

  /** Rejects with UpstreamError when the completion fails or returns nothing. */
  async generate(query: string, scope: RetrievalScope, docTypeHint?: string): Promise<HypotheticalDocument> {
    const docType = this.registry.resolve({ hint: docTypeHint, documentIds: scope.documentIds });
    const queryShape = detectQueryShape(query);
    const prompt = buildHypotheticalPrompt(query, queryShape, docType);
    const out = await withTimeout('completion', this.collab.completionTimeoutMs, async () => {
      const completion = await this.collab.completion.complete(prompt, {
        maxTokens: tokenBudgetFor(queryShape, this.options.maxTokens),
        temperature: this.options.temperature,
      });
      if (!completion.text.trim()) throw new Error('empty hypothetical passage');
      return completion;
    });
    const usage = out.usage;
    const generationCost = usage
      ? usage.promptTokens * this.options.inputTokenPrice + usage.completionTokens * this.options.outputTokenPrice
      : 0;
    log.debug('hyde_generated', { doc_type: docType.name, query_shape: queryShape, chars: out.text.length });
    return { text: out.text.trim(), docType: docType.name, queryShape, generationCost };
  }

  /**
   * Passage round plus original-query round, fused by reciprocal rank.
   * Rejects only when the passage cannot be embedded; a failed search round
   * contributes nothing.
   */
  async retrieveHybrid(
    query: string,
    scope: RetrievalScope,
    document: HypotheticalDocument,
    topK: number,
    topKFinal: number
  ): Promise<Pick<RetrievalResult, 'chunks' | 'stats'>> {
    const sizes = hybridRoundSizes(topK, this.options);
    const searchScope = withStructuralFilters(scope, detectStructuralReference(query));
    const passageEmbedding = await withTimeout('embedding', this.collab.timeouts.embeddingMs, () =>
      this.collab.embedding.embed(document.text)
    );

    let failed = 0;
    const guard = async (round: Promise<RetrievedChunk[]>, tag: string): Promise<RetrievedChunk[]> => {
      try {
        return await round;
      } catch (e) {
        failed += 1;
        log.warn('hyde_round_failed', { round: tag, err: serializeError(e) });
        return [];
      }
    };
    const [hydeRound, originalRound] = await Promise.all([
      guard(searchByEmbedding(this.collab, passageEmbedding, searchScope, sizes.hyde, 'hyde'), 'hyde'),
      guard(runSearchRound(this.collab, query, searchScope, sizes.original, 'standard'), 'standard'),
    ]);

    const rounds = [hydeRound, originalRound];
    const unique = new Set(rounds.flatMap((r) => r.map((c) => c.id))).size;
    const chunks = fuseByReciprocalRank(rounds, topKFinal, this.options.rrfK);
    return { chunks, stats: summarizeChunks(chunks, { total: rounds.length, failed }, unique) };
  }

  /** One plain round. A failed round yields an empty result, never an error. */
  async retrieveStandard(
    query: string,
    scope: RetrievalScope,
    topK: number,
    topKFinal: number
  ): Promise<Pick<RetrievalResult, 'chunks' | 'stats'>> {
    const searchScope = withStructuralFilters(scope, detectStructuralReference(query));
    let round: RetrievedChunk[] = [];
    let failed = 0;
    try {
      round = await runSearchRound(this.collab, query, searchScope, topK, 'standard');
    } catch (e) {
      failed = 1;
      log.warn('standard_round_failed', { err: serializeError(e) });
    }
    const chunks = fuseByProvenance([round], topKFinal);
    return { chunks, stats: summarizeChunks(chunks, { total: 1, failed }, round.length) };
  }

  /**
   * Activation table, then either the hybrid search or a standard round with
   * the confidence check. Never rejects on upstream failures.
   */
  async retrieveAdaptive(req: AdaptiveRequest): Promise<AdaptiveOutcome> {
    // Without an analysed decomposition the keyword heuristics decide rules 1 and 4.
    const decomposition =
      req.decomposition ??
      buildDecomposition(req.query, classifyHeuristically(req.query, req.scope), 'heuristic', Number.POSITIVE_INFINITY);
    const summary = req.decomposition ? summarizeDecomposition(req.decomposition) : null;
    const hyde: HydeMetadata = emptyHydeMetadata();
    const finish = (
      part: Pick<RetrievalResult, 'chunks' | 'stats'>,
      strategyUsed: RetrievalResult['strategyUsed'],
      fallbackChecked: boolean
    ): AdaptiveOutcome => ({
      result: { ...part, strategyUsed, decomposition: summary, hyde },
      fallbackChecked,
      outcome: {
        hydeUsed: hyde.used,
        fallbackTriggered: hyde.fallbackTriggered,
        fallbackImproved: hyde.fallbackAccepted,
      },
    });

    const activation = req.enableHyde ? evaluateActivation({ query: req.query, scope: req.scope, decomposition }) : null;
    hyde.activation = activation;

    if (activation?.decision === 'activate') {
      try {
        const document = await this.generate(req.query, req.scope, req.docTypeHint);
        const hybrid = await this.retrieveHybrid(req.query, req.scope, document, req.topKInitial, req.topKFinal);
        hyde.used = true;
        hyde.document = document;
        hyde.hydeMeanScore = meanTopScore(hybrid.chunks, req.topKFinal);
        log.info('hyde_retrieval', { rule: activation.rule, returned: hybrid.chunks.length, cost: document.generationCost });
        return finish(hybrid, 'hyde', false);
      } catch (e) {
        hyde.generationFailed = true;
        log.warn('hyde_generation_failed', { err: serializeError(e) });
      }
    }

    const standard = await this.retrieveStandard(req.query, req.scope, req.topKInitial, req.topKFinal);
    const fallback = this.options.fallback;
    if (!activation || hyde.generationFailed || !fallback.enabled) {
      return finish(standard, 'standard', false);
    }
    if (isSkipRule(activation.rule) && !fallback.overrideSkipRules) {
      return finish(standard, 'standard', true);
    }

    const standardMean = meanTopScore(standard.chunks, req.topKFinal);
    hyde.standardMeanScore = standardMean;
    if (!shouldTriggerFallback(standardMean, standard.chunks.length, fallback.threshold)) {
      return finish(standard, 'standard', true);
    }

    hyde.fallbackTriggered = true;
    let hybrid: Pick<RetrievalResult, 'chunks' | 'stats'>;
    try {
      const document = await this.generate(req.query, req.scope, req.docTypeHint);
      hyde.document = document;
      hybrid = await this.retrieveHybrid(req.query, req.scope, document, req.topKInitial, req.topKFinal);
    } catch (e) {
      hyde.generationFailed = true;
      log.warn('hyde_fallback_failed', { err: serializeError(e) });
      return finish(standard, 'standard', true);
    }

    const hydeMean = meanTopScore(hybrid.chunks, req.topKFinal);
    hyde.hydeMeanScore = hydeMean;
    const accepted = acceptFallback(standardMean, hydeMean, hybrid.chunks.length, fallback.minImprovement);
    log.info('hyde_fallback', { standard_mean: standardMean, hyde_mean: hydeMean, accepted });
    if (!accepted) return finish(standard, 'standard', true);
    hyde.used = true;
    hyde.fallbackAccepted = true;
    return finish(hybrid, 'hyde_fallback', true);
  }

  /** Standalone entry point; records one outcome when `stats` is given. */
  async retrieve(
    query: string,
    scope: RetrievalScope,
    options: { docTypeHint?: string; decomposition?: Decomposition; topKInitial: number; topKFinal: number; stats?: UsageStats }
  ): Promise<RetrievalResult> {
    const { result, outcome } = await this.retrieveAdaptive({
      query,
      scope,
      decomposition: options.decomposition,
      docTypeHint: options.docTypeHint,
      enableHyde: true,
      topKInitial: options.topKInitial,
      topKFinal: options.topKFinal,
    });
    options.stats?.record(outcome);
    return result;
  }
}
