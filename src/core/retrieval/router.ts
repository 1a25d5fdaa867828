import { z } from 'zod';
import type { RetrievalConfig } from '../config';
import { InvalidInputError, UpstreamError } from '../errors';
import { retrievalLogger } from '../log';
import { QueryAnalyzer, createClassifier } from './analyzer';
import { LruCache, memoizeEmbedding } from './cache';
import { DocTypeRegistry } from './docTypes';
import { HypotheticalRetriever } from './hyde';
import { MultihopCoordinator } from './multihop';
import { UsageStats, type QueryOutcome } from './stats';
import type {
  CompletionService,
  EmbeddingService,
  RetrievalResult,
  RetrievalScope,
  RetrieveOptions,
  RouterState,
  RoutingMetadata,
  VectorSearchService,
} from './types';

const log = retrievalLogger('router');

const optionalRef = z.string().trim().min(1).optional();

export const RetrievalScopeSchema = z
  .object({
    documentIds: z.array(z.string().trim().min(1)).optional(),
    area: z.string().trim().min(1).optional(),
    filters: z
      .object({
        chapter: optionalRef,
        title: optionalRef,
        article: optionalRef,
        section: optionalRef,
        annex: optionalRef,
      })
      .strict()
      .optional(),
  })
  .strict();

export const RetrieveOptionsSchema = z
  .object({
    enableMultihop: z.boolean().default(true),
    enableHyde: z.boolean().default(true),
    topKInitial: z.number().int().positive().optional(),
    topKFinal: z.number().int().positive().optional(),
    docTypeHint: z.string().trim().min(1).optional(),
  })
  .strict();

export const RetrieveRequestSchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  scope: RetrievalScopeSchema.default({}),
  options: RetrieveOptionsSchema.default({}),
});

export type RetrieveRequest = z.infer<typeof RetrieveRequestSchema>;

/** Zod issues flattened to `path: message` pairs. */
export function parseRetrieveRequest(input: unknown): RetrieveRequest {
  const parsed = RetrieveRequestSchema.safeParse(input);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
  throw new InvalidInputError(`invalid retrieval request: ${issues.map((i) => `${i.path || '(root)'} ${i.message}`).join('; ')}`, issues);
}

export interface RouterCollaborators {
  /** Without a completion service classification is heuristic and HyDE never runs. */
  completion?: CompletionService;
  embedding: EmbeddingService;
  vectorSearch: VectorSearchService;
}

export interface RetrievalRouterOptions {
  config: RetrievalConfig;
  stats?: UsageStats;
  registry?: DocTypeRegistry;
  /** Entries in the per-query embedding memo. */
  embeddingCacheSize?: number;
}

const unavailableCompletion: CompletionService = {
  complete: () => Promise.reject(new UpstreamError('completion', 'no completion service configured')),
};

export class RetrievalRouter {
  readonly stats: UsageStats;
  private readonly analyzer: QueryAnalyzer;
  private readonly registry: DocTypeRegistry;

  constructor(
    private readonly collab: RouterCollaborators,
    private readonly options: RetrievalRouterOptions
  ) {
    const cfg = options.config;
    this.stats = options.stats ?? new UsageStats();
    this.registry = options.registry ?? new DocTypeRegistry();
    this.analyzer = new QueryAnalyzer({
      classifier: createClassifier(collab.completion, {
        maxTokens: cfg.analyzer.maxTokens,
        temperature: cfg.analyzer.temperature,
        timeoutMs: cfg.timeouts.completionMs,
      }),
      maxSubQueries: cfg.analyzer.maxSubQueries,
    });
  }

  /**
   * INIT → DECOMPOSE → ROUTE → MULTIHOP | STANDARD_OR_HYDE [→ FALLBACK_CHECK] → DONE.
   * Rejects only with InvalidInputError, before any collaborator is called.
   */
  async retrieve(question: string, scope?: RetrievalScope, options?: RetrieveOptions): Promise<RetrievalResult> {
    const req = parseRetrieveRequest({ question, scope, options });
    return log.span('retrieval', { question_chars: req.question.length }, () => this.run(req));
  }

  private async run(req: RetrieveRequest): Promise<RetrievalResult> {
    const cfg = this.options.config;
    const states: RouterState[] = ['INIT'];
    const topKInitial = req.options.topKInitial ?? cfg.topK.initial;
    const topKFinal = req.options.topKFinal ?? cfg.topK.final;
    const enableHyde = req.options.enableHyde && this.collab.completion !== undefined;

    // Query-scoped collaborators: the memo dies with the query.
    const search = {
      embedding: memoizeEmbedding(this.collab.embedding, new LruCache(this.options.embeddingCacheSize ?? 32)),
      vectorSearch: this.collab.vectorSearch,
      timeouts: { embeddingMs: cfg.timeouts.embeddingMs, searchMs: cfg.timeouts.searchMs },
    };

    states.push('DECOMPOSE');
    const decomposition = await this.analyzer.analyze(req.question, req.scope);

    states.push('ROUTE');
    let result: RetrievalResult;
    let outcome: QueryOutcome = { hydeUsed: false, fallbackTriggered: false, fallbackImproved: false };
    let branch: RoutingMetadata['branch'];

    if (req.options.enableMultihop && decomposition.requiresMultihop) {
      states.push('MULTIHOP');
      branch = 'multihop';
      const coordinator = new MultihopCoordinator(search, {
        maxConcurrency: cfg.multihop.maxConcurrency,
        boosts: cfg.multihop.boosts,
        topKFinal,
      });
      result = await coordinator.retrieve(decomposition, req.scope, topKInitial, topKFinal);
    } else {
      states.push('STANDARD_OR_HYDE');
      branch = 'standard_or_hyde';
      const retriever = new HypotheticalRetriever(
        {
          ...search,
          completion: this.collab.completion ?? unavailableCompletion,
          completionTimeoutMs: cfg.timeouts.completionMs,
        },
        { ...cfg.hyde, fallback: cfg.fallback },
        this.registry
      );
      const adaptive = await retriever.retrieveAdaptive({
        query: req.question,
        scope: req.scope,
        decomposition,
        docTypeHint: req.options.docTypeHint,
        enableHyde,
        topKInitial,
        topKFinal,
      });
      if (adaptive.fallbackChecked) states.push('FALLBACK_CHECK');
      result = adaptive.result;
      outcome = adaptive.outcome;
    }

    states.push('DONE');
    this.stats.record(outcome);
    log.info('retrieval_routed', {
      branch,
      strategy_used: result.strategyUsed,
      query_type: decomposition.queryType,
      returned: result.chunks.length,
      hyde_used: outcome.hydeUsed,
      fallback_triggered: outcome.fallbackTriggered,
    });
    return { ...result, routing: { branch, states } };
  }
}
