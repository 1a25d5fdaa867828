import { InvalidInputError, errorMessage } from '../../core/errors';
import { createLogger } from '../../core/log';
import { QueryAnalyzer, createClassifier, summarizeDecomposition } from '../../core/retrieval/analyzer';
import { evaluateActivation } from '../../core/retrieval/hyde';
import { RetrievalRouter } from '../../core/retrieval/router';
import type { FusedChunk, RetrievalResult } from '../../core/retrieval/types';
import { defaultDeps, resolveConfig, retrieveOptionsFromFlags, scopeFromFlags, type HandlerDeps } from '../helpers';
import type { AnalyzeInput, RetrieveInput } from '../schemas/retrievalSchemas';
import { ErrorHints, ErrorReasons, error, isCLIError, success, type CLIError, type CLIResult } from '../types';

const PREVIEW_CHARS = 160;

export function presentChunk(chunk: FusedChunk, withText: boolean): Record<string, unknown> {
  const text = withText ? chunk.text : chunk.text.length > PREVIEW_CHARS ? `${chunk.text.slice(0, PREVIEW_CHARS)}…` : chunk.text;
  return {
    id: chunk.id,
    fusedScore: chunk.fusedScore,
    baseScore: chunk.baseScore,
    sourceCount: chunk.sourceCount,
    provenance: chunk.provenance,
    text,
    ...(chunk.metadata ? { metadata: chunk.metadata } : {}),
  };
}

export function presentResult(result: RetrievalResult, withText: boolean): Record<string, unknown> {
  return {
    strategyUsed: result.strategyUsed,
    chunks: result.chunks.map((c) => presentChunk(c, withText)),
    decomposition: result.decomposition,
    hyde: result.hyde,
    stats: result.stats,
    routing: result.routing,
  };
}

export function invalidInput(e: InvalidInputError): CLIError {
  return error(ErrorReasons.INVALID_INPUT, { message: e.message, issues: e.issues, hint: ErrorHints.INVALID_INPUT });
}

export async function handleAnalyze(input: AnalyzeInput, deps: HandlerDeps = defaultDeps): Promise<CLIResult | CLIError> {
  const config = await resolveConfig(input, deps);
  if (isCLIError(config)) return config;

  const collab = deps.createCollaborators(config, { offline: input.offline });
  const analyzer = new QueryAnalyzer({
    classifier: createClassifier(collab.completion, {
      maxTokens: config.analyzer.maxTokens,
      temperature: config.analyzer.temperature,
      timeoutMs: config.timeouts.completionMs,
    }),
    maxSubQueries: config.analyzer.maxSubQueries,
  });
  const scope = scopeFromFlags(input);
  const decomposition = await analyzer.analyze(input.question, scope);
  return success({
    question: input.question,
    decomposition: summarizeDecomposition(decomposition),
    reasoning: decomposition.reasoning,
    structuralFilters: decomposition.structuralFilters,
    hydeActivation: evaluateActivation({ query: input.question, scope, decomposition }),
  });
}

export async function handleRetrieve(input: RetrieveInput, deps: HandlerDeps = defaultDeps): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'retrieve' });
  const config = await resolveConfig(input, deps);
  if (isCLIError(config)) return config;

  const router = new RetrievalRouter(deps.createCollaborators(config, { offline: input.offline }), { config });
  try {
    const result = await router.retrieve(input.question, scopeFromFlags(input), retrieveOptionsFromFlags(input));
    return success({ question: input.question, ...presentResult(result, input.withText) });
  } catch (e) {
    if (e instanceof InvalidInputError) return invalidInput(e);
    log.error('retrieve', { ok: false, err: errorMessage(e) });
    return error(ErrorReasons.RETRIEVAL_FAILED, { message: errorMessage(e), hint: ErrorHints.RETRIEVAL_FAILED });
  }
}
