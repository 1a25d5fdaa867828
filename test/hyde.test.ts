import test from 'node:test';
import assert from 'node:assert/strict';
import { defaultRetrievalConfig } from '../src/core/config';
import {
  HypotheticalRetriever,
  acceptFallback,
  evaluateActivation,
  hybridRoundSizes,
  shouldTriggerFallback,
  type HydeOptions,
} from '../src/core/retrieval/hyde';
import { UsageStats } from '../src/core/retrieval/stats';
import type { SearchHit } from '../src/core/retrieval/types';
import { FAST_TIMEOUTS, createFakeServices, decomposition, hit, type FakeServicesOptions } from './helpers/fakes';

const DEFINITION = 'What is a funding committee?';
const LISTING = 'List the eligible costs';
const ARTICLE = 'What does article 7 establish?';
const PASSAGE = 'HYPO passage';

function options(fallback: Partial<HydeOptions['fallback']> = {}): HydeOptions {
  const cfg = defaultRetrievalConfig();
  return { ...cfg.hyde, fallback: { ...cfg.fallback, ...fallback } };
}

function setup(hits: Record<string, SearchHit[]>, extra: Partial<FakeServicesOptions> = {}, fallback: Partial<HydeOptions['fallback']> = {}) {
  const fakes = createFakeServices({
    hits: (text) => hits[text] ?? [],
    complete: () => ({ text: `  ${PASSAGE}\n`, usage: { promptTokens: 1000, completionTokens: 100 } }),
    ...extra,
  });
  const retriever = new HypotheticalRetriever(
    { ...fakes, timeouts: FAST_TIMEOUTS, completionTimeoutMs: 200 },
    options(fallback)
  );
  return { fakes, retriever };
}

const request = { scope: {}, enableHyde: true, topKInitial: 20, topKFinal: 30 };

test('activation rules apply in order, skip rules first', () => {
  const simple = { queryType: 'simple_semantic' as const, requiresMultihop: false };
  const rule = (query: string, d: Parameters<typeof evaluateActivation>[0]['decomposition'] = simple, scope = {}) => evaluateActivation({ query, scope, decomposition: d }).rule;

  assert.equal(rule(DEFINITION, { queryType: 'comparison', requiresMultihop: true }), 'requires_multihop');
  assert.equal(rule('What is article 7?'), 'structural_reference');
  assert.equal(rule(DEFINITION, simple, { filters: { chapter: '2' } }), 'explicit_filters');
  assert.equal(rule('Show the audit rules', { queryType: 'structural', requiresMultihop: false }), 'structural_query');
  assert.equal(rule(DEFINITION), 'definition_markers');
  assert.equal(rule('How are grants disbursed?', { queryType: 'procedural', requiresMultihop: false }), 'procedural_markers');
  assert.equal(rule('Explain the review criteria', { queryType: 'reasoning', requiresMultihop: false }), 'explanation_markers');
  assert.equal(rule('Who signs the agreement?'), 'simple_semantic');
  assert.deepEqual(
    evaluateActivation({ query: LISTING, scope: {}, decomposition: { queryType: 'aggregation', requiresMultihop: false } }),
    { decision: 'skip', rule: 'default' }
  );
});

test('fallback triggers below the threshold and accepts a 1.2x improvement', () => {
  assert.equal(shouldTriggerFallback(0.2, 5, 0.3), true);
  assert.equal(shouldTriggerFallback(0.5, 5, 0.3), false);
  assert.equal(shouldTriggerFallback(0.9, 0, 0.3), true);
  assert.equal(acceptFallback(0.2, 0.75, 5, 1.2), true);
  assert.equal(acceptFallback(0.25, 0.28, 5, 1.2), false);
  assert.equal(acceptFallback(0.2, 0.75, 0, 1.2), false);
});

test('negative means never let a worse HyDE result through', () => {
  assert.equal(acceptFallback(-0.1, -0.11, 3, 1.2), false);
  assert.equal(acceptFallback(-0.1, 0, 3, 1.2), false);
  assert.equal(acceptFallback(-0.1, 0.4, 3, 1.2), true);
});

test('hybrid round sizes keep their minimums', () => {
  const cfg = defaultRetrievalConfig().hyde;
  assert.deepEqual(hybridRoundSizes(20, cfg), { hyde: 14, original: 6 });
  assert.deepEqual(hybridRoundSizes(10, cfg), { hyde: 10, original: 5 });
  assert.deepEqual(hybridRoundSizes(40, cfg), { hyde: 28, original: 12 });
});

test('generate prices the tokens and raises the budget for lists', async () => {
  const { fakes, retriever } = setup({});
  const doc = await retriever.generate(LISTING, { documentIds: ['decree-1082'] });
  assert.equal(doc.text, PASSAGE);
  assert.equal(doc.docType, 'legal');
  assert.equal(doc.queryShape, 'list');
  assert.ok(Math.abs(doc.generationCost - 0.00021) < 1e-12);
  assert.equal(fakes.prompts[0]?.options.maxTokens, 200);
  assert.equal(fakes.prompts[0]?.options.temperature, 0.3);
});

test('an activated query runs the hybrid search fused by reciprocal rank', async () => {
  const { fakes, retriever } = setup({
    [PASSAGE]: [hit('x', 0.9), hit('y', 0.8)],
    [DEFINITION]: [hit('y', 0.7), hit('z', 0.6)],
  });
  const { result, fallbackChecked, outcome } = await retriever.retrieveAdaptive({ ...request, query: DEFINITION });

  assert.equal(result.strategyUsed, 'hyde');
  assert.equal(fallbackChecked, false);
  assert.deepEqual(outcome, { hydeUsed: true, fallbackTriggered: false, fallbackImproved: false });
  assert.deepEqual(
    result.chunks.map((c) => c.id),
    ['y', 'x', 'z']
  );
  assert.ok(Math.abs((result.chunks[0]?.fusedScore ?? 0) - (1 / 61 + 1 / 62)) < 1e-12);
  assert.equal(result.chunks[0]?.baseScore, 0.8);
  assert.deepEqual(result.stats.chunksByRound, { hyde: 2, standard: 1 });
  assert.deepEqual(result.hyde.activation, { decision: 'activate', rule: 'definition_markers' });
  assert.equal(result.hyde.used, true);
  assert.equal(result.hyde.document?.queryShape, 'definition');
  assert.equal(result.hyde.document?.docType, 'generic');
  assert.deepEqual(
    fakes.searchCalls.map((c) => [c.text, c.topK]),
    [
      [PASSAGE, 14],
      [DEFINITION, 6],
    ]
  );
});

test('a weak standard result is replaced when the hybrid result improves enough', async () => {
  const { retriever } = setup({ [LISTING]: [hit('s1', 0.2)], [PASSAGE]: [hit('h1', 0.75)] });
  const { result, fallbackChecked, outcome } = await retriever.retrieveAdaptive({ ...request, query: LISTING });

  assert.equal(result.strategyUsed, 'hyde_fallback');
  assert.equal(fallbackChecked, true);
  assert.deepEqual(outcome, { hydeUsed: true, fallbackTriggered: true, fallbackImproved: true });
  assert.deepEqual(
    result.chunks.map((c) => c.id),
    ['h1', 's1']
  );
  assert.deepEqual(result.hyde.activation, { decision: 'skip', rule: 'default' });
  assert.equal(result.hyde.standardMeanScore, 0.2);
  assert.ok(Math.abs((result.hyde.hydeMeanScore ?? 0) - 0.475) < 1e-9);
  assert.equal(result.hyde.fallbackAccepted, true);
});

test('a hybrid result below the improvement ratio is discarded', async () => {
  const { retriever } = setup({ [LISTING]: [hit('s1', 0.25)], [PASSAGE]: [hit('h1', 0.28)] });
  const { result, outcome } = await retriever.retrieveAdaptive({ ...request, query: LISTING });

  assert.equal(result.strategyUsed, 'standard');
  assert.deepEqual(outcome, { hydeUsed: false, fallbackTriggered: true, fallbackImproved: false });
  assert.deepEqual(
    result.chunks.map((c) => [c.id, c.fusedScore]),
    [['s1', 0.25]]
  );
  assert.equal(result.hyde.used, false);
  assert.equal(result.hyde.document?.text, PASSAGE);
  assert.ok(Math.abs((result.hyde.hydeMeanScore ?? 0) - 0.265) < 1e-9);
});

test('a confident standard result skips generation entirely', async () => {
  const { fakes, retriever } = setup({ [LISTING]: [hit('s1', 0.9)] });
  const { result, fallbackChecked } = await retriever.retrieveAdaptive({ ...request, query: LISTING });
  assert.equal(result.strategyUsed, 'standard');
  assert.equal(fallbackChecked, true);
  assert.equal(result.hyde.fallbackTriggered, false);
  assert.equal(result.hyde.standardMeanScore, 0.9);
  assert.equal(fakes.prompts.length, 0);
});

test('generation failure disables HyDE for the query, including the fallback', async () => {
  const { fakes, retriever } = setup(
    { [DEFINITION]: [hit('z', 0.1)] },
    {
      complete: () => {
        throw new Error('model unavailable');
      },
    }
  );
  const { result, fallbackChecked } = await retriever.retrieveAdaptive({ ...request, query: DEFINITION });
  assert.equal(result.strategyUsed, 'standard');
  assert.equal(fallbackChecked, false);
  assert.equal(result.hyde.generationFailed, true);
  assert.equal(result.hyde.fallbackTriggered, false);
  assert.deepEqual(
    result.chunks.map((c) => c.id),
    ['z']
  );
  assert.equal(fakes.prompts.length, 1);
});

test('a passage that cannot be embedded counts as a generation failure', async () => {
  const { retriever } = setup(
    { [DEFINITION]: [hit('z', 0.6)], [PASSAGE]: [hit('x', 0.9)] },
    { failEmbed: (text) => text === PASSAGE }
  );
  const { result } = await retriever.retrieveAdaptive({ ...request, query: DEFINITION });
  assert.equal(result.strategyUsed, 'standard');
  assert.equal(result.hyde.generationFailed, true);
  assert.equal(result.hyde.used, false);
});

test('a failed fallback generation keeps the standard result', async () => {
  const { retriever } = setup(
    { [LISTING]: [hit('s1', 0.1)] },
    { complete: () => Promise.reject(new Error('timeout')) }
  );
  const { result, outcome } = await retriever.retrieveAdaptive({ ...request, query: LISTING });
  assert.equal(result.strategyUsed, 'standard');
  assert.deepEqual(outcome, { hydeUsed: false, fallbackTriggered: true, fallbackImproved: false });
  assert.equal(result.hyde.generationFailed, true);
});

test('structural queries never activate but the fallback may override the skip', async () => {
  const hits = { [ARTICLE]: [hit('s1', 0.1)], [PASSAGE]: [hit('h1', 0.9)] };
  const { fakes, retriever } = setup(hits, {}, { overrideSkipRules: true });
  const { result } = await retriever.retrieveAdaptive({ ...request, query: ARTICLE });

  assert.deepEqual(result.hyde.activation, { decision: 'skip', rule: 'structural_reference' });
  assert.equal(result.strategyUsed, 'hyde_fallback');
  assert.deepEqual(fakes.searchCalls[0]?.scope, { filters: { article: '7' } });
  assert.ok(fakes.searchCalls.every((c) => c.scope.filters?.article === '7'));
});

test('structural queries stay standard when the fallback may not override skips', async () => {
  const hits = { [ARTICLE]: [hit('s1', 0.1)], [PASSAGE]: [hit('h1', 0.9)] };
  const { fakes, retriever } = setup(hits, {}, { overrideSkipRules: false });
  const { result, fallbackChecked } = await retriever.retrieveAdaptive({ ...request, query: ARTICLE });

  assert.deepEqual(result.hyde.activation, { decision: 'skip', rule: 'structural_reference' });
  assert.equal(result.strategyUsed, 'standard');
  assert.equal(fallbackChecked, true);
  assert.equal(result.hyde.fallbackTriggered, false);
  assert.equal(fakes.prompts.length, 0);
});

test('the fallback never runs when it is disabled or HyDE is off', async () => {
  const disabled = setup({ [LISTING]: [hit('s1', 0.1)] }, {}, { enabled: false });
  const a = await disabled.retriever.retrieveAdaptive({ ...request, query: LISTING });
  assert.equal(a.result.hyde.fallbackTriggered, false);
  assert.equal(a.fallbackChecked, false);

  const off = setup({ [DEFINITION]: [hit('s1', 0.1)] });
  const b = await off.retriever.retrieveAdaptive({ ...request, query: DEFINITION, enableHyde: false });
  assert.equal(b.result.hyde.activation, null);
  assert.equal(b.result.strategyUsed, 'standard');
  assert.equal(off.fakes.prompts.length, 0);
});

test('an explicit decomposition is summarised in the result', async () => {
  const { retriever } = setup({ [DEFINITION]: [hit('s1', 0.9)] });
  const d = decomposition({ query: DEFINITION, queryType: 'aggregation', searchStrategy: 'exhaustive' });
  const { result } = await retriever.retrieveAdaptive({ ...request, query: DEFINITION, decomposition: d, enableHyde: false });
  assert.equal(result.decomposition?.searchStrategy, 'exhaustive');
});

test('the standalone retrieve records one usage outcome', async () => {
  const { retriever } = setup({ [PASSAGE]: [hit('x', 0.9)], [DEFINITION]: [hit('y', 0.7)] });
  const stats = new UsageStats();
  const result = await retriever.retrieve(DEFINITION, {}, { topKInitial: 20, topKFinal: 30, stats });
  assert.equal(result.strategyUsed, 'hyde');
  assert.equal(stats.snapshot().totalQueries, 1);
  assert.equal(stats.snapshot().hydeUsed, 1);
});
