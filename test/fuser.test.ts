import test from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_BOOSTS,
  boost,
  clampScore,
  fuseByProvenance,
  fuseByReciprocalRank,
  isMonotonicBoost,
  meanTopScore,
  summarizeChunks,
} from '../src/core/retrieval/fuser';
import { hitsToChunks } from '../src/core/retrieval/rounds';
import type { Provenance, RetrievedChunk } from '../src/core/retrieval/types';

function chunk(id: string, baseScore: number, provenance: Provenance): RetrievedChunk {
  return { id, text: id, baseScore, provenance };
}

test('boost is monotonic in source count', () => {
  assert.equal(isMonotonicBoost(DEFAULT_BOOSTS), true);
  assert.equal(boost(1), 1.0);
  assert.equal(boost(2), 1.3);
  assert.equal(boost(3), 1.5);
  assert.equal(boost(7), 1.5);
  assert.ok(boost(1) <= boost(2) && boost(2) <= boost(3));
  assert.equal(isMonotonicBoost({ single: 1, double: 0.9, multiple: 1.5 }), false);
});

test('a chunk found by two rounds scores max base times 1.3', () => {
  const fused = fuseByProvenance(
    [
      [chunk('x', 0.8, 1), chunk('y', 0.95, 1)],
      [chunk('x', 0.6, 2)],
    ],
    10
  );
  const x = fused.find((c) => c.id === 'x');
  assert.ok(x);
  assert.ok(Math.abs(x.fusedScore - 1.04) < 1e-9);
  assert.equal(x.baseScore, 0.8);
  assert.equal(x.sourceCount, 2);
  assert.deepEqual(x.provenance, [1, 2]);
  assert.deepEqual(
    fused.map((c) => c.id),
    ['x', 'y']
  );
});

test('equal fused scores are ordered by id', () => {
  const fused = fuseByProvenance([[chunk('b', 0.5, 1), chunk('a', 0.5, 1), chunk('c', 0.5, 1)]], 10);
  assert.deepEqual(
    fused.map((c) => c.id),
    ['a', 'b', 'c']
  );
});

test('fusion truncates to the limit after sorting', () => {
  const fused = fuseByProvenance([[chunk('a', 0.1, 1), chunk('b', 0.9, 1), chunk('c', 0.5, 1)]], 2);
  assert.deepEqual(
    fused.map((c) => c.id),
    ['b', 'c']
  );
});

test('reciprocal rank fusion sums 1/(k + rank) with 1-based ranks', () => {
  const hydeRound = [chunk('d', 0.9, 'hyde'), chunk('e', 0.8, 'hyde')];
  const standardRound = [
    chunk('f', 0.7, 'standard'),
    chunk('g', 0.6, 'standard'),
    chunk('h', 0.5, 'standard'),
    chunk('i', 0.4, 'standard'),
    chunk('d', 0.3, 'standard'),
  ];
  const fused = fuseByReciprocalRank([hydeRound, standardRound], 10, 60);
  const d = fused[0];
  assert.ok(d);
  assert.equal(d.id, 'd');
  assert.ok(Math.abs(d.fusedScore - (1 / 61 + 1 / 65)) < 1e-12);
  assert.ok(Math.abs(d.fusedScore - 0.0318) < 1e-4);
  assert.equal(d.baseScore, 0.9);
  assert.deepEqual(d.provenance, ['hyde', 'standard']);
});

test('reciprocal rank ties fall back to id order', () => {
  const fused = fuseByReciprocalRank([[chunk('z', 0.9, 'hyde')], [chunk('m', 0.1, 'standard')]], 10);
  assert.deepEqual(
    fused.map((c) => c.id),
    ['m', 'z']
  );
});

test('meanTopScore averages base scores over the window', () => {
  const fused = fuseByProvenance([[chunk('a', 0.9, 1), chunk('b', 0.5, 1), chunk('c', 0.1, 1)]], 10);
  assert.ok(Math.abs(meanTopScore(fused, 2) - 0.7) < 1e-9);
  assert.equal(meanTopScore([], 30), 0);
});

test('summarizeChunks builds histograms', () => {
  const fused = fuseByProvenance(
    [
      [chunk('a', 0.8, 1), chunk('b', 0.6, 1)],
      [chunk('a', 0.7, 2), chunk('c', 0.9, 2)],
    ],
    10
  );
  const stats = summarizeChunks(fused, { total: 2, failed: 0 });
  assert.equal(stats.rounds, 2);
  assert.equal(stats.uniqueChunks, 3);
  assert.deepEqual(stats.chunksBySourceCount, { '1': 2, '2': 1 });
  assert.deepEqual(stats.chunksByRound, { sub_1: 2, sub_2: 1 });
  assert.ok(Math.abs(stats.topScore - 1.04) < 1e-9);
  assert.ok(Math.abs(stats.meanFusedScore - (1.04 + 0.9 + 0.6) / 3) < 1e-9);
});

test('clampScore keeps scores within [0, 1]', () => {
  assert.equal(clampScore(-0.2), 0);
  assert.equal(clampScore(Number.NaN), 0);
  assert.equal(clampScore(0.42), 0.42);
  assert.equal(clampScore(1.7), 1);
});

test('hits entering a round carry clamped base scores', () => {
  const chunks = hitsToChunks(
    [
      { id: 'a', text: 'a', score: -0.2 },
      { id: 'b', text: 'b', score: 0.6 },
    ],
    'standard'
  );
  assert.deepEqual(
    chunks.map((c) => c.baseScore),
    [0, 0.6]
  );
});

test('more rounds never lower the fused score of a negative base score', () => {
  const [single] = fuseByProvenance([[chunk('x', -0.2, 1)]], 10);
  const [triple] = fuseByProvenance([[chunk('x', -0.2, 1)], [chunk('x', -0.2, 2)], [chunk('x', -0.2, 3)]], 10);
  assert.ok(single && triple);
  assert.equal(single.baseScore, 0);
  assert.equal(triple.sourceCount, 3);
  assert.ok(triple.fusedScore >= single.fusedScore);
});
