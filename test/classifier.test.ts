import test from 'node:test';
import assert from 'node:assert/strict';
import {
  classifyHeuristically,
  extractComparisonEntities,
  extractJsonObject,
  parseClassification,
  splitConditional,
} from '../src/core/retrieval/classifier';
import { hasCue, matchCue, normalizeForCues } from '../src/core/retrieval/cues';

test('cues match whole words only', () => {
  assert.equal(normalizeForCues('What is  "X"?'), ' what is x ');
  assert.equal(hasCue('solar vs wind', ['vs']), true);
  assert.equal(hasCue('canvas sizes', ['vs']), false);
  assert.equal(matchCue('How do I apply?', ['how to', 'how do']), 'how do');
});

test('extractComparisonEntities handles between/compare/versus phrasings', () => {
  assert.deepEqual(extractComparisonEntities('What are the differences between the Agreement 03/2021 and Agreement 13/2025?'), [
    'Agreement 03/2021',
    'Agreement 13/2025',
  ]);
  assert.deepEqual(extractComparisonEntities('Compare decree 1082 with resolution 45'), ['decree 1082', 'resolution 45']);
  assert.deepEqual(extractComparisonEntities('solar vs wind'), ['solar', 'wind']);
  assert.deepEqual(extractComparisonEntities('compare it to it'), []);
});

test('splitConditional puts the condition first', () => {
  assert.deepEqual(splitConditional('If the project is in phase II, can I adjust the schedule?'), [
    'the project is in phase II',
    'can I adjust the schedule?',
  ]);
  assert.deepEqual(splitConditional('Is an extension granted when the budget is exhausted?'), [
    'the budget is exhausted',
    'Is an extension granted?',
  ]);
  assert.deepEqual(splitConditional('Can I do it'), []);
});

test('classifyHeuristically covers every query type', () => {
  assert.equal(classifyHeuristically('Compare decree 1082 with resolution 45').queryType, 'comparison');
  assert.equal(classifyHeuristically('If the project is in phase II, can I adjust the schedule?').queryType, 'conditional');
  assert.equal(classifyHeuristically('What does article 5.2 say?').queryType, 'structural');
  assert.equal(classifyHeuristically('What applies here?', { filters: { article: '3' } }).queryType, 'structural');
  assert.equal(classifyHeuristically('List the eligible costs').queryType, 'aggregation');
  assert.equal(classifyHeuristically('How do I submit a proposal?').queryType, 'procedural');
  assert.equal(classifyHeuristically('Why was the budget reduced?').queryType, 'reasoning');
  assert.equal(classifyHeuristically('What is a regional funding committee?').queryType, 'simple_semantic');
});

test('comparison and conditional cues take priority over structural references', () => {
  assert.equal(classifyHeuristically('Compare article 4 with article 9').queryType, 'comparison');
  assert.equal(classifyHeuristically('If article 7 applies, who approves the budget?').queryType, 'conditional');
  assert.equal(classifyHeuristically('What does chapter 2 require?').queryType, 'structural');
});

test('comparison sub-queries name each side', () => {
  const c = classifyHeuristically('Compare decree 1082 with resolution 45');
  assert.deepEqual(c.subQueries, ['What are the key points of decree 1082?', 'What are the key points of resolution 45?']);
});

test('extractJsonObject strips fences and prose', () => {
  assert.deepEqual(extractJsonObject('Sure:\n```json\n{"a": 1}\n```'), { a: 1 });
  assert.throws(() => extractJsonObject('no json here'));
});

test('parseClassification validates the closed query type enum', () => {
  assert.deepEqual(parseClassification('{"query_type": "procedural"}'), {
    queryType: 'procedural',
    subQueries: [],
    reasoning: '',
  });
  assert.throws(() => parseClassification('{"query_type": "temporal"}'));
  assert.throws(() => parseClassification('{"sub_queries": []}'));
});
