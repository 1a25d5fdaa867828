import test from 'node:test';
import assert from 'node:assert/strict';
import {
  detectStructuralReference,
  hasStructuralFilters,
  normalizeReference,
  romanToInt,
} from '../src/core/retrieval/structural';
import { classifyHeuristically } from '../src/core/retrieval/classifier';
import { withStructuralFilters } from '../src/core/retrieval/rounds';

test('romanToInt accepts canonical numerals only', () => {
  assert.equal(romanToInt('IV'), 4);
  assert.equal(romanToInt('xiv'), 14);
  assert.equal(romanToInt('MCMXC'), 1990);
  assert.equal(romanToInt('IIII'), null);
  assert.equal(romanToInt('civil'), null);
});

test('normalizeReference maps numerals and letters', () => {
  assert.equal(normalizeReference('5.2'), '5.2');
  assert.equal(normalizeReference('ix'), '9');
  assert.equal(normalizeReference('b'), 'B');
  assert.equal(normalizeReference('civil'), null);
});

test('detectStructuralReference finds every level', () => {
  assert.deepEqual(detectStructuralReference('What does chapter IV, article 12.3 establish?'), { chapter: '4', article: '12.3' });
  assert.deepEqual(detectStructuralReference('Title II and annex b'), { title: '2', annex: 'B' });
  assert.deepEqual(detectStructuralReference('see ch. 3, sec. 4.1'), { chapter: '3', section: '4.1' });
  assert.deepEqual(detectStructuralReference('requirements of § 7'), { section: '7' });
  assert.deepEqual(detectStructuralReference('the title civil procedure'), {});
  assert.deepEqual(detectStructuralReference('What is a funding committee?'), {});
});

test('hasStructuralFilters ignores empty values', () => {
  assert.equal(hasStructuralFilters(undefined), false);
  assert.equal(hasStructuralFilters({}), false);
  assert.equal(hasStructuralFilters({ chapter: '' }), false);
  assert.equal(hasStructuralFilters({ annex: 'A' }), true);
});

test('caller filters win over detected ones', () => {
  const scope = { area: 'energy', filters: { article: '9' } };
  assert.deepEqual(withStructuralFilters(scope, { article: '5', chapter: '2' }), {
    area: 'energy',
    filters: { article: '9', chapter: '2' },
  });
  assert.equal(withStructuralFilters(scope, {}), scope);
});

test('single letters other than I, V and X stay letters', () => {
  assert.deepEqual(detectStructuralReference('annex C'), { annex: 'C' });
  assert.deepEqual(detectStructuralReference('annex v'), { annex: '5' });
});

test('an article or pronoun after a hierarchy keyword is not a reference', () => {
  const question = 'Is an annex a mandatory part of the funding application?';
  assert.deepEqual(detectStructuralReference(question), {});
  assert.notEqual(classifyHeuristically(question).queryType, 'structural');
  assert.deepEqual(withStructuralFilters({}, detectStructuralReference(question)), {});
  assert.deepEqual(detectStructuralReference('Is there an appendix a reviewer can sign?'), {});
  assert.deepEqual(detectStructuralReference('Which chapter I should read first?'), {});
  assert.deepEqual(detectStructuralReference('Does the title I found apply here?'), {});
});

test('a lone letter counts when upper-case or closing the clause', () => {
  assert.deepEqual(detectStructuralReference('What does annex B require?'), { annex: 'B' });
  assert.deepEqual(detectStructuralReference('the obligations of chapter i.'), { chapter: '1' });
  assert.deepEqual(detectStructuralReference('Is chapter I, or annex a, binding?'), { chapter: '1', annex: 'A' });
  assert.deepEqual(detectStructuralReference('an annex a reviewer signs and annex D'), { annex: 'D' });
});
