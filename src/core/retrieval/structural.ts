import type { StructuralFilters } from './types';

const ROMAN_PATTERN = /^M{0,3}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/;
const ROMAN_VALUES: Record<string, number> = { I: 1, V: 5, X: 10, L: 50, C: 100, D: 500, M: 1000 };

const PATTERNS: Record<keyof StructuralFilters, RegExp> = {
  chapter: /\bchapter\s+(\d+|[ivxlcdm]+)\b|\bch\.\s*(\d+)/gi,
  title: /\btitle\s+(\d+|[ivxlcdm]+)\b/gi,
  article: /\barticle\s+(\d+(?:\.\d+)*)|\bart\.\s*(\d+(?:\.\d+)*)/gi,
  section: /\bsection\s+(\d+(?:\.\d+)*)|\bsec\.\s*(\d+(?:\.\d+)*)|§\s*(\d+(?:\.\d+)*)/gi,
  annex: /\b(?:annex|appendix)\s+(\d+|[ivxlcdm]+|[a-z])\b/gi,
};

const LEVELS: Array<keyof StructuralFilters> = ['chapter', 'title', 'article', 'section', 'annex'];

export function romanToInt(value: string): number | null {
  const upper = value.toUpperCase();
  if (!upper || !ROMAN_PATTERN.test(upper)) return null;
  let total = 0;
  for (let i = 0; i < upper.length; i++) {
    const current = ROMAN_VALUES[upper[i] ?? ''] ?? 0;
    const next = ROMAN_VALUES[upper[i + 1] ?? ''] ?? 0;
    total += current < next ? -current : current;
  }
  return total;
}

/** Digits pass through, Roman numerals become digits, other single letters are upper-cased. */
export function normalizeReference(raw: string): string | null {
  const value = raw.trim();
  if (/^\d+(?:\.\d+)*$/.test(value)) return value;
  // "annex C" is a letter; I, V and X alone read as numerals
  if (/^[a-z]$/i.test(value) && !/^[ivx]$/i.test(value)) return value.toUpperCase();
  const roman = romanToInt(value);
  if (roman !== null) return String(roman);
  return null;
}

/**
 * A lone letter after a keyword is a reference only when written upper-case
 * or when it closes the clause: "annex a mandatory part" is an article and
 * "chapter I should read" a pronoun, "annex b." and "annex B requires" are not.
 */
function isLetterReference(raw: string, rest: string): boolean {
  if (/^\s*(?:$|[,.;:?!)])/.test(rest)) return true;
  return raw !== 'I' && raw === raw.toUpperCase();
}

export function detectStructuralReference(query: string): StructuralFilters {
  const filters: StructuralFilters = {};
  const text = String(query ?? '');
  for (const key of LEVELS) {
    for (const m of text.matchAll(PATTERNS[key])) {
      const raw = m.slice(1).find((g) => g !== undefined);
      if (!raw) continue;
      if (raw.length === 1 && /[a-z]/i.test(raw)) {
        const rest = text.slice((m.index ?? 0) + m[0].length);
        if (!isLetterReference(raw, rest)) continue;
      }
      const normalized = normalizeReference(raw);
      if (!normalized) continue;
      filters[key] = normalized;
      break;
    }
  }
  return filters;
}

export function hasStructuralFilters(filters: StructuralFilters | undefined): boolean {
  if (!filters) return false;
  return Object.values(filters).some((v) => typeof v === 'string' && v.length > 0);
}
