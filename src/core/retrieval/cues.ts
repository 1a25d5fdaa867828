import lexicon from './cues.json';

export const classificationCues = lexicon.classification;
export const activationCues = lexicon.activation;
export const shapeCues = lexicon.shape;

/** Lowercase, punctuation folded to single spaces, padded so phrases match on word boundaries. */
export function normalizeForCues(text: string): string {
  const folded = String(text ?? '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
  return ` ${folded} `;
}

export function matchCue(text: string, cues: readonly string[]): string | null {
  const haystack = normalizeForCues(text);
  for (const cue of cues) {
    if (haystack.includes(normalizeForCues(cue))) return cue;
  }
  return null;
}

export function hasCue(text: string, cues: readonly string[]): boolean {
  return matchCue(text, cues) !== null;
}
