import type { HydeMetadata } from './types';

export function emptyHydeMetadata(): HydeMetadata {
  return {
    activation: null,
    used: false,
    generationFailed: false,
    fallbackTriggered: false,
    fallbackAccepted: false,
    document: null,
    standardMeanScore: null,
    hydeMeanScore: null,
  };
}
