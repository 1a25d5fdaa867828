import { createHash } from 'crypto';
import type { EmbeddingService } from './retrieval/types';

export interface EmbeddingOptions {
  dim: number;
}

function tokenise(text: string): string[] {
  return (text || '')
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/gu)
    .filter(Boolean);
}

function hashToUint32(token: string): number {
  return parseInt(createHash('sha256').update(token).digest('hex').slice(0, 8), 16) >>> 0;
}

/** Signed feature hashing of word tokens, L2-normalised. Deterministic and offline. */
export function hashEmbedding(text: string, options: EmbeddingOptions): number[] {
  const dim = options.dim;
  const vec = new Array<number>(dim).fill(0);
  const tokens = tokenise(text);
  if (tokens.length === 0) return vec;

  for (const t of tokens) {
    const u = hashToUint32(t);
    const idx = u % dim;
    const sign = (u & 1) === 0 ? 1 : -1;
    vec[idx] = (vec[idx] ?? 0) + sign;
  }

  const norm = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
  return norm > 0 ? vec.map((v) => v / norm) : vec;
}

export class HashEmbeddingService implements EmbeddingService {
  constructor(private readonly options: EmbeddingOptions) {}

  async embed(text: string): Promise<number[]> {
    return hashEmbedding(text, this.options);
  }
}
