import type { EmbeddingService } from './types';

export interface Cache {
  get(key: string): number[] | undefined;
  set(key: string, value: number[]): void;
  clear(): void;
}

export class LruCache implements Cache {
  private maxSize: number;
  private map: Map<string, number[]>;

  constructor(maxSize: number) {
    this.maxSize = Math.max(1, maxSize);
    this.map = new Map();
  }

  get(key: string): number[] | undefined {
    const value = this.map.get(key);
    if (!value) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  set(key: string, value: number[]): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);
    if (this.map.size > this.maxSize) {
      const first = this.map.keys().next();
      if (!first.done) this.map.delete(first.value);
    }
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}

/**
 * Wrap an embedding service so repeated texts within one query (the original
 * question is embedded for the standard round, the hybrid round and the
 * fallback) reach the backend once. Failures are not cached.
 */
export function memoizeEmbedding(service: EmbeddingService, cache: Cache): EmbeddingService {
  return {
    embed: async (text: string) => {
      const hit = cache.get(text);
      if (hit) return hit;
      const vec = await service.embed(text);
      cache.set(text, vec);
      return vec;
    },
  };
}
