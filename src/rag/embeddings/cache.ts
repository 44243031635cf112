/**
 * LRU Embedding Cache
 * Keeps query embeddings so repeated searches skip the backend
 */
import crypto from "node:crypto";

interface CacheEntry {
  embedding: Float32Array;
  lastUsed: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
  memoryEstimate: number;
}

export class EmbeddingCache {
  private cache = new Map<string, CacheEntry>();
  private maxSize: number;
  private hits = 0;
  private misses = 0;
  private clock = 0;

  constructor(maxSize: number = 100) {
    this.maxSize = maxSize;
  }

  get(modelId: string, query: string): Float32Array | null {
    const entry = this.cache.get(this.hash(modelId, query));

    if (entry) {
      entry.lastUsed = ++this.clock;
      this.hits++;
      return entry.embedding;
    }

    this.misses++;
    return null;
  }

  set(modelId: string, query: string, embedding: Float32Array): void {
    const key = this.hash(modelId, query);
    if (!this.cache.has(key) && this.cache.size >= this.maxSize) {
      this.evictLRU();
    }

    this.cache.set(key, { embedding, lastUsed: ++this.clock });
  }

  has(modelId: string, query: string): boolean {
    return this.cache.has(this.hash(modelId, query));
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldest = Infinity;

    for (const [key, entry] of this.cache) {
      if (entry.lastUsed < oldest) {
        oldest = entry.lastUsed;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
    }
  }

  /**
   * SHA-256 of model and query (first 16 hex chars)
   */
  private hash(modelId: string, query: string): string {
    return crypto.createHash("sha256").update(`${modelId}\u0000${query}`).digest("hex").slice(0, 16);
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    let memoryEstimate = 0;

    for (const [key, entry] of this.cache) {
      // key string (UTF-16: 2 bytes per char) + vector (Float32: 4 bytes per number)
      memoryEstimate += key.length * 2 + entry.embedding.byteLength;
    }

    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      memoryEstimate,
    };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
