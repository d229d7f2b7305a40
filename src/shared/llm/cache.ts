/**
 * LLM Cache
 *
 * Response cache for LLM calls, keyed on everything that shapes the output.
 */

import type { LLMResponse } from './types';

interface CacheEntry {
  response: LLMResponse;
  timestamp: number;
}

export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlSeconds: 3600,
  maxEntries: 500
};

export interface CacheKeyParts {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  model: string;
}

/**
 * LLM response cache with TTL expiry and FIFO eviction
 */
export class LLMCache {
  private entries: Map<string, CacheEntry> = new Map();
  private config: CacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<CacheConfig> = {}, private readonly now: () => number = Date.now) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  private keyFor(parts: CacheKeyParts): string {
    return [parts.model, parts.temperature, parts.maxTokens, parts.systemPrompt, parts.userPrompt].join('\u0000');
  }

  get(parts: CacheKeyParts): LLMResponse | null {
    if (!this.config.enabled) {
      return null;
    }

    const key = this.keyFor(parts);
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return null;
    }

    if ((this.now() - entry.timestamp) / 1000 > this.config.ttlSeconds) {
      this.entries.delete(key);
      this.misses++;
      return null;
    }

    this.hits++;
    return entry.response;
  }

  set(parts: CacheKeyParts, response: LLMResponse): void {
    if (!this.config.enabled) {
      return;
    }

    const key = this.keyFor(parts);
    if (!this.entries.has(key) && this.entries.size >= this.config.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, { response, timestamp: this.now() });
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): { size: number; maxEntries: number; enabled: boolean; hits: number; misses: number } {
    return {
      size: this.entries.size,
      maxEntries: this.config.maxEntries,
      enabled: this.config.enabled,
      hits: this.hits,
      misses: this.misses
    };
  }

  /**
   * Remove expired entries
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if ((now - entry.timestamp) / 1000 > this.config.ttlSeconds) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
