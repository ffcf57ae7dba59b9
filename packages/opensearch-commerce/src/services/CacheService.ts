import NodeCache from 'node-cache';

export interface CacheService {
  get<T>(key: string): T | undefined;
  set<T>(key: string, value: T, ttlSeconds?: number): boolean;
  del(key: string): number;
  clear(): void;
  getStats(): { keys: number; hits: number; misses: number };
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export class InMemoryCacheService implements CacheService {
  private cache: NodeCache;

  constructor(options: { defaultTtlSeconds?: number; checkPeriodSeconds?: number } = {}) {
    this.cache = new NodeCache({
      stdTTL: options.defaultTtlSeconds ?? 60,
      checkperiod: options.checkPeriodSeconds ?? 120,
      // cached search results are handed out as-is; callers must not mutate them
      useClones: false,
    });
  }

  get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): boolean {
    if (ttlSeconds !== undefined) {
      return this.cache.set(key, value, ttlSeconds);
    }
    return this.cache.set(key, value);
  }

  del(key: string): number {
    return this.cache.del(key);
  }

  clear(): void {
    this.cache.flushAll();
  }

  /** Stops the expiry timer so the process can exit. */
  close(): void {
    this.cache.close();
  }

  getStats(): { keys: number; hits: number; misses: number } {
    const stats = this.cache.getStats();
    return {
      keys: stats.keys,
      hits: stats.hits,
      misses: stats.misses,
    };
  }

  // Key for a search request; property order in the params does not matter
  static createSearchKey(namespace: string, index: string, params: unknown): string {
    return `${namespace}:${index}:${Buffer.from(stableStringify(params)).toString('base64')}`;
  }
}
