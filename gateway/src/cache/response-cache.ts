import type { ResponseHeaderMap } from '@switchyard/http-client';
import NodeCache from 'node-cache';

export interface CachedResponse {
  readonly status: number;
  readonly headers: Readonly<ResponseHeaderMap>;
  readonly body: Buffer;
}

export interface CacheStats {
  hits: number;
  misses: number;
  keys: number;
}

/**
 * Store for upstream GET responses on cache-enabled routes
 */
export interface ResponseCache {
  get(key: string): CachedResponse | undefined;
  set(key: string, value: CachedResponse, ttlMs: number): void;
  delete(key: string): void;
  clear(): void;
  stats(): CacheStats;
  close(): void;
}

/**
 * In-process cache backed by node-cache. Entries are stored by reference.
 */
export class MemoryResponseCache implements ResponseCache {
  private readonly cache: NodeCache;

  constructor(options: { checkPeriodSeconds?: number; maxKeys?: number } = {}) {
    this.cache = new NodeCache({
      stdTTL: 0,
      checkperiod: options.checkPeriodSeconds ?? 60,
      useClones: false,
      maxKeys: options.maxKeys ?? -1,
    });
  }

  get(key: string): CachedResponse | undefined {
    return this.cache.get<CachedResponse>(key);
  }

  set(key: string, value: CachedResponse, ttlMs: number): void {
    this.cache.set(key, value, ttlMs / 1000);
  }

  delete(key: string): void {
    this.cache.del(key);
  }

  clear(): void {
    this.cache.flushAll();
  }

  stats(): CacheStats {
    const { hits, misses, keys } = this.cache.getStats();
    return { hits, misses, keys };
  }

  close(): void {
    this.cache.close();
  }
}

export function cacheKey(routePath: string, upstream: string): string {
  return `${routePath} ${upstream}`;
}

/**
 * A request that carries credentials gets an answer for that caller only,
 * so it neither reads from nor writes to the shared cache.
 */
export function isSharedRequest(headers: Headers): boolean {
  return !headers.has('authorization') && !headers.has('cookie');
}

/**
 * Responses that set cookies or are marked `private` / `no-store` stay out
 * of the cache.
 */
export function isStorable(response: CachedResponse): boolean {
  if (response.headers['set-cookie'] !== undefined) {
    return false;
  }
  const cacheControl = response.headers['cache-control'];
  const values: readonly string[] = typeof cacheControl === 'string' ? [cacheControl] : (cacheControl ?? []);
  const directives = values
    .flatMap(value => value.split(','))
    .map(directive => directive.trim().toLowerCase().split('=')[0]);
  return !directives.includes('private') && !directives.includes('no-store');
}
