import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryResponseCache, cacheKey, isSharedRequest, isStorable } from '../index.js';

const entry = { status: 200, headers: { 'content-type': 'text/plain' }, body: Buffer.from('cached') };

describe('MemoryResponseCache', () => {
  let cache: MemoryResponseCache;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new MemoryResponseCache({ checkPeriodSeconds: 0 });
  });

  afterEach(() => {
    cache.close();
    vi.useRealTimers();
  });

  it('returns stored entries until the ttl elapses', () => {
    cache.set('k', entry, 5000);

    vi.advanceTimersByTime(4000);
    expect(cache.get('k')).toBe(entry);

    vi.advanceTimersByTime(2000);
    expect(cache.get('k')).toBeUndefined();
  });

  it('tracks hits, misses and keys', () => {
    cache.set('a', entry, 1000);
    cache.get('a');
    cache.get('b');

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, keys: 1 });
  });

  it('deletes and clears entries', () => {
    cache.set('a', entry, 1000);
    cache.set('b', entry, 1000);

    cache.delete('a');
    expect(cache.get('a')).toBeUndefined();

    cache.clear();
    expect(cache.stats().keys).toBe(0);
  });

  it('builds keys from route and upstream URL', () => {
    expect(cacheKey('/catalog', 'http://catalog.test/items?page=1')).toBe('/catalog http://catalog.test/items?page=1');
  });
});

describe('isSharedRequest', () => {
  it('rejects requests that carry credentials', () => {
    expect(isSharedRequest(new Headers({ accept: 'text/plain' }))).toBe(true);
    expect(isSharedRequest(new Headers({ Authorization: 'Bearer test-token' }))).toBe(false);
    expect(isSharedRequest(new Headers({ cookie: 'session=test' }))).toBe(false);
  });
});

describe('isStorable', () => {
  it('accepts public responses', () => {
    expect(isStorable(entry)).toBe(true);
    expect(isStorable({ ...entry, headers: { 'cache-control': 'public, max-age=60' } })).toBe(true);
  });

  it('rejects private, no-store and cookie-setting responses', () => {
    expect(isStorable({ ...entry, headers: { 'cache-control': 'max-age=60, Private' } })).toBe(false);
    expect(isStorable({ ...entry, headers: { 'cache-control': 'no-store' } })).toBe(false);
    expect(isStorable({ ...entry, headers: { 'cache-control': 'private="set-cookie"' } })).toBe(false);
    expect(isStorable({ ...entry, headers: { 'set-cookie': ['id=1'] } })).toBe(false);
  });
});
