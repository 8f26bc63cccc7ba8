/**
 * Query Cache Tests
 */

import { createHash } from 'crypto';
import { QueryCache } from '../query-cache';
import type { QueryResponse } from '../types';

const response = (answer: string): QueryResponse => ({
  answer,
  confidence: 0.8,
  responseTimeSeconds: 0.4,
  chunksUsed: ['chunk_1'],
  chunksRetrieved: 1,
  tokensUsed: 120,
  sources: [],
  status: 'answered',
  stage: 'done',
  cached: false,
  timeout: false,
  retry: false,
  modelUsed: 'chat-test',
  contextType: null,
  sourceId: null,
});

describe('QueryCache', () => {
  let now: number;
  let cache: QueryCache;

  beforeEach(() => {
    now = 1_000_000;
    cache = new QueryCache(3_600_000, () => now);
  });

  // ============================================================================
  // Keys
  // ============================================================================

  it('should hash the normalized question with its filters', () => {
    const expected = createHash('sha256').update('["hi there","skills","p1"]', 'utf8').digest('hex');

    expect(QueryCache.keyFor('  Hi There ', 'skills', 'p1')).toBe(expected);
  });

  it('should treat null and missing filters alike', () => {
    expect(cache.keyFor('What skills?', null, null)).toBe(cache.keyFor('what skills?'));
    expect(cache.keyFor('What skills?', 'skills')).not.toBe(cache.keyFor('What skills?'));
  });

  it('should keep filter values that look like separators or wildcards apart', () => {
    expect(cache.keyFor('What skills?', null, 'all')).not.toBe(cache.keyFor('What skills?'));
    expect(cache.keyFor('a:skills', null, null)).not.toBe(cache.keyFor('a', 'skills', null));
  });

  // ============================================================================
  // Entries
  // ============================================================================

  it('should return a stored response until its TTL passes', () => {
    const key = cache.keyFor('What skills?');
    cache.put(key, response('TypeScript'));

    now += 3_599_999;
    expect(cache.get(key)?.answer).toBe('TypeScript');

    now += 1;
    expect(cache.get(key)).toBeNull();
  });

  it('should accept a per-entry TTL', () => {
    cache.put('k', response('short-lived'), 10);
    now += 10;

    expect(cache.get('k')).toBeNull();
  });

  it('should count hits and misses and clear live entries', () => {
    cache.put('a', response('A'));
    cache.put('b', response('B'));
    cache.get('a');
    cache.get('missing');

    expect(cache.getStats()).toEqual({ size: 2, hits: 1, misses: 1 });
    expect(cache.clear()).toBe(2);
    expect(cache.getStats().size).toBe(0);
  });

  it('should sweep expired entries', () => {
    cache.put('old', response('old'), 100);
    cache.put('new', response('new'));
    now += 100;

    expect(cache.sweepExpired()).toBe(1);
    expect(cache.getStats().size).toBe(1);
  });
});
