import { describe, expect, test, vi } from 'vitest';

import { MemoryCache } from '../../../../../src/infrastructure/meme-renderer/cache/memory-cache.js';

describe('MemoryCache', () => {
  test('computes a value once per key', () => {
    const cache = new MemoryCache<number>({ maxEntries: 4 });
    const measure = vi.fn(() => 42);

    expect(cache.getOrCompute('48px "Impact"|hello', measure)).toBe(42);
    expect(cache.getOrCompute('48px "Impact"|hello', measure)).toBe(42);
    expect(measure).toHaveBeenCalledTimes(1);
  });

  test('evicts the least recently used entry', () => {
    const cache = new MemoryCache<string>({ maxEntries: 2 });
    cache.set('a', 'first');
    cache.set('b', 'second');
    cache.get('a');
    cache.set('c', 'third');

    expect(cache.size).toBe(2);
    expect(cache.get('a')?.value).toBe('first');
    expect(cache.get('b')).toBeUndefined();
  });
});
