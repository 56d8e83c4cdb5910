import { describe, expect, it, vi } from 'vitest';
import { DatasetCache } from './datasetCache';

describe('DatasetCache', () => {
  it('builds keys from name and subset', () => {
    expect(DatasetCache.key('openai/gsm8k', 'main')).toBe('openai/gsm8k::main');
    expect(DatasetCache.key('openai/gdpval')).toBe('openai/gdpval::');
    expect(DatasetCache.key('openai/gdpval', null)).toBe('openai/gdpval::');
  });

  it('is unbounded without a capacity', () => {
    const cache = new DatasetCache<number>();
    for (let i = 0; i < 100; i++) {
      cache.set(`k${i}`, i);
    }
    expect(cache.size).toBe(100);
  });

  it('evicts the least recently used entry when full', () => {
    const cache = new DatasetCache<number>({ capacity: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);

    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.has('b')).toBe(false);
  });

  it('runs the loader once for a key and serves later calls from memory', async () => {
    const cache = new DatasetCache<string>();
    const loader = vi.fn(async () => 'loaded');

    const first = await cache.getOrLoad('k', loader);
    const second = await cache.getOrLoad('k', loader);

    expect(first).toEqual({ value: 'loaded', cached: false });
    expect(second).toEqual({ value: 'loaded', cached: true });
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('shares one in-flight load between concurrent callers', async () => {
    const cache = new DatasetCache<string>();
    let release: (value: string) => void = () => undefined;
    const loader = vi.fn(() => new Promise<string>((resolve) => { release = resolve; }));

    const first = cache.getOrLoad('k', loader);
    const second = cache.getOrLoad('k', loader);
    release('done');

    await expect(first).resolves.toEqual({ value: 'done', cached: false });
    await expect(second).resolves.toEqual({ value: 'done', cached: false });
    expect(loader).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it('does not store failed loads', async () => {
    const cache = new DatasetCache<string>();
    const failing = vi.fn(async (): Promise<string> => { throw new Error('boom'); });

    await expect(cache.getOrLoad('k', failing)).rejects.toThrow('boom');
    expect(cache.has('k')).toBe(false);

    await expect(cache.getOrLoad('k', async () => 'ok')).resolves.toEqual({ value: 'ok', cached: false });
  });
});
