import { describe, it, expect } from 'vitest';
import { ModelCapabilityCache } from '../src/models/capabilityCache.js';
import { ReviewError } from '../src/errors.js';
import type { ModelInfo } from '../src/types.js';
import { FakeModelApi, modelInfo } from './fakes.js';

function clock(start = 0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe('ModelCapabilityCache', () => {
  it('serves a fresh entry without re-fetching', async () => {
    const api = new FakeModelApi([modelInfo('a'), modelInfo('b')]);
    const c = clock(1000);
    const cache = new ModelCapabilityCache(api, { ttlSeconds: 60, now: c.now });

    const first = await cache.resolve('a');
    c.advance(59_999);
    const second = await cache.resolve('b');

    expect(first).toEqual({ ...modelInfo('a'), fetchedAt: 1000 });
    expect(second.fetchedAt).toBe(1000);
    expect(api.listCalls).toBe(1);
  });

  it('re-fetches once the TTL has passed and supersedes the entry', async () => {
    const api = new FakeModelApi([modelInfo('a')]);
    const c = clock();
    const cache = new ModelCapabilityCache(api, { ttlSeconds: 60, now: c.now });

    const before = await cache.resolve('a');
    c.advance(60_000);
    api.models = [modelInfo('a', { contextWindowTokens: 64_000 })];
    const after = await cache.resolve('a');

    expect(api.listCalls).toBe(2);
    expect(after).toEqual({ ...modelInfo('a', { contextWindowTokens: 64_000 }), fetchedAt: 60_000 });
    expect(before.contextWindowTokens).toBe(128_000);
  });

  it('shares one fetch among concurrent callers', async () => {
    const api = new FakeModelApi([modelInfo('a'), modelInfo('b')]);
    const cache = new ModelCapabilityCache(api);

    const results = await Promise.all([cache.resolve('a'), cache.resolve('a'), cache.resolve('a')]);

    expect(api.listCalls).toBe(1);
    expect(results[0]).toBe(results[1]);
    expect(results[1]).toBe(results[2]);
  });

  it('shares one listing fetch among callers asking for different models', async () => {
    const api = new FakeModelApi([modelInfo('a'), modelInfo('b')]);
    const cache = new ModelCapabilityCache(api);

    const [a, b] = await Promise.all([cache.resolve('a'), cache.resolve('b')]);

    expect(api.listCalls).toBe(1);
    expect(a.id).toBe('a');
    expect(b.id).toBe('b');
  });

  it('re-fetches exactly once for many concurrent callers after the TTL', async () => {
    const api = new FakeModelApi([modelInfo('a'), modelInfo('b')]);
    const c = clock();
    const cache = new ModelCapabilityCache(api, { ttlSeconds: 60, now: c.now });
    await cache.resolve('a');
    expect(api.listCalls).toBe(1);

    c.advance(60_000);
    const results = await Promise.all([
      cache.resolve('a'),
      cache.resolve('b'),
      cache.resolve('a'),
      cache.resolve('b'),
      cache.resolve('a'),
    ]);

    expect(api.listCalls).toBe(2);
    expect(results.map((r) => `${r.id}@${r.fetchedAt}`)).toEqual([
      'a@60000',
      'b@60000',
      'a@60000',
      'b@60000',
      'a@60000',
    ]);
  });

  it('serves a stale entry within the grace window when the re-fetch fails', async () => {
    const api = new FakeModelApi([modelInfo('a')]);
    const c = clock();
    const cache = new ModelCapabilityCache(api, { ttlSeconds: 60, now: c.now });
    const original = await cache.resolve('a');

    api.listModels = async () => {
      throw new ReviewError('transport_error', 'HTTP 503');
    };
    c.advance(61_000);
    await expect(cache.resolve('a')).resolves.toBe(original);

    c.advance(60_000);
    await expect(cache.resolve('a')).rejects.toMatchObject({
      kind: 'metadata_unavailable',
      message: 'Model metadata unavailable for a: HTTP 503',
    });
  });

  it('fails with metadata_unavailable on a cold miss when the fetch fails', async () => {
    const api = new FakeModelApi([]);
    api.listModels = async () => {
      throw new Error('connect ECONNREFUSED');
    };
    const cache = new ModelCapabilityCache(api);

    await expect(cache.resolve('a')).rejects.toThrow('Model metadata unavailable for a: connect ECONNREFUSED');
  });

  it('rejects a model missing from a successful listing', async () => {
    const api = new FakeModelApi([modelInfo('a')]);
    const cache = new ModelCapabilityCache(api);

    await expect(cache.resolve('ghost')).rejects.toMatchObject({
      kind: 'metadata_unavailable',
      message: "Model 'ghost' not found in the models listing",
    });
  });

  it('does not serve a model that disappeared from a newer listing', async () => {
    const api = new FakeModelApi([modelInfo('a')]);
    const c = clock();
    const cache = new ModelCapabilityCache(api, { ttlSeconds: 60, now: c.now });
    await cache.resolve('a');

    c.advance(60_000);
    api.models = [modelInfo('b')];
    await expect(cache.resolve('a')).rejects.toThrow("Model 'a' not found in the models listing");
  });

  it('lets a caller stop waiting without cancelling the shared fetch', async () => {
    let release: (models: ModelInfo[]) => void = () => {};
    const api = new FakeModelApi([]);
    api.listModels = () =>
      new Promise((resolve) => {
        release = resolve;
      });
    const cache = new ModelCapabilityCache(api);
    const controller = new AbortController();

    const abandoned = cache.resolve('a', controller.signal);
    const patient = cache.resolve('a');
    controller.abort(new ReviewError('timed_out', 'primary reviewer (a) timed out after 1s'));

    await expect(abandoned).rejects.toThrow('primary reviewer (a) timed out after 1s');
    release([modelInfo('a')]);
    await expect(patient).resolves.toMatchObject({ id: 'a' });
    expect(cache.peek('a')?.id).toBe('a');
  });

  it('clears entries so the next resolve fetches again', async () => {
    const api = new FakeModelApi([modelInfo('a')]);
    const cache = new ModelCapabilityCache(api);
    await cache.resolve('a');

    cache.clear();
    expect(cache.peek('a')).toBeUndefined();
    await cache.resolve('a');
    expect(api.listCalls).toBe(2);
  });
});
