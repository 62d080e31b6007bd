import { describe, it, expect, vi } from 'vitest';
import { MissionContextCache } from '../mission-cache.js';
import type { ToolResult } from '../types.js';

function success(payload: string): ToolResult {
  return { invocationId: 'call-1', payload, status: 'success' };
}

function failure(payload: string): ToolResult {
  return { invocationId: 'call-1', payload, status: 'error' };
}

describe('MissionContextCache', () => {
  it('fetches once for many concurrent callers of the same key', async () => {
    const cache = new MissionContextCache();
    let release: (value: ToolResult) => void = () => {};
    const fetch = vi.fn(
      () =>
        new Promise<ToolResult>((resolve) => {
          release = resolve;
        }),
    );

    const calls = Array.from({ length: 10 }, () => cache.get('get_mission_context:{"mission_id":"paris"}', fetch));
    release(success('Recover the ledger.'));
    const results = await Promise.all(calls);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(results.every((r) => r.payload === 'Recover the ledger.')).toBe(true);
  });

  it('serves later calls from the cache', async () => {
    const cache = new MissionContextCache();
    const fetch = vi.fn(async () => success('dossier'));

    await cache.get('k', fetch);
    const second = await cache.get('k', fetch);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(second).toEqual(success('dossier'));
    expect(cache.has('k')).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('caches error results', async () => {
    const cache = new MissionContextCache();
    const fetch = vi.fn(async () => failure('No mission found with ID: berlin'));

    await cache.get('k', fetch);
    const again = await cache.get('k', fetch);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(again.status).toBe('error');
  });

  it('expires cached errors after errorTtlMs but keeps successes', async () => {
    let now = 1_000;
    const cache = new MissionContextCache({ errorTtlMs: 500, now: () => now });
    const fetchError = vi.fn(async () => failure('missing'));
    const fetchOk = vi.fn(async () => success('found'));

    await cache.get('bad', fetchError);
    await cache.get('good', fetchOk);
    now += 500;
    await cache.get('bad', fetchError);
    await cache.get('good', fetchOk);

    expect(fetchError).toHaveBeenCalledTimes(2);
    expect(fetchOk).toHaveBeenCalledTimes(1);
  });

  it('turns a thrown fetch into an error result without caching it', async () => {
    const cache = new MissionContextCache();
    const fetch = vi
      .fn<(key: string) => Promise<ToolResult>>()
      .mockRejectedValueOnce(new Error('disk unavailable'))
      .mockResolvedValueOnce(success('recovered'));

    const first = await cache.get('k', fetch);
    expect(first).toEqual({ invocationId: '', payload: 'lookup failed: disk unavailable', status: 'error' });
    expect(cache.has('k')).toBe(false);

    const second = await cache.get('k', fetch);
    expect(second).toEqual(success('recovered'));
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('refetches after invalidate and clear', async () => {
    const cache = new MissionContextCache();
    const fetch = vi.fn(async () => success('x'));

    await cache.get('a', fetch);
    expect(cache.invalidate('a')).toBe(true);
    await cache.get('a', fetch);
    cache.clear();
    await cache.get('a', fetch);

    expect(fetch).toHaveBeenCalledTimes(3);
  });
});
