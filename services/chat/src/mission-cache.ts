import { logger } from '@safehouse/shared';
import type { ToolResult } from './types.js';

const log = logger.child({ module: 'mission-cache' });

export interface CacheEntry {
  key: string;
  value: ToolResult;
  insertedAt: number;
}

export interface MissionContextCacheOptions {
  /** Expire cached error results after this long. Unset: keep them forever. */
  errorTtlMs?: number;
  now?: () => number;
}

/**
 * Memoizes tool lookups by key with at most one fetch in flight per key.
 *
 * Results with `status: 'error'` are cached like successes, so repeating an
 * unknown mission id does not hit the backend again. A fetch that throws is
 * turned into an error result for everyone waiting on it but is not kept.
 */
export class MissionContextCache {
  private entries = new Map<string, CacheEntry>();
  private inFlight = new Map<string, Promise<ToolResult>>();
  private readonly errorTtlMs?: number;
  private readonly now: () => number;

  constructor(opts: MissionContextCacheOptions = {}) {
    this.errorTtlMs = opts.errorTtlMs;
    this.now = opts.now ?? Date.now;
  }

  get(key: string, fetch: (key: string) => Promise<ToolResult>): Promise<ToolResult> {
    const cached = this.lookup(key);
    if (cached) {
      log.debug({ key }, 'cache hit');
      return Promise.resolve(cached.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      log.debug({ key }, 'joining in-flight fetch');
      return pending;
    }

    const promise = this.load(key, fetch).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (
      entry.value.status === 'error' &&
      this.errorTtlMs !== undefined &&
      this.now() - entry.insertedAt >= this.errorTtlMs
    ) {
      this.entries.delete(key);
      log.debug({ key }, 'cached error expired');
      return undefined;
    }
    return entry;
  }

  private async load(key: string, fetch: (key: string) => Promise<ToolResult>): Promise<ToolResult> {
    try {
      const value = await fetch(key);
      this.entries.set(key, { key, value, insertedAt: this.now() });
      return value;
    } catch (error) {
      log.warn({ err: error, key }, 'tool fetch failed');
      const reason = error instanceof Error ? error.message : String(error);
      return { invocationId: '', payload: `lookup failed: ${reason}`, status: 'error' };
    }
  }
}
