import { z } from 'zod';

import type { EphemeralStore } from '@/lib/cache/ephemeralStore';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

const envelopeSchema = z.object({
  cachedAt: z.number(),
  expiresAt: z.number(),
  value: z.unknown(),
});

export type CacheOutcome = 'hit' | 'miss' | 'bypass';

export interface CachedValue<T> {
  value: T;
  cache: CacheOutcome;
}

/**
 * Read-through TTL cache over an {@link EphemeralStore}. No locking: concurrent misses each
 * compute and the last write wins. Store failures fall back to computing without the cache.
 */
export class SnapshotCache {
  constructor(
    private readonly store: EphemeralStore,
    private readonly now: () => number = Date.now,
  ) {}

  async getOrCompute<T>(
    key: string,
    ttlMs: number,
    compute: () => Promise<T>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<CachedValue<T>> {
    let storeAvailable = true;
    try {
      const cached = await this.read(key, schema);
      if (cached !== null) return { value: cached, cache: 'hit' };
    } catch (error) {
      storeAvailable = false;
      console.warn(`[cache] read failed for ${key}: ${getErrorMessage(error)}`);
    }

    const value = await compute();
    if (!storeAvailable) return { value, cache: 'bypass' };

    const cachedAt = this.now();
    try {
      await this.store.set(key, { cachedAt, expiresAt: cachedAt + ttlMs, value }, ttlMs);
    } catch (error) {
      console.warn(`[cache] write failed for ${key}: ${getErrorMessage(error)}`);
    }
    return { value, cache: 'miss' };
  }

  private async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const raw = await this.store.get(key);
    if (raw === null || raw === undefined) return null;

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success || envelope.data.expiresAt <= this.now()) return null;

    const parsed = schema.safeParse(envelope.data.value);
    if (!parsed.success) {
      console.warn(`[cache] discarding malformed entry for ${key}`);
      return null;
    }
    return parsed.data;
  }
}
