import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { withTimeout } from '@/lib/utils/withTimeout';

/** Key-value storage with optional per-entry expiry, shared with the movement simulator. */
export interface EphemeralStore {
  readonly kind: string;
  get(key: string): Promise<unknown>;
  /** `ttlMs` omitted keeps the entry until overwritten. */
  set(key: string, value: unknown, ttlMs?: number): Promise<void>;
}

type MemoryEntry = { payload: string; expiresAt: number | null };

export class MemoryEphemeralStore implements EphemeralStore {
  readonly kind = 'memory';

  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return JSON.parse(entry.payload);
  }

  async set(key: string, value: unknown, ttlMs?: number): Promise<void> {
    // Serialized so callers never share references with what is stored.
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: ttlMs && ttlMs > 0 ? this.now() + ttlMs : null,
    });
  }
}

const EPHEMERAL_TABLE = 'ephemeral_cache';

const ephemeralRowSchema = z.object({
  value: z.unknown(),
  expires_at: z.string().nullable(),
});

export class SupabaseEphemeralStore implements EphemeralStore {
  readonly kind = 'supabase';

  constructor(
    private readonly client: SupabaseClient,
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<unknown> {
    const { data, error } = await withTimeout(
      this.client.from(EPHEMERAL_TABLE).select('value, expires_at').eq('key', key).maybeSingle(),
      this.timeoutMs,
      `ephemeral get ${key}`,
    );
    if (error) throw error;
    if (!data) return null;

    const row = ephemeralRowSchema.safeParse(data);
    if (!row.success) return null;
    if (row.data.expires_at) {
      const expiresAt = new Date(row.data.expires_at).getTime();
      if (!Number.isFinite(expiresAt) || expiresAt <= this.now()) return null;
    }
    return row.data.value ?? null;
  }

  async set(key: string, value: unknown, ttlMs?: number): Promise<void> {
    const expiresAt = ttlMs && ttlMs > 0 ? new Date(this.now() + ttlMs).toISOString() : null;
    const { error } = await withTimeout(
      this.client
        .from(EPHEMERAL_TABLE)
        .upsert({ key, value, expires_at: expiresAt }, { onConflict: 'key' }),
      this.timeoutMs,
      `ephemeral set ${key}`,
    );
    if (error) throw error;
  }
}
