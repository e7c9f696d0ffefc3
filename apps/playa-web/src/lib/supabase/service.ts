// Service-role Supabase client (bypasses RLS) for the landmark store and the shared cache table.
import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { LocationConfig } from '@/lib/config';

let cachedClient: SupabaseClient | null = null;
let cachedKey: string | null = null;
let warnedMissing = false;

export function createServiceClient(credentials: LocationConfig['supabase']): SupabaseClient {
  if (!credentials) {
    throw new Error('Missing SUPABASE service environment variables');
  }
  const key = `${credentials.url}|${credentials.serviceKey}`;
  if (cachedClient && cachedKey === key) return cachedClient;
  cachedClient = createClient(credentials.url, credentials.serviceKey, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
  cachedKey = key;
  return cachedClient;
}

export function getOptionalServiceClient(credentials: LocationConfig['supabase']): SupabaseClient | null {
  if (credentials) return createServiceClient(credentials);
  if (!warnedMissing && process.env.NODE_ENV !== 'production') {
    console.warn('[supabase] service credentials missing; using the in-memory landmark store');
    warnedMissing = true;
  }
  return null;
}
