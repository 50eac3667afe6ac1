import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { AppConfig } from './app.config';
import logger from './logger';

type SupabaseSettings = NonNullable<AppConfig['supabase']>;

/** `fetchImpl` replaces the HTTP transport; tests pass an in-process stub. */
export function createSupabaseAdmin(settings: SupabaseSettings, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
    global: { fetch: fetchImpl },
  });
}

export async function checkSupabaseConnection(settings: SupabaseSettings): Promise<void> {
  // Lightweight check against the REST root; no table access required.
  const url = `${settings.url}/rest/v1/`;

  const res = await fetch(url, {
    headers: {
      apikey: settings.serviceRoleKey,
      Authorization: `Bearer ${settings.serviceRoleKey}`,
    },
  });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new Error(`Supabase connectivity check failed (${res.status}): ${text}`);
  }
  logger.info('Supabase connectivity check passed');
}
