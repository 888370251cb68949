import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { DashConfig } from "./config";
import { SupabaseReportStore } from "./supabaseReportStore";

export interface ClientOptions {
  fetch?: typeof fetch;
}

export function createSupabase(config: DashConfig, options: ClientOptions = {}): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseAnonKey, {
    // The dashboard reads public data only; no session to keep.
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

export function createReportStore(config: DashConfig, options: ClientOptions = {}): SupabaseReportStore {
  console.info("Report store:", config.supabaseUrl, `(table "${config.reportsTable}")`);
  return new SupabaseReportStore(createSupabase(config, options), config.reportsTable);
}
