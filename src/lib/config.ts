import { z } from "zod";

const envSchema = z.object({
  VITE_SUPABASE_URL: z.string({ required_error: "VITE_SUPABASE_URL is not set" }).url(),
  VITE_SUPABASE_ANON_KEY: z.string({ required_error: "VITE_SUPABASE_ANON_KEY is not set" }).min(1),
  VITE_REPORTS_TABLE: z.string().min(1).default("reports"),
});

export interface DashConfig {
  supabaseUrl: string;
  supabaseAnonKey: string;
  reportsTable: string;
}

export function loadConfig(env: Record<string, unknown> = import.meta.env): DashConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => i.message).join("; ");
    throw new Error(`Missing Supabase env variables – check .env.local (${details})`);
  }
  return {
    supabaseUrl: parsed.data.VITE_SUPABASE_URL,
    supabaseAnonKey: parsed.data.VITE_SUPABASE_ANON_KEY,
    reportsTable: parsed.data.VITE_REPORTS_TABLE,
  };
}
