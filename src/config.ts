import { env } from "process";

function intFromEnv(name: string, def: number): number {
  const v = env[name];
  if (!v) return def;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : def;
}

function listFromEnv(name: string, def: string[]): string[] {
  const v = env[name];
  if (!v) return def;
  const items = v.split(",").map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : def;
}

function flagFromEnv(name: string): boolean {
  const v = env[name];
  return v === "1" || v === "true";
}

export const OPENAI_API_KEY = env.OPENAI_API_KEY || "";
export const OPENAI_BASE_URL = env.OPENAI_BASE_URL || "https://api.openai.com/v1";
export const LLM_MODEL = env.LLM_MODEL || "gpt-4o-mini";
export const MOCK_LLM = flagFromEnv("MOCK_LLM");

// Either PG_URL or the discrete PG_* settings below
export const PG_URL = env.PG_URL || "";
export const PG_HOST = env.PG_HOST || "";
export const PG_PORT = intFromEnv("PG_PORT", 5432);
export const PG_USER = env.PG_USER || "";
export const PG_PASSWORD = env.PG_PASSWORD || "";
export const PG_DATABASE = env.PG_DATABASE || "";
export const PG_SCHEMA = env.PG_SCHEMA || "public";
export const POOL_MAX = intFromEnv("POOL_MAX", 4);
export const STATEMENT_TIMEOUT_MS = intFromEnv("STATEMENT_TIMEOUT_MS", 0); // 0 = no timeout

export const ALLOWED_TABLES = listFromEnv("ALLOWED_TABLES", ["global_student_migration"]);
export const SAMPLE_ROWS = intFromEnv("SAMPLE_ROWS", 2);
export const TOP_K = intFromEnv("TOP_K", 5);
export const MAX_RESULT_ROWS = intFromEnv("MAX_RESULT_ROWS", 50);
export const RETURN_DIRECT = flagFromEnv("RETURN_DIRECT");

export const PORT = intFromEnv("PORT", 8080);
export const LOG_LEVEL = (env.LOG_LEVEL || "info").toLowerCase();
