import { ConfigurationError } from "@/lib/errors";

// ── Pipeline configuration ──────────────────────────────────────────────────
// Scripts import "dotenv/config" first, so .env values are already in
// process.env by the time loadConfig() runs.

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_MS = 60_000;

export interface PipelineConfig {
  apiKey: string | undefined;
  model: string;
  maxRetries: number;
  retryBaseMs: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const apiKey = env.ANTHROPIC_API_KEY?.trim();
  return {
    apiKey: apiKey ? apiKey : undefined,
    model: env.PIPELINE_MODEL?.trim() || DEFAULT_MODEL,
    maxRetries: readInt(env, "PIPELINE_MAX_RETRIES", DEFAULT_MAX_RETRIES),
    retryBaseMs: readInt(env, "PIPELINE_RETRY_BASE_MS", DEFAULT_RETRY_BASE_MS),
  };
}

export function requireApiKey(config: PipelineConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError(
      "ANTHROPIC_API_KEY environment variable not set. Set it in .env or export it in your shell.",
    );
  }
  return config.apiKey;
}
