import { z } from "zod";
import type { FetchFn, Logger } from "./adapters";

export const DEFAULT_BASE_URL = "http://localhost:5001";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_API_KEY_HEADER = "X-API-Key";

export const MODELS_API_ENV = {
  apiKey: "FX_MODELS_API_KEY",
  baseUrl: "FX_MODELS_BASE_URL",
  timeoutMs: "FX_MODELS_TIMEOUT_MS",
} as const;

export interface ModelsApiClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Per-request timeout. `0` leaves requests to the transport's own limits. */
  timeoutMs?: number;
  apiKeyHeader?: string;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export interface ModelsApiConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  apiKeyHeader: string;
}

export const modelsApiConfigSchema = z.object({
  apiKey: z.string().trim().min(1, "API key is required"),
  baseUrl: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((value) => value.replace(/\/+$/, "")),
  timeoutMs: z.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  apiKeyHeader: z.string().min(1).default(DEFAULT_API_KEY_HEADER),
});

export type ModelsApiEnv = Record<string, string | undefined>;

function readEnv(env: ModelsApiEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${MODELS_API_ENV.timeoutMs} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Reads the client settings the environment provides. Missing variables are
 * left out so explicit options and defaults can fill them.
 */
export function readModelsApiEnv(env: ModelsApiEnv = process.env): Partial<ModelsApiConfig> {
  const partial: Partial<ModelsApiConfig> = {};
  const apiKey = readEnv(env, MODELS_API_ENV.apiKey);
  const baseUrl = readEnv(env, MODELS_API_ENV.baseUrl);
  const timeoutMs = parseTimeout(readEnv(env, MODELS_API_ENV.timeoutMs));

  if (apiKey !== undefined) partial.apiKey = apiKey;
  if (baseUrl !== undefined) partial.baseUrl = baseUrl;
  if (timeoutMs !== undefined) partial.timeoutMs = timeoutMs;
  return partial;
}

/**
 * Validates explicit options and fills defaults.
 */
export function resolveModelsApiConfig(
  options: Partial<ModelsApiClientOptions>,
): ModelsApiConfig {
  const result = modelsApiConfigSchema.safeParse({
    apiKey: options.apiKey ?? "",
    baseUrl: options.baseUrl,
    timeoutMs: options.timeoutMs,
    apiKeyHeader: options.apiKeyHeader,
  });

  if (!result.success) {
    const reasons = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(
      `Invalid models API configuration (${reasons}). Pass apiKey or set ${MODELS_API_ENV.apiKey}.`,
    );
  }

  return result.data;
}

/**
 * Explicit options win over the environment, which wins over defaults.
 */
export function loadModelsApiConfig(
  options: Partial<ModelsApiClientOptions> = {},
  env: ModelsApiEnv = process.env,
): ModelsApiConfig {
  const fromEnv = readModelsApiEnv(env);
  return resolveModelsApiConfig({
    apiKey: options.apiKey ?? fromEnv.apiKey,
    baseUrl: options.baseUrl ?? fromEnv.baseUrl,
    timeoutMs: options.timeoutMs ?? fromEnv.timeoutMs,
    apiKeyHeader: options.apiKeyHeader,
  });
}
