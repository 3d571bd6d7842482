/**
 * Server configuration, read from process.env.
 *
 * Variables (all optional):
 * - HOST / PORT: bind address, defaults 127.0.0.1:8000
 * - ENTITY_EXTRACTOR: "auto" (default), "hosted" or "lexicon"
 * - NER_API_URL: base URL of the token-classification inference endpoint
 * - NER_MODEL: model id appended to NER_API_URL
 * - NER_API_TOKEN: bearer token for the inference endpoint
 * - ALLOWED_ORIGINS: comma-separated CORS origins
 *
 * The loaders read process.env when they are called, so values dotenv loads
 * after this module is imported are still picked up.
 */

export const DEFAULT_NER_API_URL =
  "https://api-inference.huggingface.co/models";

export type ExtractorMode = "auto" | "hosted" | "lexicon";

function parseExtractorMode(value: string | undefined): ExtractorMode {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "hosted" || normalized === "lexicon") {
    return normalized;
  }
  return "auto";
}

function parsePort(value: string | undefined, fallback: number): number {
  if (!value?.trim()) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 && parsed < 65536
    ? parsed
    : fallback;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface NerConfig {
  mode: ExtractorMode;
  apiUrl: string;
  apiUrlConfigured: boolean;
  model: string;
  apiToken: string;
}

export interface CorsConfig {
  allowedOrigins: string[];
  isDevelopment: boolean;
}

export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  return {
    host: env.HOST?.trim() || "127.0.0.1",
    port: parsePort(env.PORT, 8000),
  };
}

export function loadNerConfig(
  env: NodeJS.ProcessEnv = process.env,
): NerConfig {
  const apiUrl = env.NER_API_URL?.trim() ?? "";
  return {
    mode: parseExtractorMode(env.ENTITY_EXTRACTOR),
    apiUrl: apiUrl || DEFAULT_NER_API_URL,
    apiUrlConfigured: Boolean(apiUrl),
    model: env.NER_MODEL?.trim() || "dslim/bert-base-NER",
    apiToken: env.NER_API_TOKEN?.trim() ?? "",
  };
}

export function loadCorsConfig(
  env: NodeJS.ProcessEnv = process.env,
): CorsConfig {
  return {
    allowedOrigins: (env.ALLOWED_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    isDevelopment: env.NODE_ENV !== "production",
  };
}

/** Hosted extraction in "auto" mode needs a token or an explicit endpoint. */
export function shouldUseHostedExtractor(config: NerConfig): boolean {
  if (config.mode === "auto") {
    return Boolean(config.apiToken) || config.apiUrlConfigured;
  }
  return config.mode === "hosted";
}
