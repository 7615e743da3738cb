/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type Env,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError, requireEnv, type Env } from "./env.js";

export const NODE_ENVS = ["development", "production", "test"] as const;
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export const CATEGORY_POLICIES = ["permissive", "restrict"] as const;

export type CategoryPolicy = (typeof CATEGORY_POLICIES)[number];

export interface LlmConfig {
  /** Model name passed to the chat completions endpoint */
  readonly model: string;
  /** OpenAI-compatible endpoint; undefined uses the SDK default */
  readonly baseUrl?: string;
  /** Per-attempt timeout for a generation call */
  readonly timeoutMs: number;
}

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  readonly logDir: string;
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  readonly llm: LlmConfig;
  readonly extraction: {
    /** Total number of generation attempts before degrading */
    readonly maxRetries: number;
    /** Whether categories outside the vocabulary are dropped */
    readonly categoryPolicy: string;
  };
  readonly recommendation: {
    /** References kept per topic */
    readonly topN: number;
  };
  readonly corpus: {
    readonly categoriesPath: string;
    readonly referencesPath: string;
  };
  readonly promptsDir: string;
  readonly feedbackLanguage: string;
}

/**
 * Load configuration from an environment map.
 * Values are not range-checked here; call validateConfig() for that.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const baseUrl = optionalEnv(env, "OPENAI_BASE_URL", "");

  return Object.freeze({
    env: optionalEnv(env, "NODE_ENV", "development"),
    logLevel: optionalEnv(env, "LOG_LEVEL", "info"),
    logDir: optionalEnv(env, "LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool(env, "LOG_TO_FILE", true),
    appName: optionalEnv(env, "APP_NAME", "term-paper-advisor"),
    llm: Object.freeze({
      model: optionalEnv(env, "LLM_MODEL", "gpt-4o"),
      baseUrl: baseUrl === "" ? undefined : baseUrl,
      timeoutMs: optionalEnvInt(env, "LLM_TIMEOUT_MS", 60_000),
    }),
    extraction: Object.freeze({
      maxRetries: optionalEnvInt(env, "EXTRACTION_MAX_RETRIES", 3),
      categoryPolicy: optionalEnv(env, "CATEGORY_POLICY", "permissive"),
    }),
    recommendation: Object.freeze({
      topN: optionalEnvInt(env, "RECOMMENDATION_TOP_N", 2),
    }),
    corpus: Object.freeze({
      categoriesPath: optionalEnv(env, "CATEGORY_CORPUS_PATH", "data/itemCorpus.json"),
      referencesPath: optionalEnv(env, "CONCEPT_REFERENCES_PATH", "data/conceptRefs.json"),
    }),
    promptsDir: optionalEnv(env, "PROMPTS_DIR", "prompts"),
    feedbackLanguage: optionalEnv(env, "FEEDBACK_LANGUAGE", "English"),
  });
}

function includes<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return includes(LOG_LEVELS, value);
}

export function isCategoryPolicy(value: string): value is CategoryPolicy {
  return includes(CATEGORY_POLICIES, value);
}

/** Largest delay setTimeout honours; longer ones fire at once. */
const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!includes(NODE_ENVS, config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (!isCategoryPolicy(config.extraction.categoryPolicy)) {
    throw new ConfigError(
      `Invalid CATEGORY_POLICY: ${config.extraction.categoryPolicy}. Must be permissive or restrict.`
    );
  }

  if (config.extraction.maxRetries < 1) {
    throw new ConfigError(
      `EXTRACTION_MAX_RETRIES must be at least 1, got: ${config.extraction.maxRetries}`
    );
  }

  if (config.recommendation.topN < 0) {
    throw new ConfigError(
      `RECOMMENDATION_TOP_N must not be negative, got: ${config.recommendation.topN}`
    );
  }

  if (config.llm.timeoutMs <= 0 || config.llm.timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigError(
      `LLM_TIMEOUT_MS must be between 1 and ${MAX_TIMEOUT_MS}, got: ${config.llm.timeoutMs}`
    );
  }
}

/**
 * Read the API key for the model provider.
 * Only needed once a generator is actually constructed.
 */
export function requireApiKey(env: Env = process.env): string {
  return requireEnv(env, "OPENAI_API_KEY");
}
