/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 */

import { z } from "zod";
import { DEFAULT_CONFIDENCE_THRESHOLD } from "../orchestrator/thresholds.js";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Confidence threshold in [0,1]. Thresholds are inclusive lower bounds.
 */
const threshold = z.coerce.number().min(0).max(1).default(DEFAULT_CONFIDENCE_THRESHOLD);

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["openai", "anthropic"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    host: z.string().default("0.0.0.0"),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    globalRateLimitRpm: z.coerce.number().int().positive().default(120),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: z.string().optional(),
    openaiApiKey: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
    // 0 keeps the zero-retry baseline; raise to retry transient upstream failures
    maxRetries: z.coerce.number().int().min(0).max(5).default(0),
    moderationEnabled: booleanString.default(false),
  }),

  orchestration: z.object({
    chainGateThreshold: threshold,
    routerConfidenceThreshold: threshold,
    validatorConfidenceThreshold: threshold,
  }),

  knowledgeBase: z.object({
    path: z.string().optional(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: emptyToUndefined(env.PORT),
      host: emptyToUndefined(env.HOST),
      nodeEnv: emptyToUndefined(env.NODE_ENV),
      logLevel: emptyToUndefined(env.LOG_LEVEL),
      bodyLimitBytes: emptyToUndefined(env.BODY_LIMIT_BYTES),
      globalRateLimitRpm: emptyToUndefined(env.GLOBAL_RATE_LIMIT_RPM),
    },
    llm: {
      provider: emptyToUndefined(env.LLM_PROVIDER),
      model: emptyToUndefined(env.LLM_MODEL),
      openaiApiKey: emptyToUndefined(env.OPENAI_API_KEY),
      anthropicApiKey: emptyToUndefined(env.ANTHROPIC_API_KEY),
      timeoutMs: emptyToUndefined(env.LLM_TIMEOUT_MS),
      maxRetries: emptyToUndefined(env.LLM_MAX_RETRIES),
      moderationEnabled: emptyToUndefined(env.LLM_MODERATION_ENABLED),
    },
    orchestration: {
      chainGateThreshold: emptyToUndefined(env.CHAIN_GATE_THRESHOLD),
      routerConfidenceThreshold: emptyToUndefined(env.ROUTER_CONFIDENCE_THRESHOLD),
      validatorConfidenceThreshold: emptyToUndefined(env.VALIDATOR_CONFIDENCE_THRESHOLD),
    },
    knowledgeBase: {
      path: emptyToUndefined(env.KNOWLEDGE_BASE_PATH),
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazily parsed configuration.
 *
 * Parsing is deferred until first access so tests can set environment
 * variables (vi.stubEnv) before the config is read. The parsed value is cached
 * until `_resetConfigCache()` is called.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

const CONFIG_DEFAULTS: Config = ConfigSchema.parse({
  server: {},
  llm: {},
  orchestration: {},
  knowledgeBase: {},
});

export const config: Config = new Proxy<Config>(CONFIG_DEFAULTS, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
