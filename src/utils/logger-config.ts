/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: All sensitive fields must be listed here to prevent
 * accidental exposure in logs.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.credentials",

  // Provider credentials held in config snapshots
  "*.openaiApiKey",
  "*.anthropicApiKey",

  // Common header names - authentication
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",

  // PII fields
  "*.email",
  "*.phone",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
