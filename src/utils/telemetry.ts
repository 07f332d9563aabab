import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * to ensure both Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryValue = TelemetryLeaf | TelemetryShape | TelemetryValue[];
export type TelemetryShape = { [key: string]: TelemetryValue };
export type Event = Record<string, unknown>;

export type TelemetrySinkFn = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: TelemetrySinkFn | null = null;

export function setTestSink(sink: TelemetrySinkFn | null): void {
  // Direct env check: config must not be a dependency of the logger
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  // Structured call gateway
  GatewayCallStarted: "gateway.call.started",
  GatewayCallSucceeded: "gateway.call.succeeded",
  GatewayCallFailed: "gateway.call.failed",

  // Retry policy
  LlmRetry: "llm.retry",
  LlmRetrySuccess: "llm.retry.success",
  LlmRetryExhausted: "llm.retry.exhausted",

  // JSON extraction from provider output
  JsonExtractionRequired: "llm.json_extraction.required",

  // Gate-checked chain
  ChainGateRejected: "chain.gate.rejected",
  ChainCompleted: "chain.completed",

  // Parallel validator
  ValidatorCompleted: "validator.completed",
  ValidatorBranchFailed: "validator.branch_failed",

  // Confidence router
  RouterClassified: "router.classified",
  RouterRejected: "router.rejected",
  RouterDispatched: "router.dispatched",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: TelemetryValue[] = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.entries(value));
  }

  // functions, symbols, bigints and undefined are dropped
  return undefined;
}

function sanitizeTelemetryData(entries: Array<[string, unknown]>): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of entries) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit a telemetry event.
 *
 * Every event is logged through pino; the test sink (when installed) receives
 * the sanitized payload.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(Object.entries(data));
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });
}
