import { emit, TelemetryEvents } from "./telemetry.js";
import { ServiceUnavailableError } from "../adapters/llm/errors.js";

/**
 * Retry configuration options
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

/**
 * Default retry configuration
 * - 1 attempt (no retries): a failed call surfaces to the caller
 * - Exponential backoff when retries are enabled: 250ms, 500ms, 1000ms (with jitter)
 * - ±20% jitter to prevent thundering herd
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 1,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

/**
 * Build a retry configuration from a retry count (attempts = 1 + retries).
 */
export function retryConfigFor(maxRetries: number): RetryConfig {
  return { ...DEFAULT_RETRY_CONFIG, maxAttempts: 1 + Math.max(0, Math.floor(maxRetries)) };
}

/**
 * Only transient service failures are retried. Policy refusals and schema
 * violations are terminal.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ServiceUnavailableError && error.retryable;
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  // Exponential backoff: baseDelay * (backoffFactor ^ (attempt - 1))
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);

  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Add jitter: ±jitterPercent
  const jitterRange = (cappedDelay * config.jitterPercent) / 100;
  const jitter = Math.random() * jitterRange * 2 - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with automatic retries
 *
 * @param fn Function to execute (should throw on error)
 * @param context Context for telemetry (adapter name, model, etc.)
 * @returns Result of successful execution
 * @throws Last error if all attempts fail
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  context: { adapter: string; model: string; operation: string },
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn();

      if (attempt > 1) {
        emit(TelemetryEvents.LlmRetrySuccess, {
          adapter: context.adapter,
          model: context.model,
          operation: context.operation,
          attempt,
          total_attempts: attempt,
        });
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt >= config.maxAttempts) {
        if (config.maxAttempts > 1) {
          emit(TelemetryEvents.LlmRetryExhausted, {
            adapter: context.adapter,
            model: context.model,
            operation: context.operation,
            total_attempts: attempt,
            error_message: error instanceof Error ? error.message : String(error),
          });
        }
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, config);
      const errorMessage = error instanceof Error ? error.message : String(error);

      emit(TelemetryEvents.LlmRetry, {
        adapter: context.adapter,
        model: context.model,
        operation: context.operation,
        attempt,
        max_attempts: config.maxAttempts,
        delay_ms: delay,
        reason: errorMessage.substring(0, 100), // Truncate for safety
      });

      await sleep(delay);
    }
  }

  // Unreachable with maxAttempts >= 1
  throw lastError;
}
