/**
 * Typed failures of the structured call gateway.
 *
 * Every generation service reports infrastructure failures and policy refusals
 * with these classes, and the gateway adds schema violations. Orchestrators
 * propagate them unchanged.
 */

export type GatewayErrorKind =
  | "service_unavailable"
  | "content_policy_violation"
  | "schema_violation";

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Network or provider-side failure. Potentially transient.
 *
 * `retryable` is false for failures a retry cannot fix (bad credentials, a
 * rejected request), true for timeouts, rate limits and 5xx responses.
 */
export class ServiceUnavailableError extends GatewayError {
  readonly name = "ServiceUnavailableError";
  readonly kind = "service_unavailable";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly retryable: boolean,
    public readonly status: number | undefined,
    public readonly elapsedMs: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * The provider refused to produce output on policy grounds. Terminal.
 */
export class ContentPolicyViolationError extends GatewayError {
  readonly name = "ContentPolicyViolationError";
  readonly kind = "content_policy_violation";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly flaggedCategories: readonly string[],
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Provider output could not be parsed into the requested contract. Terminal.
 */
export class SchemaViolationError extends GatewayError {
  readonly name = "SchemaViolationError";
  readonly kind = "schema_violation";

  constructor(
    message: string,
    public readonly contract: string,
    public readonly rawOutput: string,
    public readonly issues: readonly string[],
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
  529, // Overloaded (Anthropic)
]);

const POLICY_ERROR_CODES = new Set(["content_policy_violation", "content_filter"]);

/**
 * Map an SDK or transport failure onto the gateway taxonomy.
 *
 * Both provider SDKs throw errors carrying an optional numeric `status` and
 * an optional `code`; connection failures and aborts carry neither.
 * `aborted` means the deadline fired, `cancelled` that the caller's signal did.
 */
export function toUpstreamError(
  provider: string,
  operation: string,
  error: unknown,
  elapsedMs: number,
  aborted: boolean,
  cancelled = false,
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  // The caller's own signal fired: retrying would redo a cancelled request
  if (cancelled && !aborted) {
    return new ServiceUnavailableError(
      `${provider} ${operation} cancelled by caller`,
      provider,
      false,
      undefined,
      elapsedMs,
      error,
    );
  }

  if (aborted || (error instanceof Error && error.name === "AbortError")) {
    return new ServiceUnavailableError(
      `${provider} ${operation} timed out`,
      provider,
      true,
      undefined,
      elapsedMs,
      error,
    );
  }

  if (error instanceof Error) {
    const status = "status" in error && typeof error.status === "number" ? error.status : undefined;
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;

    if (code !== undefined && POLICY_ERROR_CODES.has(code)) {
      return new ContentPolicyViolationError(
        `${provider} ${operation} refused by content policy`,
        provider,
        [code],
        error,
      );
    }

    if (status !== undefined) {
      return new ServiceUnavailableError(
        `${provider} ${operation} failed: HTTP ${status} ${error.message}`,
        provider,
        RETRYABLE_STATUS_CODES.has(status),
        status,
        elapsedMs,
        error,
      );
    }

    // Connection resets, DNS failures and the like
    return new ServiceUnavailableError(
      `${provider} ${operation} failed: ${error.message}`,
      provider,
      true,
      undefined,
      elapsedMs,
      error,
    );
  }

  return new ServiceUnavailableError(
    `${provider} ${operation} failed: ${String(error)}`,
    provider,
    false,
    undefined,
    elapsedMs,
    error,
  );
}
