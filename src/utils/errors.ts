import { ZodError } from 'zod';
import {
  ContentPolicyViolationError,
  SchemaViolationError,
  ServiceUnavailableError,
} from '../adapters/llm/errors.js';
import { ParallelCheckError } from '../orchestrator/parallel-validator.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'CONTENT_POLICY'
  | 'UPSTREAM_SCHEMA'
  | 'UPSTREAM_UNAVAILABLE'
  | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Remove paths, secrets and email addresses from a message before it leaves the service.
 */
export function sanitizeMessage(raw: string): string {
  return raw
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    .replace(/\bsk-[\w-]{8,}/g, '[KEY_REDACTED]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

function numericProp(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'number' ? prop : undefined;
}

function stringProp(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 *
 * Validator failures are reported through the branch error that caused them.
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  if (error instanceof ParallelCheckError) {
    const inner = toErrorV1(error.cause, requestId);
    return buildErrorV1(
      inner.code,
      inner.message,
      { ...inner.details, failed_check: error.failedCheck, failed_checks: error.failures.map((f) => f.check) },
      requestId
    );
  }

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof ContentPolicyViolationError) {
    return buildErrorV1(
      'CONTENT_POLICY',
      'The generation service refused the request on content policy grounds',
      { provider: error.provider, flagged_categories: [...error.flaggedCategories] },
      requestId
    );
  }

  if (error instanceof SchemaViolationError) {
    return buildErrorV1(
      'UPSTREAM_SCHEMA',
      'The generation service returned output that does not match the expected contract',
      { contract: error.contract, issues: [...error.issues] },
      requestId
    );
  }

  if (error instanceof ServiceUnavailableError) {
    return buildErrorV1(
      'UPSTREAM_UNAVAILABLE',
      'The generation service is unavailable',
      {
        provider: error.provider,
        retryable: error.retryable,
        ...(error.status !== undefined ? { upstream_status: error.status } : {}),
      },
      requestId
    );
  }

  // Fastify and plugin errors carry a statusCode
  const statusCode = numericProp(error, 'statusCode');
  if (statusCode === 429) {
    return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
  }

  if (stringProp(error, 'code') === 'FST_ERR_CTP_BODY_TOO_LARGE') {
    return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
  }

  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    const message = stringProp(error, 'message') ?? 'Bad request';
    return buildErrorV1('BAD_INPUT', sanitizeMessage(message), undefined, requestId);
  }

  if (error instanceof Error) {
    return buildErrorV1('INTERNAL', sanitizeMessage(error.message || 'An unexpected error occurred'), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeMessage(error), undefined, requestId);
  }

  // Unknown error type - minimal info
  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'CONTENT_POLICY':
      return 422;
    case 'RATE_LIMITED':
      return 429;
    case 'UPSTREAM_SCHEMA':
      return 502;
    case 'UPSTREAM_UNAVAILABLE':
      return 503;
    case 'INTERNAL':
      return 500;
  }
}
