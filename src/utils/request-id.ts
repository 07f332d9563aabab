import { randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Take the caller's X-Request-Id when it is a usable token, otherwise
 * generate one. Used as fastify's `genReqId`.
 */
export function requestIdFromHeaders(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string') {
    const trimmed = incomingId.trim();
    if (trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH && /^[\w.:-]+$/.test(trimmed)) {
      return trimmed;
    }
  }

  return generateRequestId();
}
