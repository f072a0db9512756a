/**
 * Correlation ID Module
 *
 * Generates unique IDs for request tracing and binds them, together with a
 * request-scoped logger, into a context that is handed to every handler.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';

export const CORRELATION_HEADER = 'x-correlation-id';

/** Logging surface a handler is allowed to use. */
export type RequestLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/** Anything that can hand out a logger with extra bindings (pino's Logger does). */
export interface ChildLoggerFactory {
  child(bindings: { correlationId: string }): RequestLogger;
}

/**
 * Per-request context. Created once at request entry and never mutated.
 */
export interface RequestContext {
  readonly correlationId: string;
  readonly log: RequestLogger;
}

/**
 * Generate a correlation ID for request tracing.
 * Full v4 UUID: 122 random bits, so collisions are not checked for.
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

export function createRequestContext(
  parent: ChildLoggerFactory,
  correlationId: string = generateCorrelationId()
): RequestContext {
  return Object.freeze({
    correlationId,
    log: parent.child({ correlationId }),
  });
}
