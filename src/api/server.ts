import Fastify, { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { logger } from '../lib/logger.js';
import { config } from '../config.js';
import { CORRELATION_HEADER, createRequestContext, RequestContext } from '../lib/correlation.js';
import { Errors, isAppError } from '../lib/errors.js';
import { RequestMetrics } from '../lib/metrics.js';
import type { ServiceInfo } from '../lib/health.js';
import { ItemStore } from '../items/store.js';
import { DEFAULT_SEED_ITEMS } from '../items/item.types.js';
import { registerItemRoutes } from './routes/items.js';
import { registerHealthRoute } from './routes/health.js';
import { METRICS_PATH, registerMetricsRoute } from './routes/metrics.js';

// Extend FastifyRequest to carry the per-request context
declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export interface ServerOptions {
  store?: ItemStore;
  metrics?: RequestMetrics;
  service?: ServiceInfo;
  /** Empty allows any origin. */
  corsAllowedOrigins?: string;
}

/** Route label for requests that matched no route. */
export const UNMATCHED_ROUTE = 'unmatched';

const EMPTY_JSON_BODY = 'FST_ERR_CTP_EMPTY_JSON_BODY';

/**
 * Create and configure the Fastify server instance.
 * Every collaborator can be injected; the defaults come from config.
 */
export async function createServer(options: ServerOptions = {}) {
  const store = options.store ?? new ItemStore({ seed: DEFAULT_SEED_ITEMS });
  const metrics = options.metrics ?? new RequestMetrics();
  const service = options.service ?? { name: config.SERVICE_NAME, version: config.SERVICE_VERSION };

  const app = Fastify({
    logger: false, // We use our own pino logger
  });

  const allowedOrigins = parseAllowedOrigins(options.corsAllowedOrigins ?? config.CORS_ALLOWED_ORIGINS);

  // Register CORS for cross-origin requests
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allowedOrigins.size === 0) {
        cb(null, true);
        return;
      }

      cb(null, allowedOrigins.has(origin));
    },
  });

  // Security headers; the API serves JSON only
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
  });

  // Bind a fresh correlation context to every request
  app.addHook('onRequest', (request: FastifyRequest, reply: FastifyReply, done) => {
    request.requestContext = createRequestContext(logger);
    reply.header(CORRELATION_HEADER, request.requestContext.correlationId);
    request.requestContext.log.info({
      method: request.method,
      path: pathOf(request),
    }, 'Incoming request');
    done();
  });

  // Log and measure every completed request
  app.addHook('onResponse', (request: FastifyRequest, reply: FastifyReply, done) => {
    const route = request.routeOptions.url ?? UNMATCHED_ROUTE;

    if (route !== METRICS_PATH) {
      metrics.record({
        method: request.method,
        path: route,
        statusCode: reply.statusCode,
        durationSeconds: reply.elapsedTime / 1000,
      });
    }

    logger.info({
      correlationId: correlationIdOf(request),
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
    }, 'Request completed');
    done();
  });

  registerHealthRoute(app, service);
  registerMetricsRoute(app, metrics);
  registerItemRoutes(app, store);

  // Unknown paths, wrong methods and malformed path ids
  app.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const error = Errors.ROUTE_NOT_FOUND();
    logger.warn({
      correlationId: correlationIdOf(request),
      method: request.method,
      path: pathOf(request),
    }, error.message);
    return reply.status(error.statusCode).send(error.toResponse());
  });

  // Standardized error handler with correlation ID
  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = correlationIdOf(request);

    if (isAppError(error)) {
      logger.error({
        err: error,
        correlationId,
        errorCode: error.errorCode,
      }, error.message);

      return reply.status(error.statusCode).send(error.toResponse());
    }

    // An empty JSON body carries no name
    if (error.code === EMPTY_JSON_BODY) {
      const missing = Errors.NAME_REQUIRED();
      logger.error({
        err: error,
        correlationId,
        errorCode: missing.errorCode,
      }, 'Invalid request data');

      return reply.status(missing.statusCode).send(missing.toResponse());
    }

    // Rejected by Fastify before any handler ran: malformed JSON,
    // unsupported media type, oversized payload
    if (isClientError(error.statusCode)) {
      const invalid = Errors.INVALID_BODY(error.statusCode);
      logger.error({
        err: error,
        correlationId,
        code: error.code,
      }, 'Invalid request body');

      return reply.status(invalid.statusCode).send(invalid.toResponse());
    }

    // Handle unexpected errors
    logger.error({
      err: error,
      correlationId,
      stack: error.stack,
    }, 'Internal server error');

    const internal = Errors.INTERNAL_ERROR();
    return reply.status(internal.statusCode).send(internal.toResponse());
  });

  return app;
}

export function parseAllowedOrigins(configured: string): Set<string> {
  return new Set(
    configured
      .split(',')
      .map((origin: string) => origin.trim())
      .filter(Boolean)
  );
}

function correlationIdOf(request: FastifyRequest): string {
  // Absent when the failure happened before onRequest ran
  return request.requestContext ? request.requestContext.correlationId : 'unknown';
}

function pathOf(request: FastifyRequest): string {
  const queryStart = request.url.indexOf('?');
  return queryStart === -1 ? request.url : request.url.slice(0, queryStart);
}

function isClientError(statusCode: number | undefined): statusCode is number {
  return statusCode !== undefined && statusCode >= 400 && statusCode < 500;
}
