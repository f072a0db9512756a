/**
 * Application logger.
 *
 * One pino instance for the whole process. Request-scoped loggers are
 * children of this one (see correlation.ts) so every line for a request
 * carries its correlationId.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import { config } from '../config.js';

export const logger: Logger = pino({
  level: config.DEBUG ? 'debug' : config.LOG_LEVEL,
  base: { service: config.SERVICE_NAME },
  timestamp: pino.stdTimeFunctions.isoTime,
});
