import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { RequestMetrics } from '../../lib/metrics.js';

export const METRICS_PATH = '/metrics';

export function registerMetricsRoute(app: FastifyInstance, metrics: RequestMetrics): void {
  app.get(METRICS_PATH, async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply
      .status(200)
      .header('content-type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(metrics.render());
  });
}
