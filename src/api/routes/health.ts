import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getHealthStatus, ServiceInfo } from '../../lib/health.js';

export function registerHealthRoute(app: FastifyInstance, service: ServiceInfo): void {
  /**
   * GET /health
   * Always 200 while the process can serve requests; never touches the store.
   */
  app.get('/health', async (request: FastifyRequest, reply: FastifyReply) => {
    const health = getHealthStatus(service);
    request.requestContext.log.info({ health }, 'Health check');
    return reply.status(200).send(health);
  });
}
