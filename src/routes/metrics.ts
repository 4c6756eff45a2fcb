// GET /metrics -- Prometheus text exposition of the server's registry.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

const metricsRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/metrics',
    { schema: { description: 'Blockstore metrics in Prometheus format', tags: ['Metrics'] } },
    async (_request, reply) => {
      const registry = fastify.metricsRegistry;
      const body = await registry.metrics();
      return reply.status(200).header('Content-Type', registry.contentType).send(body);
    }
  );

  done();
};

export const metricsRoutesPlugin = fp(metricsRoutes, {
  name: 'metrics-routes',
  fastify: '5.x',
});
