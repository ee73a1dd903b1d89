import type { FastifyPluginAsync } from 'fastify';

const realtimeRoutes: FastifyPluginAsync = async (fastify) => {
  // GET /api/v1/realtime/stats - Hub counters and ingress counters
  fastify.get('/stats', async () => {
    return {
      hub: fastify.pipeline.hub.getStats(),
      ingress: fastify.pipeline.getIngressStats(),
    };
  });
};

export default realtimeRoutes;
