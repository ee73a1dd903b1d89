import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

const auditQuerySchema = z.object({
  recipientId: z.string().min(1).optional(),
  incidentId: z.string().min(1).optional(),
});

const deliveryRoutes: FastifyPluginAsync = async (fastify) => {
  const dispatcher = fastify.pipeline.dispatcher;

  // GET /api/v1/deliveries/failed - Tasks that ended failed (NoChannel, Permanent, RetriesExhausted)
  fastify.get('/failed', async () => {
    return dispatcher.listFailed();
  });

  // GET /api/v1/deliveries/audit - Attempt log, filterable by recipient and incident
  fastify.get('/audit', async (request) => {
    const filter = auditQuerySchema.parse(request.query);
    return dispatcher.auditTrail(filter);
  });
};

export default deliveryRoutes;
