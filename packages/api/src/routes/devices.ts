import type { FastifyPluginAsync } from 'fastify';

const deviceRoutes: FastifyPluginAsync = async (fastify) => {
  const tracker = fastify.pipeline.tracker;

  // GET /api/v1/devices - Last-known state of every gateway and sensor
  fastify.get('/', async () => {
    return tracker.listStates();
  });

  // GET /api/v1/devices/:id
  fastify.get<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const state = tracker.getState(request.params.id);
    if (!state) {
      return reply.code(404).send({ error: 'Device not found' });
    }
    return state;
  });
};

export default deviceRoutes;
