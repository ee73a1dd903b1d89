import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { IncidentState } from '@emberline/core';

/**
 * Incident Routes
 *
 *   GET  /incidents                  - List incidents (?state=active|acknowledged|escalated|resolved)
 *   GET  /incidents/:id              - Single incident
 *   POST /incidents/:id/acknowledge  - active -> acknowledged
 *   POST /incidents/:id/escalate     - active -> escalated (manual)
 *   POST /incidents/:id/resolve      - any open state -> resolved (idempotent)
 *   GET  /incidents/:id/tasks        - Notification tasks and their delivery status
 */

const listQuerySchema = z.object({
  state: z.nativeEnum(IncidentState).optional(),
});

const acknowledgeSchema = z.object({
  userId: z.string().trim().min(1),
});

const resolveSchema = z
  .object({
    resolvedBy: z.string().trim().min(1).optional(),
  })
  .default({});

const incidentRoutes: FastifyPluginAsync = async (fastify) => {
  const engine = fastify.pipeline.engine;

  fastify.get('/', async (request) => {
    const { state } = listQuerySchema.parse(request.query);
    return engine.listIncidents(state);
  });

  fastify.get<{ Params: { id: string } }>('/:id', async (request) => {
    return engine.getIncident(request.params.id);
  });

  fastify.post<{ Params: { id: string } }>('/:id/acknowledge', async (request) => {
    const { userId } = acknowledgeSchema.parse(request.body);
    return engine.acknowledge(request.params.id, userId);
  });

  fastify.post<{ Params: { id: string } }>('/:id/escalate', async (request) => {
    return engine.escalate(request.params.id, 'manual');
  });

  fastify.post<{ Params: { id: string } }>('/:id/resolve', async (request) => {
    const { resolvedBy } = resolveSchema.parse(request.body ?? undefined);
    return engine.resolve(request.params.id, resolvedBy);
  });

  fastify.get<{ Params: { id: string } }>('/:id/tasks', async (request) => {
    const incident = await engine.getIncident(request.params.id);
    return fastify.store.listTasksForIncident(incident.id);
  });
};

export default incidentRoutes;
