import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { Severity } from '@emberline/core';

/**
 * Test harness routes, registered only when TEST_HARNESS_ENABLED=true.
 *
 *   POST /test/mqtt        - Feed a message through the decoder as if it came from the broker
 *   POST /test/fire-alarm  - Trigger an alarm for a sensor directly
 */

const mockMqttSchema = z.object({
  topic: z.string().min(1),
  payload: z.union([z.string(), z.record(z.unknown())]).optional(),
});

const fireAlarmSchema = z.object({
  sensorId: z.string().trim().min(1),
  severity: z.nativeEnum(Severity).default(Severity.HIGH),
  gatewayId: z.string().trim().min(1).optional(),
});

const testHarnessRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.post('/mqtt', async (request, reply) => {
    const { topic, payload } = mockMqttSchema.parse(request.body);
    const raw = typeof payload === 'string' ? payload : JSON.stringify(payload ?? {});

    const result = await fastify.pipeline.ingest(topic, raw);
    if (result.status === 'dropped') {
      return reply.code(result.reason === 'ProcessingError' ? 500 : 400).send(result);
    }
    return reply.code(202).send(result);
  });

  fastify.post('/fire-alarm', async (request, reply) => {
    const { sensorId, severity, gatewayId } = fireAlarmSchema.parse(request.body);
    const incident = await fastify.pipeline.engine.trigger(sensorId, severity, { gatewayId });
    return reply.code(201).send(incident);
  });
};

export default testHarnessRoutes;
