import type { FastifyPluginAsync } from 'fastify';
import type { RawData } from 'ws';
import { z } from 'zod';
import type { ConnectionScope } from '@emberline/core';
import { WebSocketChannel } from './channel.js';

// The only message a client may send
const subscribeSchema = z.object({
  type: z.literal('subscribe'),
  tenantId: z.string().min(1).optional(),
  houseId: z.string().min(1).optional(),
});

const wsHandler: FastifyPluginAsync = async (fastify) => {
  const hub = fastify.pipeline.hub;

  fastify.get('/ws', { websocket: true }, (socket, req) => {
    let connectionId: string | null = null;
    fastify.log.info(`WebSocket client connected from ${req.ip}`);

    socket.on('message', (raw: RawData) => {
      let data: unknown;
      try {
        data = JSON.parse(raw.toString());
      } catch {
        fastify.log.warn('Invalid WebSocket message');
        socket.send(JSON.stringify({ event: 'error', data: { message: 'Messages must be JSON' } }));
        return;
      }

      const parsed = subscribeSchema.safeParse(data);
      if (!parsed.success) {
        socket.send(JSON.stringify({
          event: 'error',
          data: { message: 'Expected {"type":"subscribe","tenantId"?,"houseId"?}' },
        }));
        return;
      }

      const scope: ConnectionScope = { tenantId: parsed.data.tenantId, houseId: parsed.data.houseId };
      if (connectionId) {
        hub.setScope(connectionId, scope);
      } else {
        connectionId = hub.connect(scope, new WebSocketChannel(socket));
      }

      socket.send(JSON.stringify({
        event: 'subscribed',
        data: { connectionId, ...scope },
        timestamp: new Date().toISOString(),
      }));
      fastify.log.info({ connectionId, scope }, 'WebSocket subscribed');
    });

    socket.on('close', () => {
      if (connectionId) {
        hub.disconnect(connectionId);
      }
      fastify.log.info(`WebSocket client disconnected: ${connectionId ?? 'unsubscribed'}`);
    });
  });
};

export default wsHandler;
