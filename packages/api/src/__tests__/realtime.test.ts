import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { WebSocket } from 'ws';
import { buildTestServer } from './setup.js';

interface Frame {
  event: string;
  data: Record<string, unknown>;
}

function nextFrame(ws: WebSocket): Promise<Frame> {
  return new Promise((resolve) => {
    ws.once('message', (raw) => {
      const frame: Frame = JSON.parse(raw.toString());
      resolve(frame);
    });
  });
}

describe('WebSocket /ws', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    ({ app } = await buildTestServer());
  });

  afterEach(async () => {
    await app.close();
  });

  it('subscribes and receives incident events for its tenant', async () => {
    const ws = await app.injectWS('/ws');

    const subscribed = nextFrame(ws);
    ws.send(JSON.stringify({ type: 'subscribe', tenantId: 'T1' }));
    const ack = await subscribed;
    expect(ack.event).toBe('subscribed');
    expect(ack.data.tenantId).toBe('T1');
    expect(app.pipeline.hub.getStats().connections).toBe(1);

    const triggered = nextFrame(ws);
    await app.inject({ method: 'POST', url: '/api/v1/test/fire-alarm', payload: { sensorId: 'S1' } });
    const frame = await triggered;

    expect(frame.event).toBe('incident:triggered');
    expect(frame.data).toMatchObject({ sensorId: 'S1', houseId: 'H1', state: 'active' });
    ws.terminate();
  });

  it('answers anything but a subscribe message with an error', async () => {
    const ws = await app.injectWS('/ws');

    const reply = nextFrame(ws);
    ws.send(JSON.stringify({ type: 'publish' }));

    expect((await reply).event).toBe('error');
    expect(app.pipeline.hub.getStats().connections).toBe(0);
    ws.terminate();
  });
});
