import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestServer } from './setup.js';
import type { FakeTransport } from './helpers.js';

describe('Incident routes', () => {
  let app: FastifyInstance;
  let transport: FakeTransport;

  beforeEach(async () => {
    ({ app, transport } = await buildTestServer());
  });

  afterEach(async () => {
    await app.close();
  });

  async function triggerAlarm(sensorId = 'S1', severity = 'high'): Promise<string> {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/test/fire-alarm',
      payload: { sensorId, severity, gatewayId: 'GW1' },
    });
    expect(res.statusCode).toBe(201);
    const body: { id: string } = JSON.parse(res.body);
    return body.id;
  }

  it('GET /health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).status).toBe('ok');
  });

  it('POST /api/v1/test/fire-alarm - opens an incident', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/test/fire-alarm',
      payload: { sensorId: 'S1' },
    });

    expect(res.statusCode).toBe(201);
    const body = JSON.parse(res.body);
    expect(body.state).toBe('active');
    expect(body.severity).toBe('high');
    expect(body.houseId).toBe('H1');
    expect(body.tenantId).toBe('T1');
    expect(body.triggerCount).toBe(1);
  });

  it('GET /api/v1/incidents - lists and filters by state', async () => {
    const id = await triggerAlarm();
    await triggerAlarm('S3', 'low');
    await app.inject({ method: 'POST', url: `/api/v1/incidents/${id}/resolve` });

    const all = await app.inject({ method: 'GET', url: '/api/v1/incidents' });
    expect(JSON.parse(all.body)).toHaveLength(2);

    const resolved = await app.inject({ method: 'GET', url: '/api/v1/incidents?state=resolved' });
    expect(JSON.parse(resolved.body).map((i: { id: string }) => i.id)).toEqual([id]);
  });

  it('GET /api/v1/incidents - rejects an unknown state', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/incidents?state=burning' });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toBe('Validation failed');
  });

  it('GET /api/v1/incidents/:id - 404 for unknown incidents', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/incidents/missing' });
    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body)).toEqual({ error: 'Incident missing not found', statusCode: 404 });
  });

  it('POST /api/v1/incidents/:id/acknowledge - acknowledges once', async () => {
    const id = await triggerAlarm();

    const first = await app.inject({
      method: 'POST',
      url: `/api/v1/incidents/${id}/acknowledge`,
      payload: { userId: 'U1' },
    });
    expect(first.statusCode).toBe(200);
    expect(JSON.parse(first.body)).toMatchObject({ state: 'acknowledged', acknowledgedBy: 'U1' });

    const second = await app.inject({
      method: 'POST',
      url: `/api/v1/incidents/${id}/acknowledge`,
      payload: { userId: 'U2' },
    });
    expect(second.statusCode).toBe(409);
    expect(JSON.parse(second.body)).toEqual({
      error: `Cannot acknowledge incident ${id} in state acknowledged`,
      statusCode: 409,
    });
  });

  it('POST /api/v1/incidents/:id/acknowledge - requires a userId', async () => {
    const id = await triggerAlarm();
    const res = await app.inject({ method: 'POST', url: `/api/v1/incidents/${id}/acknowledge`, payload: {} });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({
      error: 'Validation failed',
      statusCode: 400,
      details: [{ path: 'userId', message: 'Required' }],
    });
  });

  it('POST /api/v1/incidents/:id/escalate - escalates and notifies the wider radius', async () => {
    const id = await triggerAlarm();
    await app.pipeline.idle();

    const res = await app.inject({ method: 'POST', url: `/api/v1/incidents/${id}/escalate` });
    await app.pipeline.idle();

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toMatchObject({ state: 'escalated', severity: 'critical' });
    expect(transport.sentTo('U4')).toHaveLength(1);
    expect(transport.sentTo('U1')).toHaveLength(1);
  });

  it('POST /api/v1/incidents/:id/resolve - is idempotent', async () => {
    const id = await triggerAlarm();

    const first = await app.inject({
      method: 'POST',
      url: `/api/v1/incidents/${id}/resolve`,
      payload: { resolvedBy: 'U2' },
    });
    const second = await app.inject({ method: 'POST', url: `/api/v1/incidents/${id}/resolve` });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(200);
    expect(JSON.parse(second.body)).toEqual(JSON.parse(first.body));
    expect(JSON.parse(second.body).resolvedBy).toBe('U2');
  });

  it('GET /api/v1/incidents/:id/tasks - lists notification tasks', async () => {
    const id = await triggerAlarm();
    await app.pipeline.idle();

    const res = await app.inject({ method: 'GET', url: `/api/v1/incidents/${id}/tasks` });
    const tasks: Array<{ recipientId: string; status: string; channel: string }> = JSON.parse(res.body);

    expect(tasks.map((t) => [t.recipientId, t.channel, t.status])).toEqual([
      ['E1', 'sms', 'sent'],
      ['U1', 'push', 'sent'],
      ['U2', 'sms', 'sent'],
      ['U3', 'email', 'sent'],
      ['U5', 'none', 'failed'],
    ]);
  });
});
