import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DeviceStatus,
  IncidentState,
  NotificationChannel,
  Severity,
  type AlarmIncident,
  type TaskRecord,
} from '@emberline/core';
import { SqliteStore } from '../sqlite-store.js';

const T0 = new Date('2026-03-01T12:00:00.000Z');

function incident(id: string, overrides: Partial<AlarmIncident> = {}): AlarmIncident {
  return {
    id,
    sensorId: 'S1',
    gatewayId: 'GW1',
    houseId: 'H1',
    tenantId: 'T1',
    severity: Severity.HIGH,
    state: IncidentState.ACTIVE,
    triggeredAt: T0,
    triggerCount: 1,
    acknowledgedBy: null,
    acknowledgedAt: null,
    escalatedAt: null,
    resolvedAt: null,
    resolvedBy: null,
    ...overrides,
  };
}

function task(id: string, overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id,
    recipientId: 'U1',
    incidentId: 'inc-1',
    channel: NotificationChannel.PUSH,
    address: 'push-token-u1',
    tier: 'base',
    title: 'FIRE ALARM (high)',
    body: 'body',
    status: 'pending',
    attempts: 0,
    lastError: null,
    failureReason: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

describe('SqliteStore', () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  it('round-trips device state', async () => {
    const state = {
      id: 'S1',
      kind: 'sensor' as const,
      gatewayId: 'GW1',
      status: DeviceStatus.ONLINE,
      batteryLevel: 2.95,
      signalStrength: -71,
      lastHeartbeatAt: T0,
      lastEventAt: T0,
      firmwareVersion: '1.4.2',
      hardwareVersion: null,
      sensorType: 'smoke' as const,
      registered: true,
      lastSelfTestAt: null,
      selfTestPassed: false,
      updatedAt: T0,
    };
    await store.saveDeviceState(state);

    expect(await store.getDeviceState('S1')).toEqual(state);
    expect(await store.getDeviceState('S2')).toBeNull();
  });

  it('finds the open incident for a sensor', async () => {
    await store.saveIncident(incident('old', { state: IncidentState.RESOLVED, resolvedAt: T0 }));
    await store.saveIncident(incident('open', { state: IncidentState.ACKNOWLEDGED, acknowledgedBy: 'U1', acknowledgedAt: T0 }));

    expect((await store.findOpenIncidentForSensor('S1'))?.id).toBe('open');
    expect(await store.findOpenIncidentForSensor('S2')).toBeNull();
  });

  it('lists incidents newest first', async () => {
    await store.saveIncident(incident('a', { triggeredAt: T0 }));
    await store.saveIncident(incident('b', { triggeredAt: new Date(T0.getTime() + 1000) }));
    await store.saveIncident(incident('c', { triggeredAt: T0, state: IncidentState.RESOLVED }));

    expect((await store.listIncidents()).map((i) => i.id)).toEqual(['b', 'a', 'c']);
    expect((await store.listIncidents(IncidentState.ACTIVE)).map((i) => i.id)).toEqual(['b', 'a']);
  });

  describe('findWithinRadius', () => {
    beforeEach(async () => {
      const base = { houseId: null, tenantId: null, role: 'occupant' as const, pushToken: null, phone: null, email: null };
      await store.upsertRecipient({ ...base, id: 'far', location: { latitude: 10.01, longitude: 20.0 } });
      await store.upsertRecipient({ ...base, id: 'near-b', location: { latitude: 10.0009, longitude: 20.0 } });
      await store.upsertRecipient({ ...base, id: 'near-a', location: { latitude: 10.0009, longitude: 20.0 } });
      await store.upsertRecipient({ ...base, id: 'here', location: { latitude: 10.0, longitude: 20.0 } });
    });

    it('orders matches by distance, then id', async () => {
      const matches = await store.findWithinRadius({ latitude: 10.0, longitude: 20.0 }, 200);
      expect(matches.map((m) => m.recipient.id)).toEqual(['here', 'near-a', 'near-b']);
      expect(matches[0].distanceMeters).toBe(0);
      expect(Math.round(matches[1].distanceMeters)).toBe(100);
    });

    it('excludes points outside the radius', async () => {
      const matches = await store.findWithinRadius({ latitude: 10.0, longitude: 20.0 }, 50);
      expect(matches.map((m) => m.recipient.id)).toEqual(['here']);
    });

    it('finds recipients across the antimeridian', async () => {
      const base = { houseId: null, tenantId: null, role: 'occupant' as const, pushToken: null, phone: null, email: null };
      await store.upsertRecipient({ ...base, id: 'east', location: { latitude: 0, longitude: 179.9995 } });
      await store.upsertRecipient({ ...base, id: 'west', location: { latitude: 0, longitude: -179.9995 } });

      const matches = await store.findWithinRadius({ latitude: 0, longitude: 179.9995 }, 200);
      expect(matches.map((m) => m.recipient.id)).toEqual(['east', 'west']);
      expect(Math.round(matches[1].distanceMeters)).toBe(111);
    });
  });

  it('filters tasks by tier and lists failed tasks oldest first', async () => {
    await store.saveTask(task('inc-1:U2:base', { recipientId: 'U2', status: 'failed', updatedAt: new Date(T0.getTime() + 5000) }));
    await store.saveTask(task('inc-1:U1:base', { status: 'failed', failureReason: 'Permanent' }));
    await store.saveTask(task('inc-1:U1:escalation', { tier: 'escalation' }));

    expect((await store.listTasksForIncident('inc-1')).map((t) => t.id)).toEqual([
      'inc-1:U1:base',
      'inc-1:U1:escalation',
      'inc-1:U2:base',
    ]);
    expect((await store.listTasksForIncident('inc-1', 'escalation')).map((t) => t.id)).toEqual(['inc-1:U1:escalation']);
    expect((await store.listFailedTasks()).map((t) => t.id)).toEqual(['inc-1:U1:base', 'inc-1:U2:base']);
  });

  it('keeps the audit log in append order and filters it', async () => {
    const entry = { incidentId: 'inc-1', taskId: 't', error: null, at: T0 };
    await store.appendAudit({ ...entry, recipientId: 'U1', attempt: 1, result: 'transient_error' });
    await store.appendAudit({ ...entry, recipientId: 'U2', attempt: 1, result: 'sent' });
    await store.appendAudit({ ...entry, recipientId: 'U1', attempt: 2, result: 'sent' });

    expect((await store.listAudit()).map((a) => a.recipientId)).toEqual(['U1', 'U2', 'U1']);
    expect((await store.listAudit({ recipientId: 'U1' })).map((a) => a.result)).toEqual(['transient_error', 'sent']);
    expect(await store.listAudit({ incidentId: 'other' })).toEqual([]);
  });

  it('closes more than once', async () => {
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});
