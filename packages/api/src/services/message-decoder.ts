import { z } from 'zod';
import { EventKind, Severity, type DeviceEvent } from '@emberline/core';
import { DecodeError } from '../errors.js';

const TOPIC_PREFIX = 'uplink';
const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

// Gateways send voltages and RSSI either as JSON numbers or as decimal strings.
const numeric = z.union([
  z.number().finite(),
  z.string().trim().regex(NUMERIC_STRING, 'expected a numeric string').transform(Number),
]);

const id = z.string().trim().min(1);
const sensorType = z.enum(['smoke', 'heat', 'gas']);

const powerOnSchema = z.object({
  firmware_version: z.string().min(1),
  hardware_version: z.string().min(1).optional(),
  battery_voltage: numeric.optional(),
  signal_strength: numeric.optional(),
});

const heartbeatSchema = z.object({
  sensor_id: id.optional(),
  battery_voltage: numeric.optional(),
  signal_strength: numeric.optional(),
});

const smokeAlarmSchema = z.object({
  sensor_id: id,
  severity: z.nativeEnum(Severity).default(Severity.HIGH),
  alarm_type: sensorType.default('smoke'),
});

const registrationSchema = z.object({
  sensor_id: id,
  sensor_type: sensorType.optional(),
  firmware_version: z.string().min(1).optional(),
});

const deletionAckSchema = z.object({
  sensor_id: id,
  success: z.boolean(),
});

const selfTestSchema = z.object({
  sensor_id: id.optional(),
  passed: z.boolean(),
});

const lowBatterySchema = z.object({
  sensor_id: id.optional(),
  battery_voltage: numeric,
});

const KNOWN_KINDS: ReadonlySet<string> = new Set(Object.values(EventKind));

function isEventKind(kind: string): kind is EventKind {
  return KNOWN_KINDS.has(kind);
}

function parseBody(kind: EventKind, raw: string): unknown | DecodeError {
  const text = raw.trim();
  // Heartbeats are frequently sent with no body at all
  if (text === '' && kind === EventKind.HEARTBEAT) return {};
  try {
    return JSON.parse(text);
  } catch (err) {
    return new DecodeError('MalformedPayload', `Invalid JSON body for ${kind}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function describeIssues(kind: EventKind, error: z.ZodError): DecodeError {
  const detail = error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ');
  return new DecodeError('MalformedPayload', `Invalid ${kind} payload: ${detail}`);
}

/**
 * Decode one transport message (`uplink/{gatewayId}/{kind}` plus a JSON body)
 * into a typed device event. Never throws; bad input comes back as a DecodeError.
 */
export function decodeMessage(topic: string, rawBody: Buffer | string, receivedAt: Date = new Date()): DeviceEvent | DecodeError {
  const parts = topic.split('/');
  if (parts.length !== 3 || parts[0] !== TOPIC_PREFIX || parts[1].trim() === '' || parts[2] === '') {
    return new DecodeError('MalformedTopic', `Topic "${topic}" does not match uplink/{gatewayId}/{kind}`);
  }

  const sourceId = parts[1];
  const kind = parts[2];
  if (!isEventKind(kind)) {
    return new DecodeError('UnknownKind', `Unknown message kind "${kind}" from ${sourceId}`);
  }

  const body = parseBody(kind, typeof rawBody === 'string' ? rawBody : rawBody.toString('utf8'));
  if (body instanceof DecodeError) return body;

  switch (kind) {
    case EventKind.POWER_ON: {
      const parsed = powerOnSchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      const p = parsed.data;
      return {
        sourceId,
        kind,
        receivedAt,
        payload: {
          firmwareVersion: p.firmware_version,
          hardwareVersion: p.hardware_version,
          batteryVoltage: p.battery_voltage,
          signalStrength: p.signal_strength,
        },
      };
    }
    case EventKind.HEARTBEAT: {
      const parsed = heartbeatSchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      const p = parsed.data;
      return {
        sourceId,
        kind,
        receivedAt,
        payload: { sensorId: p.sensor_id, batteryVoltage: p.battery_voltage, signalStrength: p.signal_strength },
      };
    }
    case EventKind.SMOKE_ALARM: {
      const parsed = smokeAlarmSchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      const p = parsed.data;
      return {
        sourceId,
        kind,
        receivedAt,
        payload: { sensorId: p.sensor_id, severity: p.severity, alarmType: p.alarm_type },
      };
    }
    case EventKind.REGISTRATION: {
      const parsed = registrationSchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      const p = parsed.data;
      return {
        sourceId,
        kind,
        receivedAt,
        payload: { sensorId: p.sensor_id, sensorType: p.sensor_type, firmwareVersion: p.firmware_version },
      };
    }
    case EventKind.DELETION_ACK: {
      const parsed = deletionAckSchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      return { sourceId, kind, receivedAt, payload: { sensorId: parsed.data.sensor_id, success: parsed.data.success } };
    }
    case EventKind.SELF_TEST: {
      const parsed = selfTestSchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      return { sourceId, kind, receivedAt, payload: { sensorId: parsed.data.sensor_id, passed: parsed.data.passed } };
    }
    case EventKind.LOW_BATTERY: {
      const parsed = lowBatterySchema.safeParse(body);
      if (!parsed.success) return describeIssues(kind, parsed.error);
      return {
        sourceId,
        kind,
        receivedAt,
        payload: { sensorId: parsed.data.sensor_id, batteryVoltage: parsed.data.battery_voltage },
      };
    }
  }
}
