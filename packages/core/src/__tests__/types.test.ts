import { describe, it, expect } from 'vitest';
import {
  EventKind,
  DeviceStatus,
  Severity,
  IncidentState,
  NotificationChannel,
  OPEN_INCIDENT_STATES,
} from '../types.js';

describe('Core Type Exports', () => {
  it('maps EventKind values to uplink message kinds', () => {
    expect(EventKind.POWER_ON).toBe('power_on');
    expect(EventKind.HEARTBEAT).toBe('heartbeat');
    expect(EventKind.SMOKE_ALARM).toBe('smoke_alarm');
    expect(EventKind.REGISTRATION).toBe('smoke_register');
    expect(EventKind.DELETION_ACK).toBe('delete_response');
    expect(EventKind.SELF_TEST).toBe('self_test');
    expect(EventKind.LOW_BATTERY).toBe('low_battery');
  });

  it('exports DeviceStatus enum values', () => {
    expect(DeviceStatus.ONLINE).toBe('online');
    expect(DeviceStatus.OFFLINE).toBe('offline');
    expect(DeviceStatus.UNKNOWN).toBe('unknown');
  });

  it('exports Severity enum values', () => {
    expect(Severity.LOW).toBe('low');
    expect(Severity.MEDIUM).toBe('medium');
    expect(Severity.HIGH).toBe('high');
    expect(Severity.CRITICAL).toBe('critical');
  });

  it('exports IncidentState enum values', () => {
    expect(IncidentState.ACTIVE).toBe('active');
    expect(IncidentState.ACKNOWLEDGED).toBe('acknowledged');
    expect(IncidentState.ESCALATED).toBe('escalated');
    expect(IncidentState.RESOLVED).toBe('resolved');
  });

  it('treats every state except resolved as open', () => {
    expect(OPEN_INCIDENT_STATES).toEqual(['active', 'acknowledged', 'escalated']);
  });

  it('exports NotificationChannel enum values', () => {
    expect(NotificationChannel.PUSH).toBe('push');
    expect(NotificationChannel.SMS).toBe('sms');
    expect(NotificationChannel.EMAIL).toBe('email');
    expect(NotificationChannel.NONE).toBe('none');
  });
});
