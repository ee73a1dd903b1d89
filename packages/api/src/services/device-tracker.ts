/**
 * Device State Tracker
 *
 * Folds decoded device events into last-known state for every gateway and
 * sensor, and runs a periodic sweep that marks silent devices offline.
 * Updates for one device id are serialized; different ids never wait on
 * each other.
 */

import {
  DeviceStatus,
  EventKind,
  KeyedMutex,
  type DeviceEvent,
  type DeviceState,
  type LowBatteryCandidate,
} from '@emberline/core';
import type { PipelineStore } from '../store/types.js';
import type { Logger } from '../utils/logger.js';

export interface DeviceStatusChange {
  deviceId: string;
  previous: DeviceStatus;
  current: DeviceStatus;
  state: DeviceState;
}

export type StatusChangeCallback = (change: DeviceStatusChange) => void;
export type LowBatteryCallback = (candidate: LowBatteryCandidate) => void;

export interface DeviceStateTrackerConfig {
  store: PipelineStore;
  logger: Logger;
  /** Silence longer than this moves a device offline. */
  stalenessWindowMs: number;
  /** Sweep period for startSweep(). Default: 30000 */
  sweepIntervalMs?: number;
}

/** Sensor events carry the sensor id; everything else is about the gateway itself. */
export function targetIdOf(event: DeviceEvent): string {
  switch (event.kind) {
    case EventKind.POWER_ON:
      return event.sourceId;
    default:
      return event.payload.sensorId ?? event.sourceId;
  }
}

function freshState(id: string, gatewayId: string, at: Date): DeviceState {
  const isGateway = id === gatewayId;
  return {
    id,
    kind: isGateway ? 'gateway' : 'sensor',
    gatewayId: isGateway ? null : gatewayId,
    status: DeviceStatus.UNKNOWN,
    batteryLevel: null,
    signalStrength: null,
    lastHeartbeatAt: null,
    lastEventAt: null,
    firmwareVersion: null,
    hardwareVersion: null,
    sensorType: null,
    registered: false,
    lastSelfTestAt: null,
    selfTestPassed: null,
    updatedAt: at,
  };
}

function fold(state: DeviceState, event: DeviceEvent): DeviceState {
  const at = event.receivedAt;
  const next: DeviceState = { ...state, lastEventAt: at, updatedAt: at };
  if (next.kind === 'sensor') next.gatewayId = event.sourceId;

  switch (event.kind) {
    case EventKind.POWER_ON:
      next.status = DeviceStatus.ONLINE;
      next.lastHeartbeatAt = at;
      next.firmwareVersion = event.payload.firmwareVersion;
      next.hardwareVersion = event.payload.hardwareVersion ?? next.hardwareVersion;
      next.batteryLevel = event.payload.batteryVoltage ?? next.batteryLevel;
      next.signalStrength = event.payload.signalStrength ?? next.signalStrength;
      break;
    case EventKind.HEARTBEAT:
      next.status = DeviceStatus.ONLINE;
      next.lastHeartbeatAt = at;
      next.batteryLevel = event.payload.batteryVoltage ?? next.batteryLevel;
      next.signalStrength = event.payload.signalStrength ?? next.signalStrength;
      break;
    case EventKind.SMOKE_ALARM:
      next.sensorType = next.sensorType ?? event.payload.alarmType;
      break;
    case EventKind.REGISTRATION:
      next.registered = true;
      next.sensorType = event.payload.sensorType ?? next.sensorType;
      next.firmwareVersion = event.payload.firmwareVersion ?? next.firmwareVersion;
      break;
    case EventKind.DELETION_ACK:
      if (event.payload.success) next.registered = false;
      break;
    case EventKind.SELF_TEST:
      next.lastSelfTestAt = at;
      next.selfTestPassed = event.payload.passed;
      break;
    case EventKind.LOW_BATTERY:
      next.batteryLevel = event.payload.batteryVoltage;
      break;
  }
  return next;
}

export class DeviceStateTracker {
  private store: PipelineStore;
  private log: Logger;
  private stalenessWindowMs: number;
  private sweepIntervalMs: number;
  private states = new Map<string, DeviceState>();
  private locks = new KeyedMutex();
  private sweepHandle: ReturnType<typeof setInterval> | null = null;
  private statusChangeCallbacks: StatusChangeCallback[] = [];
  private lowBatteryCallbacks: LowBatteryCallback[] = [];

  constructor(config: DeviceStateTrackerConfig) {
    this.store = config.store;
    this.log = config.logger;
    this.stalenessWindowMs = config.stalenessWindowMs;
    this.sweepIntervalMs = config.sweepIntervalMs ?? 30000;
  }

  /** Load persisted states so the sweep covers devices seen before a restart. */
  async hydrate(): Promise<number> {
    const persisted = await this.store.listDeviceStates();
    for (const state of persisted) {
      if (!this.states.has(state.id)) this.states.set(state.id, state);
    }
    return persisted.length;
  }

  async applyEvent(event: DeviceEvent): Promise<DeviceState> {
    const id = targetIdOf(event);
    return this.locks.run(`device:${id}`, async () => {
      const current = await this.load(id, event.sourceId, event.receivedAt);
      const next = fold(current, event);
      await this.commit(current, next);

      if (event.kind === EventKind.LOW_BATTERY) {
        this.emitLowBattery({
          deviceId: next.id,
          gatewayId: next.gatewayId,
          batteryLevel: event.payload.batteryVoltage,
          detectedAt: event.receivedAt,
        });
      }
      return { ...next };
    });
  }

  /**
   * Move every device whose last heartbeat is older than the staleness
   * window to offline. Devices that never sent a heartbeat keep their status.
   */
  async sweep(now: Date = new Date()): Promise<DeviceState[]> {
    const wentOffline: DeviceState[] = [];
    const ids = [...this.states.keys()];

    for (const id of ids) {
      if (!this.isStale(this.states.get(id), now)) continue;

      // Re-check under the lock: a heartbeat may have landed in between
      const updated = await this.locks.run(`device:${id}`, async () => {
        const current = this.states.get(id);
        if (!current || !this.isStale(current, now)) return null;
        const next: DeviceState = { ...current, status: DeviceStatus.OFFLINE, updatedAt: now };
        await this.commit(current, next);
        return next;
      });
      if (updated) wentOffline.push({ ...updated });
    }

    if (wentOffline.length > 0) {
      this.log.info({ count: wentOffline.length }, 'Staleness sweep marked devices offline');
    }
    return wentOffline;
  }

  getState(id: string): DeviceState | null {
    const state = this.states.get(id);
    return state ? { ...state } : null;
  }

  listStates(): DeviceState[] {
    return [...this.states.values()].map((s) => ({ ...s })).sort((a, b) => a.id.localeCompare(b.id));
  }

  onStatusChange(callback: StatusChangeCallback): void {
    this.statusChangeCallbacks.push(callback);
  }

  onLowBattery(callback: LowBatteryCallback): void {
    this.lowBatteryCallbacks.push(callback);
  }

  startSweep(intervalMs?: number): void {
    if (this.sweepHandle) {
      this.stopSweep();
    }

    const interval = intervalMs ?? this.sweepIntervalMs;
    this.log.info(`Starting staleness sweep every ${interval}ms`);

    this.sweepHandle = setInterval(() => {
      this.sweep().catch((err) => {
        this.log.error({ err }, 'Staleness sweep failed');
      });
    }, interval);
  }

  stopSweep(): void {
    if (this.sweepHandle) {
      clearInterval(this.sweepHandle);
      this.sweepHandle = null;
    }
  }

  isSweeping(): boolean {
    return this.sweepHandle !== null;
  }

  private isStale(state: DeviceState | undefined, now: Date): boolean {
    if (!state || state.status === DeviceStatus.OFFLINE || !state.lastHeartbeatAt) return false;
    return now.getTime() - state.lastHeartbeatAt.getTime() > this.stalenessWindowMs;
  }

  private async load(id: string, gatewayId: string, at: Date): Promise<DeviceState> {
    const cached = this.states.get(id);
    if (cached) return cached;

    const persisted = await this.store.getDeviceState(id);
    if (persisted) return persisted;

    this.log.info({ deviceId: id, gatewayId }, 'Registering new device on first contact');
    return freshState(id, gatewayId, at);
  }

  private async commit(previous: DeviceState, next: DeviceState): Promise<void> {
    await this.store.saveDeviceState(next);
    this.states.set(next.id, next);

    if (previous.status !== next.status) {
      const change: DeviceStatusChange = {
        deviceId: next.id,
        previous: previous.status,
        current: next.status,
        state: { ...next },
      };
      for (const callback of this.statusChangeCallbacks) {
        try {
          callback(change);
        } catch (err) {
          this.log.error({ err, deviceId: next.id }, 'Status change callback error');
        }
      }
    }
  }

  private emitLowBattery(candidate: LowBatteryCandidate): void {
    this.log.warn({ deviceId: candidate.deviceId, batteryLevel: candidate.batteryLevel }, 'Low battery reported');
    for (const callback of this.lowBatteryCallbacks) {
      try {
        callback(candidate);
      } catch (err) {
        this.log.error({ err, deviceId: candidate.deviceId }, 'Low battery callback error');
      }
    }
  }
}
