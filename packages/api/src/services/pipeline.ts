/**
 * Pipeline wiring: decoder -> tracker -> alarm engine -> {router -> dispatcher, hub}.
 *
 * `ingest` is the single entry point for transport messages (MQTT and the
 * test harness). It never throws; failures come back as a dropped result and
 * are counted.
 */

import {
  EventKind,
  IncidentState,
  type AlarmIncident,
  type DeviceEvent,
  type DeviceState,
  type NotificationTier,
  type ScopeFilter,
  type SensorPlacement,
} from '@emberline/core';
import type { PushTransport } from '@emberline/notifications';
import { DecodeError, RoutingError, type DecodeErrorCode } from '../errors.js';
import type { PipelineStore } from '../store/types.js';
import type { Logger } from '../utils/logger.js';
import { AlarmEngine } from './alarm-engine.js';
import { BroadcastHub } from './broadcast-hub.js';
import { DeliveryDispatcher, type DispatchPolicy } from './delivery-dispatcher.js';
import { DeviceStateTracker } from './device-tracker.js';
import type { EscalationScheduler } from './escalation-scheduler.js';
import { decodeMessage } from './message-decoder.js';
import { NotificationRouter, type RoutingPolicy } from './notification-router.js';

export type DropReason = DecodeErrorCode | 'ProcessingError';

export type IngestResult =
  | { status: 'applied'; event: DeviceEvent; device: DeviceState; incident: AlarmIncident | null }
  | { status: 'dropped'; reason: DropReason; error: string };

export interface IngressStats {
  received: number;
  applied: number;
  dropped: Record<DropReason, number>;
}

export interface PipelineOptions {
  store: PipelineStore;
  transport: PushTransport;
  scheduler: EscalationScheduler;
  logger: Logger;
  stalenessWindowMs: number;
  sweepIntervalMs: number;
  ackTimeoutMs: number;
  routing: RoutingPolicy;
  dispatch: DispatchPolicy;
  queueDepth: number;
  /** Backoff sleep override for the dispatcher. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class Pipeline {
  readonly tracker: DeviceStateTracker;
  readonly engine: AlarmEngine;
  readonly router: NotificationRouter;
  readonly dispatcher: DeliveryDispatcher;
  readonly hub: BroadcastHub;

  private store: PipelineStore;
  private log: Logger;
  private now: () => Date;
  private inFlight = new Set<Promise<void>>();
  private stats: IngressStats = {
    received: 0,
    applied: 0,
    dropped: { UnknownKind: 0, MalformedTopic: 0, MalformedPayload: 0, ProcessingError: 0 },
  };

  constructor(options: PipelineOptions) {
    this.store = options.store;
    this.log = options.logger;
    this.now = options.now ?? (() => new Date());

    this.hub = new BroadcastHub({ queueDepth: options.queueDepth, logger: options.logger });
    this.tracker = new DeviceStateTracker({
      store: options.store,
      logger: options.logger,
      stalenessWindowMs: options.stalenessWindowMs,
      sweepIntervalMs: options.sweepIntervalMs,
    });
    this.router = new NotificationRouter({
      store: options.store,
      logger: options.logger,
      policy: options.routing,
      now: options.now,
    });
    this.dispatcher = new DeliveryDispatcher({
      store: options.store,
      transport: options.transport,
      logger: options.logger,
      policy: options.dispatch,
      sleep: options.sleep,
      now: options.now,
    });
    this.engine = new AlarmEngine({
      store: options.store,
      logger: options.logger,
      broadcaster: this.hub,
      scheduler: options.scheduler,
      ackTimeoutMs: options.ackTimeoutMs,
      requestFanOut: (incident, tier) => this.fanOut(incident, tier),
      cancelPendingTasks: (incidentId, tier) => this.dispatcher.cancelPending(incidentId, tier),
      now: options.now,
    });

    this.tracker.onStatusChange((change) => {
      this.track(this.broadcastDevice('device:status', change.deviceId, change));
    });
    this.tracker.onLowBattery((candidate) => {
      this.track(this.broadcastDevice('device:low_battery', candidate.deviceId, candidate));
    });
  }

  async ingest(topic: string, body: Buffer | string, receivedAt: Date = this.now()): Promise<IngestResult> {
    this.stats.received++;

    const event = decodeMessage(topic, body, receivedAt);
    if (event instanceof DecodeError) {
      this.stats.dropped[event.code]++;
      this.log.warn({ topic, code: event.code }, `Dropped uplink message: ${event.message}`);
      return { status: 'dropped', reason: event.code, error: event.message };
    }

    try {
      const device = await this.tracker.applyEvent(event);
      let incident: AlarmIncident | null = null;
      if (event.kind === EventKind.SMOKE_ALARM) {
        incident = await this.engine.trigger(event.payload.sensorId, event.payload.severity, {
          gatewayId: event.sourceId,
          at: event.receivedAt,
        });
      }
      this.stats.applied++;
      return { status: 'applied', event, device, incident };
    } catch (err) {
      this.stats.dropped.ProcessingError++;
      this.log.error({ err, topic }, 'Failed to process uplink message');
      return { status: 'dropped', reason: 'ProcessingError', error: err instanceof Error ? err.message : String(err) };
    }
  }

  /** Route then dispatch in the background; idle() waits for it. */
  fanOut(incident: AlarmIncident, tier: NotificationTier): void {
    this.track(this.runFanOut(incident, tier));
  }

  /** Resolves once every background fan-out and broadcast has settled. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  getIngressStats(): IngressStats {
    return { ...this.stats, dropped: { ...this.stats.dropped } };
  }

  async start(): Promise<void> {
    const restored = await this.tracker.hydrate();
    this.log.info({ restored }, 'Device states restored');
    const rearmed = await this.engine.rescheduleActive();
    this.log.info({ rearmed }, 'Escalation timers re-armed');
    this.tracker.startSweep();
  }

  /** Stops the sweep and drains background work. The scheduler is closed by its owner. */
  async stop(): Promise<void> {
    this.tracker.stopSweep();
    await this.idle();
    await this.hub.shutdown();
  }

  private track(work: Promise<void>): void {
    this.inFlight.add(work);
    work.finally(() => this.inFlight.delete(work)).catch((err) => {
      this.log.error({ err }, 'Background task failed');
    });
  }

  private async runFanOut(incident: AlarmIncident, tier: NotificationTier): Promise<void> {
    try {
      const tasks = await this.router.route(incident, tier);

      // Resolved while routing: escalation tasks must not go out
      const current = await this.store.getIncident(incident.id);
      if (tier === 'escalation' && current?.state === IncidentState.RESOLVED) {
        await this.dispatcher.cancelPending(incident.id, tier);
        return;
      }

      const outcomes = await this.dispatcher.dispatchAll(tasks);
      const sent = outcomes.filter((o) => o.status === 'sent').length;
      this.log.info(
        { incidentId: incident.id, tier, tasks: tasks.length, sent, failed: outcomes.length - sent },
        'Fan-out complete',
      );
    } catch (err) {
      if (err instanceof RoutingError) {
        this.log.warn({ incidentId: incident.id, tier }, `Fan-out skipped: ${err.message}`);
        return;
      }
      this.log.error({ err, incidentId: incident.id, tier }, 'Fan-out failed');
    }
  }

  private async broadcastDevice(eventType: string, deviceId: string, payload: unknown): Promise<void> {
    const filter = await this.scopeOfDevice(deviceId);
    this.hub.broadcast({ eventType, payload, timestamp: this.now().toISOString() }, filter);
  }

  /** Sensors take their placement; a gateway takes whatever scope its placed sensors share. */
  private async scopeOfDevice(deviceId: string): Promise<ScopeFilter> {
    const placement = await this.store.getSensorPlacement(deviceId);
    if (placement) {
      return { tenantId: placement.tenantId, houseId: placement.houseId };
    }

    const sensorIds = this.tracker
      .listStates()
      .filter((state) => state.gatewayId === deviceId)
      .map((state) => state.id);
    const placements = (await Promise.all(sensorIds.map((id) => this.store.getSensorPlacement(id)))).filter(
      (p): p is SensorPlacement => p !== null,
    );
    const tenants = new Set(placements.map((p) => p.tenantId));
    const houses = new Set(placements.map((p) => p.houseId));

    return {
      tenantId: tenants.size === 1 ? [...tenants][0] : null,
      houseId: houses.size === 1 ? [...houses][0] : null,
    };
  }
}
