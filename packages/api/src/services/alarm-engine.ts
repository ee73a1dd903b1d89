import { randomUUID } from 'node:crypto';
import {
  IncidentState,
  KeyedMutex,
  isHigherSeverity,
  nextSeverity,
  type AlarmIncident,
  type BroadcastEnvelope,
  type EscalationReason,
  type NotificationTier,
  type ScopeFilter,
  type Severity,
} from '@emberline/core';
import { IncidentNotFoundError, InvalidTransitionError } from '../errors.js';
import type { PipelineStore } from '../store/types.js';
import type { Logger } from '../utils/logger.js';
import type { EscalationScheduler } from './escalation-scheduler.js';

export interface IncidentBroadcaster {
  broadcast(envelope: BroadcastEnvelope, filter?: ScopeFilter): void;
}

export type FanOutRequest = (incident: AlarmIncident, tier: NotificationTier) => void;

export interface AlarmEngineDeps {
  store: PipelineStore;
  logger: Logger;
  broadcaster: IncidentBroadcaster;
  scheduler: EscalationScheduler;
  /** Acknowledgement window before an active incident auto-escalates. */
  ackTimeoutMs: number;
  requestFanOut: FanOutRequest;
  /** Cancels not-yet-dispatched tasks of a tier; returns how many were cancelled. */
  cancelPendingTasks?: (incidentId: string, tier: NotificationTier) => Promise<number>;
  now?: () => Date;
}

export interface TriggerOptions {
  gatewayId?: string | null;
  at?: Date;
}

export class AlarmEngine {
  private locks = new KeyedMutex();
  private now: () => Date;

  constructor(private deps: AlarmEngineDeps) {
    this.now = deps.now ?? (() => new Date());
    deps.scheduler.onDue((incidentId) => this.handleAcknowledgementTimeout(incidentId));
  }

  /**
   * Open an incident for a sensor, or fold the alarm into the sensor's open
   * incident. Severity only ever rises on coalesce.
   */
  async trigger(sensorId: string, severity: Severity, opts: TriggerOptions = {}): Promise<AlarmIncident> {
    return this.locks.run(`sensor:${sensorId}`, async () => {
      const open = await this.deps.store.findOpenIncidentForSensor(sensorId);
      if (open) {
        const coalesced = await this.locks.run(`incident:${open.id}`, () => this.coalesce(open.id, severity));
        if (coalesced) return coalesced;
      }
      return this.open(sensorId, severity, opts);
    });
  }

  async acknowledge(incidentId: string, userId: string): Promise<AlarmIncident> {
    return this.locks.run(`incident:${incidentId}`, async () => {
      const existing = await this.require(incidentId);
      if (existing.state !== IncidentState.ACTIVE) {
        throw new InvalidTransitionError(incidentId, existing.state, 'acknowledge');
      }

      const incident: AlarmIncident = {
        ...existing,
        state: IncidentState.ACKNOWLEDGED,
        acknowledgedBy: userId,
        acknowledgedAt: this.now(),
      };
      await this.deps.store.saveIncident(incident);
      await this.cancelTimer(incidentId);

      this.deps.logger.info({ incidentId, userId }, 'Incident acknowledged');
      this.broadcastIncident('incident:acknowledged', incident);
      return incident;
    });
  }

  async escalate(incidentId: string, reason: EscalationReason = 'manual'): Promise<AlarmIncident> {
    return this.locks.run(`incident:${incidentId}`, async () => {
      const existing = await this.require(incidentId);
      if (existing.state !== IncidentState.ACTIVE) {
        throw new InvalidTransitionError(incidentId, existing.state, 'escalate');
      }
      return this.applyEscalation(existing, reason);
    });
  }

  /**
   * Escalate if the incident is still waiting for acknowledgement. Returns
   * null when it was acknowledged, escalated or resolved in the meantime.
   */
  async handleAcknowledgementTimeout(incidentId: string): Promise<AlarmIncident | null> {
    return this.locks.run(`incident:${incidentId}`, async () => {
      const existing = await this.deps.store.getIncident(incidentId);
      if (!existing || existing.state !== IncidentState.ACTIVE) {
        this.deps.logger.debug({ incidentId, state: existing?.state }, 'Acknowledgement timeout ignored');
        return null;
      }
      return this.applyEscalation(existing, 'ack_timeout');
    });
  }

  /** Idempotent: resolving a resolved incident returns it unchanged. */
  async resolve(incidentId: string, resolvedBy?: string): Promise<AlarmIncident> {
    return this.locks.run(`incident:${incidentId}`, async () => {
      const existing = await this.require(incidentId);
      if (existing.state === IncidentState.RESOLVED) {
        return existing;
      }

      const incident: AlarmIncident = {
        ...existing,
        state: IncidentState.RESOLVED,
        resolvedAt: this.now(),
        resolvedBy: resolvedBy ?? null,
      };
      await this.deps.store.saveIncident(incident);
      await this.cancelTimer(incidentId);

      if (this.deps.cancelPendingTasks) {
        try {
          const cancelled = await this.deps.cancelPendingTasks(incidentId, 'escalation');
          if (cancelled > 0) {
            this.deps.logger.info({ incidentId, cancelled }, 'Cancelled pending escalation notifications');
          }
        } catch (err) {
          this.deps.logger.error({ err, incidentId }, 'Failed to cancel pending escalation notifications');
        }
      }

      this.deps.logger.info({ incidentId, resolvedBy }, 'Incident resolved');
      this.broadcastIncident('incident:resolved', incident);
      return incident;
    });
  }

  /**
   * Re-arm acknowledgement timers for incidents still active in the store,
   * keeping each one's original deadline.
   */
  async rescheduleActive(): Promise<number> {
    const active = await this.deps.store.listIncidents(IncidentState.ACTIVE);
    const now = this.now().getTime();
    for (const incident of active) {
      const remaining = Math.max(0, incident.triggeredAt.getTime() + this.deps.ackTimeoutMs - now);
      await this.deps.scheduler.schedule(incident.id, remaining);
    }
    return active.length;
  }

  async getIncident(incidentId: string): Promise<AlarmIncident> {
    return this.require(incidentId);
  }

  async listIncidents(state?: IncidentState): Promise<AlarmIncident[]> {
    return this.deps.store.listIncidents(state);
  }

  private async open(sensorId: string, severity: Severity, opts: TriggerOptions): Promise<AlarmIncident> {
    const placement = await this.deps.store.getSensorPlacement(sensorId);
    if (!placement) {
      this.deps.logger.warn({ sensorId }, 'Alarm from sensor with no registered placement');
    }

    const incident: AlarmIncident = {
      id: randomUUID(),
      sensorId,
      gatewayId: opts.gatewayId ?? null,
      houseId: placement?.houseId ?? null,
      tenantId: placement?.tenantId ?? null,
      severity,
      state: IncidentState.ACTIVE,
      triggeredAt: opts.at ?? this.now(),
      triggerCount: 1,
      acknowledgedBy: null,
      acknowledgedAt: null,
      escalatedAt: null,
      resolvedAt: null,
      resolvedBy: null,
    };
    await this.deps.store.saveIncident(incident);

    this.deps.logger.info({ incidentId: incident.id, sensorId, severity }, 'Incident triggered');
    this.broadcastIncident('incident:triggered', incident);
    this.deps.requestFanOut(incident, 'base');

    // Scheduler failures must not lose the incident itself
    try {
      await this.deps.scheduler.schedule(incident.id, this.deps.ackTimeoutMs);
    } catch (err) {
      this.deps.logger.error({ err, incidentId: incident.id }, 'Failed to schedule auto-escalation');
    }

    return incident;
  }

  private async coalesce(incidentId: string, severity: Severity): Promise<AlarmIncident | null> {
    const existing = await this.deps.store.getIncident(incidentId);
    if (!existing || existing.state === IncidentState.RESOLVED) return null;

    const raised = isHigherSeverity(severity, existing.severity);
    const incident: AlarmIncident = {
      ...existing,
      triggerCount: existing.triggerCount + 1,
      severity: raised ? severity : existing.severity,
    };
    await this.deps.store.saveIncident(incident);

    this.deps.logger.info(
      { incidentId, triggerCount: incident.triggerCount, severity: incident.severity, raised },
      'Alarm coalesced into open incident',
    );
    this.broadcastIncident('incident:updated', incident);
    if (raised) {
      this.deps.requestFanOut(incident, incident.state === IncidentState.ESCALATED ? 'escalation' : 'base');
    }
    return incident;
  }

  private async applyEscalation(existing: AlarmIncident, reason: EscalationReason): Promise<AlarmIncident> {
    const incident: AlarmIncident = {
      ...existing,
      state: IncidentState.ESCALATED,
      severity: nextSeverity(existing.severity),
      escalatedAt: this.now(),
    };
    await this.deps.store.saveIncident(incident);
    if (reason === 'manual') {
      await this.cancelTimer(incident.id);
    }

    this.deps.logger.warn(
      { incidentId: incident.id, reason, from: existing.severity, to: incident.severity },
      'Incident escalated',
    );
    this.broadcastIncident('incident:escalated', incident, { reason });
    this.deps.requestFanOut(incident, 'escalation');
    return incident;
  }

  private async require(incidentId: string): Promise<AlarmIncident> {
    const incident = await this.deps.store.getIncident(incidentId);
    if (!incident) {
      throw new IncidentNotFoundError(incidentId);
    }
    return incident;
  }

  private async cancelTimer(incidentId: string): Promise<void> {
    try {
      await this.deps.scheduler.cancel(incidentId);
    } catch (err) {
      this.deps.logger.error({ err, incidentId }, 'Failed to cancel auto-escalation');
    }
  }

  private broadcastIncident(eventType: string, incident: AlarmIncident, extra: Record<string, unknown> = {}): void {
    this.deps.broadcaster.broadcast(
      {
        eventType,
        payload: { ...incident, ...extra },
        timestamp: this.now().toISOString(),
      },
      { tenantId: incident.tenantId, houseId: incident.houseId },
    );
  }
}
