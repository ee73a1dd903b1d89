/**
 * Spatial Notification Router
 *
 * Turns an incident into one notification task per recipient. Recipient
 * selection depends on severity and tier:
 *   - low/medium, base tier: occupants of the incident's house only
 *   - high/critical or escalation tier: plus everyone registered within the
 *     radius (neighbouring occupants and emergency contacts)
 * Recipients that already hold a pending or sent task for the incident are
 * skipped, so a second pass only reaches people not yet notified.
 */

import {
  IncidentState,
  NotificationChannel,
  Severity,
  compareSeverity,
  getIncidentTemplate,
  renderTemplate,
  type AlarmIncident,
  type NotificationTask,
  type NotificationTier,
  type Recipient,
  type SensorPlacement,
  type TaskRecord,
} from '@emberline/core';
import { RoutingError } from '../errors.js';
import type { PipelineStore } from '../store/types.js';
import type { Logger } from '../utils/logger.js';

export interface RoutingPolicy {
  baseRadiusMeters: number;
  escalationMultiplier: number;
}

export interface NotificationRouterDeps {
  store: PipelineStore;
  logger: Logger;
  policy: RoutingPolicy;
  now?: () => Date;
}

interface ChannelChoice {
  channel: NotificationChannel;
  address: string | null;
}

export function taskId(incidentId: string, recipientId: string, tier: NotificationTier): string {
  return `${incidentId}:${recipientId}:${tier}`;
}

export function tierFor(incident: AlarmIncident): NotificationTier {
  return incident.state === IncidentState.ESCALATED ? 'escalation' : 'base';
}

/** push, then sms, then email. */
export function chooseChannel(recipient: Recipient): ChannelChoice {
  if (recipient.pushToken) return { channel: NotificationChannel.PUSH, address: recipient.pushToken };
  if (recipient.phone) return { channel: NotificationChannel.SMS, address: recipient.phone };
  if (recipient.email) return { channel: NotificationChannel.EMAIL, address: recipient.email };
  return { channel: NotificationChannel.NONE, address: null };
}

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class NotificationRouter {
  private now: () => Date;

  constructor(private deps: NotificationRouterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  radiusFor(tier: NotificationTier): number {
    const { baseRadiusMeters, escalationMultiplier } = this.deps.policy;
    return tier === 'escalation' ? baseRadiusMeters * escalationMultiplier : baseRadiusMeters;
  }

  /** Same selection as route() without writing anything. */
  async preview(incident: AlarmIncident, tier: NotificationTier = tierFor(incident)): Promise<NotificationTask[]> {
    const placement = await this.placementFor(incident);
    const recipients = await this.candidates(incident, placement, tier);
    const existing = await this.deps.store.listTasksForIncident(incident.id);
    const covered = new Set(existing.filter((t) => t.status === 'pending' || t.status === 'sent').map((t) => t.recipientId));
    const knownIds = new Set(existing.map((t) => t.id));

    const tasks: NotificationTask[] = [];
    for (const recipient of recipients) {
      const id = taskId(incident.id, recipient.id, tier);
      if (covered.has(recipient.id) || knownIds.has(id)) continue;
      tasks.push(this.buildTask(id, incident, placement, recipient, tier));
    }
    return tasks;
  }

  /**
   * Compute and persist the tasks for one fan-out pass. Recipients with no
   * reachable channel are stored as failed/NoChannel and audited.
   */
  async route(incident: AlarmIncident, tier: NotificationTier = tierFor(incident)): Promise<NotificationTask[]> {
    const tasks = await this.preview(incident, tier);
    const now = this.now();

    for (const task of tasks) {
      const unreachable = task.channel === NotificationChannel.NONE;
      const record: TaskRecord = {
        ...task,
        status: unreachable ? 'failed' : 'pending',
        attempts: 0,
        lastError: unreachable ? 'Recipient has no push token, phone or email' : null,
        failureReason: unreachable ? 'NoChannel' : null,
        createdAt: now,
        updatedAt: now,
      };
      await this.deps.store.saveTask(record);

      if (unreachable) {
        await this.deps.store.appendAudit({
          recipientId: task.recipientId,
          incidentId: task.incidentId,
          taskId: task.id,
          attempt: 0,
          result: 'no_channel',
          error: record.lastError,
          at: now,
        });
      }
    }

    this.deps.logger.info(
      { incidentId: incident.id, tier, radiusMeters: this.radiusFor(tier), tasks: tasks.length },
      'Incident routed',
    );
    return tasks;
  }

  private async placementFor(incident: AlarmIncident): Promise<SensorPlacement> {
    const placement = await this.deps.store.getSensorPlacement(incident.sensorId);
    if (!placement) {
      throw new RoutingError(incident.id, `Sensor ${incident.sensorId} has no registered placement`);
    }
    return placement;
  }

  private async candidates(incident: AlarmIncident, placement: SensorPlacement, tier: NotificationTier): Promise<Recipient[]> {
    const byRecipient = new Map<string, Recipient>();
    for (const occupant of await this.deps.store.findRecipientsByHouse(placement.houseId)) {
      byRecipient.set(occupant.id, occupant);
    }

    const wide = tier === 'escalation' || compareSeverity(incident.severity, Severity.HIGH) >= 0;
    if (wide) {
      const nearby = await this.deps.store.findWithinRadius(placement.location, this.radiusFor(tier));
      for (const { recipient } of nearby) {
        byRecipient.set(recipient.id, recipient);
      }
    }

    return [...byRecipient.values()].sort((a, b) => byId(a.id, b.id));
  }

  private buildTask(
    id: string,
    incident: AlarmIncident,
    placement: SensorPlacement,
    recipient: Recipient,
    tier: NotificationTier,
  ): NotificationTask {
    const { channel, address } = chooseChannel(recipient);
    const vars = {
      severity: incident.severity,
      sensorId: incident.sensorId,
      houseId: placement.houseId,
      incidentId: incident.id,
      triggeredAt: incident.triggeredAt.toISOString(),
    };

    const push = renderTemplate(getIncidentTemplate(NotificationChannel.PUSH, tier), vars);
    const rendered =
      channel === NotificationChannel.NONE ? push : renderTemplate(getIncidentTemplate(channel, tier), vars);

    return {
      id,
      recipientId: recipient.id,
      incidentId: incident.id,
      channel,
      address,
      tier,
      title: rendered.subject ?? push.subject ?? 'FIRE ALARM',
      body: rendered.body,
    };
  }
}
