import type { Queue } from 'bullmq';
import type { Logger } from '../utils/logger.js';

/** Called when an incident's acknowledgement window has elapsed. */
export type EscalationDueHandler = (incidentId: string) => Promise<unknown>;

export interface EscalationScheduler {
  onDue(handler: EscalationDueHandler): void;
  schedule(incidentId: string, delayMs: number): Promise<void>;
  cancel(incidentId: string): Promise<void>;
  close(): Promise<void>;
}

export const ESCALATION_JOB = 'auto-escalate';

export function escalationJobId(incidentId: string): string {
  return `escalate:${incidentId}`;
}

/** In-process timers. Pending escalations are lost on restart. */
export class TimerEscalationScheduler implements EscalationScheduler {
  private timers = new Map<string, ReturnType<typeof setTimeout>>();
  private handler: EscalationDueHandler | null = null;

  constructor(private readonly log: Logger) {}

  onDue(handler: EscalationDueHandler): void {
    this.handler = handler;
  }

  async schedule(incidentId: string, delayMs: number): Promise<void> {
    await this.cancel(incidentId);
    const timer = setTimeout(() => {
      this.timers.delete(incidentId);
      this.fire(incidentId);
    }, delayMs);
    this.timers.set(incidentId, timer);
  }

  async cancel(incidentId: string): Promise<void> {
    const timer = this.timers.get(incidentId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(incidentId);
    }
  }

  async close(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  private fire(incidentId: string): void {
    const handler = this.handler;
    if (!handler) {
      this.log.warn({ incidentId }, 'Escalation due but no handler registered');
      return;
    }
    handler(incidentId).catch((err) => {
      this.log.error({ err, incidentId }, 'Auto-escalation failed');
    });
  }
}

/** The part of a BullMQ queue the scheduler uses. */
export type EscalationQueue = Pick<Queue, 'add' | 'remove' | 'close'>;

export interface BullMqEscalationSchedulerConfig {
  queue: EscalationQueue;
  logger: Logger;
  /** Starts the worker that consumes due jobs; returns its close function. */
  startWorker?: (handler: EscalationDueHandler) => () => Promise<void>;
}

/**
 * Delayed BullMQ jobs on Redis. The job id is derived from the incident id,
 * so re-scheduling replaces the previous job and cancel is a point removal.
 */
export class BullMqEscalationScheduler implements EscalationScheduler {
  private queue: EscalationQueue;
  private log: Logger;
  private startWorker?: (handler: EscalationDueHandler) => () => Promise<void>;
  private closeWorker: (() => Promise<void>) | null = null;

  constructor(config: BullMqEscalationSchedulerConfig) {
    this.queue = config.queue;
    this.log = config.logger;
    this.startWorker = config.startWorker;
  }

  onDue(handler: EscalationDueHandler): void {
    if (this.startWorker && !this.closeWorker) {
      this.closeWorker = this.startWorker(handler);
    }
  }

  async schedule(incidentId: string, delayMs: number): Promise<void> {
    await this.cancel(incidentId);
    await this.queue.add(ESCALATION_JOB, { incidentId }, { delay: delayMs, jobId: escalationJobId(incidentId) });
    this.log.debug({ incidentId, delayMs }, 'Escalation job scheduled');
  }

  async cancel(incidentId: string): Promise<void> {
    await this.queue.remove(escalationJobId(incidentId));
  }

  async close(): Promise<void> {
    if (this.closeWorker) {
      await this.closeWorker();
      this.closeWorker = null;
    }
    await this.queue.close();
  }
}
