/**
 * Delivery Dispatcher
 *
 * Sends notification tasks through the push transport and owns each task's
 * record until it reaches a terminal status. Transient failures (transport
 * transient errors, thrown errors, timeouts) retry with exponential backoff;
 * permanent failures stop immediately. Every attempt is audited.
 */

import {
  KeyedMutex,
  NotificationChannel,
  type AttemptResult,
  type DeliveryAuditEntry,
  type DeliveryOutcome,
  type NotificationTask,
  type NotificationTier,
  type TaskRecord,
} from '@emberline/core';
import type { PushTransport } from '@emberline/notifications';
import { PermanentDeliveryError, TransientDeliveryError } from '../errors.js';
import type { PipelineStore } from '../store/types.js';
import type { Logger } from '../utils/logger.js';

export interface DispatchPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  backoffBaseMs: number;
  /** Per-attempt transport timeout. */
  timeoutMs: number;
  concurrency: number;
}

export interface DeliveryDispatcherDeps {
  store: PipelineStore;
  transport: PushTransport;
  logger: Logger;
  policy: DispatchPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** base * 2^(attempt-1): 1s, 2s, 4s, ... for a 1s base. */
export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * Math.pow(2, attempt - 1);
}

const TIMED_OUT = Symbol('timed out');

/** Resolves with TIMED_OUT if `promise` has not settled within `timeoutMs`; never rejects on timeout. */
function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T | typeof TIMED_OUT> {
  return new Promise<T | typeof TIMED_OUT>((resolve, reject) => {
    const timer = setTimeout(() => {
      resolve(TIMED_OUT);
    }, timeoutMs);

    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((err) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

function outcomeOf(record: TaskRecord): DeliveryOutcome {
  return {
    taskId: record.id,
    recipientId: record.recipientId,
    incidentId: record.incidentId,
    status: record.status === 'pending' ? 'failed' : record.status,
    attempts: record.attempts,
    error: record.lastError,
    failureReason: record.failureReason,
  };
}

export class DeliveryDispatcher {
  private locks = new KeyedMutex();
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(private deps: DeliveryDispatcherDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Deliver one task. Terminal tasks are returned as recorded without a
   * send; attempts for the same task never overlap.
   */
  async dispatch(task: NotificationTask): Promise<DeliveryOutcome> {
    return this.locks.run(`task:${task.id}`, async () => {
      const record = await this.loadOrCreate(task);
      if (record.status !== 'pending') {
        return outcomeOf(record);
      }

      if (record.channel === NotificationChannel.NONE || !record.address) {
        return this.finish(record, 'failed', 'NoChannel', 'Recipient has no reachable channel', 'no_channel');
      }

      return this.deliver(record, record.address);
    });
  }

  /** Dispatch with at most `policy.concurrency` sends in flight. Results keep input order. */
  async dispatchAll(tasks: readonly NotificationTask[]): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];
    let next = 0;

    const worker = async () => {
      while (next < tasks.length) {
        const index = next++;
        outcomes[index] = await this.dispatch(tasks[index]);
      }
    };

    const poolSize = Math.max(1, Math.min(this.deps.policy.concurrency, tasks.length));
    await Promise.all(Array.from({ length: poolSize }, () => worker()));
    return outcomes;
  }

  /**
   * Cancel pending tasks of one tier for an incident. Tasks already being
   * sent are left to finish.
   */
  async cancelPending(incidentId: string, tier: NotificationTier): Promise<number> {
    const tasks = await this.deps.store.listTasksForIncident(incidentId, tier);
    let cancelled = 0;

    for (const task of tasks) {
      const key = `task:${task.id}`;
      if (task.status !== 'pending' || this.locks.isLocked(key)) continue;

      const done = await this.locks.run(key, async () => {
        const current = await this.deps.store.getTask(task.id);
        if (!current || current.status !== 'pending') return false;
        await this.finish(current, 'cancelled', 'Cancelled', 'Incident resolved', 'cancelled');
        return true;
      });
      if (done) cancelled++;
    }
    return cancelled;
  }

  async listFailed(): Promise<TaskRecord[]> {
    return this.deps.store.listFailedTasks();
  }

  async auditTrail(filter: { recipientId?: string; incidentId?: string } = {}): Promise<DeliveryAuditEntry[]> {
    return this.deps.store.listAudit(filter);
  }

  private async deliver(record: TaskRecord, address: string): Promise<DeliveryOutcome> {
    const { maxRetries, backoffBaseMs, timeoutMs } = this.deps.policy;
    const maxAttempts = maxRetries + 1;
    let current = record;

    while (current.attempts < maxAttempts) {
      const attempt = current.attempts + 1;
      try {
        await this.attemptSend(current, address, timeoutMs);
        return this.finish({ ...current, attempts: attempt }, 'sent', null, null, 'sent');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);

        if (err instanceof PermanentDeliveryError) {
          this.deps.logger.warn({ taskId: current.id, attempt, error: message }, 'Permanent delivery failure');
          return this.finish({ ...current, attempts: attempt }, 'failed', 'Permanent', message, 'permanent_error');
        }

        await this.audit(current, attempt, 'transient_error', message);
        current = { ...current, attempts: attempt, lastError: message, updatedAt: this.now() };

        if (attempt >= maxAttempts) {
          this.deps.logger.error({ taskId: current.id, attempts: attempt, error: message }, 'Delivery retries exhausted');
          return this.finish(current, 'failed', 'RetriesExhausted', message, null);
        }

        await this.deps.store.saveTask(current);
        const delay = backoffDelay(attempt, backoffBaseMs);
        this.deps.logger.debug({ taskId: current.id, attempt, delay }, 'Transient delivery failure, retrying');
        await this.sleep(delay);
      }
    }

    // Already out of attempts when loaded
    return this.finish(current, 'failed', 'RetriesExhausted', current.lastError, null);
  }

  /**
   * One transport call. On timeout the call is aborted and awaited before
   * returning, so the next attempt never overlaps it; a call that still
   * succeeds counts as delivered.
   */
  private async attemptSend(record: TaskRecord, address: string, timeoutMs: number): Promise<void> {
    const controller = new AbortController();
    const sending = this.deps.transport.send(
      record.recipientId,
      {
        incidentId: record.incidentId,
        channel: record.channel,
        address,
        title: record.title,
        body: record.body,
        data: { taskId: record.id, tier: record.tier },
      },
      { signal: controller.signal },
    );

    let result = await withTimeout(sending, timeoutMs);
    if (result === TIMED_OUT) {
      const timeoutMessage = `send ${record.id} timed out after ${timeoutMs}ms`;
      controller.abort();
      try {
        result = await sending;
      } catch (err) {
        this.deps.logger.debug({ taskId: record.id, err }, 'Timed-out send failed');
        throw new TransientDeliveryError(timeoutMessage);
      }
      if (result.status === 'success') {
        this.deps.logger.info({ taskId: record.id }, 'Send completed after timeout');
        return;
      }
      if (result.status === 'transient_error') {
        throw new TransientDeliveryError(timeoutMessage);
      }
    }

    switch (result.status) {
      case 'success':
        return;
      case 'permanent_error':
        throw new PermanentDeliveryError(result.error);
      case 'transient_error':
        throw new TransientDeliveryError(result.error);
    }
  }

  private async loadOrCreate(task: NotificationTask): Promise<TaskRecord> {
    const existing = await this.deps.store.getTask(task.id);
    if (existing) return existing;

    const now = this.now();
    const record: TaskRecord = {
      ...task,
      status: 'pending',
      attempts: 0,
      lastError: null,
      failureReason: null,
      createdAt: now,
      updatedAt: now,
    };
    await this.deps.store.saveTask(record);
    return record;
  }

  /** Record a terminal status. `auditResult` null means the attempt was already audited. */
  private async finish(
    record: TaskRecord,
    status: DeliveryOutcome['status'],
    failureReason: TaskRecord['failureReason'],
    error: string | null,
    auditResult: AttemptResult | null,
  ): Promise<DeliveryOutcome> {
    const final: TaskRecord = { ...record, status, failureReason, lastError: error, updatedAt: this.now() };
    await this.deps.store.saveTask(final);
    if (auditResult) {
      await this.audit(final, final.attempts, auditResult, error);
    }
    return outcomeOf(final);
  }

  private async audit(record: TaskRecord, attempt: number, result: AttemptResult, error: string | null): Promise<void> {
    await this.deps.store.appendAudit({
      recipientId: record.recipientId,
      incidentId: record.incidentId,
      taskId: record.id,
      attempt,
      result,
      error,
      at: this.now(),
    });
  }
}
