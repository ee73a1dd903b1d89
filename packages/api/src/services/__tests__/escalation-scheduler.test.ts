import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  BullMqEscalationScheduler,
  ESCALATION_JOB,
  TimerEscalationScheduler,
  escalationJobId,
} from '../escalation-scheduler.js';
import { silentLog } from '../../__tests__/helpers.js';

describe('TimerEscalationScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires the handler once the delay elapses', async () => {
    vi.useFakeTimers();
    const scheduler = new TimerEscalationScheduler(silentLog);
    const due: string[] = [];
    scheduler.onDue(async (id) => {
      due.push(id);
    });

    await scheduler.schedule('inc-1', 30_000);
    vi.advanceTimersByTime(29_999);
    expect(due).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(due).toEqual(['inc-1']);
    expect(scheduler.pendingCount).toBe(0);
  });

  it('cancel prevents the handler from firing', async () => {
    vi.useFakeTimers();
    const scheduler = new TimerEscalationScheduler(silentLog);
    const handler = vi.fn(async () => null);
    scheduler.onDue(handler);

    await scheduler.schedule('inc-1', 1000);
    await scheduler.cancel('inc-1');
    vi.advanceTimersByTime(5000);

    expect(handler).not.toHaveBeenCalled();
  });

  it('rescheduling replaces the pending timer', async () => {
    vi.useFakeTimers();
    const scheduler = new TimerEscalationScheduler(silentLog);
    const handler = vi.fn(async () => null);
    scheduler.onDue(handler);

    await scheduler.schedule('inc-1', 1000);
    await scheduler.schedule('inc-1', 3000);
    vi.advanceTimersByTime(2000);
    expect(handler).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1000);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('close clears every timer', async () => {
    const scheduler = new TimerEscalationScheduler(silentLog);
    await scheduler.schedule('inc-1', 60_000);
    await scheduler.schedule('inc-2', 60_000);
    expect(scheduler.pendingCount).toBe(2);

    await scheduler.close();
    expect(scheduler.pendingCount).toBe(0);
  });
});

describe('BullMqEscalationScheduler', () => {
  function fakeQueue() {
    return { add: vi.fn(), remove: vi.fn(), close: vi.fn() };
  }

  it('adds a delayed job keyed by incident', async () => {
    const queue = fakeQueue();
    const scheduler = new BullMqEscalationScheduler({ queue, logger: silentLog });

    await scheduler.schedule('inc-1', 30_000);

    expect(queue.remove).toHaveBeenCalledWith('escalate:inc-1');
    expect(queue.add).toHaveBeenCalledWith(ESCALATION_JOB, { incidentId: 'inc-1' }, { delay: 30_000, jobId: escalationJobId('inc-1') });
  });

  it('removes the job on cancel', async () => {
    const queue = fakeQueue();
    const scheduler = new BullMqEscalationScheduler({ queue, logger: silentLog });

    await scheduler.cancel('inc-1');
    expect(queue.remove).toHaveBeenCalledWith('escalate:inc-1');
  });

  it('starts the worker once and closes it with the queue', async () => {
    const queue = fakeQueue();
    const closeWorker = vi.fn(async () => {});
    const startWorker = vi.fn(() => closeWorker);
    const scheduler = new BullMqEscalationScheduler({ queue, logger: silentLog, startWorker });

    scheduler.onDue(async () => null);
    scheduler.onDue(async () => null);
    await scheduler.close();

    expect(startWorker).toHaveBeenCalledTimes(1);
    expect(closeWorker).toHaveBeenCalledTimes(1);
    expect(queue.close).toHaveBeenCalledTimes(1);
  });
});
