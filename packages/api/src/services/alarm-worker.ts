import { Worker, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import { ESCALATION_JOB, type EscalationDueHandler } from './escalation-scheduler.js';
import type { Logger } from '../utils/logger.js';

export const ALARM_QUEUE = 'alarm-processing';

interface WorkerDeps {
  connection: Redis;
  escalateFn: EscalationDueHandler;
  logger: Logger;
  concurrency?: number;
}

interface EscalationJobData {
  incidentId: string;
}

function isEscalationJobData(data: unknown): data is EscalationJobData {
  return typeof data === 'object' && data !== null && 'incidentId' in data && typeof data.incidentId === 'string';
}

export function createAlarmWorker(deps: WorkerDeps): Worker {
  const worker = new Worker(
    ALARM_QUEUE,
    async (job: Job) => {
      switch (job.name) {
        case ESCALATION_JOB:
          await handleAutoEscalate(job, deps);
          break;
        default:
          deps.logger.warn(`Unknown job type: ${job.name}`);
      }
    },
    { connection: deps.connection, concurrency: deps.concurrency ?? 5 },
  );

  worker.on('completed', (job) => {
    deps.logger.debug(`[worker] Job ${job.name}:${job.id} completed`);
  });

  worker.on('failed', (job, err) => {
    deps.logger.error(`[worker] Job ${job?.name}:${job?.id} failed: ${err.message}`);
  });

  return worker;
}

async function handleAutoEscalate(job: Job, deps: WorkerDeps): Promise<void> {
  if (!isEscalationJobData(job.data)) {
    deps.logger.warn({ jobId: job.id }, 'auto-escalate job without incidentId');
    return;
  }
  // The engine re-checks the incident state; acknowledged or resolved incidents are left alone
  await deps.escalateFn(job.data.incidentId);
}
