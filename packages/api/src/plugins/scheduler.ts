import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import { Queue } from 'bullmq';
import { ALARM_QUEUE, createAlarmWorker } from '../services/alarm-worker.js';
import {
  BullMqEscalationScheduler,
  TimerEscalationScheduler,
  type EscalationScheduler,
} from '../services/escalation-scheduler.js';
import type { EscalationSchedulerKind } from '../config.js';

export interface SchedulerPluginOptions {
  kind: EscalationSchedulerKind;
  redisUrl: string;
  scheduler?: EscalationScheduler;
}

export default fp<SchedulerPluginOptions>(async (fastify, opts) => {
  if (opts.scheduler || opts.kind === 'timer') {
    const scheduler = opts.scheduler ?? new TimerEscalationScheduler(fastify.log);
    fastify.decorate('escalationScheduler', scheduler);
    fastify.addHook('onClose', async () => {
      await scheduler.close();
    });
    return;
  }

  fastify.log.info(`Connecting to Redis: ${opts.redisUrl.replace(/\/\/.*@/, '//***@')}`);

  const redis = new Redis(opts.redisUrl, {
    maxRetriesPerRequest: null,
    retryStrategy(times) {
      const delay = Math.min(times * 500, 5000);
      fastify.log.warn(`Redis connection retry #${times}, next in ${delay}ms`);
      return delay;
    },
  });

  redis.on('error', (err) => {
    fastify.log.error(`Redis error: ${err.message}`);
  });

  redis.on('connect', () => {
    fastify.log.info('Redis connected');
  });

  const alarmQueue = new Queue(ALARM_QUEUE, {
    connection: redis,
    defaultJobOptions: {
      removeOnComplete: 100,
      removeOnFail: 200,
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
    },
  });

  const scheduler = new BullMqEscalationScheduler({
    queue: alarmQueue,
    logger: fastify.log,
    startWorker: (handler) => {
      // Workers need their own blocking connection
      const workerConnection = redis.duplicate();
      const worker = createAlarmWorker({ connection: workerConnection, escalateFn: handler, logger: fastify.log });
      return async () => {
        await worker.close();
        workerConnection.disconnect();
      };
    },
  });

  fastify.decorate('escalationScheduler', scheduler);

  fastify.addHook('onClose', async () => {
    await scheduler.close();
    redis.disconnect();
  });
}, { name: 'scheduler' });
