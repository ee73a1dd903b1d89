import fp from 'fastify-plugin';
import type { PushTransport } from '@emberline/notifications';
import type { AppConfig } from '../config.js';
import { Pipeline } from '../services/pipeline.js';

export interface PipelinePluginOptions {
  config: AppConfig;
  transport: PushTransport;
  sleep?: (ms: number) => Promise<void>;
}

export default fp<PipelinePluginOptions>(async (fastify, opts) => {
  const { config } = opts;

  const pipeline = new Pipeline({
    store: fastify.store,
    transport: opts.transport,
    scheduler: fastify.escalationScheduler,
    logger: fastify.log,
    stalenessWindowMs: config.devices.stalenessWindowMs,
    sweepIntervalMs: config.devices.sweepIntervalMs,
    ackTimeoutMs: config.alarms.ackTimeoutMs,
    routing: config.routing,
    dispatch: config.dispatch,
    queueDepth: config.realtime.queueDepth,
    sleep: opts.sleep,
  });

  fastify.decorate('pipeline', pipeline);

  fastify.addHook('onReady', async () => {
    await pipeline.start();
  });

  fastify.addHook('onClose', async () => {
    await pipeline.stop();
  });
}, { name: 'pipeline', dependencies: ['store', 'scheduler'] });
