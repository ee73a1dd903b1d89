import type { AppConfig } from './config.js';
import type { EscalationScheduler } from './services/escalation-scheduler.js';
import type { Pipeline } from './services/pipeline.js';
import type { PipelineStore } from './store/types.js';

declare module 'fastify' {
  interface FastifyInstance {
    appConfig: AppConfig;
    store: PipelineStore;
    escalationScheduler: EscalationScheduler;
    pipeline: Pipeline;
  }
}
