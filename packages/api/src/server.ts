import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import websocket from '@fastify/websocket';
import { ZodError } from 'zod';
import type { PushTransport } from '@emberline/notifications';
import { getConfig, type AppConfig } from './config.js';

// Plugins
import storePlugin from './plugins/store.js';
import schedulerPlugin from './plugins/scheduler.js';
import pipelinePlugin from './plugins/pipeline.js';
import mqttPlugin from './plugins/mqtt.js';

// Routes
import deviceRoutes from './routes/devices.js';
import incidentRoutes from './routes/incidents.js';
import deliveryRoutes from './routes/deliveries.js';
import realtimeRoutes from './routes/realtime.js';
import testHarnessRoutes from './routes/test-harness.js';
import wsHandler from './ws/handler.js';

import { createTransport } from './services/transport.js';
import type { EscalationScheduler } from './services/escalation-scheduler.js';
import type { PipelineStore } from './store/types.js';

// Side-effect: import types for augmentation
import './types.js';

export interface BuildServerOptions {
  config?: AppConfig;
  /** Replaces the SQLite store built from config.store.path. */
  store?: PipelineStore;
  /** Replaces the transport built from config.notifications. */
  transport?: PushTransport;
  /** Replaces the scheduler selected by config.alarms.scheduler. */
  scheduler?: EscalationScheduler;
  /** Dispatcher backoff sleep. */
  sleep?: (ms: number) => Promise<void>;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();

  const app = Fastify({
    logger: {
      level: config.server.logLevel,
      ...(config.server.prettyLogs && {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss' },
        },
      }),
      serializers: {
        req(req: { method?: string; url?: string; ip?: string }) {
          return {
            method: req.method,
            url: req.url,
            remoteAddress: req.ip,
          };
        },
      },
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });

  // CORS: known origins in production, everything in dev
  await app.register(cors, { origin: config.server.corsOrigins ?? !config.server.production });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  await app.register(websocket);

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400).send({
        error: 'Validation failed',
        statusCode: 400,
        details: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      });
      return;
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      app.log.error({ err: error, url: request.url, method: request.method });
      reply.code(statusCode).send({
        error: 'Internal Server Error',
        statusCode,
      });
    } else {
      app.log.warn({ url: request.url, method: request.method, statusCode }, error.message);
      reply.code(statusCode).send({
        error: error.message,
        statusCode,
      });
    }
  });

  // Plugins
  await app.register(storePlugin, {
    path: config.store.path,
    directorySeedFile: config.store.directorySeedFile,
    store: options.store,
  });
  await app.register(schedulerPlugin, {
    kind: config.alarms.scheduler,
    redisUrl: config.alarms.redisUrl,
    scheduler: options.scheduler,
  });
  await app.register(pipelinePlugin, {
    config,
    transport: options.transport ?? createTransport(config.notifications, app.log),
    sleep: options.sleep,
  });
  if (config.mqtt.enabled) {
    await app.register(mqttPlugin, {
      url: config.mqtt.url,
      username: config.mqtt.username,
      password: config.mqtt.password,
    });
  }

  app.decorate('appConfig', config);

  // Health check endpoint
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  // Routes
  await app.register(deviceRoutes, { prefix: '/api/v1/devices' });
  await app.register(incidentRoutes, { prefix: '/api/v1/incidents' });
  await app.register(deliveryRoutes, { prefix: '/api/v1/deliveries' });
  await app.register(realtimeRoutes, { prefix: '/api/v1/realtime' });

  if (config.testHarness.enabled) {
    app.log.warn('Test harness routes enabled');
    await app.register(testHarnessRoutes, { prefix: '/api/v1/test' });
  }

  // WebSocket handler
  await app.register(wsHandler);

  return app;
}
