import { ConfigError } from './errors.js';

type Env = Record<string, string | undefined>;

export type EscalationSchedulerKind = 'timer' | 'bullmq';
export type NotificationAdapterMode = 'console' | 'live';

export interface AppConfig {
  server: {
    port: number;
    host: string;
    logLevel: string;
    production: boolean;
    /** pino-pretty output; off in production and under test. */
    prettyLogs: boolean;
    /** Allowed CORS origins; unset allows all outside production. */
    corsOrigins?: string[];
  };
  store: {
    path: string;
    directorySeedFile?: string;
  };
  mqtt: {
    enabled: boolean;
    url: string;
    username?: string;
    password?: string;
  };
  devices: {
    stalenessWindowMs: number;
    sweepIntervalMs: number;
  };
  alarms: {
    ackTimeoutMs: number;
    scheduler: EscalationSchedulerKind;
    redisUrl: string;
  };
  routing: {
    baseRadiusMeters: number;
    escalationMultiplier: number;
  };
  dispatch: {
    maxRetries: number;
    backoffBaseMs: number;
    timeoutMs: number;
    concurrency: number;
  };
  realtime: {
    queueDepth: number;
  };
  notifications: {
    adapter: NotificationAdapterMode;
    twilio: {
      accountSid?: string;
      authToken?: string;
      fromNumber?: string;
    };
    sendgrid: {
      apiKey?: string;
      fromEmail?: string;
    };
    fcm: {
      projectId?: string;
      credentials?: string;
    };
  };
  testHarness: {
    enabled: boolean;
  };
}

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

function readNumber(env: Env, name: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!NUMBER_PATTERN.test(raw.trim())) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  const value = Number(raw);
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigError(`${name} must be >= ${opts.min}, got ${value}`);
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const match = choices.find((c) => c === raw);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function getConfig(env: Env = process.env): AppConfig {
  return {
    server: {
      port: readNumber(env, 'PORT', 3000, { integer: true, min: 0 }),
      host: env.HOST || '0.0.0.0',
      logLevel: env.LOG_LEVEL || 'info',
      production: env.NODE_ENV === 'production',
      prettyLogs: env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test',
      corsOrigins: env.CORS_ORIGINS ? env.CORS_ORIGINS.split(',').map((o) => o.trim()) : undefined,
    },
    store: {
      path: env.STORE_PATH || 'emberline.db',
      directorySeedFile: env.DIRECTORY_SEED_FILE || undefined,
    },
    mqtt: {
      enabled: env.MQTT_ENABLED === 'true',
      url: env.MQTT_URL || 'mqtt://localhost:1883',
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
    },
    devices: {
      stalenessWindowMs: readNumber(env, 'HEARTBEAT_STALENESS_MS', 300_000, { integer: true, min: 1 }),
      sweepIntervalMs: readNumber(env, 'STALENESS_SWEEP_INTERVAL_MS', 30_000, { integer: true, min: 1 }),
    },
    alarms: {
      ackTimeoutMs: readNumber(env, 'ACK_TIMEOUT_MS', 60_000, { integer: true, min: 1 }),
      scheduler: readChoice(env, 'ESCALATION_SCHEDULER', ['timer', 'bullmq'], 'timer'),
      redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    },
    routing: {
      baseRadiusMeters: readNumber(env, 'NOTIFY_BASE_RADIUS_METERS', 200, { min: 0 }),
      escalationMultiplier: readNumber(env, 'NOTIFY_ESCALATION_MULTIPLIER', 2, { min: 1 }),
    },
    dispatch: {
      maxRetries: readNumber(env, 'DISPATCH_MAX_RETRIES', 3, { integer: true, min: 0 }),
      backoffBaseMs: readNumber(env, 'DISPATCH_BACKOFF_BASE_MS', 1000, { integer: true, min: 0 }),
      timeoutMs: readNumber(env, 'DISPATCH_TIMEOUT_MS', 10_000, { integer: true, min: 1 }),
      concurrency: readNumber(env, 'DISPATCH_CONCURRENCY', 5, { integer: true, min: 1 }),
    },
    realtime: {
      queueDepth: readNumber(env, 'REALTIME_QUEUE_DEPTH', 64, { integer: true, min: 1 }),
    },
    notifications: {
      adapter: readChoice(env, 'NOTIFICATION_ADAPTER', ['console', 'live'], 'console'),
      twilio: {
        accountSid: env.TWILIO_ACCOUNT_SID,
        authToken: env.TWILIO_AUTH_TOKEN,
        fromNumber: env.TWILIO_FROM_NUMBER,
      },
      sendgrid: {
        apiKey: env.SENDGRID_API_KEY,
        fromEmail: env.SENDGRID_FROM_EMAIL,
      },
      fcm: {
        projectId: env.FCM_PROJECT_ID,
        credentials: env.GOOGLE_APPLICATION_CREDENTIALS,
      },
    },
    testHarness: {
      enabled: env.TEST_HARNESS_ENABLED === 'true',
    },
  };
}
