import type { FastifyInstance } from 'fastify';
import { buildServer, type BuildServerOptions } from '../server.js';
import { getConfig } from '../config.js';
import { SqliteStore } from '../store/sqlite-store.js';
import { applyDirectorySeed, parseDirectorySeed } from '../store/seed.js';
import { FakeTransport, DIRECTORY } from './helpers.js';

export interface TestServer {
  app: FastifyInstance;
  store: SqliteStore;
  transport: FakeTransport;
}

/**
 * Build a test-ready Fastify server on an in-memory store seeded with the
 * test directory. MQTT is off, escalation uses in-process timers and the
 * dispatcher never sleeps between retries.
 * Each test suite should call this in beforeEach/beforeAll and close the app after.
 */
export async function buildTestServer(
  env: Record<string, string> = {},
  overrides: BuildServerOptions = {},
): Promise<TestServer> {
  const config = getConfig({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    STORE_PATH: ':memory:',
    TEST_HARNESS_ENABLED: 'true',
    ...env,
  });

  const store = new SqliteStore(':memory:');
  await applyDirectorySeed(store, parseDirectorySeed(DIRECTORY));
  const transport = new FakeTransport();

  const app = await buildServer({
    config,
    store,
    transport,
    sleep: async () => {},
    ...overrides,
  });
  await app.ready();
  return { app, store, transport };
}
