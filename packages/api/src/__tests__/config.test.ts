import { describe, it, expect } from 'vitest';
import { getConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('getConfig', () => {
  it('applies defaults', () => {
    const config = getConfig({});

    expect(config.server).toEqual({
      port: 3000,
      host: '0.0.0.0',
      logLevel: 'info',
      production: false,
      prettyLogs: true,
      corsOrigins: undefined,
    });
    expect(config.devices).toEqual({ stalenessWindowMs: 300_000, sweepIntervalMs: 30_000 });
    expect(config.alarms).toEqual({ ackTimeoutMs: 60_000, scheduler: 'timer', redisUrl: 'redis://localhost:6379' });
    expect(config.routing).toEqual({ baseRadiusMeters: 200, escalationMultiplier: 2 });
    expect(config.dispatch).toEqual({ maxRetries: 3, backoffBaseMs: 1000, timeoutMs: 10_000, concurrency: 5 });
    expect(config.realtime.queueDepth).toBe(64);
    expect(config.mqtt.enabled).toBe(false);
    expect(config.testHarness.enabled).toBe(false);
  });

  it('reads overrides from the environment', () => {
    const config = getConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      ACK_TIMEOUT_MS: '15000',
      ESCALATION_SCHEDULER: 'bullmq',
      NOTIFY_BASE_RADIUS_METERS: '150.5',
      DISPATCH_MAX_RETRIES: '0',
      CORS_ORIGINS: 'https://ops.example.com, https://admin.example.com',
    });

    expect(config.server.port).toBe(8080);
    expect(config.server.production).toBe(true);
    expect(config.server.prettyLogs).toBe(false);
    expect(config.alarms.ackTimeoutMs).toBe(15_000);
    expect(config.alarms.scheduler).toBe('bullmq');
    expect(config.routing.baseRadiusMeters).toBe(150.5);
    expect(config.dispatch.maxRetries).toBe(0);
    expect(config.server.corsOrigins).toEqual(['https://ops.example.com', 'https://admin.example.com']);
  });

  it('rejects non-numeric values', () => {
    expect(() => getConfig({ ACK_TIMEOUT_MS: '30s' })).toThrow(new ConfigError('ACK_TIMEOUT_MS must be a number, got "30s"'));
  });

  it('rejects fractional values for integer settings', () => {
    expect(() => getConfig({ DISPATCH_CONCURRENCY: '2.5' })).toThrow('DISPATCH_CONCURRENCY must be an integer, got "2.5"');
  });

  it('rejects values below the minimum', () => {
    expect(() => getConfig({ NOTIFY_ESCALATION_MULTIPLIER: '0.5' })).toThrow('NOTIFY_ESCALATION_MULTIPLIER must be >= 1, got 0.5');
  });

  it('rejects unknown choices', () => {
    expect(() => getConfig({ ESCALATION_SCHEDULER: 'cron' })).toThrow(
      'ESCALATION_SCHEDULER must be one of timer, bullmq, got "cron"',
    );
  });
});
