import { pino, type BaseLogger } from 'pino';

export type Logger = BaseLogger;

/**
 * Standalone logger for code running outside a Fastify instance
 * (workers, scripts). Inside the server, services get `app.log`.
 */
export function createLogger(name: string, level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({ name, level });
}

export const silentLogger: Logger = pino({ level: 'silent' });
