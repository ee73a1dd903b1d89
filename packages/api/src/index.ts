import 'dotenv/config';
import { getConfig } from './config.js';
import { buildServer } from './server.js';
import { createLogger } from './utils/logger.js';

async function start() {
  const config = getConfig();
  const app = await buildServer({ config });

  const shutdown = (signal: string) => {
    app.log.info(`${signal} received, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(`Emberline API running on ${config.server.host}:${config.server.port}`);
  app.log.info(`Escalation scheduler: ${config.alarms.scheduler}, MQTT ingress: ${config.mqtt.enabled ? config.mqtt.url : 'disabled'}`);
}

start().catch((err) => {
  createLogger('emberline').fatal({ err }, 'Startup failed');
  process.exit(1);
});
