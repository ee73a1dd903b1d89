import { randomBytes } from 'node:crypto';
import fp from 'fastify-plugin';
import { connect, type IClientOptions } from 'mqtt';

export const UPLINK_SUBSCRIPTION = 'uplink/+/+';

export interface MqttPluginOptions {
  url: string;
  username?: string;
  password?: string;
}

export default fp<MqttPluginOptions>(async (fastify, opts) => {
  const clientId = `emberline_${process.pid}_${randomBytes(4).toString('hex')}`;
  const clientOptions: IClientOptions = {
    clientId,
    username: opts.username,
    password: opts.password,
    keepalive: 30,
    reconnectPeriod: 2000,
    clean: true,
  };

  fastify.log.info(`MQTT connecting to ${opts.url} as ${clientId}`);
  const client = connect(opts.url, clientOptions);

  client.on('connect', () => {
    fastify.log.info('MQTT connected');
    client.subscribe(UPLINK_SUBSCRIPTION, { qos: 1 }, (err) => {
      if (err) {
        fastify.log.error(`Subscribe error on "${UPLINK_SUBSCRIPTION}": ${err.message}`);
        return;
      }
      fastify.log.info(`Subscribed to ${UPLINK_SUBSCRIPTION}`);
    });
  });

  client.on('reconnect', () => {
    fastify.log.warn('MQTT reconnecting');
  });

  client.on('error', (err) => {
    fastify.log.error(`MQTT error: ${err.message}`);
  });

  client.on('close', () => {
    fastify.log.warn('MQTT connection closed');
  });

  client.on('message', (topic, payload) => {
    fastify.pipeline.ingest(topic, payload).catch((err) => {
      fastify.log.error({ err, topic }, 'Uplink ingest failed');
    });
  });

  fastify.addHook('onClose', async () => {
    client.removeAllListeners('message');
    await client.endAsync();
  });
}, { name: 'mqtt', dependencies: ['pipeline'] });
