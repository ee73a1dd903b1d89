import { NotificationChannel } from '@emberline/core';
import {
  ChannelTransport,
  ConsoleNotificationAdapter,
  FcmPushAdapter,
  SendGridEmailAdapter,
  TwilioSmsAdapter,
} from '@emberline/notifications';
import type { AppConfig } from '../config.js';
import type { Logger } from '../utils/logger.js';

/**
 * `console` logs every message; `live` wires FCM, Twilio and SendGrid per
 * channel, each falling back to console output when its credentials are unset.
 */
export function createTransport(config: AppConfig['notifications'], logger: Logger): ChannelTransport {
  const transport = new ChannelTransport();
  transport.register(new ConsoleNotificationAdapter(logger));

  if (config.adapter === 'live') {
    transport.registerChannel(NotificationChannel.PUSH, new FcmPushAdapter(config.fcm, logger));
    transport.registerChannel(NotificationChannel.SMS, new TwilioSmsAdapter(config.twilio, logger));
    transport.registerChannel(NotificationChannel.EMAIL, new SendGridEmailAdapter(config.sendgrid, logger));
  }

  logger.info(`Notification transport: ${config.adapter}`);
  return transport;
}
