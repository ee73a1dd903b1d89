import { pino } from 'pino';
import type { Logger, NotificationAdapter, OutboundMessage, SendResult } from '../index.js';

export class ConsoleNotificationAdapter implements NotificationAdapter {
  name = 'Console (Dev)';

  constructor(private readonly log: Logger = pino({ name: 'notify:console' })) {}

  async send(recipientId: string, message: OutboundMessage): Promise<SendResult> {
    this.log.info(
      {
        recipientId,
        incidentId: message.incidentId,
        channel: message.channel,
        address: message.address,
        title: message.title,
      },
      message.body,
    );

    return { status: 'success', providerId: 'console' };
  }
}
