import type { BaseLogger } from 'pino';
import { NotificationChannel } from '@emberline/core';
import { abortedResult } from './errors.js';

export interface OutboundMessage {
  incidentId: string;
  channel: NotificationChannel;
  address: string;
  title: string;
  body: string;
  data?: Record<string, string>;
}

export type SendResult =
  | { status: 'success'; providerId?: string }
  | { status: 'transient_error'; error: string }
  | { status: 'permanent_error'; error: string };

export interface SendOptions {
  /** Aborted when the caller's timeout fires. A send not yet handed to its provider is skipped. */
  signal?: AbortSignal;
}

/** External push transport consumed by the delivery dispatcher. */
export interface PushTransport {
  send(recipientId: string, message: OutboundMessage, options?: SendOptions): Promise<SendResult>;
}

export interface NotificationAdapter {
  name: string;
  send(recipientId: string, message: OutboundMessage, options?: SendOptions): Promise<SendResult>;
}

export type Logger = BaseLogger;

export { ConsoleNotificationAdapter } from './adapters/console.js';
export { TwilioSmsAdapter, type TwilioSmsConfig } from './adapters/twilio-sms.js';
export { SendGridEmailAdapter, type SendGridEmailConfig } from './adapters/sendgrid-email.js';
export { FcmPushAdapter, type FcmPushConfig } from './adapters/fcm-push.js';
export { errorCode, errorMessage, abortedResult } from './errors.js';

type Channel = Exclude<NotificationChannel, NotificationChannel.NONE>;

/**
 * Routes each message to the adapter registered for its channel, falling
 * back to the first general-purpose adapter when no channel adapter exists.
 */
export class ChannelTransport implements PushTransport {
  private adapters: NotificationAdapter[] = [];
  private channelMap: Map<Channel, NotificationAdapter> = new Map();

  register(adapter: NotificationAdapter): void {
    this.adapters.push(adapter);
  }

  registerChannel(channel: Channel, adapter: NotificationAdapter): void {
    this.channelMap.set(channel, adapter);
  }

  async send(recipientId: string, message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    if (message.channel === NotificationChannel.NONE) {
      return { status: 'permanent_error', error: 'Recipient has no reachable channel' };
    }

    const adapter = this.channelMap.get(message.channel) ?? this.adapters[0];
    if (!adapter) {
      return { status: 'permanent_error', error: `No adapter registered for channel ${message.channel}` };
    }

    if (options.signal?.aborted) {
      return abortedResult();
    }

    return adapter.send(recipientId, message, options);
  }
}
