import { pino } from 'pino';
import { applicationDefault, cert, getApp, getApps, initializeApp } from 'firebase-admin/app';
import { getMessaging, type Messaging } from 'firebase-admin/messaging';
import type { Logger, NotificationAdapter, OutboundMessage, SendOptions, SendResult } from '../index.js';
import { abortedResult, errorCode, errorMessage } from '../errors.js';

export interface FcmPushConfig {
  projectId?: string;
  /** Path to a service-account JSON file. */
  credentials?: string;
}

// Token problems will not fix themselves on retry.
const PERMANENT_CODES = new Set([
  'messaging/registration-token-not-registered',
  'messaging/invalid-registration-token',
  'messaging/invalid-argument',
  'messaging/invalid-recipient',
  'messaging/mismatched-credential',
  'messaging/payload-size-limit-exceeded',
]);

export class FcmPushAdapter implements NotificationAdapter {
  name = 'FCM Push';

  private messaging: Messaging | null = null;

  constructor(
    config: FcmPushConfig,
    private readonly log: Logger = pino({ name: 'notify:fcm' }),
  ) {
    if (config.credentials || config.projectId) {
      const app = getApps().length
        ? getApp()
        : initializeApp({
            credential: config.credentials ? cert(config.credentials) : applicationDefault(),
            projectId: config.projectId,
          });
      this.messaging = getMessaging(app);
    } else {
      this.log.info('FCM credentials not set, using console fallback');
    }
  }

  async send(recipientId: string, message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    if (!this.messaging) {
      this.log.info({ recipientId, incidentId: message.incidentId, title: message.title }, `[PUSH FALLBACK] ${message.body}`);
      return { status: 'success', providerId: 'console' };
    }

    // Provider SDKs take no signal; once the request is out it runs to completion
    if (options.signal?.aborted) return abortedResult();

    try {
      const providerId = await this.messaging.send({
        token: message.address,
        notification: {
          title: message.title,
          body: message.body,
        },
        data: {
          incidentId: message.incidentId,
          recipientId,
          ...message.data,
        },
        android: { priority: 'high' },
        apns: {
          payload: { aps: { sound: 'default', badge: 1, contentAvailable: true } },
        },
      });
      return { status: 'success', providerId };
    } catch (err) {
      const code = errorCode(err);
      this.log.warn({ recipientId, incidentId: message.incidentId, code }, 'FCM send failed');
      if (typeof code === 'string' && PERMANENT_CODES.has(code)) {
        return { status: 'permanent_error', error: `${code}: ${errorMessage(err)}` };
      }
      return { status: 'transient_error', error: errorMessage(err) };
    }
  }
}
