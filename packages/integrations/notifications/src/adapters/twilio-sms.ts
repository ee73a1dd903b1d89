import { pino } from 'pino';
import twilio from 'twilio';
import type { Logger, NotificationAdapter, OutboundMessage, SendOptions, SendResult } from '../index.js';
import { abortedResult, errorMessage } from '../errors.js';

export interface TwilioSmsConfig {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  statusCallbackUrl?: string;
}

type TwilioClient = ReturnType<typeof twilio>;

function httpStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export class TwilioSmsAdapter implements NotificationAdapter {
  name = 'Twilio SMS';

  private client: TwilioClient | null = null;
  private fromNumber: string;
  private statusCallbackUrl?: string;

  constructor(
    config: TwilioSmsConfig,
    private readonly log: Logger = pino({ name: 'notify:twilio' }),
  ) {
    this.fromNumber = config.fromNumber || '';
    this.statusCallbackUrl = config.statusCallbackUrl;

    if (config.accountSid && config.authToken) {
      this.client = twilio(config.accountSid, config.authToken);
    } else {
      this.log.info('TWILIO_ACCOUNT_SID not set, using console fallback');
    }
  }

  async send(recipientId: string, message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    if (!this.client) {
      this.log.info({ recipientId, incidentId: message.incidentId, to: message.address }, `[SMS FALLBACK] ${message.body}`);
      return { status: 'success', providerId: 'console' };
    }

    // Provider SDKs take no signal; once the request is out it runs to completion
    if (options.signal?.aborted) return abortedResult();

    try {
      const sent = await this.client.messages.create({
        body: message.body,
        from: this.fromNumber,
        to: message.address,
        statusCallback: this.statusCallbackUrl,
      });
      return { status: 'success', providerId: sent.sid };
    } catch (err) {
      const status = httpStatus(err);
      this.log.warn({ recipientId, incidentId: message.incidentId, status }, 'Twilio send failed');
      // 4xx means the request itself was rejected (bad number, unsubscribed); 429 is throttling
      if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
        return { status: 'permanent_error', error: errorMessage(err) };
      }
      return { status: 'transient_error', error: errorMessage(err) };
    }
  }
}
