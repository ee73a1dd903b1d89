import { pino } from 'pino';
import sgMail from '@sendgrid/mail';
import type { Logger, NotificationAdapter, OutboundMessage, SendOptions, SendResult } from '../index.js';
import { abortedResult, errorCode, errorMessage } from '../errors.js';

export interface SendGridEmailConfig {
  apiKey?: string;
  fromEmail?: string;
}

const HTML_ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

function escapeHtml(input: string): string {
  return input.replace(/[&<>"']/g, (char) => HTML_ENTITY_MAP[char] || char);
}

export class SendGridEmailAdapter implements NotificationAdapter {
  name = 'SendGrid Email';

  private enabled = false;
  private fromEmail: string;

  constructor(
    config: SendGridEmailConfig,
    private readonly log: Logger = pino({ name: 'notify:sendgrid' }),
  ) {
    this.fromEmail = config.fromEmail || 'alerts@emberline.invalid';

    if (config.apiKey) {
      sgMail.setApiKey(config.apiKey);
      this.enabled = true;
    } else {
      this.log.info('SENDGRID_API_KEY not set, using console fallback');
    }
  }

  async send(recipientId: string, message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    if (!this.enabled) {
      this.log.info({ recipientId, incidentId: message.incidentId, to: message.address, subject: message.title }, '[EMAIL FALLBACK]');
      return { status: 'success', providerId: 'console' };
    }

    // Provider SDKs take no signal; once the request is out it runs to completion
    if (options.signal?.aborted) return abortedResult();

    try {
      const [response] = await sgMail.send({
        to: message.address,
        from: this.fromEmail,
        subject: message.title,
        text: message.body,
        html: `<div style="font-family:sans-serif;padding:20px">
            <h2 style="color:#dc2626">${escapeHtml(message.title)}</h2>
            <p style="white-space:pre-line">${escapeHtml(message.body)}</p>
            <p style="color:#6b7280;font-size:12px">Incident: ${escapeHtml(message.incidentId)}</p>
          </div>`,
      });
      const messageId = response.headers['x-message-id'];
      return { status: 'success', providerId: typeof messageId === 'string' ? messageId : undefined };
    } catch (err) {
      const code = errorCode(err);
      this.log.warn({ recipientId, incidentId: message.incidentId, code }, 'SendGrid send failed');
      if (typeof code === 'number' && code >= 400 && code < 500 && code !== 429) {
        return { status: 'permanent_error', error: errorMessage(err) };
      }
      return { status: 'transient_error', error: errorMessage(err) };
    }
  }
}
