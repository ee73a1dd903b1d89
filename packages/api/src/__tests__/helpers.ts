import type { OutboundMessage, PushTransport, SendOptions, SendResult } from '@emberline/notifications';
export { silentLogger as silentLog } from '../utils/logger.js';

/**
 * Directory used across the suites.
 *
 * H1 (T1) sits at the origin with sensor S1 and occupants U1 (push), U2 (sms)
 * and U5 (no channel). H2 is ~100 m north, H3 ~300 m north in tenant T2.
 * E1 is an emergency contact ~80 m away with no house.
 */
export const DIRECTORY = {
  placements: [
    { sensorId: 'S1', houseId: 'H1', tenantId: 'T1', latitude: 10.0, longitude: 20.0 },
    { sensorId: 'S2', houseId: 'H2', tenantId: 'T1', latitude: 10.0009, longitude: 20.0 },
    { sensorId: 'S3', houseId: 'H3', tenantId: 'T2', latitude: 10.0027, longitude: 20.0 },
  ],
  recipients: [
    { id: 'U1', houseId: 'H1', tenantId: 'T1', latitude: 10.0, longitude: 20.0, pushToken: 'push-token-u1' },
    { id: 'U2', houseId: 'H1', tenantId: 'T1', latitude: 10.0, longitude: 20.0, phone: '+15550000002' },
    { id: 'U3', houseId: 'H2', tenantId: 'T1', latitude: 10.0009, longitude: 20.0, email: 'u3@example.com' },
    { id: 'U4', houseId: 'H3', tenantId: 'T2', latitude: 10.0027, longitude: 20.0, pushToken: 'push-token-u4' },
    { id: 'U5', houseId: 'H1', tenantId: 'T1', latitude: 10.0, longitude: 20.0 },
    { id: 'E1', role: 'emergency', latitude: 10.0005, longitude: 20.0005, phone: '+15550000911' },
  ],
};

export interface SentMessage {
  recipientId: string;
  message: OutboundMessage;
}

type Responder = (recipientId: string, message: OutboundMessage, signal?: AbortSignal) => Promise<SendResult>;

/**
 * Records every send. Responses can be scripted per recipient; unscripted
 * sends succeed.
 */
export class FakeTransport implements PushTransport {
  readonly sent: SentMessage[] = [];
  private scripts = new Map<string, Responder[]>();

  /** Queue responders for a recipient; each send consumes one. */
  script(recipientId: string, ...responders: Responder[]): void {
    const queue = this.scripts.get(recipientId) ?? [];
    queue.push(...responders);
    this.scripts.set(recipientId, queue);
  }

  async send(recipientId: string, message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    this.sent.push({ recipientId, message });
    const next = this.scripts.get(recipientId)?.shift();
    if (next) return next(recipientId, message, options.signal);
    return { status: 'success', providerId: `fake-${this.sent.length}` };
  }

  sentTo(recipientId: string): SentMessage[] {
    return this.sent.filter((s) => s.recipientId === recipientId);
  }
}

export const succeed: Responder = async () => ({ status: 'success', providerId: 'fake' });
export const failTransient: Responder = async () => ({ status: 'transient_error', error: 'upstream 503' });
export const failPermanent: Responder = async () => ({ status: 'permanent_error', error: 'invalid token' });
/** Settles only when aborted; trips the dispatcher timeout. */
export const hang: Responder = (_recipientId, _message, signal) =>
  new Promise<SendResult>((resolve) => {
    signal?.addEventListener('abort', () => resolve({ status: 'transient_error', error: 'aborted' }), { once: true });
  });

export function uplink(gatewayId: string, kind: string): string {
  return `uplink/${gatewayId}/${kind}`;
}
