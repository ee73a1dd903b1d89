import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pino } from 'pino';
import { NotificationChannel } from '@emberline/core';
import { TwilioSmsAdapter } from '../adapters/twilio-sms.js';
import type { OutboundMessage } from '../index.js';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('twilio', () => ({
  default: () => ({ messages: { create } }),
}));

const silent = pino({ level: 'silent' });

const sms: OutboundMessage = {
  incidentId: 'inc-1',
  channel: NotificationChannel.SMS,
  address: '+15550000002',
  title: 'FIRE ALARM (high)',
  body: 'FIRE ALARM (high): detector S1 at house H1.',
};

function providerError(status: number): Error {
  return Object.assign(new Error(`provider returned ${status}`), { status });
}

describe('TwilioSmsAdapter', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('falls back to logging without credentials', async () => {
    const adapter = new TwilioSmsAdapter({}, silent);
    expect(await adapter.send('U2', sms)).toEqual({ status: 'success', providerId: 'console' });
    expect(create).not.toHaveBeenCalled();
  });

  describe('with credentials', () => {
    const config = { accountSid: 'test-sid', authToken: 'test-secret', fromNumber: '+15550000000' };

    it('sends and returns the message sid', async () => {
      create.mockResolvedValue({ sid: 'SM-test-1' });
      const adapter = new TwilioSmsAdapter(config, silent);

      expect(await adapter.send('U2', sms)).toEqual({ status: 'success', providerId: 'SM-test-1' });
      expect(create).toHaveBeenCalledWith({
        body: sms.body,
        from: '+15550000000',
        to: '+15550000002',
        statusCallback: undefined,
      });
    });

    it('treats a rejected request as permanent', async () => {
      create.mockRejectedValue(providerError(400));
      const adapter = new TwilioSmsAdapter(config, silent);

      expect(await adapter.send('U2', sms)).toEqual({ status: 'permanent_error', error: 'provider returned 400' });
    });

    it('treats throttling and server errors as transient', async () => {
      const adapter = new TwilioSmsAdapter(config, silent);

      create.mockRejectedValueOnce(providerError(429));
      expect((await adapter.send('U2', sms)).status).toBe('transient_error');

      create.mockRejectedValueOnce(providerError(503));
      expect((await adapter.send('U2', sms)).status).toBe('transient_error');

      create.mockRejectedValueOnce(new Error('ECONNRESET'));
      expect((await adapter.send('U2', sms)).status).toBe('transient_error');
    });

    it('does not call the provider after an abort', async () => {
      const adapter = new TwilioSmsAdapter(config, silent);
      const controller = new AbortController();
      controller.abort();

      expect(await adapter.send('U2', sms, { signal: controller.signal })).toEqual({
        status: 'transient_error',
        error: 'Send aborted',
      });
      expect(create).not.toHaveBeenCalled();
    });
  });
});
