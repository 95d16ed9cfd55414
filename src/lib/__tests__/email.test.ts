import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RateLimiter } from '../rate-limiter.ts';
import { testConfig } from './fixtures.ts';

const { sendMail, createTransport } = vi.hoisted(() => {
  const sendMail = vi.fn();
  return { sendMail, createTransport: vi.fn(() => ({ sendMail })) };
});

vi.mock('nodemailer', () => ({
  default: { createTransport },
}));

const SMTP_ENV = {
  SMTP_HOST: 'smtp.test.local',
  SMTP_PORT: '587',
  SMTP_USERNAME: 'quotes',
  SMTP_PASSWORD: 'test-secret',
  SMTP_SECURE: 'false',
  EMAIL_FROM: 'quotes@carrier.test',
};

const payload = {
  to: 'shipper@example.com',
  subject: 'Re: Quote request',
  text: 'Your quote is attached.',
  inReplyTo: '<abc123@mail.example.com>',
};

let emailModule: Awaited<typeof import('../email.ts')>;

describe('sendQuoteEmail', () => {
  beforeEach(async () => {
    vi.resetModules();
    sendMail.mockReset();
    createTransport.mockClear();
    for (const key of Object.keys(SMTP_ENV)) {
      delete process.env[key];
    }
    emailModule = await import('../email.ts');
  });

  afterEach(() => {
    for (const key of Object.keys(SMTP_ENV)) {
      delete process.env[key];
    }
  });

  it('skips sending when SMTP is not configured', async () => {
    const result = await emailModule.sendQuoteEmail(payload, new RateLimiter(testConfig().rate_limits));

    expect(result).toEqual({ sent: false, reason: 'missing_credentials' });
    expect(createTransport).not.toHaveBeenCalled();
  });

  it('sends threaded replies through the SMTP transport', async () => {
    Object.assign(process.env, SMTP_ENV);
    sendMail.mockResolvedValue({ messageId: '<sent-1@carrier.test>' });

    const result = await emailModule.sendQuoteEmail(payload, new RateLimiter(testConfig().rate_limits));

    expect(result).toEqual({ sent: true, messageId: '<sent-1@carrier.test>' });
    expect(createTransport).toHaveBeenCalledWith({
      host: 'smtp.test.local',
      port: 587,
      secure: false,
      auth: { user: 'quotes', pass: 'test-secret' },
    });
    expect(sendMail).toHaveBeenCalledWith({
      from: 'quotes@carrier.test',
      to: 'shipper@example.com',
      subject: 'Re: Quote request',
      text: 'Your quote is attached.',
      html: undefined,
      bcc: undefined,
      inReplyTo: '<abc123@mail.example.com>',
      references: '<abc123@mail.example.com>',
    });
  });

  it('refuses to send once the email bucket is empty', async () => {
    Object.assign(process.env, SMTP_ENV);
    sendMail.mockResolvedValue({ messageId: '<sent-1@carrier.test>' });
    const limiter = new RateLimiter(
      {
        ...testConfig().rate_limits,
        email: { capacity: 1, refill_tokens: 1, refill_interval_ms: 60_000 },
      },
      () => 0,
    );

    await emailModule.sendQuoteEmail(payload, limiter);

    await expect(emailModule.sendQuoteEmail(payload, limiter)).rejects.toMatchObject({
      code: 'rate_limited',
      provider: 'email',
      retryAfterMs: 60_000,
    });
    expect(sendMail).toHaveBeenCalledTimes(1);
  });

  it('propagates transport failures', async () => {
    Object.assign(process.env, SMTP_ENV);
    sendMail.mockRejectedValue(new Error('connection refused'));

    await expect(
      emailModule.sendQuoteEmail(payload, new RateLimiter(testConfig().rate_limits)),
    ).rejects.toThrow('connection refused');
  });
});
