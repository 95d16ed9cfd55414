import process from 'node:process';

import nodemailer, { type Transporter } from 'nodemailer';

import { RateLimitBlockedError } from './errors.ts';
import { getLogger, maskEmail, maskText } from './log.ts';
import type { RateLimiter } from './rate-limiter.ts';

type EmailConfig = {
  host: string;
  port: number;
  secure: boolean;
  username: string;
  password: string;
  from: string;
  bcc?: string;
};

export type EmailPayload = {
  to: string;
  subject: string;
  text: string;
  html?: string;
  inReplyTo?: string | null;
};

export type SendResult = { sent: true; messageId: string } | { sent: false; reason: string };

let cachedConfig: EmailConfig | null | undefined;
let transporter: Transporter | null = null;
const log = getLogger().child({ module: 'email' });

const getEmailConfig = (): EmailConfig | null => {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const host = process.env.SMTP_HOST;
  const port = Number.parseInt(process.env.SMTP_PORT ?? '', 10);
  const username = process.env.SMTP_USERNAME;
  const password = process.env.SMTP_PASSWORD;
  const from = process.env.EMAIL_FROM;
  const bcc = process.env.EMAIL_BCC;

  if (!host || Number.isNaN(port) || !username || !password || !from) {
    log.warn(
      {
        host_present: Boolean(host),
        port_present: !Number.isNaN(port),
        username_present: Boolean(username),
        from_present: Boolean(from),
      },
      'SMTP settings missing; quote replies will be skipped.',
    );
    cachedConfig = null;
    return cachedConfig;
  }

  const secureEnv = (process.env.SMTP_SECURE ?? 'true').toLowerCase();
  cachedConfig = {
    host,
    port,
    secure: secureEnv === 'true' || secureEnv === '1',
    username,
    password,
    from,
    bcc,
  };
  return cachedConfig;
};

const getTransporter = (config: EmailConfig): Transporter => {
  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: {
        user: config.username,
        pass: config.password,
      },
    });
  }
  return transporter;
};

/**
 * Sends a reply through SMTP, spending one token from the email bucket.
 * A blocked bucket surfaces as RateLimitBlockedError; nothing is queued.
 */
export async function sendQuoteEmail(
  payload: EmailPayload,
  limiter: RateLimiter,
): Promise<SendResult> {
  const config = getEmailConfig();
  if (!config) {
    log.info(
      {
        reason: 'missing_credentials',
        to: maskEmail(payload.to),
        subject: maskText(payload.subject, 'subject'),
      },
      'Quote email send skipped.',
    );
    return { sent: false, reason: 'missing_credentials' };
  }

  const permit = limiter.acquire('email');
  if (!permit.ok) {
    throw new RateLimitBlockedError('email', permit.retryAfterMs);
  }

  const childLog = log.child({ to: maskEmail(payload.to) });

  try {
    const info = await getTransporter(config).sendMail({
      from: config.from,
      to: payload.to,
      subject: payload.subject,
      text: payload.text,
      html: payload.html,
      bcc: config.bcc,
      ...(payload.inReplyTo
        ? { inReplyTo: payload.inReplyTo, references: payload.inReplyTo }
        : {}),
    });
    childLog.info(
      { subject: maskText(payload.subject, 'subject'), message_id: info.messageId },
      'Quote email sent.',
    );
    return { sent: true, messageId: info.messageId };
  } catch (error) {
    childLog.error(
      { err: error, subject: maskText(payload.subject, 'subject') },
      'Failed to send quote email.',
    );
    throw error;
  }
}
