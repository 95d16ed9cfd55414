import process from 'node:process';

import { DateTime } from 'luxon';

import type { ValidationIssue } from './errors.ts';
import { roundHalfEven } from './price-engine.ts';
import type { Quote } from './types.ts';
import type { ZipDirectory } from './zip-reference.ts';

export type GeneratedEmail = {
  subject: string;
  text: string;
};

type Signature = {
  companyName: string;
  phone?: string | null;
  email?: string | null;
};

type ReplyContext = {
  originalSubject: string;
  zips: ZipDirectory;
  timeZone: string;
  signature?: Signature;
};

const QUOTE_KEYWORDS = [
  'quote',
  'freight',
  'shipping',
  'ship',
  'transport',
  'delivery',
  'pickup',
  'pallet',
  'lbs',
  'weight',
];

const MIN_KEYWORD_MATCHES = 2;

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
});

const formatMoney = (amount: number) => currencyFormatter.format(roundHalfEven(amount));

const defaultSignature = (): Signature => ({
  companyName: process.env.COMPANY_NAME ?? 'Freight Quote Desk',
  phone: process.env.COMPANY_PHONE ?? null,
  email: process.env.EMAIL_FROM ?? null,
});

const replySubject = (subject: string) =>
  /^re:/i.test(subject.trim()) ? subject.trim() : `Re: ${subject.trim()}`;

const signatureBlock = (signature: Signature) =>
  ['Best regards,', signature.companyName, signature.phone, signature.email]
    .filter((line): line is string => typeof line === 'string' && line.length > 0)
    .join('\n');

function placeLabel(zips: ZipDirectory, zip: string): string {
  const location = zips.lookup(zip);
  return location ? `${location.city}, ${location.state} ${zip}` : zip;
}

/** Keyword screen for inbound mail; two distinct hits mark a quote request. */
export function isQuoteRequest(subject: string, body: string): boolean {
  const text = `${subject} ${body}`.toLowerCase();
  const matches = QUOTE_KEYWORDS.filter((keyword) => text.includes(keyword)).length;
  return matches >= MIN_KEYWORD_MATCHES;
}

export function buildQuoteReplyEmail(quote: Quote, context: ReplyContext): GeneratedEmail {
  const signature = context.signature ?? defaultSignature();
  const validUntil = DateTime.fromISO(quote.valid_until, { zone: context.timeZone }).toFormat(
    'LLLL d, yyyy',
  );
  const breakdown = quote.lines.map((line) => `- ${line.label}: ${formatMoney(line.amount)}`);

  const text = [
    'Hello,',
    '',
    'Thank you for your freight quote request. Your quote is below.',
    '',
    'QUOTE SUMMARY',
    `Quote ID: ${quote.id}`,
    `Route: ${placeLabel(context.zips, quote.shipment.origin_zip)} -> ${placeLabel(context.zips, quote.shipment.destination_zip)}`,
    `Equipment: ${quote.shipment.equipment_type.replaceAll('_', ' ')}`,
    `Total: ${formatMoney(quote.total)}`,
    `Transit time: ${quote.distance.transit_days} business day${quote.distance.transit_days === 1 ? '' : 's'}`,
    `Valid until: ${validUntil}`,
    '',
    'COST BREAKDOWN',
    ...breakdown,
    '',
    'To book this shipment, reply to this email with your pickup contact details.',
    '',
    signatureBlock(signature),
  ].join('\n');

  return { subject: replySubject(context.originalSubject), text };
}

export function buildReviewPendingEmail(
  quote: Quote,
  context: Pick<ReplyContext, 'originalSubject' | 'signature'>,
): GeneratedEmail {
  const signature = context.signature ?? defaultSignature();
  const text = [
    'Hello,',
    '',
    `Thank you for your freight quote request. A pricing specialist is reviewing it (reference ${quote.id}) and will follow up shortly.`,
    '',
    signatureBlock(signature),
  ].join('\n');
  return { subject: replySubject(context.originalSubject), text };
}

export function buildClarificationEmail(
  originalSubject: string,
  problems: ValidationIssue[] | string,
  signature: Signature = defaultSignature(),
): GeneratedEmail {
  const detail =
    typeof problems === 'string'
      ? [problems]
      : problems.map((issue) => `- ${issue.field}: ${issue.message}`);

  const text = [
    'Hello,',
    '',
    'Thank you for your freight quote request. We could not price it yet:',
    '',
    ...detail,
    '',
    'Please reply with:',
    '- Origin and destination ZIP codes',
    '- Total weight in pounds',
    '- Number of pieces and their dimensions in inches',
    '- Commodity description (and hazmat class, if any)',
    '- Any special services such as liftgate or appointment delivery',
    '',
    signatureBlock(signature),
  ].join('\n');

  return { subject: replySubject(originalSubject), text };
}
