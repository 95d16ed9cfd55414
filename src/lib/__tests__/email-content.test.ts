import { describe, expect, it } from 'vitest';

import {
  buildClarificationEmail,
  buildQuoteReplyEmail,
  buildReviewPendingEmail,
  isQuoteRequest,
} from '../email-content.ts';
import { priceShipment } from '../price-engine.ts';
import { NOW, a1Shipment, testConfig, zips } from './fixtures.ts';

const signature = { companyName: 'Test Freight Desk', phone: '555-0100', email: 'quotes@carrier.test' };

const quote = priceShipment({
  id: 'QT-20260610-ABCD1234',
  shipment: a1Shipment,
  distance: { miles: 2000, duration_hours: 33, transit_days: 5, source: 'provider' },
  confidence: { overall: 0.95, fields: {} },
  warnings: [],
  pricing: testConfig().pricing,
  now: NOW,
});

describe('isQuoteRequest', () => {
  it('needs at least two freight keywords', () => {
    expect(isQuoteRequest('Quote request', 'Two pallets, 800 lbs, pickup Tuesday')).toBe(true);
    expect(isQuoteRequest('Freight', 'please send a quote')).toBe(true);
    expect(isQuoteRequest('Quarterly newsletter', 'See our latest quote of the month')).toBe(false);
    expect(isQuoteRequest('Lunch on Friday?', 'Are you free?')).toBe(false);
  });

  it('matches keywords regardless of case', () => {
    expect(isQuoteRequest('SHIPPING QUOTE', '')).toBe(true);
  });
});

describe('buildQuoteReplyEmail', () => {
  it('summarizes the quote with its breakdown', () => {
    const email = buildQuoteReplyEmail(quote, {
      originalSubject: 'Quote request: LA to Chicago',
      zips,
      timeZone: 'America/Chicago',
      signature,
    });
    const lines = email.text.split('\n');

    expect(email.subject).toBe('Re: Quote request: LA to Chicago');
    expect(lines).toContain('Quote ID: QT-20260610-ABCD1234');
    expect(lines).toContain('Route: Los Angeles, CA 90021 -> Chicago, IL 60601');
    expect(lines).toContain('Equipment: dry van');
    expect(lines).toContain('Total: $5,533.92');
    expect(lines).toContain('Transit time: 5 business days');
    expect(lines).toContain('Valid until: June 17, 2026');

    const breakdownStart = lines.indexOf('COST BREAKDOWN') + 1;
    expect(lines.slice(breakdownStart, breakdownStart + 5)).toEqual([
      '- Linehaul (standard tier, 2000.0 mi): $4,200.00',
      '- Weight surcharge (800 lbs): $36.00',
      '- liftgate: $75.00',
      '- Fuel (15%): $630.00',
      '- Margin: $592.92',
    ]);
    expect(lines.slice(-4)).toEqual([
      'Best regards,',
      'Test Freight Desk',
      '555-0100',
      'quotes@carrier.test',
    ]);
  });

  it('keeps an existing reply prefix and falls back to bare ZIPs', () => {
    const email = buildQuoteReplyEmail(
      { ...quote, shipment: { ...quote.shipment, destination_zip: '99999' } },
      { originalSubject: 'RE: freight quote', zips, timeZone: 'America/Chicago', signature },
    );

    expect(email.subject).toBe('RE: freight quote');
    expect(email.text.split('\n')).toContain('Route: Los Angeles, CA 90021 -> 99999');
  });

  it('uses the singular for one day in transit', () => {
    const email = buildQuoteReplyEmail(
      { ...quote, distance: { ...quote.distance, transit_days: 1 } },
      { originalSubject: 'Quote', zips, timeZone: 'America/Chicago', signature },
    );

    expect(email.text.split('\n')).toContain('Transit time: 1 business day');
  });
});

describe('buildReviewPendingEmail', () => {
  it('gives the sender a reference without a price', () => {
    const email = buildReviewPendingEmail(quote, { originalSubject: 'Quote request', signature });

    expect(email.subject).toBe('Re: Quote request');
    expect(email.text).toContain('(reference QT-20260610-ABCD1234)');
    expect(email.text).not.toContain('$');
  });
});

describe('buildClarificationEmail', () => {
  it('lists each field problem', () => {
    const email = buildClarificationEmail(
      'Quote request',
      [
        { code: 'missing_field', field: 'weight_lbs', message: 'weight_lbs is required' },
        { code: 'invalid_format', field: 'origin_zip', message: 'must be a 5-digit ZIP code' },
      ],
      signature,
    );
    const lines = email.text.split('\n');

    expect(email.subject).toBe('Re: Quote request');
    expect(lines).toContain('- weight_lbs: weight_lbs is required');
    expect(lines).toContain('- origin_zip: must be a 5-digit ZIP code');
  });

  it('takes a plain explanation', () => {
    const email = buildClarificationEmail('Quote', 'We could not read your message.', signature);

    expect(email.text.split('\n')).toContain('We could not read your message.');
  });
});
