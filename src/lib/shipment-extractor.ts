import process from 'node:process';

import { DateTime } from 'luxon';
import { z } from 'zod';

import { ExtractionError } from './errors.ts';
import { getLogger, maskText } from './log.ts';
import { getOpenAIClient } from './openai.ts';
import type { RateLimiter } from './rate-limiter.ts';
import { EQUIPMENT_TYPES, SPECIAL_SERVICES, type ExtractionConfidence } from './types.ts';

const DEFAULT_EXTRACTION_MODEL = process.env.EXTRACTION_MODEL ?? 'gpt-4.1-mini';
const DEFAULT_MAX_WAIT_MS = 5_000;

const log = getLogger().child({ module: 'shipment_extractor' });

export type InboundEmail = {
  subject: string;
  body: string;
};

export type ExtractedShipment = {
  shipment: Record<string, unknown>;
  confidence: ExtractionConfidence;
  notes: string | null;
};

type ExtractOptions = {
  limiter: RateLimiter;
  timeZone: string;
  now?: Date;
  signal?: AbortSignal;
  maxWaitMs?: number;
};

const score = z.number().min(0).max(1);

const extractionResponseSchema = z.object({
  shipment: z.record(z.unknown()),
  confidence: z.object({
    overall: score,
    fields: z.record(score).default({}),
  }),
  notes: z.string().nullish(),
});

const extractionJsonSchema = {
  type: 'object',
  properties: {
    shipment: {
      type: 'object',
      properties: {
        origin_zip: { type: ['string', 'null'] },
        destination_zip: { type: ['string', 'null'] },
        weight_lbs: { type: ['number', 'null'] },
        pieces: { type: ['integer', 'null'] },
        dimensions: {
          type: ['object', 'null'],
          properties: {
            length: { type: 'number' },
            width: { type: 'number' },
            height: { type: 'number' },
          },
        },
        commodity: { type: ['string', 'null'] },
        special_services: { type: 'array', items: { type: 'string', enum: [...SPECIAL_SERVICES] } },
        equipment_type: { type: ['string', 'null'], enum: [...EQUIPMENT_TYPES, null] },
        pickup_date: { type: ['string', 'null'] },
        hazmat: { type: ['boolean', 'null'] },
        hazmat_class: { type: ['string', 'null'] },
        declared_value: { type: ['number', 'null'] },
      },
    },
    confidence: {
      type: 'object',
      properties: {
        overall: { type: 'number' },
        fields: { type: 'object', additionalProperties: { type: 'number' } },
      },
      required: ['overall'],
    },
    notes: { type: ['string', 'null'] },
  },
  required: ['shipment', 'confidence'],
};

function buildInstructions(today: string): string {
  return [
    'You extract freight shipment details from customer emails for an LTL quoting desk.',
    'Return only JSON matching the provided schema.',
    'Rules:',
    '- Convert all weights to lbs and all dimensions to inches (per piece).',
    '- ZIP codes are 5-digit US ZIPs.',
    `- Resolve relative pickup dates ("next Tuesday") against today, ${today}, and return YYYY-MM-DD.`,
    `- special_services use only: ${SPECIAL_SERVICES.join(', ')}.`,
    `- equipment_type uses only: ${EQUIPMENT_TYPES.join(', ')}; null when not stated.`,
    '- Set hazmat true only when the email mentions dangerous goods, and copy the class or UN number into hazmat_class.',
    '- Use null for anything the email does not say. Never guess ZIPs or weights.',
    '- confidence.overall is your confidence (0-1) that every extracted field is correct; confidence.fields scores individual fields.',
  ].join('\n');
}

// Models sometimes wrap JSON in a fenced block despite the schema.
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

export async function extractShipment(
  email: InboundEmail,
  options: ExtractOptions,
): Promise<ExtractedShipment> {
  await options.limiter.acquireOrWait('llm', {
    maxWaitMs: options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS,
    signal: options.signal,
  });

  const today =
    DateTime.fromJSDate(options.now ?? new Date(), { zone: options.timeZone }).toISODate() ?? '';

  let raw: string;
  try {
    const response = await getOpenAIClient().responses.create(
      {
        model: DEFAULT_EXTRACTION_MODEL,
        temperature: 0.1,
        input: [
          { role: 'system', content: buildInstructions(today) },
          { role: 'user', content: `Subject: ${email.subject}\n\n${email.body}` },
        ],
        text: {
          format: {
            type: 'json_schema',
            name: 'shipment_extraction',
            schema: extractionJsonSchema,
            strict: false,
          },
        },
      },
      { signal: options.signal },
    );
    raw = response.output_text;
  } catch (error) {
    log.error({ err: error }, 'Shipment extraction request failed.');
    throw new ExtractionError('Shipment extraction request failed', error);
  }

  if (!raw) {
    throw new ExtractionError('Shipment extraction returned an empty response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    log.warn({ output: maskText(raw, 'llm_output') }, 'Shipment extraction returned invalid JSON.');
    throw new ExtractionError('Shipment extraction returned invalid JSON', error);
  }

  const result = extractionResponseSchema.safeParse(parsed);
  if (!result.success) {
    log.warn(
      { issues: result.error.issues.map((issue) => issue.path.join('.')) },
      'Shipment extraction did not match the expected shape.',
    );
    throw new ExtractionError('Shipment extraction did not match the expected shape', result.error);
  }

  log.info(
    { overall_confidence: result.data.confidence.overall, fields: Object.keys(result.data.shipment) },
    'Shipment extracted from email.',
  );

  return {
    shipment: result.data.shipment,
    confidence: result.data.confidence,
    notes: result.data.notes ?? null,
  };
}
