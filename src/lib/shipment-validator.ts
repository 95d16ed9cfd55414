import { DateTime } from 'luxon';
import { z } from 'zod';

import {
  ShipmentValidationError,
  type ValidationIssue,
  type ValidationIssueCode,
} from './errors.ts';
import {
  EQUIPMENT_TYPES,
  SPECIAL_SERVICES,
  type EquipmentType,
  type ExtractionConfidence,
  type ShipmentRequest,
  type SpecialService,
  type ValidationWarning,
} from './types.ts';
import type { ZipDirectory } from './zip-reference.ts';

export const MAX_WEIGHT_LBS = 80_000;
export const MAX_DIMENSION_IN = 600;
export const MAX_PIECES = 1_000;

// Above this weight an unspecified trailer is quoted as a flatbed.
const FLATBED_INFERENCE_WEIGHT_LBS = 10_000;
const DEFAULT_COMMODITY = 'general freight';
const HAZMAT_CLASSIFICATION = /(?:^|[^a-z])class[\s_-]*[1-9](?:\.\d)?|\bUN\s?\d{4}\b/i;

const ISSUE_CODES: ReadonlySet<string> = new Set<ValidationIssueCode>([
  'malformed_payload',
  'missing_field',
  'invalid_format',
  'out_of_range',
  'invalid_date',
  'date_in_past',
  'unknown_enum_value',
  'hazmat_inconsistent',
]);

export type ValidationContext = {
  zips: ZipDirectory;
  timeZone: string;
  now?: Date;
};

export type ValidationResult =
  | { ok: true; shipment: ShipmentRequest; warnings: ValidationWarning[] }
  | { ok: false; error: ShipmentValidationError };

function normalizeToken(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

const zipField = z.string().trim().regex(/^\d{5}$/, 'must be a 5-digit ZIP code');

const dimensionField = z
  .number()
  .finite()
  .positive('must be greater than 0 inches')
  .max(MAX_DIMENSION_IN, `must not exceed ${MAX_DIMENSION_IN} inches`);

function buildShipmentSchema(today: DateTime, timeZone: string) {
  const pickupDateField = z.string().transform((value, ctx) => {
    const parsed = DateTime.fromISO(value.trim(), { zone: timeZone });
    if (!parsed.isValid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${value}" is not a valid ISO date`,
        params: { code: 'invalid_date' },
      });
      return z.NEVER;
    }
    const day = parsed.startOf('day');
    if (day.toMillis() < today.toMillis()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `pickup date ${day.toISODate()} is before ${today.toISODate()}`,
        params: { code: 'date_in_past' },
      });
      return z.NEVER;
    }
    return day.toISODate() ?? value;
  });

  return z.object({
    origin_zip: zipField,
    destination_zip: zipField,
    weight_lbs: z
      .number()
      .finite()
      .positive('must be greater than 0 lbs')
      .max(MAX_WEIGHT_LBS, `must not exceed ${MAX_WEIGHT_LBS} lbs`),
    pieces: z.number().int().min(1).max(MAX_PIECES),
    dimensions: z.object({
      length: dimensionField,
      width: dimensionField,
      height: dimensionField,
    }),
    commodity: z.string().trim().max(200).nullish(),
    special_services: z
      .array(z.preprocess(normalizeToken, z.enum(SPECIAL_SERVICES)))
      .nullish(),
    equipment_type: z.preprocess(normalizeToken, z.enum(EQUIPMENT_TYPES)).nullish(),
    pickup_date: pickupDateField.nullish(),
    hazmat: z.boolean().nullish(),
    hazmat_class: z.string().trim().max(80).nullish(),
    declared_value: z.number().finite().min(0).nullish(),
  });
}

function isIssueCode(value: unknown): value is ValidationIssueCode {
  return typeof value === 'string' && ISSUE_CODES.has(value);
}

export function toValidationIssue(issue: z.ZodIssue, prefix: string[] = []): ValidationIssue {
  const field = [...prefix, ...issue.path].join('.') || '$';
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined' || issue.received === 'null') {
        return { code: 'missing_field', field, message: `${field} is required` };
      }
      if (issue.expected === 'integer' || issue.received === 'nan') {
        return { code: 'out_of_range', field, message: `must be a whole, finite number` };
      }
      return {
        code: 'invalid_format',
        field,
        message: `expected ${issue.expected}, received ${issue.received}`,
      };
    case z.ZodIssueCode.too_small:
    case z.ZodIssueCode.too_big:
    case z.ZodIssueCode.not_finite:
      return { code: 'out_of_range', field, message: issue.message };
    case z.ZodIssueCode.invalid_enum_value:
      return {
        code: 'unknown_enum_value',
        field,
        message: `"${String(issue.received)}" is not one of ${issue.options.join(', ')}`,
      };
    case z.ZodIssueCode.custom: {
      const candidate: unknown = issue.params?.code;
      return {
        code: isIssueCode(candidate) ? candidate : 'invalid_format',
        field,
        message: issue.message,
      };
    }
    default:
      return { code: 'invalid_format', field, message: issue.message };
  }
}

export function hasHazmatClassification(
  commodity: string | null | undefined,
  hazmatClass: string | null | undefined,
): boolean {
  if (typeof hazmatClass === 'string' && hazmatClass.trim().length > 0) {
    return true;
  }
  return typeof commodity === 'string' && HAZMAT_CLASSIFICATION.test(commodity);
}

export function inferEquipmentType(
  weightLbs: number,
  services: readonly SpecialService[],
): EquipmentType {
  if (weightLbs > FLATBED_INFERENCE_WEIGHT_LBS) {
    return 'flatbed';
  }
  if (services.includes('climate_control')) {
    return 'reefer';
  }
  return 'dry_van';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks a raw extracted payload and returns a frozen ShipmentRequest, or every
 * field-level problem found so the sender can be asked once for corrections.
 */
export function validateShipment(raw: unknown, context: ValidationContext): ValidationResult {
  if (!isRecord(raw)) {
    return {
      ok: false,
      error: ShipmentValidationError.malformed('shipment payload must be a JSON object'),
    };
  }

  const today = DateTime.fromJSDate(context.now ?? new Date(), {
    zone: context.timeZone,
  }).startOf('day');
  const parsed = buildShipmentSchema(today, context.timeZone).safeParse(raw);

  const issues: ValidationIssue[] = parsed.success
    ? []
    : parsed.error.issues.map((issue) => toValidationIssue(issue));

  if (
    raw.hazmat === true &&
    !hasHazmatClassification(
      typeof raw.commodity === 'string' ? raw.commodity : null,
      typeof raw.hazmat_class === 'string' ? raw.hazmat_class : null,
    )
  ) {
    issues.push({
      code: 'hazmat_inconsistent',
      field: 'hazmat_class',
      message: 'hazmat shipments need a hazmat class or a classified commodity description',
    });
  }

  if (!parsed.success || issues.length > 0) {
    return { ok: false, error: new ShipmentValidationError(issues) };
  }

  const data = parsed.data;
  const warnings: ValidationWarning[] = [];
  for (const field of ['origin_zip', 'destination_zip'] as const) {
    if (!context.zips.has(data[field])) {
      warnings.push({
        code: 'unresolvable_zip',
        field,
        message: `ZIP ${data[field]} is not in the reference directory`,
      });
    }
  }

  const services = Array.from(new Set(data.special_services ?? []));
  const commodity = data.commodity && data.commodity.length > 0 ? data.commodity : DEFAULT_COMMODITY;
  const hazmatClass = data.hazmat_class && data.hazmat_class.length > 0 ? data.hazmat_class : null;

  const shipment: ShipmentRequest = {
    origin_zip: data.origin_zip,
    destination_zip: data.destination_zip,
    weight_lbs: data.weight_lbs,
    pieces: data.pieces,
    dimensions: Object.freeze({ ...data.dimensions }),
    commodity,
    special_services: services,
    equipment_type: data.equipment_type ?? inferEquipmentType(data.weight_lbs, services),
    pickup_date: data.pickup_date ?? today.toISODate() ?? '',
    hazmat: data.hazmat ?? false,
    hazmat_class: hazmatClass,
    declared_value: data.declared_value ?? 0,
  };
  Object.freeze(shipment.special_services);

  return { ok: true, shipment: Object.freeze(shipment), warnings };
}

const confidenceScore = z.number().finite().min(0).max(1);

const confidenceSchema = z.object({
  overall: confidenceScore,
  fields: z.record(confidenceScore).nullish(),
});

export function parseConfidence(
  raw: unknown,
): { ok: true; confidence: ExtractionConfidence } | { ok: false; issues: ValidationIssue[] } {
  if (raw === undefined || raw === null) {
    return { ok: true, confidence: Object.freeze({ overall: 0, fields: {} }) };
  }
  const parsed = confidenceSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => toValidationIssue(issue, ['confidence'])),
    };
  }
  return {
    ok: true,
    confidence: Object.freeze({
      overall: parsed.data.overall,
      fields: Object.freeze({ ...(parsed.data.fields ?? {}) }),
    }),
  };
}
