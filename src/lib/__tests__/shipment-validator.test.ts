import { describe, expect, it } from 'vitest';

import {
  hasHazmatClassification,
  parseConfidence,
  validateShipment,
} from '../shipment-validator.ts';
import { NOW, PICKUP_DATE, a1Payload, zips } from './fixtures.ts';

const context = { zips, timeZone: 'America/Chicago', now: NOW };

function issuesOf(raw: unknown) {
  const result = validateShipment(raw, context);
  if (result.ok) {
    throw new Error('expected validation to fail');
  }
  return result.error.issues.map(({ field, code }) => ({ field, code }));
}

describe('validateShipment', () => {
  it('accepts a complete shipment and freezes it', () => {
    const result = validateShipment(a1Payload(), context);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.warnings).toEqual([]);
    expect(result.shipment).toEqual({
      origin_zip: '90021',
      destination_zip: '60601',
      weight_lbs: 800,
      pieces: 2,
      dimensions: { length: 48, width: 40, height: 60 },
      commodity: 'electronics',
      special_services: ['liftgate'],
      equipment_type: 'dry_van',
      pickup_date: PICKUP_DATE,
      hazmat: false,
      hazmat_class: null,
      declared_value: 50000,
    });
    expect(Object.isFrozen(result.shipment)).toBe(true);
    expect(Object.isFrozen(result.shipment.dimensions)).toBe(true);
    expect(Object.isFrozen(result.shipment.special_services)).toBe(true);
  });

  it('normalizes tokens and fills defaults', () => {
    const result = validateShipment(
      {
        origin_zip: ' 90021 ',
        destination_zip: '60601',
        weight_lbs: 800,
        pieces: 2,
        dimensions: { length: 48, width: 40, height: 60 },
        special_services: ['Liftgate', 'inside delivery', 'liftgate'],
        equipment_type: 'Dry Van',
      },
      context,
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.shipment.origin_zip).toBe('90021');
    expect(result.shipment.special_services).toEqual(['liftgate', 'inside_delivery']);
    expect(result.shipment.equipment_type).toBe('dry_van');
    expect(result.shipment.pickup_date).toBe('2026-06-10');
    expect(result.shipment.commodity).toBe('general freight');
    expect(result.shipment.hazmat).toBe(false);
    expect(result.shipment.declared_value).toBe(0);
  });

  it('infers equipment when none is given', () => {
    const heavy = validateShipment(a1Payload({ equipment_type: undefined, weight_lbs: 12000 }), context);
    const cold = validateShipment(
      a1Payload({ equipment_type: null, special_services: ['climate_control'] }),
      context,
    );
    const plain = validateShipment(a1Payload({ equipment_type: undefined }), context);

    expect(heavy.ok && heavy.shipment.equipment_type).toBe('flatbed');
    expect(cold.ok && cold.shipment.equipment_type).toBe('reefer');
    expect(plain.ok && plain.shipment.equipment_type).toBe('dry_van');
  });

  it('collects every field problem instead of stopping at the first', () => {
    expect(
      issuesOf(
        a1Payload({
          origin_zip: '9002',
          weight_lbs: -5,
          pieces: 1.5,
          equipment_type: 'spaceship',
        }),
      ),
    ).toEqual([
      { field: 'origin_zip', code: 'invalid_format' },
      { field: 'weight_lbs', code: 'out_of_range' },
      { field: 'pieces', code: 'out_of_range' },
      { field: 'equipment_type', code: 'unknown_enum_value' },
    ]);
  });

  it('reports required fields that are absent', () => {
    expect(issuesOf({})).toEqual([
      { field: 'origin_zip', code: 'missing_field' },
      { field: 'destination_zip', code: 'missing_field' },
      { field: 'weight_lbs', code: 'missing_field' },
      { field: 'pieces', code: 'missing_field' },
      { field: 'dimensions', code: 'missing_field' },
    ]);
  });

  it('enforces physical bounds', () => {
    expect(issuesOf(a1Payload({ weight_lbs: 80001 }))).toEqual([
      { field: 'weight_lbs', code: 'out_of_range' },
    ]);
    expect(
      issuesOf(a1Payload({ dimensions: { length: 601, width: 40, height: 60 } })),
    ).toEqual([{ field: 'dimensions.length', code: 'out_of_range' }]);
    expect(issuesOf(a1Payload({ declared_value: -1 }))).toEqual([
      { field: 'declared_value', code: 'out_of_range' },
    ]);
  });

  it('rejects values of the wrong type', () => {
    expect(issuesOf(a1Payload({ weight_lbs: '800' }))).toEqual([
      { field: 'weight_lbs', code: 'invalid_format' },
    ]);
  });

  it('checks the pickup date against the business calendar', () => {
    expect(issuesOf(a1Payload({ pickup_date: '2026-06-09' }))).toEqual([
      { field: 'pickup_date', code: 'date_in_past' },
    ]);
    expect(issuesOf(a1Payload({ pickup_date: 'next tuesday' }))).toEqual([
      { field: 'pickup_date', code: 'invalid_date' },
    ]);

    const today = validateShipment(a1Payload({ pickup_date: '2026-06-10' }), context);
    expect(today.ok).toBe(true);
  });

  it('requires a classification on hazmat shipments', () => {
    expect(issuesOf(a1Payload({ hazmat: true, commodity: 'paint' }))).toEqual([
      { field: 'hazmat_class', code: 'hazmat_inconsistent' },
    ]);

    expect(
      validateShipment(a1Payload({ hazmat: true, commodity: 'flammable_liquid_class_3' }), context)
        .ok,
    ).toBe(true);
    expect(
      validateShipment(a1Payload({ hazmat: true, commodity: 'paint', hazmat_class: '3' }), context)
        .ok,
    ).toBe(true);
  });

  it('reports a non-object payload as malformed', () => {
    for (const raw of ['hello', [a1Payload()], null, 42]) {
      const result = validateShipment(raw, context);
      expect(result.ok).toBe(false);
      if (result.ok) continue;
      expect(result.error.code).toBe('malformed_payload');
      expect(result.error.issues).toHaveLength(1);
    }
  });

  it('warns about ZIPs outside the reference directory', () => {
    const result = validateShipment(a1Payload({ destination_zip: '99999' }), context);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.warnings).toEqual([
      {
        code: 'unresolvable_zip',
        field: 'destination_zip',
        message: 'ZIP 99999 is not in the reference directory',
      },
    ]);
  });
});

describe('hasHazmatClassification', () => {
  it('recognises class numbers and UN numbers in the commodity', () => {
    expect(hasHazmatClassification('Class 8 corrosive', null)).toBe(true);
    expect(hasHazmatClassification('UN1203 gasoline', null)).toBe(true);
    expect(hasHazmatClassification('first class electronics', null)).toBe(false);
    expect(hasHazmatClassification('electronics', '  ')).toBe(false);
  });
});

describe('parseConfidence', () => {
  it('treats a missing confidence as zero', () => {
    expect(parseConfidence(undefined)).toEqual({
      ok: true,
      confidence: { overall: 0, fields: {} },
    });
  });

  it('rejects scores outside [0, 1]', () => {
    const result = parseConfidence({ overall: 1.2 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map(({ field, code }) => ({ field, code }))).toEqual([
      { field: 'confidence.overall', code: 'out_of_range' },
    ]);
  });

  it('keeps per-field scores', () => {
    expect(parseConfidence({ overall: 0.9, fields: { weight_lbs: 0.8 } })).toEqual({
      ok: true,
      confidence: { overall: 0.9, fields: { weight_lbs: 0.8 } },
    });
  });
});
