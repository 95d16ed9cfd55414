export const EQUIPMENT_TYPES = [
  'dry_van',
  'flatbed',
  'box_truck',
  'reefer',
  'step_deck',
] as const;

export type EquipmentType = (typeof EQUIPMENT_TYPES)[number];

export const SPECIAL_SERVICES = [
  'liftgate',
  'inside_delivery',
  'residential',
  'appointment',
  'limited_access',
  'climate_control',
  'notify_before_delivery',
] as const;

export type SpecialService = (typeof SPECIAL_SERVICES)[number];

export type Dimensions = {
  length: number;
  width: number;
  height: number;
};

export type ShipmentRequest = {
  origin_zip: string;
  destination_zip: string;
  weight_lbs: number;
  pieces: number;
  dimensions: Dimensions;
  commodity: string;
  special_services: SpecialService[];
  equipment_type: EquipmentType;
  pickup_date: string;
  hazmat: boolean;
  hazmat_class: string | null;
  declared_value: number;
};

export type ExtractionConfidence = {
  overall: number;
  fields: Record<string, number>;
};

export type ValidationWarning = {
  code: 'unresolvable_zip';
  field: string;
  message: string;
};

export type RouteDistance = {
  miles: number;
  duration_hours: number;
  transit_days: number;
  source: 'provider' | 'estimate';
};

export type ChargeLineKind =
  | 'base_linehaul'
  | 'weight_surcharge'
  | 'equipment_adjustment'
  | 'special_service'
  | 'hazmat_surcharge'
  | 'fuel_adjustment'
  | 'margin'
  | 'margin_floor_adjustment';

export type ChargeLine = {
  kind: ChargeLineKind;
  label: string;
  amount: number;
};

export const QUOTE_STATUSES = [
  'pending',
  'auto_approved',
  'queued_for_review',
  'approved',
  'rejected',
  'edited',
] as const;

export type QuoteStatus = (typeof QUOTE_STATUSES)[number];

export type QuoteTransition = {
  from: QuoteStatus | null;
  to: QuoteStatus;
  at: string;
  actor: string;
  note?: string;
};

export type Quote = {
  id: string;
  shipment: ShipmentRequest;
  distance: RouteDistance;
  confidence: ExtractionConfidence;
  warnings: ValidationWarning[];
  lines: ChargeLine[];
  cost_basis: number;
  total: number;
  status: QuoteStatus;
  created_at: string;
  valid_until: string;
  supersedes: string | null;
  superseded_by: string | null;
  pricing_fingerprint: string;
  history: QuoteTransition[];
};

export type ReviewPriority = 'urgent' | 'high' | 'normal';

export type ReviewDecisionKind = 'approve' | 'reject' | 'edit';

export type ReviewDecision = {
  decision: ReviewDecisionKind;
  reviewer: string;
  notes: string | null;
  decided_at: string;
  replacement_quote_id: string | null;
};

export type ReviewQueueItem = {
  id: string;
  quote_id: string;
  priority: ReviewPriority;
  reasons: string[];
  enqueued_at: string;
  claimed_by: string | null;
  claimed_at: string | null;
  decision: ReviewDecision | null;
};

export type ProviderKey = 'geocoding' | 'llm' | 'email';
