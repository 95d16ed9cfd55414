import type { ProviderKey, QuoteStatus } from './types.ts';

export type ValidationIssueCode =
  | 'malformed_payload'
  | 'missing_field'
  | 'invalid_format'
  | 'out_of_range'
  | 'invalid_date'
  | 'date_in_past'
  | 'unknown_enum_value'
  | 'hazmat_inconsistent';

export type ValidationIssue = {
  code: ValidationIssueCode;
  field: string;
  message: string;
};

export type ResolutionErrorCode = 'distance_unavailable' | 'provider_timeout';

export class QuoteEngineError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly transient: boolean,
  ) {
    super(message);
    this.name = 'QuoteEngineError';
  }
}

export class ShipmentValidationError extends QuoteEngineError {
  constructor(readonly issues: ValidationIssue[]) {
    super(
      issues.length === 1
        ? `Shipment validation failed: ${issues[0].field} - ${issues[0].message}`
        : `Shipment validation failed with ${issues.length} issues`,
      issues.some((issue) => issue.code === 'malformed_payload')
        ? 'malformed_payload'
        : 'validation_failed',
      false,
    );
    this.name = 'ShipmentValidationError';
  }

  static malformed(message: string): ShipmentValidationError {
    return new ShipmentValidationError([
      { code: 'malformed_payload', field: '$', message },
    ]);
  }
}

export class ResolutionError extends QuoteEngineError {
  constructor(
    code: ResolutionErrorCode,
    message: string,
    readonly routeKey: string,
    readonly reason?: unknown,
  ) {
    super(message, code, true);
    this.name = 'ResolutionError';
  }
}

export class RateLimitBlockedError extends QuoteEngineError {
  constructor(
    readonly provider: ProviderKey,
    readonly retryAfterMs: number,
  ) {
    super(
      `Rate limit reached for provider "${provider}"; retry after ${retryAfterMs}ms`,
      'rate_limited',
      true,
    );
    this.name = 'RateLimitBlockedError';
  }
}

export class InvalidTransitionError extends QuoteEngineError {
  constructor(
    readonly quoteId: string,
    readonly from: QuoteStatus,
    readonly to: QuoteStatus,
  ) {
    super(
      `Quote ${quoteId} cannot move from ${from} to ${to}`,
      'invalid_transition',
      false,
    );
    this.name = 'InvalidTransitionError';
  }
}

export class ReviewQueueFullError extends QuoteEngineError {
  constructor(readonly capacity: number) {
    super(`Review queue is at capacity (${capacity})`, 'review_queue_full', true);
    this.name = 'ReviewQueueFullError';
  }
}

export class NotFoundError extends QuoteEngineError {
  constructor(entity: 'quote' | 'review_item', id: string) {
    super(`${entity} ${id} not found`, 'not_found', false);
    this.name = 'NotFoundError';
  }
}

export class ExtractionError extends QuoteEngineError {
  constructor(message: string, readonly reason?: unknown) {
    super(message, 'extraction_failed', false);
    this.name = 'ExtractionError';
  }
}
