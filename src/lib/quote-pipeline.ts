import { randomUUID } from 'node:crypto';

import { format } from 'date-fns';

import type { ConfigStore, QuoteConfig } from './config.ts';
import { applyTransition, routeQuote, type RoutingDecision } from './confidence-router.ts';
import type { DistanceResolver } from './distance-resolver.ts';
import {
  NotFoundError,
  ResolutionError,
  ReviewQueueFullError,
  ShipmentValidationError,
  type ValidationIssue,
} from './errors.ts';
import { getLogger } from './log.ts';
import { priceShipment } from './price-engine.ts';
import type { AuditEntry, QuoteRepository } from './quote-store.ts';
import type { ReviewQueue } from './review-queue.ts';
import { parseConfidence, validateShipment } from './shipment-validator.ts';
import type {
  ExtractionConfidence,
  Quote,
  QuoteStatus,
  ReviewDecisionKind,
  ReviewQueueItem,
  RouteDistance,
  ShipmentRequest,
  ValidationWarning,
} from './types.ts';
import type { ZipDirectory } from './zip-reference.ts';

export type QuoteOutcome =
  | { status: 'auto_approved'; quote: Quote }
  | { status: 'queued_for_review'; quote: Quote; review: ReviewQueueItem };

export type QuoteSubmission = {
  shipment: unknown;
  confidence?: unknown;
};

export type SubmitOptions = {
  actor?: string;
  signal?: AbortSignal;
};

export type ReviewerDecisionInput = {
  decision: ReviewDecisionKind;
  reviewer: string;
  notes?: string | null;
  corrected_shipment?: unknown;
  confidence?: unknown;
};

export type ReviewOutcome = {
  quote: Quote;
  review: ReviewQueueItem;
  replacement: QuoteOutcome | null;
};

export type PipelineDeps = {
  config: ConfigStore;
  zips: ZipDirectory;
  resolver: DistanceResolver;
  queue: ReviewQueue;
  store: QuoteRepository;
  now?: () => Date;
  newQuoteId?: (now: Date) => string;
};

type PreparedQuote = {
  quote: Quote;
  routing: RoutingDecision;
};

// A corrected payload has been checked field by field by a person.
const REVIEWER_CONFIDENCE: ExtractionConfidence = Object.freeze({ overall: 1, fields: {} });

const DECISION_STATUS = {
  approve: 'approved',
  reject: 'rejected',
  edit: 'edited',
} as const satisfies Record<ReviewDecisionKind, QuoteStatus>;

const log = getLogger().child({ module: 'quote_pipeline' });

export function defaultQuoteId(now: Date): string {
  return `QT-${format(now, 'yyyyMMdd')}-${randomUUID().slice(0, 8).toUpperCase()}`;
}

function auditEntry(
  quote: Quote,
  actor: string,
  action: string,
  at: Date,
  payload: Record<string, unknown> = {},
): AuditEntry {
  return { quote_id: quote.id, actor, action, at: at.toISOString(), payload };
}

/**
 * Runs validation, distance resolution, pricing and routing, then persists the
 * quote and its review item together. Nothing is stored until every step has
 * succeeded.
 */
export class QuotePipeline {
  private readonly now: () => Date;
  private readonly newQuoteId: (now: Date) => string;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newQuoteId = deps.newQuoteId ?? defaultQuoteId;
  }

  async submit(submission: QuoteSubmission, options: SubmitOptions = {}): Promise<QuoteOutcome> {
    const actor = options.actor ?? 'api';
    const config = this.deps.config.current();
    const prepared = await this.prepare(submission.shipment, submission.confidence, config, {
      actor,
      signal: options.signal,
      fallbackConfidence: null,
      supersedes: null,
    });

    if (prepared.routing.kind === 'review' && !this.deps.queue.hasCapacity()) {
      log.warn({ quote_id: prepared.quote.id }, 'Discarding quote; review queue is full.');
      throw new ReviewQueueFullError(config.review_queue.capacity);
    }

    const at = this.now();
    const routed = this.route(prepared, at);
    this.deps.store.commit({
      quotes: [routed],
      audit: [
        auditEntry(routed, actor, 'quote_created', at, {
          total: routed.total,
          fingerprint: routed.pricing_fingerprint,
        }),
        auditEntry(routed, 'router', routed.status, at, { reasons: prepared.routing.reasons }),
      ],
    });

    return this.finish(routed, prepared.routing, at);
  }

  getQuote(id: string): Quote {
    const quote = this.deps.store.get(id);
    if (!quote) {
      throw new NotFoundError('quote', id);
    }
    return quote;
  }

  auditFor(id: string): AuditEntry[] {
    this.getQuote(id);
    return this.deps.store.auditFor(id);
  }

  getReviewItem(id: string): ReviewQueueItem {
    const item = this.deps.queue.get(id);
    if (!item) {
      throw new NotFoundError('review_item', id);
    }
    return item;
  }

  async decide(
    reviewId: string,
    input: ReviewerDecisionInput,
    options: Pick<SubmitOptions, 'signal'> = {},
  ): Promise<ReviewOutcome> {
    const item = this.getReviewItem(reviewId);
    const quote = this.getQuote(item.quote_id);
    const notes = input.notes ?? null;

    const corrected = input.corrected_shipment;
    // An edit without a corrected shipment closes the quote with no replacement.
    if (input.decision !== 'edit' || corrected === undefined || corrected === null) {
      const target = DECISION_STATUS[input.decision];
      const at = this.now();
      const updated = applyTransition(quote, target, {
        actor: input.reviewer,
        at,
        note: notes ?? undefined,
      });
      this.deps.store.commit({
        quotes: [updated],
        audit: [auditEntry(updated, input.reviewer, target, at, { review_id: reviewId, notes })],
      });
      const review = this.deps.queue.resolve(reviewId, {
        decision: input.decision,
        reviewer: input.reviewer,
        notes,
        decided_at: at.toISOString(),
        replacement_quote_id: null,
      });
      log.info({ quote_id: quote.id, review_id: reviewId, decision: target }, 'Review decided.');
      return { quote: updated, review, replacement: null };
    }

    // Fails fast when the quote can no longer be edited, before any repricing.
    applyTransition(quote, 'edited', { actor: input.reviewer, at: this.now() });

    const config = this.deps.config.current();
    const prepared = await this.prepare(corrected, input.confidence, config, {
      actor: input.reviewer,
      signal: options.signal,
      fallbackConfidence: REVIEWER_CONFIDENCE,
      supersedes: quote.id,
    });

    // Another decision may have landed while the replacement was priced.
    const current = this.getQuote(quote.id);
    const at = this.now();
    const replacement = this.route(prepared, at);
    const edited: Quote = {
      ...applyTransition(current, 'edited', { actor: input.reviewer, at, note: notes ?? undefined }),
      superseded_by: replacement.id,
    };

    this.deps.store.commit({
      quotes: [edited, replacement],
      audit: [
        auditEntry(edited, input.reviewer, 'edited', at, {
          review_id: reviewId,
          replacement_quote_id: replacement.id,
          notes,
        }),
        auditEntry(replacement, input.reviewer, 'quote_created', at, {
          total: replacement.total,
          supersedes: quote.id,
          fingerprint: replacement.pricing_fingerprint,
        }),
        auditEntry(replacement, 'router', replacement.status, at, {
          reasons: prepared.routing.reasons,
        }),
      ],
    });

    // Resolving first frees the slot the replacement may need.
    const review = this.deps.queue.resolve(reviewId, {
      decision: 'edit',
      reviewer: input.reviewer,
      notes,
      decided_at: at.toISOString(),
      replacement_quote_id: replacement.id,
    });
    log.info(
      { quote_id: quote.id, review_id: reviewId, replacement_quote_id: replacement.id },
      'Quote edited by reviewer.',
    );

    return {
      quote: edited,
      review,
      replacement: this.finish(replacement, prepared.routing, at),
    };
  }

  private async prepare(
    rawShipment: unknown,
    rawConfidence: unknown,
    config: QuoteConfig,
    options: {
      actor: string;
      signal?: AbortSignal;
      fallbackConfidence: ExtractionConfidence | null;
      supersedes: string | null;
    },
  ): Promise<PreparedQuote> {
    const now = this.now();
    const validation = validateShipment(rawShipment, {
      zips: this.deps.zips,
      timeZone: config.business_time_zone,
      now,
    });
    const confidence =
      (rawConfidence === undefined || rawConfidence === null) && options.fallbackConfidence
        ? { ok: true as const, confidence: options.fallbackConfidence }
        : parseConfidence(rawConfidence);

    const issues: ValidationIssue[] = [
      ...(validation.ok ? [] : validation.error.issues),
      ...(confidence.ok ? [] : confidence.issues),
    ];
    if (!validation.ok || !confidence.ok) {
      log.info(
        { issues: issues.map((issue) => `${issue.field}:${issue.code}`) },
        'Shipment rejected by validation.',
      );
      throw new ShipmentValidationError(issues);
    }

    const distance = await this.resolveDistance(
      validation.shipment,
      validation.warnings,
      options.signal,
    );

    const quote = priceShipment({
      id: this.newQuoteId(now),
      shipment: validation.shipment,
      distance,
      confidence: confidence.confidence,
      warnings: validation.warnings,
      pricing: config.pricing,
      now,
      supersedes: options.supersedes,
      actor: options.actor,
    });

    return { quote, routing: routeQuote(quote, config.routing) };
  }

  private async resolveDistance(
    shipment: ShipmentRequest,
    warnings: ValidationWarning[],
    signal?: AbortSignal,
  ): Promise<RouteDistance> {
    try {
      return await this.deps.resolver.resolve(shipment.origin_zip, shipment.destination_zip, {
        signal,
      });
    } catch (error) {
      const unresolvable = warnings.some((warning) => warning.code === 'unresolvable_zip');
      if (error instanceof ResolutionError && error.code === 'distance_unavailable' && unresolvable) {
        log.warn(
          { route: error.routeKey },
          'Using fallback distance estimate for an unresolvable ZIP.',
        );
        return this.deps.resolver.estimate();
      }
      throw error;
    }
  }

  private route(prepared: PreparedQuote, at: Date): Quote {
    const target =
      prepared.routing.kind === 'auto_approve' ? 'auto_approved' : 'queued_for_review';
    return applyTransition(prepared.quote, target, {
      actor: 'router',
      at,
      note: prepared.routing.reasons.length ? prepared.routing.reasons.join('; ') : undefined,
    });
  }

  private finish(quote: Quote, routing: RoutingDecision, at: Date): QuoteOutcome {
    if (routing.kind === 'auto_approve') {
      log.info({ quote_id: quote.id, total: quote.total }, 'Quote auto-approved.');
      return { status: 'auto_approved', quote };
    }
    const review = this.deps.queue.enqueue({
      quoteId: quote.id,
      priority: routing.priority,
      reasons: routing.reasons,
      now: at,
    });
    return { status: 'queued_for_review', quote, review };
  }
}
