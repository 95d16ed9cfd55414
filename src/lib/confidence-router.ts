import type { RoutingConfig } from './config.ts';
import { InvalidTransitionError } from './errors.ts';
import { getLogger } from './log.ts';
import type { Quote, QuoteStatus, ReviewPriority } from './types.ts';

export type RoutingDecision =
  | { kind: 'auto_approve'; reasons: string[] }
  | { kind: 'review'; priority: ReviewPriority; reasons: string[] };

export type TransitionContext = {
  actor: string;
  at: Date;
  note?: string;
};

const log = getLogger().child({ module: 'confidence_router' });

const ALLOWED_TRANSITIONS: Record<QuoteStatus, readonly QuoteStatus[]> = {
  pending: ['auto_approved', 'queued_for_review'],
  queued_for_review: ['approved', 'rejected', 'edited'],
  auto_approved: [],
  approved: [],
  rejected: [],
  edited: [],
};

export const PRIORITY_RANK: Record<ReviewPriority, number> = {
  urgent: 3,
  high: 2,
  normal: 1,
};

export function canTransition(from: QuoteStatus, to: QuoteStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: QuoteStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

/**
 * Decides where a freshly priced quote goes. Every rule that blocks
 * auto-approval is recorded as a reason so reviewers see all of them.
 */
export function routeQuote(quote: Quote, routing: RoutingConfig): RoutingDecision {
  const { auto_approve: autoApprove, review } = routing;
  const overall = quote.confidence.overall;
  const declaredValue = quote.shipment.declared_value;
  const reasons: string[] = [];

  if (overall < autoApprove.min_confidence) {
    reasons.push(`confidence ${overall} below auto-approve floor ${autoApprove.min_confidence}`);
  }
  if (quote.total > autoApprove.max_total) {
    reasons.push(`total ${quote.total} exceeds auto-approve ceiling ${autoApprove.max_total}`);
  }
  if (declaredValue > autoApprove.max_declared_value) {
    reasons.push(
      `declared value ${declaredValue} exceeds auto-approve ceiling ${autoApprove.max_declared_value}`,
    );
  }
  if (quote.shipment.hazmat) {
    reasons.push('hazmat shipment');
  }
  for (const warning of quote.warnings) {
    reasons.push(`${warning.code}: ${warning.field}`);
  }

  if (reasons.length === 0) {
    return { kind: 'auto_approve', reasons };
  }

  let priority: ReviewPriority = 'normal';
  if (
    quote.total > review.urgent_total ||
    quote.shipment.hazmat ||
    declaredValue > review.urgent_declared_value
  ) {
    priority = 'urgent';
  } else if (overall < review.low_confidence) {
    priority = 'high';
  }

  return { kind: 'review', priority, reasons };
}

/**
 * Returns a copy of the quote in its new status with the transition appended
 * to its history. The input quote is never modified.
 */
export function applyTransition(
  quote: Quote,
  to: QuoteStatus,
  context: TransitionContext,
): Quote {
  if (!canTransition(quote.status, to)) {
    const error = new InvalidTransitionError(quote.id, quote.status, to);
    log.error(
      { quote_id: quote.id, from: quote.status, to, actor: context.actor },
      'Rejected quote state transition.',
    );
    throw error;
  }

  return {
    ...quote,
    status: to,
    history: [
      ...quote.history,
      {
        from: quote.status,
        to,
        at: context.at.toISOString(),
        actor: context.actor,
        ...(context.note ? { note: context.note } : {}),
      },
    ],
  };
}
