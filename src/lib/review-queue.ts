import { randomUUID } from 'node:crypto';

import { PRIORITY_RANK } from './confidence-router.ts';
import { NotFoundError, ReviewQueueFullError } from './errors.ts';
import { getLogger } from './log.ts';
import type { ReviewDecision, ReviewPriority, ReviewQueueItem } from './types.ts';

type QueueEntry = {
  item: ReviewQueueItem;
  enqueuedMs: number;
  sequence: number;
};

export type EnqueueInput = {
  quoteId: string;
  priority: ReviewPriority;
  reasons: string[];
  now: Date;
};

const log = getLogger().child({ module: 'review_queue' });

// Callers get detached copies; queue entries are only changed in place here.
function copyItem(item: ReviewQueueItem): ReviewQueueItem {
  return {
    ...item,
    reasons: [...item.reasons],
    decision: item.decision ? { ...item.decision } : null,
  };
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return (
    PRIORITY_RANK[b.item.priority] - PRIORITY_RANK[a.item.priority] ||
    a.enqueuedMs - b.enqueuedMs ||
    a.sequence - b.sequence
  );
}

/**
 * Bounded review queue ordered by priority, then enqueue time. All mutations
 * are synchronous, so a claim hands an item to exactly one reviewer.
 */
export class ReviewQueue {
  private readonly pending = new Map<string, QueueEntry>();
  private readonly resolved = new Map<string, ReviewQueueItem>();
  private sequence = 0;

  constructor(
    private readonly capacity: number,
    private readonly newId: () => string = () => `RV-${randomUUID()}`,
  ) {}

  size(): number {
    return this.pending.size;
  }

  hasCapacity(): boolean {
    return this.pending.size < this.capacity;
  }

  enqueue(input: EnqueueInput): ReviewQueueItem {
    if (!this.hasCapacity()) {
      log.warn({ capacity: this.capacity, quote_id: input.quoteId }, 'Review queue is full.');
      throw new ReviewQueueFullError(this.capacity);
    }

    const item: ReviewQueueItem = {
      id: this.newId(),
      quote_id: input.quoteId,
      priority: input.priority,
      reasons: [...input.reasons],
      enqueued_at: input.now.toISOString(),
      claimed_by: null,
      claimed_at: null,
      decision: null,
    };
    this.sequence += 1;
    this.pending.set(item.id, {
      item,
      enqueuedMs: input.now.getTime(),
      sequence: this.sequence,
    });
    log.info(
      { review_id: item.id, quote_id: item.quote_id, priority: item.priority },
      'Quote queued for review.',
    );
    return copyItem(item);
  }

  list(): ReviewQueueItem[] {
    return this.ordered().map((entry) => copyItem(entry.item));
  }

  get(id: string): ReviewQueueItem | undefined {
    const entry = this.pending.get(id);
    if (entry) {
      return copyItem(entry.item);
    }
    const done = this.resolved.get(id);
    return done ? copyItem(done) : undefined;
  }

  findByQuote(quoteId: string): ReviewQueueItem | undefined {
    for (const entry of this.pending.values()) {
      if (entry.item.quote_id === quoteId) {
        return copyItem(entry.item);
      }
    }
    return undefined;
  }

  claimNext(reviewer: string, now: Date = new Date()): ReviewQueueItem | null {
    const next = this.ordered().find((entry) => entry.item.claimed_by === null);
    if (!next) {
      return null;
    }
    next.item = { ...next.item, claimed_by: reviewer, claimed_at: now.toISOString() };
    log.info({ review_id: next.item.id, reviewer }, 'Review item claimed.');
    return copyItem(next.item);
  }

  resolve(id: string, decision: ReviewDecision): ReviewQueueItem {
    const entry = this.pending.get(id);
    if (!entry) {
      throw new NotFoundError('review_item', id);
    }
    this.pending.delete(id);
    const done: ReviewQueueItem = { ...entry.item, decision: { ...decision } };
    this.resolved.set(id, done);
    return copyItem(done);
  }

  private ordered(): QueueEntry[] {
    return Array.from(this.pending.values()).sort(compareEntries);
  }
}
