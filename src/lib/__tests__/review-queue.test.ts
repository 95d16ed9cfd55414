import { describe, expect, it } from 'vitest';

import { NotFoundError, ReviewQueueFullError } from '../errors.ts';
import { ReviewQueue } from '../review-queue.ts';
import type { ReviewDecision } from '../types.ts';
import { sequentialIds } from './fixtures.ts';

const at = (seconds: number) => new Date(Date.UTC(2026, 5, 10, 15, 0, seconds));

const approval: ReviewDecision = {
  decision: 'approve',
  reviewer: 'dana',
  notes: null,
  decided_at: '2026-06-10T16:00:00.000Z',
  replacement_quote_id: null,
};

describe('ReviewQueue', () => {
  it('orders by priority before enqueue time', () => {
    const queue = new ReviewQueue(10, sequentialIds('RV'));
    queue.enqueue({ quoteId: 'QT-1', priority: 'urgent', reasons: [], now: at(2) });
    queue.enqueue({ quoteId: 'QT-2', priority: 'high', reasons: [], now: at(1) });
    queue.enqueue({ quoteId: 'QT-3', priority: 'normal', reasons: [], now: at(0) });

    expect(queue.list().map((item) => item.priority)).toEqual(['urgent', 'high', 'normal']);
    expect(queue.claimNext('dana')?.quote_id).toBe('QT-1');
    expect(queue.claimNext('lee')?.quote_id).toBe('QT-2');
    expect(queue.claimNext('sam')?.quote_id).toBe('QT-3');
    expect(queue.claimNext('kim')).toBeNull();
  });

  it('is first-in first-out within a priority band', () => {
    const queue = new ReviewQueue(10, sequentialIds('RV'));
    queue.enqueue({ quoteId: 'QT-late', priority: 'normal', reasons: [], now: at(5) });
    queue.enqueue({ quoteId: 'QT-early', priority: 'normal', reasons: [], now: at(0) });
    queue.enqueue({ quoteId: 'QT-same-a', priority: 'high', reasons: [], now: at(3) });
    queue.enqueue({ quoteId: 'QT-same-b', priority: 'high', reasons: [], now: at(3) });

    expect(queue.list().map((item) => item.quote_id)).toEqual([
      'QT-same-a',
      'QT-same-b',
      'QT-early',
      'QT-late',
    ]);
  });

  it('refuses new items at capacity', () => {
    const queue = new ReviewQueue(2, sequentialIds('RV'));
    queue.enqueue({ quoteId: 'QT-1', priority: 'normal', reasons: [], now: at(0) });
    queue.enqueue({ quoteId: 'QT-2', priority: 'normal', reasons: [], now: at(1) });

    expect(queue.hasCapacity()).toBe(false);
    expect(() =>
      queue.enqueue({ quoteId: 'QT-3', priority: 'urgent', reasons: [], now: at(2) }),
    ).toThrow(ReviewQueueFullError);
    expect(queue.size()).toBe(2);
  });

  it('hands each item to exactly one reviewer', () => {
    const queue = new ReviewQueue(10, sequentialIds('RV'));
    queue.enqueue({ quoteId: 'QT-1', priority: 'normal', reasons: ['low confidence'], now: at(0) });

    const claimed = queue.claimNext('dana', at(10));

    expect(claimed).toMatchObject({
      id: 'RV-1',
      claimed_by: 'dana',
      claimed_at: '2026-06-10T15:00:10.000Z',
      reasons: ['low confidence'],
    });
    expect(queue.claimNext('lee')).toBeNull();
    expect(queue.list()[0].claimed_by).toBe('dana');
  });

  it('removes resolved items and keeps the decision', () => {
    const queue = new ReviewQueue(1, sequentialIds('RV'));
    const item = queue.enqueue({ quoteId: 'QT-1', priority: 'normal', reasons: [], now: at(0) });

    const resolved = queue.resolve(item.id, approval);

    expect(resolved.decision).toEqual(approval);
    expect(queue.size()).toBe(0);
    expect(queue.hasCapacity()).toBe(true);
    expect(queue.get(item.id)?.decision?.decision).toBe('approve');
    expect(queue.findByQuote('QT-1')).toBeUndefined();
    expect(() => queue.resolve(item.id, approval)).toThrow(NotFoundError);
    expect(() => queue.resolve('RV-404', approval)).toThrow('review_item RV-404 not found');
  });

  it('hands out copies so callers cannot reorder the queue', () => {
    const queue = new ReviewQueue(10, sequentialIds('RV'));
    const item = queue.enqueue({ quoteId: 'QT-1', priority: 'normal', reasons: [], now: at(0) });

    item.priority = 'urgent';

    expect(queue.get(item.id)?.priority).toBe('normal');
  });

  it('does not share reasons or decisions with callers', () => {
    const queue = new ReviewQueue(10, sequentialIds('RV'));
    const item = queue.enqueue({
      quoteId: 'QT-1',
      priority: 'high',
      reasons: ['low_confidence'],
      now: at(0),
    });

    item.reasons.push('from_enqueue');
    queue.list()[0].reasons.push('from_list');
    queue.get(item.id)?.reasons.push('from_get');
    queue.findByQuote('QT-1')?.reasons.push('from_find');
    queue.claimNext('dana')?.reasons.push('from_claim');
    expect(queue.get(item.id)?.reasons).toEqual(['low_confidence']);

    const done = queue.resolve(item.id, { ...approval, notes: 'ok' });
    done.reasons.push('from_resolve');
    if (done.decision) {
      done.decision.notes = 'changed';
    }

    expect(queue.get(item.id)).toMatchObject({
      reasons: ['low_confidence'],
      decision: { notes: 'ok' },
    });
  });
});
