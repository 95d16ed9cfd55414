import type { Quote } from './types.ts';

export type AuditEntry = {
  quote_id: string;
  actor: string;
  action: string;
  at: string;
  payload: Record<string, unknown>;
};

export type QuoteCommit = {
  quotes: Quote[];
  audit: AuditEntry[];
};

/**
 * Persistence seam for quotes. A commit lands in full or not at all; readers
 * never see a quote without its charge lines or audit entries.
 */
export interface QuoteRepository {
  get(id: string): Quote | undefined;
  commit(batch: QuoteCommit): void;
  auditFor(quoteId: string): AuditEntry[];
  count(): number;
}

export class QuoteStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuoteStoreError';
  }
}

export class InMemoryQuoteStore implements QuoteRepository {
  private readonly quotes = new Map<string, Quote>();
  private readonly audit: AuditEntry[] = [];

  get(id: string): Quote | undefined {
    const quote = this.quotes.get(id);
    return quote ? structuredClone(quote) : undefined;
  }

  commit(batch: QuoteCommit): void {
    for (const quote of batch.quotes) {
      if (quote.lines.length === 0) {
        throw new QuoteStoreError(`Quote ${quote.id} has no charge lines`);
      }
      const existing = this.quotes.get(quote.id);
      if (existing && existing.created_at !== quote.created_at) {
        throw new QuoteStoreError(`Quote id ${quote.id} is already taken`);
      }
    }

    for (const quote of batch.quotes) {
      this.quotes.set(quote.id, structuredClone(quote));
    }
    for (const entry of batch.audit) {
      this.audit.push(structuredClone(entry));
    }
  }

  auditFor(quoteId: string): AuditEntry[] {
    return this.audit
      .filter((entry) => entry.quote_id === quoteId)
      .map((entry) => structuredClone(entry));
  }

  count(): number {
    return this.quotes.size;
  }
}
