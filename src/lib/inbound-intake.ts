import type { ConfigStore } from './config.ts';
import { sendQuoteEmail, type EmailPayload, type SendResult } from './email.ts';
import {
  buildClarificationEmail,
  buildQuoteReplyEmail,
  buildReviewPendingEmail,
  isQuoteRequest,
} from './email-content.ts';
import { ExtractionError, ShipmentValidationError, type ValidationIssue } from './errors.ts';
import { getLogger, maskEmail } from './log.ts';
import type { QuotePipeline } from './quote-pipeline.ts';
import type { RateLimiter } from './rate-limiter.ts';
import { extractShipment, type ExtractedShipment, type InboundEmail } from './shipment-extractor.ts';
import type { ZipDirectory } from './zip-reference.ts';

export type InboundMessage = InboundEmail & {
  from: string;
  message_id?: string | null;
};

export type IntakeOutcome =
  | { status: 'ignored'; reason: 'not_a_quote_request' }
  | {
      status: 'needs_clarification';
      reason: 'extraction_failed' | 'validation_failed';
      issues: ValidationIssue[];
      email_sent: boolean;
    }
  | {
      status: 'auto_approved' | 'queued_for_review';
      quote_id: string;
      review_id: string | null;
      email_sent: boolean;
    };

export type IntakeDeps = {
  pipeline: QuotePipeline;
  limiter: RateLimiter;
  config: ConfigStore;
  zips: ZipDirectory;
  extract?: (email: InboundEmail, options: Parameters<typeof extractShipment>[1]) => Promise<ExtractedShipment>;
  send?: (payload: EmailPayload, limiter: RateLimiter) => Promise<SendResult>;
};

const log = getLogger().child({ module: 'inbound_intake' });

/**
 * Email entry point: screen, extract, quote, reply. Errors that leave no quote
 * behind (resolution, rate limits, a full queue) propagate so the sender retries.
 */
export class InboundIntake {
  private readonly extract: NonNullable<IntakeDeps['extract']>;
  private readonly send: NonNullable<IntakeDeps['send']>;

  constructor(private readonly deps: IntakeDeps) {
    this.extract = deps.extract ?? extractShipment;
    this.send = deps.send ?? sendQuoteEmail;
  }

  async handle(message: InboundMessage, signal?: AbortSignal): Promise<IntakeOutcome> {
    const childLog = log.child({ from: maskEmail(message.from), message_id: message.message_id });

    if (!isQuoteRequest(message.subject, message.body)) {
      childLog.info('Inbound email is not a quote request; ignoring.');
      return { status: 'ignored', reason: 'not_a_quote_request' };
    }

    const config = this.deps.config.current();
    let extracted: ExtractedShipment;
    try {
      extracted = await this.extract(message, {
        limiter: this.deps.limiter,
        timeZone: config.business_time_zone,
        signal,
      });
    } catch (error) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }
      childLog.warn({ err: error }, 'Could not extract shipment; asking sender for details.');
      const email_sent = await this.reply(
        message,
        buildClarificationEmail(
          message.subject,
          'We were not able to read the shipment details from your message.',
        ),
      );
      return { status: 'needs_clarification', reason: 'extraction_failed', issues: [], email_sent };
    }

    try {
      const outcome = await this.deps.pipeline.submit(
        { shipment: extracted.shipment, confidence: extracted.confidence },
        { actor: 'email', signal },
      );

      const email =
        outcome.status === 'auto_approved'
          ? buildQuoteReplyEmail(outcome.quote, {
              originalSubject: message.subject,
              zips: this.deps.zips,
              timeZone: config.business_time_zone,
            })
          : buildReviewPendingEmail(outcome.quote, { originalSubject: message.subject });

      return {
        status: outcome.status,
        quote_id: outcome.quote.id,
        review_id: outcome.status === 'queued_for_review' ? outcome.review.id : null,
        email_sent: await this.reply(message, email),
      };
    } catch (error) {
      if (!(error instanceof ShipmentValidationError)) {
        throw error;
      }
      const email_sent = await this.reply(
        message,
        buildClarificationEmail(message.subject, error.issues),
      );
      return {
        status: 'needs_clarification',
        reason: 'validation_failed',
        issues: error.issues,
        email_sent,
      };
    }
  }

  // The quote is already stored by now; a failed reply is reported, not retried.
  private async reply(
    message: InboundMessage,
    email: { subject: string; text: string },
  ): Promise<boolean> {
    try {
      const result = await this.send(
        { to: message.from, subject: email.subject, text: email.text, inReplyTo: message.message_id },
        this.deps.limiter,
      );
      return result.sent;
    } catch (error) {
      log.error({ err: error, to: maskEmail(message.from) }, 'Reply email was not delivered.');
      return false;
    }
  }
}
