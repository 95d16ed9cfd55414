import type { FastifyInstance } from 'fastify/types/instance';
import type { FastifyRequest } from 'fastify/types/request';
import { z } from 'zod';

import type { AppServices } from '../lib/services.ts';

type RouteOptions = { services: AppServices };

const claimSchema = z.object({
  reviewer: z.string().trim().min(1),
});

const decisionSchema = z.object({
  decision: z.enum(['approve', 'reject', 'edit']),
  reviewer: z.string().trim().min(1).default('reviewer'),
  notes: z.string().trim().max(2000).nullish(),
  corrected_shipment: z.unknown().optional(),
  confidence: z.unknown().optional(),
});

export async function reviewRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pipeline, queue } = options.services;

  fastify.get('/review/queue', async () => {
    const items = queue.list();
    return { count: items.length, items };
  });

  fastify.post('/review/claim', async (request: FastifyRequest<{ Body: unknown }>, reply) => {
    const { reviewer } = claimSchema.parse(request.body ?? {});
    const item = queue.claimNext(reviewer);
    if (!item) {
      return reply.code(204).send();
    }
    return { item, quote: pipeline.getQuote(item.quote_id) };
  });

  fastify.get(
    '/review/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>) => {
      const item = pipeline.getReviewItem(request.params.id);
      return { item, quote: pipeline.getQuote(item.quote_id) };
    },
  );

  fastify.post(
    '/review/:id/decision',
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>) => {
      const body = decisionSchema.parse(request.body ?? {});
      const outcome = await pipeline.decide(request.params.id, {
        decision: body.decision,
        reviewer: body.reviewer,
        notes: body.notes,
        corrected_shipment: body.corrected_shipment,
        confidence: body.confidence,
      });

      return {
        status: outcome.quote.status,
        quote: outcome.quote,
        review: outcome.review,
        replacement: outcome.replacement
          ? {
              status: outcome.replacement.status,
              quote: outcome.replacement.quote,
              review_id:
                outcome.replacement.status === 'queued_for_review'
                  ? outcome.replacement.review.id
                  : null,
            }
          : null,
      };
    },
  );
}
