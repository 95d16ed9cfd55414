import type { FastifyInstance } from 'fastify/types/instance';
import type { FastifyRequest } from 'fastify/types/request';
import { z } from 'zod';

import { ShipmentValidationError } from '../lib/errors.ts';
import type { AppServices } from '../lib/services.ts';

type RouteOptions = { services: AppServices };

const quoteRequestSchema = z.object({
  shipment: z.unknown(),
  confidence: z.unknown().optional(),
});

export async function quoteRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pipeline, zips } = options.services;

  fastify.post('/quote', async (request: FastifyRequest<{ Body: unknown }>, reply) => {
    const parsed = quoteRequestSchema.safeParse(request.body);
    if (!parsed.success || parsed.data.shipment === undefined) {
      throw ShipmentValidationError.malformed('body must be a JSON object with a shipment field');
    }

    const outcome = await pipeline.submit(
      { shipment: parsed.data.shipment, confidence: parsed.data.confidence },
      { actor: 'api' },
    );
    if (outcome.status === 'auto_approved') {
      return reply.code(200).send({ status: outcome.status, quote: outcome.quote });
    }
    return reply.code(202).send({
      status: outcome.status,
      review_id: outcome.review.id,
      priority: outcome.review.priority,
      quote: outcome.quote,
    });
  });

  fastify.get('/zips', async () => {
    const zipCodes = zips.codes();
    return { zip_codes: zipCodes, count: zipCodes.length };
  });

  fastify.get(
    '/quotes/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>) => {
      const quote = pipeline.getQuote(request.params.id);
      return { quote, audit: pipeline.auditFor(quote.id) };
    },
  );
}
