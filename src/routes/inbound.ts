import type { FastifyInstance } from 'fastify/types/instance';
import type { FastifyRequest } from 'fastify/types/request';
import { z } from 'zod';

import type { AppServices } from '../lib/services.ts';

type RouteOptions = { services: AppServices };

// Accepts JSON or form-encoded webhook posts from the mail relay.
const inboundEmailSchema = z.object({
  from: z.string().trim().min(3),
  subject: z.string().default(''),
  body: z.string(),
  message_id: z.string().trim().min(1).nullish(),
});

export async function inboundRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { intake } = options.services;

  fastify.post('/inbound/email', async (request: FastifyRequest<{ Body: unknown }>) => {
    const message = inboundEmailSchema.parse(request.body ?? {});
    return intake.handle(message);
  });
}
