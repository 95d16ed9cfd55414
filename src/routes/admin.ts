import { Buffer } from 'node:buffer';
import process from 'node:process';
import { timingSafeEqual } from 'node:crypto';

import type { FastifyInstance } from 'fastify/types/instance';
import type { FastifyReply } from 'fastify/types/reply';
import type { FastifyRequest } from 'fastify/types/request';

import type { AppServices } from '../lib/services.ts';

type RouteOptions = { services: AppServices };

function unauthorized(reply: FastifyReply) {
  reply.header('WWW-Authenticate', 'Bearer realm="admin"');
  return reply.code(401).send({ error: 'unauthorized', message: 'Unauthorized', retryable: false });
}

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

function requireAdminToken(request: FastifyRequest, reply: FastifyReply): boolean {
  const requiredToken = process.env.ADMIN_TOKEN;
  if (!requiredToken) {
    reply.code(403).send({
      error: 'admin_disabled',
      message: 'ADMIN_TOKEN is not configured',
      retryable: false,
    });
    return false;
  }

  const header = request.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    unauthorized(reply);
    return false;
  }

  if (!tokensMatch(requiredToken, header.slice('Bearer '.length).trim())) {
    unauthorized(reply);
    return false;
  }
  return true;
}

export async function adminRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { config, limiter, queue } = options.services;

  fastify.post('/admin/config/reload', async (request, reply) => {
    if (!requireAdminToken(request, reply)) {
      return reply;
    }
    const next = await config.reload();
    request.log.info({ version: config.currentVersion() }, 'Configuration reloaded by admin.');
    return {
      version: config.currentVersion(),
      business_time_zone: next.business_time_zone,
      fuel_index_pct: next.pricing.fuel_index_pct,
    };
  });

  fastify.get('/admin/status', async (request, reply) => {
    if (!requireAdminToken(request, reply)) {
      return reply;
    }
    return {
      config_version: config.currentVersion(),
      review_queue_depth: queue.size(),
      rate_limits: {
        geocoding: limiter.snapshot('geocoding'),
        llm: limiter.snapshot('llm'),
        email: limiter.snapshot('email'),
      },
    };
  });
}
