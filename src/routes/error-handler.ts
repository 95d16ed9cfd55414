import type { FastifyInstance } from 'fastify/types/instance';
import type { FastifyReply } from 'fastify/types/reply';
import type { FastifyRequest } from 'fastify/types/request';
import { ZodError } from 'zod';

import { ConfigLoadError } from '../lib/config.ts';
import {
  ExtractionError,
  InvalidTransitionError,
  NotFoundError,
  QuoteEngineError,
  RateLimitBlockedError,
  ResolutionError,
  ReviewQueueFullError,
  ShipmentValidationError,
} from '../lib/errors.ts';
import { toValidationIssue } from '../lib/shipment-validator.ts';

type ErrorBody = {
  error: string;
  message: string;
  retryable: boolean;
  [key: string]: unknown;
};

function hasFastifyCode(error: unknown): error is Error & { code: string; statusCode?: number } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function send(reply: FastifyReply, status: number, body: ErrorBody) {
  return reply.code(status).send(body);
}

export function handleError(error: unknown, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof ShipmentValidationError) {
    return send(reply, 422, {
      error: error.code,
      message: error.message,
      retryable: false,
      issues: error.issues,
    });
  }

  if (error instanceof ZodError) {
    return send(reply, 422, {
      error: 'validation_failed',
      message: 'Request body failed validation',
      retryable: false,
      issues: error.issues.map((issue) => toValidationIssue(issue)),
    });
  }

  if (error instanceof RateLimitBlockedError) {
    reply.header('Retry-After', String(Math.max(1, Math.ceil(error.retryAfterMs / 1000))));
    return send(reply, 429, {
      error: error.code,
      message: error.message,
      retryable: true,
      provider: error.provider,
      retry_after_ms: error.retryAfterMs,
    });
  }

  if (error instanceof ResolutionError || error instanceof ReviewQueueFullError) {
    request.log.warn({ err: error }, 'Quote request failed with a transient error.');
    return send(reply, 503, { error: error.code, message: error.message, retryable: true });
  }

  if (error instanceof InvalidTransitionError) {
    return send(reply, 409, {
      error: error.code,
      message: error.message,
      retryable: false,
      quote_id: error.quoteId,
      from: error.from,
      to: error.to,
    });
  }

  if (error instanceof NotFoundError) {
    return send(reply, 404, { error: error.code, message: error.message, retryable: false });
  }

  if (error instanceof ExtractionError) {
    return send(reply, 502, { error: error.code, message: error.message, retryable: false });
  }

  if (error instanceof ConfigLoadError) {
    return send(reply, 422, {
      error: 'invalid_config',
      message: error.message,
      retryable: false,
      issues: error.issues,
    });
  }

  if (error instanceof QuoteEngineError) {
    request.log.error({ err: error }, 'Unmapped quote engine error.');
    return send(reply, 500, { error: error.code, message: error.message, retryable: error.transient });
  }

  // Body parser failures (bad JSON, empty body, unsupported media type).
  if (error instanceof SyntaxError) {
    return send(reply, 422, { error: 'malformed_payload', message: error.message, retryable: false });
  }
  if (hasFastifyCode(error) && error.code.startsWith('FST_ERR_CTP')) {
    return send(reply, error.code === 'FST_ERR_CTP_INVALID_MEDIA_TYPE' ? 415 : 422, {
      error: 'malformed_payload',
      message: error.message,
      retryable: false,
    });
  }

  request.log.error({ err: error }, 'Unhandled request error.');
  return send(reply, 500, {
    error: 'internal_error',
    message: 'Internal server error',
    retryable: false,
  });
}

export function registerErrorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler(handleError);
}
