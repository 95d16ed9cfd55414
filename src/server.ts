import formbody from '@fastify/formbody';
import fastify, { type FastifyServerOptions } from 'fastify';

import { getRawLogger } from './lib/log.ts';
import type { AppServices } from './lib/services.ts';
import { adminRoutes } from './routes/admin.ts';
import { registerErrorHandler } from './routes/error-handler.ts';
import { inboundRoutes } from './routes/inbound.ts';
import { quoteRoutes } from './routes/quote.ts';
import { reviewRoutes } from './routes/review.ts';

type BuildOptions = {
  logger?: boolean;
};

export async function buildServer(services: AppServices, options: BuildOptions = {}) {
  const serverOptions: FastifyServerOptions = {};
  if (options.logger !== false) {
    serverOptions.logger = getRawLogger();
  }
  const server = fastify(serverOptions);

  registerErrorHandler(server);
  await server.register(formbody);

  server.get('/healthz', async () => ({
    status: 'ok',
    config_version: services.config.currentVersion(),
    review_queue_depth: services.queue.size(),
  }));

  await server.register(quoteRoutes, { services });
  await server.register(reviewRoutes, { services });
  await server.register(inboundRoutes, { services });
  await server.register(adminRoutes, { services });

  return server;
}
