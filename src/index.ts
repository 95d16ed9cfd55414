import 'dotenv/config';

import process from 'node:process';

import { loadQuoteConfig } from './lib/config.ts';
import { getLogger } from './lib/log.ts';
import { isOpenAIConfigured } from './lib/openai.ts';
import { createServices } from './lib/services.ts';
import { loadZipDirectory } from './lib/zip-reference.ts';
import { buildServer } from './server.ts';

async function main(): Promise<void> {
  const config = await loadQuoteConfig();
  const zips = await loadZipDirectory();
  if (!isOpenAIConfigured()) {
    getLogger().warn('OPENAI_API_KEY not set; inbound emails will get clarification replies only.');
  }
  const services = createServices(config, zips);
  const server = await buildServer(services);

  const port = Number.parseInt(process.env.PORT ?? '3000', 10);
  const host = process.env.HOST ?? '0.0.0.0';

  try {
    await server.listen({ host, port });
    server.log.info(`Freight quote engine listening on http://${host}:${port} (${zips.size()} reference ZIPs)`);
  } catch (error) {
    server.log.error(error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  getLogger().error({ err: error }, 'Freight quote engine failed to start.');
  process.exit(1);
});
