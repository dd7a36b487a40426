import { serve } from '@hono/node-server';
import { config } from 'dotenv';
import {
  createApp,
  createSyncDependencies,
  getLogger,
  loadConfig,
  toError,
} from '@pkgindex/core';

// Load environment variables
config();

const PORT = Number(process.env.PORT) || 3000;

async function start(): Promise<void> {
  const indexConfig = loadConfig();
  const logger = getLogger(indexConfig.logLevel);

  logger.info('Starting package index server', {
    indexDir: indexConfig.indexDir,
    storageRoot: indexConfig.storageRoot,
    verifySignatures: indexConfig.verifySignatures,
  });

  const app = createApp({ deps: createSyncDependencies(indexConfig) });

  serve({ fetch: app.fetch, port: PORT }, (info) => {
    logger.info('Server listening', { port: info.port });
  });
}

start().catch((error: unknown) => {
  getLogger().error('Server failed to start', {}, toError(error));
  process.exit(1);
});
