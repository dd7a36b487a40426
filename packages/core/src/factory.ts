/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { errorHandler } from './middleware/error-handler';
import { requestIdMiddleware } from './middleware/request-id';
import { healthRoute } from './routes/health';
import { updateIndexRoute } from './routes/update';
import { versionsRoute } from './routes/versions';
import type { SyncDependencies } from './sync/types';
import type { AppEnv } from './app-env';

export type AppInstance = Hono<AppEnv>;

export interface AppOptions {
  deps: SyncDependencies;
  /** Mirror directory; defaults to the configured index directory */
  indexDir?: string;
}

/**
 * Create the Hono application serving version queries and index updates
 */
export function createApp(options: AppOptions): AppInstance {
  const app = new Hono<AppEnv>();
  const indexDir = options.indexDir ?? options.deps.config.indexDir;

  // Global middleware
  app.use('*', cors());
  app.use('*', requestIdMiddleware);
  app.use('*', async (c, next) => {
    c.set('deps', options.deps);
    c.set('indexDir', indexDir);
    await next();
  });

  app.onError(errorHandler);

  app.get('/health', healthRoute);
  app.get('/packages/:name/versions', versionsRoute);
  app.post('/index/update', updateIndexRoute);

  return app;
}
