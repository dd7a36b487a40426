/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import { getLogger } from '../utils/logger';
import type { AppEnv } from '../app-env';

/**
 * Request ID middleware
 *
 * Generates a unique request ID for each request and stores it in context.
 * This ID is used for log correlation across the request lifecycle.
 */
export async function requestIdMiddleware(c: Context<AppEnv>, next: Next): Promise<void> {
  const requestId = nanoid(16);

  c.set('requestId', requestId);

  const logger = getLogger();
  logger.setRequestId(requestId);

  logger.info('Request started', {
    method: c.req.method,
    path: new URL(c.req.url).pathname,
  });

  await next();

  // Response is available after next() completes
  c.res.headers.set('X-Request-ID', requestId);
}
