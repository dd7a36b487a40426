/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { Context } from 'hono';
import type { AppEnv } from '../app-env';

/**
 * Health check endpoint
 * Returns 200 OK if service is healthy
 */
export async function healthRoute(c: Context<AppEnv>): Promise<Response> {
  return c.json({
    status: 'ok',
    timestamp: Date.now(),
  });
}
