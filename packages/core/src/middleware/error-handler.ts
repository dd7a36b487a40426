/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { IndexError, statusForError } from '../errors';
import { getLogger } from '../utils/logger';
import type { AppEnv } from '../app-env';

/**
 * Error handler for the Hono app
 * Logs the error and maps index errors to an HTTP status by code
 */
export function errorHandler(error: Error, c: Context<AppEnv>): Response {
  const logger = getLogger();
  const requestId = c.get('requestId');

  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  logger.error(
    'Request error',
    {
      method: c.req.method,
      path: new URL(c.req.url).pathname,
    },
    error
  );

  if (error instanceof IndexError) {
    return c.json(
      {
        error: error.code,
        message: error.message,
        ...(requestId && { requestId }),
      },
      statusForError(error)
    );
  }

  return c.json(
    {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      ...(requestId && { requestId }),
    },
    500
  );
}
