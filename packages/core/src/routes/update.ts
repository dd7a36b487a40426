/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { Context } from 'hono';
import { statusForError } from '../errors';
import { IndexHandle } from '../mirror/handle';
import { syncMirror } from '../sync/index-sync';
import type { AppEnv } from '../app-env';

/**
 * POST /index/update
 * Refreshes the mirror through git or HTTP
 */
export async function updateIndexRoute(c: Context<AppEnv>): Promise<Response> {
  const handle = await IndexHandle.create(c.get('indexDir'));
  const result = await syncMirror(handle, c.get('deps'));

  if (!result.success) {
    return c.json(
      {
        error: result.error.code,
        message: result.error.message,
        strategy: result.strategy,
      },
      statusForError(result.error)
    );
  }

  return c.json(result);
}
