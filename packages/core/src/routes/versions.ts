/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import type { Context } from 'hono';
import { packageNameSchema, sortVersions } from '@pkgindex/shared';
import { tryGetHandle } from '../mirror/handle';
import { queryVersions } from '../mirror/scanner';
import type { AppEnv } from '../app-env';

/**
 * GET /packages/:name/versions
 * Lists the versions of a package found in the mirrored index
 */
export async function versionsRoute(c: Context<AppEnv>): Promise<Response> {
  const parsed = packageNameSchema.safeParse(c.req.param('name'));
  if (!parsed.success) {
    return c.json({ error: 'invalid_package_name', message: parsed.error.issues[0]?.message }, 400);
  }
  const name = parsed.data;

  const handle = await tryGetHandle(c.get('indexDir'));
  if (!handle) {
    return c.json({ error: 'index_not_ready', message: 'The package index has not been downloaded yet' }, 503);
  }

  // Index errors propagate to the app error handler
  const versions = await queryVersions(handle, name);
  if (!versions) {
    return c.json({ error: 'package_not_found', message: `No versions of ${name} in the index` }, 404);
  }

  return c.json({ name, versions: sortVersions(versions) });
}
