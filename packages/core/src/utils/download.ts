/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import pRetry from 'p-retry';
import { INDEX_USER_AGENT } from '@pkgindex/shared';
import { NetworkError, TimeoutError } from '../errors';

export interface ConditionalDownloadOptions {
  /** Cached entity tag, sent as If-None-Match */
  etag?: string | null;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Retries for transport failures (status codes are never retried) */
  retries: number;
  /** Delay before the first retry */
  minRetryDelayMs?: number;
}

/**
 * Issue a conditional GET for the index archive.
 * The response is returned whatever its status; the caller inspects it.
 * @throws NetworkError or TimeoutError when no response could be obtained
 */
export async function fetchConditional(
  url: string,
  options: ConditionalDownloadOptions
): Promise<Response> {
  const headers: Record<string, string> = {
    Accept: 'application/gzip, application/octet-stream, */*',
    'User-Agent': INDEX_USER_AGENT,
  };
  if (options.etag) {
    headers['If-None-Match'] = options.etag;
  }

  try {
    return await pRetry(
      () =>
        fetch(url, {
          headers,
          signal: AbortSignal.timeout(options.timeoutMs),
        }),
      { retries: options.retries, minTimeout: options.minRetryDelayMs ?? 1000 }
    );
  } catch (error) {
    throw transportError(url, options.timeoutMs, error);
  }
}

/**
 * Stream a response body to a file.
 * The attempt's timeout signal keeps running while the body streams.
 * @throws NetworkError when the transfer breaks off, TimeoutError when it runs out of time
 */
export async function saveResponseBody(
  response: Response,
  filePath: string,
  url: string,
  timeoutMs: number
): Promise<void> {
  if (!response.body) {
    throw new NetworkError(url, { cause: new Error('Response has no body') });
  }

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(filePath));
  } catch (error) {
    if (isFileSystemError(error)) {
      throw error;
    }
    throw transportError(url, timeoutMs, error);
  }
}

function isFileSystemError(error: unknown): boolean {
  return error instanceof Error && 'syscall' in error && typeof error.syscall === 'string';
}

function transportError(url: string, timeoutMs: number, error: unknown): NetworkError | TimeoutError {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new TimeoutError(`GET ${url}`, timeoutMs, { cause: error });
  }
  return new NetworkError(url, { cause: error });
}
