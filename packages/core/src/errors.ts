/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Error taxonomy for index updates and queries

import { SIGNING_KEY_ID, SIGNATURE_DOCS_URL } from '@pkgindex/shared';

export type IndexErrorCode =
  | 'tool_missing'
  | 'subprocess_failed'
  | 'signature_verification_failed'
  | 'network_error'
  | 'timeout'
  | 'index_corrupt'
  | 'index_missing'
  | 'invalid_version'
  | 'invalid_config';

export class IndexError extends Error {
  constructor(
    message: string,
    public readonly code: IndexErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IndexError';
  }
}

export class ToolMissingError extends IndexError {
  constructor(public readonly tool: string) {
    super(`Please install ${tool} and provide the executable on your PATH`, 'tool_missing');
    this.name = 'ToolMissingError';
  }
}

export class SubprocessError extends IndexError {
  constructor(
    public readonly command: string,
    public readonly args: string[],
    public readonly exitCode: number,
    public readonly stderr: string,
    message?: string
  ) {
    super(
      message ?? `Command failed with exit code ${exitCode}: ${command} ${args.join(' ')}${stderr ? `\n${stderr.trim()}` : ''}`,
      'subprocess_failed'
    );
    this.name = 'SubprocessError';
  }
}

export class SignatureVerificationError extends IndexError {
  constructor(public readonly stderr: string) {
    super(
      [
        'Signature verification failed.',
        "Please ensure you've set up your GPG keychain to accept",
        `the ${SIGNING_KEY_ID} signing key.`,
        `For more information, see: ${SIGNATURE_DOCS_URL}`,
      ].join(' '),
      'signature_verification_failed'
    );
    this.name = 'SignatureVerificationError';
  }
}

export class NetworkError extends IndexError {
  constructor(public readonly url: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Network request failed for ${url}${reason}`, 'network_error', options);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends IndexError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'timeout', options);
    this.name = 'TimeoutError';
  }
}

export class IndexCorruptError extends IndexError {
  constructor(public readonly path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Couldn't read index tarball ${path}: ${reason}`, 'index_corrupt', { cause });
    this.name = 'IndexCorruptError';
  }
}

export class IndexMissingError extends IndexError {
  constructor(public readonly path: string) {
    super(`Index tarball ${path} does not exist; update the index first`, 'index_missing');
    this.name = 'IndexMissingError';
  }
}

export class InvalidVersionError extends IndexError {
  constructor(
    public readonly path: string,
    public readonly entryPath: string,
    public readonly version: string
  ) {
    super(`Invalid version "${version}" in index entry ${entryPath} of ${path}`, 'invalid_version');
    this.name = 'InvalidVersionError';
  }
}

export class InvalidConfigError extends IndexError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'invalid_config');
    this.name = 'InvalidConfigError';
  }
}

/**
 * HTTP status used when an index error reaches the service boundary
 */
export function statusForError(error: IndexError): 500 | 502 | 503 | 504 {
  switch (error.code) {
    case 'index_missing':
      return 503;
    case 'timeout':
      return 504;
    case 'network_error':
    case 'subprocess_failed':
    case 'signature_verification_failed':
      return 502;
    case 'index_corrupt':
    case 'invalid_version':
    case 'tool_missing':
    case 'invalid_config':
      return 500;
  }
}
