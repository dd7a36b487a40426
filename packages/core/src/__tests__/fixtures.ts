import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { buffer } from 'node:stream/consumers';
import { pack } from 'tar-stream';
import { vi } from 'vitest';
import type { IndexConfig } from '@pkgindex/shared';
import { parseConfig, type ConfigInput } from '../config';
import type { CommandOptions, CommandResult, CommandRunner } from '../process/runner';
import type { SyncDependencies } from '../sync/types';

export const GIT_URL = 'https://git.example.test/mirrors/all-cabal-hashes.git';
export const HTTP_URL = 'https://index.example.test/00-index.tar.gz';

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `pkgindex-${prefix}-`));
}

/**
 * Build a tarball in memory; entries ending in "/" are directories
 */
export async function createTarball(entries: string[]): Promise<Buffer> {
  const archive = pack();
  for (const name of entries) {
    if (name.endsWith('/')) {
      archive.entry({ name, type: 'directory' });
    } else {
      archive.entry({ name }, '{}');
    }
  }
  archive.finalize();
  return buffer(archive);
}

export async function writeTarball(dir: string, entries: string[]): Promise<Buffer> {
  const tar = await createTarball(entries);
  await writeFile(path.join(dir, '00-index.tar'), tar);
  return tar;
}

export function testConfig(root: string, overrides: ConfigInput = {}): IndexConfig {
  return parseConfig({
    gitUrl: GIT_URL,
    httpUrl: HTTP_URL,
    storageRoot: root,
    indexDir: path.join(root, 'indices', 'hackage'),
    httpRetries: 0,
    requestTimeoutMs: 5_000,
    commandTimeoutMs: 5_000,
    ...overrides,
  });
}

export const ok: CommandResult = { exitCode: 0, stdout: '', stderr: '', timedOut: false };

/**
 * Runner that records invocations; the handler decides each result
 */
export function createFakeRunner(
  handler: (options: CommandOptions) => CommandResult = () => ok
) {
  const run = vi.fn(async (options: CommandOptions): Promise<CommandResult> => handler(options));
  const runner: CommandRunner = { run };
  return { runner, run };
}

export function createDeps(
  config: IndexConfig,
  overrides: Partial<Omit<SyncDependencies, 'config'>> = {}
): SyncDependencies {
  return {
    config,
    runner: overrides.runner ?? createFakeRunner().runner,
    findExecutable: overrides.findExecutable ?? (async () => null),
  };
}
