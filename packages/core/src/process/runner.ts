/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * Low-level executor for external commands (git) with timeout support.
 *
 * Sync strategies depend on the CommandRunner interface only, so tests can
 * substitute a fake runner and assert on the invocation sequence.
 */

import { spawn } from 'node:child_process';
import { SubprocessError, TimeoutError } from '../errors';
import { getLogger } from '../utils/logger';

const KILL_GRACE_MS = 2000;

export interface CommandOptions {
  /** Absolute path (or name) of the executable */
  readonly command: string;

  readonly args: string[];

  /** Working directory for command execution */
  readonly cwd: string;

  /** Timeout in milliseconds */
  readonly timeout?: number;
}

export interface CommandResult {
  /** Exit code (0 = success, -1 when the process could not run) */
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

export interface CommandRunner {
  /**
   * Run a command to completion.
   * Never rejects: spawn failures and timeouts are reported in the result.
   */
  run(options: CommandOptions): Promise<CommandResult>;
}

export function createCommandRunner(): CommandRunner {
  return {
    run(options: CommandOptions): Promise<CommandResult> {
      const { command, args, cwd, timeout } = options;
      const logger = getLogger();

      logger.debug(`Executing: ${command} ${args.join(' ')}`, { cwd, timeout });

      return new Promise((resolve) => {
        const stdoutChunks: string[] = [];
        const stderrChunks: string[] = [];
        let settled = false;
        let timeoutHandle: NodeJS.Timeout | undefined;

        const finish = (result: CommandResult): void => {
          if (settled) return;
          settled = true;
          if (timeoutHandle) clearTimeout(timeoutHandle);
          resolve(result);
        };

        const proc = spawn(command, args, { cwd, shell: false });

        proc.on('error', (err: NodeJS.ErrnoException) => {
          logger.error('Process spawn error', { command, cwd }, err);
          finish({
            exitCode: -1,
            stdout: '',
            stderr: err.code === 'ENOENT' ? `${command} not found` : `Process error: ${err.message}`,
            timedOut: false,
          });
        });

        proc.stdout.on('data', (chunk: Buffer) => {
          stdoutChunks.push(chunk.toString());
        });

        proc.stderr.on('data', (chunk: Buffer) => {
          stderrChunks.push(chunk.toString());
        });

        proc.on('close', (code, signal) => {
          const exitCode = code ?? (signal ? -1 : 0);
          logger.debug(`Process exited with code ${exitCode}`, { command, signal });
          finish({
            exitCode,
            stdout: stdoutChunks.join(''),
            stderr: stderrChunks.join(''),
            timedOut: false,
          });
        });

        if (timeout !== undefined) {
          timeoutHandle = setTimeout(() => {
            logger.warn(`Command timed out after ${timeout}ms`, { command, args });
            proc.kill('SIGTERM');

            const forceKill = setTimeout(() => {
              if (proc.exitCode === null && proc.signalCode === null) {
                logger.warn('Force killing process with SIGKILL', { command, args });
                proc.kill('SIGKILL');
              }
            }, KILL_GRACE_MS);
            forceKill.unref();

            finish({
              exitCode: -1,
              stdout: stdoutChunks.join(''),
              stderr: stderrChunks.join(''),
              timedOut: true,
            });
          }, timeout);
        }
      });
    },
  };
}

/**
 * Run a command in a directory and require it to succeed.
 * @param onFailure - Builds the error thrown for a non-zero exit (defaults to SubprocessError)
 */
export async function runIn(
  runner: CommandRunner,
  cwd: string,
  command: string,
  args: string[],
  options: { timeout?: number; onFailure?: (result: CommandResult) => Error } = {}
): Promise<CommandResult> {
  const result = await runner.run({ command, args, cwd, timeout: options.timeout });

  if (result.timedOut) {
    throw new TimeoutError(`${command} ${args.join(' ')}`, options.timeout ?? 0);
  }

  if (result.exitCode !== 0) {
    throw options.onFailure
      ? options.onFailure(result)
      : new SubprocessError(command, args, result.exitCode, result.stderr);
  }

  return result;
}
