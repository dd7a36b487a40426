import { afterEach, describe, expect, it, vi } from 'vitest';
import { IndexMissingError } from '../errors';
import { createLogger, type LogEntry } from '../utils/logger';

function entries(spy: { mock: { calls: unknown[][] } }): LogEntry[] {
  return spy.mock.calls.map(([line]) => JSON.parse(String(line)));
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop entries below the configured level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('warn');

    logger.debug('debug');
    logger.info('info');
    logger.error('error');

    expect(entries(stderr).map((entry) => entry.message)).toEqual(['error']);
  });

  it('should write warnings to the warn stream', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('info').warn('careful', { url: 'https://index.example.test' });

    expect(entries(warn)).toEqual([
      {
        level: 'warn',
        message: 'careful',
        timestamp: expect.any(String),
        context: { url: 'https://index.example.test' },
      },
    ]);
  });

  it('should attach the request id and the error code', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('debug');
    logger.setRequestId('req-1');

    logger.error('Query failed', {}, new IndexMissingError('/srv/index/00-index.tar'));

    const [entry] = entries(stderr);
    expect(entry?.requestId).toBe('req-1');
    expect(entry?.context).toBeUndefined();
    expect(entry?.error).toMatchObject({ name: 'IndexMissingError', code: 'index_missing' });
  });

  it('should stop tagging entries once the request id is cleared', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('info');

    logger.setRequestId('req-2');
    logger.info('inside');
    logger.setRequestId(undefined);
    logger.info('outside');

    expect(entries(stderr).map((entry) => entry.requestId)).toEqual(['req-2', undefined]);
  });

  it('should keep stdout free', () => {
    const stdout = vi.spyOn(console, 'log');
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('debug').info('hello');

    expect(stdout).not.toHaveBeenCalled();
  });
});
