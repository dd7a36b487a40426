import { describe, expect, it } from 'vitest';
import {
  IndexCorruptError,
  IndexMissingError,
  InvalidConfigError,
  InvalidVersionError,
  NetworkError,
  SignatureVerificationError,
  statusForError,
  SubprocessError,
  TimeoutError,
  ToolMissingError,
} from '../errors';

describe('statusForError', () => {
  it('should map each error code to an HTTP status', () => {
    expect(statusForError(new IndexMissingError('/srv/index/00-index.tar'))).toBe(503);
    expect(statusForError(new TimeoutError('GET /index', 1000))).toBe(504);
    expect(statusForError(new NetworkError('https://index.example.test'))).toBe(502);
    expect(statusForError(new SubprocessError('git', ['fetch'], 1, ''))).toBe(502);
    expect(statusForError(new SignatureVerificationError(''))).toBe(502);
    expect(statusForError(new IndexCorruptError('/srv/index/00-index.tar', new Error('bad')))).toBe(500);
    expect(statusForError(new InvalidVersionError('/srv/index/00-index.tar', 'a/b/a.json', 'b'))).toBe(500);
    expect(statusForError(new ToolMissingError('git'))).toBe(500);
    expect(statusForError(new InvalidConfigError('bad config'))).toBe(500);
  });
});

describe('index errors', () => {
  it('should point at the signing key and its documentation', () => {
    const error = new SignatureVerificationError('gpg: BAD signature');

    expect(error.message).toBe(
      "Signature verification failed. Please ensure you've set up your GPG keychain to accept the D6CF60FD signing key. For more information, see: https://github.com/fpco/stackage-update#readme"
    );
  });

  it('should name the archive and the reason when it cannot be read', () => {
    const error = new IndexCorruptError('/srv/index/00-index.tar', new Error('Invalid tar header'));

    expect(error.message).toBe("Couldn't read index tarball /srv/index/00-index.tar: Invalid tar header");
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('should list config issues after the message', () => {
    const error = new InvalidConfigError('Invalid package index configuration', ['a: one', 'b: two']);

    expect(error.message).toBe('Invalid package index configuration: a: one; b: two');
  });

  it('should leave out stderr when the command printed nothing', () => {
    expect(new SubprocessError('git', ['archive'], 2, '').message).toBe('Command failed with exit code 2: git archive');
  });
});
