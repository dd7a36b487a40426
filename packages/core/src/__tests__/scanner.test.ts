import { rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IndexCorruptError, IndexMissingError, InvalidVersionError } from '../errors';
import { IndexHandle } from '../mirror/handle';
import { parseEntryPath, queryVersions } from '../mirror/scanner';
import { makeTempDir, writeTarball } from './fixtures';

describe('parseEntryPath', () => {
  it('should accept name/version/name.json', () => {
    expect(parseEntryPath('foo/1.0.0/foo.json')).toEqual({ name: 'foo', version: '1.0.0' });
  });

  it('should reject entries whose file name does not match the package', () => {
    expect(parseEntryPath('foo/1.0.0/bar.json')).toBeNull();
    expect(parseEntryPath('foo/1.0.0/foo.cabal')).toBeNull();
  });

  it('should reject entries with another depth', () => {
    expect(parseEntryPath('foo/')).toBeNull();
    expect(parseEntryPath('foo/1.0.0/')).toBeNull();
    expect(parseEntryPath('preferred-versions')).toBeNull();
    expect(parseEntryPath('x/foo/1.0.0/foo.json')).toBeNull();
  });
});

describe('queryVersions', () => {
  let dir: string;
  let handle: IndexHandle;

  beforeEach(async () => {
    dir = await makeTempDir('scanner');
    handle = await IndexHandle.create(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should collect the versions of the requested package only', async () => {
    await writeTarball(dir, [
      'foo/',
      'foo/1.0.0/',
      'foo/1.0.0/foo.json',
      'foo/1.0.0/foo.cabal',
      'bar/1.0.0/bar.json',
      'foo/2.0.0/foo.json',
      'preferred-versions',
    ]);

    expect(await queryVersions(handle, 'foo')).toEqual(new Set(['1.0.0', '2.0.0']));
    expect(await queryVersions(handle, 'bar')).toEqual(new Set(['1.0.0']));
  });

  it('should return null for a package with no entries', async () => {
    await writeTarball(dir, ['foo/1.0.0/foo.json']);

    expect(await queryVersions(handle, 'baz')).toBeNull();
  });

  it('should return null when the archive has no metadata entries at all', async () => {
    await writeTarball(dir, ['foo/', 'foo/1.0.0/foo.cabal', 'preferred-versions']);

    expect(await queryVersions(handle, 'foo')).toBeNull();
  });

  it('should merge versions that differ only in leading zeros', async () => {
    await writeTarball(dir, ['foo/1.0/foo.json', 'foo/1.00/foo.json', 'foo/01.2/foo.json']);

    expect(await queryVersions(handle, 'foo')).toEqual(new Set(['1.0', '1.2']));
  });

  it('should not match a package name by prefix', async () => {
    await writeTarball(dir, ['foobar/1.0/foobar.json']);

    expect(await queryVersions(handle, 'foo')).toBeNull();
  });

  it('should reject with IndexMissingError when the archive is absent', async () => {
    await expect(queryVersions(handle, 'foo')).rejects.toBeInstanceOf(IndexMissingError);
  });

  it('should reject every query with IndexCorruptError on a corrupt archive', async () => {
    const tarPath = path.join(dir, '00-index.tar');
    await writeFile(tarPath, Buffer.alloc(1024, 'x'));

    for (const name of ['foo', 'bar']) {
      const error = await queryVersions(handle, name).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IndexCorruptError);
      expect(error).toMatchObject({ code: 'index_corrupt', path: tarPath });
    }
  });

  it('should reject with InvalidVersionError for an unparsable version of the package', async () => {
    await writeTarball(dir, ['foo/1.0/foo.json', 'foo/1.x/foo.json', 'bar/2.0/bar.json']);

    const error = await queryVersions(handle, 'foo').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidVersionError);
    expect(error).toMatchObject({
      code: 'invalid_version',
      entryPath: 'foo/1.x/foo.json',
      version: '1.x',
    });
  });

  it('should ignore unparsable versions of other packages', async () => {
    await writeTarball(dir, ['foo/1.x/foo.json', 'bar/2.0/bar.json']);

    expect(await queryVersions(handle, 'bar')).toEqual(new Set(['2.0']));
  });

  it('should read the archive anew on each query', async () => {
    await writeTarball(dir, ['foo/1.0/foo.json']);
    expect(await queryVersions(handle, 'foo')).toEqual(new Set(['1.0']));

    await writeTarball(dir, ['foo/1.0/foo.json', 'foo/1.1/foo.json']);
    expect(await queryVersions(handle, 'foo')).toEqual(new Set(['1.0', '1.1']));
  });
});
