/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

/**
 * User-Agent sent with index downloads
 */
export const INDEX_USER_AGENT = 'pkgindex/0.1.0';

// Well-known files inside a mirror directory
export const INDEX_TAR = '00-index.tar';
export const INDEX_TAR_GZ = '00-index.tar.gz';
export const INDEX_TAR_GZ_TMP = '00-index.tar.gz.tmp';
export const INDEX_ETAG = '00-index.tar.gz.etag';

/**
 * Suffix of the per-version metadata file: `name/version/name.json`
 */
export const INDEX_METADATA_SUFFIX = '.json';

/**
 * Branch cloned on first sync and the tag exported as the archive
 */
export const GIT_INDEX_BRANCH = 'display';
export const GIT_INDEX_REF = 'current-hackage';

/**
 * Sub-directory of the storage root holding git clones
 */
export const GIT_UPDATE_DIR = 'update';

export const SIGNING_KEY_ID = 'D6CF60FD';
export const SIGNATURE_DOCS_URL = 'https://github.com/fpco/stackage-update#readme';

/**
 * Only the first bytes of the etag file are sent back to the server
 */
export const ETAG_MAX_BYTES = 512;

export const DEFAULT_GIT_URL = 'https://github.com/commercialhaskell/all-cabal-hashes.git';
export const DEFAULT_HTTP_URL = 'https://s3.amazonaws.com/hackage.fpcomplete.com/00-index.tar.gz';
