/**
 * Defaults and reserved names.
 */

import { PRECOMPRESSED_VARIANTS } from './fingerprint/tag-set.js';

export const VERSION = '0.1.0';

/** Config file holding per-route response headers. */
export const HEADERS_FILE = '_headers';

/** Config file holding redirect rules. */
export const REDIRECTS_FILE = '_redirects';

/**
 * Templates that are never served as static assets: each config file and
 * its precompressed siblings.
 */
export const HIDDEN_PATHS = [HEADERS_FILE, REDIRECTS_FILE].flatMap(
    (name) => [
        `/${name}`,
        ...PRECOMPRESSED_VARIANTS.map(({ suffix }) => `/${name}${suffix}`),
    ],
);

/** Document appended to directory paths. */
export const INDEX_DOCUMENT = 'index.html';

/** Document served (with status 404) for missing paths. */
export const NOT_FOUND_DOCUMENT = '404.html';

/** Redirect status used when a `_redirects` line has no third token. */
export const DEFAULT_REDIRECT_STATUS = 307;

export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_HASH_CONCURRENCY = 16;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;
