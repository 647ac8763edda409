/**
 * Type definitions for the server.
 *
 * @packageDocumentation
 */

import type { Logger } from './logger.js';

/**
 * Configuration options for the server.
 *
 * @example
 * ```typescript
 * const options: ServerOptions = {
 *     dir: '/var/www/site',
 *     port: 8080,
 *     host: '0.0.0.0',
 *     spa: true,
 * };
 * ```
 */
export interface ServerOptions {
    /** Root directory to serve. */
    dir: string;

    /** Port to listen on. */
    port: number;

    /** Host to bind to. */
    host: string;

    /** Serve `index.html` (status 200) instead of `404.html` for missing paths. */
    spa?: boolean;

    /** Log every request and debug output. */
    verbose?: boolean;

    /** Maximum number of files hashed at once during startup. */
    hashConcurrency?: number;

    /** How long shutdown waits for open connections before exiting. */
    shutdownTimeoutMs?: number;

    /** Overrides the console logger. */
    logger?: Logger;
}

/**
 * Raw contents of the site's config files. A missing file is empty.
 */
export interface SiteConfig {
    headers: string;
    redirects: string;
}

/**
 * What was built at startup, for display.
 */
export interface BuildSummary {
    /** Absolute root directory. */
    root: string;

    /** Number of fingerprinted paths. */
    fingerprints: number;

    /** Number of `_headers` groups. */
    headerGroups: number;

    /** Number of `_redirects` rules. */
    redirects: number;

    /** Number of hidden path templates. */
    hiddenPaths: number;

    /** Whether missing paths fall back to `index.html`. */
    spa: boolean;
}
