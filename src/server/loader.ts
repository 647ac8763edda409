/**
 * Root directory and config file loading.
 *
 * @packageDocumentation
 */

import { readFile, realpath, stat } from 'fs/promises';
import { join, resolve } from 'path';

import { HEADERS_FILE, REDIRECTS_FILE } from '../constants.js';
import { StartupError } from '../errors.js';
import type { SiteConfig } from '../types.js';
import { isNotFoundError } from '../utils.js';

/**
 * Reads a config file from the served root.
 *
 * @returns The file's text, or an empty string when it does not exist
 * @throws \{StartupError\} When the file exists but cannot be read
 */
export async function readConfigFile(
    rootDir: string,
    name: string,
): Promise<string> {
    const path = join(rootDir, name);
    try {
        return await readFile(path, 'utf-8');
    } catch (error) {
        if (isNotFoundError(error)) {
            return '';
        }
        const cause = error instanceof Error ? error : undefined;
        throw new StartupError(
            `Failed to read ${path}: ${cause?.message ?? String(error)}`,
            cause,
        );
    }
}

/**
 * Loads `_headers` and `_redirects` from the served root.
 *
 * @example
 * ```typescript
 * const config = await loadSiteConfig('/var/www/site');
 * config.redirects; // '' when there is no _redirects file
 * ```
 */
export async function loadSiteConfig(rootDir: string): Promise<SiteConfig> {
    const [headers, redirects] = await Promise.all([
        readConfigFile(rootDir, HEADERS_FILE),
        readConfigFile(rootDir, REDIRECTS_FILE),
    ]);
    return { headers, redirects };
}

/**
 * Checks if a directory exists at the given path.
 */
export async function directoryExists(path: string): Promise<boolean> {
    try {
        const stats = await stat(path);
        return stats.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Resolves the directory to serve to its canonical absolute path.
 *
 * @throws \{StartupError\} When the input is not a directory
 */
export async function resolveRootDir(input: string): Promise<string> {
    const resolved = resolve(input);
    if (!(await directoryExists(resolved))) {
        throw new StartupError(`Expected ${input} to be a directory`);
    }
    return realpath(resolved);
}
