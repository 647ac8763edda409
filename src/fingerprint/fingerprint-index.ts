/**
 * Content fingerprint index.
 *
 * This module walks the served root once at startup, hashes every file and
 * its precompressed siblings, and exposes the resulting tags by request path.
 *
 * @packageDocumentation
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { lstat, readdir } from 'fs/promises';
import { sep } from 'path';

import { DEFAULT_HASH_CONCURRENCY } from '../constants.js';
import { FingerprintBuildError } from '../errors.js';
import { isValidHeaderValue, withIndexDocument } from '../http/header.js';
import { silentLogger, type Logger } from '../logger.js';
import { isNotFoundError, runConcurrent } from '../utils.js';
import {
    PRECOMPRESSED_VARIANTS,
    ResourceTagSet,
    type ResourceTags,
} from './tag-set.js';

/**
 * Options for {@link ContentFingerprintIndex.build}.
 */
export interface FingerprintIndexOptions {
    /** Maximum number of files hashed at once. */
    concurrency?: number;

    /** Receives build progress messages. */
    logger?: Logger;

    /** Index keys to leave out, e.g. files that are never served. */
    exclude?: (key: string) => boolean;
}

interface FoundFile {
    /** Absolute path, kept as bytes so names round-trip exactly. */
    path: Buffer;
    /** Index key, e.g. `/css/site.css`. */
    key: string;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function displayPath(path: Buffer): string {
    return path.toString('utf-8');
}

/**
 * Wraps anything that is not already a build error as an I/O failure.
 */
function toBuildError(error: unknown, path: Buffer): FingerprintBuildError {
    if (error instanceof FingerprintBuildError) {
        return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new FingerprintBuildError(
        'io',
        displayPath(path),
        cause.message,
        cause,
    );
}

/**
 * Recursively lists regular files below `dir`.
 *
 * Symbolic links and special files are rejected rather than skipped, so a
 * served tree never silently loses fingerprints.
 */
async function listFiles(dir: Buffer, prefix: string): Promise<FoundFile[]> {
    let names: Buffer[];
    try {
        names = await readdir(dir, { encoding: 'buffer' });
    } catch (error) {
        throw toBuildError(error, dir);
    }

    const files: FoundFile[] = [];
    for (const name of names) {
        const path = Buffer.concat([dir, Buffer.from(sep), name]);

        let decoded: string;
        try {
            decoded = utf8.decode(name);
        } catch {
            throw new FingerprintBuildError(
                'path-not-utf8',
                displayPath(path),
                'path is not valid UTF-8',
            );
        }

        const key = `${prefix}/${decoded}`;
        const stats = await lstat(path).catch((error: unknown) => {
            throw toBuildError(error, path);
        });

        if (stats.isDirectory()) {
            files.push(...(await listFiles(path, key)));
        } else if (stats.isFile()) {
            files.push({ path, key });
        } else {
            throw new FingerprintBuildError(
                'unsupported-entry',
                displayPath(path),
                'symbolic links and special files are not supported',
            );
        }
    }

    return files;
}

/**
 * Computes the quoted SHA-256 `ETag` of a file's full content.
 */
export async function hashFile(path: Buffer | string): Promise<string> {
    const hash = createHash('sha256');
    for await (const chunk of createReadStream(path)) {
        hash.update(chunk);
    }
    const tag = `"${hash.digest('hex')}"`;

    if (!isValidHeaderValue(tag)) {
        throw new FingerprintBuildError(
            'invalid-header-value',
            typeof path === 'string' ? path : displayPath(path),
            `\`${tag}\` is not a valid header value`,
        );
    }
    return tag;
}

/**
 * Hashes a file if it exists; only a missing file is tolerated.
 */
async function hashIfPresent(path: Buffer): Promise<string | undefined> {
    try {
        return await hashFile(path);
    } catch (error) {
        if (isNotFoundError(error)) {
            return undefined;
        }
        throw toBuildError(error, path);
    }
}

async function fingerprintFile(path: Buffer): Promise<ResourceTagSet> {
    let raw: string;
    try {
        raw = await hashFile(path);
    } catch (error) {
        throw toBuildError(error, path);
    }

    const tags: ResourceTags = { raw };
    for (const { suffix, variant } of PRECOMPRESSED_VARIANTS) {
        tags[variant] = await hashIfPresent(
            Buffer.concat([path, Buffer.from(suffix)]),
        );
    }

    return new ResourceTagSet(tags);
}

/**
 * Maps request paths to the content fingerprints of the files behind them.
 *
 * Keys are literal paths (`/css/site.css`), not templates; lookups are exact.
 *
 * @example
 * ```typescript
 * const index = await ContentFingerprintIndex.build('/var/www/site');
 * index.lookup('/docs/')?.raw; // tag of /docs/index.html
 * ```
 */
export class ContentFingerprintIndex {
    private constructor(
        private readonly tags: ReadonlyMap<string, ResourceTagSet>,
    ) {}

    /**
     * Hashes every file below `rootDir`.
     *
     * @param rootDir - Directory being served
     * @param options - Hashing concurrency and logger
     * @throws \{FingerprintBuildError\} On I/O failure, a symbolic link or
     * special file, or a name that is not valid UTF-8
     */
    static async build(
        rootDir: string,
        options: FingerprintIndexOptions = {},
    ): Promise<ContentFingerprintIndex> {
        const logger = options.logger ?? silentLogger;
        const root = Buffer.from(
            rootDir.length > 1 ? rootDir.replace(/[\\/]+$/, '') : rootDir,
        );

        const exclude = options.exclude ?? (() => false);
        const files = (await listFiles(root, '')).filter(
            (file) => !exclude(file.key),
        );
        logger.debug(`Hashing ${files.length} files in ${rootDir}`);

        const tagSets = await runConcurrent(
            files,
            options.concurrency ?? DEFAULT_HASH_CONCURRENCY,
            (file) => fingerprintFile(file.path),
        );

        const map = new Map<string, ResourceTagSet>();
        files.forEach((file, i) => map.set(file.key, tagSets[i]));

        logger.info(`Hashed ${map.size} files`);
        return new ContentFingerprintIndex(map);
    }

    /**
     * Creates an index from precomputed tags.
     */
    static fromEntries(
        entries: Iterable<readonly [string, ResourceTags]>,
    ): ContentFingerprintIndex {
        const map = new Map<string, ResourceTagSet>();
        for (const [path, tags] of entries) {
            map.set(path, new ResourceTagSet(tags));
        }
        return new ContentFingerprintIndex(map);
    }

    /**
     * Looks up a request path, appending `index.html` to directory paths.
     */
    lookup(requestPath: string): ResourceTagSet | undefined {
        return this.tags.get(withIndexDocument(requestPath));
    }

    /**
     * Indexed paths.
     */
    paths(): IterableIterator<string> {
        return this.tags.keys();
    }

    /**
     * Number of indexed paths.
     */
    get size(): number {
        return this.tags.size;
    }
}
