/**
 * Static file responder.
 *
 * Serves files (and their precompressed siblings) from the root directory
 * with `serveStatic`, falling back to `404.html` or, for single page apps,
 * `index.html`.
 *
 * @packageDocumentation
 */

import { Hono } from 'hono';
import { serveStatic } from '@hono/node-server/serve-static';
import { readFile } from 'fs/promises';
import { join, relative } from 'path';

import { INDEX_DOCUMENT, NOT_FOUND_DOCUMENT } from '../constants.js';
import type { Responder } from '../pipeline/stage.js';
import { isNotFoundError } from '../utils.js';

/**
 * Options for {@link createFileResponder}.
 */
export interface FileResponderOptions {
    /** Absolute directory to serve. */
    root: string;

    /** Answer missing paths with `index.html` and status 200. */
    spa?: boolean;
}

/**
 * Creates the responder at the end of the pipeline.
 *
 * Only `GET` and `HEAD` are served; other methods get a bodyless 405.
 *
 * `serveStatic` picks a `.br`, `.zst` or `.gz` sibling when the client
 * accepts it and reports the choice in `Content-Encoding`, which the
 * fingerprint stage reads to pick the matching tag.
 *
 * @example
 * ```typescript
 * const files = createFileResponder({ root: '/var/www/site' });
 * const response = await files(new Request('http://localhost/style.css'));
 * ```
 */
export function createFileResponder(options: FileResponderOptions): Responder {
    const app = new Hono();
    const fallbackDocument = options.spa ? INDEX_DOCUMENT : NOT_FOUND_DOCUMENT;

    app.use('*', async (c, next) => {
        if (c.req.method === 'GET' || c.req.method === 'HEAD') {
            return next();
        }
        return c.body(null, 405, { Allow: 'GET, HEAD' });
    });

    app.use(
        '*',
        serveStatic({
            // serveStatic resolves its root against the working directory
            root: relative(process.cwd(), options.root) || '.',
            precompressed: true,
        }),
    );

    app.all('*', async (c) => {
        let content: string;
        try {
            content = await readFile(
                join(options.root, fallbackDocument),
                'utf-8',
            );
        } catch (error) {
            if (isNotFoundError(error)) {
                return c.body(null, 404);
            }
            throw error;
        }

        c.header('Content-Type', 'text/html; charset=utf-8');
        return c.body(content, options.spa ? 200 : 404);
    });

    return async (request) => app.fetch(request);
}
