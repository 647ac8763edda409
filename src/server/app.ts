/**
 * Hono app factory - builds the startup tables and mounts the request
 * pipeline.
 */

import { Hono } from 'hono';

import { DEFAULT_HASH_CONCURRENCY, HIDDEN_PATHS } from '../constants.js';
import { ContentFingerprintIndex } from '../fingerprint/index.js';
import { createLogger } from '../logger.js';
import { loggerMiddleware } from '../middleware/logger.js';
import {
    PathHidingGuard,
    RequestPipeline,
    notFoundResponder,
} from '../pipeline/index.js';
import {
    HeaderRoutingTable,
    RedirectRoutingTable,
    parseHeaders,
    parseRedirects,
} from '../rules/index.js';
import type { BuildSummary, ServerOptions } from '../types.js';
import { createFileResponder } from './file-responder.js';
import { loadSiteConfig } from './loader.js';

/**
 * Create a Hono app serving `options.dir` through the request pipeline.
 *
 * Config files are parsed before anything is hashed so a typo in
 * `_redirects` fails fast. Hidden paths are left out of the fingerprint
 * index; the fingerprint stage runs before the hiding guard and must not
 * answer for them.
 *
 * @throws \{ConfigParseError\} When `_headers` or `_redirects` is malformed
 * or two rules in one file conflict
 * @throws \{FingerprintBuildError\} When the tree cannot be hashed
 */
export async function createApp(options: ServerOptions): Promise<{
    app: Hono;
    pipeline: RequestPipeline;
    summary: BuildSummary;
}> {
    const logger = options.logger ?? createLogger({ verbose: options.verbose });
    const root = options.dir;

    const config = await loadSiteConfig(root);
    const headers = HeaderRoutingTable.build(
        parseHeaders(config.headers),
        logger,
    );
    const redirects = RedirectRoutingTable.build(
        parseRedirects(config.redirects),
        logger,
    );
    const hiding = PathHidingGuard.build(
        HIDDEN_PATHS,
        notFoundResponder,
        logger,
    );
    const fingerprints = await ContentFingerprintIndex.build(root, {
        concurrency: options.hashConcurrency ?? DEFAULT_HASH_CONCURRENCY,
        logger,
        exclude: (key) => hiding.hides(key),
    });

    const pipeline = RequestPipeline.create({
        headers,
        redirects,
        fingerprints,
        hiding,
        responder: createFileResponder({ root, spa: options.spa }),
        logger,
    });
    logger.debug(`Pipeline: ${pipeline.stageNames.join(' -> ')}`);

    const app = new Hono();

    if (options.verbose) {
        app.use('*', loggerMiddleware({ enabled: true }));
    }

    app.all('*', (c) => pipeline.fetch(c.req.raw));

    app.onError((err, c) => {
        logger.error(`${c.req.method} ${c.req.path} failed: ${err.message}`);
        return c.body(null, 500);
    });

    const summary: BuildSummary = {
        root,
        fingerprints: fingerprints.size,
        headerGroups: headers.size,
        redirects: redirects.size,
        hiddenPaths: HIDDEN_PATHS.length,
        spa: options.spa ?? false,
    };

    return { app, pipeline, summary };
}

/**
 * Get server info for display
 */
export function getServerInfo(
    summary: BuildSummary,
    options: ServerOptions,
): string[] {
    const lines: string[] = [];

    lines.push(`Root: ${summary.root}`);
    lines.push('');
    lines.push(`Fingerprinted paths: ${summary.fingerprints}`);
    lines.push(`Header groups: ${summary.headerGroups}`);
    lines.push(`Redirects: ${summary.redirects}`);
    lines.push(`Hidden paths: ${summary.hiddenPaths}`);
    lines.push('');
    lines.push(`Listening on: http://${options.host}:${options.port}`);

    if (summary.spa) {
        lines.push('Mode: Single page app (missing paths serve index.html)');
    }

    return lines;
}
