/**
 * Redirect stage.
 */

import { requestPath } from '../http/header.js';
import { silentLogger, type Logger } from '../logger.js';
import type { RedirectResolution } from '../rules/redirects.js';
import {
    PASS,
    emptyResponse,
    respondWith,
    type PipelineStage,
    type StageDecision,
} from './stage.js';

/**
 * Anything that resolves request paths to redirects, such as a
 * `RedirectRoutingTable`.
 */
export interface RedirectResolver {
    resolve(path: string): RedirectResolution | null;
}

/**
 * Answers requests matching a `_redirects` rule with an empty redirect.
 *
 * A location that renders to an illegal header value for this particular
 * request gets a bodyless 500 instead.
 */
export class RedirectStage implements PipelineStage {
    readonly name = 'redirects';

    constructor(
        private readonly table: RedirectResolver,
        private readonly logger: Logger = silentLogger,
    ) {}

    decide(request: Request): StageDecision {
        const path = requestPath(request);
        const resolution = this.table.resolve(path);
        if (!resolution) {
            return PASS;
        }

        if (resolution.kind === 'invalid-location') {
            this.logger.warn(
                `Redirect \`${resolution.template}\` rendered an invalid Location for ${path}`,
            );
            return respondWith(emptyResponse(500));
        }

        this.logger.debug(
            `Redirecting ${path} to ${resolution.location} (${resolution.status})`,
        );
        return respondWith(
            emptyResponse(resolution.status, { Location: resolution.location }),
        );
    }
}
