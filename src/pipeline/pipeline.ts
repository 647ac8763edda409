/**
 * Request pipeline composition.
 *
 * @packageDocumentation
 */

import type { ContentFingerprintIndex } from '../fingerprint/fingerprint-index.js';
import { silentLogger, type Logger } from '../logger.js';
import type { HeaderRoutingTable } from '../rules/headers.js';
import type { RedirectRoutingTable } from '../rules/redirects.js';
import { ETagStage } from './etag-stage.js';
import { HeadersStage } from './headers-stage.js';
import type { PathHidingGuard } from './hide-paths.js';
import { RedirectStage } from './redirect-stage.js';
import { runStages, type PipelineStage, type Responder } from './stage.js';

/**
 * The structures built at startup plus the file responder they wrap.
 */
export interface PipelineComponents {
    headers: HeaderRoutingTable;
    redirects: RedirectRoutingTable;
    fingerprints: ContentFingerprintIndex;
    hiding: PathHidingGuard;
    /** Serves static files; only reached by requests no stage answered. */
    responder: Responder;
    logger?: Logger;
}

/**
 * Runs requests through a fixed list of stages ending at a responder.
 *
 * Stages and tables are never mutated after construction, so one pipeline
 * serves any number of concurrent requests.
 *
 * @example
 * ```typescript
 * const pipeline = RequestPipeline.create({
 *     headers, redirects, fingerprints, hiding,
 *     responder: (request) => files.fetch(request),
 * });
 * const response = await pipeline.fetch(new Request('http://localhost/'));
 * ```
 */
export class RequestPipeline {
    constructor(
        private readonly stages: readonly PipelineStage[],
        private readonly responder: Responder,
    ) {}

    /**
     * Composes the standard order: header injection, redirects, fingerprints,
     * path hiding, then the file responder.
     */
    static create(components: PipelineComponents): RequestPipeline {
        const logger = components.logger ?? silentLogger;
        return new RequestPipeline(
            [
                new HeadersStage(components.headers),
                new RedirectStage(components.redirects, logger),
                new ETagStage(components.fingerprints),
                components.hiding,
            ],
            components.responder,
        );
    }

    /**
     * Handles one request.
     */
    readonly fetch: Responder = (request) =>
        runStages(this.stages, this.responder, request);

    /**
     * Stage names in execution order.
     */
    get stageNames(): string[] {
        return this.stages.map((stage) => stage.name);
    }
}
