/**
 * Path hiding.
 *
 * Sends requests for hidden paths (the config files read at startup, for
 * instance) to a fallback responder instead of the file responder.
 *
 * @packageDocumentation
 */

import { PathHidingBuildError, RouteInsertError } from '../errors.js';
import { decodePath, requestPath } from '../http/header.js';
import { silentLogger, type Logger } from '../logger.js';
import { PathTemplateRouter } from '../router/index.js';
import {
    PASS,
    emptyResponse,
    type PipelineStage,
    type Responder,
    type StageDecision,
} from './stage.js';

/**
 * Fallback used when none is configured: a bodyless 404.
 */
export const notFoundResponder: Responder = async () => emptyResponse(404);

/**
 * Collects hidden templates, keeping every insert failure.
 *
 * @example
 * ```typescript
 * const guard = PathHidingGuard.builder()
 *     .hide('/_redirects')
 *     .hideAll(['/.htaccess', '/.well-known/{*hide}'])
 *     .build();
 * ```
 */
export class PathHidingGuardBuilder {
    private readonly router = new PathTemplateRouter<true>();
    private readonly failures: Array<{
        template: string;
        error: RouteInsertError;
    }> = [];
    private fallback: Responder = notFoundResponder;
    private logger: Logger = silentLogger;

    /**
     * Hides one template. A failure is recorded, not thrown.
     */
    hide(template: string): this {
        try {
            this.router.insert(template, true);
        } catch (error) {
            if (!(error instanceof RouteInsertError)) {
                throw error;
            }
            this.failures.push({ template, error });
        }
        return this;
    }

    hideAll(templates: Iterable<string>): this {
        for (const template of templates) {
            this.hide(template);
        }
        return this;
    }

    /**
     * Replaces the default bodyless 404 fallback.
     */
    withFallback(fallback: Responder): this {
        this.fallback = fallback;
        return this;
    }

    withLogger(logger: Logger): this {
        this.logger = logger;
        return this;
    }

    /**
     * Failures recorded so far.
     */
    get errors(): ReadonlyArray<{ template: string; error: RouteInsertError }> {
        return this.failures;
    }

    /**
     * @throws \{PathHidingBuildError\} Listing every template that failed
     */
    build(): PathHidingGuard {
        if (this.failures.length > 0) {
            throw new PathHidingBuildError([...this.failures]);
        }
        this.logger.info(`Hiding ${this.router.size} paths`);
        return new PathHidingGuard(this.router, this.fallback, this.logger);
    }
}

/**
 * Pipeline stage diverting hidden paths to a fallback responder.
 */
export class PathHidingGuard implements PipelineStage {
    readonly name = 'hide-paths';

    /** @internal Use {@link PathHidingGuard.build} or {@link PathHidingGuard.builder}. */
    constructor(
        private readonly hidden: PathTemplateRouter<true>,
        private readonly fallback: Responder,
        private readonly logger: Logger,
    ) {}

    static builder(): PathHidingGuardBuilder {
        return new PathHidingGuardBuilder();
    }

    /**
     * Builds a guard for `templates`.
     *
     * @throws \{PathHidingBuildError\} Listing every template that failed,
     * not only the first
     */
    static build(
        templates: Iterable<string>,
        fallback: Responder = notFoundResponder,
        logger: Logger = silentLogger,
    ): PathHidingGuard {
        return PathHidingGuard.builder()
            .hideAll(templates)
            .withFallback(fallback)
            .withLogger(logger)
            .build();
    }

    /**
     * Whether a path matches a hidden template, as written or once
     * percent-decoded (the file responder decodes, so `/%5Fheaders` names the
     * same file as `/_headers`).
     */
    hides(path: string): boolean {
        return (
            this.hidden.match(path) !== null ||
            this.hidden.match(decodePath(path)) !== null
        );
    }

    decide(request: Request): StageDecision {
        const path = requestPath(request);
        if (!this.hides(path)) {
            return PASS;
        }
        this.logger.debug(`Blocked request for ${path}`);
        return { kind: 'respond', respond: this.fallback };
    }
}
