/**
 * `_redirects` parsing and routing.
 *
 * Each line holds a path template, a target and an optional status:
 *
 * ```text
 * /old/{slug} /new/{slug} 301
 * /docs/{*rest} https://docs.example.com/{rest}
 * ```
 *
 * @packageDocumentation
 */

import { DEFAULT_REDIRECT_STATUS, REDIRECTS_FILE } from '../constants.js';
import {
    ConfigParseError,
    InterpolationSyntaxError,
    RouteInsertError,
} from '../errors.js';
import { isValidHeaderValue } from '../http/header.js';
import { silentLogger, type Logger } from '../logger.js';
import { PathTemplateRouter } from '../router/index.js';
import { configLines, insertRule, isIgnorableLine } from './headers.js';
import { Interpolation } from './interpolation.js';

/**
 * A parsed, self-validated redirect.
 */
export interface RedirectRule {
    /** Path template the rule triggers on. */
    path: string;
    /** 1-based line of the rule in `_redirects`. */
    line: number;
    /** Location template, interpolated with the path's captures. */
    target: Interpolation;
    /** Response status. */
    status: number;
}

/**
 * Outcome of resolving a request path against the redirect table.
 */
export type RedirectResolution =
    | { kind: 'redirect'; location: string; status: number }
    | { kind: 'invalid-location'; rendered: string; template: string };

/**
 * Parses a status token.
 *
 * Only 200-599 is accepted since a `Response` cannot carry anything else.
 */
function parseStatus(token: string): number | undefined {
    if (!/^\d{3}$/.test(token)) {
        return undefined;
    }
    const status = Number(token);
    return status >= 200 && status <= 599 ? status : undefined;
}

/**
 * Proves that a rule can be routed and that its target renders.
 *
 * The trigger template is inserted into a throwaway router and matched
 * against its own text; the resulting capture names (with the placeholder
 * text as values) must cover every key the target uses, and the rendered
 * value must be a legal header value.
 */
function validateRule(path: string, target: Interpolation, row: number): void {
    const probe = new PathTemplateRouter<null>();
    try {
        probe.insert(path, null);
    } catch (error) {
        if (error instanceof RouteInsertError) {
            throw new ConfigParseError(
                REDIRECTS_FILE,
                row,
                'route-insert',
                `invalid trigger path: ${error.detail}`,
            );
        }
        throw error;
    }

    const self = probe.match(path);
    if (!self) {
        throw new ConfigParseError(
            REDIRECTS_FILE,
            row,
            'non-self-matching',
            `\`${path}\` does not match itself`,
        );
    }

    const rendered = target.tryRender(self.params);
    if (!rendered.ok) {
        throw new ConfigParseError(
            REDIRECTS_FILE,
            row,
            'interp-keys',
            `\`${target.source}\` uses ${rendered.missing.map((k) => `\`${k}\``).join(', ')}, which \`${path}\` does not capture`,
        );
    }
    if (!isValidHeaderValue(rendered.value)) {
        throw new ConfigParseError(
            REDIRECTS_FILE,
            row,
            'header-value',
            `\`${rendered.value}\` is an invalid header value`,
        );
    }
}

/**
 * Parses `_redirects` text.
 *
 * Every rule is validated as it is read, so a bad target is reported at
 * startup with its line number instead of on the first request that hits it.
 *
 * @throws \{ConfigParseError\} On the first malformed line
 *
 * @example
 * ```typescript
 * const [rule] = parseRedirects('/old/{p} /new/{p} 301');
 * rule.status; // 301
 * rule.target.source; // '/new/{p}'
 * ```
 */
export function parseRedirects(text: string): RedirectRule[] {
    const rules: RedirectRule[] = [];

    for (const [idx, line] of configLines(text).entries()) {
        const row = idx + 1;
        if (isIgnorableLine(line)) {
            continue;
        }

        const tokens = line.trim().split(/\s+/);
        if (tokens.length < 2 || tokens.length > 3) {
            throw new ConfigParseError(
                REDIRECTS_FILE,
                row,
                'wrong-opt-count',
                `wrong number of entries on a line: ${tokens.length}, expected 2 or 3`,
            );
        }

        const [path, targetSource, statusToken] = tokens;

        let target: Interpolation;
        try {
            target = Interpolation.parse(targetSource);
        } catch (error) {
            if (error instanceof InterpolationSyntaxError) {
                throw new ConfigParseError(
                    REDIRECTS_FILE,
                    row,
                    'interpolation',
                    error.message,
                );
            }
            throw error;
        }

        validateRule(path, target, row);

        let status = DEFAULT_REDIRECT_STATUS;
        if (tokens.length === 3) {
            const parsed = parseStatus(statusToken);
            if (parsed === undefined) {
                throw new ConfigParseError(
                    REDIRECTS_FILE,
                    row,
                    'status-code',
                    `\`${statusToken}\` could not be converted to a status`,
                );
            }
            status = parsed;
        }

        rules.push({ path, line: row, target, status });
    }

    return rules;
}

interface RedirectTarget {
    target: Interpolation;
    status: number;
}

/**
 * Routes request paths to redirect targets.
 *
 * @example
 * ```typescript
 * const table = RedirectRoutingTable.build(
 *     parseRedirects('/old/{p} /new/{p} 301'),
 * );
 * table.resolve('/old/42');
 * // { kind: 'redirect', location: '/new/42', status: 301 }
 * ```
 */
export class RedirectRoutingTable {
    private constructor(
        private readonly router: PathTemplateRouter<RedirectTarget>,
    ) {}

    /**
     * @throws \{ConfigParseError\} With kind `route-insert` and the rule's
     * line when it clashes with an earlier rule
     */
    static build(
        rules: readonly RedirectRule[],
        logger: Logger = silentLogger,
    ): RedirectRoutingTable {
        const router = new PathTemplateRouter<RedirectTarget>();
        for (const rule of rules) {
            insertRule(REDIRECTS_FILE, rule.line, () =>
                router.insert(rule.path, {
                    target: rule.target,
                    status: rule.status,
                }),
            );
        }
        logger.info(`Routed ${router.size} redirects`);
        return new RedirectRoutingTable(router);
    }

    /**
     * Resolves a request path.
     *
     * Build-time validation only covers the template's own shape; a request
     * whose captured segments hold characters that are illegal in a header
     * yields `invalid-location`.
     *
     * @returns `null` when no rule matches
     */
    resolve(path: string): RedirectResolution | null {
        const match = this.router.match(path);
        if (!match) {
            return null;
        }

        const { target, status } = match.value;
        const rendered = target.render(match.params);
        if (!isValidHeaderValue(rendered)) {
            return {
                kind: 'invalid-location',
                rendered,
                template: match.template,
            };
        }
        return { kind: 'redirect', location: rendered, status };
    }

    /**
     * Number of redirect rules.
     */
    get size(): number {
        return this.router.size;
    }
}
