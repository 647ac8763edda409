/**
 * `_headers` parsing and routing.
 *
 * The file lists path templates, each followed by indented `Name: value`
 * rules:
 *
 * ```text
 * # security headers for the app shell
 * /app
 *   X-Frame-Options: DENY
 * /assets/{*file}
 *   Cache-Control: public, max-age=31536000, immutable
 * ```
 *
 * @packageDocumentation
 */

import { HEADERS_FILE } from '../constants.js';
import { ConfigParseError, RouteInsertError } from '../errors.js';
import {
    isValidHeaderName,
    isValidHeaderValue,
    withIndexDocument,
} from '../http/header.js';
import { silentLogger, type Logger } from '../logger.js';
import { PathTemplateRouter } from '../router/index.js';

/**
 * A single header to set on matching responses.
 */
export interface HeaderEntry {
    /** Lowercased header name. */
    name: string;
    value: string;
}

/**
 * A path template and the headers applied to responses it matches.
 */
export interface HeaderGroup {
    path: string;
    /** 1-based line of the path in `_headers`. */
    line: number;
    /** Applied in order; a later entry overrides an earlier one of the same name. */
    headers: HeaderEntry[];
}

/**
 * Splits config text into lines, dropping the `\r` of CRLF endings.
 */
export function configLines(text: string): string[] {
    return text.split(/\r?\n/);
}

/**
 * Whether a config line carries nothing (blank or `#` comment).
 */
export function isIgnorableLine(line: string): boolean {
    const trimmed = line.trim();
    return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Runs a router insert for a config rule, reporting a failure against the
 * rule's file and line.
 *
 * @throws \{ConfigParseError\} With kind `route-insert`
 */
export function insertRule(
    file: string,
    line: number,
    insert: () => void,
): void {
    try {
        insert();
    } catch (error) {
        if (error instanceof RouteInsertError) {
            throw new ConfigParseError(
                file,
                line,
                'route-insert',
                error.message,
            );
        }
        throw error;
    }
}

/**
 * Parses `_headers` text into header groups.
 *
 * @throws \{ConfigParseError\} With the 1-based line of the first bad rule
 *
 * @example
 * ```typescript
 * parseHeaders('/app\n  X-Frame-Options: DENY');
 * // [{
 * //     path: '/app',
 * //     line: 1,
 * //     headers: [{ name: 'x-frame-options', value: 'DENY' }],
 * // }]
 * ```
 */
export function parseHeaders(text: string): HeaderGroup[] {
    const groups: HeaderGroup[] = [];
    let current: HeaderGroup | undefined;

    for (const [idx, line] of configLines(text).entries()) {
        const row = idx + 1;
        if (isIgnorableLine(line)) {
            continue;
        }

        if (!line.startsWith('\t') && !line.startsWith(' ')) {
            if (current) {
                groups.push(current);
            }
            current = { path: line.trim(), line: row, headers: [] };
            continue;
        }

        if (!current) {
            throw new ConfigParseError(
                HEADERS_FILE,
                row,
                'no-parse-ctx',
                'you must specify an unindented path before specifying headers',
            );
        }

        const rule = line.trim();
        const colon = rule.indexOf(':');
        if (colon === -1) {
            throw new ConfigParseError(
                HEADERS_FILE,
                row,
                'no-header-colon',
                `expected \`Name: value\`, found \`${rule}\``,
            );
        }

        const name = rule.slice(0, colon).trim();
        const value = rule.slice(colon + 1).trim();
        if (!isValidHeaderName(name)) {
            throw new ConfigParseError(
                HEADERS_FILE,
                row,
                'header-name',
                `\`${name}\` is not a valid header name`,
            );
        }
        if (!isValidHeaderValue(value)) {
            throw new ConfigParseError(
                HEADERS_FILE,
                row,
                'header-value',
                `\`${value}\` is not a valid header value`,
            );
        }

        current.headers.push({ name: name.toLowerCase(), value });
    }

    if (current) {
        groups.push(current);
    }
    return groups;
}

/**
 * Routes request paths to the headers configured for them.
 */
export class HeaderRoutingTable {
    private constructor(
        private readonly router: PathTemplateRouter<readonly HeaderEntry[]>,
    ) {}

    /**
     * @throws \{ConfigParseError\} With kind `route-insert` and the group's
     * line when its template is malformed or clashes with an earlier group
     */
    static build(
        groups: readonly HeaderGroup[],
        logger: Logger = silentLogger,
    ): HeaderRoutingTable {
        const router = new PathTemplateRouter<readonly HeaderEntry[]>();
        for (const group of groups) {
            insertRule(HEADERS_FILE, group.line, () =>
                router.insert(
                    group.path,
                    Object.freeze(
                        group.headers.map((entry) =>
                            Object.freeze({ ...entry }),
                        ),
                    ),
                ),
            );
        }
        logger.info(`Routed ${router.size} header groups`);
        return new HeaderRoutingTable(router);
    }

    /**
     * Finds the headers for a request path.
     *
     * Directory paths are tried with `index.html` appended first, so a group
     * for `/docs/index.html` also covers `/docs/`; the path as requested is
     * the fallback.
     */
    lookup(path: string): readonly HeaderEntry[] | undefined {
        const normalized = withIndexDocument(path);
        const match =
            this.router.match(normalized) ??
            (normalized === path ? null : this.router.match(path));
        return match?.value;
    }

    /**
     * Number of header groups.
     */
    get size(): number {
        return this.router.size;
    }
}

/**
 * Sets every entry on `headers`, in order.
 */
export function applyHeaders(
    headers: Headers,
    entries: readonly HeaderEntry[],
): void {
    for (const { name, value } of entries) {
        headers.set(name, value);
    }
}
