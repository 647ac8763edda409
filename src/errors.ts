/**
 * Error definitions.
 *
 * Every error raised while building the routing structures is fatal at
 * startup.
 *
 * @packageDocumentation
 */

/**
 * Reasons a path template can be rejected by the router.
 */
export type RouteInsertErrorKind = 'invalid-template' | 'conflict';

/**
 * Error thrown when a path template cannot be inserted into a router.
 */
export class RouteInsertError extends Error {
    readonly name = 'RouteInsertError';

    /**
     * @param template - The template that was being inserted
     * @param kind - Why the insert failed
     * @param detail - Human readable description of the problem
     */
    constructor(
        public readonly template: string,
        public readonly kind: RouteInsertErrorKind,
        public readonly detail: string,
    ) {
        super(`Cannot insert route \`${template}\`: ${detail}`);
    }
}

/**
 * Sub-kinds of configuration parse failures.
 *
 * The first four come from `_headers`, the rest from `_redirects`.
 */
export type ConfigParseErrorKind =
    | 'no-parse-ctx'
    | 'no-header-colon'
    | 'header-name'
    | 'header-value'
    | 'wrong-opt-count'
    | 'status-code'
    | 'interpolation'
    | 'interp-keys'
    | 'route-insert'
    | 'non-self-matching';

/**
 * Error thrown when a `_headers` or `_redirects` line is malformed.
 */
export class ConfigParseError extends Error {
    readonly name = 'ConfigParseError';

    /**
     * @param file - Name of the config file (`_headers` or `_redirects`)
     * @param line - 1-based line number
     * @param kind - What went wrong
     * @param detail - Description including the offending token
     */
    constructor(
        public readonly file: string,
        public readonly line: number,
        public readonly kind: ConfigParseErrorKind,
        public readonly detail: string,
    ) {
        super(`${file} at line ${line}: ${detail}`);
    }
}

/**
 * Error thrown when one or more hidden path templates could not be routed.
 *
 * Unlike the other builders, the hiding guard collects every failure so
 * they can be reported together.
 */
export class PathHidingBuildError extends Error {
    readonly name = 'PathHidingBuildError';

    constructor(
        public readonly failures: ReadonlyArray<{
            template: string;
            error: RouteInsertError;
        }>,
    ) {
        super(
            `Failed to build hidden paths:\n` +
                failures.map((f) => `  - ${f.error.message}`).join('\n'),
        );
    }
}

/**
 * Reasons the content fingerprint index can fail to build.
 */
export type FingerprintBuildErrorKind =
    | 'io'
    | 'unsupported-entry'
    | 'path-not-utf8'
    | 'invalid-header-value';

/**
 * Error thrown when the content fingerprint index cannot be built.
 */
export class FingerprintBuildError extends Error {
    readonly name = 'FingerprintBuildError';

    /**
     * @param kind - What went wrong
     * @param path - File system path involved
     * @param detail - Description of the problem
     * @param cause - Underlying I/O error, when there is one
     */
    constructor(
        public readonly kind: FingerprintBuildErrorKind,
        public readonly path: string,
        detail: string,
        public readonly cause?: Error,
    ) {
        super(`Failed to fingerprint ${path}: ${detail}`);
    }
}

/**
 * Error thrown when the server cannot start (bad root directory, unreadable
 * config file).
 */
export class StartupError extends Error {
    readonly name = 'StartupError';

    constructor(
        message: string,
        public readonly cause?: Error,
    ) {
        super(message);
    }
}

/**
 * Error thrown when a redirect target template is malformed.
 */
export class InterpolationSyntaxError extends Error {
    readonly name = 'InterpolationSyntaxError';

    /**
     * @param template - The target template
     * @param position - 0-based offset of the problem
     * @param detail - What is wrong at that offset
     */
    constructor(
        public readonly template: string,
        public readonly position: number,
        detail: string,
    ) {
        super(`${detail} at offset ${position} of \`${template}\``);
    }
}
