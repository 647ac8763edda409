/**
 * HTTP header and request path helpers.
 *
 * @packageDocumentation
 */

import { INDEX_DOCUMENT } from '../constants.js';

/** RFC 9110 `token`, the grammar of a field name. */
const TOKEN_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Checks whether a string is a legal header field name.
 *
 * @example
 * ```typescript
 * isValidHeaderName('X-Frame-Options'); // true
 * isValidHeaderName('X Frame'); // false
 * ```
 */
export function isValidHeaderName(name: string): boolean {
    return TOKEN_REGEX.test(name);
}

/**
 * Checks whether a string is a legal header field value.
 *
 * Accepts horizontal tab, visible ASCII, space and obs-text (0x80-0xFF).
 * Control characters, DEL and anything above 0xFF are rejected, which also
 * rules out CR/LF header injection.
 */
export function isValidHeaderValue(value: string): boolean {
    for (let i = 0; i < value.length; i++) {
        const code = value.charCodeAt(i);
        if (code === 0x09) continue;
        if (code < 0x20 || code === 0x7f || code > 0xff) {
            return false;
        }
    }
    return true;
}

/**
 * Appends the index document to directory paths.
 *
 * @example
 * ```typescript
 * withIndexDocument('/docs/'); // '/docs/index.html'
 * withIndexDocument('/app.js'); // '/app.js'
 * ```
 */
export function withIndexDocument(path: string): string {
    return path.endsWith('/') ? `${path}${INDEX_DOCUMENT}` : path;
}

/**
 * Extracts the raw (still percent-encoded) path of a request.
 */
export function requestPath(request: Request): string {
    return new URL(request.url).pathname;
}

/**
 * Percent-decodes a path the way the file responder does, returning it
 * unchanged when it is not valid percent-encoding.
 *
 * Reserved characters stay encoded, so `/a%2Fb` does not name `/a/b`.
 *
 * @example
 * ```typescript
 * decodePath('/%5Fheaders'); // '/_headers'
 * decodePath('/a%2Fb'); // '/a%2Fb'
 * ```
 */
export function decodePath(path: string): string {
    try {
        return decodeURI(path);
    } catch {
        return path;
    }
}
