/**
 * `_headers` and `_redirects` rules.
 *
 * @packageDocumentation
 */

export {
    parseHeaders,
    applyHeaders,
    HeaderRoutingTable,
    type HeaderEntry,
    type HeaderGroup,
} from './headers.js';
export {
    parseRedirects,
    RedirectRoutingTable,
    type RedirectRule,
    type RedirectResolution,
} from './redirects.js';
export { Interpolation, type RenderResult } from './interpolation.js';
