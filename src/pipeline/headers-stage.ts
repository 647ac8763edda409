/**
 * Header injection stage.
 */

import { requestPath } from '../http/header.js';
import { applyHeaders, type HeaderRoutingTable } from '../rules/headers.js';
import {
    PASS,
    withEditableHeaders,
    type PipelineStage,
    type StageDecision,
} from './stage.js';

/**
 * Adds the `_headers` entries matching the request path to the eventual
 * response, whichever later stage produced it.
 */
export class HeadersStage implements PipelineStage {
    readonly name = 'headers';

    constructor(private readonly table: HeaderRoutingTable) {}

    decide(request: Request): StageDecision {
        const entries = this.table.lookup(requestPath(request));
        if (!entries || entries.length === 0) {
            return PASS;
        }
        return {
            kind: 'transform',
            transform: (response) =>
                withEditableHeaders(response, (headers) =>
                    applyHeaders(headers, entries),
                ),
        };
    }
}
