/**
 * Fingerprint stage: `ETag`, `If-None-Match` and `Last-Modified`.
 */

import { decodePath, requestPath } from '../http/header.js';
import type { ContentFingerprintIndex } from '../fingerprint/fingerprint-index.js';
import type { ResourceTagSet } from '../fingerprint/tag-set.js';
import {
    emptyResponse,
    respondWith,
    withEditableHeaders,
    type PipelineStage,
    type StageDecision,
} from './stage.js';

/**
 * Sets the content fingerprint of the served variant as `ETag` and drops
 * `Last-Modified`, so clients revalidate against the content hash alone.
 *
 * An `If-None-Match` equal to the tag of any variant of the resource is
 * answered with 304 without touching the file responder.
 */
export class ETagStage implements PipelineStage {
    readonly name = 'etags';

    constructor(private readonly index: ContentFingerprintIndex) {}

    decide(request: Request): StageDecision {
        const tags = this.index.lookup(decodePath(requestPath(request)));

        const ifNoneMatch = request.headers.get('If-None-Match');
        if (tags && ifNoneMatch !== null && tags.containsTag(ifNoneMatch)) {
            return respondWith(emptyResponse(304, { ETag: ifNoneMatch }));
        }

        return {
            kind: 'transform',
            transform: (response) => tagResponse(response, tags),
        };
    }
}

/**
 * Applies the tag matching the response's `Content-Encoding`, and always
 * removes `Last-Modified`.
 */
export function tagResponse(
    response: Response,
    tags: ResourceTagSet | undefined,
): Response {
    return withEditableHeaders(response, (headers) => {
        headers.delete('Last-Modified');
        const tag = tags?.tagForEncoding(headers.get('Content-Encoding'));
        if (tag !== undefined) {
            headers.set('ETag', tag);
        }
    });
}
