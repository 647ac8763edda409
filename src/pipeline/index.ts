/**
 * Request pipeline and its stages.
 *
 * @packageDocumentation
 */

export { RequestPipeline, type PipelineComponents } from './pipeline.js';
export {
    runStages,
    respondWith,
    emptyResponse,
    withEditableHeaders,
    PASS,
    type PipelineStage,
    type Responder,
    type StageDecision,
} from './stage.js';
export { HeadersStage } from './headers-stage.js';
export { RedirectStage, type RedirectResolver } from './redirect-stage.js';
export { ETagStage, tagResponse } from './etag-stage.js';
export {
    PathHidingGuard,
    PathHidingGuardBuilder,
    notFoundResponder,
} from './hide-paths.js';
