/**
 * Path template routing.
 *
 * @packageDocumentation
 */

export { PathTemplateRouter, type RouteMatch } from './router.js';
export { parseTemplate, type TemplateSegment } from './template.js';
