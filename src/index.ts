/**
 * edgeserve
 *
 * Static file server with per-route headers, templated redirects and
 * content-derived ETags.
 *
 * @example
 * ```typescript
 * import { createApp } from 'edgeserve';
 *
 * const { app } = await createApp({
 *     dir: '/var/www/site',
 *     port: 8080,
 *     host: '0.0.0.0',
 * });
 * ```
 *
 * @packageDocumentation
 */

export { runServer } from './runner.js';
export { createApp, getServerInfo } from './server/app.js';
export {
    createFileResponder,
    loadSiteConfig,
    readConfigFile,
    resolveRootDir,
    type FileResponderOptions,
} from './server/index.js';
export * from './router/index.js';
export * from './fingerprint/index.js';
export * from './rules/index.js';
export * from './pipeline/index.js';
export * from './errors.js';
export {
    createLogger,
    silentLogger,
    type Logger,
    type LoggerConfig,
} from './logger.js';
export { loggerMiddleware, type LoggerOptions } from './middleware/index.js';
export type { ServerOptions, SiteConfig, BuildSummary } from './types.js';
export * from './constants.js';
