/**
 * Hono middleware for the server.
 *
 * @packageDocumentation
 */

export {
    loggerMiddleware,
    formatStatus,
    type LoggerOptions,
} from './logger.js';
