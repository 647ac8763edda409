/**
 * Request logging middleware.
 *
 * Logs method, path, colored status and response time once the response
 * is ready.
 *
 * @packageDocumentation
 */

import type { Context, Next } from 'hono';
import pc from 'picocolors';

/**
 * Configuration options for the logger middleware.
 */
export interface LoggerOptions {
    /** Whether request logging is enabled. */
    enabled: boolean;

    /** Where lines go. Defaults to `console.log`. */
    write?: (line: string) => void;
}

function formatMethod(method: string): string {
    switch (method) {
        case 'GET':
            return pc.green(method);
        case 'HEAD':
            return pc.blue(method);
        default:
            return pc.gray(method);
    }
}

/**
 * Colors a status by class: 2xx green, 304 gray (served from the client's
 * cache), other 3xx cyan, 4xx yellow, 5xx red.
 */
export function formatStatus(status: number): string {
    if (status >= 200 && status < 300) {
        return pc.green(String(status));
    } else if (status === 304) {
        return pc.gray(String(status));
    } else if (status >= 300 && status < 400) {
        return pc.cyan(String(status));
    } else if (status >= 400 && status < 500) {
        return pc.yellow(String(status));
    } else if (status >= 500) {
        return pc.red(String(status));
    }
    return String(status);
}

function formatTime(ms: number): string {
    if (ms < 100) {
        return pc.green(`${ms.toFixed(0)}ms`);
    } else if (ms < 500) {
        return pc.yellow(`${ms.toFixed(0)}ms`);
    }
    return pc.red(`${ms.toFixed(0)}ms`);
}

/**
 * Creates a Hono middleware that logs HTTP requests.
 *
 * Redirects also show their `Location`.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ enabled: true }));
 *
 * // Output example:
 * //   GET /old/42 301 -> /new/42 1ms
 * ```
 */
export function loggerMiddleware(options: LoggerOptions = { enabled: true }) {
    const write = options.write ?? ((line: string) => console.log(line));

    return async (c: Context, next: Next) => {
        if (!options.enabled) {
            return next();
        }

        const start = Date.now();
        const method = c.req.method;
        const path = c.req.path;

        await next();

        const elapsed = Date.now() - start;
        const status = c.res.status;
        const location = c.res.headers.get('Location');
        const target = location ? ` ${pc.gray('->')} ${location}` : '';

        write(
            `  ${formatMethod(method)} ${path} ${formatStatus(status)}${target} ${formatTime(elapsed)}`,
        );
    };
}
