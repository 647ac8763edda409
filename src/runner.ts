/**
 * Programmatic interface for running the server.
 *
 * @packageDocumentation
 */

import { serve } from '@hono/node-server';
import type { Server } from 'net';
import pc from 'picocolors';

import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from './constants.js';
import { createApp, getServerInfo } from './server/app.js';
import type { ServerOptions } from './types.js';

/**
 * Prints the startup banner.
 */
export function printBanner(): void {
    console.log(pc.bold(pc.cyan('\n  Edge Static Server')));
    console.log(pc.gray('  ' + '─'.repeat(30)));
    console.log();
}

/**
 * Starts listening, settling once the socket is bound.
 *
 * @throws \{Error\} The listen error, e.g. `EADDRINUSE`
 */
function listen(
    fetch: (request: Request) => Response | Promise<Response>,
    options: ServerOptions,
): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server: Server = serve(
            { fetch, port: options.port, hostname: options.host },
            () => {
                server.off('error', reject);
                resolve(server);
            },
        );
        server.once('error', reject);
    });
}

/**
 * Runs the server programmatically.
 *
 * Builds every startup table, then listens until `SIGINT` or `SIGTERM`.
 * On a signal the listener stops accepting connections and the process
 * exits once open connections drain, or after `shutdownTimeoutMs`,
 * whichever comes first.
 *
 * @param options - Server configuration options
 * @throws \{Error\} When a config file is malformed, the tree cannot be
 * hashed, or the port cannot be bound
 *
 * @example
 * ```typescript
 * import { runServer } from 'edgeserve';
 *
 * await runServer({
 *     dir: './public',
 *     port: 8080,
 *     host: '0.0.0.0',
 *     verbose: true,
 * });
 * ```
 */
export async function runServer(options: ServerOptions): Promise<void> {
    printBanner();

    const { app, summary } = await createApp(options);

    // Display server info
    const info = getServerInfo(summary, options);
    for (const line of info) {
        console.log(`  ${line}`);
    }
    console.log();

    const server = await listen(app.fetch, options);

    console.log(pc.green(`  Server started!`));
    console.log();
    console.log(pc.gray(`  Press ${pc.bold('Ctrl+C')} to stop`));
    console.log();

    const timeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    let stopping = false;

    const shutdown = (signal: NodeJS.Signals) => {
        if (stopping) {
            return;
        }
        stopping = true;
        console.log(pc.gray(`\n  Received ${signal}, shutting down...`));

        const timer = setTimeout(() => {
            console.warn(
                pc.yellow(
                    `  Connections still open after ${timeoutMs}ms, exiting`,
                ),
            );
            process.exit(0);
        }, timeoutMs);
        timer.unref();

        server.close((error) => {
            clearTimeout(timer);
            if (error) {
                console.error(pc.red(`  Error: ${error.message}`));
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}
