#!/usr/bin/env node

/**
 * CLI for edgeserve
 */

import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';

import {
    DEFAULT_HASH_CONCURRENCY,
    DEFAULT_HOST,
    DEFAULT_PORT,
    DEFAULT_SHUTDOWN_TIMEOUT_MS,
    VERSION,
} from './constants.js';
import { runServer } from './runner.js';
import { resolveRootDir } from './server/loader.js';
import type { ServerOptions } from './types.js';

interface CliOptions {
    port: number;
    host: string;
    spa: boolean;
    verbose: boolean;
    hashConcurrency: number;
    shutdownTimeout: number;
}

function parseInteger(min: number, max: number) {
    return (value: string): number => {
        if (!/^\d+$/.test(value)) {
            throw new InvalidArgumentError('Not a number.');
        }
        const parsed = parseInt(value, 10);
        if (parsed < min || parsed > max) {
            throw new InvalidArgumentError(`Must be between ${min} and ${max}.`);
        }
        return parsed;
    };
}

const program = new Command();

program
    .name('edgeserve')
    .description(
        'Serve a static directory with _headers, _redirects and content ETags',
    )
    .version(VERSION)
    .argument('<dir>', 'Directory to serve')
    .option(
        '-p, --port <number>',
        'Port to listen on',
        parseInteger(0, 65535),
        DEFAULT_PORT,
    )
    .option('-H, --host <string>', 'Host to bind to', DEFAULT_HOST)
    .option('--spa', 'Serve index.html for missing paths', false)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .option(
        '--hash-concurrency <n>',
        'Files hashed at once during startup',
        parseInteger(1, 1024),
        DEFAULT_HASH_CONCURRENCY,
    )
    .option(
        '--shutdown-timeout <ms>',
        'How long to wait for open connections on shutdown',
        parseInteger(0, 3_600_000),
        DEFAULT_SHUTDOWN_TIMEOUT_MS,
    )
    .action(async (dir: string, opts: CliOptions) => {
        try {
            const root = await resolveRootDir(dir);

            const options: ServerOptions = {
                dir: root,
                port: opts.port,
                host: opts.host,
                spa: opts.spa,
                verbose: opts.verbose,
                hashConcurrency: opts.hashConcurrency,
                shutdownTimeoutMs: opts.shutdownTimeout,
            };

            await runServer(options);
        } catch (error) {
            const message =
                error instanceof Error ? error.message : String(error);
            console.error(pc.red(`\nError: ${message}`));
            process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(pc.red(`\nError: ${String(error)}`));
    process.exit(1);
});
