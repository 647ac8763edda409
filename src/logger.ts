/**
 * Console logging with colored level prefixes.
 *
 * @packageDocumentation
 */

import pc from 'picocolors';

/**
 * Minimal leveled logger used throughout the server.
 */
export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Options for {@link createLogger}.
 */
export interface LoggerConfig {
    /** Print `debug` messages. */
    verbose?: boolean;
}

/**
 * Creates a logger that writes to the console.
 *
 * `debug` output is dropped unless `verbose` is set.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ verbose: true });
 * logger.info('Hashed 12 files');
 * // Output:  info  Hashed 12 files
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
    return {
        debug(message) {
            if (config.verbose) {
                console.log(`  ${pc.gray('debug')} ${pc.gray(message)}`);
            }
        },
        info(message) {
            console.log(`  ${pc.cyan('info')}  ${message}`);
        },
        warn(message) {
            console.warn(`  ${pc.yellow('warn')}  ${message}`);
        },
        error(message) {
            console.error(`  ${pc.red('error')} ${pc.red(message)}`);
        },
    };
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};
