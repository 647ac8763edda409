/**
 * Tests for console logging and the request logger middleware
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Hono } from 'hono';

import { createLogger } from '../src/logger.js';
import { loggerMiddleware } from '../src/middleware/index.js';

const ANSI = /\x1b\[[0-9;]*m/g;

function plain(text: string): string {
    return text.replace(ANSI, '');
}

describe('createLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should drop debug output unless verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        createLogger().debug('hidden');
        createLogger({ verbose: true }).debug('shown');

        expect(log).toHaveBeenCalledTimes(1);
        expect(plain(String(log.mock.calls[0][0]))).toBe('  debug shown');
    });

    it('should write info to stdout and warnings to stderr', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        const logger = createLogger();
        logger.info('Hashed 3 files');
        logger.warn('careful');

        expect(plain(String(log.mock.calls[0][0]))).toBe(
            '  info  Hashed 3 files',
        );
        expect(plain(String(warn.mock.calls[0][0]))).toBe('  warn  careful');
    });
});

describe('loggerMiddleware', () => {
    function createTestApp(lines: string[], enabled = true): Hono {
        const app = new Hono();
        app.use('*', loggerMiddleware({ enabled, write: (line) => lines.push(line) }));
        app.get('/old/:id', (c) => c.redirect(`/new/${c.req.param('id')}`, 301));
        app.get('/ok', (c) => c.text('ok'));
        return app;
    }

    it('should log method, path, status and time', async () => {
        const lines: string[] = [];

        await createTestApp(lines).request('/ok');

        expect(lines).toHaveLength(1);
        expect(plain(lines[0])).toMatch(/^ {2}GET \/ok 200 \d+ms$/);
    });

    it('should show the redirect target', async () => {
        const lines: string[] = [];

        await createTestApp(lines).request('/old/42');

        expect(plain(lines[0])).toMatch(/^ {2}GET \/old\/42 301 -> \/new\/42 \d+ms$/);
    });

    it('should log nothing when disabled', async () => {
        const lines: string[] = [];

        await createTestApp(lines, false).request('/ok');

        expect(lines).toEqual([]);
    });
});
