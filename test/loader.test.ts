/**
 * Tests for root directory and config file loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, realpath, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { StartupError } from '../src/errors.js';
import {
    directoryExists,
    loadSiteConfig,
    readConfigFile,
    resolveRootDir,
} from '../src/server/index.js';

describe('loader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'loader-test-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('readConfigFile', () => {
        it('should read an existing file', async () => {
            await writeFile(join(dir, '_redirects'), '/a /b');

            expect(await readConfigFile(dir, '_redirects')).toBe('/a /b');
        });

        it('should treat a missing file as empty', async () => {
            expect(await readConfigFile(dir, '_redirects')).toBe('');
        });

        it('should fail when the name is a directory', async () => {
            await mkdir(join(dir, '_headers'));

            await expect(readConfigFile(dir, '_headers')).rejects.toBeInstanceOf(
                StartupError,
            );
        });
    });

    describe('loadSiteConfig', () => {
        it('should load both config files', async () => {
            await writeFile(join(dir, '_headers'), '/\n  X-A: 1');

            expect(await loadSiteConfig(dir)).toEqual({
                headers: '/\n  X-A: 1',
                redirects: '',
            });
        });
    });

    describe('resolveRootDir', () => {
        it('should resolve a directory to its real path', async () => {
            expect(await resolveRootDir(dir)).toBe(await realpath(dir));
        });

        it('should reject a file', async () => {
            const file = join(dir, 'index.html');
            await writeFile(file, '');

            await expect(resolveRootDir(file)).rejects.toThrow(
                `Expected ${file} to be a directory`,
            );
        });

        it('should reject a missing path', async () => {
            await expect(
                resolveRootDir(join(dir, 'missing')),
            ).rejects.toBeInstanceOf(StartupError);
        });
    });

    describe('directoryExists', () => {
        it('should distinguish directories from files', async () => {
            await writeFile(join(dir, 'file.txt'), '');

            expect(await directoryExists(dir)).toBe(true);
            expect(await directoryExists(join(dir, 'file.txt'))).toBe(false);
            expect(await directoryExists(join(dir, 'missing'))).toBe(false);
        });
    });
});
