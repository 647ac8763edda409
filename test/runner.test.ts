/**
 * Tests for the programmatic server runner
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { createServer, type AddressInfo, type Server } from 'net';
import { join } from 'path';
import { tmpdir } from 'os';

import { silentLogger } from '../src/logger.js';
import { runServer } from '../src/runner.js';

describe('runServer', () => {
    let siteDir: string;
    let blocker: Server;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        siteDir = await mkdtemp(join(tmpdir(), 'runner-test-'));
        await writeFile(join(siteDir, 'index.html'), 'home');

        blocker = createServer();
        await new Promise<void>((resolve) =>
            blocker.listen(0, '127.0.0.1', () => resolve()),
        );
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await new Promise<void>((resolve) => blocker.close(() => resolve()));
        await rm(siteDir, { recursive: true, force: true });
    });

    it('should reject when the port is already in use', async () => {
        const address = blocker.address();
        if (address === null || typeof address === 'string') {
            throw new Error('expected a TCP address');
        }
        const { port }: AddressInfo = address;

        await expect(
            runServer({
                dir: siteDir,
                port,
                host: '127.0.0.1',
                logger: silentLogger,
            }),
        ).rejects.toMatchObject({ code: 'EADDRINUSE' });
    });
});
