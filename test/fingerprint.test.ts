/**
 * Tests for the content fingerprint index
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { FingerprintBuildError } from '../src/errors.js';
import {
    ContentFingerprintIndex,
    ResourceTagSet,
    hashFile,
} from '../src/fingerprint/index.js';

function expectedTag(content: string): string {
    return `"${createHash('sha256').update(content).digest('hex')}"`;
}

describe('ContentFingerprintIndex', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'fingerprint-test-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should key files by their path below the root', async () => {
        await mkdir(join(root, 'css'));
        await writeFile(join(root, 'css', 'site.css'), 'body {}');
        await writeFile(join(root, 'robots.txt'), 'User-agent: *');

        const index = await ContentFingerprintIndex.build(root);

        expect([...index.paths()].sort()).toEqual([
            '/css/site.css',
            '/robots.txt',
        ]);
        expect(index.lookup('/css/site.css')?.raw).toBe(expectedTag('body {}'));
    });

    it('should produce the same tags for the same content', async () => {
        await writeFile(join(root, 'a.txt'), 'same');
        await writeFile(join(root, 'b.txt'), 'same');

        const first = await ContentFingerprintIndex.build(root);
        const second = await ContentFingerprintIndex.build(root);

        expect(first.lookup('/a.txt')?.raw).toBe(second.lookup('/a.txt')?.raw);
        expect(first.lookup('/a.txt')?.raw).toBe(first.lookup('/b.txt')?.raw);
    });

    it('should change the tag when a single byte changes', async () => {
        await writeFile(join(root, 'app.js'), 'let a = 1;');
        const before = await ContentFingerprintIndex.build(root);

        await writeFile(join(root, 'app.js'), 'let a = 2;');
        const after = await ContentFingerprintIndex.build(root);

        expect(before.lookup('/app.js')?.raw).not.toBe(
            after.lookup('/app.js')?.raw,
        );
    });

    it('should fingerprint precompressed siblings', async () => {
        await writeFile(join(root, 'app.js'), 'plain');
        await writeFile(join(root, 'app.js.gz'), 'gzipped');
        await writeFile(join(root, 'app.js.br'), 'brotli');

        const tags = (await ContentFingerprintIndex.build(root)).lookup(
            '/app.js',
        );

        expect(tags?.raw).toBe(expectedTag('plain'));
        expect(tags?.gzip).toBe(expectedTag('gzipped'));
        expect(tags?.brotli).toBe(expectedTag('brotli'));
        expect(tags?.deflate).toBeUndefined();
        expect(tags?.zstd).toBeUndefined();
    });

    it('should serve directory paths from index.html', async () => {
        await mkdir(join(root, 'docs'));
        await writeFile(join(root, 'docs', 'index.html'), '<h1>Docs</h1>');

        const index = await ContentFingerprintIndex.build(root);

        expect(index.lookup('/docs/')?.raw).toBe(expectedTag('<h1>Docs</h1>'));
        expect(index.lookup('/docs')).toBeUndefined();
    });

    it('should leave out excluded keys', async () => {
        await writeFile(join(root, '_headers'), '/\n  X-Test: 1');
        await writeFile(join(root, 'index.html'), 'home');

        const index = await ContentFingerprintIndex.build(root, {
            exclude: (key) => key === '/_headers',
        });

        expect(index.lookup('/_headers')).toBeUndefined();
        expect(index.size).toBe(1);
    });

    it('should accept a trailing slash on the root', async () => {
        await writeFile(join(root, 'a.txt'), 'a');

        const index = await ContentFingerprintIndex.build(`${root}/`);

        expect([...index.paths()]).toEqual(['/a.txt']);
    });

    it('should reject symbolic links', async () => {
        await writeFile(join(root, 'target.txt'), 'target');
        await symlink(join(root, 'target.txt'), join(root, 'link.txt'));

        const build = ContentFingerprintIndex.build(root);

        await expect(build).rejects.toBeInstanceOf(FingerprintBuildError);
        await expect(build).rejects.toMatchObject({
            kind: 'unsupported-entry',
            path: join(root, 'link.txt'),
        });
    });

    it('should reject a name that is not valid UTF-8', async () => {
        await writeFile(
            Buffer.concat([Buffer.from(`${root}/`), Buffer.from([0x66, 0xff])]),
            'bytes',
        );

        await expect(ContentFingerprintIndex.build(root)).rejects.toMatchObject({
            name: 'FingerprintBuildError',
            kind: 'path-not-utf8',
        });
    });

    it('should report a missing root as an I/O error', async () => {
        await expect(
            ContentFingerprintIndex.build(join(root, 'missing')),
        ).rejects.toMatchObject({ kind: 'io' });
    });

    it('should build from precomputed tags', () => {
        const index = ContentFingerprintIndex.fromEntries([
            ['/index.html', { raw: '"r"', gzip: '"g"' }],
        ]);

        expect(index.lookup('/')?.gzip).toBe('"g"');
        expect(index.size).toBe(1);
    });
});

describe('hashFile', () => {
    it('should quote the hex digest', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'hash-test-'));
        try {
            await writeFile(join(dir, 'empty'), '');

            expect(await hashFile(join(dir, 'empty'))).toBe(
                '"e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"',
            );
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});

describe('ResourceTagSet', () => {
    const tags = new ResourceTagSet({
        raw: '"raw"',
        gzip: '"gz"',
        brotli: '"br"',
    });

    it('should pick the raw tag when there is no encoding', () => {
        expect(tags.tagForEncoding(null)).toBe('"raw"');
        expect(tags.tagForEncoding(undefined)).toBe('"raw"');
    });

    it('should map encodings to their variants', () => {
        expect(tags.tagForEncoding('gzip')).toBe('"gz"');
        expect(tags.tagForEncoding('br')).toBe('"br"');
    });

    it('should give no tag for a variant that was not fingerprinted', () => {
        expect(tags.tagForEncoding('zstd')).toBeUndefined();
    });

    it('should give no tag for an unknown encoding', () => {
        expect(tags.tagForEncoding('compress')).toBeUndefined();
        expect(tags.tagForEncoding('toString')).toBeUndefined();
    });

    it('should contain the tag of every variant', () => {
        expect([...tags.containedTags].sort()).toEqual([
            '"br"',
            '"gz"',
            '"raw"',
        ]);
        expect(tags.containsTag('"gz"')).toBe(true);
        expect(tags.containsTag('"other"')).toBe(false);
    });
});
