/**
 * Tests for path template parsing and routing
 */

import { describe, it, expect } from 'vitest';

import { RouteInsertError } from '../src/errors.js';
import { PathTemplateRouter, parseTemplate } from '../src/router/index.js';

describe('parseTemplate', () => {
    it('should split a template into literal, capture and wildcard segments', () => {
        expect(parseTemplate('/blog/{slug}/{*rest}')).toEqual([
            { kind: 'literal', text: '' },
            { kind: 'literal', text: 'blog' },
            { kind: 'capture', name: 'slug' },
            { kind: 'wildcard', name: 'rest' },
        ]);
    });

    it('should treat doubled braces as literal text', () => {
        expect(parseTemplate('/{{id}}')).toEqual([
            { kind: 'literal', text: '' },
            { kind: 'literal', text: '{id}' },
        ]);
    });

    it.each([
        ['/a/{', 'unclosed `{`'],
        ['/a/}', 'unmatched `}`'],
        ['/a/{x{y}', 'nested `{` in capture `x{y`'],
        ['/a/{x}{y}', 'only one capture is allowed per segment'],
        ['/a/file-{x}', 'capture `{x}` must occupy a whole segment'],
        ['/a/{}', 'capture names must not be empty'],
        ['/a/{*}', 'capture names must not be empty'],
        ['/{*rest}/b', 'wildcard `{*rest}` must be the last segment'],
        ['/{x}/{x}', 'capture name `x` is used twice'],
    ])('should reject %s', (template, detail) => {
        let caught: unknown;
        try {
            parseTemplate(template);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(RouteInsertError);
        expect(caught).toMatchObject({
            template,
            kind: 'invalid-template',
            detail,
        });
    });
});

describe('PathTemplateRouter', () => {
    function precedenceRouter(): PathTemplateRouter<string> {
        return PathTemplateRouter.from([
            ['/a/b', 'literal'],
            ['/a/{x}', 'capture'],
            ['/a/{*rest}', 'wildcard'],
        ]);
    }

    it('should prefer a literal over a capture over a wildcard', () => {
        const router = precedenceRouter();

        expect(router.match('/a/b')?.value).toBe('literal');
        expect(router.match('/a/c')?.value).toBe('capture');
        expect(router.match('/a/c/d')?.value).toBe('wildcard');
    });

    it('should report captures by name', () => {
        const router = precedenceRouter();

        expect(router.match('/a/c')?.params.get('x')).toBe('c');
        expect(router.match('/a/c/d')?.params.get('rest')).toBe('c/d');
        expect(router.match('/a/b')?.params.size).toBe(0);
    });

    it('should report the matching template', () => {
        expect(precedenceRouter().match('/a/zzz')?.template).toBe('/a/{x}');
    });

    it('should backtrack from a literal branch that dead-ends', () => {
        const router = PathTemplateRouter.from([
            ['/docs/intro', 'intro'],
            ['/{section}/{page}/edit', 'edit'],
        ]);

        const match = router.match('/docs/intro/edit');
        expect(match?.value).toBe('edit');
        expect(match?.params.get('section')).toBe('docs');
        expect(match?.params.get('page')).toBe('intro');
    });

    it('should not let a capture match an empty segment', () => {
        const router = PathTemplateRouter.from([['/a/{x}', 1]]);

        expect(router.match('/a/')).toBeNull();
    });

    it('should not let a wildcard match an empty remainder', () => {
        const router = PathTemplateRouter.from([['/assets/{*file}', 1]]);

        expect(router.match('/assets/')).toBeNull();
        expect(router.match('/assets')).toBeNull();
        expect(router.match('/assets/css/site.css')?.params.get('file')).toBe(
            'css/site.css',
        );
    });

    it('should match a trailing slash only against a template that has one', () => {
        const router = PathTemplateRouter.from([['/docs/', 'dir']]);

        expect(router.match('/docs/')?.value).toBe('dir');
        expect(router.match('/docs')).toBeNull();
    });

    it('should return null when nothing matches', () => {
        expect(precedenceRouter().match('/b')).toBeNull();
    });

    it('should count registered templates', () => {
        expect(precedenceRouter().size).toBe(3);
    });

    it('should reject a template registered twice', () => {
        const router = PathTemplateRouter.from([['/a', 1]]);

        expect(() => router.insert('/a', 2)).toThrow(
            'Cannot insert route `/a`: already registered as `/a`',
        );
    });

    it('should reject two capture names at the same position', () => {
        const router = PathTemplateRouter.from([['/u/{id}', 1]]);

        let caught: unknown;
        try {
            router.insert('/u/{name}/posts', 2);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(RouteInsertError);
        expect(caught).toMatchObject({ kind: 'conflict' });
    });

    it('should reject a second wildcard at the same position', () => {
        const router = PathTemplateRouter.from([['/files/{*a}', 1]]);

        expect(() => router.insert('/files/{*b}', 2)).toThrow(
            RouteInsertError,
        );
    });

    it('should keep the same capture name across templates', () => {
        const router = PathTemplateRouter.from([
            ['/u/{id}', 'user'],
            ['/u/{id}/posts', 'posts'],
        ]);

        expect(router.match('/u/7/posts')?.value).toBe('posts');
        expect(router.match('/u/7')?.value).toBe('user');
    });
});
