/**
 * Path template parsing.
 *
 * A template is split on `/` into segments. Each segment is either literal
 * text, a named capture `{name}` or, in last position only, a wildcard
 * capture `{*name}`. `{{` and `}}` stand for literal braces.
 *
 * @packageDocumentation
 */

import { RouteInsertError } from '../errors.js';

/**
 * One parsed segment of a path template.
 */
export type TemplateSegment =
    | { kind: 'literal'; text: string }
    | { kind: 'capture'; name: string }
    | { kind: 'wildcard'; name: string };

/**
 * Parses a single `/`-free segment.
 */
function parseSegment(template: string, raw: string): TemplateSegment {
    let text = '';
    let capture: string | undefined;

    for (let i = 0; i < raw.length; i++) {
        const char = raw[i];

        if (char === '{' && raw[i + 1] === '{') {
            text += '{';
            i++;
            continue;
        }
        if (char === '}' && raw[i + 1] === '}') {
            text += '}';
            i++;
            continue;
        }
        if (char === '}') {
            throw new RouteInsertError(
                template,
                'invalid-template',
                'unmatched `}`',
            );
        }
        if (char === '{') {
            const end = raw.indexOf('}', i + 1);
            if (end === -1) {
                throw new RouteInsertError(
                    template,
                    'invalid-template',
                    'unclosed `{`',
                );
            }
            const name = raw.slice(i + 1, end);
            if (name.includes('{')) {
                throw new RouteInsertError(
                    template,
                    'invalid-template',
                    `nested \`{\` in capture \`${name}\``,
                );
            }
            if (capture !== undefined) {
                throw new RouteInsertError(
                    template,
                    'invalid-template',
                    'only one capture is allowed per segment',
                );
            }
            capture = name;
            i = end;
            continue;
        }

        text += char;
    }

    if (capture === undefined) {
        return { kind: 'literal', text };
    }
    if (text !== '') {
        throw new RouteInsertError(
            template,
            'invalid-template',
            `capture \`{${capture}}\` must occupy a whole segment`,
        );
    }

    const isWildcard = capture.startsWith('*');
    const name = isWildcard ? capture.slice(1) : capture;
    if (name === '') {
        throw new RouteInsertError(
            template,
            'invalid-template',
            'capture names must not be empty',
        );
    }

    return isWildcard ? { kind: 'wildcard', name } : { kind: 'capture', name };
}

/**
 * Parses a path template into segments.
 *
 * @throws \{RouteInsertError\} With kind `invalid-template` on malformed input
 *
 * @example
 * ```typescript
 * parseTemplate('/blog/{slug}');
 * // [
 * //   { kind: 'literal', text: '' },
 * //   { kind: 'literal', text: 'blog' },
 * //   { kind: 'capture', name: 'slug' },
 * // ]
 * ```
 */
export function parseTemplate(template: string): TemplateSegment[] {
    const segments = template
        .split('/')
        .map((raw) => parseSegment(template, raw));

    const seen = new Set<string>();
    segments.forEach((segment, index) => {
        if (segment.kind === 'literal') return;

        if (segment.kind === 'wildcard' && index !== segments.length - 1) {
            throw new RouteInsertError(
                template,
                'invalid-template',
                `wildcard \`{*${segment.name}}\` must be the last segment`,
            );
        }
        if (seen.has(segment.name)) {
            throw new RouteInsertError(
                template,
                'invalid-template',
                `capture name \`${segment.name}\` is used twice`,
            );
        }
        seen.add(segment.name);
    });

    return segments;
}
