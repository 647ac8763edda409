/**
 * Capture interpolation for redirect targets.
 *
 * Targets reference captures as `{name}`. A backslash escapes `{`, `}` and
 * itself, so `\{literal\}` renders as `{literal}`.
 *
 * @packageDocumentation
 */

import { InterpolationSyntaxError } from '../errors.js';

type Part = { kind: 'text'; text: string } | { kind: 'key'; name: string };

/**
 * Outcome of {@link Interpolation.tryRender}.
 */
export type RenderResult =
    | { ok: true; value: string }
    | { ok: false; missing: string[] };

/**
 * A parsed target template.
 *
 * @example
 * ```typescript
 * const target = Interpolation.parse('/new/{slug}');
 * target.render(new Map([['slug', 'hello']])); // '/new/hello'
 * ```
 */
export class Interpolation {
    private constructor(
        /** The template text as written. */
        readonly source: string,
        private readonly parts: readonly Part[],
    ) {}

    /**
     * @throws \{InterpolationSyntaxError\} On an unclosed `{`, a stray `}`,
     * an empty key or an unknown escape
     */
    static parse(template: string): Interpolation {
        const parts: Part[] = [];
        let text = '';

        for (let i = 0; i < template.length; i++) {
            const char = template[i];

            if (char === '\\') {
                const next = template[i + 1];
                if (next !== '{' && next !== '}' && next !== '\\') {
                    throw new InterpolationSyntaxError(
                        template,
                        i,
                        'invalid escape',
                    );
                }
                text += next;
                i++;
            } else if (char === '{') {
                const end = template.indexOf('}', i + 1);
                if (end === -1) {
                    throw new InterpolationSyntaxError(
                        template,
                        i,
                        'unclosed `{`',
                    );
                }
                const name = template.slice(i + 1, end);
                if (name === '' || name.includes('{') || name.includes('\\')) {
                    throw new InterpolationSyntaxError(
                        template,
                        i,
                        `invalid key \`${name}\``,
                    );
                }
                if (text !== '') {
                    parts.push({ kind: 'text', text });
                    text = '';
                }
                parts.push({ kind: 'key', name });
                i = end;
            } else if (char === '}') {
                throw new InterpolationSyntaxError(
                    template,
                    i,
                    'unmatched `}`',
                );
            } else {
                text += char;
            }
        }

        if (text !== '') {
            parts.push({ kind: 'text', text });
        }
        return new Interpolation(template, parts);
    }

    /**
     * Keys referenced by the template, in order of first use.
     */
    get keys(): string[] {
        const keys: string[] = [];
        for (const part of this.parts) {
            if (part.kind === 'key' && !keys.includes(part.name)) {
                keys.push(part.name);
            }
        }
        return keys;
    }

    /**
     * Renders the template, failing when any referenced key has no value.
     */
    tryRender(values: ReadonlyMap<string, string>): RenderResult {
        const missing = this.keys.filter((key) => !values.has(key));
        if (missing.length > 0) {
            return { ok: false, missing };
        }
        return { ok: true, value: this.render(values) };
    }

    /**
     * Renders the template; keys without a value render as empty strings.
     */
    render(values: ReadonlyMap<string, string>): string {
        return this.parts
            .map((part) =>
                part.kind === 'text' ? part.text : (values.get(part.name) ?? ''),
            )
            .join('');
    }
}
