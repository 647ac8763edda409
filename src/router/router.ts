/**
 * Segment tree router for path templates.
 *
 * This module provides {@link PathTemplateRouter}, which maps templates such
 * as `/blog/{slug}` or `/assets/{*rest}` to values and resolves concrete
 * request paths to the most specific template.
 *
 * @packageDocumentation
 */

import { RouteInsertError } from '../errors.js';
import { parseTemplate } from './template.js';

/**
 * A successful match.
 */
export interface RouteMatch<T> {
    /** Value registered with the matching template. */
    value: T;

    /** Template that matched. */
    template: string;

    /** Captured segments keyed by capture name. */
    params: ReadonlyMap<string, string>;
}

interface Route<T> {
    template: string;
    value: T;
}

interface RouteNode<T> {
    literals: Map<string, RouteNode<T>>;
    capture?: { name: string; template: string; node: RouteNode<T> };
    wildcard?: { name: string; route: Route<T> };
    route?: Route<T>;
}

function createNode<T>(): RouteNode<T> {
    return { literals: new Map() };
}

/**
 * Maps path templates to values.
 *
 * At each segment a literal child is preferred over a named capture, and a
 * named capture over a wildcard; when a preferred branch fails to produce a
 * full match the next one is tried. Templates that would be ambiguous are
 * rejected by {@link PathTemplateRouter.insert}, so a path always resolves
 * to at most one template.
 *
 * @example
 * ```typescript
 * const router = new PathTemplateRouter<string>();
 * router.insert('/a/b', 'literal');
 * router.insert('/a/{x}', 'capture');
 * router.insert('/a/{*rest}', 'wildcard');
 *
 * router.match('/a/b')?.value; // 'literal'
 * router.match('/a/c')?.params.get('x'); // 'c'
 * router.match('/a/c/d')?.params.get('rest'); // 'c/d'
 * ```
 */
export class PathTemplateRouter<T> {
    private readonly root: RouteNode<T> = createNode();
    private count = 0;

    /**
     * Builds a router from `[template, value]` pairs, inserting in order.
     *
     * @throws \{RouteInsertError\} On the first template that cannot be inserted
     */
    static from<T>(
        entries: Iterable<readonly [string, T]>,
    ): PathTemplateRouter<T> {
        const router = new PathTemplateRouter<T>();
        for (const [template, value] of entries) {
            router.insert(template, value);
        }
        return router;
    }

    /**
     * Registers a template.
     *
     * @throws \{RouteInsertError\} When the template is malformed, already
     * registered, or uses a different capture name at a position where another
     * template already captures
     */
    insert(template: string, value: T): void {
        const segments = parseTemplate(template);
        let node = this.root;

        for (const segment of segments) {
            switch (segment.kind) {
                case 'literal': {
                    let child = node.literals.get(segment.text);
                    if (!child) {
                        child = createNode();
                        node.literals.set(segment.text, child);
                    }
                    node = child;
                    break;
                }
                case 'capture': {
                    if (!node.capture) {
                        node.capture = {
                            name: segment.name,
                            template,
                            node: createNode(),
                        };
                    } else if (node.capture.name !== segment.name) {
                        throw new RouteInsertError(
                            template,
                            'conflict',
                            `capture \`{${segment.name}}\` conflicts with \`{${node.capture.name}}\` of \`${node.capture.template}\``,
                        );
                    }
                    node = node.capture.node;
                    break;
                }
                case 'wildcard': {
                    if (node.wildcard) {
                        throw new RouteInsertError(
                            template,
                            'conflict',
                            `wildcard conflicts with \`${node.wildcard.route.template}\``,
                        );
                    }
                    node.wildcard = {
                        name: segment.name,
                        route: { template, value },
                    };
                    this.count++;
                    return;
                }
            }
        }

        if (node.route) {
            throw new RouteInsertError(
                template,
                'conflict',
                `already registered as \`${node.route.template}\``,
            );
        }
        node.route = { template, value };
        this.count++;
    }

    /**
     * Resolves a concrete path to the most specific template.
     *
     * @param path - Raw request path, e.g. `/blog/hello`
     * @returns The match, or `null` when no template matches
     */
    match(path: string): RouteMatch<T> | null {
        const segments = path.split('/');
        const captured: Array<[string, string]> = [];

        const walk = (node: RouteNode<T>, index: number): Route<T> | null => {
            if (index === segments.length) {
                return node.route ?? null;
            }
            const segment = segments[index];

            const literal = node.literals.get(segment);
            if (literal) {
                const found = walk(literal, index + 1);
                if (found) return found;
            }

            if (node.capture && segment !== '') {
                captured.push([node.capture.name, segment]);
                const found = walk(node.capture.node, index + 1);
                if (found) return found;
                captured.pop();
            }

            if (node.wildcard) {
                const rest = segments.slice(index).join('/');
                if (rest !== '') {
                    captured.push([node.wildcard.name, rest]);
                    return node.wildcard.route;
                }
            }

            return null;
        };

        const route = walk(this.root, 0);
        if (!route) {
            return null;
        }

        return {
            value: route.value,
            template: route.template,
            params: new Map(captured),
        };
    }

    /**
     * Number of registered templates.
     */
    get size(): number {
        return this.count;
    }
}
