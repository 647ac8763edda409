/**
 * Per-resource ETag sets.
 *
 * @packageDocumentation
 */

/**
 * Content fingerprints of one resource and its precompressed siblings.
 *
 * Every value is a complete, quoted `ETag` header value.
 */
export interface ResourceTags {
    /** Tag of the uncompressed file. */
    raw: string;
    /** Tag of the `.gz` sibling. */
    gzip?: string;
    /** Tag of the `.zz` sibling. */
    deflate?: string;
    /** Tag of the `.br` sibling. */
    brotli?: string;
    /** Tag of the `.zst` sibling. */
    zstd?: string;
}

/**
 * Precompressed sibling suffixes and the tag each one fills.
 */
export const PRECOMPRESSED_VARIANTS = [
    { suffix: '.gz', variant: 'gzip' },
    { suffix: '.zz', variant: 'deflate' },
    { suffix: '.br', variant: 'brotli' },
    { suffix: '.zst', variant: 'zstd' },
] as const;

export type EncodedVariant = (typeof PRECOMPRESSED_VARIANTS)[number]['variant'];

/** `Content-Encoding` tokens mapped to the variant serving them. */
const CONTENT_ENCODINGS: Readonly<Record<string, EncodedVariant>> = {
    gzip: 'gzip',
    deflate: 'deflate',
    br: 'brotli',
    zstd: 'zstd',
};

/**
 * A resource's tags plus the set of every tag it can be revalidated with.
 *
 * A conditional request may carry the tag of any variant (a client could
 * have cached the gzip copy and now ask without `Accept-Encoding`), so the
 * membership test covers all of them, not only the one that would be sent.
 */
export class ResourceTagSet implements ResourceTags {
    readonly raw: string;
    readonly gzip?: string;
    readonly deflate?: string;
    readonly brotli?: string;
    readonly zstd?: string;
    readonly containedTags: ReadonlySet<string>;

    constructor(tags: ResourceTags) {
        this.raw = tags.raw;
        this.gzip = tags.gzip;
        this.deflate = tags.deflate;
        this.brotli = tags.brotli;
        this.zstd = tags.zstd;

        const contained = new Set<string>([tags.raw]);
        for (const { variant } of PRECOMPRESSED_VARIANTS) {
            const tag = tags[variant];
            if (tag !== undefined) {
                contained.add(tag);
            }
        }
        this.containedTags = contained;
    }

    /**
     * Whether `value` equals the tag of any variant of this resource.
     */
    containsTag(value: string): boolean {
        return this.containedTags.has(value);
    }

    /**
     * Picks the tag for a response.
     *
     * @param contentEncoding - The response's `Content-Encoding`, if any
     * @returns The raw tag when there is no encoding, the matching variant's
     * tag otherwise, or `undefined` for an unknown encoding or a variant that
     * was not fingerprinted
     */
    tagForEncoding(
        contentEncoding: string | null | undefined,
    ): string | undefined {
        if (contentEncoding === null || contentEncoding === undefined) {
            return this.raw;
        }
        const variant = Object.hasOwn(CONTENT_ENCODINGS, contentEncoding)
            ? CONTENT_ENCODINGS[contentEncoding]
            : undefined;
        return variant === undefined ? undefined : this[variant];
    }
}
