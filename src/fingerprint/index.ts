/**
 * Content fingerprints for served files.
 *
 * @packageDocumentation
 */

export {
    ContentFingerprintIndex,
    hashFile,
    type FingerprintIndexOptions,
} from './fingerprint-index.js';
export {
    ResourceTagSet,
    PRECOMPRESSED_VARIANTS,
    type ResourceTags,
    type EncodedVariant,
} from './tag-set.js';
