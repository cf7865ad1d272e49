/**
 * Input Schemas
 * Re-export all schemas for easy access
 */

export {
    // Region schemas
    RegionCornersSchema,
    RegionInputSchema,
    RegionFileSchema,
    type RegionFile,

    // Vocabulary schema
    VocabularyFileSchema,
    type VocabularyFile,

    // Parsers
    parseRegionFile,
    parseVocabularyFile,
    parseRegionArgument,
} from './regions.schema.js';
