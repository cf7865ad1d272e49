/**
 * pdf-censor: region redaction for single-page PDF documents
 *
 * @packageDocumentation
 */

// Main class and factory
export { PdfCensor, type PdfCensorDependencies } from './pdf-censor.js';
export { PdfCensorFactory, createPdfCensor } from './pdf-censor.factory.js';

// Engines
export {
    CensorEngine,
    BatchOrchestrator,
    SidecarRegionSource,
    TemplateRegionSource,
    censoredFileName,
    writeAtomic,
    type CensorOptions,
    type RegionSource,
    type RunOptions,
} from './engines/index.js';

// Services
export {
    PDFProcessor,
    Classifier,
    TextExtractor,
    PatternFieldMatcher,
    createFieldMatchers,
    Redactor,
    FieldPreserver,
    MetadataScrubber,
    readInfoDictionary,
    type FieldMatcher,
    type FieldMatch,
} from './services/index.js';

// PDF content layer
export { readPageText, type PageText, type TextLine } from './pdf/page-text.js';
export { redactPage, validateRegions } from './pdf/page-redaction.js';

export type {
    PdfCensorConfig,
    ResolvedConfig,
    // Config subtypes
    LogConfig,
    AnnotationConfig,
    RedactionConfig,
    ConcurrencyConfig,
    RgbColor,
} from './types/config.types.js';

export type {
    SourceDocument,
    RedactionRegion,
    ClassificationResult,
    ExtractedField,
    PreservedField,
    FieldPattern,
    FieldVocabulary,
    CensoredDocument,
    CensorOutcome,
    RedactionStats,
    RunSummary,
    ScrubbedMetadata,
} from './types/document.types.js';

// Enums
export {
    VerdictEnum,
    FieldKindEnum,
    DocumentStageEnum,
    OutcomeStatusEnum,
    type VerdictEnumType,
    type FieldKindEnumType,
    type DocumentStageEnumType,
    type OutcomeStatusEnumType,
} from './types/enums.js';

// Errors
export {
    PdfCensorError,
    ConfigurationError,
    ValidationError,
    InvalidRegionError,
    DocumentLoadError,
    ContentStreamError,
    FieldPlacementError,
    OutputWriteError,
    NotFoundError,
    wrapError,
} from './errors/index.js';

// Schemas
export { parseRegionFile, parseVocabularyFile, parseRegionArgument } from './schemas/index.js';

// Utilities
export { DEFAULT_VOCABULARY } from './config/constants.js';
export { PdfCensorEventEmitter, type PdfCensorEvents } from './utils/events.js';
export type { Logger, LogMeta } from './utils/logger.js';
export type { BoundingBox } from './utils/geometry.js';
