import { z } from 'zod';
import type { FieldVocabulary, RedactionRegion } from './document.types.js';

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * RGB colour, each channel in [0, 1]
 */
export interface RgbColor {
    r: number;
    g: number;
    b: number;
}

/**
 * Where and how preserved field values are written back onto the page
 */
export interface AnnotationConfig {
    /** Baseline origin of the text in page space (default: 36, 24) */
    x: number;
    y: number;
    /** Font size in points (default: 10) */
    fontSize: number;
    /** Rotation in degrees, counter-clockwise (default: 0) */
    rotation: number;
    color: RgbColor;
    /** Try the page corners when the anchor is blocked (default: true) */
    fallbackToCorners: boolean;
}

/**
 * Redaction fill configuration
 */
export interface RedactionConfig {
    /** Fill drawn over every applied region (default: black) */
    fillColor: RgbColor;
}

/**
 * Batch processing configuration
 */
export interface ConcurrencyConfig {
    /** Maximum documents processed at once (default: 4) */
    maxConcurrency: number;
}

/**
 * Main pdf-censor configuration
 */
export interface PdfCensorConfig {
    /** Regions applied to every document unless a sidecar file overrides them */
    regions?: RedactionRegion[];
    /** Re-insert preserved fields after redaction (default: true) */
    includeInfo?: boolean;
    /** Output directory; defaults depend on file or folder mode */
    outputDir?: string;
    /** Field patterns; kinds left out keep their defaults */
    vocabulary?: Partial<FieldVocabulary>;
    annotation?: Partial<AnnotationConfig>;
    redaction?: Partial<RedactionConfig>;
    batchConfig?: Partial<ConcurrencyConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    regions: RedactionRegion[];
    includeInfo: boolean;
    outputDir?: string;
    vocabulary: FieldVocabulary;
    annotation: AnnotationConfig;
    redaction: RedactionConfig;
    batchConfig: ConcurrencyConfig;
    logging: LogConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_ANNOTATION_CONFIG: AnnotationConfig = {
    x: 36,
    y: 24,
    fontSize: 10,
    rotation: 0,
    color: { r: 0, g: 0, b: 0 },
    fallbackToCorners: true,
};

export const DEFAULT_REDACTION_CONFIG: RedactionConfig = {
    fillColor: { r: 0, g: 0, b: 0 },
};

export const DEFAULT_CONCURRENCY_CONFIG: ConcurrencyConfig = {
    maxConcurrency: 4,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

const colorSchema = z.object({
    r: z.number().min(0).max(1),
    g: z.number().min(0).max(1),
    b: z.number().min(0).max(1),
});

export const regionSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
    width: z.number().finite(),
    height: z.number().finite(),
});

export const fieldPatternSchema = z.object({
    pattern: z.string().min(1),
    flags: z.string().regex(/^[gimsuy]*$/, 'Unsupported regular expression flag').optional(),
    valueGroup: z.number().int().min(0).optional(),
});

export const vocabularySchema = z.object({
    gender: z.array(fieldPatternSchema).optional(),
    age: z.array(fieldPatternSchema).optional(),
});

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    regions: z.array(regionSchema).optional(),
    includeInfo: z.boolean().optional(),
    outputDir: z.string().min(1).optional(),
    vocabulary: vocabularySchema.optional(),
    annotation: z
        .object({
            x: z.number().finite().optional(),
            y: z.number().finite().optional(),
            fontSize: z.number().min(1).max(144).optional(),
            rotation: z.number().min(-360).max(360).optional(),
            color: colorSchema.optional(),
            fallbackToCorners: z.boolean().optional(),
        })
        .optional(),
    redaction: z
        .object({
            fillColor: colorSchema.optional(),
        })
        .optional(),
    batchConfig: z
        .object({
            maxConcurrency: z.number().int().min(1).max(64).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});
