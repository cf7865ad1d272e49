/**
 * Region and vocabulary file schemas
 *
 * Zod schemas for the JSON files accepted by the CLI and the
 * per-document region sidecars.
 *
 * @module schemas/regions
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { regionSchema, vocabularySchema } from '../types/config.types.js';
import type { FieldVocabulary, RedactionRegion } from '../types/document.types.js';

// ============================================
// REGION SCHEMAS
// ============================================

/**
 * Corner form `[x1, y1, x2, y2]`, converted to origin and size
 */
export const RegionCornersSchema = z
    .tuple([z.number().finite(), z.number().finite(), z.number().finite(), z.number().finite()])
    .transform(([x1, y1, x2, y2]) => ({ x: x1, y: y1, width: x2 - x1, height: y2 - y1 }));

/**
 * A region as `{ x, y, width, height }` or as corners
 */
export const RegionInputSchema = z.union([regionSchema, RegionCornersSchema]);

/**
 * Region file: a bare array or `{ "regions": [...] }`
 */
export const RegionFileSchema = z.union([
    z.array(RegionInputSchema),
    z.object({ regions: z.array(RegionInputSchema) }).transform((file) => file.regions),
]);

export type RegionFile = z.infer<typeof RegionFileSchema>;

// ============================================
// VOCABULARY SCHEMA
// ============================================

export const VocabularyFileSchema = vocabularySchema;

export type VocabularyFile = z.infer<typeof VocabularyFileSchema>;

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validate parsed JSON as a region list
 */
export function parseRegionFile(data: unknown, source: string): RedactionRegion[] {
    const result = RegionFileSchema.safeParse(data);
    if (!result.success) {
        throw new ValidationError(`Invalid region file ${source}: ${describeIssues(result.error)}`, 'regions', {
            source,
        });
    }
    return result.data;
}

/**
 * Validate parsed JSON as a field vocabulary
 */
export function parseVocabularyFile(data: unknown, source: string): Partial<FieldVocabulary> {
    const result = VocabularyFileSchema.safeParse(data);
    if (!result.success) {
        throw new ValidationError(
            `Invalid vocabulary file ${source}: ${describeIssues(result.error)}`,
            'vocabulary',
            { source }
        );
    }
    return result.data;
}

/**
 * Parse a `x,y,width,height` command-line value
 */
export function parseRegionArgument(value: string): RedactionRegion {
    const parts = value.split(',').map((part) => Number(part.trim()));
    const result = regionSchema.safeParse({ x: parts[0], y: parts[1], width: parts[2], height: parts[3] });
    if (parts.length !== 4 || !result.success) {
        throw new ValidationError(`Invalid region "${value}": expected x,y,width,height`, 'region');
    }
    return result.data;
}
