/**
 * System constants for pdf-censor
 * Centralizes magic numbers for maintainability
 */

import type { FieldVocabulary } from '../types/document.types.js';

// ============================================
// Field Vocabulary
// ============================================

/**
 * Default patterns per preserved field kind.
 * Patterns of a kind are tried in order; the earliest match on a line wins.
 */
export const DEFAULT_VOCABULARY: FieldVocabulary = {
    gender: [
        {
            pattern: '(?<![\\p{L}\\p{N}])(Masculino|Femenino|Male|Female|Hombre|Mujer)(?![\\p{L}\\p{N}])',
            flags: 'iu',
            valueGroup: 1,
        },
        {
            pattern: '(?:Sex|Gender|Sexo|Género)\\s*[:\\-]?\\s*([MF])(?![\\p{L}\\p{N}])',
            flags: 'u',
            valueGroup: 1,
        },
    ],
    age: [
        { pattern: '\\(\\d{1,3}\\s*años\\)', flags: 'iu' },
        { pattern: '\\b(?:age|edad)\\s*[:\\-]?\\s*(\\d{1,3})\\b', flags: 'i', valueGroup: 1 },
        { pattern: '\\b(\\d{1,3})\\s*(?:years?|yrs?|años)', flags: 'iu', valueGroup: 1 },
    ],
};

// ============================================
// Output Layout
// ============================================

export const OUTPUT_DEFAULTS = {
    /** Appended to the base name of a censored file */
    CENSORED_SUFFIX: '_censored',

    /** Folder-mode output directory, created beside the input folder */
    FOLDER_OUTPUT_NAME: 'Censored PDFs',

    /** Sub-directory of the output directory holding untouched failed inputs */
    FAILED_DIR_NAME: 'Failed',

    /** Suffix of a per-file region sidecar */
    REGIONS_SIDECAR_SUFFIX: '.regions.json',

    /** Suffix of an in-progress write, renamed once complete */
    PARTIAL_SUFFIX: '.partial',
} as const;

// ============================================
// Annotation Placement
// ============================================

export const ANNOTATION_DEFAULTS = {
    /** Distance from the page edge for corner fallbacks */
    MARGIN: 24,

    /** Replacement for characters the standard font cannot encode */
    REPLACEMENT_CHAR: '?',
} as const;
