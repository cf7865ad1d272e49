import type { PDFDocument } from 'pdf-lib';
import type { BoundingBox } from '../utils/geometry.js';
import type {
    DocumentStageEnumType,
    FailedVerdictType,
    FieldKindEnumType,
    VerdictEnumType,
} from './enums.js';

/**
 * Rectangle to remove, in PDF user space (origin bottom-left, y upwards)
 */
export type RedactionRegion = BoundingBox;

/**
 * Input document; the parsed `pdf` is only read, never mutated
 */
export interface SourceDocument {
    /** SHA-256 of the raw bytes */
    id: string;
    filename: string;
    path?: string;
    bytes: Uint8Array;
    pdf: PDFDocument;
    pageCount: number;
}

export interface ClassificationResult {
    verdict: VerdictEnumType;
    reason: string;
    pageCount: number;
}

export interface ExtractedField {
    kind: FieldKindEnumType;
    value: string;
    bbox: BoundingBox;
}

export interface PreservedField extends ExtractedField {
    /** Original location overlapped a redaction region */
    wasRedacted: boolean;
}

export interface FieldPattern {
    pattern: string;
    flags?: string;
    /** Capture group holding the value; whole match when absent */
    valueGroup?: number;
}

export type FieldVocabulary = Record<FieldKindEnumType, FieldPattern[]>;

export interface ScrubbedMetadata {
    /** Info entries left after scrubbing */
    info: Record<string, string>;
    removedKeys: string[];
    removedXmp: boolean;
    removedId: boolean;
}

export interface RedactionStats {
    glyphsRemoved: number;
    imagesRemoved: number;
    formsRewritten: number;
    annotationsRemoved: number;
}

/**
 * Censored copy of a source document
 */
export interface CensoredDocument {
    source: SourceDocument;
    pdf: PDFDocument;
    /** Regions applied (filled) on the page */
    regions: RedactionRegion[];
    /** Regions lying entirely outside the page */
    skippedRegions: RedactionRegion[];
    stats: RedactionStats;
    preservedFields: PreservedField[];
    metadata?: ScrubbedMetadata;
}

/**
 * Result of one document's censor cycle
 */
export type CensorOutcome =
    | {
          status: 'censored';
          documentId: string;
          filename: string;
          document: CensoredDocument;
          bytes: Uint8Array;
          outputPath?: string;
      }
    | {
          status: 'rejected';
          documentId: string;
          filename: string;
          verdict: FailedVerdictType;
          reason: string;
          failedPath?: string;
      }
    | {
          status: 'error';
          documentId?: string;
          filename: string;
          stage: DocumentStageEnumType;
          error: Error;
          failedPath?: string;
      };

export interface RunSummary {
    processed: Array<{ filename: string; outputPath: string }>;
    failed: Array<{ filename: string; reason: string; failedPath?: string }>;
    outputDir: string;
    durationMs: number;
}
