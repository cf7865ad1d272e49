import type { PDFDocument } from 'pdf-lib';
import type { ResolvedConfig } from './types/config.types.js';
import type {
    CensorOutcome,
    CensoredDocument,
    ClassificationResult,
    ExtractedField,
    RedactionRegion,
    RunSummary,
    ScrubbedMetadata,
    SourceDocument,
} from './types/document.types.js';
import type { PageText } from './pdf/page-text.js';
import type { CensorEngine, CensorOptions } from './engines/censor.engine.js';
import type { BatchOrchestrator, RunOptions } from './engines/batch.orchestrator.js';
import type { PdfCensorEventEmitter, PdfCensorEvents } from './utils/events.js';
import type { Logger } from './utils/logger.js';

/**
 * Wired collaborators of a PdfCensor instance
 */
export interface PdfCensorDependencies {
    engine: CensorEngine;
    orchestrator: BatchOrchestrator;
    events: PdfCensorEventEmitter;
    logger: Logger;
}

/**
 * Main pdf-censor class
 *
 * @example
 * ```typescript
 * import { createPdfCensor } from 'pdf-censor';
 *
 * const censor = createPdfCensor();
 * const source = await censor.load('./report.pdf');
 *
 * if (censor.classify(source).verdict === 'ELIGIBLE') {
 *   const fields = censor.extractFields(source);
 *   const redacted = await censor.redact(source, regions);
 *   const withFields = censor.applyPreservedFields(redacted, fields, true);
 *   censor.scrubMetadata(withFields.pdf);
 * }
 * ```
 */
export class PdfCensor {
    private readonly engine: CensorEngine;
    private readonly orchestrator: BatchOrchestrator;
    private readonly events: PdfCensorEventEmitter;
    private readonly logger: Logger;

    constructor(
        readonly config: ResolvedConfig,
        deps: PdfCensorDependencies
    ) {
        this.engine = deps.engine;
        this.orchestrator = deps.orchestrator;
        this.events = deps.events;
        this.logger = deps.logger;

        this.logger.debug('PdfCensor initialized', {
            regions: config.regions.length,
            includeInfo: config.includeInfo,
            maxConcurrency: config.batchConfig.maxConcurrency,
        });
    }

    // ============================================
    // Single-document operations
    // ============================================

    load(input: Uint8Array | string, filename?: string): Promise<SourceDocument> {
        return this.engine.processor.load(input, filename);
    }

    classify(document: SourceDocument): ClassificationResult {
        return this.engine.classifier.classify(document);
    }

    extractPage(document: SourceDocument | PDFDocument): PageText {
        return this.engine.extractor.extractPage(document);
    }

    extractFields(document: SourceDocument | PDFDocument): ExtractedField[] {
        return this.engine.extractor.extractFields(document);
    }

    redact(document: SourceDocument, regions: readonly RedactionRegion[] = this.config.regions): Promise<CensoredDocument> {
        return this.engine.redactor.redact(document, regions);
    }

    applyPreservedFields(
        censored: CensoredDocument,
        fields: readonly ExtractedField[],
        includeInfo: boolean = this.config.includeInfo
    ): CensoredDocument {
        return this.engine.preserver.applyPreservedFields(censored, fields, includeInfo);
    }

    scrubMetadata(pdf: PDFDocument): ScrubbedMetadata {
        return this.engine.scrubber.scrubMetadata(pdf);
    }

    /**
     * Full cycle for one document; never throws for document-level failures
     */
    censor(input: SourceDocument | Uint8Array | string, options?: CensorOptions): Promise<CensorOutcome> {
        return this.engine.censor(input, options);
    }

    // ============================================
    // File system runs
    // ============================================

    processFile(filePath: string, options?: RunOptions): Promise<RunSummary> {
        return this.orchestrator.processFile(filePath, options);
    }

    processFolder(folderPath: string, options?: RunOptions): Promise<RunSummary> {
        return this.orchestrator.processFolder(folderPath, options);
    }

    // ============================================
    // Events
    // ============================================

    on<K extends keyof PdfCensorEvents>(event: K, listener: (data: PdfCensorEvents[K]) => void): this {
        this.events.on(event, listener);
        return this;
    }

    off<K extends keyof PdfCensorEvents>(event: K, listener: (data: PdfCensorEvents[K]) => void): this {
        this.events.off(event, listener);
        return this;
    }
}
