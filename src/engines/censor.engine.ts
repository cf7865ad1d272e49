import type { ResolvedConfig } from '../types/config.types.js';
import type { CensorOutcome, RedactionRegion, SourceDocument } from '../types/document.types.js';
import { DocumentStageEnum, VerdictEnum, type DocumentStageEnumType } from '../types/enums.js';
import { Classifier } from '../services/classifier.service.js';
import { createFieldMatchers } from '../services/field-matcher.js';
import { FieldPreserver } from '../services/field-preserver.service.js';
import { MetadataScrubber } from '../services/metadata-scrubber.service.js';
import { PDFProcessor } from '../services/pdf.processor.js';
import { Redactor } from '../services/redactor.service.js';
import { TextExtractor } from '../services/text-extractor.service.js';
import type { PdfCensorEventEmitter } from '../utils/events.js';
import { shortHash } from '../utils/hash.js';
import { withContext, type Logger } from '../utils/logger.js';

/**
 * Options for a single censor cycle
 */
export interface CensorOptions {
    regions?: readonly RedactionRegion[];
    includeInfo?: boolean;
    /** Name used for bytes input and in logs */
    filename?: string;
    /** Added to every log entry of this cycle */
    correlationId?: string;
}

/**
 * Runs one document through classify, extract, redact, re-apply and scrub.
 * Each call owns its own PDF objects; nothing is shared between documents.
 */
export class CensorEngine {
    readonly processor: PDFProcessor;
    readonly classifier: Classifier;
    readonly extractor: TextExtractor;
    readonly redactor: Redactor;
    readonly preserver: FieldPreserver;
    readonly scrubber: MetadataScrubber;

    constructor(
        private readonly config: ResolvedConfig,
        private readonly logger: Logger,
        private readonly events?: PdfCensorEventEmitter
    ) {
        this.processor = new PDFProcessor(logger);
        this.classifier = new Classifier(logger);
        this.extractor = new TextExtractor(createFieldMatchers(config.vocabulary), logger);
        this.redactor = new Redactor(this.processor, config.redaction, logger);
        this.preserver = new FieldPreserver(config.annotation, logger);
        this.scrubber = new MetadataScrubber(logger);
    }

    async censor(input: SourceDocument | Uint8Array | string, options: CensorOptions = {}): Promise<CensorOutcome> {
        const filename = this.filenameOf(input, options.filename);
        let stage: DocumentStageEnumType = DocumentStageEnum.START;
        let documentId: string | undefined;
        const logger = options.correlationId
            ? withContext(this.logger, { correlationId: options.correlationId })
            : this.logger;

        this.events?.emit('document:start', { filename });

        try {
            const source = typeof input === 'string' || input instanceof Uint8Array
                ? await this.processor.load(input, options.filename)
                : input;
            documentId = source.id;

            const advance = (next: DocumentStageEnumType) => {
                logger.debug('Stage transition', {
                    documentId: shortHash(source.id),
                    filename,
                    from: stage,
                    to: next,
                });
                stage = next;
                this.events?.emit('document:stage', { filename, documentId: source.id, stage: next });
            };

            const classification = this.classifier.classify(source);
            advance(DocumentStageEnum.CLASSIFIED);

            if (classification.verdict !== VerdictEnum.ELIGIBLE) {
                advance(DocumentStageEnum.REJECTED);
                logger.info('Document rejected', {
                    documentId: shortHash(source.id),
                    filename,
                    verdict: classification.verdict,
                });
                this.events?.emit('document:rejected', {
                    filename,
                    documentId: source.id,
                    verdict: classification.verdict,
                    reason: classification.reason,
                });
                return {
                    status: 'rejected',
                    documentId: source.id,
                    filename,
                    verdict: classification.verdict,
                    reason: classification.reason,
                };
            }

            const fields = this.extractor.extractFields(source);
            advance(DocumentStageEnum.FIELDS_EXTRACTED);

            const redacted = await this.redactor.redact(source, options.regions ?? this.config.regions);
            advance(DocumentStageEnum.REDACTED);

            const withFields = this.preserver.applyPreservedFields(
                redacted,
                fields,
                options.includeInfo ?? this.config.includeInfo
            );
            advance(DocumentStageEnum.FIELDS_REAPPLIED);

            const metadata = this.scrubber.scrubMetadata(withFields.pdf);
            advance(DocumentStageEnum.METADATA_SCRUBBED);

            const bytes = await withFields.pdf.save({ updateFieldAppearances: false });
            advance(DocumentStageEnum.DONE);

            logger.info('Document censored', {
                documentId: shortHash(source.id),
                filename,
                regions: withFields.regions.length,
                preserved: withFields.preservedFields.length,
            });
            this.events?.emit('document:complete', { filename, documentId: source.id });

            return {
                status: 'censored',
                documentId: source.id,
                filename,
                document: { ...withFields, metadata },
                bytes,
            };
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            logger.error('Document failed', {
                documentId: documentId ? shortHash(documentId) : undefined,
                filename,
                stage,
                error: err.message,
            });
            this.events?.emit('document:error', { filename, stage, error: err });
            return { status: 'error', documentId, filename, stage, error: err };
        }
    }

    private filenameOf(input: SourceDocument | Uint8Array | string, filename?: string): string {
        if (filename) return filename;
        if (typeof input === 'string') return input.split(/[\\/]/).pop() ?? input;
        if (input instanceof Uint8Array) return 'document.pdf';
        return input.filename;
    }
}
