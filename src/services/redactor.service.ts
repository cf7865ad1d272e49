import { redactPage, validateRegions } from '../pdf/page-redaction.js';
import { ValidationError } from '../errors/index.js';
import type { RedactionConfig } from '../types/config.types.js';
import type { CensoredDocument, RedactionRegion, SourceDocument } from '../types/document.types.js';
import { shortHash } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';
import type { PDFProcessor } from './pdf.processor.js';

/**
 * Removes region content from a fresh copy of the source page
 */
export class Redactor {
    constructor(
        private readonly processor: PDFProcessor,
        private readonly config: RedactionConfig,
        private readonly logger: Logger
    ) { }

    async redact(source: SourceDocument, regions: readonly RedactionRegion[]): Promise<CensoredDocument> {
        validateRegions(regions);

        const pdf = await this.processor.openCopy(source);
        if (pdf.getPageCount() === 0) {
            throw new ValidationError('Cannot redact a document without pages', 'pageCount');
        }

        const { applied, skipped, stats } = redactPage(pdf, 0, regions, this.config.fillColor);

        if (skipped.length > 0) {
            this.logger.warn('Regions outside the page were skipped', {
                documentId: shortHash(source.id),
                filename: source.filename,
                skipped: skipped.length,
            });
        }

        this.logger.debug('Page redacted', {
            documentId: shortHash(source.id),
            filename: source.filename,
            regions: applied.length,
            ...stats,
        });

        return {
            source,
            pdf,
            regions: applied,
            skippedRegions: skipped,
            stats,
            preservedFields: [],
        };
    }
}
