import { readPageText } from '../pdf/page-text.js';
import type { ClassificationResult, SourceDocument } from '../types/document.types.js';
import { VerdictEnum } from '../types/enums.js';
import type { Logger } from '../utils/logger.js';

/**
 * Decides whether a document can be censored. Never mutates the document.
 */
export class Classifier {
    constructor(private readonly logger: Logger) { }

    classify(document: SourceDocument): ClassificationResult {
        const { pageCount } = document;

        if (pageCount !== 1) {
            return this.result({
                verdict: VerdictEnum.FAILED_MULTI_PAGE,
                reason: `Document has ${pageCount} pages; only single-page documents are supported`,
                pageCount,
            }, document);
        }

        const page = readPageText(document.pdf, 0);
        const hasText = page.glyphs.some((glyph) => glyph.text.trim().length > 0);

        if (!hasText) {
            return this.result({
                verdict: VerdictEnum.FAILED_NO_EXTRACTABLE_TEXT,
                reason: 'Page has no extractable text (scanned or vector-only)',
                pageCount,
            }, document);
        }

        return this.result({
            verdict: VerdictEnum.ELIGIBLE,
            reason: 'Single page with extractable text',
            pageCount,
        }, document);
    }

    private result(result: ClassificationResult, document: SourceDocument): ClassificationResult {
        this.logger.debug('Document classified', {
            filename: document.filename,
            verdict: result.verdict,
            pageCount: result.pageCount,
        });
        return result;
    }
}
