import { PDFDocument } from 'pdf-lib';
import { lineRangeBox, readPageText, type PageText } from '../pdf/page-text.js';
import type { ExtractedField, SourceDocument } from '../types/document.types.js';
import type { FieldKindEnumType } from '../types/enums.js';
import type { Logger } from '../utils/logger.js';
import type { FieldMatcher } from './field-matcher.js';

/**
 * Reads positioned text from the first page and locates preserved fields
 */
export class TextExtractor {
    constructor(
        private readonly matchers: readonly FieldMatcher[],
        private readonly logger: Logger
    ) { }

    extractPage(document: SourceDocument | PDFDocument): PageText {
        return readPageText(document instanceof PDFDocument ? document : document.pdf, 0);
    }

    /**
     * At most one field per kind: the first match in reading order.
     * Missing fields are not an error.
     */
    extractFields(document: SourceDocument | PDFDocument, page?: PageText): ExtractedField[] {
        const text = page ?? this.extractPage(document);
        const found = new Map<FieldKindEnumType, ExtractedField>();

        for (const line of text.lines) {
            for (const matcher of this.matchers) {
                if (found.has(matcher.kind)) continue;
                const match = matcher.match(line.text);
                if (!match) continue;

                const bbox = lineRangeBox(line, match.start, match.end);
                if (!bbox) continue;
                found.set(matcher.kind, { kind: matcher.kind, value: match.value, bbox });
            }
            if (found.size === this.matchers.length) break;
        }

        const fields = this.matchers.flatMap((matcher) => {
            const field = found.get(matcher.kind);
            return field ? [field] : [];
        });

        this.logger.debug('Fields extracted', {
            found: fields.map((field) => field.kind),
            lineCount: text.lines.length,
        });

        return fields;
    }
}
