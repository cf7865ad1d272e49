import * as fs from 'fs/promises';
import * as path from 'path';
import { PDFDocument } from 'pdf-lib';
import { DocumentLoadError } from '../errors/index.js';
import type { SourceDocument } from '../types/document.types.js';
import { hashBuffer, shortHash } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';

/**
 * Opens PDF bytes with pdf-lib. Document metadata is never touched on load.
 */
async function parsePdf(bytes: Uint8Array, filename: string): Promise<PDFDocument> {
    try {
        return await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
        throw new DocumentLoadError(
            `Unable to parse PDF: ${error instanceof Error ? error.message : String(error)}`,
            filename,
            { cause: error instanceof Error ? error.name : undefined }
        );
    }
}

/**
 * PDF processing service
 */
export class PDFProcessor {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    /**
     * Load PDF from file path or bytes
     */
    async load(input: Uint8Array | string, name?: string): Promise<SourceDocument> {
        let bytes: Uint8Array;
        let filename: string;
        let filePath: string | undefined;

        if (typeof input === 'string') {
            // File path
            filePath = input;
            filename = name ?? path.basename(input);
            try {
                bytes = await fs.readFile(input);
            } catch (error) {
                throw new DocumentLoadError(
                    `Unable to read file: ${error instanceof Error ? error.message : String(error)}`,
                    filename,
                    { path: input }
                );
            }
        } else {
            // Bytes
            bytes = input;
            filename = name ?? 'document.pdf';
        }

        const pdf = await parsePdf(bytes, filename);
        const id = hashBuffer(bytes);
        const pageCount = pdf.getPageCount();

        this.logger.debug('PDF loaded', {
            documentId: shortHash(id),
            filename,
            fileSize: bytes.length,
            pageCount,
        });

        return { id, filename, path: filePath, bytes, pdf, pageCount };
    }

    /**
     * Fresh, independent copy of the source for editing
     */
    async openCopy(source: SourceDocument): Promise<PDFDocument> {
        return parsePdf(source.bytes, source.filename);
    }
}
