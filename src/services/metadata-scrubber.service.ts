import { PDFDict, PDFName, type PDFDocument } from 'pdf-lib';
import { nameText, pruneUnreachableObjects, resolve, textValue } from '../pdf/objects.js';
import type { ScrubbedMetadata } from '../types/document.types.js';
import type { Logger } from '../utils/logger.js';

/** Info entries that describe the file, not its author */
const KEPT_INFO_KEYS = new Set(['Trapped']);

/** Entries removed from the catalog and from every page */
const SCRUBBED_NODE_KEYS = ['Metadata', 'PieceInfo'] as const;

function infoDictOf(pdf: PDFDocument): PDFDict | undefined {
    const info = resolve(pdf.context, pdf.context.trailerInfo.Info);
    return info instanceof PDFDict ? info : undefined;
}

/**
 * Info dictionary entries as text, without creating a dictionary when absent
 */
export function readInfoDictionary(pdf: PDFDocument): Record<string, string> {
    const info = infoDictOf(pdf);
    const entries: Record<string, string> = {};
    if (!info) return entries;

    for (const [key, value] of info.entries()) {
        const text = textValue(pdf.context, value);
        if (text !== undefined) entries[nameText(key)] = text;
    }
    return entries;
}

/**
 * Remove a key from a dictionary. Returns whether the key was present.
 */
function dropEntry(dict: PDFDict, key: string): boolean {
    const name = PDFName.of(key);
    if (dict.get(name) === undefined) return false;
    dict.delete(name);
    return true;
}

/**
 * Strips identifying metadata from a document in place
 */
export class MetadataScrubber {
    constructor(private readonly logger: Logger) { }

    /**
     * Leaves the document ready to save: objects nothing reaches any more,
     * superseded Info dictionaries and old content included, are deleted.
     */
    scrubMetadata(pdf: PDFDocument): ScrubbedMetadata {
        const context = pdf.context;
        const oldInfo = infoDictOf(pdf);
        const kept = context.obj({});
        const removedKeys: string[] = [];

        if (oldInfo) {
            for (const [key, value] of oldInfo.entries()) {
                const keyText = nameText(key);
                if (KEPT_INFO_KEYS.has(keyText)) {
                    kept.set(key, value);
                } else {
                    removedKeys.push(keyText);
                }
            }
        }
        context.trailerInfo.Info = context.register(kept);

        let removedXmp = false;
        for (const key of SCRUBBED_NODE_KEYS) {
            const removed = dropEntry(pdf.catalog, key);
            if (key === 'Metadata') removedXmp = removed;
        }
        for (const page of pdf.getPages()) {
            for (const key of SCRUBBED_NODE_KEYS) {
                const removed = dropEntry(page.node, key);
                if (key === 'Metadata' && removed) removedXmp = true;
            }
        }

        const removedId = context.trailerInfo.ID !== undefined;
        context.trailerInfo.ID = undefined;

        const prunedObjects = pruneUnreachableObjects(context);

        this.logger.debug('Metadata scrubbed', {
            removedKeys,
            removedXmp,
            removedId,
            prunedObjects,
        });

        return { info: readInfoDictionary(pdf), removedKeys, removedXmp, removedId };
    }
}
