import {
    PDFArray,
    PDFContentStream,
    PDFContext,
    PDFDict,
    PDFHexString,
    PDFName,
    PDFNumber,
    PDFObject,
    PDFRawStream,
    PDFRef,
    PDFStream,
    PDFString,
    decodePDFRawStream,
} from 'pdf-lib';
import { ContentStreamError, wrapError } from '../errors/index.js';

/**
 * Name without its leading slash, #xx escapes decoded
 */
export function nameText(name: PDFName): string {
    return name
        .asString()
        .slice(1)
        .replace(/#([0-9a-fA-F]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

export function resolve(context: PDFContext, value: PDFObject | undefined): PDFObject | undefined {
    return value instanceof PDFRef ? context.lookup(value) : value;
}

export function lookupDict(context: PDFContext, dict: PDFDict, key: string): PDFDict | undefined {
    const value = resolve(context, dict.get(PDFName.of(key)));
    if (value instanceof PDFDict) return value;
    // Stream dictionaries stand in for plain ones where a dict is expected
    if (value instanceof PDFStream) return value.dict;
    return undefined;
}

export function lookupArray(context: PDFContext, dict: PDFDict, key: string): PDFArray | undefined {
    const value = resolve(context, dict.get(PDFName.of(key)));
    return value instanceof PDFArray ? value : undefined;
}

export function lookupStream(context: PDFContext, dict: PDFDict, key: string): PDFStream | undefined {
    const value = resolve(context, dict.get(PDFName.of(key)));
    return value instanceof PDFStream ? value : undefined;
}

export function lookupName(context: PDFContext, dict: PDFDict, key: string): string | undefined {
    const value = resolve(context, dict.get(PDFName.of(key)));
    return value instanceof PDFName ? nameText(value) : undefined;
}

export function lookupNumber(context: PDFContext, dict: PDFDict, key: string): number | undefined {
    const value = resolve(context, dict.get(PDFName.of(key)));
    return value instanceof PDFNumber ? value.asNumber() : undefined;
}

/**
 * Numbers of an array, unresolvable entries read as 0
 */
export function numberArray(context: PDFContext, array: PDFArray): number[] {
    return array.asArray().map((item) => {
        const value = resolve(context, item);
        return value instanceof PDFNumber ? value.asNumber() : 0;
    });
}

/**
 * Text of a string-like Info value
 */
export function textValue(context: PDFContext, value: PDFObject | undefined): string | undefined {
    const resolved = resolve(context, value);
    if (resolved instanceof PDFString || resolved instanceof PDFHexString) {
        return resolved.decodeText();
    }
    if (resolved instanceof PDFName) {
        return nameText(resolved);
    }
    if (resolved instanceof PDFNumber) {
        return String(resolved.asNumber());
    }
    return undefined;
}

/**
 * Decoded (unfiltered) bytes of a stream
 */
export function decodeStream(stream: PDFStream): Uint8Array {
    if (stream instanceof PDFRawStream) {
        try {
            return decodePDFRawStream(stream).decode();
        } catch (error) {
            throw wrapError(error, ContentStreamError, 'decodeStream');
        }
    }
    if (stream instanceof PDFContentStream) {
        return stream.getUnencodedContents();
    }
    throw new ContentStreamError(`Unsupported stream type: ${stream.constructor.name}`);
}

/**
 * Concatenated content of one or several content streams
 */
export function decodeContents(context: PDFContext, contents: PDFObject | undefined): Uint8Array {
    const resolved = resolve(context, contents);
    if (resolved instanceof PDFStream) {
        return decodeStream(resolved);
    }
    if (resolved instanceof PDFArray) {
        const parts: Buffer[] = [];
        for (const item of resolved.asArray()) {
            const stream = resolve(context, item);
            if (stream instanceof PDFStream) {
                parts.push(Buffer.from(decodeStream(stream)));
                parts.push(Buffer.from('\n', 'latin1'));
            }
        }
        return new Uint8Array(Buffer.concat(parts));
    }
    return new Uint8Array();
}

/**
 * Shallow copy of a resource dictionary with its own /XObject map, so
 * renaming or dropping XObjects leaves other users of the original alone
 */
export function copyResources(context: PDFContext, resources: PDFDict): PDFDict {
    const copy = resources.clone(context);
    const xobjects = lookupDict(context, resources, 'XObject');
    if (xobjects) copy.set(PDFName.of('XObject'), xobjects.clone(context));
    return copy;
}

/**
 * Delete every indirect object the trailer cannot reach.
 * Returns the number of objects deleted.
 */
export function pruneUnreachableObjects(context: PDFContext): number {
    const { Root, Info, Encrypt } = context.trailerInfo;
    const pending = [Root, Info, Encrypt].filter((entry): entry is PDFObject => entry !== undefined);

    const reachable = new Set<string>();
    let object: PDFObject | undefined;
    while ((object = pending.pop()) !== undefined) {
        if (object instanceof PDFRef) {
            const key = object.toString();
            if (reachable.has(key)) continue;
            reachable.add(key);
            // Lazily embedded fonts have a ref but no object until save
            const target = context.lookup(object);
            if (target) pending.push(target);
        } else if (object instanceof PDFDict) {
            for (const [, value] of object.entries()) pending.push(value);
        } else if (object instanceof PDFArray) {
            pending.push(...object.asArray());
        } else if (object instanceof PDFStream) {
            pending.push(object.dict);
        }
    }

    let deleted = 0;
    for (const [ref] of context.enumerateIndirectObjects()) {
        if (reachable.has(ref.toString())) continue;
        context.delete(ref);
        deleted++;
    }
    return deleted;
}
