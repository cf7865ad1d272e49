import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';
import { PDFArray, PDFContext, PDFDict, PDFName, PDFNumber } from 'pdf-lib';
import {
    decodeStream,
    lookupArray,
    lookupDict,
    lookupName,
    lookupNumber,
    lookupStream,
    nameText,
    numberArray,
    resolve,
} from './objects.js';

/**
 * Metrics and text decoding for one font resource
 */
export interface ResolvedFont {
    /** 1 for simple fonts, 2 for composite (Type0) fonts */
    readonly bytesPerCode: 1 | 2;
    /** Glyph-space ascent, in text space units per unit font size */
    readonly ascent: number;
    /** Glyph-space descent (negative), in text space units per unit font size */
    readonly descent: number;
    splitCodes(bytes: Uint8Array): number[];
    /** Horizontal displacement w0 in text space units per unit font size */
    widthOf(code: number): number;
    /** Unicode text for a character code, '' when unknown */
    toUnicode(code: number): string;
    encodeCode(code: number): number[];
}

type SimpleEncoding = typeof Encodings.WinAnsi;

interface CodeEntry {
    unicode: string;
    glyphName: string;
}

const DEFAULT_ASCENT = 0.8;
const DEFAULT_DESCENT = -0.2;
const DEFAULT_WIDTH = 0.5;

/**
 * Common aliases for the standard 14 fonts
 */
const STANDARD_FONT_ALIASES: Record<string, FontNames> = {
    Arial: FontNames.Helvetica,
    'Arial,Bold': FontNames.HelveticaBold,
    'Arial,Italic': FontNames.HelveticaOblique,
    'Arial,BoldItalic': FontNames.HelveticaBoldOblique,
    ArialMT: FontNames.Helvetica,
    'Arial-BoldMT': FontNames.HelveticaBold,
    TimesNewRoman: FontNames.TimesRoman,
    TimesNewRomanPSMT: FontNames.TimesRoman,
    'TimesNewRoman,Bold': FontNames.TimesRomanBold,
    CourierNew: FontNames.Courier,
    CourierNewPSMT: FontNames.Courier,
};

const codeTableCache = new WeakMap<SimpleEncoding, Map<number, CodeEntry>>();

/**
 * code → (unicode, glyph name) for a built-in simple encoding
 */
function codeTable(encoding: SimpleEncoding): Map<number, CodeEntry> {
    const cached = codeTableCache.get(encoding);
    if (cached) return cached;

    const table = new Map<number, CodeEntry>();
    for (const codePoint of encoding.supportedCodePoints) {
        const { code, name } = encoding.encodeUnicodeCodePoint(codePoint);
        if (!table.has(code)) {
            table.set(code, { unicode: String.fromCodePoint(codePoint), glyphName: name });
        }
    }
    codeTableCache.set(encoding, table);
    return table;
}

const glyphUnicodeCache = new Map<string, string>();

/**
 * Unicode text for a glyph name (WinAnsi names, uniXXXX, uXXXX[XX])
 */
export function glyphNameToUnicode(glyphName: string): string {
    const uni = /^uni([0-9A-Fa-f]{4})$/.exec(glyphName) ?? /^u([0-9A-Fa-f]{4,6})$/.exec(glyphName);
    if (uni) {
        return String.fromCodePoint(parseInt(uni[1], 16));
    }
    if (glyphUnicodeCache.size === 0) {
        for (const entry of codeTable(Encodings.WinAnsi).values()) {
            glyphUnicodeCache.set(entry.glyphName, entry.unicode);
        }
    }
    return glyphUnicodeCache.get(glyphName) ?? '';
}

export function standardFontName(baseFont: string | undefined): FontNames | undefined {
    if (!baseFont) return undefined;
    const name = baseFont.replace(/^[A-Z]{6}\+/, '');
    return Object.values(FontNames).find((candidate) => candidate === name) ?? STANDARD_FONT_ALIASES[name];
}

function utf16beToString(hex: string): string {
    let out = '';
    for (let i = 0; i + 4 <= hex.length; i += 4) {
        out += String.fromCharCode(parseInt(hex.substring(i, i + 4), 16));
    }
    if (hex.length % 4 === 2) {
        out += String.fromCharCode(parseInt(hex.substring(hex.length - 2), 16));
    }
    return out;
}

function incrementLastUnit(text: string, offset: number): string {
    if (text.length === 0) return text;
    const last = text.charCodeAt(text.length - 1) + offset;
    return text.slice(0, -1) + String.fromCharCode(last);
}

const MAX_RANGE_SPAN = 0xffff;

/**
 * Parse bfchar / bfrange sections of a ToUnicode CMap
 */
export function parseToUnicodeCMap(source: string): Map<number, string> {
    const map = new Map<number, string>();

    for (const block of source.matchAll(/beginbfchar([\s\S]*?)endbfchar/g)) {
        for (const entry of block[1].matchAll(/<([0-9A-Fa-f]+)>\s*<([0-9A-Fa-f]*)>/g)) {
            map.set(parseInt(entry[1], 16), utf16beToString(entry[2]));
        }
    }

    for (const block of source.matchAll(/beginbfrange([\s\S]*?)endbfrange/g)) {
        const entries = block[1].matchAll(
            /<([0-9A-Fa-f]+)>\s*<([0-9A-Fa-f]+)>\s*(<[0-9A-Fa-f]*>|\[[^\]]*\])/g
        );
        for (const entry of entries) {
            const low = parseInt(entry[1], 16);
            const high = Math.min(parseInt(entry[2], 16), low + MAX_RANGE_SPAN);
            const destination = entry[3];

            if (destination.startsWith('[')) {
                const targets = [...destination.matchAll(/<([0-9A-Fa-f]*)>/g)].map((m) => m[1]);
                targets.forEach((target, offset) => {
                    if (low + offset <= high) {
                        map.set(low + offset, utf16beToString(target));
                    }
                });
            } else {
                const base = utf16beToString(destination.slice(1, -1));
                for (let code = low; code <= high; code++) {
                    map.set(code, incrementLastUnit(base, code - low));
                }
            }
        }
    }

    return map;
}

/**
 * /W array of a CIDFont: c [w1 w2 ...] or cFirst cLast w
 */
export function parseCidWidths(context: PDFContext, widths: PDFArray): Map<number, number> {
    const map = new Map<number, number>();
    const items = widths.asArray().map((item) => resolve(context, item));
    let i = 0;

    while (i < items.length) {
        const first = items[i];
        const second = items[i + 1];
        if (!(first instanceof PDFNumber)) break;

        if (second instanceof PDFArray) {
            numberArray(context, second).forEach((width, offset) => {
                map.set(first.asNumber() + offset, width);
            });
            i += 2;
            continue;
        }

        const third = items[i + 2];
        if (second instanceof PDFNumber && third instanceof PDFNumber) {
            for (let cid = first.asNumber(); cid <= second.asNumber(); cid++) {
                map.set(cid, third.asNumber());
            }
            i += 3;
            continue;
        }
        break;
    }

    return map;
}

function readToUnicode(context: PDFContext, fontDict: PDFDict): Map<number, string> | undefined {
    const stream = lookupStream(context, fontDict, 'ToUnicode');
    if (!stream) return undefined;
    const source = Buffer.from(decodeStream(stream)).toString('latin1');
    return parseToUnicodeCMap(source);
}

function readDescriptorMetrics(
    context: PDFContext,
    descriptor: PDFDict | undefined
): { ascent: number; descent: number; missingWidth?: number } {
    if (!descriptor) {
        return { ascent: DEFAULT_ASCENT, descent: DEFAULT_DESCENT };
    }
    const ascent = lookupNumber(context, descriptor, 'Ascent');
    const descent = lookupNumber(context, descriptor, 'Descent');
    const missingWidth = lookupNumber(context, descriptor, 'MissingWidth');
    return {
        ascent: ascent && ascent > 0 ? ascent / 1000 : DEFAULT_ASCENT,
        descent: descent && descent < 0 ? descent / 1000 : DEFAULT_DESCENT,
        missingWidth: missingWidth !== undefined ? missingWidth / 1000 : undefined,
    };
}

function simpleEncodingFor(standard: FontNames | undefined): SimpleEncoding {
    if (standard === FontNames.Symbol) return Encodings.Symbol;
    if (standard === FontNames.ZapfDingbats) return Encodings.ZapfDingbats;
    return Encodings.WinAnsi;
}

/**
 * /Differences of a simple font's encoding dictionary
 */
function readDifferences(context: PDFContext, fontDict: PDFDict): Map<number, string> {
    const differences = new Map<number, string>();
    const encoding = lookupDict(context, fontDict, 'Encoding');
    if (!encoding) return differences;
    const array = lookupArray(context, encoding, 'Differences');
    if (!array) return differences;

    let code = 0;
    for (const item of array.asArray()) {
        const value = resolve(context, item);
        if (value instanceof PDFNumber) {
            code = value.asNumber();
        } else if (value instanceof PDFName) {
            differences.set(code, nameText(value));
            code++;
        }
    }
    return differences;
}

function buildSimpleFont(context: PDFContext, fontDict: PDFDict, subtype: string | undefined): ResolvedFont {
    const baseFont = lookupName(context, fontDict, 'BaseFont');
    const standard = standardFontName(baseFont);
    const standardMetrics = standard ? Font.load(standard) : undefined;
    const table = codeTable(simpleEncodingFor(standard));
    const differences = readDifferences(context, fontDict);
    const toUnicodeMap = readToUnicode(context, fontDict);
    const descriptor = lookupDict(context, fontDict, 'FontDescriptor');
    const metrics = readDescriptorMetrics(context, descriptor);

    const firstChar = lookupNumber(context, fontDict, 'FirstChar') ?? 0;
    const widthsArray = lookupArray(context, fontDict, 'Widths');
    const widths = widthsArray ? numberArray(context, widthsArray) : undefined;

    // Type3 glyph space is defined by /FontMatrix instead of 1/1000
    let widthScale = 0.001;
    if (subtype === 'Type3') {
        const fontMatrix = lookupArray(context, fontDict, 'FontMatrix');
        widthScale = fontMatrix ? numberArray(context, fontMatrix)[0] ?? 0.001 : 0.001;
    }

    const glyphNameOf = (code: number): string | undefined =>
        differences.get(code) ?? table.get(code)?.glyphName;

    return {
        bytesPerCode: 1,
        ascent: subtype === 'Type3' ? DEFAULT_ASCENT : metrics.ascent,
        descent: subtype === 'Type3' ? DEFAULT_DESCENT : metrics.descent,
        splitCodes: (bytes) => Array.from(bytes),
        encodeCode: (code) => [code & 0xff],
        widthOf: (code) => {
            const index = code - firstChar;
            if (widths && index >= 0 && index < widths.length) {
                return widths[index] * widthScale;
            }
            const glyphName = glyphNameOf(code);
            const standardWidth = glyphName ? standardMetrics?.getWidthOfGlyph(glyphName) : undefined;
            if (typeof standardWidth === 'number') {
                return standardWidth / 1000;
            }
            return metrics.missingWidth ?? DEFAULT_WIDTH;
        },
        toUnicode: (code) => {
            const mapped = toUnicodeMap?.get(code);
            if (mapped !== undefined) return mapped;
            const difference = differences.get(code);
            if (difference !== undefined) return glyphNameToUnicode(difference);
            return table.get(code)?.unicode ?? '';
        },
    };
}

function buildCompositeFont(context: PDFContext, fontDict: PDFDict): ResolvedFont {
    const descendants = lookupArray(context, fontDict, 'DescendantFonts');
    const first = descendants ? resolve(context, descendants.get(0)) : undefined;
    const cidFont = first instanceof PDFDict ? first : undefined;

    const defaultWidth = (cidFont ? lookupNumber(context, cidFont, 'DW') : undefined) ?? 1000;
    const wArray = cidFont ? lookupArray(context, cidFont, 'W') : undefined;
    const widths = wArray ? parseCidWidths(context, wArray) : new Map<number, number>();
    const descriptor = cidFont ? lookupDict(context, cidFont, 'FontDescriptor') : undefined;
    const metrics = readDescriptorMetrics(context, descriptor);
    const toUnicodeMap = readToUnicode(context, fontDict);

    return {
        bytesPerCode: 2,
        ascent: metrics.ascent,
        descent: metrics.descent,
        splitCodes: (bytes) => {
            const codes: number[] = [];
            for (let i = 0; i < bytes.length; i += 2) {
                codes.push(i + 1 < bytes.length ? (bytes[i] << 8) | bytes[i + 1] : bytes[i]);
            }
            return codes;
        },
        encodeCode: (code) => [(code >> 8) & 0xff, code & 0xff],
        widthOf: (code) => (widths.get(code) ?? defaultWidth) / 1000,
        toUnicode: (code) => toUnicodeMap?.get(code) ?? '',
    };
}

/**
 * Font used when a show-text operator runs without a resolvable font
 */
export const FALLBACK_FONT: ResolvedFont = {
    bytesPerCode: 1,
    ascent: DEFAULT_ASCENT,
    descent: DEFAULT_DESCENT,
    splitCodes: (bytes) => Array.from(bytes),
    encodeCode: (code) => [code & 0xff],
    widthOf: () => DEFAULT_WIDTH,
    toUnicode: (code) => String.fromCharCode(code),
};

/**
 * Resolves font resources to metrics. One instance per document cycle.
 */
export class FontResolver {
    private readonly cache = new Map<PDFDict, ResolvedFont>();

    constructor(private readonly context: PDFContext) { }

    resolve(resources: PDFDict | undefined, resourceName: string): ResolvedFont | undefined {
        if (!resources) return undefined;
        const fonts = lookupDict(this.context, resources, 'Font');
        if (!fonts) return undefined;
        const fontDict = lookupDict(this.context, fonts, resourceName);
        if (!fontDict) return undefined;

        const cached = this.cache.get(fontDict);
        if (cached) return cached;

        const subtype = lookupName(this.context, fontDict, 'Subtype');
        const font = subtype === 'Type0'
            ? buildCompositeFont(this.context, fontDict)
            : buildSimpleFont(this.context, fontDict, subtype);
        this.cache.set(fontDict, font);
        return font;
    }
}
