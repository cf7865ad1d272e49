import type { PDFDocument } from 'pdf-lib';
import { interpretContent, type PositionedGlyph } from './content-interpreter.js';
import { parseContentStream } from './content-parser.js';
import { FontResolver } from './fonts.js';
import { decodeContents } from './objects.js';
import { centerY, unionBoxes, type BoundingBox } from '../utils/geometry.js';

/**
 * One visual line of text, glyphs ordered left to right
 */
export interface TextLine {
    text: string;
    bbox: BoundingBox;
    glyphs: PositionedGlyph[];
    /** For each character of `text`, the index into `glyphs`, or -1 for an inserted space */
    charToGlyph: number[];
}

export interface PageText {
    pageIndex: number;
    width: number;
    height: number;
    mediaBox: BoundingBox;
    glyphs: PositionedGlyph[];
    lines: TextLine[];
    /** Lines joined top to bottom */
    text: string;
}

/** Gap (in units of glyph height) above which a space is inserted between glyphs */
const WORD_GAP_RATIO = 0.15;
/** Baseline tolerance (in units of glyph height) for two glyphs to share a line */
const LINE_TOLERANCE_RATIO = 0.5;

/**
 * Collect every glyph drawn on a page, including form XObject content
 */
export function collectPageGlyphs(pdf: PDFDocument, pageIndex: number): PositionedGlyph[] {
    const page = pdf.getPage(pageIndex);
    const context = pdf.context;
    const operations = parseContentStream(decodeContents(context, page.node.Contents()));
    const glyphs: PositionedGlyph[] = [];

    interpretContent(
        operations,
        {
            onShowText: (event) => {
                for (const piece of event.pieces) {
                    if (piece.type === 'glyph') glyphs.push(piece.glyph);
                }
            },
        },
        {
            context,
            resources: page.node.Resources(),
            fonts: new FontResolver(context),
            followForms: true,
        }
    );

    return glyphs;
}

function hasVisibleText(glyph: PositionedGlyph): boolean {
    return glyph.text.trim().length > 0;
}

/**
 * Group glyphs into lines (top to bottom) and order each line left to right
 */
export function buildLines(glyphs: readonly PositionedGlyph[]): TextLine[] {
    const sorted = glyphs
        .filter((glyph) => glyph.text.length > 0)
        .map((glyph, order) => ({ glyph, order }))
        .sort((a, b) => centerY(b.glyph.bbox) - centerY(a.glyph.bbox) || a.order - b.order);

    const groups: PositionedGlyph[][] = [];
    let current: PositionedGlyph[] = [];
    let currentCenter = 0;
    let currentHeight = 0;

    for (const { glyph } of sorted) {
        const center = centerY(glyph.bbox);
        const tolerance = Math.max(currentHeight, glyph.bbox.height) * LINE_TOLERANCE_RATIO;
        if (current.length > 0 && Math.abs(currentCenter - center) <= tolerance) {
            current.push(glyph);
            continue;
        }
        if (current.length > 0) groups.push(current);
        current = [glyph];
        currentCenter = center;
        currentHeight = glyph.bbox.height;
    }
    if (current.length > 0) groups.push(current);

    return groups
        .map((group) => toLine([...group].sort((a, b) => a.bbox.x - b.bbox.x)))
        .filter((line) => line.text.trim().length > 0);
}

function toLine(glyphs: PositionedGlyph[]): TextLine {
    let text = '';
    const charToGlyph: number[] = [];

    glyphs.forEach((glyph, index) => {
        const previous = glyphs[index - 1];
        if (previous && hasVisibleText(previous) && hasVisibleText(glyph)) {
            const gap = glyph.bbox.x - (previous.bbox.x + previous.bbox.width);
            const height = Math.max(previous.bbox.height, glyph.bbox.height);
            if (gap > height * WORD_GAP_RATIO) {
                text += ' ';
                charToGlyph.push(-1);
            }
        }
        for (let i = 0; i < glyph.text.length; i++) {
            text += glyph.text[i];
            charToGlyph.push(index);
        }
    });

    return {
        text,
        bbox: unionBoxes(glyphs.map((glyph) => glyph.bbox)) ?? { x: 0, y: 0, width: 0, height: 0 },
        glyphs,
        charToGlyph,
    };
}

/**
 * Box covering the characters [start, end) of a line
 */
export function lineRangeBox(line: TextLine, start: number, end: number): BoundingBox | undefined {
    const indices = new Set<number>();
    for (let i = start; i < end; i++) {
        const glyphIndex = line.charToGlyph[i];
        if (glyphIndex !== undefined && glyphIndex >= 0) indices.add(glyphIndex);
    }
    return unionBoxes([...indices].map((index) => line.glyphs[index].bbox));
}

/**
 * Positioned text of one page
 */
export function readPageText(pdf: PDFDocument, pageIndex = 0): PageText {
    const page = pdf.getPage(pageIndex);
    const mediaBox = page.getMediaBox();
    const glyphs = collectPageGlyphs(pdf, pageIndex);
    const lines = buildLines(glyphs);

    return {
        pageIndex,
        width: mediaBox.width,
        height: mediaBox.height,
        mediaBox,
        glyphs,
        lines,
        text: lines.map((line) => line.text).join('\n'),
    };
}
