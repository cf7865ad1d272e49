import { PDFContext, PDFDict, PDFName, PDFRef, PDFStream } from 'pdf-lib';
import type { ContentOperand, ContentOperation } from './content-parser.js';
import { parseContentStream } from './content-parser.js';
import { FALLBACK_FONT, FontResolver, type ResolvedFont } from './fonts.js';
import { decodeStream, lookupArray, lookupDict, lookupName, numberArray } from './objects.js';
import {
    IDENTITY_MATRIX,
    boxFromCorners,
    multiplyMatrices,
    transformBox,
    translationMatrix,
    type BoundingBox,
    type Matrix,
} from '../utils/geometry.js';

/**
 * A glyph placed on the page
 */
export interface PositionedGlyph {
    code: number;
    text: string;
    bbox: BoundingBox;
    /** Horizontal displacement in text space, including spacing and scaling */
    advance: number;
}

export type ShowTextPiece =
    | { type: 'glyph'; glyph: PositionedGlyph }
    | { type: 'adjust'; value: number };

export interface ShowTextEvent {
    opIndex: number;
    operation: ContentOperation;
    font: ResolvedFont;
    fontSize: number;
    horizontalScale: number;
    pieces: ShowTextPiece[];
    /** Nesting depth of form XObjects; 0 for the page itself */
    depth: number;
}

export interface XObjectEvent {
    opIndex: number;
    name: string;
    subtype: 'Image' | 'Form' | 'Other';
    bbox: BoundingBox;
    ctm: Matrix;
    stream?: PDFStream;
    ref?: PDFRef;
    depth: number;
}

export interface InlineImageEvent {
    opIndex: number;
    bbox: BoundingBox;
    depth: number;
}

export interface ContentVisitor {
    onShowText?(event: ShowTextEvent): void;
    onXObject?(event: XObjectEvent): void;
    onInlineImage?(event: InlineImageEvent): void;
}

export interface InterpretOptions {
    context: PDFContext;
    resources: PDFDict | undefined;
    fonts: FontResolver;
    ctm?: Matrix;
    /** Descend into form XObjects and report their content */
    followForms?: boolean;
    depth?: number;
}

export const MAX_FORM_DEPTH = 8;

interface TextState {
    charSpacing: number;
    wordSpacing: number;
    horizontalScale: number;
    leading: number;
    font: ResolvedFont | undefined;
    fontSize: number;
    rise: number;
}

interface GraphicsState {
    ctm: Matrix;
    text: TextState;
}

const UNIT_SQUARE: BoundingBox = { x: 0, y: 0, width: 1, height: 1 };
const MIN_GLYPH_WIDTH = 0.01;

function num(operands: ContentOperand[], index: number): number {
    const operand = operands[index];
    return operand?.type === 'number' ? operand.value : 0;
}

function matrixFrom(operands: ContentOperand[]): Matrix {
    return [num(operands, 0), num(operands, 1), num(operands, 2), num(operands, 3), num(operands, 4), num(operands, 5)];
}

/**
 * Walks a content stream tracking graphics and text state, reporting
 * positioned glyphs, XObjects and inline images to a visitor.
 */
class ContentInterpreter {
    private state: GraphicsState;
    private readonly stack: GraphicsState[] = [];
    private textMatrix: Matrix = IDENTITY_MATRIX;
    private lineMatrix: Matrix = IDENTITY_MATRIX;
    private readonly depth: number;

    constructor(
        private readonly options: InterpretOptions,
        private readonly visitor: ContentVisitor
    ) {
        this.depth = options.depth ?? 0;
        this.state = {
            ctm: options.ctm ?? IDENTITY_MATRIX,
            text: {
                charSpacing: 0,
                wordSpacing: 0,
                horizontalScale: 1,
                leading: 0,
                font: undefined,
                fontSize: 0,
                rise: 0,
            },
        };
    }

    run(operations: readonly ContentOperation[]): void {
        operations.forEach((operation, index) => this.execute(operation, index));
    }

    private execute(operation: ContentOperation, opIndex: number): void {
        const { operator, operands } = operation;
        const text = this.state.text;

        switch (operator) {
            case 'q':
                this.stack.push({ ctm: this.state.ctm, text: { ...text } });
                break;
            case 'Q': {
                const restored = this.stack.pop();
                if (restored) this.state = restored;
                break;
            }
            case 'cm':
                this.state.ctm = multiplyMatrices(matrixFrom(operands), this.state.ctm);
                break;
            case 'BT':
                this.textMatrix = IDENTITY_MATRIX;
                this.lineMatrix = IDENTITY_MATRIX;
                break;
            case 'Tc':
                text.charSpacing = num(operands, 0);
                break;
            case 'Tw':
                text.wordSpacing = num(operands, 0);
                break;
            case 'Tz':
                text.horizontalScale = num(operands, 0) / 100;
                break;
            case 'TL':
                text.leading = num(operands, 0);
                break;
            case 'Ts':
                text.rise = num(operands, 0);
                break;
            case 'Tf': {
                const name = operands[0];
                text.font = name?.type === 'name'
                    ? this.options.fonts.resolve(this.options.resources, name.value)
                    : undefined;
                text.fontSize = num(operands, 1);
                break;
            }
            case 'Td':
                this.moveLine(num(operands, 0), num(operands, 1));
                break;
            case 'TD':
                text.leading = -num(operands, 1);
                this.moveLine(num(operands, 0), num(operands, 1));
                break;
            case 'Tm':
                this.lineMatrix = matrixFrom(operands);
                this.textMatrix = this.lineMatrix;
                break;
            case 'T*':
                this.moveLine(0, -text.leading);
                break;
            case 'Tj':
                this.show(operation, opIndex, operands.slice(0, 1));
                break;
            case 'TJ': {
                const array = operands[0];
                this.show(operation, opIndex, array?.type === 'array' ? array.items : []);
                break;
            }
            case "'":
                this.moveLine(0, -text.leading);
                this.show(operation, opIndex, operands.slice(0, 1));
                break;
            case '"':
                text.wordSpacing = num(operands, 0);
                text.charSpacing = num(operands, 1);
                this.moveLine(0, -text.leading);
                this.show(operation, opIndex, operands.slice(2, 3));
                break;
            case 'Do': {
                const name = operands[0];
                if (name?.type === 'name') this.doXObject(name.value, opIndex);
                break;
            }
            case 'BI':
                this.visitor.onInlineImage?.({
                    opIndex,
                    bbox: transformBox(this.state.ctm, UNIT_SQUARE),
                    depth: this.depth,
                });
                break;
            default:
                break;
        }
    }

    private moveLine(tx: number, ty: number): void {
        this.lineMatrix = multiplyMatrices(translationMatrix(tx, ty), this.lineMatrix);
        this.textMatrix = this.lineMatrix;
    }

    private show(operation: ContentOperation, opIndex: number, items: ContentOperand[]): void {
        const text = this.state.text;
        const font = text.font ?? FALLBACK_FONT;
        const { fontSize, horizontalScale, charSpacing, wordSpacing, rise } = text;
        const pieces: ShowTextPiece[] = [];

        for (const item of items) {
            if (item.type === 'number') {
                const tx = (-item.value / 1000) * fontSize * horizontalScale;
                this.textMatrix = multiplyMatrices(translationMatrix(tx, 0), this.textMatrix);
                pieces.push({ type: 'adjust', value: item.value });
                continue;
            }
            if (item.type !== 'string') continue;

            for (const code of font.splitCodes(item.bytes)) {
                const w0 = font.widthOf(code);
                const renderingMatrix = multiplyMatrices(
                    [fontSize * horizontalScale, 0, 0, fontSize, 0, rise],
                    multiplyMatrices(this.textMatrix, this.state.ctm)
                );
                const bbox = transformBox(
                    renderingMatrix,
                    boxFromCorners(0, font.descent, Math.max(w0, MIN_GLYPH_WIDTH), font.ascent)
                );
                const spacing = font.bytesPerCode === 1 && code === 32 ? wordSpacing : 0;
                const advance = (w0 * fontSize + charSpacing + spacing) * horizontalScale;

                pieces.push({
                    type: 'glyph',
                    glyph: { code, text: font.toUnicode(code), bbox, advance },
                });
                this.textMatrix = multiplyMatrices(translationMatrix(advance, 0), this.textMatrix);
            }
        }

        this.visitor.onShowText?.({
            opIndex,
            operation,
            font,
            fontSize,
            horizontalScale,
            pieces,
            depth: this.depth,
        });
    }

    private doXObject(name: string, opIndex: number): void {
        const { context, resources } = this.options;
        const xobjects = resources ? lookupDict(context, resources, 'XObject') : undefined;
        const entry = xobjects?.get(PDFName.of(name));
        const ref = entry instanceof PDFRef ? entry : undefined;
        const resolved = entry instanceof PDFRef ? context.lookup(entry) : entry;
        const stream = resolved instanceof PDFStream ? resolved : undefined;
        const ctm = this.state.ctm;

        if (!stream) {
            this.visitor.onXObject?.({
                opIndex, name, subtype: 'Other', bbox: transformBox(ctm, UNIT_SQUARE), ctm, depth: this.depth,
            });
            return;
        }

        const subtype = lookupName(context, stream.dict, 'Subtype');
        if (subtype !== 'Form') {
            this.visitor.onXObject?.({
                opIndex,
                name,
                subtype: subtype === 'Image' ? 'Image' : 'Other',
                bbox: transformBox(ctm, UNIT_SQUARE),
                ctm,
                stream,
                ref,
                depth: this.depth,
            });
            return;
        }

        const formMatrix = formMatrixOf(context, stream);
        const formCtm = multiplyMatrices(formMatrix, ctm);
        this.visitor.onXObject?.({
            opIndex,
            name,
            subtype: 'Form',
            bbox: transformBox(formCtm, formBBoxOf(context, stream)),
            ctm,
            stream,
            ref,
            depth: this.depth,
        });

        if (this.options.followForms && this.depth < MAX_FORM_DEPTH) {
            interpretContent(parseContentStream(decodeStream(stream)), this.visitor, {
                ...this.options,
                resources: lookupDict(context, stream.dict, 'Resources') ?? resources,
                ctm: formCtm,
                depth: this.depth + 1,
            });
        }
    }
}

export function formMatrixOf(context: PDFContext, stream: PDFStream): Matrix {
    const array = lookupArray(context, stream.dict, 'Matrix');
    if (!array || array.size() !== 6) return IDENTITY_MATRIX;
    const [a, b, c, d, e, f] = numberArray(context, array);
    return [a, b, c, d, e, f];
}

export function formBBoxOf(context: PDFContext, stream: PDFStream): BoundingBox {
    const array = lookupArray(context, stream.dict, 'BBox');
    if (!array || array.size() !== 4) return UNIT_SQUARE;
    const [x1, y1, x2, y2] = numberArray(context, array);
    return boxFromCorners(x1, y1, x2, y2);
}

/**
 * Interpret parsed operations, reporting to the visitor
 */
export function interpretContent(
    operations: readonly ContentOperation[],
    visitor: ContentVisitor,
    options: InterpretOptions
): void {
    new ContentInterpreter(options, visitor).run(operations);
}
