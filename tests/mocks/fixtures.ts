/**
 * PDF Fixtures
 *
 * Small documents generated in-process with pdf-lib.
 */

import {
    PDFArray,
    PDFDocument,
    PDFDict,
    PDFHexString,
    PDFName,
    PDFNumber,
    PDFObject,
    PDFPage,
    PDFRawStream,
    PDFString,
    StandardFonts,
    concatTransformationMatrix,
    decodePDFRawStream,
    drawObject,
    popGraphicsState,
    pushGraphicsState,
    type PDFFont,
} from 'pdf-lib';
import { readPageText } from '../../src/pdf/page-text.js';
import { PDFProcessor } from '../../src/services/pdf.processor.js';
import type { SourceDocument } from '../../src/types/document.types.js';
import { createMockLogger } from './logger.mock.js';

export const PAGE_SIZE: [number, number] = [612, 792];

export interface LineFixture {
    text: string;
    x: number;
    y: number;
    size?: number;
}

/**
 * Helvetica 12pt, baselines at 750 / 700 / 680 / 300
 */
export const PATIENT_LINES: LineFixture[] = [
    { text: 'Name: John Doe', x: 50, y: 750 },
    { text: 'Sex: F', x: 50, y: 700 },
    { text: 'Age: 34', x: 50, y: 680 },
    { text: 'Findings: unremarkable', x: 50, y: 300 },
];

/** Top-left quadrant of a letter page */
export const TOP_LEFT_QUADRANT = { x: 0, y: 396, width: 306, height: 396 };

export interface PageBuilder {
    pdf: PDFDocument;
    page: PDFPage;
    font: PDFFont;
}

export interface FixtureOptions {
    lines?: LineFixture[];
    pageCount?: number;
    decorate?: (builder: PageBuilder) => void;
}

/**
 * Build and save a document; each page gets the same lines
 */
export async function createPdf(options: FixtureOptions = {}): Promise<Uint8Array> {
    const pdf = await PDFDocument.create();
    const font = pdf.embedStandardFont(StandardFonts.Helvetica);
    const pageCount = options.pageCount ?? 1;

    for (let i = 0; i < pageCount; i++) {
        const page = pdf.addPage(PAGE_SIZE);
        for (const line of options.lines ?? PATIENT_LINES) {
            page.drawText(line.text, { x: line.x, y: line.y, size: line.size ?? 12, font });
        }
        options.decorate?.({ pdf, page, font });
    }

    return pdf.save({ useObjectStreams: false });
}

/**
 * Info entries, an XMP stream, page PieceInfo and a trailer ID
 */
export function addIdentifyingMetadata({ pdf, page }: PageBuilder): void {
    pdf.setTitle('Test Report');
    pdf.setAuthor('Test Author');
    pdf.setSubject('Test Subject');
    pdf.setKeywords(['placeholder']);

    const info = pdf.context.lookup(pdf.context.trailerInfo.Info, PDFDict);
    info.set(PDFName.of('PatientId'), PDFString.of('test-patient'));
    info.set(PDFName.of('Trapped'), PDFName.of('False'));

    const xmp = pdf.context.stream('<x:xmpmeta><dc:creator>Test Author</dc:creator></x:xmpmeta>', {
        Type: 'Metadata',
        Subtype: 'XML',
    });
    pdf.catalog.set(PDFName.of('Metadata'), pdf.context.register(xmp));
    page.node.set(PDFName.of('PieceInfo'), pdf.context.obj({ App: { Private: PDFString.of('test') } }));
    pdf.context.trailerInfo.ID = pdf.context.obj([PDFHexString.of('00112233'), PDFHexString.of('00112233')]);
}

/**
 * Form XObject at (300, 500) drawing "Secret" at baseline 510 and "Keep" at 530
 */
export function addForm({ pdf, page, font }: PageBuilder): void {
    const form = pdf.context.stream(
        'BT /F1 12 Tf 10 10 Td (Secret) Tj ET BT /F1 12 Tf 10 30 Td (Keep) Tj ET',
        {
            Type: 'XObject',
            Subtype: 'Form',
            BBox: [0, 0, 200, 50],
            Resources: { Font: { F1: font.ref } },
        }
    );
    const name = page.node.newXObject('Fm', pdf.context.register(form));
    page.pushOperators(
        pushGraphicsState(),
        concatTransformationMatrix(1, 0, 0, 1, 300, 500),
        drawObject(name),
        popGraphicsState()
    );
}

/**
 * 1x1 gray image scaled to 100x100 at (350, 600)
 */
export function addImage({ pdf, page }: PageBuilder): void {
    const image = pdf.context.stream(new Uint8Array([0x80]), {
        Type: 'XObject',
        Subtype: 'Image',
        Width: 1,
        Height: 1,
        ColorSpace: 'DeviceGray',
        BitsPerComponent: 8,
    });
    const name = page.node.newXObject('Im', pdf.context.register(image));
    page.pushOperators(
        pushGraphicsState(),
        concatTransformationMatrix(100, 0, 0, 100, 350, 600),
        drawObject(name),
        popGraphicsState()
    );
}

/**
 * Form "Logo" painting a 1x1 image over its 40x40 box, drawn at (50, 700) and at (400, 100)
 */
export function addSharedForm({ pdf, page }: PageBuilder): void {
    const image = pdf.context.stream(new Uint8Array([0x80]), {
        Type: 'XObject',
        Subtype: 'Image',
        Width: 1,
        Height: 1,
        ColorSpace: 'DeviceGray',
        BitsPerComponent: 8,
    });
    const form = pdf.context.stream('q 40 0 0 40 0 0 cm /Im1 Do Q', {
        Type: 'XObject',
        Subtype: 'Form',
        BBox: [0, 0, 40, 40],
        Resources: { XObject: { Im1: pdf.context.register(image) } },
    });
    const name = page.node.newXObject('Logo', pdf.context.register(form));
    page.pushOperators(
        pushGraphicsState(),
        concatTransformationMatrix(1, 0, 0, 1, 50, 700),
        drawObject(name),
        popGraphicsState(),
        pushGraphicsState(),
        concatTransformationMatrix(1, 0, 0, 1, 400, 100),
        drawObject(name),
        popGraphicsState()
    );
}

/**
 * ToUnicode CMap: 0003 space, 0006 "D", 0010-0013 "J".."M"
 */
export const TYPE0_TO_UNICODE = [
    '/CIDInit /ProcSet findresource begin',
    '12 dict begin',
    'begincmap',
    '1 begincodespacerange <0000> <FFFF> endcodespacerange',
    '2 beginbfchar',
    '<0003> <0020>',
    '<0006> <0044>',
    'endbfchar',
    '1 beginbfrange',
    '<0010> <0013> <004A>',
    'endbfrange',
    'endcmap',
    'end end',
].join('\n');

/**
 * Identity-H Type0 font as /T0: widths 250 (space), 600 ("D"), 500 ("J".."M")
 */
export function addType0Font({ pdf, page }: PageBuilder): void {
    const { context } = pdf;
    const descriptor = context.obj({
        Type: 'FontDescriptor',
        FontName: 'TestSans',
        Flags: 32,
        FontBBox: [0, -200, 1000, 800],
        ItalicAngle: 0,
        Ascent: 800,
        Descent: -200,
        CapHeight: 700,
        StemV: 80,
    });
    const cidFont = context.obj({
        Type: 'Font',
        Subtype: 'CIDFontType2',
        BaseFont: 'TestSans',
        CIDSystemInfo: { Registry: PDFString.of('Adobe'), Ordering: PDFString.of('Identity'), Supplement: 0 },
        FontDescriptor: context.register(descriptor),
        DW: 1000,
        W: [3, [250], 6, [600], 16, 19, 500],
    });
    const font = context.obj({
        Type: 'Font',
        Subtype: 'Type0',
        BaseFont: 'TestSans',
        Encoding: 'Identity-H',
        DescendantFonts: [context.register(cidFont)],
        ToUnicode: context.register(context.stream(TYPE0_TO_UNICODE)),
    });
    page.node.setFontDictionary(PDFName.of('T0'), context.register(font));
}

/**
 * "JKLM DDD" in the Type0 font at 10pt, baseline (100, 400)
 */
export function addType0Text(builder: PageBuilder): void {
    addType0Font(builder);
    const { pdf, page } = builder;
    const content = 'BT /T0 10 Tf 100 400 Td <0010001100120013000300060006> Tj ET';
    page.node.addContentStream(pdf.context.register(pdf.context.stream(content)));
}

/**
 * Objects nothing refers to: an old Info dictionary and an old content stream
 */
export function addOrphanedObjects({ pdf }: PageBuilder): void {
    pdf.context.register(pdf.context.obj({
        Author: PDFString.of('Previous Author'),
        Title: PDFString.of('Patient Jane Roe'),
    }));
    pdf.context.register(pdf.context.flateStream('BT /F1 12 Tf 50 500 Td (Name: Old Patient Name) Tj ET'));
}

/**
 * Square annotation over [400, 100, 450, 150]
 */
export function addAnnotation({ pdf, page }: PageBuilder): void {
    const annotation = pdf.context.obj({
        Type: 'Annot',
        Subtype: 'Square',
        Rect: [400, 100, 450, 150],
        Contents: PDFString.of('test note'),
    });
    page.node.addAnnot(pdf.context.register(annotation));
}

/**
 * Raw content stream appended to the page, with Helvetica as /F1
 */
export function addRawContent(content: string): (builder: PageBuilder) => void {
    return ({ pdf, page, font }) => {
        page.node.setFontDictionary(PDFName.of('F1'), font.ref);
        page.node.addContentStream(pdf.context.register(pdf.context.stream(content)));
    };
}

export async function loadSource(bytes: Uint8Array, filename = 'test.pdf'): Promise<SourceDocument> {
    return new PDFProcessor(createMockLogger()).load(bytes, filename);
}

export async function openPdf(bytes: Uint8Array): Promise<PDFDocument> {
    return PDFDocument.load(bytes, { updateMetadata: false });
}

/**
 * Text lines of the first page, top to bottom
 */
export async function pageLines(bytes: Uint8Array): Promise<string[]> {
    return readPageText(await openPdf(bytes)).lines.map((line) => line.text);
}

/**
 * Decoded content of every stream object in the file
 */
export async function decodedStreams(bytes: Uint8Array): Promise<string[]> {
    const pdf = await openPdf(bytes);
    return pdf.context
        .enumerateIndirectObjects()
        .flatMap(([, object]) => (object instanceof PDFRawStream ? [object] : []))
        .map((stream) => Buffer.from(decodePDFRawStream(stream).decode()).toString('latin1'));
}

function describeObject(object: PDFObject): string {
    if (object instanceof PDFString || object instanceof PDFHexString) return object.decodeText();
    if (object instanceof PDFName) return object.asString();
    if (object instanceof PDFNumber) return String(object.asNumber());
    if (object instanceof PDFArray) return object.asArray().map(describeObject).join(' ');
    if (object instanceof PDFDict) {
        return object.entries().map(([key, value]) => `${key.asString()} ${describeObject(value)}`).join(' ');
    }
    if (object instanceof PDFRawStream) {
        const content = Buffer.from(decodePDFRawStream(object).decode()).toString('latin1');
        return `${describeObject(object.dict)}\n${content}`;
    }
    return object.toString();
}

/**
 * Every indirect object in the file as text: strings decoded, streams unfiltered
 */
export async function decodedObjects(bytes: Uint8Array): Promise<string[]> {
    const pdf = await openPdf(bytes);
    return pdf.context.enumerateIndirectObjects().map(([, object]) => describeObject(object));
}

export function hexOf(text: string): string {
    return Buffer.from(text, 'latin1').toString('hex');
}
