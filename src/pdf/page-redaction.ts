import {
    PDFArray,
    PDFContext,
    PDFDict,
    PDFDocument,
    PDFName,
    PDFObject,
    PDFRef,
    rgb,
} from 'pdf-lib';
import {
    MAX_FORM_DEPTH,
    formMatrixOf,
    interpretContent,
    type ShowTextEvent,
    type XObjectEvent,
} from './content-interpreter.js';
import { parseContentStream, type ContentOperand, type ContentOperation } from './content-parser.js';
import { serializeOperations } from './content-writer.js';
import { FontResolver } from './fonts.js';
import {
    copyResources,
    decodeContents,
    decodeStream,
    lookupArray,
    lookupDict,
    lookupName,
    nameText,
    numberArray,
    pruneUnreachableObjects,
    resolve,
} from './objects.js';
import { InvalidRegionError } from '../errors/index.js';
import type { RgbColor } from '../types/config.types.js';
import type { RedactionRegion, RedactionStats } from '../types/document.types.js';
import {
    IDENTITY_MATRIX,
    boxFromCorners,
    intersects,
    intersectsAny,
    multiplyMatrices,
    type BoundingBox,
    type Matrix,
} from '../utils/geometry.js';

export interface PageRedactionResult {
    applied: RedactionRegion[];
    skipped: RedactionRegion[];
    stats: RedactionStats;
}

/** Stream dictionary keys that describe the old encoding, not the content */
const ENCODING_KEYS = new Set(['Filter', 'DecodeParms', 'Length', 'DL']);

/**
 * Throw for the first region with non-finite or non-positive geometry
 */
export function validateRegions(regions: readonly RedactionRegion[]): void {
    regions.forEach((region, index) => {
        const values = [region.x, region.y, region.width, region.height];
        if (!values.every(Number.isFinite)) {
            throw new InvalidRegionError(`Region ${index} has a non-finite coordinate`, index, { region });
        }
        if (region.width <= 0 || region.height <= 0) {
            throw new InvalidRegionError(`Region ${index} must have positive width and height`, index, { region });
        }
    });
}

function emptyStats(): RedactionStats {
    return { glyphsRemoved: 0, imagesRemoved: 0, formsRewritten: 0, annotationsRemoved: 0 };
}

/**
 * Rewrites content streams so nothing drawn inside the regions survives.
 * One instance per page.
 */
class ContentRedactor {
    readonly stats = emptyStats();
    private readonly fonts: FontResolver;
    private renamed = 0;

    constructor(
        private readonly context: PDFContext,
        private readonly regions: readonly BoundingBox[]
    ) {
        this.fonts = new FontResolver(context);
    }

    rewrite(
        operations: readonly ContentOperation[],
        resources: PDFDict | undefined,
        ctm: Matrix,
        depth: number
    ): ContentOperation[] {
        const textEvents = new Map<number, ShowTextEvent>();
        const xobjectEvents = new Map<number, XObjectEvent>();
        const droppedInline = new Set<number>();

        interpretContent(
            operations,
            {
                onShowText: (event) => textEvents.set(event.opIndex, event),
                onXObject: (event) => xobjectEvents.set(event.opIndex, event),
                onInlineImage: (event) => {
                    if (intersectsAny(event.bbox, this.regions)) droppedInline.add(event.opIndex);
                },
            },
            { context: this.context, resources, fonts: this.fonts, ctm, depth }
        );

        const output: ContentOperation[] = [];
        const touchedNames = new Set<string>();

        operations.forEach((operation, index) => {
            if (droppedInline.has(index)) {
                this.stats.imagesRemoved++;
                return;
            }

            const text = textEvents.get(index);
            if (text) {
                output.push(...this.rewriteShowText(text));
                return;
            }

            const xobject = xobjectEvents.get(index);
            if (xobject && intersectsAny(xobject.bbox, this.regions)) {
                touchedNames.add(xobject.name);
                const replacement = this.rewriteXObject(xobject, resources, depth);
                if (replacement) output.push(replacement);
                return;
            }

            output.push(operation);
        });

        if (resources && touchedNames.size > 0) {
            this.releaseUnusedXObjects(resources, touchedNames, output);
        }
        return output;
    }

    private rewriteShowText(event: ShowTextEvent): ContentOperation[] {
        const { operation, font, fontSize, horizontalScale } = event;
        const hit = event.pieces.some(
            (piece) => piece.type === 'glyph' && intersectsAny(piece.glyph.bbox, this.regions)
        );
        if (!hit) return [operation];

        const scale = fontSize * horizontalScale;
        const items: ContentOperand[] = [];
        let pending: number[] = [];
        let adjustment = 0;

        const flushBytes = () => {
            if (pending.length === 0) return;
            items.push({ type: 'string', bytes: Uint8Array.from(pending) });
            pending = [];
        };
        const flushAdjustment = () => {
            if (adjustment === 0) return;
            items.push({ type: 'number', value: adjustment });
            adjustment = 0;
        };

        for (const piece of event.pieces) {
            if (piece.type === 'adjust') {
                flushBytes();
                adjustment += piece.value;
                continue;
            }
            if (intersectsAny(piece.glyph.bbox, this.regions)) {
                flushBytes();
                this.stats.glyphsRemoved++;
                adjustment += scale === 0 ? 0 : (-piece.glyph.advance * 1000) / scale;
                continue;
            }
            flushAdjustment();
            pending.push(...font.encodeCode(piece.glyph.code));
        }
        flushBytes();
        flushAdjustment();

        const showArray: ContentOperation = {
            operator: 'TJ',
            operands: [{ type: 'array', items }],
        };

        switch (operation.operator) {
            case "'":
                return [{ operator: 'T*', operands: [] }, showArray];
            case '"': {
                const zero: ContentOperand = { type: 'number', value: 0 };
                const [wordSpacing = zero, charSpacing = zero] = operation.operands;
                return [
                    { operator: 'Tw', operands: [wordSpacing] },
                    { operator: 'Tc', operands: [charSpacing] },
                    { operator: 'T*', operands: [] },
                    showArray,
                ];
            }
            default:
                return [showArray];
        }
    }

    /**
     * Replacement `Do` for an XObject overlapping a region, or undefined to drop it
     */
    private rewriteXObject(
        event: XObjectEvent,
        resources: PDFDict | undefined,
        depth: number
    ): ContentOperation | undefined {
        if (event.subtype !== 'Form' || !event.stream || !resources || depth + 1 > MAX_FORM_DEPTH) {
            this.stats.imagesRemoved += event.subtype === 'Image' ? 1 : 0;
            return undefined;
        }

        const stream = event.stream;
        // The original form may still be painted outside every region
        const formResources = copyResources(
            this.context,
            lookupDict(this.context, stream.dict, 'Resources') ?? resources
        );
        const formCtm = multiplyMatrices(formMatrixOf(this.context, stream), event.ctm);
        const rewritten = this.rewrite(
            parseContentStream(decodeStream(stream)),
            formResources,
            formCtm,
            depth + 1
        );

        const replacement = this.context.flateStream(serializeOperations(rewritten));
        for (const [key, value] of stream.dict.entries()) {
            if (ENCODING_KEYS.has(nameText(key))) continue;
            replacement.dict.set(key, value);
        }
        replacement.dict.set(PDFName.of('Resources'), formResources);
        const ref = this.context.register(replacement);

        const xobjects = lookupDict(this.context, resources, 'XObject');
        if (!xobjects) return undefined;
        const name = this.freshName(xobjects, event.name);
        xobjects.set(PDFName.of(name), ref);
        this.stats.formsRewritten++;

        return { operator: 'Do', operands: [{ type: 'name', value: name }] };
    }

    private freshName(xobjects: PDFDict, base: string): string {
        let name: string;
        do {
            this.renamed++;
            name = `${base}_r${this.renamed}`;
        } while (xobjects.has(PDFName.of(name)));
        return name;
    }

    /**
     * Drop XObject entries no longer painted
     */
    private releaseUnusedXObjects(
        resources: PDFDict,
        names: ReadonlySet<string>,
        operations: readonly ContentOperation[]
    ): void {
        const xobjects = lookupDict(this.context, resources, 'XObject');
        if (!xobjects) return;

        const stillUsed = new Set<string>();
        for (const operation of operations) {
            const operand = operation.operands[0];
            if (operation.operator === 'Do' && operand?.type === 'name') stillUsed.add(operand.value);
        }

        for (const name of names) {
            if (stillUsed.has(name)) continue;
            xobjects.delete(PDFName.of(name));
        }
    }
}

function annotationBox(context: PDFContext, annotation: PDFDict): BoundingBox | undefined {
    const rect = resolve(context, annotation.get(PDFName.of('Rect')));
    if (!(rect instanceof PDFArray) || rect.size() !== 4) return undefined;
    const [x1, y1, x2, y2] = numberArray(context, rect);
    return boxFromCorners(x1, y1, x2, y2);
}

function refersTo(value: PDFObject | undefined, refs: ReadonlySet<string>): boolean {
    return value instanceof PDFRef && refs.has(value.toString());
}

function removeAnnotations(pdf: PDFDocument, pageIndex: number, regions: readonly BoundingBox[]): number {
    const context = pdf.context;
    const page = pdf.getPage(pageIndex);
    const annots = page.node.Annots();
    if (!annots) return 0;

    const hits = new Set<PDFObject>();
    for (const entry of annots.asArray()) {
        const annotation = resolve(context, entry);
        const box = annotation instanceof PDFDict ? annotationBox(context, annotation) : undefined;
        if (box && intersectsAny(box, regions)) hits.add(entry);
    }
    if (hits.size === 0) return 0;
    const removedRefs = [...hits].filter((entry): entry is PDFRef => entry instanceof PDFRef);
    const removed = new Set(removedRefs.map((ref) => ref.toString()));

    // A popup goes with the annotation it belongs to
    const kept = annots.asArray().filter((entry) => {
        if (hits.has(entry)) return false;
        const annotation = resolve(context, entry);
        if (annotation instanceof PDFDict && refersTo(annotation.get(PDFName.of('Parent')), removed)
            && lookupName(context, annotation, 'Subtype') === 'Popup') {
            return false;
        }
        if (annotation instanceof PDFDict && refersTo(annotation.get(PDFName.of('IRT')), removed)) {
            annotation.delete(PDFName.of('IRT'));
        }
        return true;
    });

    if (kept.length === 0) {
        page.node.delete(PDFName.of('Annots'));
    } else {
        page.node.set(PDFName.of('Annots'), context.obj(kept));
    }
    dropFormFields(pdf, removedRefs, removed);
    return annots.size() - kept.length;
}

/**
 * Unlink removed widgets from the form field tree. A field left without
 * kids is unlinked too.
 */
function dropFormFields(pdf: PDFDocument, removedRefs: readonly PDFRef[], removed: Set<string>): void {
    const context = pdf.context;
    const pending = [...removedRefs];
    let ref: PDFRef | undefined;

    while ((ref = pending.pop()) !== undefined) {
        const widget = context.lookup(ref);
        const parentRef = widget instanceof PDFDict ? widget.get(PDFName.of('Parent')) : undefined;
        const parent = resolve(context, parentRef);
        const kids = parent instanceof PDFDict ? lookupArray(context, parent, 'Kids') : undefined;
        if (!(parent instanceof PDFDict) || !kids) continue;

        const remaining = kids.asArray().filter((kid) => !refersTo(kid, removed));
        parent.set(PDFName.of('Kids'), context.obj(remaining));
        if (remaining.length === 0 && parentRef instanceof PDFRef && !removed.has(parentRef.toString())) {
            removed.add(parentRef.toString());
            pending.push(parentRef);
        }
    }

    const acroForm = lookupDict(context, pdf.catalog, 'AcroForm');
    const fields = acroForm ? resolve(context, acroForm.get(PDFName.of('Fields'))) : undefined;
    if (!acroForm || !(fields instanceof PDFArray)) return;
    acroForm.set(PDFName.of('Fields'), context.obj(fields.asArray().filter((field) => !refersTo(field, removed))));
}

/**
 * Remove everything drawn inside the regions from a page and paint an
 * opaque fill over each region. Mutates `pdf`.
 */
export function redactPage(
    pdf: PDFDocument,
    pageIndex: number,
    regions: readonly RedactionRegion[],
    fillColor: RgbColor
): PageRedactionResult {
    validateRegions(regions);

    const page = pdf.getPage(pageIndex);
    const context = pdf.context;
    const mediaBox = page.getMediaBox();

    const applied = regions.filter((region) => intersects(region, mediaBox));
    const skipped = regions.filter((region) => !intersects(region, mediaBox));
    if (applied.length === 0) {
        return { applied, skipped, stats: emptyStats() };
    }

    const pageResources = page.node.Resources();
    const resources = pageResources ? copyResources(context, pageResources) : undefined;
    if (resources) page.node.set(PDFName.of('Resources'), resources);

    const redactor = new ContentRedactor(context, applied);
    const operations = parseContentStream(decodeContents(context, page.node.get(PDFName.of('Contents'))));
    const rewritten = redactor.rewrite(operations, resources, IDENTITY_MATRIX, 0);

    const content = context.flateStream(
        serializeOperations([
            { operator: 'q', operands: [] },
            ...rewritten,
            { operator: 'Q', operands: [] },
        ])
    );
    page.node.set(PDFName.of('Contents'), context.register(content));

    const color = rgb(fillColor.r, fillColor.g, fillColor.b);
    for (const region of applied) {
        page.drawRectangle({
            x: region.x,
            y: region.y,
            width: region.width,
            height: region.height,
            color,
            borderWidth: 0,
        });
    }

    // Drawing normalizes the page node, which may add an empty Annots array
    redactor.stats.annotationsRemoved = removeAnnotations(pdf, pageIndex, applied);

    // Superseded content, images and appearance streams
    pruneUnreachableObjects(context);

    return { applied, skipped, stats: redactor.stats };
}
