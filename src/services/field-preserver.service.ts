import { StandardFonts, degrees, rgb, type PDFFont } from 'pdf-lib';
import { ANNOTATION_DEFAULTS } from '../config/constants.js';
import { FieldPlacementError } from '../errors/index.js';
import type { AnnotationConfig } from '../types/config.types.js';
import type { CensoredDocument, ExtractedField } from '../types/document.types.js';
import { FieldKindEnum } from '../types/enums.js';
import {
    boxFromCorners,
    contains,
    intersectsAny,
    transformBox,
    type BoundingBox,
    type Matrix,
} from '../utils/geometry.js';
import type { Logger } from '../utils/logger.js';

interface Anchor {
    name: string;
    x: number;
    y: number;
}

/**
 * Replace characters the font has no glyph for
 */
export function encodableText(font: PDFFont, text: string): string {
    const supported = new Set(font.getCharacterSet());
    return [...text]
        .map((char) => {
            const codePoint = char.codePointAt(0);
            return codePoint !== undefined && supported.has(codePoint) ? char : ANNOTATION_DEFAULTS.REPLACEMENT_CHAR;
        })
        .join('');
}

/**
 * Box covered by a line of text drawn at an anchor
 */
export function textBox(
    font: PDFFont,
    text: string,
    anchor: { x: number; y: number },
    fontSize: number,
    rotation: number
): BoundingBox {
    const width = font.widthOfTextAtSize(text, fontSize);
    const ascent = font.heightAtSize(fontSize, { descender: false });
    const descent = font.heightAtSize(fontSize) - ascent;
    const radians = (rotation * Math.PI) / 180;
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    const placement: Matrix = [cos, sin, -sin, cos, anchor.x, anchor.y];
    return transformBox(placement, boxFromCorners(0, -descent, width, ascent));
}

/**
 * Writes preserved field values back onto a censored page
 */
export class FieldPreserver {
    constructor(
        private readonly config: AnnotationConfig,
        private readonly logger: Logger
    ) { }

    applyPreservedFields(
        censored: CensoredDocument,
        fields: readonly ExtractedField[],
        includeInfo: boolean
    ): CensoredDocument {
        if (!includeInfo || fields.length === 0) {
            return censored;
        }

        const ordered = [FieldKindEnum.GENDER, FieldKindEnum.AGE].flatMap((kind) =>
            fields.filter((field) => field.kind === kind)
        );
        const page = censored.pdf.getPage(0);
        const mediaBox = page.getMediaBox();
        const font = censored.pdf.embedStandardFont(StandardFonts.Helvetica);
        const text = encodableText(font, ordered.map((field) => field.value).join(' '));
        const { fontSize, rotation, color } = this.config;

        const anchor = this.candidateAnchors(font, text, mediaBox).find((candidate) => {
            const box = textBox(font, text, candidate, fontSize, rotation);
            return contains(mediaBox, box) && !intersectsAny(box, censored.regions);
        });

        if (!anchor) {
            throw new FieldPlacementError('No annotation location is free of redaction regions', {
                text,
                regions: censored.regions.length,
            });
        }

        page.drawText(text, {
            x: anchor.x,
            y: anchor.y,
            size: fontSize,
            font,
            color: rgb(color.r, color.g, color.b),
            rotate: degrees(rotation),
        });

        this.logger.debug('Preserved fields written', {
            filename: censored.source.filename,
            anchor: anchor.name,
            kinds: ordered.map((field) => field.kind),
        });

        return {
            ...censored,
            preservedFields: ordered.map((field) => ({
                ...field,
                wasRedacted: intersectsAny(field.bbox, censored.regions),
            })),
        };
    }

    private candidateAnchors(font: PDFFont, text: string, page: BoundingBox): Anchor[] {
        const anchors: Anchor[] = [{ name: 'configured', x: this.config.x, y: this.config.y }];
        if (!this.config.fallbackToCorners) return anchors;

        const margin = ANNOTATION_DEFAULTS.MARGIN;
        const width = font.widthOfTextAtSize(text, this.config.fontSize);
        const height = font.heightAtSize(this.config.fontSize);
        const left = page.x + margin;
        const right = page.x + page.width - margin - width;
        const bottom = page.y + margin;
        const top = page.y + page.height - margin - height;

        return anchors.concat([
            { name: 'bottom-left', x: left, y: bottom },
            { name: 'bottom-right', x: right, y: bottom },
            { name: 'top-left', x: left, y: top },
            { name: 'top-right', x: right, y: top },
        ]);
    }
}
