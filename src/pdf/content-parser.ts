import { ContentStreamError } from '../errors/index.js';

/**
 * Operand of a content stream operator
 */
export type ContentOperand =
    | { type: 'number'; value: number }
    | { type: 'name'; value: string }
    | { type: 'string'; bytes: Uint8Array }
    | { type: 'boolean'; value: boolean }
    | { type: 'null' }
    | { type: 'array'; items: ContentOperand[] }
    | { type: 'dict'; entries: Array<[string, ContentOperand]> };

/**
 * A single operator with its operands, in stream order
 */
export interface ContentOperation {
    operator: string;
    operands: ContentOperand[];
    /** Image samples between ID and EI, for BI operations */
    inlineData?: Uint8Array;
}

type Token =
    | { kind: 'operand'; value: ContentOperand }
    | { kind: 'keyword'; value: string }
    | { kind: 'close'; value: ']' | '>>' };

const WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);
const DELIMITERS = new Set([0x28, 0x29, 0x3c, 0x3e, 0x5b, 0x5d, 0x7b, 0x7d, 0x2f, 0x25]);
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export function isWhitespace(byte: number | undefined): boolean {
    return byte !== undefined && WHITESPACE.has(byte);
}

export function isDelimiter(byte: number | undefined): boolean {
    return byte !== undefined && DELIMITERS.has(byte);
}

/**
 * Tokenizer and parser for decoded page / form content streams
 */
class ContentParser {
    private pos = 0;

    constructor(private readonly bytes: Uint8Array) { }

    parse(): ContentOperation[] {
        const operations: ContentOperation[] = [];
        let operands: ContentOperand[] = [];

        for (;;) {
            this.skipWhitespaceAndComments();
            if (this.pos >= this.bytes.length) {
                break;
            }

            const token = this.readToken();
            if (token.kind === 'operand') {
                operands.push(token.value);
            } else if (token.kind === 'close') {
                throw this.error(`Unexpected '${token.value}'`);
            } else if (token.value === 'BI') {
                operations.push(this.readInlineImage());
                operands = [];
            } else {
                operations.push({ operator: token.value, operands });
                operands = [];
            }
        }

        return operations;
    }

    private readToken(): Token {
        const byte = this.bytes[this.pos];

        switch (byte) {
            case 0x2f: // /
                return { kind: 'operand', value: this.readName() };
            case 0x28: // (
                return { kind: 'operand', value: this.readLiteralString() };
            case 0x3c: // <
                if (this.bytes[this.pos + 1] === 0x3c) {
                    this.pos += 2;
                    return { kind: 'operand', value: this.readDict() };
                }
                return { kind: 'operand', value: this.readHexString() };
            case 0x3e: // >
                if (this.bytes[this.pos + 1] === 0x3e) {
                    this.pos += 2;
                    return { kind: 'close', value: '>>' };
                }
                throw this.error("Unexpected '>'");
            case 0x5b: // [
                this.pos++;
                return { kind: 'operand', value: this.readArray() };
            case 0x5d: // ]
                this.pos++;
                return { kind: 'close', value: ']' };
            case 0x7b: // {
            case 0x7d: // }
            case 0x29: // )
                this.pos++;
                return { kind: 'keyword', value: String.fromCharCode(byte) };
            default:
                return this.readRegular();
        }
    }

    private readRegular(): Token {
        const start = this.pos;
        while (
            this.pos < this.bytes.length &&
            !isWhitespace(this.bytes[this.pos]) &&
            !isDelimiter(this.bytes[this.pos])
        ) {
            this.pos++;
        }
        const text = latin1(this.bytes.subarray(start, this.pos));

        if (NUMBER_PATTERN.test(text)) {
            return { kind: 'operand', value: { type: 'number', value: Number(text) } };
        }
        if (text === 'true' || text === 'false') {
            return { kind: 'operand', value: { type: 'boolean', value: text === 'true' } };
        }
        if (text === 'null') {
            return { kind: 'operand', value: { type: 'null' } };
        }
        return { kind: 'keyword', value: text };
    }

    private readName(): ContentOperand {
        this.pos++;
        const start = this.pos;
        while (
            this.pos < this.bytes.length &&
            !isWhitespace(this.bytes[this.pos]) &&
            !isDelimiter(this.bytes[this.pos])
        ) {
            this.pos++;
        }
        const raw = latin1(this.bytes.subarray(start, this.pos));
        const value = raw.replace(/#([0-9a-fA-F]{2})/g, (_, hex: string) =>
            String.fromCharCode(parseInt(hex, 16))
        );
        return { type: 'name', value };
    }

    private readLiteralString(): ContentOperand {
        this.pos++;
        const out: number[] = [];
        let depth = 1;

        while (this.pos < this.bytes.length) {
            const byte = this.bytes[this.pos++];

            if (byte === 0x5c) { // backslash
                const next = this.bytes[this.pos++];
                switch (next) {
                    case 0x6e: out.push(0x0a); break; // n
                    case 0x72: out.push(0x0d); break; // r
                    case 0x74: out.push(0x09); break; // t
                    case 0x62: out.push(0x08); break; // b
                    case 0x66: out.push(0x0c); break; // f
                    case 0x0d: // line continuation
                        if (this.bytes[this.pos] === 0x0a) this.pos++;
                        break;
                    case 0x0a:
                        break;
                    default:
                        if (next >= 0x30 && next <= 0x37) {
                            let octal = next - 0x30;
                            for (let i = 0; i < 2; i++) {
                                const digit = this.bytes[this.pos];
                                if (digit === undefined || digit < 0x30 || digit > 0x37) break;
                                octal = octal * 8 + (digit - 0x30);
                                this.pos++;
                            }
                            out.push(octal & 0xff);
                        } else {
                            out.push(next);
                        }
                }
                continue;
            }

            if (byte === 0x28) {
                depth++;
            } else if (byte === 0x29) {
                depth--;
                if (depth === 0) {
                    return { type: 'string', bytes: Uint8Array.from(out) };
                }
            } else if (byte === 0x0d) {
                // Bare end-of-line markers read as a single LF
                if (this.bytes[this.pos] === 0x0a) this.pos++;
                out.push(0x0a);
                continue;
            }
            out.push(byte);
        }

        throw this.error('Unterminated literal string');
    }

    private readHexString(): ContentOperand {
        this.pos++;
        let digits = '';
        while (this.pos < this.bytes.length && this.bytes[this.pos] !== 0x3e) {
            const byte = this.bytes[this.pos++];
            if (!isWhitespace(byte)) {
                digits += String.fromCharCode(byte);
            }
        }
        if (this.pos >= this.bytes.length) {
            throw this.error('Unterminated hex string');
        }
        this.pos++;

        if (!/^[0-9a-fA-F]*$/.test(digits)) {
            throw this.error('Invalid hex string');
        }
        if (digits.length % 2 === 1) {
            digits += '0';
        }
        const bytes = new Uint8Array(digits.length / 2);
        for (let i = 0; i < bytes.length; i++) {
            bytes[i] = parseInt(digits.substring(i * 2, i * 2 + 2), 16);
        }
        return { type: 'string', bytes };
    }

    private readArray(): ContentOperand {
        const items: ContentOperand[] = [];
        for (;;) {
            this.skipWhitespaceAndComments();
            if (this.pos >= this.bytes.length) {
                throw this.error('Unterminated array');
            }
            const token = this.readToken();
            if (token.kind === 'close' && token.value === ']') {
                return { type: 'array', items };
            }
            if (token.kind !== 'operand') {
                throw this.error(`Unexpected '${token.value}' inside array`);
            }
            items.push(token.value);
        }
    }

    private readDict(): ContentOperand {
        const entries: Array<[string, ContentOperand]> = [];
        for (;;) {
            this.skipWhitespaceAndComments();
            if (this.pos >= this.bytes.length) {
                throw this.error('Unterminated dictionary');
            }
            const key = this.readToken();
            if (key.kind === 'close' && key.value === '>>') {
                return { type: 'dict', entries };
            }
            if (key.kind !== 'operand' || key.value.type !== 'name') {
                throw this.error('Dictionary key must be a name');
            }
            this.skipWhitespaceAndComments();
            const value = this.readToken();
            if (value.kind !== 'operand') {
                throw this.error(`Missing value for dictionary key /${key.value.value}`);
            }
            entries.push([key.value.value, value.value]);
        }
    }

    /**
     * BI <key value>* ID <data> EI
     */
    private readInlineImage(): ContentOperation {
        const entries: Array<[string, ContentOperand]> = [];

        for (;;) {
            this.skipWhitespaceAndComments();
            if (this.pos >= this.bytes.length) {
                throw this.error('Unterminated inline image');
            }
            const key = this.readToken();
            if (key.kind === 'keyword' && key.value === 'ID') {
                break;
            }
            if (key.kind !== 'operand' || key.value.type !== 'name') {
                throw this.error('Inline image key must be a name');
            }
            this.skipWhitespaceAndComments();
            const value = this.readToken();
            if (value.kind !== 'operand') {
                throw this.error('Inline image value missing');
            }
            entries.push([key.value.value, value.value]);
        }

        // Single whitespace byte separates ID from the samples
        if (isWhitespace(this.bytes[this.pos])) {
            this.pos++;
        }
        const start = this.pos;
        const end = this.findInlineImageEnd(start);
        let dataEnd = end;
        if (dataEnd > start && isWhitespace(this.bytes[dataEnd - 1])) {
            dataEnd--;
        }
        this.pos = end + 2;

        return {
            operator: 'BI',
            operands: [{ type: 'dict', entries }],
            inlineData: this.bytes.slice(start, dataEnd),
        };
    }

    private findInlineImageEnd(from: number): number {
        for (let i = from; i < this.bytes.length - 1; i++) {
            if (
                this.bytes[i] === 0x45 && // E
                this.bytes[i + 1] === 0x49 && // I
                (i === from || isWhitespace(this.bytes[i - 1])) &&
                (i + 2 >= this.bytes.length ||
                    isWhitespace(this.bytes[i + 2]) ||
                    isDelimiter(this.bytes[i + 2]))
            ) {
                return i;
            }
        }
        throw this.error('Inline image without EI');
    }

    private skipWhitespaceAndComments(): void {
        while (this.pos < this.bytes.length) {
            const byte = this.bytes[this.pos];
            if (isWhitespace(byte)) {
                this.pos++;
            } else if (byte === 0x25) { // %
                while (
                    this.pos < this.bytes.length &&
                    this.bytes[this.pos] !== 0x0a &&
                    this.bytes[this.pos] !== 0x0d
                ) {
                    this.pos++;
                }
            } else {
                return;
            }
        }
    }

    private error(message: string): ContentStreamError {
        return new ContentStreamError(message, { offset: this.pos });
    }
}

function latin1(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/**
 * Parse decoded content stream bytes into operations.
 * Operands left without an operator at the end of the stream are dropped.
 */
export function parseContentStream(bytes: Uint8Array): ContentOperation[] {
    return new ContentParser(bytes).parse();
}
