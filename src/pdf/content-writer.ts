import type { ContentOperand, ContentOperation } from './content-parser.js';

/**
 * Format a number for a content stream: integers as-is, reals with at most
 * six decimals and no exponent
 */
export function formatNumber(value: number): string {
    if (!Number.isFinite(value)) {
        return '0';
    }
    if (Number.isInteger(value)) {
        return String(value);
    }
    const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
    return fixed === '-0' ? '0' : fixed;
}

function formatName(name: string): string {
    let out = '/';
    for (const char of name) {
        const code = char.charCodeAt(0);
        const regular =
            code > 0x20 && code < 0x7f && !'()<>[]{}/%#'.includes(char);
        out += regular ? char : `#${code.toString(16).padStart(2, '0').toUpperCase()}`;
    }
    return out;
}

function formatHexString(bytes: Uint8Array): string {
    return `<${Buffer.from(bytes).toString('hex').toUpperCase()}>`;
}

export function formatOperand(operand: ContentOperand): string {
    switch (operand.type) {
        case 'number':
            return formatNumber(operand.value);
        case 'name':
            return formatName(operand.value);
        case 'string':
            return formatHexString(operand.bytes);
        case 'boolean':
            return operand.value ? 'true' : 'false';
        case 'null':
            return 'null';
        case 'array':
            return `[${operand.items.map(formatOperand).join(' ')}]`;
        case 'dict':
            return `<<${operand.entries
                .map(([key, value]) => `${formatName(key)} ${formatOperand(value)}`)
                .join(' ')}>>`;
    }
}

/**
 * Serialize operations back into content stream bytes
 */
export function serializeOperations(operations: readonly ContentOperation[]): Uint8Array {
    const chunks: Buffer[] = [];

    for (const operation of operations) {
        if (operation.operator === 'BI') {
            const dict = operation.operands[0];
            const entries = dict?.type === 'dict' ? dict.entries : [];
            const header = entries
                .map(([key, value]) => `${formatName(key)} ${formatOperand(value)}`)
                .join(' ');
            chunks.push(Buffer.from(`BI ${header} ID `, 'latin1'));
            chunks.push(Buffer.from(operation.inlineData ?? new Uint8Array()));
            chunks.push(Buffer.from('\nEI\n', 'latin1'));
            continue;
        }

        const parts = operation.operands.map(formatOperand);
        parts.push(operation.operator);
        chunks.push(Buffer.from(`${parts.join(' ')}\n`, 'latin1'));
    }

    return new Uint8Array(Buffer.concat(chunks));
}
