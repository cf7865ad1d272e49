import { ValidationError } from '../errors/index.js';
import type { FieldPattern, FieldVocabulary } from '../types/document.types.js';
import type { FieldKindEnumType } from '../types/enums.js';
import { FieldKindEnum } from '../types/enums.js';

/**
 * A value located inside a line of text
 */
export interface FieldMatch {
    kind: FieldKindEnumType;
    value: string;
    /** Character offsets of the value in the line, end exclusive */
    start: number;
    end: number;
}

/**
 * Finds a field value in a line of text
 */
export interface FieldMatcher {
    readonly kind: FieldKindEnumType;
    match(line: string): FieldMatch | null;
}

interface CompiledPattern {
    regex: RegExp;
    valueGroup: number;
}

function compile(kind: FieldKindEnumType, pattern: FieldPattern, index: number): CompiledPattern {
    // 'd' gives group offsets; 'g' and 'y' would make exec stateful
    const flags = new Set([...(pattern.flags ?? '').replace(/[gy]/g, ''), 'd']);
    try {
        return {
            regex: new RegExp(pattern.pattern, [...flags].join('')),
            valueGroup: pattern.valueGroup ?? 0,
        };
    } catch (error) {
        throw new ValidationError(
            `Invalid ${kind} pattern #${index}: ${error instanceof Error ? error.message : String(error)}`,
            `vocabulary.${kind}`,
            { pattern: pattern.pattern }
        );
    }
}

/**
 * Matcher driven by a list of regular expressions
 */
export class PatternFieldMatcher implements FieldMatcher {
    private readonly patterns: CompiledPattern[];

    constructor(
        readonly kind: FieldKindEnumType,
        patterns: readonly FieldPattern[]
    ) {
        this.patterns = patterns.map((pattern, index) => compile(kind, pattern, index));
    }

    /**
     * Earliest match in the line across all patterns; ties go to the first pattern
     */
    match(line: string): FieldMatch | null {
        let best: FieldMatch | null = null;

        for (const { regex, valueGroup } of this.patterns) {
            const result = regex.exec(line);
            const value = result?.[valueGroup];
            const span = result?.indices?.[valueGroup];
            if (!value || !span) continue;

            const [start, end] = span;
            if (!best || start < best.start) {
                best = { kind: this.kind, value, start, end };
            }
        }

        return best;
    }
}

/**
 * One matcher per field kind, in extraction order
 */
export function createFieldMatchers(vocabulary: FieldVocabulary): FieldMatcher[] {
    return [FieldKindEnum.GENDER, FieldKindEnum.AGE].map(
        (kind) => new PatternFieldMatcher(kind, vocabulary[kind])
    );
}
