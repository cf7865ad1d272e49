import { describe, it, expect } from 'vitest';
import {
    configSchema,
    DEFAULT_ANNOTATION_CONFIG,
    DEFAULT_CONCURRENCY_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_REDACTION_CONFIG,
} from '../src/types/config.types.js';
import { parseEnv } from '../src/config/env.js';
import { DEFAULT_VOCABULARY } from '../src/config/constants.js';
import { ConfigurationError } from '../src/errors/index.js';

describe('Configuration Types', () => {
    describe('configSchema', () => {
        it('should validate empty config', () => {
            expect(configSchema.safeParse({}).success).toBe(true);
        });

        it('should validate with all options', () => {
            const result = configSchema.safeParse({
                regions: [{ x: 0, y: 0, width: 10, height: 10 }],
                includeInfo: false,
                outputDir: './out',
                vocabulary: { age: [{ pattern: 'edad (\\d+)', flags: 'i', valueGroup: 1 }] },
                annotation: { x: 10, y: 10, fontSize: 8, rotation: 90, color: { r: 1, g: 0, b: 0 } },
                redaction: { fillColor: { r: 0, g: 0, b: 0 } },
                batchConfig: { maxConcurrency: 8 },
                logging: { level: 'debug', structured: false },
            });

            expect(result.success).toBe(true);
        });

        it('should reject non-finite region values', () => {
            const result = configSchema.safeParse({
                regions: [{ x: Number.NaN, y: 0, width: 10, height: 10 }],
            });
            expect(result.success).toBe(false);
        });

        it('should reject invalid concurrency', () => {
            expect(configSchema.safeParse({ batchConfig: { maxConcurrency: 0 } }).success).toBe(false);
        });

        it('should reject unknown regular expression flags', () => {
            const result = configSchema.safeParse({
                vocabulary: { gender: [{ pattern: 'x', flags: 'q' }] },
            });
            expect(result.success).toBe(false);
        });

        it('should reject colour channels outside [0, 1]', () => {
            const result = configSchema.safeParse({ redaction: { fillColor: { r: 255, g: 0, b: 0 } } });
            expect(result.success).toBe(false);
        });
    });

    describe('defaults', () => {
        it('should have expected default values', () => {
            expect(DEFAULT_ANNOTATION_CONFIG).toMatchObject({ x: 36, y: 24, fontSize: 10, rotation: 0 });
            expect(DEFAULT_REDACTION_CONFIG.fillColor).toEqual({ r: 0, g: 0, b: 0 });
            expect(DEFAULT_CONCURRENCY_CONFIG.maxConcurrency).toBe(4);
            expect(DEFAULT_LOG_CONFIG).toEqual({ level: 'info', structured: true });
        });

        it('should ship patterns for both field kinds', () => {
            expect(DEFAULT_VOCABULARY.gender.length).toBeGreaterThan(0);
            expect(DEFAULT_VOCABULARY.age.length).toBeGreaterThan(0);
        });
    });

    describe('parseEnv', () => {
        it('should apply defaults', () => {
            expect(parseEnv({})).toEqual({ LOG_LEVEL: 'info' });
        });

        it('should parse all variables', () => {
            expect(parseEnv({
                LOG_LEVEL: 'debug',
                LOG_PRETTY: 'true',
                PDF_CENSOR_CONCURRENCY: '3',
            })).toEqual({
                LOG_LEVEL: 'debug',
                LOG_PRETTY: true,
                PDF_CENSOR_CONCURRENCY: 3,
            });
        });

        it('should read 0 as false', () => {
            expect(parseEnv({ LOG_PRETTY: '0' }).LOG_PRETTY).toBe(false);
        });

        it('should throw ConfigurationError for invalid values', () => {
            expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
            expect(() => parseEnv({ PDF_CENSOR_CONCURRENCY: 'many' })).toThrow(/PDF_CENSOR_CONCURRENCY/);
        });
    });
});
