/**
 * Centralized Environment Configuration
 *
 * Validates environment variables with Zod.
 * Import this module instead of accessing process.env directly.
 *
 * @example
 * ```typescript
 * import { parseEnv } from './config/env.js';
 * const env = parseEnv();
 * console.log(env.LOG_LEVEL); // Type-safe access
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * Human-readable log output through pino-pretty
     * @default false
     */
    LOG_PRETTY: booleanFlag
        .optional()
        .describe('Pretty-print logs instead of JSON lines'),

    /**
     * Documents processed at once in folder mode (optional)
     */
    PDF_CENSOR_CONCURRENCY: z.coerce
        .number()
        .int()
        .min(1)
        .max(64)
        .optional()
        .describe('Maximum documents processed in parallel'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}
