import { PdfCensor } from './pdf-censor.js';
import { DEFAULT_VOCABULARY } from './config/constants.js';
import { ConfigurationError } from './errors/index.js';
import type { PdfCensorConfig, ResolvedConfig } from './types/config.types.js';
import {
    configSchema,
    DEFAULT_ANNOTATION_CONFIG,
    DEFAULT_CONCURRENCY_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_REDACTION_CONFIG,
} from './types/config.types.js';
import { createEventEmitter, createLogger } from './utils/index.js';
import { CensorEngine } from './engines/censor.engine.js';
import { BatchOrchestrator } from './engines/batch.orchestrator.js';

/**
 * Factory for creating PdfCensor instances with proper dependency injection
 *
 * All dependencies are wired here and injected into engines.
 *
 * @example
 * ```typescript
 * import { createPdfCensor } from 'pdf-censor';
 *
 * const censor = createPdfCensor({
 *   regions: [{ x: 0, y: 396, width: 306, height: 396 }],
 * });
 *
 * const summary = await censor.processFolder('./reports');
 * ```
 */
export class PdfCensorFactory {
    /**
     * Create a new PdfCensor instance with all dependencies wired
     * @param userConfig - User configuration
     */
    static create(userConfig: PdfCensorConfig = {}): PdfCensor {
        const config = PdfCensorFactory.resolveConfig(userConfig);
        const logger = createLogger(config.logging);
        const events = createEventEmitter();

        const engine = new CensorEngine(config, logger, events);
        const orchestrator = new BatchOrchestrator(engine, config, logger, events);

        return new PdfCensor(config, { engine, orchestrator, events, logger });
    }

    /**
     * Validate user config and apply defaults
     */
    static resolveConfig(userConfig: PdfCensorConfig): ResolvedConfig {
        const validation = configSchema.safeParse(userConfig);
        if (!validation.success) {
            throw new ConfigurationError('Invalid configuration', {
                errors: validation.error.issues,
            });
        }

        return {
            regions: userConfig.regions ?? [],
            includeInfo: userConfig.includeInfo ?? true,
            outputDir: userConfig.outputDir,
            vocabulary: {
                ...DEFAULT_VOCABULARY,
                ...userConfig.vocabulary,
            },
            annotation: {
                ...DEFAULT_ANNOTATION_CONFIG,
                ...userConfig.annotation,
            },
            redaction: {
                ...DEFAULT_REDACTION_CONFIG,
                ...userConfig.redaction,
            },
            batchConfig: {
                ...DEFAULT_CONCURRENCY_CONFIG,
                ...userConfig.batchConfig,
            },
            logging: {
                ...DEFAULT_LOG_CONFIG,
                ...userConfig.logging,
                level: userConfig.logging?.level || DEFAULT_LOG_CONFIG.level,
            },
        };
    }
}

/**
 * Create a new PdfCensor instance
 *
 * @example
 * ```typescript
 * const censor = createPdfCensor({ includeInfo: false });
 * const outcome = await censor.censor('./report.pdf', { regions });
 * ```
 */
export function createPdfCensor(config: PdfCensorConfig = {}): PdfCensor {
    return PdfCensorFactory.create(config);
}
