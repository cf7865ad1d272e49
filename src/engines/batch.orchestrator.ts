import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { OUTPUT_DEFAULTS } from '../config/constants.js';
import {
    NotFoundError,
    OutputWriteError,
    ValidationError,
    generateCorrelationId,
} from '../errors/index.js';
import { validateRegions } from '../pdf/page-redaction.js';
import { parseRegionFile } from '../schemas/regions.schema.js';
import type { ResolvedConfig } from '../types/config.types.js';
import type { CensorOutcome, RedactionRegion, RunSummary } from '../types/document.types.js';
import type { PdfCensorEventEmitter } from '../utils/events.js';
import { withContext, type Logger } from '../utils/logger.js';
import type { CensorEngine } from './censor.engine.js';

/**
 * Supplies the regions for one input file
 */
export interface RegionSource {
    regionsFor(filePath: string): Promise<RedactionRegion[]>;
}

/**
 * Same regions for every file
 */
export class TemplateRegionSource implements RegionSource {
    constructor(private readonly regions: readonly RedactionRegion[]) { }

    async regionsFor(): Promise<RedactionRegion[]> {
        return [...this.regions];
    }
}

/**
 * Template regions, replaced for a file by `<name>.regions.json` beside it
 */
export class SidecarRegionSource implements RegionSource {
    constructor(private readonly template: readonly RedactionRegion[]) { }

    static sidecarPath(filePath: string): string {
        const { dir, name } = path.parse(filePath);
        return path.join(dir, `${name}${OUTPUT_DEFAULTS.REGIONS_SIDECAR_SUFFIX}`);
    }

    async regionsFor(filePath: string): Promise<RedactionRegion[]> {
        const sidecar = SidecarRegionSource.sidecarPath(filePath);
        let raw: string;
        try {
            raw = await fs.readFile(sidecar, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) return [...this.template];
            throw error;
        }
        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            throw new ValidationError(`Invalid region file ${sidecar}: ${String(error)}`, 'regions', { source: sidecar });
        }
        return parseRegionFile(data, sidecar);
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Options for a file or folder run
 */
export interface RunOptions {
    outputDir?: string;
    regionSource?: RegionSource;
    includeInfo?: boolean;
}

/**
 * `<base>_censored<ext>`
 */
export function censoredFileName(filename: string): string {
    const ext = path.extname(filename);
    return `${path.basename(filename, ext)}${OUTPUT_DEFAULTS.CENSORED_SUFFIX}${ext}`;
}

/**
 * Write through a temporary file and rename, so readers never see partial output
 */
export async function writeAtomic(target: string, bytes: Uint8Array): Promise<void> {
    const partial = `${target}${OUTPUT_DEFAULTS.PARTIAL_SUFFIX}`;
    try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(partial, bytes);
        await fs.rename(partial, target);
    } catch (error) {
        await fs.rm(partial, { force: true });
        throw new OutputWriteError(
            `Unable to write ${target}: ${error instanceof Error ? error.message : String(error)}`,
            target
        );
    }
}

/**
 * Processes single files or whole folders, routing failures to `Failed`
 */
export class BatchOrchestrator {
    constructor(
        private readonly engine: CensorEngine,
        private readonly config: ResolvedConfig,
        private readonly logger: Logger,
        private readonly events?: PdfCensorEventEmitter
    ) { }

    async processFile(filePath: string, options: RunOptions = {}): Promise<RunSummary> {
        const resolved = path.resolve(filePath);
        await this.assertExists(resolved, 'File', (stat) => stat.isFile());

        const outputDir = path.resolve(options.outputDir ?? this.config.outputDir ?? path.dirname(resolved));
        return this.run([resolved], outputDir, options);
    }

    async processFolder(folderPath: string, options: RunOptions = {}): Promise<RunSummary> {
        const resolved = path.resolve(folderPath);
        await this.assertExists(resolved, 'Folder', (stat) => stat.isDirectory());

        const entries = await fs.readdir(resolved, { withFileTypes: true });
        const files = entries
            .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
            .map((entry) => entry.name)
            .sort()
            .map((name) => path.join(resolved, name));

        const outputDir = path.resolve(
            options.outputDir ??
            this.config.outputDir ??
            path.join(path.dirname(resolved), OUTPUT_DEFAULTS.FOLDER_OUTPUT_NAME)
        );

        this.logger.info('Folder scanned', { folder: resolved, fileCount: files.length });
        return this.run(files, outputDir, options);
    }

    private async run(files: readonly string[], outputDir: string, options: RunOptions): Promise<RunSummary> {
        const startTime = Date.now();
        const regionSource = options.regionSource ?? new SidecarRegionSource(this.config.regions);
        if (!options.regionSource) {
            validateRegions(this.config.regions);
        }

        // Bound per run so overlapping runs on one instance keep their own id
        const correlationId = generateCorrelationId();
        const logger = withContext(this.logger, { correlationId });
        const limit = pLimit(this.config.batchConfig.maxConcurrency);

        const outcomes = await Promise.all(
            files.map((file) =>
                limit(() => this.processOne(file, outputDir, regionSource, options, correlationId, logger))
            )
        );

        const summary: RunSummary = {
            processed: [],
            failed: [],
            outputDir,
            durationMs: Date.now() - startTime,
        };

        for (const outcome of outcomes) {
            switch (outcome.status) {
                case 'censored':
                    summary.processed.push({
                        filename: outcome.filename,
                        outputPath: outcome.outputPath ?? '',
                    });
                    break;
                case 'rejected':
                    summary.failed.push({
                        filename: outcome.filename,
                        reason: outcome.verdict,
                        failedPath: outcome.failedPath,
                    });
                    break;
                case 'error':
                    summary.failed.push({
                        filename: outcome.filename,
                        reason: outcome.error.message,
                        failedPath: outcome.failedPath,
                    });
                    break;
            }
        }

        logger.info('Run completed', {
            processed: summary.processed.length,
            failed: summary.failed.length,
            outputDir,
            durationMs: summary.durationMs,
        });
        this.events?.emit('batch:complete', summary);
        return summary;
    }

    private async processOne(
        filePath: string,
        outputDir: string,
        regionSource: RegionSource,
        options: RunOptions,
        correlationId: string,
        logger: Logger
    ): Promise<CensorOutcome> {
        const filename = path.basename(filePath);
        let outcome: CensorOutcome;

        try {
            const regions = await regionSource.regionsFor(filePath);
            outcome = await this.engine.censor(filePath, {
                regions,
                includeInfo: options.includeInfo,
                correlationId,
            });
        } catch (error) {
            outcome = {
                status: 'error',
                filename,
                stage: 'START',
                error: error instanceof Error ? error : new Error(String(error)),
            };
        }

        if (outcome.status === 'censored') {
            const outputPath = path.join(outputDir, censoredFileName(filename));
            try {
                await writeAtomic(outputPath, outcome.bytes);
                outcome = { ...outcome, outputPath };
            } catch (error) {
                outcome = {
                    status: 'error',
                    documentId: outcome.documentId,
                    filename,
                    stage: 'DONE',
                    error: error instanceof Error ? error : new Error(String(error)),
                };
            }
        }

        if (outcome.status !== 'censored') {
            outcome = { ...outcome, failedPath: await this.copyToFailed(filePath, outputDir, logger) };
        }

        this.events?.emit('batch:outcome', outcome);
        return outcome;
    }

    /**
     * Copy an input untouched into `<output>/Failed`
     */
    private async copyToFailed(filePath: string, outputDir: string, logger: Logger): Promise<string | undefined> {
        const target = path.join(outputDir, OUTPUT_DEFAULTS.FAILED_DIR_NAME, path.basename(filePath));
        try {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.copyFile(filePath, target);
            return target;
        } catch (error) {
            logger.error('Unable to copy failed document', {
                filename: path.basename(filePath),
                target,
                error: error instanceof Error ? error.message : String(error),
            });
            return undefined;
        }
    }

    private async assertExists(
        target: string,
        resourceType: string,
        check: (stat: Stats) => boolean
    ): Promise<void> {
        try {
            const stat = await fs.stat(target);
            if (check(stat)) return;
        } catch (error) {
            if (!isMissingFile(error)) throw error;
        }
        throw new NotFoundError(resourceType, target);
    }
}
