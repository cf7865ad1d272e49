#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { parseEnv } from '../config/env.js';
import { PdfCensorError, ValidationError } from '../errors/index.js';
import { createPdfCensor } from '../pdf-censor.factory.js';
import { parseRegionArgument, parseRegionFile, parseVocabularyFile } from '../schemas/index.js';
import type { PdfCensorConfig } from '../types/config.types.js';
import type { RedactionRegion, RunSummary } from '../types/document.types.js';
import { VerdictEnum } from '../types/enums.js';

const packageSchema = z.object({ version: z.string().optional() }).passthrough();

async function readVersion(): Promise<string> {
    const raw = await fs.readFile(new URL('../../package.json', import.meta.url), 'utf-8');
    return packageSchema.parse(JSON.parse(raw)).version ?? '0.0.0';
}

async function readJson(filePath: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new ValidationError(
            `Unable to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            'path'
        );
    }
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new ValidationError(
            `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            'path'
        );
    }
}

function collectRegion(value: string, previous: RedactionRegion[]): RedactionRegion[] {
    return [...previous, parseRegionArgument(value)];
}

function parseConcurrency(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new ValidationError(`Invalid concurrency "${value}"`, 'concurrency');
    }
    return parsed;
}

/**
 * Shared logging and concurrency settings from the environment
 */
function baseConfig(): PdfCensorConfig {
    const env = parseEnv();
    return {
        logging: { level: env.LOG_LEVEL, structured: !(env.LOG_PRETTY ?? false) },
        batchConfig: env.PDF_CENSOR_CONCURRENCY ? { maxConcurrency: env.PDF_CENSOR_CONCURRENCY } : undefined,
    };
}

function printSummary(summary: RunSummary): void {
    console.log(`\nOutput: ${summary.outputDir}`);
    console.log(`Censored: ${summary.processed.length}`);
    for (const item of summary.processed) {
        console.log(`  ${item.filename} -> ${item.outputPath}`);
    }
    console.log(`Failed: ${summary.failed.length}`);
    for (const item of summary.failed) {
        console.log(`  ${item.filename}: ${item.reason}`);
    }
    console.log(`Took ${summary.durationMs}ms\n`);
}

function fail(error: unknown): never {
    if (error instanceof PdfCensorError) {
        console.error(`Error [${error.code}]: ${error.message}`);
    } else {
        console.error('Error:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
}

interface RunCommandOptions {
    file?: string;
    folder?: string;
    output?: string;
    regions?: string;
    region: RedactionRegion[];
    vocabulary?: string;
    info: boolean;
    concurrency?: number;
}

const program = new Command();

program
    .name('pdf-censor')
    .description('Redact regions from single-page PDF documents');

program
    .command('run')
    .description('Censor a single PDF file or every PDF in a folder')
    .option('--file <path>', 'PDF file to censor')
    .option('--folder <path>', 'Folder of PDF files to censor')
    .option('-o, --output <dir>', 'Output directory')
    .option('--regions <json>', 'JSON file with the redaction regions')
    .option('--region <x,y,width,height>', 'Redaction region in page space (repeatable)', collectRegion, [])
    .option('--vocabulary <json>', 'JSON file with field patterns')
    .option('--no-info', 'Do not re-insert preserved fields')
    .option('--concurrency <n>', 'Documents processed in parallel', parseConcurrency)
    .action(async (options: RunCommandOptions) => {
        try {
            if (Boolean(options.file) === Boolean(options.folder)) {
                throw new ValidationError('Specify exactly one of --file or --folder', 'input');
            }

            const base = baseConfig();
            const fileRegions = options.regions
                ? parseRegionFile(await readJson(options.regions), options.regions)
                : [];
            const vocabulary = options.vocabulary
                ? parseVocabularyFile(await readJson(options.vocabulary), options.vocabulary)
                : undefined;

            const censor = createPdfCensor({
                ...base,
                regions: [...fileRegions, ...options.region],
                includeInfo: options.info,
                outputDir: options.output,
                vocabulary,
                batchConfig: options.concurrency ? { maxConcurrency: options.concurrency } : base.batchConfig,
            });

            const summary = options.file
                ? await censor.processFile(options.file)
                : await censor.processFolder(options.folder ?? '.');

            printSummary(summary);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('inspect <file>')
    .description('Show the verdict, fields and text lines of a PDF')
    .action(async (file: string) => {
        try {
            const censor = createPdfCensor(baseConfig());
            const source = await censor.load(file);
            const classification = censor.classify(source);

            console.log(`\nFile: ${source.filename}`);
            console.log(`Pages: ${classification.pageCount}`);
            console.log(`Verdict: ${classification.verdict} (${classification.reason})`);

            if (classification.verdict !== VerdictEnum.ELIGIBLE) {
                return;
            }

            const page = censor.extractPage(source);
            console.log(`Page size: ${page.width} x ${page.height}`);

            const fields = censor.extractFields(source);
            console.log(`Fields: ${fields.length === 0 ? 'none' : ''}`);
            for (const field of fields) {
                const { x, y, width, height } = field.bbox;
                console.log(`  ${field.kind}: ${field.value} at [${x.toFixed(1)}, ${y.toFixed(1)}, ${width.toFixed(1)}, ${height.toFixed(1)}]`);
            }

            console.log('Lines:');
            for (const line of page.lines) {
                console.log(`  ${line.bbox.y.toFixed(1).padStart(7)}  ${line.text}`);
            }
            console.log('');
        } catch (error) {
            fail(error);
        }
    });

readVersion()
    .then((version) => program.version(version).parseAsync(process.argv))
    .catch(fail);
