import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
    BatchOrchestrator,
    SidecarRegionSource,
    TemplateRegionSource,
    censoredFileName,
    writeAtomic,
} from '../../src/engines/batch.orchestrator.js';
import { CensorEngine } from '../../src/engines/censor.engine.js';
import { PdfCensorFactory } from '../../src/pdf-censor.factory.js';
import { createEventEmitter } from '../../src/utils/events.js';
import { InvalidRegionError, NotFoundError, ValidationError } from '../../src/errors/index.js';
import type { PdfCensorConfig } from '../../src/types/config.types.js';
import type { CensorOutcome } from '../../src/types/document.types.js';
import { TOP_LEFT_QUADRANT, createMockLogger, createPdf, pageLines } from '../mocks/index.js';

function createOrchestrator(config: PdfCensorConfig = { regions: [TOP_LEFT_QUADRANT] }) {
    const resolved = PdfCensorFactory.resolveConfig(config);
    const logger = createMockLogger();
    const events = createEventEmitter();
    const engine = new CensorEngine(resolved, logger, events);
    return { orchestrator: new BatchOrchestrator(engine, resolved, logger, events), events, logger };
}

describe('BatchOrchestrator', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'pdfc-batch-'));
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    describe('helpers', () => {
        it('should name censored files after the input', () => {
            expect(censoredFileName('report.pdf')).toBe('report_censored.pdf');
            expect(censoredFileName('scan.PDF')).toBe('scan_censored.PDF');
        });

        it('should write atomically and leave no partial file', async () => {
            const target = path.join(root, 'nested', 'out.pdf');
            await writeAtomic(target, new Uint8Array([1, 2, 3]));

            expect(await fs.readFile(target)).toEqual(Buffer.from([1, 2, 3]));
            expect(await fs.readdir(path.dirname(target))).toEqual(['out.pdf']);
        });

        it('should find sidecar files beside the input', () => {
            expect(SidecarRegionSource.sidecarPath(path.join('in', 'a.pdf'))).toBe(path.join('in', 'a.regions.json'));
        });

        it('should fall back to the template without a sidecar', async () => {
            const source = new SidecarRegionSource([TOP_LEFT_QUADRANT]);
            expect(await source.regionsFor(path.join(root, 'a.pdf'))).toEqual([TOP_LEFT_QUADRANT]);
        });

        it('should read sidecar regions', async () => {
            await fs.writeFile(path.join(root, 'a.regions.json'), JSON.stringify([[0, 0, 10, 20]]));
            const source = new SidecarRegionSource([TOP_LEFT_QUADRANT]);
            expect(await source.regionsFor(path.join(root, 'a.pdf'))).toEqual([{ x: 0, y: 0, width: 10, height: 20 }]);
        });

        it('should reject invalid sidecar files', async () => {
            await fs.writeFile(path.join(root, 'a.regions.json'), JSON.stringify({ areas: [] }));
            const source = new SidecarRegionSource([]);
            await expect(source.regionsFor(path.join(root, 'a.pdf'))).rejects.toThrow(ValidationError);
        });

        it('should reject sidecar files that are not JSON', async () => {
            await fs.writeFile(path.join(root, 'a.regions.json'), '[{ x: 1');
            const source = new SidecarRegionSource([]);
            await expect(source.regionsFor(path.join(root, 'a.pdf'))).rejects.toThrow(ValidationError);
        });
    });

    describe('processFile', () => {
        it('should write the censored file beside the input', async () => {
            const input = path.join(root, 'report.pdf');
            await fs.writeFile(input, await createPdf());
            const { orchestrator } = createOrchestrator();

            const summary = await orchestrator.processFile(input);

            const expected = path.join(root, 'report_censored.pdf');
            expect(summary.processed).toEqual([{ filename: 'report.pdf', outputPath: expected }]);
            expect(summary.failed).toEqual([]);
            expect(summary.outputDir).toBe(root);
            expect(await pageLines(await fs.readFile(expected))).toEqual(['Findings: unremarkable', 'F 34']);
        });

        it('should honour an explicit output directory', async () => {
            const input = path.join(root, 'report.pdf');
            await fs.writeFile(input, await createPdf());
            const { orchestrator } = createOrchestrator();

            const summary = await orchestrator.processFile(input, { outputDir: path.join(root, 'out') });
            expect(summary.processed[0].outputPath).toBe(path.join(root, 'out', 'report_censored.pdf'));
        });

        it('should throw NotFoundError for a missing file', async () => {
            const { orchestrator } = createOrchestrator();
            await expect(orchestrator.processFile(path.join(root, 'missing.pdf'))).rejects.toThrow(NotFoundError);
        });

        it('should throw NotFoundError when given a folder', async () => {
            const { orchestrator } = createOrchestrator();
            await expect(orchestrator.processFile(root)).rejects.toThrow('File not found');
        });

        it('should validate template regions before processing', async () => {
            const input = path.join(root, 'report.pdf');
            await fs.writeFile(input, await createPdf());
            const { orchestrator } = createOrchestrator({ regions: [{ x: 0, y: 0, width: 0, height: 5 }] });

            await expect(orchestrator.processFile(input)).rejects.toThrow(InvalidRegionError);
            expect(await fs.readdir(root)).toEqual(['report.pdf']);
        });

        it('should use the region source given per run', async () => {
            const input = path.join(root, 'report.pdf');
            await fs.writeFile(input, await createPdf());
            const { orchestrator } = createOrchestrator();

            const summary = await orchestrator.processFile(input, {
                regionSource: new TemplateRegionSource([]),
                includeInfo: false,
            });
            expect(await pageLines(await fs.readFile(summary.processed[0].outputPath))).toHaveLength(4);
        });
    });

    describe('processFolder', () => {
        it('should censor eligible files and copy failures untouched', async () => {
            const input = path.join(root, 'input');
            await fs.mkdir(input);
            const multiPage = await createPdf({ pageCount: 3 });
            await fs.writeFile(path.join(input, 'a.pdf'), await createPdf());
            await fs.writeFile(path.join(input, 'b.pdf'), multiPage);
            await fs.writeFile(path.join(input, 'c.PDF'), await createPdf());
            await fs.writeFile(path.join(input, 'notes.txt'), 'placeholder');

            const { orchestrator, events } = createOrchestrator();
            const outcomes: CensorOutcome[] = [];
            events.on('batch:outcome', (outcome) => outcomes.push(outcome));

            const summary = await orchestrator.processFolder(input);
            const outputDir = path.join(root, 'Censored PDFs');

            expect(summary.outputDir).toBe(outputDir);
            expect(summary.processed.map((item) => item.filename)).toEqual(['a.pdf', 'c.PDF']);
            expect(summary.failed).toEqual([{
                filename: 'b.pdf',
                reason: 'FAILED_MULTI_PAGE',
                failedPath: path.join(outputDir, 'Failed', 'b.pdf'),
            }]);
            expect((await fs.readdir(outputDir)).sort()).toEqual(['Failed', 'a_censored.pdf', 'c_censored.PDF']);
            expect(await fs.readFile(path.join(outputDir, 'Failed', 'b.pdf'))).toEqual(Buffer.from(multiPage));
            expect(outcomes).toHaveLength(3);
        });

        it('should route unreadable files to Failed', async () => {
            const input = path.join(root, 'input');
            await fs.mkdir(input);
            await fs.writeFile(path.join(input, 'broken.pdf'), 'not a pdf');

            const { orchestrator } = createOrchestrator();
            const summary = await orchestrator.processFolder(input, { outputDir: path.join(root, 'out') });

            expect(summary.processed).toEqual([]);
            expect(summary.failed).toHaveLength(1);
            expect(summary.failed[0].filename).toBe('broken.pdf');
            expect(summary.failed[0].reason).toMatch(/Unable to parse PDF/);
            expect(await fs.readFile(path.join(root, 'out', 'Failed', 'broken.pdf'), 'utf-8')).toBe('not a pdf');
        });

        it('should apply sidecar regions per file', async () => {
            const input = path.join(root, 'input');
            await fs.mkdir(input);
            await fs.writeFile(path.join(input, 'a.pdf'), await createPdf());
            await fs.writeFile(path.join(input, 'b.pdf'), await createPdf());
            await fs.writeFile(path.join(input, 'b.regions.json'), JSON.stringify({ regions: [] }));

            const { orchestrator } = createOrchestrator({ regions: [TOP_LEFT_QUADRANT], includeInfo: false });
            const summary = await orchestrator.processFolder(input);
            const [a, b] = summary.processed;

            expect(await pageLines(await fs.readFile(a.outputPath))).toEqual(['Findings: unremarkable']);
            expect(await pageLines(await fs.readFile(b.outputPath))).toHaveLength(4);
        });

        it('should emit a completion summary', async () => {
            const input = path.join(root, 'input');
            await fs.mkdir(input);
            const { orchestrator, events } = createOrchestrator();
            const summaries: number[] = [];
            events.on('batch:complete', (summary) => summaries.push(summary.processed.length));

            const summary = await orchestrator.processFolder(input);

            expect(summary.processed).toEqual([]);
            expect(summaries).toEqual([0]);
        });

        it('should keep a separate correlation id for overlapping runs', async () => {
            const first = path.join(root, 'first');
            const second = path.join(root, 'second');
            await fs.mkdir(first);
            await fs.mkdir(second);
            await fs.writeFile(path.join(first, 'x.pdf'), await createPdf());
            await fs.writeFile(path.join(second, 'y.pdf'), await createPdf());

            const { orchestrator, logger } = createOrchestrator({ regions: [TOP_LEFT_QUADRANT], includeInfo: false });
            await Promise.all([
                orchestrator.processFolder(first, { outputDir: path.join(root, 'out-first') }),
                orchestrator.processFolder(second, { outputDir: path.join(root, 'out-second') }),
            ]);

            const idOf = (message: string, key: string, value: string): unknown =>
                logger.info.mock.calls.find(([text, meta]) => text === message && meta?.[key] === value)?.[1]
                    ?.correlationId;

            const firstRun = idOf('Run completed', 'outputDir', path.join(root, 'out-first'));
            const secondRun = idOf('Run completed', 'outputDir', path.join(root, 'out-second'));

            expect(firstRun).toMatch(/^pdfc_/);
            expect(secondRun).toMatch(/^pdfc_/);
            expect(firstRun).not.toBe(secondRun);
            expect(idOf('Document censored', 'filename', 'x.pdf')).toBe(firstRun);
            expect(idOf('Document censored', 'filename', 'y.pdf')).toBe(secondRun);
        });

        it('should throw NotFoundError for a missing folder', async () => {
            const { orchestrator } = createOrchestrator();
            await expect(orchestrator.processFolder(path.join(root, 'nope'))).rejects.toThrow('Folder not found');
        });
    });
});
