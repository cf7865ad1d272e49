import { describe, it, expect, beforeEach } from 'vitest';
import { PDFName } from 'pdf-lib';
import { MetadataScrubber, readInfoDictionary } from '../../src/services/metadata-scrubber.service.js';
import {
    addIdentifyingMetadata,
    addOrphanedObjects,
    createMockLogger,
    createPdf,
    decodedObjects,
    decodedStreams,
    openPdf,
    type MockLogger,
} from '../mocks/index.js';

describe('MetadataScrubber', () => {
    let logger: MockLogger;
    let scrubber: MetadataScrubber;

    beforeEach(() => {
        logger = createMockLogger();
        scrubber = new MetadataScrubber(logger);
    });

    it('should read the info dictionary as text', async () => {
        const pdf = await openPdf(await createPdf({ decorate: addIdentifyingMetadata }));
        expect(readInfoDictionary(pdf)).toMatchObject({
            Title: 'Test Report',
            Author: 'Test Author',
            PatientId: 'test-patient',
            Trapped: 'False',
        });
    });

    it('should keep only Trapped in the info dictionary', async () => {
        const pdf = await openPdf(await createPdf({ decorate: addIdentifyingMetadata }));
        const result = scrubber.scrubMetadata(pdf);

        expect(result.info).toEqual({ Trapped: 'False' });
        expect(result.removedKeys).toEqual(expect.arrayContaining([
            'Title',
            'Author',
            'Subject',
            'Keywords',
            'Producer',
            'Creator',
            'CreationDate',
            'ModDate',
            'PatientId',
        ]));
        expect(result.removedKeys).not.toContain('Trapped');
        expect(readInfoDictionary(pdf)).toEqual({ Trapped: 'False' });
    });

    it('should remove XMP, page piece info and the file identifier', async () => {
        const pdf = await openPdf(await createPdf({ decorate: addIdentifyingMetadata }));
        const result = scrubber.scrubMetadata(pdf);
        const saved = await pdf.save({ useObjectStreams: false });
        const reloaded = await openPdf(saved);

        expect(result.removedXmp).toBe(true);
        expect(reloaded.catalog.get(PDFName.of('Metadata'))).toBeUndefined();
        expect(reloaded.getPage(0).node.get(PDFName.of('PieceInfo'))).toBeUndefined();
        expect(reloaded.context.trailerInfo.ID).toBeUndefined();
        expect((await decodedStreams(saved)).some((stream) => stream.includes('xmpmeta'))).toBe(false);
        expect(Buffer.from(saved).toString('latin1')).not.toContain('test-patient');
    });

    it('should delete superseded and unreferenced objects', async () => {
        const pdf = await openPdf(await createPdf({ decorate: (builder) => {
            addIdentifyingMetadata(builder);
            addOrphanedObjects(builder);
        } }));
        scrubber.scrubMetadata(pdf);
        const objects = await decodedObjects(await pdf.save({ useObjectStreams: false }));

        for (const secret of ['Test Report', 'Previous Author', 'Jane Roe', 'Old Patient Name']) {
            expect(objects.filter((text) => text.includes(secret))).toEqual([]);
        }
        // Old Info, XMP stream and the two orphans
        expect(logger.debug).toHaveBeenCalledWith('Metadata scrubbed', expect.objectContaining({ prunedObjects: 4 }));
    });

    it('should handle documents without metadata', async () => {
        const pdf = await openPdf(await createPdf());
        pdf.context.trailerInfo.Info = undefined;

        const result = scrubber.scrubMetadata(pdf);
        expect(result).toEqual({ info: {}, removedKeys: [], removedXmp: false, removedId: false });
    });
});
