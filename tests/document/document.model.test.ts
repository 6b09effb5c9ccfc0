import { describe, it, expect } from 'vitest';
import { Document } from '../../src/document/document.model.js';
import { ToolingUnavailableError } from '../../src/errors/index.js';
import { createMockDetector, createTestDocument } from '../mocks/index.js';

describe('Document', () => {
    describe('objects', () => {
        it('should assign monotonic indices starting at 0', () => {
            const document = new Document();

            const first = document.addObject(0, { kind: 'TEXT', text: 'a' });
            const second = document.addObject(1, { kind: 'TEXT', text: 'b' });

            expect(first.index).toBe(0);
            expect(second.index).toBe(1);
            expect(document.nextIndex).toBe(2);
        });

        it('should never reuse an index after deletion', () => {
            const document = new Document();
            document.addObject(0, { kind: 'TEXT', text: 'a' });
            const removed = document.addObject(0, { kind: 'TEXT', text: 'b' });

            expect(document.deleteObject(removed.index)).toBe(1);
            const next = document.addObject(0, { kind: 'TEXT', text: 'c' });

            expect(next.index).toBe(2);
            expect(document.getObject(1)).toBeUndefined();
        });

        it('should return 0 when deleting an unknown index', () => {
            const document = new Document();
            document.addObject(null, { kind: 'TEXT', text: 'a' });

            expect(document.deleteObject(42)).toBe(0);
            expect(document.objectCount).toBe(1);
        });

        it('should freeze created objects', () => {
            const document = new Document();
            const created = document.addObject(3, { kind: 'TEXT', text: 'frozen' });

            expect(Object.isFrozen(created)).toBe(true);
            expect(Object.isFrozen(created.content)).toBe(true);
        });

        it('should leave the caller\'s content object unfrozen', () => {
            const document = new Document();
            const content = { kind: 'TEXT' as const, text: 'mine' };

            const created = document.addObject(0, content);
            content.text = 'edited later';

            expect(Object.isFrozen(content)).toBe(false);
            expect(created.content).not.toBe(content);
            expect(created.content).toEqual({ kind: 'TEXT', text: 'mine' });
        });

        it('should copy coordinates when given', () => {
            const document = new Document();
            const coordinates = [10, 20, 110, 220] as const;

            const withBox = document.addObject(0, { kind: 'TABLE', rows: [['a', 'b']] }, coordinates);
            const withoutBox = document.addObject(0, { kind: 'TEXT', text: 'plain' });

            expect(withBox.coordinates).toEqual([10, 20, 110, 220]);
            expect(withBox.coordinates).not.toBe(coordinates);
            expect('coordinates' in withoutBox).toBe(false);
        });

        it('should accept pages beyond the page count', () => {
            const document = new Document();

            const created = document.addObject(99, { kind: 'TEXT', text: 'early' });

            expect(document.getObject(created.index)?.page).toBe(99);
        });

        it('should list objects in insertion order', () => {
            const document = new Document();
            document.addObject(1, { kind: 'TEXT', text: 'first' });
            document.addObject(0, { kind: 'TEXT', text: 'second' });

            expect(document.getObjects().map(obj => obj.index)).toEqual([0, 1]);
        });
    });

    describe('deletePageObjects', () => {
        it('should remove only the given page', () => {
            const document = createTestDocument(3);
            document.addObject(0, { kind: 'TEXT', text: 'p0' });
            document.addObject(1, { kind: 'TEXT', text: 'p1' });
            document.addObject(1, { kind: 'TEXT', text: 'p1 again' });
            document.addObject(null, { kind: 'TEXT', text: 'loose' });

            expect(document.deletePageObjects(1)).toBe(2);
            expect(document.getObjects().map(obj => obj.page)).toEqual([0, null]);
            expect(document.getPageObjects(1)).toEqual([]);
        });

        it('should leave a document without pages untouched', () => {
            const document = new Document();
            document.addObject(0, { kind: 'TEXT', text: 'kept' });

            expect(document.hasPages()).toBe(false);
            expect(document.deletePageObjects(0)).toBe(0);
            expect(document.objectCount).toBe(1);
        });
    });

    describe('detectType', () => {
        it('should take file type and page count from the detector', async () => {
            const document = new Document();
            const detector = createMockDetector({ fileType: 'DOCX', pageCount: 4, renderPath: '/tmp/report.pdf' });

            const renderPath = await document.detectType('/docs/report.docx', detector);

            expect(renderPath).toBe('/tmp/report.pdf');
            expect(document.fileType).toBe('DOCX');
            expect(document.pageCount).toBe(4);
            expect(document.hasPages()).toBe(true);
        });

        it('should keep unsupported files at zero pages', async () => {
            const document = new Document();
            const detector = createMockDetector({ fileType: 'XYZ', pageCount: 0 });

            await document.detectType('/docs/data.xyz', detector);

            expect(document.fileType).toBe('XYZ');
            expect(document.pageCount).toBe(0);
        });

        it('should propagate tooling errors', async () => {
            const document = new Document();
            const detector = createMockDetector();
            detector.detect.mockRejectedValue(
                new ToolingUnavailableError('mupdf', 'PDF', 'Install the "mupdf" package to handle PDF files.')
            );

            await expect(document.detectType('/docs/scan.pdf', detector))
                .rejects.toBeInstanceOf(ToolingUnavailableError);
            expect(document.fileType).toBeNull();
        });
    });
});
