import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MupdfPageRenderer } from '../../src/services/rendering/mupdf.renderer.js';
import { MupdfPageCounter } from '../../src/services/detection/page-counter.js';
import { RenderError } from '../../src/errors/index.js';
import { createMockLogger } from '../mocks/index.js';

// Mock MuPDF
const mockOpenDocument = vi.fn();
const mockScale = vi.fn((sx: number, sy: number) => [sx, 0, 0, sy, 0, 0]);
vi.mock('mupdf', () => {
    return {
        Matrix: { scale: (sx: number, sy: number) => mockScale(sx, sy) },
        ColorSpace: { DeviceRGB: 'DeviceRGB' },
        Document: { openDocument: (...args: unknown[]) => mockOpenDocument(...args) },
    };
});

function createFakeDocument(pageCount: number, renderDelayMs = 0, pixmapError?: string) {
    const pixmapDestroy = vi.fn();
    const pageDestroy = vi.fn();
    const loadPage = vi.fn((index: number) => ({
        toPixmap: vi.fn(() => {
            const until = Date.now() + renderDelayMs;
            while (Date.now() < until) {
                // simulate a slow rasterization
            }
            if (pixmapError) {
                throw new Error(pixmapError);
            }
            return {
                asPNG: () => new Uint8Array([index + 1]),
                getWidth: () => 1700,
                getHeight: () => 2200,
                destroy: pixmapDestroy,
            };
        }),
        destroy: pageDestroy,
    }));
    return { countPages: () => pageCount, loadPage, destroy: vi.fn(), pageDestroy, pixmapDestroy };
}

describe('MuPDF rendering', () => {
    let tempDir: string;
    let pdfPath: string;
    let tiffPath: string;

    beforeAll(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pagescribe-render-test-'));
        pdfPath = path.join(tempDir, 'scan.pdf');
        tiffPath = path.join(tempDir, 'fax.tiff');
        await fs.writeFile(pdfPath, 'fake pdf bytes');
        await fs.writeFile(tiffPath, 'fake tiff bytes');
    });

    afterAll(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    beforeEach(() => {
        mockOpenDocument.mockReset();
    });

    describe('MupdfPageRenderer', () => {
        it('should render only the requested pages', async () => {
            const document = createFakeDocument(5);
            mockOpenDocument.mockReturnValue(document);
            const renderer = new MupdfPageRenderer({ dpi: 200 }, createMockLogger());

            const images = await renderer.render(pdfPath, 2, 3, 30000);

            expect(images).toEqual([
                { pageNumber: 2, data: new Uint8Array([2]), mimeType: 'image/png', width: 1700, height: 2200 },
                { pageNumber: 3, data: new Uint8Array([3]), mimeType: 'image/png', width: 1700, height: 2200 },
            ]);
            expect(document.loadPage.mock.calls).toEqual([[1], [2]]);
        });

        it('should scale by the configured DPI', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(1));
            const renderer = new MupdfPageRenderer({ dpi: 144 }, createMockLogger());

            await renderer.render(pdfPath, 1, 1, 30000);

            expect(mockScale).toHaveBeenCalledWith(2, 2);
        });

        it('should open the PDF parser by content type', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(1));
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            await renderer.render(pdfPath, 1, 1, 30000);

            const [buffer, magic] = mockOpenDocument.mock.calls[0] ?? [];
            expect(Buffer.isBuffer(buffer)).toBe(true);
            expect(magic).toBe('application/pdf');
        });

        it('should reuse the open document across batches', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(4));
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            await renderer.render(pdfPath, 1, 2, 30000);
            await renderer.render(pdfPath, 3, 4, 30000);

            expect(mockOpenDocument).toHaveBeenCalledTimes(1);
        });

        it('should free each page and pixmap once the PNG is encoded', async () => {
            const document = createFakeDocument(5);
            mockOpenDocument.mockReturnValue(document);
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            await renderer.render(pdfPath, 2, 4, 30000);

            expect(document.pixmapDestroy).toHaveBeenCalledTimes(3);
            expect(document.pageDestroy).toHaveBeenCalledTimes(3);
            expect(document.destroy).not.toHaveBeenCalled();
        });

        it('should free the page when rasterization throws', async () => {
            const document = createFakeDocument(2, 0, 'corrupt stream');
            mockOpenDocument.mockReturnValue(document);
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            await expect(renderer.render(pdfPath, 1, 2, 30000)).rejects.toThrow('corrupt stream');
            expect(document.pageDestroy).toHaveBeenCalledTimes(1);
            expect(document.pixmapDestroy).not.toHaveBeenCalled();
        });

        it('should free the cached document when another file is opened', async () => {
            const first = createFakeDocument(2);
            const second = createFakeDocument(2);
            mockOpenDocument.mockReturnValueOnce(first).mockReturnValueOnce(second);
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            await renderer.render(pdfPath, 1, 1, 30000);
            expect(first.destroy).not.toHaveBeenCalled();

            await renderer.render(tiffPath, 1, 1, 30000);
            expect(first.destroy).toHaveBeenCalledTimes(1);
            expect(second.destroy).not.toHaveBeenCalled();

            renderer.close();
            expect(second.destroy).toHaveBeenCalledTimes(1);
        });

        it('should reject pages outside the document', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(5));
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            const rendering = renderer.render(pdfPath, 4, 6, 30000);

            await expect(rendering).rejects.toBeInstanceOf(RenderError);
            await expect(rendering).rejects.toThrow('Pages 4-6 are outside the document (1-5)');
        });

        it('should wrap MuPDF failures in RenderError', async () => {
            const document = createFakeDocument(3);
            document.loadPage.mockImplementation(() => {
                throw new Error('broken page');
            });
            mockOpenDocument.mockReturnValue(document);
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            const rendering = renderer.render(pdfPath, 2, 3, 30000);

            await expect(rendering).rejects.toThrow('broken page');
            await expect(rendering).rejects.toMatchObject({ pageStart: 2, pageEnd: 3, code: 'RENDER_ERROR' });
        });

        it('should give up when rendering exceeds the timeout', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(3, 5));
            const renderer = new MupdfPageRenderer({ dpi: 72 }, createMockLogger());

            await expect(renderer.render(pdfPath, 1, 3, 1))
                .rejects.toThrow('Rendering pages 1-3 timed out after 1ms');
        });
    });

    describe('MupdfPageCounter', () => {
        it('should count PDF pages', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(7));

            await expect(new MupdfPageCounter().countPages(pdfPath, 'PDF')).resolves.toBe(7);
        });

        it('should free the document after counting', async () => {
            const document = createFakeDocument(7);
            mockOpenDocument.mockReturnValue(document);

            await new MupdfPageCounter().countPages(pdfPath, 'PDF');

            expect(document.destroy).toHaveBeenCalledTimes(1);
        });

        it('should open TIFF files as images', async () => {
            mockOpenDocument.mockReturnValue(createFakeDocument(3));

            await expect(new MupdfPageCounter().countPages(tiffPath, 'TIFF')).resolves.toBe(3);
            expect(mockOpenDocument.mock.calls[0]?.[1]).toBe('image/tiff');
        });
    });
});
