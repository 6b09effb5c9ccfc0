import { setImmediate as yieldToLoop } from 'timers/promises';
import type { RenderConfig } from '../../types/config.types.js';
import type { IPageRenderer, RasterImage } from '../../types/renderer.types.js';
import { PageScribeError, RenderError, toError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { classifyFile } from '../detection/file-type.js';
import { openMupdfDocument, type MupdfDocument, type MupdfModule } from './mupdf.loader.js';

/**
 * Page renderer backed by MuPDF.
 *
 * Keeps the most recently opened document so consecutive batches of one run
 * do not re-parse the file; opening another file frees it. Pages and pixmaps
 * live in WebAssembly memory and are destroyed as soon as the PNG is encoded.
 * MuPDF renders synchronously, so the renderer yields to the event loop
 * between pages.
 */
export class MupdfPageRenderer implements IPageRenderer {
    private readonly config: RenderConfig;
    private readonly logger: Logger;
    private openDocument?: { path: string; mupdf: MupdfModule; document: MupdfDocument };

    constructor(config: RenderConfig, logger: Logger) {
        this.config = config;
        this.logger = logger;
    }

    async render(
        sourcePath: string,
        pageStart: number,
        pageEnd: number,
        timeoutMs: number
    ): Promise<RasterImage[]> {
        const startTime = Date.now();

        try {
            const { mupdf, document } = await this.open(sourcePath);
            const pageCount = document.countPages();

            if (pageStart < 1 || pageEnd > pageCount || pageStart > pageEnd) {
                throw new RenderError(
                    `Pages ${pageStart}-${pageEnd} are outside the document (1-${pageCount})`,
                    pageStart,
                    pageEnd
                );
            }

            const scale = this.config.dpi / 72;
            const matrix = mupdf.Matrix.scale(scale, scale);
            const images: RasterImage[] = [];

            for (let pageNumber = pageStart; pageNumber <= pageEnd; pageNumber++) {
                const page = document.loadPage(pageNumber - 1);
                try {
                    const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false, true);
                    try {
                        images.push({
                            pageNumber,
                            data: pixmap.asPNG(),
                            mimeType: 'image/png',
                            width: pixmap.getWidth(),
                            height: pixmap.getHeight(),
                        });
                    } finally {
                        pixmap.destroy();
                    }
                } finally {
                    page.destroy();
                }

                if (Date.now() - startTime > timeoutMs) {
                    throw new RenderError(
                        `Rendering pages ${pageStart}-${pageEnd} timed out after ${timeoutMs}ms`,
                        pageStart,
                        pageEnd
                    );
                }

                await yieldToLoop();
            }

            this.logger.debug('Rendered pages', {
                pageStart,
                pageEnd,
                dpi: this.config.dpi,
                renderMs: Date.now() - startTime,
            });

            return images;
        } catch (error) {
            if (error instanceof PageScribeError) {
                throw error;
            }
            const cause = toError(error);
            throw new RenderError(cause.message, pageStart, pageEnd, cause);
        }
    }

    private async open(sourcePath: string): Promise<{ mupdf: MupdfModule; document: MupdfDocument }> {
        if (this.openDocument?.path === sourcePath) {
            return this.openDocument;
        }

        const { fileType } = classifyFile(sourcePath);
        const opened = await openMupdfDocument(sourcePath, fileType);
        this.close();
        this.openDocument = { path: sourcePath, ...opened };
        return opened;
    }

    /**
     * Free the cached MuPDF document
     */
    close(): void {
        this.openDocument?.document.destroy();
        this.openDocument = undefined;
    }
}
