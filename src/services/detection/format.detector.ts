import type { DetectionResult, IFormatDetector } from '../../types/document.types.js';
import { ToolingUnavailableError, toError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { classifyFile } from './file-type.js';
import type { IDocumentConverter } from './office.converter.js';
import type { IPageCounter } from './page-counter.js';

/**
 * Classifies a file by extension and counts its pages.
 *
 * - PDF and TIFF are counted directly.
 * - PPTX, DOCX, ODT and RTF have no reliable page count of their own; they
 *   are converted to PDF first and the PDF is counted and later rendered.
 * - Unknown extensions report zero pages instead of failing.
 *
 * Converted PDFs stay on disk until `release` is called with the render path
 * still in use.
 */
export class FormatDetector implements IFormatDetector {
    constructor(
        private readonly pageCounter: IPageCounter,
        private readonly converter: IDocumentConverter,
        private readonly logger: Logger
    ) { }

    async detect(filePath: string): Promise<DetectionResult> {
        const { fileType, family } = classifyFile(filePath);

        switch (family) {
            case 'paged':
            case 'image':
                return {
                    fileType,
                    pageCount: await this.pageCounter.countPages(filePath, fileType),
                    renderPath: filePath,
                };

            case 'office':
                return this.detectOfficeDocument(filePath, fileType);

            case 'unsupported':
                this.logger.warn('Unsupported file type, no pages detected', { filePath, fileType });
                return { fileType, pageCount: 0, renderPath: filePath };
        }
    }

    async release(keepRenderPath?: string): Promise<void> {
        await this.converter.release?.(keepRenderPath);
    }

    private async detectOfficeDocument(filePath: string, fileType: string): Promise<DetectionResult> {
        try {
            const pdfPath = await this.converter.convertToPdf(filePath, fileType);
            return {
                fileType,
                pageCount: await this.pageCounter.countPages(pdfPath, 'PDF'),
                renderPath: pdfPath,
            };
        } catch (error) {
            if (error instanceof ToolingUnavailableError) {
                throw error;
            }

            this.logger.warn('Could not convert document to count pages', {
                filePath,
                fileType,
                error: toError(error).message,
            });
            return { fileType, pageCount: 0, renderPath: filePath };
        }
    }
}
