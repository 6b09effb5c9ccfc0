import { openMupdfDocument } from '../rendering/mupdf.loader.js';

/**
 * Counts pages (or image frames) of a renderable file
 */
export interface IPageCounter {
    countPages(filePath: string, fileType: string): Promise<number>;
}

/**
 * Page counter for PDFs and multi-frame TIFFs, backed by MuPDF
 */
export class MupdfPageCounter implements IPageCounter {
    async countPages(filePath: string, fileType: string): Promise<number> {
        const { document } = await openMupdfDocument(filePath, fileType);
        try {
            return document.countPages();
        } finally {
            document.destroy();
        }
    }
}
