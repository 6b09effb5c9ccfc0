import * as fs from 'fs/promises';
import { ToolingUnavailableError, toError } from '../../errors/index.js';

export type MupdfModule = typeof import('mupdf');
export type MupdfDocument = ReturnType<MupdfModule['Document']['openDocument']>;

const MAGIC_BY_TYPE: Record<string, string> = {
    PDF: 'application/pdf',
    TIFF: 'image/tiff',
};

/**
 * Load the MuPDF WASM module on first use.
 * A missing module is a tooling error for the format being handled.
 */
export async function loadMupdf(fileType: string): Promise<MupdfModule> {
    try {
        return await import('mupdf');
    } catch (error) {
        throw new ToolingUnavailableError(
            'mupdf',
            fileType,
            `Install the "mupdf" package to handle ${fileType} files.`,
            toError(error)
        );
    }
}

/**
 * Open a file with MuPDF, picking the parser from the classified type
 */
export async function openMupdfDocument(filePath: string, fileType: string): Promise<{
    mupdf: MupdfModule;
    document: MupdfDocument;
}> {
    const mupdf = await loadMupdf(fileType);
    const buffer = await fs.readFile(filePath);
    const document = mupdf.Document.openDocument(buffer, MAGIC_BY_TYPE[fileType] ?? filePath);
    return { mupdf, document };
}
