import * as path from 'path';
import { FileTypeEnum } from '../../types/enums.js';

/**
 * How pages of a format are counted and rendered
 */
export type FormatFamily = 'paged' | 'image' | 'office' | 'unsupported';

const FORMATS: Record<string, { fileType: string; family: FormatFamily }> = {
    '.pdf': { fileType: FileTypeEnum.PDF, family: 'paged' },
    '.tif': { fileType: FileTypeEnum.TIFF, family: 'image' },
    '.tiff': { fileType: FileTypeEnum.TIFF, family: 'image' },
    '.pptx': { fileType: FileTypeEnum.PPTX, family: 'office' },
    '.docx': { fileType: FileTypeEnum.DOCX, family: 'office' },
    '.odt': { fileType: FileTypeEnum.ODT, family: 'office' },
    '.rtf': { fileType: FileTypeEnum.RTF, family: 'office' },
};

/**
 * Classify a file by its extension (case-insensitive).
 * Unrecognized extensions keep their upper-cased name; no extension is UNKNOWN.
 */
export function classifyFile(filePath: string): { fileType: string; family: FormatFamily } {
    const ext = path.extname(filePath).toLowerCase();
    const known = FORMATS[ext];
    if (known) {
        return known;
    }

    return {
        fileType: ext.replace(/^\./, '').toUpperCase() || FileTypeEnum.UNKNOWN,
        family: 'unsupported',
    };
}
