/**
 * Test Fixtures
 *
 * Factory functions for test data.
 */

import { vi, type Mock } from 'vitest';
import type { ResolvedConfig } from '../../src/types/config.types.js';
import type { DetectionResult, IFormatDetector } from '../../src/types/document.types.js';
import type { RasterImage } from '../../src/types/renderer.types.js';
import {
    DEFAULT_BATCH_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_RENDER_CONFIG,
} from '../../src/types/config.types.js';
import { Document } from '../../src/document/document.model.js';
import { OUTPUT_MARKERS } from '../../src/config/constants.js';

// ============================================
// PAGES
// ============================================

/**
 * Raster image whose bytes spell `page-<n>`, so fakes downstream can tell
 * which page they were handed
 */
export function createRasterImage(pageNumber: number): RasterImage {
    return {
        pageNumber,
        data: new Uint8Array(Buffer.from(`page-${pageNumber}`, 'utf-8')),
        mimeType: 'image/png',
        width: 850,
        height: 1100,
    };
}

export function pageNumberOf(bytes: Buffer): number {
    return Number(bytes.toString('utf-8').replace('page-', ''));
}

/**
 * Text the default mock backend returns for a page
 */
export function pageText(pageNumber: number): string {
    return `Text of page ${pageNumber}`;
}

/**
 * Committed text of a batch in which every page succeeded
 */
export function expectedBatchText(pageStart: number, pageEnd: number): string {
    const blocks: string[] = [];
    for (let page = pageStart; page <= pageEnd; page++) {
        blocks.push(OUTPUT_MARKERS.pageBlock(page, pageText(page)));
    }
    return blocks.join('\n');
}

// ============================================
// DOCUMENTS
// ============================================

/**
 * Document with `pageCount` pages and no objects
 */
export function createTestDocument(pageCount: number): Document {
    const document = new Document();
    for (let i = 0; i < pageCount; i++) {
        document.addPage();
    }
    return document;
}

/**
 * Detector reporting a fixed result for every file
 */
export function createMockDetector(
    result: Partial<DetectionResult> = {}
): {
    detect: Mock<IFormatDetector['detect']>;
    release: Mock<NonNullable<IFormatDetector['release']>>;
} {
    const detect = vi.fn<IFormatDetector['detect']>(async filePath => ({
        fileType: 'PDF',
        pageCount: 10,
        renderPath: filePath,
        ...result,
    }));
    const release = vi.fn<NonNullable<IFormatDetector['release']>>(async () => undefined);
    return { detect, release };
}

// ============================================
// CONFIG
// ============================================

export function createMockResolvedConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        recognition: {
            provider: 'openai',
            baseUrl: 'http://localhost:1234/v1',
            apiKey: 'test-secret',
            model: 'test-vision-model',
            prompt: 'Transcribe this page.',
        },
        batchConfig: { ...DEFAULT_BATCH_CONFIG, retryDelayMs: 100 },
        renderConfig: { ...DEFAULT_RENDER_CONFIG },
        logging: { ...DEFAULT_LOG_CONFIG },
        ...overrides,
    };
}
