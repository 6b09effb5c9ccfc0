/**
 * Mock Page Renderer
 *
 * Renders fake pages instantly (or after a delay) and fails on request.
 */

import { vi, type Mock } from 'vitest';
import type { IPageRenderer, RasterImage } from '../../src/types/renderer.types.js';
import { createRasterImage } from './fixtures.js';

export interface MockRendererOptions {
    /** Batches starting at these pages fail to render */
    failAt?: number[];
    /** Delay per call in milliseconds */
    delayMs?: number;
}

export type MockRenderer = {
    render: Mock<IPageRenderer['render']>;
};

/**
 * Create a mock renderer. Failing batches reject with
 * `Error('cannot render <pageStart>')`.
 *
 * @example
 * ```typescript
 * const renderer = createMockRenderer({ failAt: [11] });
 * renderer.render.mock.calls; // [[source, 1, 10, timeout], ...]
 * ```
 */
export function createMockRenderer(options: MockRendererOptions = {}): MockRenderer {
    return {
        render: vi.fn<IPageRenderer['render']>(async (_sourcePath, pageStart, pageEnd) => {
            if (options.delayMs) {
                await new Promise(resolve => setTimeout(resolve, options.delayMs));
            }
            if (options.failAt?.includes(pageStart)) {
                throw new Error(`cannot render ${pageStart}`);
            }

            const images: RasterImage[] = [];
            for (let page = pageStart; page <= pageEnd; page++) {
                images.push(createRasterImage(page));
            }
            return images;
        }),
    };
}
