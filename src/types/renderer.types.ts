/**
 * One rasterized page
 */
export interface RasterImage {
    /** 1-based page number in the source document */
    pageNumber: number;
    /** Encoded image bytes */
    data: Uint8Array;
    mimeType: 'image/png';
    width: number;
    height: number;
}

/**
 * Page renderer Interface
 *
 * Renders an arbitrary contiguous sub-range of a document to raster images
 * without rendering the rest of the document.
 *
 * @example
 * ```typescript
 * const images = await renderer.render('/docs/report.pdf', 11, 20, 30000);
 * // images[0].pageNumber === 11
 * ```
 */
export interface IPageRenderer {
    /**
     * @param sourcePath - File to render (PDF, TIFF, or an intermediate PDF)
     * @param pageStart - First page, 1-based
     * @param pageEnd - Last page, 1-based, inclusive
     * @param timeoutMs - Upper bound for the whole call
     * @returns Images in ascending page order
     */
    render(sourcePath: string, pageStart: number, pageEnd: number, timeoutMs: number): Promise<RasterImage[]>;
}
