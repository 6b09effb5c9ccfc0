import type { BatchSpec } from '../../types/pipeline.types.js';

/**
 * Partition an inclusive 1-based page range into consecutive batches.
 * Every batch holds `batchSize` pages except possibly the last.
 */
export function createBatches(startPage: number, endPage: number, batchSize: number): BatchSpec[] {
    const batches: BatchSpec[] = [];

    for (let pageStart = startPage; pageStart <= endPage; pageStart += batchSize) {
        batches.push({
            batchIndex: batches.length,
            pageStart,
            pageEnd: Math.min(pageStart + batchSize - 1, endPage),
        });
    }

    return batches;
}
