import type { BatchConfig } from '../../types/config.types.js';
import type { BatchReport, BatchSpec } from '../../types/pipeline.types.js';
import type { IPageRenderer, RasterImage } from '../../types/renderer.types.js';
import { BatchStatusEnum, ErrorKindEnum } from '../../types/enums.js';
import { PipelineError, toError } from '../../errors/index.js';
import { OUTPUT_MARKERS, STATUS_MESSAGES } from '../../config/constants.js';
import type { RecognitionAdapter } from '../../services/recognition/recognition.adapter.js';
import type { CancellationToken } from '../../utils/cancellation.js';
import type { PageScribeEventEmitter } from '../../utils/events.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Mutable state of one run, shared across its batches
 */
export interface RunState {
    readonly runId: string;
    readonly sourcePath: string;
    readonly token: CancellationToken;
    readonly totalPages: number;
    /** Pages attempted so far, failed and unrendered pages included */
    pagesAttempted: number;
}

/**
 * Text recognized for one page
 */
export interface RecognizedPage {
    pageNumber: number;
    text: string;
}

export type BatchOutcome =
    | {
        status: typeof BatchStatusEnum.COMMITTED;
        report: BatchReport;
        /** Page blocks joined with newlines */
        text: string;
        pages: RecognizedPage[];
    }
    | {
        status: typeof BatchStatusEnum.RENDER_FAILED;
        report: BatchReport;
        /** Load-error placeholder */
        text: string;
    }
    | {
        status: typeof BatchStatusEnum.DISCARDED;
        report: BatchReport;
    };

/**
 * Renders one batch and recognizes its pages in order.
 *
 * Cancellation is checked before rendering, and before, between and after
 * every backend call; once seen, the whole batch is discarded. Recognition
 * failures stay local to their page.
 */
export class BatchProcessor {
    constructor(
        private readonly renderer: IPageRenderer,
        private readonly adapter: RecognitionAdapter,
        private readonly events: PageScribeEventEmitter,
        private readonly batchConfig: BatchConfig,
        private readonly logger: Logger
    ) { }

    async process(batch: BatchSpec, run: RunState): Promise<BatchOutcome> {
        const { token } = run;
        const report: BatchReport = {
            batchIndex: batch.batchIndex,
            pageStart: batch.pageStart,
            pageEnd: batch.pageEnd,
            status: BatchStatusEnum.DISCARDED,
            hadErrors: false,
            failedPages: [],
        };

        if (token.isCancellationRequested) {
            return { status: BatchStatusEnum.DISCARDED, report };
        }

        this.emitStatus(STATUS_MESSAGES.loadingBatch(batch.pageStart, batch.pageEnd));

        let images: RasterImage[];
        try {
            images = await this.renderer.render(
                run.sourcePath,
                batch.pageStart,
                batch.pageEnd,
                this.batchConfig.renderTimeoutMs
            );
        } catch (error) {
            if (token.isCancellationRequested) {
                return { status: BatchStatusEnum.DISCARDED, report };
            }
            return this.renderFailed(batch, run, report, toError(error));
        }

        const pagesInBatch = batch.pageEnd - batch.pageStart + 1;
        if (images.length < pagesInBatch) {
            return this.renderFailed(
                batch,
                run,
                report,
                new Error(`Renderer returned ${images.length} of ${pagesInBatch} pages`)
            );
        }

        const blocks: string[] = [];
        const pages: RecognizedPage[] = [];

        for (const [offset, image] of images.entries()) {
            const pageNumber = image.pageNumber;
            if (pageNumber !== batch.pageStart + offset || pageNumber > batch.pageEnd) {
                throw new PipelineError('Renderer returned pages out of order', {
                    batchIndex: batch.batchIndex,
                    expected: batch.pageStart + offset,
                    received: pageNumber,
                });
            }

            if (token.isCancellationRequested) {
                return { status: BatchStatusEnum.DISCARDED, report };
            }

            run.pagesAttempted++;
            this.emitStatus(STATUS_MESSAGES.processingPage(pageNumber, run.pagesAttempted, run.totalPages));
            this.events.emit('page:progress', {
                runId: run.runId,
                pageNumber,
                pagesAttempted: run.pagesAttempted,
                totalPages: run.totalPages,
            });

            if (token.isCancellationRequested) {
                return { status: BatchStatusEnum.DISCARDED, report };
            }

            const outcome = await this.adapter.recognize(image, token.signal);

            if (token.isCancellationRequested) {
                return { status: BatchStatusEnum.DISCARDED, report };
            }

            let pageText: string;
            if (outcome.ok) {
                pageText = outcome.text;
                pages.push({ pageNumber, text: outcome.text });
            } else {
                pageText = OUTPUT_MARKERS.pageError(pageNumber, outcome.error.message);
                report.hadErrors = true;
                report.failedPages.push(pageNumber);
                this.events.emit('run:error', {
                    kind: ErrorKindEnum.RECOGNITION,
                    message: pageText,
                });
            }

            blocks.push(OUTPUT_MARKERS.pageBlock(pageNumber, pageText));
        }

        report.status = BatchStatusEnum.COMMITTED;
        return {
            status: BatchStatusEnum.COMMITTED,
            report,
            text: blocks.join('\n'),
            pages,
        };
    }

    private renderFailed(batch: BatchSpec, run: RunState, report: BatchReport, error: Error): BatchOutcome {
        const pagesInBatch = batch.pageEnd - batch.pageStart + 1;
        run.pagesAttempted += pagesInBatch;

        this.logger.error('Failed to render batch', {
            batchIndex: batch.batchIndex,
            pageStart: batch.pageStart,
            pageEnd: batch.pageEnd,
            error: error.message,
        });
        this.events.emit('run:error', {
            kind: ErrorKindEnum.RENDER,
            message: `Failed to load pages ${batch.pageStart}-${batch.pageEnd}: ${error.message}`,
        });

        return {
            status: BatchStatusEnum.RENDER_FAILED,
            report: { ...report, status: BatchStatusEnum.RENDER_FAILED, hadErrors: true, error: error.message },
            text: OUTPUT_MARKERS.batchLoadError(batch.pageStart, batch.pageEnd, error.message),
        };
    }

    private emitStatus(message: string): void {
        this.events.emit('status:changed', { message });
    }
}
