import type { BatchConfig } from '../types/config.types.js';
import type { BatchReport, PipelineRunSpec, RunResult } from '../types/pipeline.types.js';
import type { IPageRenderer } from '../types/renderer.types.js';
import {
    BatchStatusEnum,
    ErrorKindEnum,
    ObjectKindEnum,
    RunStatusEnum,
    type TerminalRunStatus,
} from '../types/enums.js';
import type { Document } from '../document/document.model.js';
import { clearRunId, setRunId, toError } from '../errors/index.js';
import { STATUS_MESSAGES } from '../config/constants.js';
import type { RecognitionAdapter } from '../services/recognition/recognition.adapter.js';
import type { CancellationToken } from '../utils/cancellation.js';
import type { PageScribeEventEmitter } from '../utils/events.js';
import type { Logger } from '../utils/logger.js';
import { createBatches } from './pipeline/batch.planner.js';
import { BatchProcessor, type RecognizedPage, type RunState } from './pipeline/batch.processor.js';

/**
 * Callbacks into the caller that owns the run
 */
export interface RunHooks {
    /** Called with the terminal result before the final status and `run:finished` go out */
    onSettled?: (result: RunResult) => void;
}

export interface PipelineEngineDependencies {
    renderer: IPageRenderer;
    adapter: RecognitionAdapter;
    events: PageScribeEventEmitter;
    batchConfig: BatchConfig;
    logger: Logger;
}

/**
 * Batch pipeline engine
 *
 * Runs a validated page range batch by batch: render, recognize each page,
 * commit the batch. A committed batch is announced once through
 * `batch:committed` and written to the document; a cancelled batch leaves
 * no trace. The returned promise always resolves with a terminal result.
 */
export class PipelineEngine {
    private readonly processor: BatchProcessor;
    private readonly events: PageScribeEventEmitter;
    private readonly logger: Logger;

    constructor(deps: PipelineEngineDependencies) {
        this.processor = new BatchProcessor(
            deps.renderer,
            deps.adapter,
            deps.events,
            deps.batchConfig,
            deps.logger
        );
        this.events = deps.events;
        this.logger = deps.logger;
    }

    async run(
        spec: PipelineRunSpec,
        token: CancellationToken,
        document: Document,
        hooks: RunHooks = {}
    ): Promise<RunResult> {
        const startTime = Date.now();
        const batches = createBatches(spec.startPage, spec.endPage, spec.batchSize);
        const state: RunState = {
            runId: spec.runId,
            sourcePath: spec.sourcePath,
            token,
            totalPages: spec.endPage - spec.startPage + 1,
            pagesAttempted: 0,
        };
        const reports: BatchReport[] = [];
        const committed: string[] = [];
        let cleanBatchCommitted = false;

        setRunId(spec.runId);
        this.logger.info('Starting conversion', {
            startPage: spec.startPage,
            endPage: spec.endPage,
            batchSize: spec.batchSize,
            batchCount: batches.length,
        });

        const finish = (status: TerminalRunStatus, message: string, error?: string): RunResult => {
            const result: RunResult = {
                runId: spec.runId,
                status,
                pageRange: { start: spec.startPage, end: spec.endPage },
                batchSize: spec.batchSize,
                pagesAttempted: state.pagesAttempted,
                totalPages: state.totalPages,
                batches: reports,
                committed,
                message,
                processingMs: Date.now() - startTime,
                error,
            };

            this.logger.info('Conversion finished', {
                status,
                pagesAttempted: result.pagesAttempted,
                committedBatches: committed.length,
                processingMs: result.processingMs,
            });
            hooks.onSettled?.(result);
            this.events.emit('status:changed', { message });
            this.events.emit('run:finished', result);
            return result;
        };

        let terminal: { status: TerminalRunStatus; message: string; error?: string };

        try {
            for (const batch of batches) {
                const outcome = await this.processor.process(batch, state);
                reports.push(outcome.report);

                if (outcome.status === BatchStatusEnum.DISCARDED) {
                    this.logger.info('Batch discarded after cancellation', {
                        batchIndex: batch.batchIndex,
                    });
                    break;
                }

                committed.push(outcome.text);
                this.events.emit('batch:committed', {
                    runId: spec.runId,
                    batchIndex: batch.batchIndex,
                    pageRange: { start: batch.pageStart, end: batch.pageEnd },
                    text: outcome.text,
                    hadErrors: outcome.report.hadErrors,
                    renderFailed: outcome.status === BatchStatusEnum.RENDER_FAILED,
                });

                if (outcome.status === BatchStatusEnum.COMMITTED) {
                    writePages(document, outcome.pages);
                    if (!outcome.report.hadErrors) {
                        cleanBatchCommitted = true;
                    }
                }
            }

            if (token.isCancellationRequested) {
                terminal = { status: RunStatusEnum.CANCELLED, message: STATUS_MESSAGES.cancelled };
            } else if (cleanBatchCommitted) {
                terminal = { status: RunStatusEnum.COMPLETED, message: STATUS_MESSAGES.completed };
            } else {
                terminal = {
                    status: RunStatusEnum.COMPLETED_WITH_ERRORS,
                    message: STATUS_MESSAGES.completedWithErrors,
                };
            }
        } catch (error) {
            const cause = toError(error);
            this.logger.error('Conversion failed unexpectedly', {
                error: cause.message,
                stack: cause.stack,
            });
            this.events.emit('run:error', { kind: ErrorKindEnum.INTERNAL, message: cause.message });
            terminal = {
                status: RunStatusEnum.FAILED,
                message: STATUS_MESSAGES.failed(cause.message),
                error: cause.message,
            };
        }

        try {
            return finish(terminal.status, terminal.message, terminal.error);
        } finally {
            clearRunId();
        }
    }
}

/**
 * Replace the text objects of each recognized page (0-based page index)
 */
function writePages(document: Document, pages: RecognizedPage[]): void {
    for (const { pageNumber, text } of pages) {
        const pageIndex = pageNumber - 1;
        document.deletePageObjects(pageIndex);
        document.addObject(pageIndex, { kind: ObjectKindEnum.TEXT, text });
    }
}
