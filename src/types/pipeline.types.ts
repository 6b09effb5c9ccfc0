import type { BatchStatusEnumType, TerminalRunStatus } from './enums.js';

/**
 * Batch specification for page processing
 */
export interface BatchSpec {
    /** Zero-based batch index */
    batchIndex: number;
    /** First page number (1-indexed) */
    pageStart: number;
    /** Last page number (1-indexed, inclusive) */
    pageEnd: number;
}

/**
 * Run request as received from the control surface.
 * Page fields accept raw form input; empty strings count as absent.
 */
export interface StartRunOptions {
    fromPage?: number | string;
    toPage?: number | string;
    batchSize?: number;
}

/**
 * Validated run parameters
 */
export interface RunPlan {
    startPage: number;
    endPage: number;
    batchSize: number;
}

/**
 * Everything the engine needs for one run
 */
export interface PipelineRunSpec extends RunPlan {
    runId: string;
    /** File handed to the renderer */
    sourcePath: string;
}

/**
 * Per-page progress report
 */
export interface PageProgress {
    runId: string;
    pageNumber: number;
    /** Pages attempted so far, failed pages included */
    pagesAttempted: number;
    totalPages: number;
}

/**
 * Report for one batch of a run
 */
export interface BatchReport {
    batchIndex: number;
    pageStart: number;
    pageEnd: number;
    status: BatchStatusEnumType;
    /** At least one page failed recognition */
    hadErrors: boolean;
    /** 1-based page numbers whose recognition failed */
    failedPages: number[];
    error?: string;
}

/**
 * A batch's results, emitted once when committed
 */
export interface BatchCommit {
    runId: string;
    batchIndex: number;
    pageRange: { start: number; end: number };
    /** Labeled page blocks joined with newlines, or the load-error placeholder */
    text: string;
    hadErrors: boolean;
    /** The batch could not be rendered and `text` is its placeholder */
    renderFailed: boolean;
}

/**
 * Terminal result of a run
 */
export interface RunResult {
    runId: string;
    status: TerminalRunStatus;
    pageRange: { start: number; end: number };
    batchSize: number;
    pagesAttempted: number;
    totalPages: number;
    batches: BatchReport[];
    /** Committed text of this run, in page order */
    committed: string[];
    /** Final status line */
    message: string;
    processingMs: number;
    error?: string;
}
