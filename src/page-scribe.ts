import type { ResolvedConfig } from './types/config.types.js';
import type { IFormatDetector } from './types/document.types.js';
import type { RunPlan, RunResult, StartRunOptions } from './types/pipeline.types.js';
import type { IPageRenderer, RasterImage } from './types/renderer.types.js';
import type { DocumentInfo, SessionStatus } from './types/session.types.js';
import { ErrorKindEnum, RunStatusEnum, type ErrorKindEnumType, type RunStatusEnumType } from './types/enums.js';
import {
    PageScribeError,
    RenderError,
    RunInProgressError,
    ToolingUnavailableError,
    ValidationError,
    generateRunId,
    toError,
} from './errors/index.js';
import { STATUS_MESSAGES } from './config/constants.js';
import { Document } from './document/document.model.js';
import type { PipelineEngine } from './engines/pipeline.engine.js';
import { resolveRunPlan } from './engines/pipeline/run-request.js';
import { composeResults, saveResults } from './services/output/result-writer.js';
import { CancellationToken } from './utils/cancellation.js';
import type { PageScribeEventEmitter } from './utils/events.js';
import type { Logger } from './utils/logger.js';

/**
 * Dependencies injected by PageScribeFactory
 */
export interface PageScribeDependencies {
    detector: IFormatDetector;
    renderer: IPageRenderer;
    engine: PipelineEngine;
    events: PageScribeEventEmitter;
    logger: Logger;
}

interface ActiveRun {
    runId: string;
    token: CancellationToken;
}

/**
 * Conversion session: one document, at most one run at a time.
 *
 * Control calls never wait on the active run. `startRun` validates and
 * rejects synchronously, then hands back the run's promise; progress and
 * results arrive through `events`.
 *
 * @example
 * ```typescript
 * import { createPageScribe } from 'pagescribe';
 *
 * const scribe = createPageScribe({ recognition: { provider: 'openai' } });
 * scribe.events.on('status:changed', ({ message }) => console.log(message));
 *
 * await scribe.loadDocument('./scan.pdf');
 * const result = await scribe.startRun({ fromPage: 1, toPage: 20, batchSize: 5 });
 * await scribe.saveResults('./scan.txt');
 * ```
 */
export class PageScribe {
    readonly events: PageScribeEventEmitter;

    private readonly config: ResolvedConfig;
    private readonly detector: IFormatDetector;
    private readonly renderer: IPageRenderer;
    private readonly engine: PipelineEngine;
    private readonly logger: Logger;

    private document: Document | null = null;
    private documentInfo?: DocumentInfo;
    private activeRun?: ActiveRun;
    private committed: string[] = [];
    private status: RunStatusEnumType = RunStatusEnum.IDLE;
    private lastResult?: RunResult;

    constructor(config: ResolvedConfig, deps: PageScribeDependencies) {
        this.config = config;
        this.detector = deps.detector;
        this.renderer = deps.renderer;
        this.engine = deps.engine;
        this.events = deps.events;
        this.logger = deps.logger;

        this.events.on('batch:committed', commit => {
            this.committed.push(commit.text);
        });

        this.logger.debug('PageScribe initialized', {
            provider: config.recognition.provider,
            model: config.recognition.model,
            batchConfig: config.batchConfig,
        });
    }

    /**
     * Get the resolved configuration
     */
    getConfig(): ResolvedConfig {
        return this.config;
    }

    // ============================================
    // DOCUMENT METHODS
    // ============================================

    /**
     * Load a document, replacing the current one and its results.
     * The first page is previewed when the document has pages.
     */
    async loadDocument(filePath: string): Promise<DocumentInfo> {
        if (this.activeRun) {
            throw this.report(new RunInProgressError(this.activeRun.runId));
        }

        const document = new Document();
        let renderPath: string;
        try {
            renderPath = await document.detectType(filePath, this.detector);
        } catch (error) {
            if (error instanceof PageScribeError) {
                throw this.report(error);
            }
            const cause = toError(error);
            throw this.report(new PageScribeError(
                `Failed to load document: ${cause.message}`,
                'LOAD_ERROR',
                { filePath },
                { cause, operation: 'loadDocument' }
            ));
        }

        const info: DocumentInfo = {
            filePath,
            fileType: document.fileType ?? 'UNKNOWN',
            pageCount: document.pageCount,
            renderPath,
        };

        this.document = document;
        this.documentInfo = info;
        this.committed = [];
        this.lastResult = undefined;
        this.status = RunStatusEnum.IDLE;
        // Converted files of the replaced document are no longer rendered
        await this.detector.release?.(renderPath);

        this.logger.info('Document loaded', {
            filePath,
            fileType: info.fileType,
            pageCount: info.pageCount,
        });
        this.events.emit('document:pageCount', { pageCount: info.pageCount, fileType: info.fileType });

        if (info.pageCount > 0) {
            try {
                await this.getPage(0);
            } catch (error) {
                this.logger.warn('Could not render first page preview', {
                    error: toError(error).message,
                });
            }
        }

        return info;
    }

    /**
     * Render one page (0-based index) for display
     */
    async getPage(pageIndex: number): Promise<RasterImage> {
        const info = this.requireDocument();

        if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= info.pageCount) {
            throw new ValidationError(`Page index must be 0-${info.pageCount - 1}.`, 'pageIndex', { pageIndex });
        }

        const pageNumber = pageIndex + 1;
        let images: RasterImage[];
        try {
            images = await this.renderer.render(
                info.renderPath,
                pageNumber,
                pageNumber,
                this.config.batchConfig.renderTimeoutMs
            );
        } catch (error) {
            const cause = toError(error);
            throw this.report(
                error instanceof RenderError
                    ? error
                    : new RenderError(cause.message, pageNumber, pageNumber, cause)
            );
        }

        const image = images[0];
        if (!image) {
            throw this.report(new RenderError(`Page ${pageNumber} produced no image`, pageNumber, pageNumber));
        }

        this.events.emit('page:preview', { pageIndex, image });
        return image;
    }

    /**
     * The loaded document and its extracted objects
     */
    getDocument(): Document | null {
        return this.document;
    }

    // ============================================
    // RUN METHODS
    // ============================================

    /**
     * Start a conversion run.
     *
     * Throws synchronously when a run is active or the request is invalid;
     * otherwise returns a promise for the run's terminal result.
     */
    startRun(options: StartRunOptions = {}): Promise<RunResult> {
        if (this.activeRun) {
            throw this.report(new RunInProgressError(this.activeRun.runId));
        }

        const document = this.document;
        const info = this.documentInfo;
        if (!document || !info) {
            throw this.report(new ValidationError('No document loaded.', 'document'));
        }
        if (info.pageCount === 0) {
            throw this.report(new ValidationError('The document has no pages to convert.', 'document'));
        }

        let plan: RunPlan;
        try {
            plan = resolveRunPlan(options, info.pageCount, this.config.batchConfig.pagesPerBatch, this.logger);
        } catch (error) {
            if (error instanceof ValidationError) {
                throw this.report(error);
            }
            throw error;
        }

        const run: ActiveRun = { runId: generateRunId(), token: new CancellationToken() };
        this.activeRun = run;
        this.status = RunStatusEnum.RUNNING;

        // Settles before the final status and run:finished are emitted
        const settle = (result?: RunResult): void => {
            if (this.activeRun !== run) {
                return;
            }
            this.activeRun = undefined;
            this.status = result?.status ?? RunStatusEnum.FAILED;
            if (result) {
                this.lastResult = result;
            }
        };

        return Promise.resolve()
            .then(() => this.engine.run(
                { ...plan, runId: run.runId, sourcePath: info.renderPath },
                run.token,
                document,
                { onSettled: settle }
            ))
            .catch((error: unknown) => {
                settle();
                throw error;
            });
    }

    /**
     * Request cancellation of the active run.
     * Returns false when no run is active. Repeated calls are harmless.
     */
    cancelRun(): boolean {
        const run = this.activeRun;
        if (!run) {
            return false;
        }

        if (!run.token.isCancellationRequested) {
            this.logger.info('Cancellation requested', { runId: run.runId });
            this.events.emit('status:changed', { message: STATUS_MESSAGES.cancelling });
        }
        run.token.cancel();
        return true;
    }

    isRunning(): boolean {
        return this.activeRun !== undefined;
    }

    getStatus(): SessionStatus {
        return {
            status: this.status,
            runId: this.activeRun?.runId,
            document: this.documentInfo,
            committedBatches: this.committed.length,
            lastResult: this.lastResult,
        };
    }

    // ============================================
    // RESULT METHODS
    // ============================================

    /**
     * Committed text of every run since the document was loaded
     */
    getResults(): string {
        return composeResults(this.committed);
    }

    clearResults(): void {
        this.committed = [];
    }

    /**
     * Write the committed text to a file (UTF-8, overwriting).
     * Safe to call during a run; only committed batches are written.
     */
    async saveResults(outputPath: string): Promise<number> {
        try {
            const written = await saveResults(outputPath, this.committed);
            this.logger.info('Results saved', { outputPath, characters: written });
            return written;
        } catch (error) {
            if (error instanceof PageScribeError) {
                throw this.report(error);
            }
            throw error;
        }
    }

    private requireDocument(): DocumentInfo {
        if (!this.documentInfo) {
            throw new ValidationError('No document loaded.', 'document');
        }
        return this.documentInfo;
    }

    /**
     * Announce a caller-facing error and hand it back for throwing
     */
    private report<E extends PageScribeError>(error: E): E {
        this.events.emit('run:error', { kind: errorKindOf(error), message: error.message });
        return error;
    }
}

function errorKindOf(error: PageScribeError): ErrorKindEnumType {
    if (error instanceof ValidationError || error instanceof RunInProgressError) {
        return ErrorKindEnum.VALIDATION;
    }
    if (error instanceof ToolingUnavailableError) {
        return ErrorKindEnum.TOOLING;
    }
    if (error instanceof RenderError) {
        return ErrorKindEnum.RENDER;
    }
    if (error.code === 'IO_ERROR' || error.code === 'LOAD_ERROR') {
        return ErrorKindEnum.IO;
    }
    return ErrorKindEnum.INTERNAL;
}
