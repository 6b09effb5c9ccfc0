/**
 * Error context for run correlation and tracing
 */
export interface ErrorContext {
    /** Run the error belongs to, if any */
    runId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique run ID
 */
export function generateRunId(): string {
    return `run_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

let currentRunId: string | undefined;

export function setRunId(id: string): void {
    currentRunId = id;
}

export function getRunId(): string | undefined {
    return currentRunId;
}

export function clearRunId(): void {
    currentRunId = undefined;
}

/**
 * Base error class for pagescribe
 * All errors extend this class for consistent handling
 */
export class PageScribeError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly runId?: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'PageScribeError';
        this.code = code;
        this.details = details;
        this.runId = context?.runId ?? getRunId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            runId: this.runId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Normalize a thrown value to an Error instance
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends PageScribeError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * A recognized format needs a renderer or page counter that is not installed.
 * Fatal for the operation, never for the process.
 */
export class ToolingUnavailableError extends PageScribeError {
    public readonly tool: string;
    public readonly fileType: string;

    constructor(tool: string, fileType: string, remediation: string, cause?: Error) {
        super(remediation, 'TOOLING_UNAVAILABLE', { tool, fileType }, { cause });
        this.name = 'ToolingUnavailableError';
        this.tool = tool;
        this.fileType = fileType;
    }
}

/**
 * Validation errors
 */
export class ValidationError extends PageScribeError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * A run is already active for this document
 */
export class RunInProgressError extends PageScribeError {
    public readonly activeRunId: string;

    constructor(activeRunId: string) {
        super('A conversion is already in progress.', 'RUN_IN_PROGRESS', { activeRunId });
        this.name = 'RunInProgressError';
        this.activeRunId = activeRunId;
    }
}

/**
 * Page rendering errors (recoverable at batch granularity)
 */
export class RenderError extends PageScribeError {
    public readonly pageStart: number;
    public readonly pageEnd: number;

    constructor(message: string, pageStart: number, pageEnd: number, cause?: Error) {
        super(message, 'RENDER_ERROR', { pageStart, pageEnd }, { cause });
        this.name = 'RenderError';
        this.pageStart = pageStart;
        this.pageEnd = pageEnd;
    }
}

/**
 * Recognition errors (recoverable at page granularity)
 */
export class RecognitionError extends PageScribeError {
    public readonly pageNumber?: number;

    constructor(message: string, options: { pageNumber?: number; cause?: Error } = {}) {
        super(message, 'RECOGNITION_ERROR', { pageNumber: options.pageNumber }, { cause: options.cause });
        this.name = 'RecognitionError';
        this.pageNumber = options.pageNumber;
    }
}

/**
 * Recognition backend API errors
 */
export class BackendAPIError extends PageScribeError {
    public readonly provider: string;
    public readonly statusCode?: number;
    public readonly retryable: boolean;

    constructor(
        message: string,
        provider: string,
        options: {
            statusCode?: number;
            retryable?: boolean;
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(message, 'BACKEND_API_ERROR', { provider, ...options.details });
        this.name = 'BackendAPIError';
        this.provider = provider;
        this.statusCode = options.statusCode;
        this.retryable = options.retryable ?? false;
    }
}

/**
 * Rate limit errors (retryable)
 */
export class RateLimitError extends PageScribeError {
    public readonly retryAfterMs?: number;

    constructor(message: string, retryAfterMs?: number) {
        super(message, 'RATE_LIMIT_ERROR', { retryAfterMs });
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

/**
 * Engine-internal faults; the run ends as FAILED
 */
export class PipelineError extends PageScribeError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'PIPELINE_ERROR', details);
        this.name = 'PipelineError';
    }
}
