/**
 * pagescribe: batch page recognition for scanned documents
 *
 * @packageDocumentation
 */

// Main class and factory
export { PageScribe, type PageScribeDependencies } from './page-scribe.js';
export { PageScribeFactory, createPageScribe, type PageScribeOverrides } from './page-scribe.factory.js';

// Document model
export { Document } from './document/document.model.js';

// Engine
export {
    PipelineEngine,
    BatchProcessor,
    createBatches,
    resolveRunPlan,
} from './engines/index.js';
export type {
    PipelineEngineDependencies,
    RunHooks,
    BatchOutcome,
    RunState,
    RecognizedPage,
} from './engines/index.js';

// Services
export {
    FormatDetector,
    LibreOfficeConverter,
    MupdfPageCounter,
    MupdfPageRenderer,
    RecognitionAdapter,
    OpenAIVisionBackend,
    GeminiVisionBackend,
    createRecognitionBackend,
    decodeResponse,
    stripCodeFences,
    normalizeResponse,
    saveResults,
    composeResults,
} from './services/index.js';
export type {
    IDocumentConverter,
    IPageCounter,
    OpenAIVisionConfig,
    GeminiVisionConfig,
} from './services/index.js';

export type {
    PageScribeConfig,
    ResolvedConfig,
    BatchConfig,
    RenderConfig,
    LogConfig,
    RecognitionConfig,
    RecognitionProvider,
} from './types/config.types.js';

export type {
    Coordinates,
    ObjectContent,
    ExtractedObject,
    DetectionResult,
    IFormatDetector,
} from './types/document.types.js';

export type { RasterImage, IPageRenderer } from './types/renderer.types.js';

export type {
    StagedImage,
    RecognitionRequest,
    RecognitionResponse,
    IRecognitionBackend,
    ResponseShape,
    DecodedResponse,
    RecognitionOutcome,
} from './types/recognition.types.js';

export type {
    BatchSpec,
    StartRunOptions,
    RunPlan,
    PipelineRunSpec,
    PageProgress,
    BatchReport,
    BatchCommit,
    RunResult,
} from './types/pipeline.types.js';

export type { DocumentInfo, SessionStatus } from './types/session.types.js';

// Enums
export {
    FileTypeEnum,
    ObjectKindEnum,
    RunStatusEnum,
    BatchStatusEnum,
    ErrorKindEnum,
} from './types/enums.js';
export type {
    FileTypeEnumType,
    ObjectKindEnumType,
    RunStatusEnumType,
    TerminalRunStatus,
    BatchStatusEnumType,
    ErrorKindEnumType,
} from './types/enums.js';

// Config
export {
    configSchema,
    DEFAULT_BATCH_CONFIG,
    DEFAULT_RENDER_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_RECOGNITION_CONFIG,
} from './types/config.types.js';
export { DEFAULT_OCR_PROMPT, DEFAULT_MODELS, VERSION } from './config/constants.js';

// Utilities
export {
    CancellationToken,
    PageScribeEventEmitter,
    createEventEmitter,
    createLogger,
    withRetry,
} from './utils/index.js';
export type { Logger, LogMeta, PageScribeEvents, RetryOptions } from './utils/index.js';

// Errors
export {
    PageScribeError,
    ConfigurationError,
    ToolingUnavailableError,
    ValidationError,
    RunInProgressError,
    RenderError,
    RecognitionError,
    BackendAPIError,
    RateLimitError,
    PipelineError,
    // Utilities
    generateRunId,
    setRunId,
    getRunId,
    clearRunId,
} from './errors/index.js';

export type { ErrorContext } from './errors/index.js';
