import { PageScribe } from './page-scribe.js';
import type { PageScribeConfig, RecognitionConfig, ResolvedConfig } from './types/config.types.js';
import type { IFormatDetector } from './types/document.types.js';
import type { IRecognitionBackend } from './types/recognition.types.js';
import type { IPageRenderer } from './types/renderer.types.js';
import {
    configSchema,
    DEFAULT_BATCH_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_RECOGNITION_CONFIG,
    DEFAULT_RENDER_CONFIG,
} from './types/config.types.js';
import { ConfigurationError } from './errors/index.js';
import { env } from './config/env.js';
import { DEFAULT_MODELS, DEFAULT_OCR_PROMPT } from './config/constants.js';
import { createEventEmitter, createLogger } from './utils/index.js';
import type { Logger } from './utils/logger.js';
import { PipelineEngine } from './engines/pipeline.engine.js';
import { FormatDetector } from './services/detection/format.detector.js';
import { LibreOfficeConverter } from './services/detection/office.converter.js';
import { MupdfPageCounter } from './services/detection/page-counter.js';
import { MupdfPageRenderer } from './services/rendering/mupdf.renderer.js';
import { RecognitionAdapter } from './services/recognition/recognition.adapter.js';
import { createRecognitionBackend } from './services/recognition/backend.factory.js';

/**
 * Collaborators that may replace the defaults
 */
export interface PageScribeOverrides {
    detector?: IFormatDetector;
    renderer?: IPageRenderer;
    backend?: IRecognitionBackend;
    logger?: Logger;
}

/**
 * Factory for creating PageScribe instances with all dependencies wired
 *
 * @example
 * ```typescript
 * import { PageScribeFactory } from 'pagescribe';
 *
 * const scribe = PageScribeFactory.create({
 *   recognition: { provider: 'openai', baseUrl: 'http://localhost:1234/v1' },
 *   batchConfig: { pagesPerBatch: 5 },
 * });
 * ```
 */
export class PageScribeFactory {
    /**
     * Create a new PageScribe instance
     * @param userConfig - User configuration
     * @param overrides - Replacement collaborators (custom backends, test doubles)
     */
    static create(userConfig: PageScribeConfig = {}, overrides: PageScribeOverrides = {}): PageScribe {
        const config = PageScribeFactory.resolveConfig(userConfig);
        const logger = overrides.logger ?? createLogger(config.logging);
        const events = createEventEmitter();

        const detector = overrides.detector ?? new FormatDetector(
            new MupdfPageCounter(),
            new LibreOfficeConverter(logger),
            logger
        );
        const renderer = overrides.renderer ?? new MupdfPageRenderer(config.renderConfig, logger);
        const backend = overrides.backend ?? createRecognitionBackend(config, logger);
        const adapter = new RecognitionAdapter(backend, config.recognition.prompt, logger);

        const engine = new PipelineEngine({
            renderer,
            adapter,
            events,
            batchConfig: config.batchConfig,
            logger,
        });

        return new PageScribe(config, { detector, renderer, engine, events, logger });
    }

    /**
     * Validate user config and merge defaults.
     * Unset recognition and log settings fall back to the environment.
     */
    static resolveConfig(userConfig: PageScribeConfig): ResolvedConfig {
        const validation = configSchema.safeParse(userConfig);
        if (!validation.success) {
            throw new ConfigurationError('Invalid configuration', {
                errors: validation.error.errors,
            });
        }

        const recognition: Partial<RecognitionConfig> = userConfig.recognition ?? {};
        const provider = recognition.provider ?? DEFAULT_RECOGNITION_CONFIG.provider;

        return {
            recognition: {
                ...recognition,
                provider,
                baseUrl: recognition.baseUrl ?? env.OPENAI_BASE_URL ?? DEFAULT_RECOGNITION_CONFIG.baseUrl,
                model: recognition.model ?? env.PAGESCRIBE_MODEL ?? DEFAULT_MODELS[provider],
                prompt: recognition.prompt ?? DEFAULT_OCR_PROMPT,
            },
            batchConfig: {
                ...DEFAULT_BATCH_CONFIG,
                ...userConfig.batchConfig,
            },
            renderConfig: {
                ...DEFAULT_RENDER_CONFIG,
                ...userConfig.renderConfig,
            },
            logging: {
                ...DEFAULT_LOG_CONFIG,
                ...userConfig.logging,
                level: userConfig.logging?.level ?? env.LOG_LEVEL,
            },
        };
    }
}

/**
 * Create a PageScribe instance with default collaborators
 */
export function createPageScribe(userConfig?: PageScribeConfig, overrides?: PageScribeOverrides): PageScribe {
    return PageScribeFactory.create(userConfig, overrides);
}
