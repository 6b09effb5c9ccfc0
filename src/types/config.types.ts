import { z } from 'zod';

/**
 * Batch processing configuration
 */
export interface BatchConfig {
    /** Pages rendered per batch (default: 10) */
    pagesPerBatch: number;
    /** Render timeout per batch in milliseconds (default: 30000) */
    renderTimeoutMs: number;
    /** Retry attempts for transient backend failures (default: 2) */
    maxRetries: number;
    /** Initial retry delay in milliseconds (default: 1000) */
    retryDelayMs: number;
    /** Backoff multiplier for exponential retry (default: 2) */
    backoffMultiplier: number;
}

/**
 * Rasterization configuration
 */
export interface RenderConfig {
    /** Render resolution in dots per inch (default: 200) */
    dpi: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

export type RecognitionProvider = 'openai' | 'gemini';

/**
 * Recognition backend configuration
 */
export interface RecognitionConfig {
    provider: RecognitionProvider;
    /** API key; falls back to OPENAI_API_KEY / GEMINI_API_KEY */
    apiKey?: string;
    /** Base URL of an OpenAI-compatible server (openai provider only) */
    baseUrl?: string;
    /** Vision model name */
    model?: string;
    /** Instruction sent with every page image */
    prompt?: string;
    temperature?: number;
    maxOutputTokens?: number;
}

/**
 * Main pagescribe configuration
 */
export interface PageScribeConfig {
    recognition?: Partial<RecognitionConfig>;
    batchConfig?: Partial<BatchConfig>;
    renderConfig?: Partial<RenderConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    recognition: RecognitionConfig & { model: string; prompt: string };
    batchConfig: BatchConfig;
    renderConfig: RenderConfig;
    logging: LogConfig;
}

export const DEFAULT_BATCH_CONFIG: BatchConfig = {
    pagesPerBatch: 10,
    renderTimeoutMs: 30000,
    maxRetries: 2,
    retryDelayMs: 1000,
    backoffMultiplier: 2,
};

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
    dpi: 200,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

export const DEFAULT_RECOGNITION_CONFIG: RecognitionConfig = {
    provider: 'openai',
    baseUrl: 'http://localhost:1234/v1',
};

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    recognition: z
        .object({
            provider: z.enum(['openai', 'gemini']).optional(),
            apiKey: z.string().min(1).optional(),
            baseUrl: z.string().url().optional(),
            model: z.string().min(1).optional(),
            prompt: z.string().min(1).optional(),
            temperature: z.number().min(0).max(2).optional(),
            maxOutputTokens: z.number().int().positive().optional(),
        })
        .optional(),
    batchConfig: z
        .object({
            pagesPerBatch: z.number().int().min(1).max(100).optional(),
            renderTimeoutMs: z.number().int().min(1000).max(600000).optional(),
            maxRetries: z.number().int().min(0).max(10).optional(),
            retryDelayMs: z.number().min(100).max(60000).optional(),
            backoffMultiplier: z.number().min(1).max(5).optional(),
        })
        .optional(),
    renderConfig: z
        .object({
            dpi: z.number().int().min(36).max(600).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .passthrough()
        .optional(),
});
