/**
 * Centralized Environment Configuration
 *
 * Validates and exports all environment variables with Zod.
 * Import this module instead of accessing process.env directly.
 *
 * @example
 * ```typescript
 * import { env } from './config/env.js';
 * console.log(env.OPENAI_BASE_URL);
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * API key for the OpenAI-compatible backend.
     * Local servers such as LM Studio accept any non-empty value.
     */
    OPENAI_API_KEY: z
        .string()
        .optional()
        .describe('API key for the OpenAI-compatible recognition backend'),

    /**
     * Base URL of the OpenAI-compatible server
     */
    OPENAI_BASE_URL: z
        .string()
        .url()
        .optional()
        .describe('Base URL of the OpenAI-compatible recognition backend'),

    /**
     * Gemini API key (optional)
     * Get yours at: https://aistudio.google.com/app/apikey
     */
    GEMINI_API_KEY: z
        .string()
        .optional()
        .describe('Gemini API key for the gemini recognition backend'),

    /**
     * Vision model used for recognition
     */
    PAGESCRIBE_MODEL: z
        .string()
        .optional()
        .describe('Vision model name'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
function parseEnv(): Env {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}

/**
 * Validated environment variables
 * Use this instead of process.env for type-safe access
 */
export const env = parseEnv();

/**
 * Check if an optional env var is configured
 */
export function hasEnv(key: keyof Env): boolean {
    return env[key] !== undefined && env[key] !== '';
}

/**
 * Get environment info for the `info` command
 */
export function getEnvInfo(): {
    logLevel: string;
    openaiConfigured: boolean;
    openaiBaseUrl?: string;
    geminiConfigured: boolean;
} {
    return {
        logLevel: env.LOG_LEVEL,
        openaiConfigured: hasEnv('OPENAI_API_KEY'),
        openaiBaseUrl: env.OPENAI_BASE_URL,
        geminiConfigured: hasEnv('GEMINI_API_KEY'),
    };
}
