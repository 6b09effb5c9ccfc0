import type { ResolvedConfig } from '../../types/config.types.js';
import type { IRecognitionBackend } from '../../types/recognition.types.js';
import { ConfigurationError } from '../../errors/index.js';
import { env } from '../../config/env.js';
import { GENERATION_DEFAULTS, LOCAL_SERVER_API_KEY } from '../../config/constants.js';
import { getRetryOptions } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { GeminiVisionBackend } from './gemini.backend.js';
import { OpenAIVisionBackend } from './openai.backend.js';

/**
 * Create the recognition backend selected by the resolved config.
 * API keys fall back to the environment.
 */
export function createRecognitionBackend(config: ResolvedConfig, logger: Logger): IRecognitionBackend {
    const recognition = config.recognition;
    const retryOptions = getRetryOptions(config.batchConfig);
    const temperature = recognition.temperature ?? GENERATION_DEFAULTS.temperature;
    const maxOutputTokens = recognition.maxOutputTokens ?? GENERATION_DEFAULTS.maxOutputTokens;

    switch (recognition.provider) {
        case 'openai':
            return new OpenAIVisionBackend(
                {
                    // Local servers ignore the key, but the SDK refuses to start without one
                    apiKey: recognition.apiKey ?? env.OPENAI_API_KEY ?? LOCAL_SERVER_API_KEY,
                    baseUrl: recognition.baseUrl,
                    model: recognition.model,
                    temperature,
                    maxOutputTokens,
                },
                retryOptions,
                logger
            );

        case 'gemini': {
            const apiKey = recognition.apiKey ?? env.GEMINI_API_KEY;
            if (!apiKey) {
                throw new ConfigurationError('Gemini API key is required', { provider: 'gemini' });
            }
            return new GeminiVisionBackend(
                { apiKey, model: recognition.model, temperature, maxOutputTokens },
                retryOptions,
                logger
            );
        }
    }
}
