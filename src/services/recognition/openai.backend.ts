import OpenAI from 'openai';
import type {
    IRecognitionBackend,
    RecognitionRequest,
    RecognitionResponse,
} from '../../types/recognition.types.js';
import { ConfigurationError } from '../../errors/index.js';
import { withRetry, type RetryOptions } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { mapBackendError } from './backend-errors.js';

export interface OpenAIVisionConfig {
    apiKey: string;
    /** OpenAI-compatible endpoint, e.g. a local LM Studio server */
    baseUrl?: string;
    model: string;
    temperature?: number;
    maxOutputTokens?: number;
}

/**
 * Vision recognition through the OpenAI chat completions API.
 *
 * Works against any OpenAI-compatible server. The page is sent as a base64
 * data URL and the raw completion is returned for normalization.
 */
export class OpenAIVisionBackend implements IRecognitionBackend {
    readonly id = 'openai';
    private readonly client: OpenAI;
    private readonly config: OpenAIVisionConfig;
    private readonly retryOptions: RetryOptions;
    private readonly logger: Logger;

    constructor(config: OpenAIVisionConfig, retryOptions: RetryOptions, logger: Logger) {
        if (!config.apiKey) {
            throw new ConfigurationError('OpenAI API key is required', { provider: 'openai' });
        }

        this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
        this.config = config;
        this.retryOptions = retryOptions;
        this.logger = logger;

        this.logger.debug('OpenAIVisionBackend initialized', {
            model: config.model,
            baseUrl: config.baseUrl,
        });
    }

    async recognize(request: RecognitionRequest): Promise<RecognitionResponse> {
        const bytes = await request.image.read();
        const dataUrl = `data:${request.image.mimeType};base64,${bytes.toString('base64')}`;

        return withRetry(async () => {
            try {
                return await this.client.chat.completions.create(
                    {
                        model: this.config.model,
                        messages: [
                            {
                                role: 'user',
                                content: [
                                    { type: 'text', text: request.prompt },
                                    { type: 'image_url', image_url: { url: dataUrl } },
                                ],
                            },
                        ],
                        temperature: this.config.temperature,
                        max_tokens: this.config.maxOutputTokens,
                    },
                    { signal: request.signal }
                );
            } catch (error) {
                throw mapBackendError(error, 'openai', this.logger);
            }
        }, {
            ...this.retryOptions,
            signal: request.signal,
            onRetry: (attempt, error, delayMs) => {
                this.logger.warn(`OpenAI request failed (attempt ${attempt}), retrying...`, {
                    error: error.message,
                    delayMs: Math.round(delayMs),
                });
            },
        });
    }
}
