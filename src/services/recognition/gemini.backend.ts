import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type {
    IRecognitionBackend,
    RecognitionRequest,
    RecognitionResponse,
} from '../../types/recognition.types.js';
import { ConfigurationError } from '../../errors/index.js';
import { withRetry, type RetryOptions } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { mapBackendError } from './backend-errors.js';

export interface GeminiVisionConfig {
    apiKey: string;
    model: string;
    temperature?: number;
    maxOutputTokens?: number;
}

/**
 * Vision recognition through Gemini, with the page sent as inline data
 */
export class GeminiVisionBackend implements IRecognitionBackend {
    readonly id = 'gemini';
    private readonly model: GenerativeModel;
    private readonly config: GeminiVisionConfig;
    private readonly retryOptions: RetryOptions;
    private readonly logger: Logger;

    constructor(config: GeminiVisionConfig, retryOptions: RetryOptions, logger: Logger) {
        if (!config.apiKey) {
            throw new ConfigurationError('Gemini API key is required', { provider: 'gemini' });
        }

        this.model = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({ model: config.model });
        this.config = config;
        this.retryOptions = retryOptions;
        this.logger = logger;

        this.logger.debug('GeminiVisionBackend initialized', { model: config.model });
    }

    async recognize(request: RecognitionRequest): Promise<RecognitionResponse> {
        const bytes = await request.image.read();

        return withRetry(async () => {
            try {
                const result = await this.model.generateContent(
                    {
                        contents: [
                            {
                                role: 'user',
                                parts: [
                                    { text: request.prompt },
                                    {
                                        inlineData: {
                                            mimeType: request.image.mimeType,
                                            data: bytes.toString('base64'),
                                        },
                                    },
                                ],
                            },
                        ],
                        generationConfig: {
                            temperature: this.config.temperature,
                            maxOutputTokens: this.config.maxOutputTokens,
                        },
                    },
                    { signal: request.signal }
                );

                return { text: result.response.text() };
            } catch (error) {
                throw mapBackendError(error, 'gemini', this.logger);
            }
        }, {
            ...this.retryOptions,
            signal: request.signal,
            onRetry: (attempt, error, delayMs) => {
                this.logger.warn(`Gemini request failed (attempt ${attempt}), retrying...`, {
                    error: error.message,
                    delayMs: Math.round(delayMs),
                });
            },
        });
    }
}
