import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { OpenAIVisionBackend } from '../../src/services/recognition/openai.backend.js';
import { BackendAPIError, ConfigurationError, RateLimitError } from '../../src/errors/index.js';
import type { RetryOptions } from '../../src/utils/retry.js';
import type { StagedImage } from '../../src/types/recognition.types.js';
import { createMockLogger } from '../mocks/index.js';

// Mock OpenAI
const mockCreate = vi.fn();
vi.mock('openai', () => {
    return {
        default: vi.fn().mockImplementation(() => ({
            chat: {
                completions: {
                    create: mockCreate,
                },
            },
        })),
    };
});

function apiError(message: string, status: number): Error {
    return Object.assign(new Error(message), { status });
}

describe('OpenAIVisionBackend', () => {
    let backend: OpenAIVisionBackend;
    const mockLogger = createMockLogger();

    const config = {
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:1234/v1',
        model: 'test-vision-model',
        temperature: 0.1,
        maxOutputTokens: 4096,
    };

    const retryOptions: RetryOptions = {
        maxRetries: 2,
        initialDelayMs: 1,
        maxDelayMs: 5,
        backoffMultiplier: 1,
        retryableErrors: [],
    };

    const image: StagedImage = {
        path: '/tmp/pagescribe-test/page.png',
        mimeType: 'image/png',
        read: async () => Buffer.from('png-bytes'),
    };

    const completion = {
        id: 'chatcmpl-1',
        choices: [{ index: 0, message: { role: 'assistant', content: 'Page text' } }],
    };

    beforeEach(() => {
        vi.clearAllMocks();
        backend = new OpenAIVisionBackend(config, retryOptions, mockLogger);
    });

    it('should point the client at the configured server', () => {
        expect(OpenAI).toHaveBeenCalledWith({
            apiKey: 'test-secret',
            baseURL: 'http://localhost:1234/v1',
        });
        expect(backend.id).toBe('openai');
    });

    it('should require an API key', () => {
        expect(() => new OpenAIVisionBackend({ ...config, apiKey: '' }, retryOptions, mockLogger))
            .toThrow(ConfigurationError);
    });

    it('should send the prompt and the page as a data URL', async () => {
        mockCreate.mockResolvedValueOnce(completion);

        await backend.recognize({ image, prompt: 'Transcribe this page.' });

        expect(mockCreate).toHaveBeenCalledWith(
            {
                model: 'test-vision-model',
                messages: [
                    {
                        role: 'user',
                        content: [
                            { type: 'text', text: 'Transcribe this page.' },
                            { type: 'image_url', image_url: { url: 'data:image/png;base64,cG5nLWJ5dGVz' } },
                        ],
                    },
                ],
                temperature: 0.1,
                max_tokens: 4096,
            },
            { signal: undefined }
        );
    });

    it('should return the raw completion', async () => {
        mockCreate.mockResolvedValueOnce(completion);

        await expect(backend.recognize({ image, prompt: 'Transcribe this page.' })).resolves.toBe(completion);
    });

    it('should retry a temporarily unavailable server', async () => {
        mockCreate
            .mockRejectedValueOnce(apiError('Service Unavailable', 503))
            .mockResolvedValueOnce(completion);

        await expect(backend.recognize({ image, prompt: 'Transcribe this page.' })).resolves.toBe(completion);
        expect(mockCreate).toHaveBeenCalledTimes(2);
    });

    it('should map rate limits and give up after the last retry', async () => {
        mockCreate.mockRejectedValue(apiError('429 Too Many Requests', 429));

        await expect(backend.recognize({ image, prompt: 'Transcribe this page.' }))
            .rejects.toBeInstanceOf(RateLimitError);
        expect(mockCreate).toHaveBeenCalledTimes(3);
    });

    it('should not retry authentication failures', async () => {
        mockCreate.mockRejectedValue(apiError('Incorrect API key provided', 401));

        const failure = backend.recognize({ image, prompt: 'Transcribe this page.' });

        await expect(failure).rejects.toBeInstanceOf(BackendAPIError);
        await expect(failure).rejects.toThrow('Invalid openai API key');
        expect(mockCreate).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying once the signal aborts', async () => {
        const controller = new AbortController();
        mockCreate.mockImplementation(async () => {
            controller.abort();
            throw apiError('Service Unavailable', 503);
        });

        await expect(backend.recognize({ image, prompt: 'Transcribe this page.', signal: controller.signal }))
            .rejects.toThrow('openai backend unreachable: Service Unavailable');
        expect(mockCreate).toHaveBeenCalledTimes(1);
        expect(mockCreate.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
    });
});
