import type { DecodedResponse, RecognitionResponse } from '../../types/recognition.types.js';
import type { Logger } from '../../utils/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function stringify(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (value === undefined || value === null || typeof value === 'function') {
        return String(value);
    }
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

function decodeChoice(choice: unknown): DecodedResponse {
    if (isRecord(choice)) {
        const message = choice['message'];
        if (isRecord(message) && typeof message['content'] === 'string' && message['content']) {
            return { shape: 'choice-message', text: message['content'] };
        }
        if (typeof choice['text'] === 'string') {
            return { shape: 'choice-text', text: choice['text'] };
        }
    }
    return { shape: 'choice-unknown', text: stringify(choice) };
}

/**
 * Decode a backend response into text.
 *
 * Shapes are tried in a fixed order; the first match wins:
 *
 * | # | shape                          | result                     |
 * |---|--------------------------------|----------------------------|
 * | 1 | string                         | the string                 |
 * | 2 | `{ content: string }`          | `content`                  |
 * | 3 | `{ text: string }`             | `text`                     |
 * | 4 | `{ choices: [first, ...] }`    | `first.message.content`, else `first.text`, else stringified `first` |
 * | 5 | anything else                  | stringified value          |
 */
export function decodeResponse(response: RecognitionResponse): DecodedResponse {
    if (typeof response === 'string') {
        return { shape: 'string', text: response };
    }

    if (isRecord(response)) {
        if (typeof response['content'] === 'string') {
            return { shape: 'content', text: response['content'] };
        }
        if (typeof response['text'] === 'string') {
            return { shape: 'text', text: response['text'] };
        }
        const choices = response['choices'];
        if (Array.isArray(choices) && choices.length > 0) {
            return decodeChoice(choices[0]);
        }
    }

    return { shape: 'unknown', text: stringify(response) };
}

/**
 * Strip code-fence markers wrapping the whole response
 */
export function stripCodeFences(text: string): string {
    let cleaned = text.trim();
    if (cleaned.startsWith('```text')) {
        cleaned = cleaned.slice('```text'.length).trim();
    }
    if (cleaned.startsWith('```')) {
        cleaned = cleaned.slice(3).trim();
    }
    if (cleaned.endsWith('```')) {
        cleaned = cleaned.slice(0, -3).trim();
    }
    return cleaned;
}

/**
 * Decode and clean a backend response.
 * Unrecognized shapes are kept as their string form and logged.
 */
export function normalizeResponse(
    response: RecognitionResponse,
    logger: Logger,
    meta?: { pageNumber?: number }
): DecodedResponse {
    const decoded = decodeResponse(response);

    if (decoded.shape === 'unknown' || decoded.shape === 'choice-unknown') {
        logger.warn('Unrecognized recognition response shape, using its string form', {
            pageNumber: meta?.pageNumber,
            shape: decoded.shape,
        });
    }

    return { shape: decoded.shape, text: stripCodeFences(decoded.text) };
}
