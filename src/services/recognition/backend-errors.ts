import { BackendAPIError, RateLimitError, toError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';

function statusOf(error: Error): number | undefined {
    return 'status' in error && typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Map an SDK failure to a typed error for retry decisions.
 * Errors with no specific mapping are logged and returned unchanged.
 */
export function mapBackendError(error: unknown, provider: string, logger: Logger): Error {
    const cause = toError(error);
    const message = cause.message.toLowerCase();
    const status = statusOf(cause);

    if (cause.name === 'AbortError' || cause.name === 'APIUserAbortError') {
        return cause;
    }

    if (status === 429 || message.includes('429') || message.includes('rate limit')) {
        return new RateLimitError(`${provider} API rate limit exceeded`);
    }

    if (
        status === 401 ||
        message.includes('invalid_api_key') ||
        message.includes('api key not valid') ||
        message.includes('authentication')
    ) {
        return new BackendAPIError(`Invalid ${provider} API key`, provider, {
            statusCode: 401,
            retryable: false,
        });
    }

    if (message.includes('quota')) {
        return new BackendAPIError('API quota exceeded', provider, {
            statusCode: 429,
            retryable: false,
        });
    }

    if (
        status === 503 ||
        message.includes('timeout') ||
        message.includes('network') ||
        message.includes('connection error')
    ) {
        return new BackendAPIError(`${provider} backend unreachable: ${cause.message}`, provider, {
            statusCode: status,
            retryable: true,
        });
    }

    logger.error(`${provider} API error`, {
        error: cause.message,
        statusCode: status,
    });
    return cause;
}
