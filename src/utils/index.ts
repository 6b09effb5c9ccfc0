export { createLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export {
    withRetry,
    sleep,
    isRetryableError,
    calculateBackoffDelay,
    getRetryOptions,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export { CancellationToken } from './cancellation.js';

export { PageScribeEventEmitter, createEventEmitter } from './events.js';
export type { PageScribeEvents } from './events.js';
