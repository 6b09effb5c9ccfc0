import type { RunPlan, StartRunOptions } from '../../types/pipeline.types.js';
import { ValidationError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

type PageField = StartRunOptions['fromPage'];

function isAbsent(value: PageField): value is undefined | '' {
    return value === undefined || (typeof value === 'string' && value.trim() === '');
}

function parsePage(value: number | string): number | undefined {
    if (typeof value === 'number') {
        return Number.isInteger(value) ? value : undefined;
    }
    const trimmed = value.trim();
    return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Validate a run request against the loaded document.
 *
 * Page fields come straight from user input: numbers or numeric strings, with
 * empty strings treated as absent. Leaving both out selects the whole document.
 * An unusable batch size falls back to the default with a warning instead of
 * rejecting the run.
 */
export function resolveRunPlan(
    options: StartRunOptions,
    pageCount: number,
    defaultBatchSize: number,
    logger: Logger
): RunPlan {
    const { fromPage, toPage } = options;
    let startPage = 1;
    let endPage = pageCount;

    if (isAbsent(fromPage) !== isAbsent(toPage)) {
        throw new ValidationError("Both 'from' and 'to' must be filled or both empty.", 'pageRange');
    }

    if (!isAbsent(fromPage) && !isAbsent(toPage)) {
        const from = parsePage(fromPage);
        const to = parsePage(toPage);

        if (from === undefined || to === undefined) {
            throw new ValidationError('Page numbers must be integers.', 'pageRange', { fromPage, toPage });
        }
        if (from < 1 || from > pageCount) {
            throw new ValidationError(`'From' page must be 1-${pageCount}.`, 'fromPage', { fromPage: from });
        }
        if (to < 1 || to > pageCount) {
            throw new ValidationError(`'To' page must be 1-${pageCount}.`, 'toPage', { toPage: to });
        }
        if (from > to) {
            throw new ValidationError("'From' page > 'to' page.", 'pageRange', { fromPage: from, toPage: to });
        }

        startPage = from;
        endPage = to;
    }

    return { startPage, endPage, batchSize: resolveBatchSize(options.batchSize, defaultBatchSize, logger) };
}

function resolveBatchSize(requested: number | undefined, fallback: number, logger: Logger): number {
    if (requested === undefined) {
        return fallback;
    }
    if (Number.isInteger(requested) && requested > 0) {
        return requested;
    }

    logger.warn('Invalid batch size, using default', {
        requested,
        batchSize: fallback,
    });
    return fallback;
}
