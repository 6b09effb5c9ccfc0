import * as fs from 'fs/promises';
import { PageScribeError, ValidationError, toError } from '../../errors/index.js';

/**
 * Join committed batch texts into the saved document text
 */
export function composeResults(committed: readonly string[]): string {
    return committed.join('\n').trim();
}

/**
 * Write committed text as UTF-8, replacing any existing file.
 * Returns the number of characters written.
 */
export async function saveResults(outputPath: string, committed: readonly string[]): Promise<number> {
    const text = composeResults(committed);

    if (!text) {
        throw new ValidationError('There is no text content to save.', 'results');
    }

    try {
        await fs.writeFile(outputPath, text, { encoding: 'utf-8' });
    } catch (error) {
        const cause = toError(error);
        throw new PageScribeError(
            `Failed to save file: ${cause.message}`,
            'IO_ERROR',
            { outputPath },
            { cause, operation: 'saveResults' }
        );
    }

    return text.length;
}
