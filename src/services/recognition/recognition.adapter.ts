import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { RasterImage } from '../../types/renderer.types.js';
import type {
    IRecognitionBackend,
    RecognitionOutcome,
    StagedImage,
} from '../../types/recognition.types.js';
import { RecognitionError, toError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { normalizeResponse } from './response-normalizer.js';

/**
 * Turns one rendered page into normalized text.
 *
 * The page image is staged as a file in a fresh temp directory for the
 * duration of the backend call and removed afterwards on every exit path.
 * Failures never escape: they come back as `{ ok: false, error }`.
 */
export class RecognitionAdapter {
    private readonly backend: IRecognitionBackend;
    private readonly prompt: string;
    private readonly logger: Logger;

    constructor(backend: IRecognitionBackend, prompt: string, logger: Logger) {
        this.backend = backend;
        this.prompt = prompt;
        this.logger = logger;
    }

    async recognize(image: RasterImage, signal?: AbortSignal): Promise<RecognitionOutcome> {
        const pageNumber = image.pageNumber;
        let stagingDir: string | undefined;

        try {
            stagingDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pagescribe-'));
            const staged = await stageImage(stagingDir, image);

            const response = await this.backend.recognize({
                image: staged,
                prompt: this.prompt,
                signal,
            });

            const { text, shape } = normalizeResponse(response, this.logger, { pageNumber });
            return { ok: true, text, shape };
        } catch (error) {
            const cause = toError(error);
            this.logger.warn('Page recognition failed', {
                pageNumber,
                backend: this.backend.id,
                error: cause.message,
            });
            return {
                ok: false,
                error: new RecognitionError(cause.message, { pageNumber, cause }),
            };
        } finally {
            if (stagingDir) {
                await this.removeStagingDir(stagingDir, pageNumber);
            }
        }
    }

    private async removeStagingDir(dir: string, pageNumber: number): Promise<void> {
        try {
            await fs.rm(dir, { recursive: true, force: true });
        } catch (error) {
            this.logger.warn('Could not remove staged page image', {
                pageNumber,
                path: dir,
                error: toError(error).message,
            });
        }
    }
}

async function stageImage(dir: string, image: RasterImage): Promise<StagedImage> {
    const filePath = path.join(dir, 'page.png');
    await fs.writeFile(filePath, image.data);

    return {
        path: filePath,
        mimeType: image.mimeType,
        read: () => fs.readFile(filePath),
    };
}
