import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import { ToolingUnavailableError, toError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

/**
 * Converts a flow or presentation document to an intermediate PDF
 */
export interface IDocumentConverter {
    convertToPdf(filePath: string, fileType: string): Promise<string>;
    /** Remove converted files, except the one at `keepPath` */
    release?(keepPath?: string): Promise<void>;
}

export interface LibreOfficeConverterOptions {
    /** soffice executable (default: "soffice" on PATH) */
    binary?: string;
    /** Directory for converted files (default: a temp directory) */
    outputDir?: string;
    timeoutMs?: number;
}

/**
 * Headless LibreOffice conversion (`soffice --convert-to pdf`).
 * The converted file doubles as the render source for the document.
 *
 * Temp directories it creates are tracked until `release` removes them.
 */
export class LibreOfficeConverter implements IDocumentConverter {
    private readonly binary: string;
    private readonly outputDir?: string;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly tempDirs = new Set<string>();

    constructor(logger: Logger, options: LibreOfficeConverterOptions = {}) {
        this.binary = options.binary ?? 'soffice';
        this.outputDir = options.outputDir;
        this.timeoutMs = options.timeoutMs ?? 120000;
        this.logger = logger;
    }

    async convertToPdf(filePath: string, fileType: string): Promise<string> {
        const outDir = this.outputDir ?? await this.createTempDir();

        try {
            await execFileAsync(
                this.binary,
                ['--headless', '--convert-to', 'pdf', '--outdir', outDir, filePath],
                { timeout: this.timeoutMs }
            );
        } catch (error) {
            await this.removeTempDir(outDir);
            const cause = toError(error);
            if ('code' in cause && cause.code === 'ENOENT') {
                throw new ToolingUnavailableError(
                    this.binary,
                    fileType,
                    `Install LibreOffice (soffice) to handle ${fileType} files.`,
                    cause
                );
            }
            throw cause;
        }

        const pdfPath = path.join(outDir, `${path.parse(filePath).name}.pdf`);
        try {
            await fs.access(pdfPath);
        } catch (error) {
            await this.removeTempDir(outDir);
            throw error;
        }

        this.logger.debug('Converted document to PDF', { source: filePath, pdfPath });
        return pdfPath;
    }

    async release(keepPath?: string): Promise<void> {
        for (const dir of [...this.tempDirs]) {
            if (keepPath !== undefined && path.dirname(keepPath) === dir) {
                continue;
            }
            await this.removeTempDir(dir);
        }
    }

    private async createTempDir(): Promise<string> {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pagescribe-convert-'));
        this.tempDirs.add(dir);
        return dir;
    }

    private async removeTempDir(dir: string): Promise<void> {
        if (!this.tempDirs.delete(dir)) {
            return;
        }
        try {
            await fs.rm(dir, { recursive: true, force: true });
        } catch (error) {
            this.logger.warn('Could not remove converted document', {
                dir,
                error: toError(error).message,
            });
        }
    }
}
