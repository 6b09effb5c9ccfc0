#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { PageScribeConfig, RecognitionProvider } from '../types/config.types.js';
import { RunStatusEnum } from '../types/enums.js';
import { PageScribeError, toError } from '../errors/index.js';
import { getEnvInfo } from '../config/env.js';
import { VERSION } from '../config/constants.js';
import { PageScribeFactory } from '../page-scribe.factory.js';
import type { PageScribe } from '../page-scribe.js';

const program = new Command();

program
    .name('pagescribe')
    .description('pagescribe CLI - Convert scanned documents to text with a vision model')
    .version(VERSION);

interface RecognitionOptions {
    provider?: string;
    model?: string;
    baseUrl?: string;
    dpi?: number;
    verbose?: boolean;
}

function normalizeProvider(provider?: string): RecognitionProvider | undefined {
    if (provider === undefined) {
        return undefined;
    }
    const normalized = provider.toLowerCase();
    if (normalized === 'openai' || normalized === 'gemini') {
        return normalized;
    }
    throw new Error(`Unknown recognition provider: ${provider}`);
}

function buildConfig(options: RecognitionOptions): PageScribeConfig {
    return {
        recognition: {
            provider: normalizeProvider(options.provider),
            model: options.model,
            baseUrl: options.baseUrl,
        },
        renderConfig: options.dpi !== undefined ? { dpi: options.dpi } : undefined,
        logging: {
            structured: false,
            level: options.verbose ? 'debug' : 'warn',
        },
    };
}

function parseInteger(value: string): number {
    return Number(value);
}

function fail(error: unknown): never {
    const err = toError(error);
    console.error(`Error: ${err.message}`);
    if (err instanceof PageScribeError && err.details && getEnvInfo().logLevel === 'debug') {
        console.error(JSON.stringify(err.toJSON(), null, 2));
    }
    process.exit(1);
}

async function openDocument(file: string, options: RecognitionOptions): Promise<PageScribe> {
    const scribe = PageScribeFactory.create(buildConfig(options));
    const info = await scribe.loadDocument(path.resolve(file));
    if (info.pageCount === 0) {
        throw new Error(`No pages found in ${file} (type ${info.fileType}).`);
    }
    return scribe;
}

program
    .command('info')
    .description('Show the detected type and page count of a document')
    .argument('<file>', 'Document to inspect')
    .action(async (file: string) => {
        try {
            const scribe = PageScribeFactory.create({ logging: { structured: false, level: 'warn' } });
            const info = await scribe.loadDocument(path.resolve(file));
            const envInfo = getEnvInfo();

            console.log(`File:        ${info.filePath}`);
            console.log(`Type:        ${info.fileType}`);
            console.log(`Pages:       ${info.pageCount}`);
            if (info.renderPath !== info.filePath) {
                console.log(`Rendered as: ${info.renderPath}`);
            }
            console.log('');
            console.log(`OpenAI key:  ${envInfo.openaiConfigured ? 'set' : 'not set'}`);
            console.log(`OpenAI URL:  ${envInfo.openaiBaseUrl ?? '(default)'}`);
            console.log(`Gemini key:  ${envInfo.geminiConfigured ? 'set' : 'not set'}`);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('preview')
    .description('Render one page to a PNG file')
    .argument('<file>', 'Document to render')
    .argument('<page>', 'Page number (1-based)', parseInteger)
    .option('-o, --output <path>', 'Output PNG path')
    .option('--dpi <dpi>', 'Render resolution', parseInteger)
    .action(async (file: string, page: number, options: RecognitionOptions & { output?: string }) => {
        try {
            const scribe = await openDocument(file, options);
            const image = await scribe.getPage(page - 1);
            const output = options.output ?? `${path.parse(file).name}-page-${page}.png`;

            await fs.writeFile(output, image.data);
            console.log(`Page ${page} (${image.width}x${image.height}) written to ${output}`);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('convert')
    .description('Recognize the text of a page range and save it')
    .argument('<file>', 'Document to convert')
    .option('-f, --from <page>', 'First page (1-based)')
    .option('-t, --to <page>', 'Last page (1-based)')
    .option('-b, --batch-size <pages>', 'Pages rendered per batch', parseInteger)
    .option('-o, --output <path>', 'Output text file')
    .option('--provider <provider>', 'Recognition provider: openai, gemini')
    .option('--model <model>', 'Vision model name')
    .option('--base-url <url>', 'OpenAI-compatible server URL')
    .option('--dpi <dpi>', 'Render resolution', parseInteger)
    .option('-v, --verbose', 'Debug logging')
    .action(async (
        file: string,
        options: RecognitionOptions & { from?: string; to?: string; batchSize?: number; output?: string }
    ) => {
        try {
            const scribe = await openDocument(file, options);
            const output = options.output ?? `${path.parse(file).name}.txt`;

            scribe.events.on('status:changed', ({ message }) => console.log(message));
            scribe.events.on('run:error', ({ kind, message }) => {
                if (kind !== 'recognition') {
                    console.error(`[${kind}] ${message}`);
                }
            });

            const onInterrupt = (): void => {
                if (!scribe.cancelRun()) {
                    process.exit(130);
                }
            };
            process.once('SIGINT', onInterrupt);

            const result = await scribe.startRun({
                fromPage: options.from,
                toPage: options.to,
                batchSize: options.batchSize,
            });
            process.off('SIGINT', onInterrupt);

            if (scribe.getResults()) {
                const written = await scribe.saveResults(output);
                console.log(`Saved ${written} characters to ${output}`);
            } else {
                console.log('No text was recognized; nothing saved.');
            }

            if (result.status === RunStatusEnum.FAILED) {
                process.exit(1);
            }
            if (result.status === RunStatusEnum.CANCELLED) {
                process.exit(130);
            }
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync(process.argv).catch(fail);
