/**
 * 01 - Basic Usage
 *
 * The simplest way to use pagescribe:
 * 1. Create a session with createPageScribe()
 * 2. Load a document
 * 3. Convert a page range and save the text
 *
 * Needs an OpenAI-compatible vision server (LM Studio on port 1234 by default).
 *
 * Run: npx tsx examples/01-basic-usage.ts ./scan.pdf
 */

import { createPageScribe } from '../src/index.js';

async function main(): Promise<void> {
    const filePath = process.argv[2] ?? './scan.pdf';

    console.log('pagescribe Basic Usage Example\n');
    console.log('='.repeat(50));

    // 1. Initialize
    const scribe = createPageScribe({
        recognition: {
            provider: 'openai',
            baseUrl: 'http://localhost:1234/v1',
        },
        batchConfig: { pagesPerBatch: 5 },
        logging: { level: 'warn' },
    });

    scribe.events.on('status:changed', ({ message }) => console.log(`   ${message}`));
    scribe.events.on('run:error', ({ kind, message }) => console.log(`   [${kind}] ${message}`));

    // 2. Load the document
    const info = await scribe.loadDocument(filePath);
    console.log(`\nLoaded ${info.fileType} with ${info.pageCount} pages`);

    // 3. Convert the first pages
    const result = await scribe.startRun({ fromPage: 1, toPage: Math.min(3, info.pageCount) });

    console.log(`\nStatus: ${result.status}`);
    console.log(`   Pages attempted: ${result.pagesAttempted}/${result.totalPages}`);
    console.log(`   Processing time: ${result.processingMs}ms`);

    // 4. Save
    if (scribe.getResults()) {
        const written = await scribe.saveResults(`${filePath}.txt`);
        console.log(`\nSaved ${written} characters to ${filePath}.txt`);
    }
}

main().catch(console.error);
