/**
 * 02 - Cancellation and Partial Results
 *
 * Cancels a run after the first committed batch. Batches committed before
 * the cancel are kept and can be saved; the in-flight batch is discarded.
 *
 * Run: npx tsx examples/02-cancellation.ts ./scan.pdf
 */

import { createPageScribe, RunInProgressError } from '../src/index.js';

async function main(): Promise<void> {
    const filePath = process.argv[2] ?? './scan.pdf';

    const scribe = createPageScribe({
        batchConfig: { pagesPerBatch: 2 },
        logging: { level: 'warn' },
    });

    scribe.events.on('page:progress', ({ pageNumber, pagesAttempted, totalPages }) => {
        console.log(`   page ${pageNumber} (${pagesAttempted}/${totalPages})`);
    });
    scribe.events.once('batch:committed', ({ pageRange }) => {
        console.log(`   committed pages ${pageRange.start}-${pageRange.end}, cancelling`);
        scribe.cancelRun();
    });

    await scribe.loadDocument(filePath);

    const run = scribe.startRun();

    // Only one run at a time; a second start is rejected immediately
    try {
        scribe.startRun();
    } catch (error) {
        if (error instanceof RunInProgressError) {
            console.log(`   second run rejected: ${error.message}`);
        } else {
            throw error;
        }
    }

    const result = await run;
    console.log(`\nStatus: ${result.status}`);
    console.log(`Committed batches: ${result.committed.length}`);
    console.log(scribe.getResults());
}

main().catch(console.error);
