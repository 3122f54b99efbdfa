import { readFile } from 'node:fs/promises';
import { MissingInputError, readCanonicalCsv, summarize } from '@card-ledger/core';
import type { SummaryBucket } from '@card-ledger/core';
import { openWorkspace } from '../workspace/detect.js';
import { getOutputFilePath } from '../workspace/paths.js';
import { loadSettings } from '../workspace/config.js';
import { isNotFound } from '../utils/files.js';
import { log, warn, arrow, error } from '../utils/console.js';
import type { SummaryOptions } from '../types.js';

/**
 * Prints spending totals from the canonical output.
 *
 * A missing output is reported as MissingInputError and is not a failure.
 *
 * @returns process exit code
 */
export async function showSummary(options: SummaryOptions): Promise<number> {
    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        return 1;
    }

    let outputPath: string;
    try {
        outputPath = getOutputFilePath(workspace, loadSettings(workspace).output.filename);
    } catch (err) {
        error(`Failed to load configuration. ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }

    let text: string;
    try {
        text = await readFile(outputPath, 'utf-8');
    } catch (err) {
        if (!isNotFound(err)) {
            throw err;
        }
        const missing = new MissingInputError(outputPath, 'summary');
        warn(`${missing.message}. Run "cardledger process" first.`);
        return 0;
    }

    const { transactions, warnings } = readCanonicalCsv(text);
    for (const w of warnings) {
        warn(w);
    }

    const summary = summarize(transactions);
    log(`\nTransactions: ${summary.count}`);
    log(`Total spend:  ${summary.total}`);
    if (summary.dateRange) {
        log(`Date range:   ${summary.dateRange.first} to ${summary.dateRange.last}`);
    }

    printBuckets('By label', summary.byLabel);
    printBuckets('By origin', summary.byOrigin);
    printBuckets('By month', summary.byMonth);

    return 0;
}

function printBuckets(title: string, buckets: SummaryBucket[]): void {
    log(`\n${title}:`);
    const width = Math.max(0, ...buckets.map((b) => b.key.length));
    for (const bucket of buckets) {
        arrow(`${bucket.key.padEnd(width)}  ${bucket.total.padStart(10)}  (${bucket.count})`);
    }
}
