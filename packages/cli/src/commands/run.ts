import type { DocumentExtractor } from '@card-ledger/core';
import { extractStatements } from './extract.js';
import { processStatements } from './process.js';
import type { ProcessOptions } from '../types.js';

/**
 * Extraction followed by processing. Processing is skipped when extraction
 * cannot start.
 */
export async function runAll(options: ProcessOptions, extractor?: DocumentExtractor): Promise<number> {
    const code = await extractStatements({ workspace: options.workspace }, extractor);
    if (code !== 0) {
        return code;
    }
    return processStatements(options);
}
