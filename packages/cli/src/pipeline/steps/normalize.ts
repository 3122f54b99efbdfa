import { detectSource, LedgerError } from '@card-ledger/core';
import type { PipelineStep } from '../types.js';
import { readArrayBuffer } from '../../utils/files.js';

/**
 * Step 3: Normalization
 * Reads each matched file and runs its source adapter. A file that fails
 * (undecodable, missing columns) is reported and contributes no records.
 */
export const normalizeFiles: PipelineStep = async (state) => {
    for (const file of state.files) {
        if (file.sourceName === undefined) {
            continue;
        }

        const detection = detectSource(file.filename, state.settings.sources);
        if (!detection) {
            state.warnings.push(`Source lost for file: ${file.filename}`);
            continue;
        }

        try {
            const data = await readArrayBuffer(file.path);
            const result = detection.adapter(data, {
                sourceFile: file.filename,
                originTag: detection.source.origin_tag,
                encodings: state.settings.encodings,
                excludedCategories: detection.source.excluded_categories,
            });

            state.normalizeResults[file.filename] = result;
            state.batches.push(result.records);
            state.statistics.rawRecordCount += result.records.length;
            state.statistics.excludedRowCount += result.excludedRows;
            state.statistics.skippedRowCount += result.skippedRows;

            // Forward adapter warnings to pipeline state
            for (const warning of result.warnings) {
                state.warnings.push(`[${file.filename}] ${warning}`);
            }
        } catch (err) {
            const code = err instanceof LedgerError ? ` (${err.code})` : '';
            state.errors.push({
                step: 'normalize',
                message: `Failed to read ${file.filename}${code}: ${err instanceof Error ? err.message : String(err)}`,
                fatal: false,
                error: err,
            });
        }
    }

    return state;
};
