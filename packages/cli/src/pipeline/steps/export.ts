import { mkdir, writeFile } from 'node:fs/promises';
import { sortByDate, summarize, toCanonicalCsv } from '@card-ledger/core';
import { MANIFEST_VERSION, RunManifestSchema } from '@card-ledger/shared';
import type { RunManifest } from '@card-ledger/shared';
import type { PipelineStep } from '../types.js';
import { getAnalysisPath, getManifestPath, getOutputFilePath } from '../../workspace/paths.js';
import { generateAnalysisExcel } from '../../excel/analysis.js';

/**
 * Step 7: Export
 * Writes the canonical CSV (date order), the analysis workbook and the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    state.transactions = sortByDate(state.transactions);

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const outputPath = state.workspace.outputs;

    try {
        await mkdir(outputPath, { recursive: true });

        // 1. Canonical CSV
        const csvPath = getOutputFilePath(state.workspace, state.settings.output.filename);
        await writeFile(csvPath, toCanonicalCsv(state.transactions), 'utf-8');
        state.outputs.push(csvPath);

        // 2. Analysis workbook
        const analysisPath = getAnalysisPath(state.workspace);
        const workbook = await generateAnalysisExcel(state.transactions);
        await workbook.xlsx.writeFile(analysisPath);
        state.outputs.push(analysisPath);

        // 3. Run manifest
        const summary = summarize(state.transactions);
        const manifest: RunManifest = RunManifestSchema.parse({
            run_timestamp: new Date().toISOString(),
            input_files: Object.fromEntries(
                state.files.filter((f) => f.sourceName !== undefined).map((f) => [f.filename, f.hash])
            ),
            transaction_count: summary.count,
            label_counts: Object.fromEntries(summary.byLabel.map((b) => [b.key, b.count])),
            origin_counts: Object.fromEntries(summary.byOrigin.map((b) => [b.key, b.count])),
            date_range: summary.dateRange,
            version: MANIFEST_VERSION,
        });

        const manifestPath = getManifestPath(state.workspace);
        await writeFile(manifestPath, JSON.stringify(manifest, null, 2));
        state.outputs.push(manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
