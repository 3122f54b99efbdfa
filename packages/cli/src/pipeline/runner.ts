import type { RuleTable, WorkspaceSettings } from '@card-ledger/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { outputCheck } from './steps/output-check.js';
import { detectFiles } from './steps/detect.js';
import { normalizeFiles } from './steps/normalize.js';
import { mergeBatches } from './steps/merge.js';
import { classifyTransactions } from './steps/classify.js';
import { validateFinal } from './steps/validate.js';
import { exportResults } from './steps/export.js';
import { error, log } from '../utils/console.js';
import type { Workspace, ProcessOptions } from '../types.js';

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    workspace: Workspace,
    settings: WorkspaceSettings,
    rules: RuleTable,
    options: ProcessOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        workspace,
        options,
        settings,
        rules,
        files: [],
        normalizeResults: {},
        batches: [],
        transactions: [],
        outputs: [],
        warnings: [],
        errors: [],
        statistics: {
            rawRecordCount: 0,
            excludedRowCount: 0,
            skippedRowCount: 0,
        },
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Output Check', fn: outputCheck },
        { name: 'File Detection', fn: detectFiles },
        { name: 'Normalization', fn: normalizeFiles },
        { name: 'Merge', fn: mergeBatches },
        { name: 'Classification', fn: classifyTransactions },
        { name: 'Final Validation', fn: validateFinal },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        log(`\n→ Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
