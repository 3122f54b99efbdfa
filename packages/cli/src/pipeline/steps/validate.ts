import type { PipelineStep } from '../types.js';
import { table } from '../../utils/console.js';

/**
 * Step 6: Final Validation
 * Reconciles row counts across adapters, merge and classification.
 */
export const validateFinal: PipelineStep = async (state) => {
    const { rawRecordCount, excludedRowCount, skippedRowCount } = state.statistics;
    const merged = state.transactions.length;

    const stats = state.classificationStats;
    table('Transaction Reconciliation', [
        ['Adapter records', rawRecordCount],
        ['Excluded rows', excludedRowCount],
        ['Skipped rows', skippedRowCount],
        ['Merged', merged],
        ['Relabeled', stats?.relabeled ?? 0],
        ['Protected', stats?.protected ?? 0],
    ]);

    if (merged !== rawRecordCount) {
        state.warnings.push(`Reconciliation discrepancy: Expected ${rawRecordCount} transactions, but found ${merged}.`);
    }

    if (stats && stats.total !== merged) {
        state.warnings.push(`Classification saw ${stats.total} transactions, expected ${merged}.`);
    }

    if (merged === 0 && state.errors.length === 0) {
        state.errors.push({
            step: 'validate',
            message: 'No transactions were processed. Are the source files empty?',
            fatal: true,
        });
    }

    return state;
};
