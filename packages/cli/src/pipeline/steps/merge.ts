import { mergeRecords } from '@card-ledger/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Merge
 * Concatenates adapter batches into canonical transactions.
 */
export const mergeBatches: PipelineStep = async (state) => {
    state.transactions = mergeRecords(state.batches);
    return state;
};
