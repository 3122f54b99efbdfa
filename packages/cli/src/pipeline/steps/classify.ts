import { classifyAll } from '@card-ledger/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 5: Classification
 * Labels every transaction with the workspace rule table.
 */
export const classifyTransactions: PipelineStep = async (state) => {
    const { stats } = classifyAll(state.transactions, state.rules);
    state.classificationStats = stats;
    return state;
};
