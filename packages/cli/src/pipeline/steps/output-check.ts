import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getAnalysisPath, getManifestPath, getOutputFilePath } from '../../workspace/paths.js';

/**
 * Step 1: Output Check
 * Prevents accidental overwrite of earlier outputs unless --force is used.
 */
export const outputCheck: PipelineStep = async (state) => {
    if (state.options.dryRun || state.options.force) {
        return state;
    }

    const existing = [
        getOutputFilePath(state.workspace, state.settings.output.filename),
        getAnalysisPath(state.workspace),
        getManifestPath(state.workspace),
    ].filter((p) => existsSync(p));

    if (existing.length > 0) {
        state.errors.push({
            step: 'output-check',
            message: `Outputs already exist (found: ${existing.map((p) => basename(p)).join(', ')}). Use --force to overwrite.`,
            fatal: true,
        });
    }

    return state;
};
