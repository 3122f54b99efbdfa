import type { RuleTable, WorkspaceSettings } from '@card-ledger/shared';
import { openWorkspace } from '../workspace/detect.js';
import { loadRuleTable, loadSettings, resolveRulesPath } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { ProcessOptions } from '../types.js';

/**
 * Runs the normalize → merge → classify → export pipeline over imports/.
 *
 * @returns process exit code
 */
export async function processStatements(options: ProcessOptions): Promise<number> {
    log('\nCard Ledger - Processing statements');

    arrow('Detecting workspace...');
    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        return 1;
    }
    success(`Workspace: ${workspace.root}`);

    let settings: WorkspaceSettings;
    let rules: RuleTable;
    try {
        settings = loadSettings(workspace);
        rules = loadRuleTable(workspace);
    } catch (err) {
        error(`Failed to load configuration. ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }
    arrow(`Rules: ${resolveRulesPath(workspace)}`);

    const state = await runPipeline(workspace, settings, rules, options);

    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }
    if (state.errors.some((e) => e.fatal)) {
        log('\n✖ Processing failed with fatal errors.');
        return 1;
    }

    success('Processing complete.');
    arrow(`Total transactions: ${state.transactions.length}`);
    if (state.classificationStats) {
        arrow(`Relabeled by rules: ${state.classificationStats.relabeled}`);
        arrow(`Protected: ${state.classificationStats.protected}`);
    }

    if (state.options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    } else {
        for (const output of state.outputs) {
            arrow(`Wrote ${output}`);
        }
    }

    return 0;
}
