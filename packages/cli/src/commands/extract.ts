import type { DocumentExtractor } from '@card-ledger/core';
import type { WorkspaceSettings } from '@card-ledger/shared';
import { CommandExtractor } from '../extraction/command-extractor.js';
import { runExtraction } from '../extraction/extract-documents.js';
import { openWorkspace } from '../workspace/detect.js';
import { loadExtractionPrompt, loadSettings } from '../workspace/config.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { ExtractOptions } from '../types.js';

/**
 * Extracts transactions from the statements in the configured document
 * folders into imports/.
 *
 * @param extractor - Overrides the configured extraction command
 * @returns process exit code
 */
export async function extractStatements(options: ExtractOptions, extractor?: DocumentExtractor): Promise<number> {
    log('\nCard Ledger - Extracting statements');

    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        return 1;
    }

    let settings: WorkspaceSettings;
    try {
        settings = loadSettings(workspace);
    } catch (err) {
        error(`Failed to load configuration. ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }

    const extraction = settings.extraction;
    if (!extraction) {
        error(`No "extraction" section in ${workspace.config.settingsPath}.`);
        return 1;
    }

    const result = await runExtraction(
        workspace,
        extraction,
        extractor ?? new CommandExtractor(extraction, loadExtractionPrompt(), workspace.root)
    );

    for (const w of result.warnings) {
        warn(w);
    }
    for (const failure of result.failures) {
        warn(failure.message);
        if (failure.responsePreview) {
            log(`  Response was: ${failure.responsePreview}...`);
        }
    }

    success(`Extracted ${result.records.length} transactions from ${result.documentCount} document(s).`);
    if (result.outputPath) {
        arrow(`Saved to ${result.outputPath}`);
    } else {
        log('No transactions to save.');
    }

    return 0;
}
