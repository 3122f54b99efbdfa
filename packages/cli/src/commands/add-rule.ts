import { readFile } from 'node:fs/promises';
import { checkPatternCollision, collectPatterns, readCanonicalCsv, validatePattern } from '@card-ledger/core';
import type { ClassificationRule, Transaction } from '@card-ledger/shared';
import { openWorkspace } from '../workspace/detect.js';
import { DEFAULT_RULES_ASSET, getOutputFilePath, resolveAssetPath } from '../workspace/paths.js';
import { loadRuleTable, loadSettings } from '../workspace/config.js';
import { appendRuleToGroup } from '../yaml/rules.js';
import { isNotFound } from '../utils/files.js';
import { success, log, arrow, warn, error } from '../utils/console.js';
import type { AddRuleOptions, Workspace } from '../types.js';

/**
 * Adds a pattern → label rule to config/rules.yaml.
 *
 * Collisions with existing patterns and overly broad patterns are
 * reported but do not block the addition.
 *
 * @returns process exit code
 */
export async function addRule(pattern: string, label: string, options: AddRuleOptions): Promise<number> {
    const validation = validatePattern(pattern);
    if (!validation.valid) {
        error(`Error: ${validation.errors.join(', ')}`);
        return 1;
    }
    if (label.trim() === '') {
        error('Error: Label cannot be empty');
        return 1;
    }

    const workspace = openWorkspace(options.workspace);
    if (!workspace) {
        return 1;
    }
    const rulesPath = workspace.config.rulesPath;

    try {
        const collision = checkPatternCollision(pattern, collectPatterns(loadRuleTable(workspace)));
        if (collision.hasCollision) {
            warn('Pattern collision detected.');
            for (const existing of collision.collisions) {
                log(`  "${pattern}" overlaps "${existing.pattern}" → ${existing.label} (group ${existing.groupId})`);
            }
        }

        const breadth = validatePattern(pattern, await loadCanonicalTransactions(workspace));
        for (const w of breadth.warnings) {
            warn(w);
        }
    } catch (err) {
        error(`Failed to load configuration. ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }

    const rule: ClassificationRule = {
        patterns: [pattern],
        label,
        ...(options.note ? { note: options.note } : {}),
        added_date: new Date().toISOString().split('T')[0],
    };

    log(`Adding new rule to: ${rulesPath}`);

    try {
        await appendRuleToGroup(rulesPath, resolveAssetPath(DEFAULT_RULES_ASSET), options.group, rule);
    } catch (err) {
        error(`Failed to add rule: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }

    success('Rule successfully added!');
    arrow(`Pattern: "${pattern}"`);
    arrow(`Label:   ${label}`);
    arrow(`Group:   ${options.group}`);
    if (options.note) {
        arrow(`Note:    ${options.note}`);
    }

    return 0;
}

/**
 * Transactions of the last processed run, for the breadth check.
 */
async function loadCanonicalTransactions(workspace: Workspace): Promise<Transaction[]> {
    const outputPath = getOutputFilePath(workspace, loadSettings(workspace).output.filename);
    try {
        return readCanonicalCsv(await readFile(outputPath, 'utf-8')).transactions;
    } catch (err) {
        if (isNotFound(err)) {
            return [];
        }
        throw err;
    }
}
