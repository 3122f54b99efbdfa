import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import type { ZodError } from 'zod';
import {
    RuleTableSchema,
    WorkspaceSettingsSchema,
    type RuleTable,
    type WorkspaceSettings,
} from '@card-ledger/shared';
import type { Workspace } from '../types.js';
import { DEFAULT_RULES_ASSET, EXTRACTION_PROMPT_ASSET, resolveAssetPath } from './paths.js';

/**
 * Loads workspace settings (config/card-ledger.yaml).
 * An empty file yields the defaults.
 */
export function loadSettings(workspace: Workspace): WorkspaceSettings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        throw new Error(`Settings file not found: ${path}`);
    }

    const data: unknown = parse(readFileSync(path, 'utf-8'));
    const result = WorkspaceSettingsSchema.safeParse(data ?? {});
    if (!result.success) {
        throw new Error(`Invalid settings in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Path of the rule table in effect: the workspace override when present,
 * otherwise the shipped default.
 */
export function resolveRulesPath(workspace: Workspace): string {
    return existsSync(workspace.config.rulesPath)
        ? workspace.config.rulesPath
        : resolveAssetPath(DEFAULT_RULES_ASSET);
}

/**
 * Loads and validates the classification rule table.
 */
export function loadRuleTable(workspace: Workspace): RuleTable {
    return loadRuleTableFile(resolveRulesPath(workspace));
}

export function loadRuleTableFile(path: string): RuleTable {
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    const result = RuleTableSchema.safeParse(data);
    if (!result.success) {
        throw new Error(`Invalid rule table in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Instruction text sent to the extraction command.
 */
export function loadExtractionPrompt(): string {
    return readFileSync(resolveAssetPath(EXTRACTION_PROMPT_ASSET), 'utf-8');
}

export function formatIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
