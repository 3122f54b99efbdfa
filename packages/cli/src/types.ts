/**
 * Card Ledger CLI - Core Types
 */

export interface ProcessOptions {
    dryRun: boolean;
    force: boolean;
    workspace?: string;
}

export interface ExtractOptions {
    workspace?: string;
}

export interface SummaryOptions {
    workspace?: string;
}

export interface AddRuleOptions {
    group: string;
    note?: string;
    workspace?: string;
}

export interface WorkspaceConfig {
    /** Workspace settings; its presence marks the workspace root. */
    settingsPath: string;
    /** Optional rule table override. */
    rulesPath: string;
}

export interface Workspace {
    root: string;
    imports: string;
    outputs: string;
    config: WorkspaceConfig;
}
