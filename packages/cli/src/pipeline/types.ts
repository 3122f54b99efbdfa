import type {
    NormalizeResult,
    RawRecord,
    RuleTable,
    Transaction,
    WorkspaceSettings,
} from '@card-ledger/shared';
import type { ClassificationStats } from '@card-ledger/core';
import type { Workspace, ProcessOptions } from '../types.js';

/**
 * Metadata for an input file discovered in the imports directory.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
    /** Name of the configured source the file matched. */
    sourceName?: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    workspace: Workspace;
    options: ProcessOptions;
    settings: WorkspaceSettings;
    rules: RuleTable;

    // Accumulated during pipeline execution
    files: InputFile[];
    normalizeResults: Record<string, NormalizeResult>;
    /** One batch of records per file, in file order. */
    batches: RawRecord[][];
    transactions: Transaction[];
    classificationStats?: ClassificationStats;
    /** Files written by the export step. */
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
    statistics: {
        rawRecordCount: number;
        excludedRowCount: number;
        skippedRowCount: number;
    };
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
