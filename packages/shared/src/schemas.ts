/**
 * Zod schemas for Card Ledger data structures.
 *
 * IMPORTANT: Money is stored as decimal strings, never native numbers.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import {
    DEFAULT_ENCODINGS,
    DEFAULT_EXCLUDED_CATEGORIES,
    DEFAULT_OUTPUT_FILE,
    EXTRACTION,
    RESERVED_GROUP_IDS,
    RULE_STAGES,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Non-negative decimal amount as string. Purchases are positive.
 */
const amountString = z.string().regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal string');

/**
 * Threshold bound: YAML may give it as a number, the engine wants a string.
 */
const decimalBound = z
    .union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be a decimal')])
    .transform((value) => String(value));

const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

const regexString = z.string().min(1).refine(
    (value) => {
        try {
            new RegExp(value);
            return true;
        } catch {
            return false;
        }
    },
    { message: 'Must be a valid regular expression' }
);

// ============================================================================
// Record Schemas
// ============================================================================

/**
 * Adapter output, one per purchase line of a source file.
 * `date` is ISO when it parsed, otherwise the original text.
 */
export const RawRecordSchema = z.object({
    date: z.string(),
    description: z.string(),
    amount: amountString,
    category: z.string().nullable(),
    origin_tag: z.string().min(1),
    source_file: z.string(),
});

export type RawRecord = z.infer<typeof RawRecordSchema>;

/**
 * Canonical transaction. `label` is the only field classification touches.
 */
export const TransactionSchema = z.object({
    date: z.string(),
    description: z.string(),
    amount: amountString,
    category: z.string().min(1),
    origin_tag: z.string().min(1),
    source_file: z.string(),
    label: z.string().min(1),
});

export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * One item of the extractor's JSON array.
 */
export const ExtractedRecordSchema = z.object({
    date: z.string(),
    description: z.string(),
    amount: z.union([z.number(), z.string()]),
    category: z.string().nullish(),
});

export type ExtractedRecord = z.infer<typeof ExtractedRecordSchema>;

/**
 * Result returned by source adapters.
 * Adapters return data, not side effects. Warnings are returned as data.
 */
export const NormalizeResultSchema = z.object({
    records: z.array(RawRecordSchema),
    warnings: z.array(z.string()),
    /** Rows dropped because a value could not be read. */
    skippedRows: z.number().int().min(0),
    /** Rows dropped on purpose: credits, payments, rebates. */
    excludedRows: z.number().int().min(0),
    /** Encoding the file was decoded with, or "binary" for workbooks. */
    encoding: z.string().optional(),
});

export type NormalizeResult = z.infer<typeof NormalizeResultSchema>;

// ============================================================================
// Rule Table Schemas
// ============================================================================

/**
 * Amount constraint. `min` is inclusive, `max` exclusive.
 */
export const AmountPredicateSchema = z
    .object({
        min: decimalBound.optional(),
        max: decimalBound.optional(),
    })
    .refine((p) => p.min !== undefined || p.max !== undefined, {
        message: 'Amount predicate needs min or max',
    });

export type AmountPredicate = z.infer<typeof AmountPredicateSchema>;

export const ClassificationRuleSchema = z.object({
    patterns: z.array(z.string().min(1)).min(1),
    label: z.string().min(1),
    amount: AmountPredicateSchema.optional(),
    /** Substrings that veto the match when also present. */
    exclude: z.array(z.string().min(1)).optional(),
    /** Label this rule must not overwrite. */
    protect_existing: z.string().min(1).optional(),
    /** Fire only while the label still equals the source category. */
    only_if_unchanged: z.boolean().optional(),
    note: z.string().optional(),
    added_date: isoDateString.optional(),
});

export type ClassificationRule = z.infer<typeof ClassificationRuleSchema>;

export const RuleStageSchema = z.enum(RULE_STAGES);

export type RuleStage = z.infer<typeof RuleStageSchema>;

export const RuleGroupSchema = z.object({
    id: z.string().min(1),
    stage: RuleStageSchema,
    /** Default `protect_existing` for rules of this group. */
    protect_existing: z.string().min(1).optional(),
    rules: z.array(ClassificationRuleSchema),
});

export type RuleGroup = z.infer<typeof RuleGroupSchema>;

/**
 * The protected category, applied first and reasserted last.
 */
export const ProtectedCategorySchema = z.object({
    label: z.string().min(1),
    patterns: z.array(z.string().min(1)).min(1),
    /** Extra patterns used only by the final reassertion pass. */
    reassert_patterns: z.array(z.string().min(1)).optional(),
});

export type ProtectedCategory = z.infer<typeof ProtectedCategorySchema>;

export const RuleTableSchema = z
    .object({
        protected: ProtectedCategorySchema,
        groups: z.array(RuleGroupSchema),
    })
    .superRefine((table, ctx) => {
        const seen = new Set<string>();
        const reservedIds: readonly string[] = RESERVED_GROUP_IDS;
        let lastStage = 0;

        table.groups.forEach((group, index) => {
            if (seen.has(group.id)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Duplicate group id "${group.id}"`,
                    path: ['groups', index, 'id'],
                });
            }
            seen.add(group.id);

            if (reservedIds.includes(group.id)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Group id "${group.id}" is reserved for the protected passes`,
                    path: ['groups', index, 'id'],
                });
            }

            const stageIndex = RULE_STAGES.indexOf(group.stage);
            if (stageIndex < lastStage) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Group "${group.id}" (${group.stage}) is out of stage order; ` +
                        `expected ${RULE_STAGES.join(' -> ')}`,
                    path: ['groups', index, 'stage'],
                });
            }
            lastStage = Math.max(lastStage, stageIndex);

            if (group.stage === 'threshold') {
                group.rules.forEach((rule, ruleIndex) => {
                    if (!rule.amount) {
                        ctx.addIssue({
                            code: z.ZodIssueCode.custom,
                            message: `Threshold rule "${rule.label}" needs an amount predicate`,
                            path: ['groups', index, 'rules', ruleIndex, 'amount'],
                        });
                    }
                });
            }
        });
    });

export type RuleTable = z.infer<typeof RuleTableSchema>;

// ============================================================================
// Workspace Settings Schemas
// ============================================================================

export const AdapterKindSchema = z.enum(['signed_debit', 'signed_amount', 'extracted']);

export type AdapterKind = z.infer<typeof AdapterKindSchema>;

/**
 * A source definition: which files an adapter reads and how they are tagged.
 */
export const SourceSchema = z.object({
    name: z.string().min(1),
    adapter: AdapterKindSchema,
    /** Case-insensitive regular expression tested against the file name. */
    pattern: regexString,
    origin_tag: z.string().min(1),
    excluded_categories: z.array(z.string()).optional(),
});

export type Source = z.infer<typeof SourceSchema>;

export const DEFAULT_SOURCES: Source[] = [
    {
        name: 'capital_one',
        adapter: 'signed_debit',
        pattern: '^CapitalOne.*\\.csv$',
        origin_tag: 'CapitalOne',
    },
    {
        name: 'discover',
        adapter: 'signed_amount',
        pattern: '^Discover.*\\.csv$',
        origin_tag: 'Discover',
        excluded_categories: [...DEFAULT_EXCLUDED_CATEGORIES],
    },
    {
        name: 'chase_extracted',
        adapter: 'extracted',
        pattern: '^Chase_Extracted.*\\.csv$',
        origin_tag: 'Chase',
    },
];

export const DocumentFolderSchema = z.object({
    /** Folder relative to the workspace root. */
    folder: z.string().min(1),
    origin_tag: z.string().min(1),
});

export type DocumentFolder = z.infer<typeof DocumentFolderSchema>;

export const ExtractionSettingsSchema = z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    timeout_ms: z.number().int().positive().default(EXTRACTION.DEFAULT_TIMEOUT_MS),
    output_file: z.string().min(1).default(EXTRACTION.DEFAULT_OUTPUT_FILE),
    documents: z.array(DocumentFolderSchema).default([]),
});

export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;

export const WorkspaceSettingsSchema = z.object({
    encodings: z.array(z.string().min(1)).min(1).default([...DEFAULT_ENCODINGS]),
    sources: z.array(SourceSchema).default(DEFAULT_SOURCES),
    extraction: ExtractionSettingsSchema.optional(),
    output: z
        .object({
            filename: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
        })
        .default({}),
});

export type WorkspaceSettings = z.infer<typeof WorkspaceSettingsSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Run manifest written next to the canonical output.
 */
export const RunManifestSchema = z.object({
    run_timestamp: z.string(),
    input_files: z.record(z.string(), z.string()),
    transaction_count: z.number().int().min(0),
    label_counts: z.record(z.string(), z.number().int()),
    origin_counts: z.record(z.string(), z.number().int()),
    date_range: z
        .object({
            first: z.string(),
            last: z.string(),
        })
        .nullable(),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
