/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    RawRecord,
    Transaction,
    ExtractedRecord,
    NormalizeResult,
    AmountPredicate,
    ClassificationRule,
    RuleStage,
    RuleGroup,
    ProtectedCategory,
    RuleTable,
    AdapterKind,
    Source,
    RunManifest,
} from '@card-ledger/shared';

export {
    RawRecordSchema,
    TransactionSchema,
    ExtractedRecordSchema,
    RuleTableSchema,
    UNCATEGORIZED_CATEGORY,
    DEFAULT_ENCODINGS,
    DEFAULT_EXCLUDED_CATEGORIES,
    EXTRACTION,
    TWO_DIGIT_YEAR_PIVOT,
    CANONICAL_COLUMNS,
    PATTERN_VALIDATION,
    PROTECTED_GROUP_ID,
    REASSERT_GROUP_ID,
} from '@card-ledger/shared';
