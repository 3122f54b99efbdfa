// Schemas
export {
    RawRecordSchema,
    TransactionSchema,
    ExtractedRecordSchema,
    NormalizeResultSchema,
    AmountPredicateSchema,
    ClassificationRuleSchema,
    RuleStageSchema,
    RuleGroupSchema,
    ProtectedCategorySchema,
    RuleTableSchema,
    AdapterKindSchema,
    SourceSchema,
    DocumentFolderSchema,
    ExtractionSettingsSchema,
    WorkspaceSettingsSchema,
    RunManifestSchema,
    DEFAULT_SOURCES,
} from './schemas.js';

// Types
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
    DocumentFolder,
    ExtractionSettings,
    WorkspaceSettings,
    RunManifest,
} from './schemas.js';

// Constants
export {
    UNCATEGORIZED_CATEGORY,
    DEFAULT_ENCODINGS,
    DEFAULT_EXCLUDED_CATEGORIES,
    EXTRACTION,
    TWO_DIGIT_YEAR_PIVOT,
    CANONICAL_COLUMNS,
    DEFAULT_OUTPUT_FILE,
    PATTERN_VALIDATION,
    RULE_STAGES,
    PROTECTED_GROUP_ID,
    REASSERT_GROUP_ID,
    RESERVED_GROUP_IDS,
    MANIFEST_VERSION,
} from './constants.js';
