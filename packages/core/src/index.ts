// Types (re-exported from shared)
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
} from './types/index.js';

export {
    RawRecordSchema,
    TransactionSchema,
    ExtractedRecordSchema,
    RuleTableSchema,
    UNCATEGORIZED_CATEGORY,
    DEFAULT_ENCODINGS,
    DEFAULT_EXCLUDED_CATEGORIES,
    EXTRACTION,
    CANONICAL_COLUMNS,
    PATTERN_VALIDATION,
    PROTECTED_GROUP_ID,
    REASSERT_GROUP_ID,
} from './types/index.js';

// Errors
export {
    LedgerError,
    DecodingError,
    MalformedExtractionOutput,
    MissingInputError,
    MissingColumnsError,
} from './errors.js';

// Utils
export { decodeText, normalizeDate, toMatchText, parseAmount } from './utils/index.js';

// Adapters
export {
    normalizeSignedDebit,
    normalizeSignedAmount,
    normalizeExtracted,
    detectSource,
    getAdapter,
    getSupportedAdapters,
} from './adapter/index.js';
export type { AdapterContext, AdapterFn, SourceDetectionResult } from './adapter/index.js';

// Extraction
export { repairTruncatedJson, stripCodeFence, extractRecords, toRawRecords } from './extraction/index.js';
export type { DocumentExtractor, ExtractionOutcome } from './extraction/index.js';

// Merge
export { mergeRecords } from './merge/index.js';

// Classifier
export {
    classify,
    classifyAll,
    compileRuleTable,
    validatePattern,
    checkPatternCollision,
    collectPatterns,
    SOURCE_GROUP_ID,
} from './classifier/index.js';
export type {
    ClassificationStats,
    ClassificationOutput,
    PatternValidationResult,
    ExistingPattern,
    CollisionResult,
} from './classifier/index.js';

// Export
export { sortByDate, toCanonicalCsv, toExtractedCsv, readCanonicalCsv, summarize, UNDATED_MONTH } from './export/index.js';
export type { CanonicalReadResult, SummaryBucket, TransactionSummary } from './export/index.js';
