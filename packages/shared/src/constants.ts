/**
 * Constants for Card Ledger.
 */

/**
 * Label given to a record whose source supplied no category.
 * Keeps every transaction's label non-empty.
 */
export const UNCATEGORIZED_CATEGORY = 'Uncategorized';

/**
 * Candidate text encodings, tried in order. The first that decodes a file
 * without error wins. Labels follow the WHATWG Encoding Standard.
 */
export const DEFAULT_ENCODINGS = ['utf-8', 'latin1', 'windows-1252', 'iso-8859-1'] as const;

/**
 * Discover-style categories that denote payments, credits or rebates.
 */
export const DEFAULT_EXCLUDED_CATEGORIES = ['Payments and Credits', 'Awards and Rebate Credits'] as const;

/**
 * Extraction ladder limits.
 * One extra attempt after the first, never more.
 */
export const EXTRACTION = {
    MAX_RETRIES: 1,
    DEFAULT_TIMEOUT_MS: 300_000,
    DEFAULT_OUTPUT_FILE: 'Chase_Extracted_Transactions.csv',
} as const;

/**
 * Two-digit years at or above this pivot belong to the 1900s.
 */
export const TWO_DIGIT_YEAR_PIVOT = 69;

/**
 * Canonical output column order.
 */
export const CANONICAL_COLUMNS = [
    'date',
    'description',
    'amount',
    'category',
    'origin_tag',
    'source_file',
    'label',
] as const;

export const DEFAULT_OUTPUT_FILE = 'All_Transactions_Merged.csv';

/**
 * Thresholds for rules added from the command line.
 */
export const PATTERN_VALIDATION = {
    MIN_LENGTH: 3,
    MAX_MATCH_PERCENT: 0.2,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;

/**
 * Classification stages in the order the engine applies them.
 * The protected pass runs before the first and the reassertion pass after the last.
 */
export const RULE_STAGES = ['utility', 'threshold', 'identity', 'derived'] as const;

/**
 * Group ids the engine gives the two protected passes.
 */
export const PROTECTED_GROUP_ID = 'protected';
export const REASSERT_GROUP_ID = 'reassert';
export const RESERVED_GROUP_IDS = [PROTECTED_GROUP_ID, REASSERT_GROUP_ID] as const;

export const MANIFEST_VERSION = '0.1.0';
