/**
 * Internal types for classifier module.
 */

import type { Decimal } from 'decimal.js';
import type { RuleStage, Transaction } from '../types/index.js';

/**
 * Rule with patterns uppercased and bounds parsed, ready for matching.
 */
export interface CompiledRule {
    label: string;
    patterns: readonly string[];
    exclude: readonly string[];
    min: Decimal | null;
    max: Decimal | null;
    /** Labels this rule never overwrites. */
    protectedLabels: readonly string[];
    onlyIfUnchanged: boolean;
}

export interface CompiledGroup {
    id: string;
    stage: RuleStage;
    rules: readonly CompiledRule[];
}

export interface CompiledRuleTable {
    protectedLabel: string;
    protectedPatterns: readonly string[];
    /** Protected patterns plus reassertion-only patterns. */
    reassertPatterns: readonly string[];
    groups: readonly CompiledGroup[];
}

/**
 * Statistics from batch classification.
 */
export interface ClassificationStats {
    total: number;
    /** Transactions whose label differs from their source category. */
    relabeled: number;
    /** Transactions holding the protected label. */
    protected: number;
    /**
     * Which group set each final label. Unchanged labels count under
     * "source"; the protected passes under their reserved ids.
     */
    byGroup: Record<string, number>;
}

export interface ClassificationOutput {
    transactions: Transaction[];
    stats: ClassificationStats;
}

/**
 * Result of validating a pattern before adding it as a rule.
 */
export interface PatternValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    matchCount?: number;
    matchPercent?: number;
}

/**
 * A pattern already in the rule table, with where it lives.
 */
export interface ExistingPattern {
    pattern: string;
    label: string;
    groupId: string;
}

export interface CollisionResult {
    hasCollision: boolean;
    collisions: ExistingPattern[];
}
