/**
 * Pattern validation utilities for rules added from the command line.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { PATTERN_VALIDATION, PROTECTED_GROUP_ID } from '../types/index.js';
import type { RuleTable, Transaction } from '../types/index.js';
import { toMatchText } from '../utils/normalize.js';
import { matchesAny } from './match.js';
import type { CollisionResult, ExistingPattern, PatternValidationResult } from './types.js';

/**
 * Validate a pattern before adding it as a rule.
 *
 * - Empty pattern = rejected
 * - Shorter than the minimum length = rejected
 * - Matches more than 20% of transactions AND more than 3 = too broad (warning)
 *
 * @param transactions - Optional transaction list for the breadth check
 */
export function validatePattern(pattern: string, transactions?: readonly Transaction[]): PatternValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!pattern || pattern.trim() === '') {
        errors.push('Pattern cannot be empty');
        return { valid: false, errors, warnings };
    }

    if (pattern.length < PATTERN_VALIDATION.MIN_LENGTH) {
        errors.push(
            `Pattern must be at least ${PATTERN_VALIDATION.MIN_LENGTH} characters (got ${pattern.length})`
        );
        return { valid: false, errors, warnings };
    }

    // If no transactions provided, can only do syntax validation
    if (!transactions || transactions.length === 0) {
        return { valid: true, errors, warnings };
    }

    const needle = [toMatchText(pattern)];
    let matchCount = 0;
    for (const txn of transactions) {
        if (matchesAny(toMatchText(txn.description), needle)) matchCount++;
    }

    const matchPercent = matchCount / transactions.length;

    if (
        matchPercent > PATTERN_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > PATTERN_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Pattern "${pattern}" is too broad: matches ${matchCount} transactions ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${PATTERN_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return { valid: true, errors, warnings, matchCount, matchPercent };
}

/**
 * Find existing patterns that overlap a new one (either contains the other).
 */
export function checkPatternCollision(pattern: string, existing: readonly ExistingPattern[]): CollisionResult {
    const candidate = toMatchText(pattern);
    const collisions = existing.filter((entry) => {
        const other = toMatchText(entry.pattern);
        return candidate.includes(other) || other.includes(candidate);
    });

    return { hasCollision: collisions.length > 0, collisions };
}

/**
 * Every pattern in a rule table, protected ones first.
 */
export function collectPatterns(table: RuleTable): ExistingPattern[] {
    const patterns: ExistingPattern[] = table.protected.patterns.map((pattern) => ({
        pattern,
        label: table.protected.label,
        groupId: PROTECTED_GROUP_ID,
    }));

    for (const group of table.groups) {
        for (const rule of group.rules) {
            for (const pattern of rule.patterns) {
                patterns.push({ pattern, label: rule.label, groupId: group.id });
            }
        }
    }

    return patterns;
}
