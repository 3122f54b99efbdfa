/**
 * Pattern matching for classification.
 *
 * ARCHITECTURAL NOTE: Patterns are plain substrings, compared against the
 * uppercased description. Patterns are uppercased once at compile time.
 */

import type { Decimal } from 'decimal.js';
import type { CompiledRule } from './types.js';

/**
 * True when any pattern occurs in the text.
 */
export function matchesAny(matchText: string, patterns: readonly string[]): boolean {
    return patterns.some((pattern) => matchText.includes(pattern));
}

/**
 * Amount predicate: `min` inclusive, `max` exclusive. A rule without
 * bounds accepts any amount; an unreadable amount fails any bound.
 */
export function amountInRange(amount: Decimal | null, rule: CompiledRule): boolean {
    if (rule.min === null && rule.max === null) {
        return true;
    }
    if (amount === null) {
        return false;
    }
    if (rule.min !== null && amount.lt(rule.min)) {
        return false;
    }
    if (rule.max !== null && amount.gte(rule.max)) {
        return false;
    }
    return true;
}

/**
 * Whether a rule fires for one transaction, given its current label.
 */
export function ruleApplies(
    rule: CompiledRule,
    matchText: string,
    amount: Decimal | null,
    currentLabel: string,
    category: string
): boolean {
    if (!matchesAny(matchText, rule.patterns)) {
        return false;
    }
    if (rule.exclude.length > 0 && matchesAny(matchText, rule.exclude)) {
        return false;
    }
    if (!amountInRange(amount, rule)) {
        return false;
    }
    if (rule.protectedLabels.includes(currentLabel)) {
        return false;
    }
    if (rule.onlyIfUnchanged && currentLabel !== category) {
        return false;
    }
    return true;
}
