/**
 * Rule table compilation.
 */

import { Decimal } from 'decimal.js';
import type { ClassificationRule, RuleGroup, RuleTable } from '../types/index.js';
import { toMatchText } from '../utils/normalize.js';
import type { CompiledGroup, CompiledRule, CompiledRuleTable } from './types.js';

/**
 * Prepare a validated rule table for matching.
 *
 * Group-level `protect_existing` is pushed down to rules that do not set
 * their own. Identity rules always guard the protected label on top of
 * that. The result is frozen.
 */
export function compileRuleTable(table: RuleTable): CompiledRuleTable {
    const protectedPatterns = table.protected.patterns.map(toMatchText);
    const reassertOnly = (table.protected.reassert_patterns ?? []).map(toMatchText);

    return Object.freeze({
        protectedLabel: table.protected.label,
        protectedPatterns,
        reassertPatterns: [...new Set([...protectedPatterns, ...reassertOnly])],
        groups: table.groups.map((group) => compileGroup(group, table.protected.label)),
    });
}

function compileGroup(group: RuleGroup, protectedLabel: string): CompiledGroup {
    const stageGuard = group.stage === 'identity' ? [protectedLabel] : [];
    return Object.freeze({
        id: group.id,
        stage: group.stage,
        rules: group.rules.map((rule) => compileRule(rule, group.protect_existing, stageGuard)),
    });
}

function compileRule(
    rule: ClassificationRule,
    groupProtect: string | undefined,
    stageGuard: readonly string[]
): CompiledRule {
    const own = rule.protect_existing ?? groupProtect;
    const protectedLabels = own === undefined ? [...stageGuard] : [...new Set([...stageGuard, own])];
    return Object.freeze({
        label: rule.label,
        patterns: rule.patterns.map(toMatchText),
        exclude: (rule.exclude ?? []).map(toMatchText),
        min: rule.amount?.min !== undefined ? new Decimal(rule.amount.min) : null,
        max: rule.amount?.max !== undefined ? new Decimal(rule.amount.max) : null,
        protectedLabels,
        onlyIfUnchanged: rule.only_if_unchanged ?? false,
    });
}
