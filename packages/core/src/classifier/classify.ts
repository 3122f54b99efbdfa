/**
 * Ordered-group transaction classification.
 *
 * Pass order:
 * 1. protected patterns (unconditional)
 * 2. groups in table order: utility, threshold, identity, derived
 *    (later rules override earlier ones)
 * 3. reassertion of the protected label (unconditional, always last)
 *
 * ARCHITECTURAL NOTE: No console.* calls. Classification never fails; a
 * transaction no rule matches keeps its source category.
 */

import { PROTECTED_GROUP_ID, REASSERT_GROUP_ID } from '../types/index.js';
import type { RuleTable, Transaction } from '../types/index.js';
import { parseAmount, toMatchText } from '../utils/normalize.js';
import { compileRuleTable } from './compile.js';
import { matchesAny, ruleApplies } from './match.js';
import type { ClassificationOutput, ClassificationStats, CompiledRuleTable } from './types.js';

/** byGroup key for labels no rule changed. */
export const SOURCE_GROUP_ID = 'source';

/**
 * Label every transaction in place.
 *
 * Labels are reset to the source category first, so running twice gives
 * the same result as running once.
 *
 * @returns The same array, labels updated
 */
export function classify(transactions: Transaction[], table: RuleTable): Transaction[] {
    return classifyAll(transactions, table).transactions;
}

/**
 * Label every transaction in place and report which groups set the labels.
 */
export function classifyAll(transactions: Transaction[], table: RuleTable): ClassificationOutput {
    const compiled = compileRuleTable(table);
    const stats: ClassificationStats = {
        total: transactions.length,
        relabeled: 0,
        protected: 0,
        byGroup: {},
    };

    for (const txn of transactions) {
        const { label, setBy } = resolveLabel(txn, compiled);
        txn.label = label;

        if (label !== txn.category) stats.relabeled++;
        if (label === compiled.protectedLabel) stats.protected++;
        stats.byGroup[setBy] = (stats.byGroup[setBy] ?? 0) + 1;
    }

    return { transactions, stats };
}

function resolveLabel(txn: Transaction, table: CompiledRuleTable): { label: string; setBy: string } {
    const matchText = toMatchText(txn.description);
    const amount = parseAmount(txn.amount);

    let label = txn.category;
    let setBy = SOURCE_GROUP_ID;

    if (matchesAny(matchText, table.protectedPatterns)) {
        label = table.protectedLabel;
        setBy = PROTECTED_GROUP_ID;
    }

    for (const group of table.groups) {
        for (const rule of group.rules) {
            if (ruleApplies(rule, matchText, amount, label, txn.category)) {
                label = rule.label;
                setBy = group.id;
            }
        }
    }

    if (matchesAny(matchText, table.reassertPatterns) && label !== table.protectedLabel) {
        label = table.protectedLabel;
        setBy = REASSERT_GROUP_ID;
    }

    return { label, setBy };
}
