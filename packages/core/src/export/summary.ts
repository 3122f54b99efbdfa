/**
 * Spending summaries over canonical transactions.
 */

import { Decimal } from 'decimal.js';
import type { Transaction } from '../types/index.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Month key for dates that never parsed. */
export const UNDATED_MONTH = 'undated';

export interface SummaryBucket {
    key: string;
    count: number;
    /** Decimal string, two places. */
    total: string;
}

export interface TransactionSummary {
    count: number;
    total: string;
    /** First and last ISO date, or null when no date parsed. */
    dateRange: { first: string; last: string } | null;
    /** Highest total first, ties by name. */
    byLabel: SummaryBucket[];
    /** Highest total first, ties by name. */
    byOrigin: SummaryBucket[];
    /** Chronological (YYYY-MM), undated last. */
    byMonth: SummaryBucket[];
}

interface Accumulator {
    count: number;
    total: Decimal;
}

export function summarize(transactions: readonly Transaction[]): TransactionSummary {
    const byLabel = new Map<string, Accumulator>();
    const byOrigin = new Map<string, Accumulator>();
    const byMonth = new Map<string, Accumulator>();
    let total = new Decimal(0);
    let first: string | null = null;
    let last: string | null = null;

    for (const txn of transactions) {
        const amount = new Decimal(txn.amount);
        total = total.plus(amount);

        const isDated = ISO_DATE.test(txn.date);
        if (isDated) {
            if (first === null || txn.date < first) first = txn.date;
            if (last === null || txn.date > last) last = txn.date;
        }

        add(byLabel, txn.label, amount);
        add(byOrigin, txn.origin_tag, amount);
        add(byMonth, isDated ? txn.date.slice(0, 7) : UNDATED_MONTH, amount);
    }

    return {
        count: transactions.length,
        total: total.toFixed(2),
        dateRange: first !== null && last !== null ? { first, last } : null,
        byLabel: toBuckets(byLabel).sort(byTotalDesc),
        byOrigin: toBuckets(byOrigin).sort(byTotalDesc),
        byMonth: toBuckets(byMonth).sort(byMonthAsc),
    };
}

function add(map: Map<string, Accumulator>, key: string, amount: Decimal): void {
    const acc = map.get(key);
    if (acc) {
        acc.count++;
        acc.total = acc.total.plus(amount);
    } else {
        map.set(key, { count: 1, total: amount });
    }
}

function toBuckets(map: Map<string, Accumulator>): SummaryBucket[] {
    return [...map.entries()].map(([key, acc]) => ({
        key,
        count: acc.count,
        total: acc.total.toFixed(2),
    }));
}

function byTotalDesc(a: SummaryBucket, b: SummaryBucket): number {
    const diff = new Decimal(b.total).comparedTo(a.total);
    if (diff !== 0) return diff;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function byMonthAsc(a: SummaryBucket, b: SummaryBucket): number {
    if (a.key === UNDATED_MONTH) return b.key === UNDATED_MONTH ? 0 : 1;
    if (b.key === UNDATED_MONTH) return -1;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}
