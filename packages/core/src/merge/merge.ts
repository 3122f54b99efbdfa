/**
 * Record merger.
 */

import { UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { RawRecord, Transaction } from '../types/index.js';

/**
 * Concatenate adapter batches into canonical transactions.
 *
 * Batches keep their given order, records within a batch keep theirs.
 * Records are not re-validated. A missing source category becomes
 * "Uncategorized" and every label starts equal to the category.
 */
export function mergeRecords(batches: readonly (readonly RawRecord[])[]): Transaction[] {
    const merged: Transaction[] = [];

    for (const batch of batches) {
        for (const record of batch) {
            const category = record.category?.trim() || UNCATEGORIZED_CATEGORY;
            merged.push({
                date: record.date,
                description: record.description,
                amount: record.amount,
                category,
                origin_tag: record.origin_tag,
                source_file: record.source_file,
                label: category,
            });
        }
    }

    return merged;
}
