/**
 * Source detection from filename.
 *
 * Sources come from workspace settings: each names a filename pattern, the
 * adapter that reads it and the origin tag its records carry.
 */

import type { AdapterKind, Source } from '../types/index.js';
import { normalizeExtracted } from './extracted.js';
import { normalizeSignedAmount } from './signed-amount.js';
import { normalizeSignedDebit } from './signed-debit.js';
import type { AdapterFn } from './types.js';

/**
 * Registry of adapters by kind.
 */
const ADAPTERS: Record<AdapterKind, AdapterFn> = {
    signed_debit: normalizeSignedDebit,
    signed_amount: normalizeSignedAmount,
    extracted: normalizeExtracted,
};

/**
 * Detection result returned by detectSource.
 */
export interface SourceDetectionResult {
    adapter: AdapterFn;
    source: Source;
}

/**
 * Detect the source a file belongs to.
 *
 * - Skip hidden files (start with .)
 * - Skip temp files (start with ~)
 * - First matching source wins; patterns are case-insensitive
 *
 * @param filename - Base filename (not full path)
 * @returns Detection result or null if no source matches
 */
export function detectSource(filename: string, sources: readonly Source[]): SourceDetectionResult | null {
    if (filename.startsWith('.') || filename.startsWith('~')) {
        return null;
    }

    for (const source of sources) {
        if (new RegExp(source.pattern, 'i').test(filename)) {
            return { adapter: ADAPTERS[source.adapter], source };
        }
    }

    return null;
}

export function getAdapter(kind: AdapterKind): AdapterFn {
    return ADAPTERS[kind];
}

/**
 * Get list of supported adapter kinds.
 */
export function getSupportedAdapters(): AdapterKind[] {
    return Object.keys(ADAPTERS).filter(isAdapterKind);
}

function isAdapterKind(value: string): value is AdapterKind {
    return value in ADAPTERS;
}
