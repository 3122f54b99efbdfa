import type { NormalizeResult } from '../types/index.js';

/**
 * What an adapter knows about the file besides its bytes.
 */
export interface AdapterContext {
    /** Base filename, recorded on every record. */
    sourceFile: string;
    originTag: string;
    /** Candidate text encodings, tried in order. */
    encodings: readonly string[];
    /** Source categories to drop (signed_amount only). */
    excludedCategories?: readonly string[];
}

/**
 * Adapter function signature.
 * Takes ArrayBuffer (not file path) to keep core headless.
 */
export type AdapterFn = (data: ArrayBuffer, context: AdapterContext) => NormalizeResult;
