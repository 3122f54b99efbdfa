export { normalizeSignedDebit } from './signed-debit.js';
export { normalizeSignedAmount } from './signed-amount.js';
export { normalizeExtracted } from './extracted.js';
export { detectSource, getAdapter, getSupportedAdapters } from './detect.js';
export type { SourceDetectionResult } from './detect.js';
export type { AdapterContext, AdapterFn } from './types.js';
