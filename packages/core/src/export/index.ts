export { sortByDate } from './sort.js';
export { toCanonicalCsv, toExtractedCsv, readCanonicalCsv } from './csv.js';
export type { CanonicalReadResult } from './csv.js';
export { summarize, UNDATED_MONTH } from './summary.js';
export type { SummaryBucket, TransactionSummary } from './summary.js';
