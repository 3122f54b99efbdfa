export { repairTruncatedJson, stripCodeFence } from './repair.js';
export { extractRecords, toRawRecords } from './ladder.js';
export type { DocumentExtractor, ExtractionOutcome } from './ladder.js';
