export { mergeRecords } from './merge.js';
