export { stripBom, readCsvRows, readCsvTable, readWorkbookRows, readWorkbookTable, type ParsedTable } from './csv.js';
export type { TableRow } from './csv.js';
export { decodeText } from './decode.js';
export type { DecodedText } from './decode.js';
export { normalizeDate, parseIsoDate, parseMdyDate, parseMdyShortDate, formatIsoDate } from './date-parse.js';
export { toMatchText, cleanText, parseAmount, formatAmount } from './normalize.js';
