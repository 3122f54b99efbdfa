/**
 * Extraction with a bounded repair ladder.
 *
 * parse -> repair and parse -> ask the extractor once more -> give up.
 * Giving up is not an exception: the outcome carries no records and a
 * MalformedExtractionOutput describing the last failure.
 */

import { EXTRACTION, ExtractedRecordSchema } from '../types/index.js';
import type { ExtractedRecord, NormalizeResult, RawRecord } from '../types/index.js';
import { MalformedExtractionOutput } from '../errors.js';
import { normalizeDate } from '../utils/date-parse.js';
import { cleanText, formatAmount, parseAmount } from '../utils/normalize.js';
import { repairTruncatedJson, stripCodeFence } from './repair.js';

const PREVIEW_LENGTH = 500;

/**
 * Turns a document into raw response text. Implementations live outside
 * core (the CLI runs an external command).
 */
export interface DocumentExtractor {
    extract(document: string): Promise<string>;
}

export interface ExtractionOutcome {
    records: ExtractedRecord[];
    /** Extractor calls made, 1 or 2. */
    attempts: number;
    /** True when the accepted response needed repair. */
    repaired: boolean;
    warnings: string[];
    error: MalformedExtractionOutput | null;
}

type ParseAttempt =
    | { ok: true; items: unknown[] }
    | { ok: false; reason: string };

/**
 * Extract records from one document.
 *
 * An extractor that throws uses up its attempt. A response that parses to
 * anything but an array is a parse failure.
 */
export async function extractRecords(
    extractor: DocumentExtractor,
    document: string
): Promise<ExtractionOutcome> {
    const maxAttempts = 1 + EXTRACTION.MAX_RETRIES;
    const warnings: string[] = [];
    let reason = 'no response';
    let preview = '';
    let attempts = 0;

    while (attempts < maxAttempts) {
        attempts++;

        let response: string;
        try {
            response = await extractor.extract(document);
        } catch (err) {
            reason = `extractor failed: ${err instanceof Error ? err.message : String(err)}`;
            preview = '';
            warnings.push(`Attempt ${attempts} for ${document}: ${reason}`);
            continue;
        }

        const body = stripCodeFence(response);
        preview = body.slice(0, PREVIEW_LENGTH);

        const direct = parseArray(body);
        if (direct.ok) {
            return accept(direct.items, attempts, false, warnings, document);
        }

        const fixed = parseArray(repairTruncatedJson(body));
        if (fixed.ok) {
            warnings.push(`Repaired truncated output for ${document}`);
            return accept(fixed.items, attempts, true, warnings, document);
        }

        reason = direct.reason;
        warnings.push(`Attempt ${attempts} for ${document}: ${reason}`);
    }

    return {
        records: [],
        attempts,
        repaired: false,
        warnings,
        error: new MalformedExtractionOutput(document, attempts, reason, preview),
    };
}

function parseArray(text: string): ParseAttempt {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }

    if (!Array.isArray(value)) {
        return { ok: false, reason: `expected a JSON array, got ${value === null ? 'null' : typeof value}` };
    }
    return { ok: true, items: value };
}

function accept(
    items: unknown[],
    attempts: number,
    repaired: boolean,
    warnings: string[],
    document: string
): ExtractionOutcome {
    const records: ExtractedRecord[] = [];
    let invalid = 0;

    for (const item of items) {
        const result = ExtractedRecordSchema.safeParse(item);
        if (result.success) {
            records.push(result.data);
        } else {
            invalid++;
        }
    }

    if (invalid) {
        warnings.push(`Skipped ${invalid} items from ${document} that are not transactions`);
    }

    return { records, attempts, repaired, warnings, error: null };
}

/**
 * Convert extracted items to raw records.
 *
 * Negative amounts (payments, credits) are excluded. Items whose amount is
 * not a number are skipped.
 */
export function toRawRecords(
    records: readonly ExtractedRecord[],
    originTag: string,
    sourceFile: string
): NormalizeResult {
    const out: RawRecord[] = [];
    const warnings: string[] = [];
    let skippedRows = 0;
    let excludedRows = 0;

    for (const record of records) {
        const amount = parseAmount(record.amount);
        if (!amount) {
            warnings.push(`Invalid amount "${String(record.amount)}" in ${sourceFile}, skipping`);
            skippedRows++;
            continue;
        }
        if (amount.isNegative()) {
            excludedRows++;
            continue;
        }

        const category = cleanText(record.category);
        out.push({
            date: normalizeDate(record.date),
            description: cleanText(record.description),
            amount: formatAmount(amount),
            category: category === '' ? null : category,
            origin_tag: originTag,
            source_file: sourceFile,
        });
    }

    return { records: out, warnings, skippedRows, excludedRows };
}
