/**
 * Date parsing utilities for source adapters.
 * All dates returned as UTC (00:00:00Z).
 */

import { TWO_DIGIT_YEAR_PIVOT } from '../types/index.js';

/**
 * Normalize a date cell to ISO `YYYY-MM-DD`.
 *
 * Tries ISO, then MM/DD/YYYY, then MM/DD/YY. Workbook cells may also arrive
 * as Date objects or Excel serials. Text that matches no pattern is returned
 * trimmed, unchanged.
 */
export function normalizeDate(value: unknown): string {
    if (value instanceof Date) {
        return isValidDate(value) ? formatIsoDate(value) : '';
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? formatIsoDate(excelSerialToDate(value)) : String(value);
    }
    if (value === null || value === undefined) {
        return '';
    }

    const text = String(value).trim();
    const parsed = parseIsoDate(text) ?? parseMdyDate(text) ?? parseMdyShortDate(text);
    return parsed ? formatIsoDate(parsed) : text;
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC). Single-digit month and day
 * are accepted.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
    if (!match) return null;

    return buildDate(parseInt(match[1]), parseInt(match[2]), parseInt(match[3]));
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    return buildDate(parseInt(match[3]), parseInt(match[1]), parseInt(match[2]));
}

/**
 * Parse MM/DD/YY date string to Date (UTC).
 * Years 69-99 map to 19xx, 00-68 to 20xx.
 */
export function parseMdyShortDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2})$/);
    if (!match) return null;

    const shortYear = parseInt(match[3]);
    const year = shortYear >= TWO_DIGIT_YEAR_PIVOT ? 1900 + shortYear : 2000 + shortYear;
    return buildDate(year, parseInt(match[1]), parseInt(match[2]));
}

function buildDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Date.UTC rolls 02/30 over into March; reject instead
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30. Round away time-of-day fractions.
    const days = Math.round(serial);
    const utcDays = days - 25569;
    return new Date(utcDays * 86400 * 1000);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
