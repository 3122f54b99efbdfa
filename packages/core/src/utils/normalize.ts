/**
 * Value normalization for adapter input and rule matching.
 */

import { Decimal } from 'decimal.js';

const AMOUNT_SHAPE = /^[-+]?(\d+\.?\d*|\.\d+)$/;

/**
 * Text rules are matched against: the raw description, uppercased.
 *
 * NOTE: No separator or whitespace folding. Patterns such as "UBER   *EATS"
 * and "QT " rely on the description's exact spacing and punctuation.
 */
export function toMatchText(raw: string): string {
    return raw.toUpperCase();
}

/**
 * Cell value as trimmed text; null and undefined become "".
 */
export function cleanText(value: unknown): string {
    if (value === null || value === undefined) {
        return '';
    }
    return String(value).trim();
}

/**
 * Parse a money cell. Strips "$", thousands separators and spaces.
 *
 * @returns Decimal, or null when the cell is empty or not a plain number
 */
export function parseAmount(value: unknown): Decimal | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(value) : null;
    }

    const text = cleanText(value).replace(/[$,\s]/g, '');
    if (!AMOUNT_SHAPE.test(text)) {
        return null;
    }
    return new Decimal(text);
}

/**
 * Plain decimal string, no exponent, no trailing zeros.
 */
export function formatAmount(amount: Decimal): string {
    return amount.toFixed();
}
