import type { RuleTable, Transaction } from '../src/types/index.js';

/**
 * UTF-8 bytes of a string in a fresh ArrayBuffer.
 */
export function utf8(text: string): ArrayBuffer {
    return copy(new TextEncoder().encode(text));
}

/**
 * Latin-1 bytes of a string (code points above 0xFF are not supported).
 */
export function latin1(text: string): ArrayBuffer {
    return copy(Uint8Array.from(text, (char) => char.charCodeAt(0)));
}

function copy(bytes: Uint8Array): ArrayBuffer {
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return buffer;
}

// Helper to create minimal transaction
export function makeTxn(description: string, amount = '10.00', category = 'Shopping'): Transaction {
    return {
        date: '2025-03-01',
        description,
        amount,
        category,
        origin_tag: 'TestCard',
        source_file: 'test.csv',
        label: category,
    };
}

/**
 * Small rule table with one group of each stage.
 */
export const TEST_RULES: RuleTable = {
    protected: {
        label: 'Vending Machine',
        patterns: ['AMK MSU POD', 'CTLP*REFRESH'],
        reassert_patterns: ['AMK MSU'],
    },
    groups: [
        {
            id: 'utility',
            stage: 'utility',
            rules: [{ patterns: ['SIMPLEBILLS', 'SIMPLE BILLS'], label: 'Electricity' }],
        },
        {
            id: 'fuel',
            stage: 'threshold',
            rules: [
                { patterns: ['SHELL', 'QT '], label: 'Gas Station Indiscretion', amount: { max: '30' } },
                { patterns: ['SHELL', 'QT '], label: 'Gasoline', amount: { min: '30' } },
            ],
        },
        {
            id: 'streaming',
            stage: 'identity',
            protect_existing: 'Vending Machine',
            rules: [
                { patterns: ['NETFLIX'], label: 'Netflix' },
                { patterns: ['YOUTUBE'], label: 'YouTube Premium' },
            ],
        },
        {
            id: 'restaurants',
            stage: 'identity',
            protect_existing: 'Vending Machine',
            rules: [
                { patterns: ['PANDA EXPRESS', 'TECH DINING-PANDA'], label: 'Panda Express' },
                { patterns: ['PIZZA'], label: 'Pizza' },
            ],
        },
        {
            id: 'campus',
            stage: 'identity',
            rules: [{ patterns: ['MSU'], label: 'MSU Campus' }],
        },
        {
            id: 'derived',
            stage: 'derived',
            rules: [
                { patterns: ['AMAZON'], label: 'Amazon Shopping', exclude: ['PRIME', 'KINDLE', 'WEB SERVICES'] },
                { patterns: ['AMAZON PRIME'], label: 'Amazon Prime' },
                { patterns: ['PAYPAL *GOOGLE'], label: 'Google Services', only_if_unchanged: true },
            ],
        },
    ],
};
