import { describe, it, expect } from 'vitest';
import { toCanonicalCsv, toExtractedCsv, readCanonicalCsv } from '../../src/export/csv.js';
import { normalizeExtracted } from '../../src/adapter/extracted.js';
import { utf8 } from '../fixtures.js';
import type { Transaction } from '../../src/types/index.js';

const shell: Transaction = {
    date: '2025-03-01',
    description: 'SHELL OIL 12345',
    amount: '12.5',
    category: 'Gas/Automotive',
    origin_tag: 'CapitalOne',
    source_file: 'CapitalOne_2025.csv',
    label: 'Gas Station Indiscretion',
};

describe('toCanonicalCsv', () => {
    it('writes the canonical header and two-decimal amounts', () => {
        const lines = toCanonicalCsv([shell]).trimEnd().split('\n');

        expect(lines).toEqual([
            'date,description,amount,category,origin_tag,source_file,label',
            '2025-03-01,SHELL OIL 12345,12.50,Gas/Automotive,CapitalOne,CapitalOne_2025.csv,Gas Station Indiscretion',
        ]);
    });

    it('quotes fields containing commas', () => {
        const lines = toCanonicalCsv([{ ...shell, description: 'ACME, INC' }]).trimEnd().split('\n');
        expect(lines[1]).toBe(
            '2025-03-01,"ACME, INC",12.50,Gas/Automotive,CapitalOne,CapitalOne_2025.csv,Gas Station Indiscretion'
        );
    });

    it('keeps amounts with more than two decimals intact', () => {
        const text = toCanonicalCsv([{ ...shell, amount: '1.125' }]);
        expect(text.trimEnd().split('\n')[1]).toBe(
            '2025-03-01,SHELL OIL 12345,1.125,Gas/Automotive,CapitalOne,CapitalOne_2025.csv,Gas Station Indiscretion'
        );
        expect(readCanonicalCsv(text).transactions[0].amount).toBe('1.125');
    });

    it('writes only the header for no transactions', () => {
        expect(toCanonicalCsv([]).trimEnd()).toBe('date,description,amount,category,origin_tag,source_file,label');
    });
});

describe('toExtractedCsv', () => {
    it('writes the extracted layout with empty missing categories', () => {
        const lines = toExtractedCsv([
            {
                date: '2025-01-15',
                description: 'SHELL OIL 523769600',
                amount: '45.2',
                category: null,
                origin_tag: 'Chase-2040',
                source_file: 'stmt.pdf',
            },
        ]).trimEnd().split('\n');

        expect(lines).toEqual([
            'date,description,amount,category,origin_tag,source_file',
            '2025-01-15,SHELL OIL 523769600,45.20,,Chase-2040,stmt.pdf',
        ]);
    });

    it('is readable by the extracted adapter', () => {
        const text = toExtractedCsv([
            {
                date: '2025-01-16',
                description: 'WALMART STORE #112',
                amount: '67.89',
                category: 'Merchandise',
                origin_tag: 'Chase-7557',
                source_file: 'jan.pdf',
            },
        ]);

        const result = normalizeExtracted(utf8(text), {
            sourceFile: 'Chase_Extracted_Transactions.csv',
            originTag: 'Chase',
            encodings: ['utf-8'],
        });

        expect(result.records).toEqual([
            {
                date: '2025-01-16',
                description: 'WALMART STORE #112',
                amount: '67.89',
                category: 'Merchandise',
                origin_tag: 'Chase-7557',
                source_file: 'jan.pdf',
            },
        ]);
    });
});

describe('readCanonicalCsv', () => {
    it('reads what toCanonicalCsv writes', () => {
        const result = readCanonicalCsv(toCanonicalCsv([{ ...shell, description: 'ACME, INC' }]));

        expect(result.skippedRows).toBe(0);
        expect(result.transactions).toEqual([{ ...shell, description: 'ACME, INC', amount: '12.50' }]);
    });

    it('skips rows that do not fit the schema', () => {
        const text = [
            'date,description,amount,category,origin_tag,source_file,label',
            '2025-03-01,OK,1.00,Dining,Discover,d.csv,Dining',
            '2025-03-02,NO LABEL,2.00,Dining,Discover,d.csv,',
        ].join('\n');

        const result = readCanonicalCsv(text);

        expect(result.transactions).toHaveLength(1);
        expect(result.skippedRows).toBe(1);
        expect(result.warnings[0].startsWith('Row 3: label')).toBe(true);
    });
});
