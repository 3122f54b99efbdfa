import { describe, it, expect } from 'vitest';
import { DEFAULT_SOURCES } from '@card-ledger/shared';
import { detectSource } from '../../src/adapter/detect.js';
import { mergeRecords } from '../../src/merge/merge.js';
import { classify } from '../../src/classifier/classify.js';
import { sortByDate } from '../../src/export/sort.js';
import { toCanonicalCsv } from '../../src/export/csv.js';
import type { NormalizeResult } from '../../src/types/index.js';
import { TEST_RULES, utf8 } from '../fixtures.js';

function load(filename: string, text: string): NormalizeResult {
    const detection = detectSource(filename, DEFAULT_SOURCES);
    if (!detection) {
        throw new Error(`no source for ${filename}`);
    }
    return detection.adapter(utf8(text), {
        sourceFile: filename,
        originTag: detection.source.origin_tag,
        encodings: ['utf-8', 'latin1'],
        excludedCategories: detection.source.excluded_categories,
    });
}

describe('normalize, merge, classify, export', () => {
    it('labels and orders records from two sources', () => {
        const discover = load('Discover-2025.csv', [
            'Trans. Date,Post Date,Description,Amount,Category',
            '03/02/2025,03/03/2025,NETFLIX.COM,15.49,Services',
        ].join('\n'));
        const capitalOne = load('CapitalOne_2025.csv', [
            'Transaction Date,Posted Date,Card No.,Description,Category,Debit,Credit',
            '2025-03-01,2025-03-02,1234,SHELL OIL 12345,Gas/Automotive,12.50,',
        ].join('\n'));

        const transactions = sortByDate(classify(mergeRecords([discover.records, capitalOne.records]), TEST_RULES));

        expect(transactions.map((t) => [t.date, t.label])).toEqual([
            ['2025-03-01', 'Gas Station Indiscretion'],
            ['2025-03-02', 'Netflix'],
        ]);

        expect(toCanonicalCsv(transactions).trimEnd().split('\n')).toEqual([
            'date,description,amount,category,origin_tag,source_file,label',
            '2025-03-01,SHELL OIL 12345,12.50,Gas/Automotive,CapitalOne,CapitalOne_2025.csv,Gas Station Indiscretion',
            '2025-03-02,NETFLIX.COM,15.49,Services,Discover,Discover-2025.csv,Netflix',
        ]);
    });
});
