import { describe, it, expect } from 'vitest';
import { extractRecords, toRawRecords } from '../../src/extraction/ladder.js';
import type { DocumentExtractor } from '../../src/extraction/ladder.js';
import { MalformedExtractionOutput } from '../../src/errors.js';

/**
 * Replays canned responses; an Error entry makes that call throw.
 */
class ScriptedExtractor implements DocumentExtractor {
    calls = 0;

    constructor(private readonly responses: (string | Error)[]) {}

    async extract(): Promise<string> {
        const next = this.responses[this.calls];
        this.calls++;
        if (next === undefined) {
            throw new Error('no scripted response left');
        }
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }
}

const VALID = '[{"date":"01/05/2025","description":"STARBUCKS","amount":5.75,"category":"Food"}]';

describe('extractRecords', () => {
    it('returns records from a clean response in one call', async () => {
        const extractor = new ScriptedExtractor([VALID]);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(extractor.calls).toBe(1);
        expect(outcome.attempts).toBe(1);
        expect(outcome.repaired).toBe(false);
        expect(outcome.error).toBeNull();
        expect(outcome.records).toEqual([
            { date: '01/05/2025', description: 'STARBUCKS', amount: 5.75, category: 'Food' },
        ]);
    });

    it('strips a code fence before parsing', async () => {
        const extractor = new ScriptedExtractor([`\`\`\`json\n${VALID}\n\`\`\``]);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(outcome.records).toHaveLength(1);
        expect(outcome.repaired).toBe(false);
    });

    it('repairs a truncated response without calling again', async () => {
        const truncated = '[{"date":"2025-01-01","description":"COFFEE","amount":3.5},';
        const extractor = new ScriptedExtractor([truncated]);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(extractor.calls).toBe(1);
        expect(outcome.repaired).toBe(true);
        expect(outcome.records).toEqual([{ date: '2025-01-01', description: 'COFFEE', amount: 3.5 }]);
        expect(outcome.warnings).toEqual(['Repaired truncated output for jan.pdf']);
    });

    it('retries once when repair fails', async () => {
        const extractor = new ScriptedExtractor(['not json at all', VALID]);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(extractor.calls).toBe(2);
        expect(outcome.attempts).toBe(2);
        expect(outcome.records).toHaveLength(1);
        expect(outcome.error).toBeNull();
    });

    it('gives up after exactly two calls', async () => {
        const extractor = new ScriptedExtractor(['garbage', 'still garbage', VALID]);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(extractor.calls).toBe(2);
        expect(outcome.records).toEqual([]);
        expect(outcome.error).toBeInstanceOf(MalformedExtractionOutput);
        expect(outcome.error?.attempts).toBe(2);
        expect(outcome.error?.subject).toBe('jan.pdf');
        expect(outcome.error?.responsePreview).toBe('still garbage');
    });

    it('counts a throwing extractor as a failed attempt', async () => {
        const extractor = new ScriptedExtractor([new Error('timed out'), VALID]);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(extractor.calls).toBe(2);
        expect(outcome.records).toHaveLength(1);
        expect(outcome.warnings).toEqual(['Attempt 1 for jan.pdf: extractor failed: timed out']);
    });

    it('treats a non-array value as a parse failure', async () => {
        const extractor = new ScriptedExtractor(['{"date":"x"}', '{"date":"x"}']);
        const outcome = await extractRecords(extractor, 'jan.pdf');

        expect(outcome.records).toEqual([]);
        expect(outcome.error?.reason).toBe('expected a JSON array, got object');
    });

    it('skips array items that are not transactions', async () => {
        const response = '[{"date":"2025-01-01","description":"A","amount":"4.00"},{"foo":1}]';
        const outcome = await extractRecords(new ScriptedExtractor([response]), 'jan.pdf');

        expect(outcome.records).toHaveLength(1);
        expect(outcome.warnings).toEqual(['Skipped 1 items from jan.pdf that are not transactions']);
    });
});

describe('toRawRecords', () => {
    it('normalizes dates and amounts and drops credits', () => {
        const result = toRawRecords(
            [
                { date: '01/05/2025', description: ' STARBUCKS ', amount: 5.75, category: 'Food' },
                { date: '01/06/2025', description: 'PAYMENT', amount: -20 },
                { date: '01/07/2025', description: 'ODD', amount: 'n/a', category: null },
            ],
            'Chase',
            'jan.pdf'
        );

        expect(result.records).toEqual([
            {
                date: '2025-01-05',
                description: 'STARBUCKS',
                amount: '5.75',
                category: 'Food',
                origin_tag: 'Chase',
                source_file: 'jan.pdf',
            },
        ]);
        expect(result.excludedRows).toBe(1);
        expect(result.skippedRows).toBe(1);
        expect(result.warnings).toEqual(['Invalid amount "n/a" in jan.pdf, skipping']);
    });
});
