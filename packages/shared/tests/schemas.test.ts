import { describe, it, expect } from 'vitest';
import {
    TransactionSchema,
    RawRecordSchema,
    ClassificationRuleSchema,
    RuleTableSchema,
    SourceSchema,
    WorkspaceSettingsSchema,
    ExtractionSettingsSchema,
    RunManifestSchema,
} from '../src/schemas.js';

describe('TransactionSchema', () => {
    const validTransaction = {
        date: '2025-03-01',
        description: 'SHELL OIL 12345',
        amount: '12.50',
        category: 'Gas/Automotive',
        origin_tag: 'CapitalOne',
        source_file: 'CapitalOne_2025.csv',
        label: 'Gas Station Indiscretion',
    };

    it('validates a complete transaction', () => {
        expect(TransactionSchema.safeParse(validTransaction).success).toBe(true);
    });

    it('accepts an unparsed date string', () => {
        expect(TransactionSchema.safeParse({ ...validTransaction, date: 'Mar 5' }).success).toBe(true);
    });

    it('rejects negative amounts', () => {
        expect(TransactionSchema.safeParse({ ...validTransaction, amount: '-12.50' }).success).toBe(false);
    });

    it('rejects numeric amounts', () => {
        expect(TransactionSchema.safeParse({ ...validTransaction, amount: 12.5 }).success).toBe(false);
    });

    it('rejects an empty label', () => {
        expect(TransactionSchema.safeParse({ ...validTransaction, label: '' }).success).toBe(false);
    });
});

describe('RawRecordSchema', () => {
    it('allows a null category', () => {
        const result = RawRecordSchema.safeParse({
            date: '2025-02-10',
            description: 'STARBUCKS',
            amount: '5.75',
            category: null,
            origin_tag: 'Chase',
            source_file: 'feb.pdf',
        });
        expect(result.success).toBe(true);
    });
});

describe('ClassificationRuleSchema', () => {
    it('converts numeric bounds to strings', () => {
        const result = ClassificationRuleSchema.parse({
            patterns: ['SHELL'],
            label: 'Gasoline',
            amount: { min: 30 },
        });
        expect(result.amount).toEqual({ min: '30' });
    });

    it('rejects an amount predicate without bounds', () => {
        const result = ClassificationRuleSchema.safeParse({ patterns: ['SHELL'], label: 'Gasoline', amount: {} });
        expect(result.success).toBe(false);
    });

    it('rejects a rule without patterns', () => {
        expect(ClassificationRuleSchema.safeParse({ patterns: [], label: 'X' }).success).toBe(false);
    });
});

describe('RuleTableSchema', () => {
    const base = {
        protected: { label: 'Vending Machine', patterns: ['AMK POD'] },
        groups: [
            { id: 'utility', stage: 'utility', rules: [{ patterns: ['SIMPLEBILLS'], label: 'Electricity' }] },
            {
                id: 'fuel',
                stage: 'threshold',
                rules: [{ patterns: ['SHELL'], label: 'Gasoline', amount: { min: 30 } }],
            },
            { id: 'streaming', stage: 'identity', rules: [{ patterns: ['NETFLIX'], label: 'Netflix' }] },
        ],
    };

    it('accepts groups in stage order', () => {
        expect(RuleTableSchema.safeParse(base).success).toBe(true);
    });

    it('rejects groups out of stage order', () => {
        const result = RuleTableSchema.safeParse({ ...base, groups: [...base.groups].reverse() });
        expect(result.success).toBe(false);
    });

    it('rejects duplicate group ids', () => {
        const groups = [...base.groups, { id: 'streaming', stage: 'derived', rules: [] }];
        const result = RuleTableSchema.safeParse({ ...base, groups });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0].message).toBe('Duplicate group id "streaming"');
        }
    });

    it('rejects reserved group ids', () => {
        const groups = [...base.groups, { id: 'reassert', stage: 'derived', rules: [] }];
        expect(RuleTableSchema.safeParse({ ...base, groups }).success).toBe(false);
    });

    it('requires an amount predicate on threshold rules', () => {
        const groups = [base.groups[0], { id: 'fuel', stage: 'threshold', rules: [{ patterns: ['SHELL'], label: 'Gas' }] }];
        const result = RuleTableSchema.safeParse({ ...base, groups });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0].message).toBe('Threshold rule "Gas" needs an amount predicate');
        }
    });
});

describe('SourceSchema', () => {
    it('rejects an invalid filename pattern', () => {
        const result = SourceSchema.safeParse({
            name: 'broken',
            adapter: 'signed_debit',
            pattern: '([unclosed',
            origin_tag: 'X',
        });
        expect(result.success).toBe(false);
    });

    it('rejects an unknown adapter kind', () => {
        const result = SourceSchema.safeParse({ name: 'x', adapter: 'ofx', pattern: 'x', origin_tag: 'X' });
        expect(result.success).toBe(false);
    });
});

describe('WorkspaceSettingsSchema', () => {
    it('fills defaults for an empty document', () => {
        const settings = WorkspaceSettingsSchema.parse({});
        expect(settings.encodings).toEqual(['utf-8', 'latin1', 'windows-1252', 'iso-8859-1']);
        expect(settings.sources.map((s) => s.name)).toEqual(['capital_one', 'discover', 'chase_extracted']);
        expect(settings.output.filename).toBe('All_Transactions_Merged.csv');
        expect(settings.extraction).toBeUndefined();
    });
});

describe('ExtractionSettingsSchema', () => {
    it('fills defaults around the command', () => {
        const settings = ExtractionSettingsSchema.parse({ command: 'statement-extract' });
        expect(settings).toEqual({
            command: 'statement-extract',
            args: [],
            timeout_ms: 300_000,
            output_file: 'Chase_Extracted_Transactions.csv',
            documents: [],
        });
    });
});

describe('RunManifestSchema', () => {
    it('validates a manifest with no dated transactions', () => {
        const result = RunManifestSchema.safeParse({
            run_timestamp: '2025-03-10T12:00:00.000Z',
            input_files: {},
            transaction_count: 0,
            label_counts: {},
            origin_counts: {},
            date_range: null,
            version: '0.1.0',
        });
        expect(result.success).toBe(true);
    });
});
