import { describe, it, expect } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { classify, classifyAll, type RuleTable, type Transaction } from '@card-ledger/core';
import { loadRuleTableFile } from '../src/workspace/config.js';
import { DEFAULT_RULES_ASSET, resolveAssetPath } from '../src/workspace/paths.js';
import { appendRuleToGroup } from '../src/yaml/rules.js';

const SHIPPED = loadRuleTableFile(resolveAssetPath(DEFAULT_RULES_ASSET));

function txn(description: string, amount = '10.00', category = 'Shopping'): Transaction {
    return {
        date: '2025-03-01',
        description,
        amount,
        category,
        origin_tag: 'CapitalOne',
        source_file: 'CapitalOne_2025.csv',
        label: category,
    };
}

function labelOf(description: string, amount = '10.00', category = 'Shopping', table: RuleTable = SHIPPED): string {
    const [result] = classify([txn(description, amount, category)], table);
    return result.label;
}

describe('Shipped rule table', () => {
    describe('vending machines', () => {
        it('should keep campus kiosks out of the restaurant rules', () => {
            const { transactions, stats } = classifyAll([txn('AMK MSU PANDA EXPRESS 123', '6.50', 'Dining')], SHIPPED);
            expect(transactions[0].label).toBe('Vending Machine');
            expect(stats.byGroup).toEqual({ protected: 1 });
        });

        it('should catch the broad CTLP prefix only in the final pass', () => {
            const { transactions, stats } = classifyAll([txn('CTLP*PIZZA CORNER', '3.00', 'Dining')], SHIPPED);
            expect(transactions[0].label).toBe('Vending Machine');
            expect(stats.byGroup).toEqual({ reassert: 1 });
        });

        it('should keep the source category label through an added identity group', async () => {
            const dir = await mkdtemp(join(tmpdir(), 'card-ledger-shipped-'));
            try {
                const rulesPath = join(dir, 'rules.yaml');
                await appendRuleToGroup(rulesPath, resolveAssetPath(DEFAULT_RULES_ASSET), 'custom', {
                    patterns: ['CAMPUS SNACK'],
                    label: 'Snacks',
                });
                const table = loadRuleTableFile(rulesPath);

                expect(labelOf('CAMPUS SNACK BAR', '2.25', 'Vending Machine', table)).toBe('Vending Machine');
                expect(labelOf('CAMPUS SNACK BAR', '2.25', 'Dining', table)).toBe('Snacks');
            } finally {
                await rm(dir, { recursive: true, force: true });
            }
        });
    });

    describe('Google services', () => {
        it('should label Google One directly', () => {
            expect(labelOf('GOOGLE *ONE STORAGE', '1.99', 'Services')).toBe('Google One');
        });

        it('should label other PayPal Google charges only while unchanged', () => {
            expect(labelOf('PAYPAL *GOOGLE PLAY', '4.99', 'Services')).toBe('Google Services');
            expect(labelOf('PAYPAL *GOOGLE ONE', '1.99', 'Services')).toBe('Google One');
            expect(labelOf('PAYPAL *GOOGLE CLOUD', '12.00', 'Services')).toBe('API Costs (Google Cloud)');
        });
    });

    describe('Amazon', () => {
        it('should label AWS charges as API costs', () => {
            expect(labelOf('AWS EMEA', '3.10', 'Services')).toBe('API Costs (AWS)');
            expect(labelOf('AMAZON WEB SERVICES', '3.10', 'Services')).toBe('API Costs (AWS)');
        });

        it('should label other Amazon charges as shopping', () => {
            expect(labelOf('AMAZON MKTPL*2K4', '25.00', 'Merchandise')).toBe('Amazon Shopping');
            expect(labelOf('AMAZON PRIME*7Q1', '14.99', 'Merchandise')).toBe('Amazon Prime');
        });

        it('should apply the Amazon rule after the identity groups', () => {
            expect(labelOf('AMAZON HALAL CART', '9.00', 'Dining')).toBe('Amazon Shopping');
        });
    });

    describe('fuel stations', () => {
        it('should split QT by amount', () => {
            expect(labelOf('QT 0412 OUTSIDE', '8.00', 'Gas/Automotive')).toBe('Gas Station Indiscretion');
            expect(labelOf('QT 0412 OUTSIDE', '45.00', 'Gas/Automotive')).toBe('Gasoline');
        });

        it('should require the space after QT', () => {
            expect(labelOf('QTY SUPPLY', '8.00', 'Merchandise')).toBe('Merchandise');
        });
    });
});
