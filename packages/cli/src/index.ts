#!/usr/bin/env node
/**
 * Card Ledger CLI
 *
 * The CLI owns all I/O: it reads workspace files into buffers, hands them to
 * the headless core and writes what comes back.
 */

import { Command } from 'commander';
import { processStatements } from './commands/process.js';
import { extractStatements } from './commands/extract.js';
import { runAll } from './commands/run.js';
import { showSummary } from './commands/summary.js';
import { addRule } from './commands/add-rule.js';
import { error } from './utils/console.js';

const program = new Command();

program
    .name('cardledger')
    .description('Normalize credit-card exports and statements into one labeled ledger')
    .version('0.1.0');

program
    .command('process')
    .description('Normalize, merge, classify and export the files in imports/')
    .option('-w, --workspace <dir>', 'workspace root (default: search upward from cwd)')
    .option('--dry-run', 'run every step without writing outputs', false)
    .option('--force', 'overwrite existing outputs', false)
    .action(async (opts: { workspace?: string; dryRun: boolean; force: boolean }) => {
        process.exitCode = await processStatements(opts);
    });

program
    .command('extract')
    .description('Extract transactions from statements in the configured document folders')
    .option('-w, --workspace <dir>', 'workspace root (default: search upward from cwd)')
    .action(async (opts: { workspace?: string }) => {
        process.exitCode = await extractStatements(opts);
    });

program
    .command('run')
    .description('Extract statements, then process')
    .option('-w, --workspace <dir>', 'workspace root (default: search upward from cwd)')
    .option('--dry-run', 'run every step without writing outputs', false)
    .option('--force', 'overwrite existing outputs', false)
    .action(async (opts: { workspace?: string; dryRun: boolean; force: boolean }) => {
        process.exitCode = await runAll(opts);
    });

program
    .command('summary')
    .description('Print spending totals from the canonical output')
    .option('-w, --workspace <dir>', 'workspace root (default: search upward from cwd)')
    .action(async (opts: { workspace?: string }) => {
        process.exitCode = await showSummary(opts);
    });

program
    .command('add-rule')
    .description('Add a classification rule to config/rules.yaml')
    .argument('<pattern>', 'substring to match in descriptions')
    .argument('<label>', 'label to assign')
    .option('-g, --group <id>', 'rule group to append to', 'custom')
    .option('-n, --note <text>', 'note stored with the rule')
    .option('-w, --workspace <dir>', 'workspace root (default: search upward from cwd)')
    .action(async (pattern: string, label: string, opts: { group: string; note?: string; workspace?: string }) => {
        process.exitCode = await addRule(pattern, label, opts);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
