import { mkdtemp, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';

export const CAPITAL_ONE_CSV = [
    'Transaction Date,Posted Date,Card No.,Description,Category,Debit,Credit',
    '2025-03-01,2025-03-02,1234,SHELL OIL 12345,Gas/Automotive,12.50,',
    '2025-03-05,2025-03-06,1234,AMK MSU POD UNION,Dining,2.00,',
    '2025-03-06,2025-03-07,1234,PAYMENT THANK YOU,Payment/Credit,,100.00',
].join('\n');

export const DISCOVER_CSV = [
    'Trans. Date,Post Date,Description,Amount,Category',
    '03/02/2025,03/02/2025,NETFLIX.COM,15.49,Services',
    '03/04/2025,03/04/2025,CORNER BOOKSHOP,20.00,Merchandise',
    '03/10/2025,03/10/2025,INTERNET PAYMENT - THANK YOU,-200.00,Payments and Credits',
].join('\n');

/**
 * Creates a temporary workspace with config/card-ledger.yaml and imports/.
 */
export async function createWorkspace(settings = ''): Promise<string> {
    const root = await mkdtemp(join(tmpdir(), 'card-ledger-'));
    await mkdir(join(root, 'config'), { recursive: true });
    await mkdir(join(root, 'imports'), { recursive: true });
    await writeFile(join(root, 'config', 'card-ledger.yaml'), settings);
    return root;
}

export async function writeImport(root: string, filename: string, content: string | Uint8Array): Promise<void> {
    await writeFile(join(root, 'imports', filename), content);
}

/**
 * Silences the CLI console helpers for the current test.
 */
export function silenceConsole(): void {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
}
