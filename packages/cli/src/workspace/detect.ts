import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { Workspace } from '../types.js';
import { error, log } from '../utils/console.js';
import { resolveWorkspace } from './paths.js';

/**
 * Searches for the workspace root by looking for 'config/card-ledger.yaml'.
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, 'config', 'card-ledger.yaml');
        if (existsSync(configPath)) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}

/**
 * Resolves the workspace from an explicit directory or by searching upward
 * from the current directory. Reports and returns null when none is found.
 */
export function openWorkspace(explicit?: string): Workspace | null {
    const root = explicit ? resolve(explicit) : detectWorkspaceRoot();
    if (!root || !existsSync(join(root, 'config', 'card-ledger.yaml'))) {
        error('Workspace not found. Are you in a Card Ledger workspace?');
        log('Expected "config/card-ledger.yaml" in the workspace root.');
        return null;
    }
    return resolveWorkspace(root);
}
