import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_RULES_ASSET = 'default-rules.yaml';
export const EXTRACTION_PROMPT_ASSET = 'extraction-prompt.txt';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        imports: join(root, 'imports'),
        outputs: join(root, 'outputs'),
        config: {
            settingsPath: join(root, 'config', 'card-ledger.yaml'),
            rulesPath: join(root, 'config', 'rules.yaml'),
        },
    };
}

/**
 * Locates a file shipped in packages/cli/assets.
 *
 * Walks up from this module so the same lookup works from src/ under tsx
 * and from the compiled dist/ tree.
 */
export function resolveAssetPath(name: string): string {
    let current = __dirname;
    while (true) {
        for (const candidate of [join(current, 'assets', name), join(current, 'packages', 'cli', 'assets', name)]) {
            if (existsSync(candidate)) {
                return candidate;
            }
        }
        const parent = dirname(current);
        if (parent === current) {
            throw new Error(`Asset not found: ${name}`);
        }
        current = parent;
    }
}

export function getOutputFilePath(workspace: Workspace, filename: string): string {
    return join(workspace.outputs, filename);
}

export function getManifestPath(workspace: Workspace): string {
    return join(workspace.outputs, 'run_manifest.json');
}

export function getAnalysisPath(workspace: Workspace): string {
    return join(workspace.outputs, 'analysis.xlsx');
}
