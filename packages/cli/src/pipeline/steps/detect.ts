import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { detectSource } from '@card-ledger/core';
import type { PipelineStep, InputFile } from '../types.js';
import { hashFile } from '../../utils/hash.js';
import { isNotFound } from '../../utils/files.js';

/**
 * Step 2: File Detection
 * Lists files in the imports directory, hashes them, and matches them to
 * configured sources.
 */
export const detectFiles: PipelineStep = async (state) => {
    const importsPath = state.workspace.imports;

    try {
        const entries = (await readdir(importsPath)).sort();
        const files: InputFile[] = [];

        for (const filename of entries) {
            // Skip hidden and temporary files
            if (filename.startsWith('.') || filename.startsWith('~')) {
                continue;
            }

            const filePath = join(importsPath, filename);
            const s = await stat(filePath);
            if (!s.isFile()) {
                continue;
            }

            const detection = detectSource(filename, state.settings.sources);
            files.push({
                path: filePath,
                filename,
                hash: await hashFile(filePath),
                sourceName: detection?.source.name,
            });

            if (!detection) {
                state.warnings.push(`File skipped (no matching source): ${filename}`);
            }
        }

        state.files = files;

        if (!files.some((f) => f.sourceName !== undefined)) {
            const patterns = state.settings.sources.map((s) => s.pattern).join(', ');
            state.errors.push({
                step: 'detect',
                message: `No source files found in ${importsPath}. Expected names matching: ${patterns}`,
                fatal: true,
            });
        }
    } catch (err) {
        state.errors.push({
            step: 'detect',
            message: isNotFound(err)
                ? `Imports directory not found: ${importsPath}`
                : `Error scanning directory ${importsPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
