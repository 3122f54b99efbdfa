import { existsSync } from 'node:fs';
import { mkdir, readdir, stat, writeFile } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { extractRecords, sortByDate, toExtractedCsv, toRawRecords } from '@card-ledger/core';
import type { DocumentExtractor, MalformedExtractionOutput } from '@card-ledger/core';
import type { ExtractionSettings, RawRecord } from '@card-ledger/shared';
import type { Workspace } from '../types.js';
import { arrow } from '../utils/console.js';

const DOCUMENT_PATTERN = /\.pdf$/i;

export interface ExtractionRunResult {
    documentCount: number;
    records: RawRecord[];
    failures: MalformedExtractionOutput[];
    warnings: string[];
    /** Written extracted CSV, or null when nothing was extracted. */
    outputPath: string | null;
}

/**
 * Extracts every statement in the configured document folders, one at a
 * time, and writes the records to imports/<output_file>.
 *
 * Documents are passed to the extractor relative to the workspace root.
 * A document that gives up after the repair ladder contributes no records.
 */
export async function runExtraction(
    workspace: Workspace,
    settings: ExtractionSettings,
    extractor: DocumentExtractor
): Promise<ExtractionRunResult> {
    const warnings: string[] = [];
    const failures: MalformedExtractionOutput[] = [];
    let records: RawRecord[] = [];
    let documentCount = 0;

    for (const folder of settings.documents) {
        const folderPath = join(workspace.root, folder.folder);
        if (!existsSync(folderPath)) {
            warnings.push(`Document folder ${folderPath} does not exist`);
            continue;
        }

        for (const filename of (await readdir(folderPath)).sort()) {
            const filePath = join(folderPath, filename);
            if (filename.startsWith('.') || !DOCUMENT_PATTERN.test(filename) || !(await stat(filePath)).isFile()) {
                continue;
            }

            documentCount++;
            const document = relative(workspace.root, filePath);
            arrow(`Extracting ${document}`);

            const outcome = await extractRecords(extractor, document);
            warnings.push(...outcome.warnings);
            if (outcome.error) {
                failures.push(outcome.error);
                continue;
            }

            const converted = toRawRecords(outcome.records, folder.origin_tag, filename);
            warnings.push(...converted.warnings);
            records = records.concat(converted.records);
        }
    }

    records = sortByDate(records);

    let outputPath: string | null = null;
    if (records.length > 0) {
        await mkdir(workspace.imports, { recursive: true });
        outputPath = join(workspace.imports, settings.output_file);
        await writeFile(outputPath, toExtractedCsv(records), 'utf-8');
    }

    return { documentCount, records, failures, warnings, outputPath };
}
