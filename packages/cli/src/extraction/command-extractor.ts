import { spawnSync } from 'node:child_process';
import type { DocumentExtractor } from '@card-ledger/core';
import type { ExtractionSettings } from '@card-ledger/shared';

const MAX_RESPONSE_BYTES = 64 * 1024 * 1024;

/**
 * Runs the configured extraction command once per document.
 *
 * The command receives `args` followed by the document path, reads the
 * prompt on stdin and answers on stdout. A timeout, a spawn failure or a
 * non-zero exit is thrown to the ladder as a failed attempt.
 */
export class CommandExtractor implements DocumentExtractor {
    constructor(
        private readonly settings: Pick<ExtractionSettings, 'command' | 'args' | 'timeout_ms'>,
        private readonly prompt: string,
        private readonly cwd?: string
    ) {}

    async extract(document: string): Promise<string> {
        const result = spawnSync(this.settings.command, [...this.settings.args, document], {
            cwd: this.cwd,
            input: this.prompt,
            encoding: 'utf8',
            timeout: this.settings.timeout_ms,
            maxBuffer: MAX_RESPONSE_BYTES,
        });

        if (result.error) {
            throw new Error(`${this.settings.command}: ${result.error.message}`);
        }
        if (result.status !== 0) {
            const detail = result.stderr.trim();
            const status = result.status === null ? `signal ${result.signal ?? 'unknown'}` : `status ${result.status}`;
            throw new Error(`${this.settings.command} exited with ${status}${detail ? `: ${detail}` : ''}`);
        }

        return result.stdout;
    }
}
