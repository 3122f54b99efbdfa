/**
 * Text-level repair of extractor responses.
 */

const FENCE = '```';

/**
 * Close a JSON document that was cut off mid-stream.
 *
 * Depths are plain character counts, so braces inside string values count
 * too. A backslash escapes the next character wherever it appears.
 */
export function repairTruncatedJson(text: string): string {
    const braceDepth = countChar(text, '{') - countChar(text, '}');
    const bracketDepth = countChar(text, '[') - countChar(text, ']');

    let inString = false;
    let escaped = false;
    for (const char of text) {
        if (escaped) {
            escaped = false;
            continue;
        }
        if (char === '\\') {
            escaped = true;
            continue;
        }
        if (char === '"') {
            inString = !inString;
        }
    }

    let repaired = inString ? `${text}"` : text;

    repaired = repaired.trimEnd();
    if (repaired.endsWith(',')) {
        repaired = repaired.slice(0, -1);
    }

    return repaired + '}'.repeat(Math.max(0, braceDepth)) + ']'.repeat(Math.max(0, bracketDepth));
}

/**
 * Remove a markdown code fence around a response.
 *
 * Drops an opening ``` line (with any language tag) and a closing ``` line,
 * or a ``` suffix left on the last line.
 */
export function stripCodeFence(text: string): string {
    let body = text.trim();

    if (body.startsWith(FENCE)) {
        const lines = body.split('\n');
        const last = lines[lines.length - 1];
        body = lines.length > 1 && last.trim() === FENCE
            ? lines.slice(1, -1).join('\n')
            : lines.slice(1).join('\n');
    }

    if (body.endsWith(FENCE)) {
        body = body.slice(0, -FENCE.length);
    }

    return body;
}

function countChar(text: string, char: string): number {
    let count = 0;
    for (const c of text) {
        if (c === char) count++;
    }
    return count;
}
