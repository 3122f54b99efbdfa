import { readFile } from 'node:fs/promises';

/**
 * Reads a file into a standalone ArrayBuffer for core adapters.
 */
export async function readArrayBuffer(filePath: string): Promise<ArrayBuffer> {
    const content = await readFile(filePath);
    const buffer = new ArrayBuffer(content.byteLength);
    new Uint8Array(buffer).set(content);
    return buffer;
}

/**
 * True for ENOENT errors from node:fs.
 */
export function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
