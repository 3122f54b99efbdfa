/**
 * Text decoding with an ordered encoding fallback.
 *
 * ARCHITECTURAL NOTE: Uses the WHATWG TextDecoder so core stays runnable
 * outside Node.
 */

import { DecodingError } from '../errors.js';

export interface DecodedText {
    text: string;
    encoding: string;
}

/**
 * Decode bytes with the first encoding that succeeds.
 *
 * Each candidate is tried in strict (fatal) mode, so a malformed UTF-8
 * sequence fails that candidate instead of producing replacement characters.
 * Labels the runtime does not know count as failures.
 *
 * @throws DecodingError when no candidate decodes the data
 */
export function decodeText(
    data: ArrayBuffer | Uint8Array,
    encodings: readonly string[],
    sourceFile: string
): DecodedText {
    const tried: string[] = [];

    for (const encoding of encodings) {
        let decoder: InstanceType<typeof TextDecoder>;
        try {
            decoder = new TextDecoder(encoding, { fatal: true });
        } catch {
            tried.push(`${encoding} (unsupported)`);
            continue;
        }

        try {
            return { text: decoder.decode(data), encoding };
        } catch {
            tried.push(encoding);
        }
    }

    throw new DecodingError(sourceFile, tried);
}
