/**
 * Error taxonomy for the ingestion pipeline.
 *
 * ARCHITECTURAL NOTE: Core throws or returns these; the CLI decides whether a
 * failure skips one file or aborts a step.
 */

/**
 * Base class carrying a stable code and the offending file or document.
 */
export abstract class LedgerError extends Error {
    abstract readonly code: string;

    constructor(message: string, readonly subject: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * No candidate text encoding could decode a source file.
 */
export class DecodingError extends LedgerError {
    readonly code = 'DECODING_FAILED';

    constructor(sourceFile: string, readonly triedEncodings: readonly string[]) {
        super(
            `Could not decode ${sourceFile} with any encoding (tried: ${triedEncodings.join(', ')})`,
            sourceFile
        );
    }
}

/**
 * Extractor output stayed unparseable after repair and one retry.
 */
export class MalformedExtractionOutput extends LedgerError {
    readonly code = 'MALFORMED_EXTRACTION_OUTPUT';

    constructor(
        document: string,
        readonly attempts: number,
        readonly reason: string,
        readonly responsePreview: string
    ) {
        super(`Extraction output for ${document} is malformed after ${attempts} attempt(s): ${reason}`, document);
    }
}

/**
 * A file a downstream stage depends on does not exist.
 */
export class MissingInputError extends LedgerError {
    readonly code = 'MISSING_INPUT';

    constructor(path: string, readonly stage: string) {
        super(`Expected input for ${stage} not found: ${path}`, path);
    }
}

/**
 * A source table lacks columns its adapter reads.
 */
export class MissingColumnsError extends LedgerError {
    readonly code = 'MISSING_COLUMNS';

    constructor(sourceFile: string, readonly adapter: string, readonly missing: readonly string[]) {
        super(`${adapter} adapter: ${sourceFile} is missing column(s): ${missing.join(', ')}`, sourceFile);
    }
}
