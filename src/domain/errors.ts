import type { FailureKind } from './model/ManifestEntry.js';

/**
 * Errors confined to a single source file. The batch records them in the
 * manifest and moves on to the next file.
 */
export abstract class FileIngestionError extends Error {
    abstract readonly kind: FailureKind;

    constructor(
        message: string,
        readonly filePath: string
    ) {
        super(message);
    }
}

export class UnsupportedFormatError extends FileIngestionError {
    readonly kind = 'UnsupportedFormat';

    constructor(filePath: string, readonly extension: string) {
        super(`No extractor registered for '${extension || '(none)'}': ${filePath}`, filePath);
        this.name = 'UnsupportedFormatError';
    }
}

export class CorruptFileError extends FileIngestionError {
    readonly kind = 'CorruptFile';

    constructor(filePath: string, cause: unknown) {
        super(`Cannot extract text from ${filePath}: ${describeCause(cause)}`, filePath);
        this.name = 'CorruptFileError';
    }
}

export class EmptyDocumentError extends FileIngestionError {
    readonly kind = 'EmptyDocument';

    constructor(filePath: string, length: number, minLength: number) {
        super(`Extracted text too short (${length} < ${minLength} chars): ${filePath}`, filePath);
        this.name = 'EmptyDocumentError';
    }
}

export class IndexWriteFailureError extends FileIngestionError {
    readonly kind = 'IndexWriteFailure';

    constructor(filePath: string, cause: unknown) {
        super(`Vector index write failed for ${filePath}: ${describeCause(cause)}`, filePath);
        this.name = 'IndexWriteFailureError';
    }
}

export class ContextLengthExceededError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContextLengthExceededError';
    }
}

/** Transport-level failure of the embedding service. Aborts the whole batch. */
export class EmbeddingServiceUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EmbeddingServiceUnavailableError';
    }
}

export class EmbeddingModelNotFoundError extends EmbeddingServiceUnavailableError {
    constructor(message: string) {
        super(message);
        this.name = 'EmbeddingModelNotFoundError';
    }
}

export class ManifestCorruptionError extends Error {
    constructor(
        readonly manifestPath: string,
        cause: unknown
    ) {
        super(`Manifest at ${manifestPath} is unreadable: ${describeCause(cause)}`);
        this.name = 'ManifestCorruptionError';
    }
}

export class IngestionInProgressError extends Error {
    constructor(readonly holderPid: number | null) {
        super(
            holderPid === null
                ? 'An ingestion pass is already running in this process'
                : `An ingestion pass is already running (pid ${holderPid})`
        );
        this.name = 'IngestionInProgressError';
    }
}

export function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
