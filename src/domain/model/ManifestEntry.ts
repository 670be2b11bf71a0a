export type IngestionState = 'succeeded' | 'failed';

export type FailureKind =
    | 'UnsupportedFormat'
    | 'CorruptFile'
    | 'EmptyDocument'
    | 'IndexWriteFailure'
    | 'EmbeddingRejected';

export interface FailureReason {
    kind: FailureKind;
    message: string;
}

export interface ManifestEntry {
    identity: string;
    contentHash: string;
    chunkCount: number;
    ingestedAt: Date;
    status: IngestionState;
    failure: FailureReason | null;
    size: number;
    modifiedAtMs: number;
    category: string;
}

/** File facts captured at scan time and stored alongside the outcome. */
export interface ObservedFile {
    contentHash: string;
    size: number;
    modifiedAtMs: number;
    category: string;
}

// Failures that a later run may fix without the file changing
const RETRYABLE_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>(['IndexWriteFailure']);

export function isRetryableFailure(entry: ManifestEntry): boolean {
    return entry.status === 'failed' && entry.failure !== null && RETRYABLE_FAILURES.has(entry.failure.kind);
}

/** Whether some earlier version of the file made it into the index. */
export function wasEverIndexed(entry: ManifestEntry): boolean {
    return entry.status === 'succeeded' || entry.chunkCount > 0;
}
