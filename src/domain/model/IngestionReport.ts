import type { FailureKind } from './ManifestEntry.js';

export type IngestionOutcome = 'completed' | 'aborted' | 'skipped';

export interface IngestedFileReport {
    identity: string;
    chunkCount: number;
    change: 'new' | 'changed';
}

export interface FailedFileReport {
    identity: string;
    kind: FailureKind;
    message: string;
}

export interface IngestionReport {
    outcome: IngestionOutcome;
    /** Set when the outcome is not 'completed'. */
    reason: string | null;
    startedAt: Date;
    finishedAt: Date;
    ingested: IngestedFileReport[];
    failed: FailedFileReport[];
    unchanged: number;
    removed: string[];
    /** Files queued for embedding that were not committed because the batch aborted. */
    pending: string[];
    embeddingCalls: number;
    manifestRecovered: boolean;
}

export interface IngestionStatus {
    totalFiles: number;
    ingestedFiles: number;
    newThisRun: number;
    updatedThisRun: number;
    failedFiles: number;
    lastRunTimestamp: Date | null;
    running: boolean;
    /** Successfully ingested files per document category. */
    categories: Record<string, number>;
}

export function emptyReport(startedAt: Date): IngestionReport {
    return {
        outcome: 'completed',
        reason: null,
        startedAt,
        finishedAt: startedAt,
        ingested: [],
        failed: [],
        unchanged: 0,
        removed: [],
        pending: [],
        embeddingCalls: 0,
        manifestRecovered: false
    };
}
