import type { FailureReason, ManifestEntry, ObservedFile } from '../model/ManifestEntry.js';

export interface ManifestLoadResult {
    entries: number;
    /** True when a corrupt manifest was discarded and ingestion starts over. */
    recovered: boolean;
}

export interface FileManifest {
    load(): Promise<ManifestLoadResult>;
    lookup(identity: string): ManifestEntry | null;
    recordSuccess(
        identity: string,
        contentHash: string,
        chunkCount: number,
        timestamp: Date,
        observed?: Omit<ObservedFile, 'contentHash'>
    ): Promise<void>;
    recordFailure(identity: string, reason: FailureReason, observed?: ObservedFile): Promise<void>;
    remove(identity: string): Promise<void>;
    clear(): Promise<void>;
    listAll(): ManifestEntry[];
    getLastRunAt(): Date | null;
    setLastRunAt(timestamp: Date): Promise<void>;
}
