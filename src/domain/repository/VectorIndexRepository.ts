import type { FileWrite, ScoredVectorRecord, VectorRecord } from '../model/VectorRecord.js';

export interface VectorIndexRepository {
    /** Insert or overwrite the record keyed by its id. */
    upsert(record: VectorRecord): Promise<void>;
    deleteByFile(fileIdentity: string): Promise<number>;
    /** Delete the file's records whose ordinal is at or above `fromOrdinal`. */
    deleteOrdinalsFrom(fileIdentity: string, fromOrdinal: number): Promise<number>;
    /**
     * Apply one file's records atomically: readers see either the previous
     * records of the file or the new ones, never a mix.
     */
    commitFile(write: FileWrite): Promise<void>;
    query(embedding: number[], k: number): Promise<ScoredVectorRecord[]>;
    count(): Promise<number>;
    countByFile(fileIdentity: string): Promise<number>;
}
