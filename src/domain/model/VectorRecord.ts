import type { FormatTag } from './SourceFile.js';

export interface VectorRecordMetadata {
    filePath: string;
    format: FormatTag;
    category: string;
    ingestedAt: Date;
    startOffset: number;
    endOffset: number;
}

export interface VectorRecord {
    id: string;
    fileIdentity: string;
    ordinal: number;
    embedding: number[];
    text: string;
    metadata: VectorRecordMetadata;
}

export interface ScoredVectorRecord {
    record: VectorRecord;
    score: number;
}

/** One file's worth of records, applied to the index as a single unit. */
export interface FileWrite {
    fileIdentity: string;
    records: VectorRecord[];
    /** Remove every existing record of the file before inserting. */
    supersede: boolean;
}

export function vectorRecordId(fileIdentity: string, ordinal: number): string {
    return `${fileIdentity}#${ordinal}`;
}
