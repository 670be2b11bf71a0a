export interface Chunk {
    fileIdentity: string;
    ordinal: number;
    text: string;
    /** UTF-8 byte offsets into the extracted text. */
    startOffset: number;
    endOffset: number;
}

export interface ChunkingOptions {
    maxSize: number;
    overlap: number;
}
