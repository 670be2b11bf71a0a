export type FormatTag = 'text' | 'markdown' | 'pdf' | 'docx';

export interface SourceFile {
    /** Canonical absolute path; stable across scans. */
    identity: string;
    contentHash: string;
    format: FormatTag;
    size: number;
    modifiedAt: Date;
    category: string;
}

export const UNCATEGORIZED = 'uncategorized';
