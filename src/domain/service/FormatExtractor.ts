import type { FormatTag } from '../model/SourceFile.js';

export interface FormatExtractor {
    readonly format: FormatTag;
    readonly extensions: readonly string[];
    /** Returns plain text; throws when the bytes cannot be parsed. */
    extract(filePath: string, content: Buffer): Promise<string>;
}
