import * as path from 'path';
import type { FormatTag } from '../../domain/model/SourceFile.js';
import type { FormatExtractor } from '../../domain/service/FormatExtractor.js';
import { CorruptFileError, UnsupportedFormatError } from '../../domain/errors.js';
import { PlainTextExtractor } from './PlainTextExtractor.js';
import { MarkdownExtractor } from './MarkdownExtractor.js';
import { PdfExtractor } from './PdfExtractor.js';
import { DocxExtractor } from './DocxExtractor.js';

/**
 * Extractors keyed by format tag. Supporting a new format means registering
 * another extractor; lookups go through the file extension.
 */
export class ExtractorRegistry {
    private byFormat = new Map<FormatTag, FormatExtractor>();
    private byExtension = new Map<string, FormatExtractor>();

    register(extractor: FormatExtractor): this {
        const previous = this.byFormat.get(extractor.format);
        if (previous) {
            for (const ext of previous.extensions) {
                this.byExtension.delete(ext);
            }
        }

        this.byFormat.set(extractor.format, extractor);
        for (const ext of extractor.extensions) {
            this.byExtension.set(ext.toLowerCase(), extractor);
        }
        return this;
    }

    formatOf(filePath: string): FormatTag | null {
        return this.byExtension.get(path.extname(filePath).toLowerCase())?.format ?? null;
    }

    supportedExtensions(): string[] {
        return [...this.byExtension.keys()].sort();
    }

    async extract(filePath: string, content: Buffer): Promise<string> {
        const ext = path.extname(filePath).toLowerCase();
        const extractor = this.byExtension.get(ext);
        if (!extractor) {
            throw new UnsupportedFormatError(filePath, ext);
        }

        try {
            return await extractor.extract(filePath, content);
        } catch (error) {
            throw new CorruptFileError(filePath, error);
        }
    }
}

export function createDefaultExtractorRegistry(): ExtractorRegistry {
    return new ExtractorRegistry()
        .register(new PlainTextExtractor())
        .register(new MarkdownExtractor())
        .register(new PdfExtractor())
        .register(new DocxExtractor());
}
