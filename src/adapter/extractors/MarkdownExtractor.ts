import removeMarkdown from 'remove-markdown';
import type { FormatExtractor } from '../../domain/service/FormatExtractor.js';
import { decodeUtf8 } from './PlainTextExtractor.js';

export class MarkdownExtractor implements FormatExtractor {
    readonly format = 'markdown';
    readonly extensions = ['.md', '.markdown'];

    async extract(_filePath: string, content: Buffer): Promise<string> {
        return removeMarkdown(decodeUtf8(content), {
            stripListLeaders: true,
            gfm: true,
            useImgAltText: true
        });
    }
}
