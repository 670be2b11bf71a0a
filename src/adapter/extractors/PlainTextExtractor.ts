import type { FormatExtractor } from '../../domain/service/FormatExtractor.js';

export class PlainTextExtractor implements FormatExtractor {
    readonly format = 'text';
    readonly extensions = ['.txt'];

    async extract(_filePath: string, content: Buffer): Promise<string> {
        return decodeUtf8(content);
    }
}

export function decodeUtf8(content: Buffer): string {
    const text = content.toString('utf-8');
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
