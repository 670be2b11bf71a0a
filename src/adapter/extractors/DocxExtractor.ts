import mammoth from 'mammoth';
import type { FormatExtractor } from '../../domain/service/FormatExtractor.js';
import logger from '../../infrastructure/logger/index.js';

export class DocxExtractor implements FormatExtractor {
    readonly format = 'docx';
    readonly extensions = ['.docx'];

    async extract(filePath: string, content: Buffer): Promise<string> {
        const result = await mammoth.extractRawText({ buffer: content });

        for (const message of result.messages) {
            logger.debug(`mammoth (${filePath}): ${message.message}`);
        }

        return result.value;
    }
}
