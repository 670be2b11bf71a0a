import { getDocumentProxy } from 'unpdf';
import type { FormatExtractor } from '../../domain/service/FormatExtractor.js';

export class PdfExtractor implements FormatExtractor {
    readonly format = 'pdf';
    readonly extensions = ['.pdf'];

    async extract(_filePath: string, content: Buffer): Promise<string> {
        const pdf = await getDocumentProxy(new Uint8Array(content));

        const pages: string[] = [];
        try {
            for (let i = 1; i <= pdf.numPages; i++) {
                const page = await pdf.getPage(i);
                const textContent = await page.getTextContent();
                const text = textContent.items
                    .map(item => ('str' in item ? item.str : ''))
                    .join(' ');
                pages.push(text.trim());
            }
        } finally {
            await pdf.destroy();
        }

        return pages.filter(text => text.length > 0).join('\n\n');
    }
}
