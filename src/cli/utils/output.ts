import type { IngestionReport, IngestionStatus } from '../../domain/model/IngestionReport.js';
import type { SearchResult } from '../../domain/model/SearchResult.js';

export function formatReport(report: IngestionReport, json: boolean): string {
    if (json) {
        return JSON.stringify(report, null, 2);
    }

    const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);
    const lines: string[] = [];
    lines.push(`Ingestion ${report.outcome} in ${seconds}s`);
    if (report.reason) {
        lines.push(`Reason: ${report.reason}`);
    }
    if (report.manifestRecovered) {
        lines.push('Manifest was unreadable and has been rebuilt from scratch.');
    }
    lines.push(
        `Ingested: ${report.ingested.length} | Unchanged: ${report.unchanged} | ` +
        `Failed: ${report.failed.length} | Removed: ${report.removed.length} | Pending: ${report.pending.length}`
    );
    lines.push(`Embedding calls: ${report.embeddingCalls}`);

    for (const file of report.ingested) {
        lines.push(`  + ${file.identity} (${file.chunkCount} chunks, ${file.change})`);
    }
    for (const file of report.failed) {
        lines.push(`  ! ${file.identity} [${file.kind}] ${file.message}`);
    }
    for (const identity of report.removed) {
        lines.push(`  - ${identity}`);
    }

    return lines.join('\n');
}

export function formatStatus(status: IngestionStatus, json: boolean): string {
    if (json) {
        return JSON.stringify(status, null, 2);
    }

    const lastRun = status.lastRunTimestamp
        ? status.lastRunTimestamp.toLocaleString()
        : 'never';

    const lines = [
        `Ingestion Status`,
        `----------------`,
        `Running: ${status.running ? 'yes' : 'no'}`,
        `Files tracked: ${status.totalFiles}`,
        `Ingested: ${status.ingestedFiles}`,
        `Failed: ${status.failedFiles}`,
        `Last run: ${lastRun}`
    ];

    const categories = Object.entries(status.categories);
    if (categories.length > 0) {
        lines.push('Categories:');
        for (const [category, count] of categories) {
            lines.push(`  ${category}: ${count}`);
        }
    }

    return lines.join('\n');
}

export function formatSearchResults(results: SearchResult[], tookMs: number, json: boolean): string {
    if (json) {
        return JSON.stringify({ results, took_ms: tookMs }, null, 2);
    }

    if (results.length === 0) {
        return 'No results found.';
    }

    const lines: string[] = [];
    lines.push(`Found ${results.length} results (${tookMs}ms)\n`);

    for (const result of results) {
        const score = (result.score * 100).toFixed(1);
        lines.push(`[${score}%] ${result.path} #${result.ordinal} (${result.category})`);

        const preview = result.content
            .replace(/\n/g, ' ')
            .substring(0, 150)
            .trim();
        lines.push(`    ${preview}${result.content.length > 150 ? '...' : ''}`);
        lines.push('');
    }

    return lines.join('\n');
}

export function formatError(message: string): string {
    return `Error: ${message}`;
}
