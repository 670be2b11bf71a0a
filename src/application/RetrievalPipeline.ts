import type { FileManifest } from '../domain/repository/FileManifest.js';
import type { ManifestEntry } from '../domain/model/ManifestEntry.js';
import {
    emptyReport,
    type IngestionReport,
    type IngestionStatus
} from '../domain/model/IngestionReport.js';
import type { SearchOptions, SearchResult } from '../domain/model/SearchResult.js';
import { IngestionInProgressError, describeCause } from '../domain/errors.js';
import type { IngestionLock } from '../infrastructure/process/IngestionLock.js';
import type { DocumentLoader, LoadOptions } from './DocumentLoader.js';
import type { VectorIndexSync } from './VectorIndexSync.js';
import type { SearchUseCase } from './SearchUseCase.js';
import logger from '../infrastructure/logger/index.js';

export interface RetrievalPipelineDependencies {
    manifest: FileManifest;
    loader: DocumentLoader;
    sync: VectorIndexSync;
    lock: IngestionLock;
    searchUseCase: SearchUseCase;
    /** The vector index was created or wiped on open, so manifest entries are stale. */
    indexWasReset: boolean;
    /** Releases what the pipeline was built on, typically the index database. */
    onClose?: () => void;
}

/**
 * Startup orchestration around the loader and the index sync. Ingestion
 * errors are reported, never thrown: a failed pass leaves the existing index
 * available for retrieval.
 */
export class RetrievalPipeline {
    private running = false;
    private lastReport: IngestionReport | null = null;
    private manifestRecovered = false;

    constructor(private deps: RetrievalPipelineDependencies) {}

    /**
     * Loads the manifest and runs the startup pass. Never throws; failures
     * come back as an `aborted` report.
     *
     * `createRetrievalPipeline` probes the embedding service before any of
     * this runs and throws when it is unreachable, so through that factory an
     * outage at startup also leaves search unavailable. Callers that must
     * serve queries regardless should build the pipeline from its parts.
     */
    async start(options: LoadOptions = {}): Promise<IngestionReport> {
        const { manifest, loader } = this.deps;

        try {
            const loaded = await manifest.load();
            this.manifestRecovered = loaded.recovered;

            if (this.deps.indexWasReset && loaded.entries > 0) {
                logger.warn(`Vector index is new; discarding ${loaded.entries} manifest entries`);
                await manifest.clear();
            }

            await loader.ensureLayout();
        } catch (error) {
            logger.error('Failed to prepare ingestion', error);
            const report = this.finish(emptyReport(new Date()), 'aborted', describeCause(error));
            this.lastReport = report;
            return report;
        }

        return this.ingest(options);
    }

    /** One guarded ingestion pass; also the entry point for a manual re-scan. */
    async ingest(options: LoadOptions = {}): Promise<IngestionReport> {
        const startedAt = new Date();

        if (this.running) {
            const busy = new IngestionInProgressError(null);
            logger.warn(busy.message);
            return this.finish(emptyReport(startedAt), 'skipped', busy.message);
        }

        this.running = true;
        let report: IngestionReport;
        try {
            const attempt = await this.deps.lock.acquire();
            if (!attempt.acquired) {
                const busy = new IngestionInProgressError(attempt.holderPid);
                logger.warn(busy.message);
                return this.finish(emptyReport(startedAt), 'skipped', busy.message);
            }

            try {
                report = await this.runPass(options, startedAt);
            } finally {
                await this.deps.lock.release();
            }
        } catch (error) {
            logger.error('Ingestion pass failed', error);
            report = this.finish(emptyReport(startedAt), 'aborted', describeCause(error));
        } finally {
            this.running = false;
        }

        this.lastReport = report;
        return report;
    }

    getIngestionStatus(): IngestionStatus {
        return buildIngestionStatus(
            this.deps.manifest.listAll(),
            this.deps.manifest.getLastRunAt(),
            this.lastReport,
            this.running
        );
    }

    search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
        return this.deps.searchUseCase.search(query, options);
    }

    close(): void {
        this.deps.onClose?.();
    }

    private async runPass(options: LoadOptions, startedAt: Date): Promise<IngestionReport> {
        const { loader, sync, manifest } = this.deps;
        const report = emptyReport(startedAt);
        report.manifestRecovered = this.manifestRecovered;
        this.manifestRecovered = false;

        logger.info(options.force ? 'Starting ingestion pass (retrying failed files)' : 'Starting ingestion pass');

        const loaded = await loader.load(options);
        report.unchanged = loaded.unchanged;
        report.failed.push(...loaded.failed);

        report.removed = await sync.removeFiles(loaded.removed);

        const merged = await sync.merge(loaded.files, loaded.superseded);
        report.ingested = merged.ingested;
        report.failed.push(...merged.failed);
        report.pending = merged.pending;
        report.embeddingCalls = merged.embeddingCalls;

        this.finish(report, merged.outcome, merged.reason);

        try {
            await manifest.setLastRunAt(report.finishedAt);
        } catch (error) {
            logger.error('Failed to record the ingestion timestamp', error);
        }

        logger.info(
            `Ingestion ${report.outcome}: ${report.ingested.length} ingested, ${report.unchanged} unchanged, ` +
            `${report.failed.length} failed, ${report.removed.length} removed`
        );

        return report;
    }

    private finish(report: IngestionReport, outcome: IngestionReport['outcome'], reason: string | null): IngestionReport {
        report.outcome = outcome;
        report.reason = reason;
        report.finishedAt = new Date();
        return report;
    }
}

export function buildIngestionStatus(
    entries: ManifestEntry[],
    lastRunTimestamp: Date | null,
    lastReport: IngestionReport | null,
    running: boolean
): IngestionStatus {
    const categories: Record<string, number> = {};
    let ingestedFiles = 0;
    let failedFiles = 0;

    for (const entry of entries) {
        if (entry.status === 'succeeded') {
            ingestedFiles++;
            categories[entry.category] = (categories[entry.category] ?? 0) + 1;
        } else {
            failedFiles++;
        }
    }

    const ingested = lastReport?.ingested ?? [];

    return {
        totalFiles: entries.length,
        ingestedFiles,
        newThisRun: ingested.filter(file => file.change === 'new').length,
        updatedThisRun: ingested.filter(file => file.change === 'changed').length,
        failedFiles,
        lastRunTimestamp,
        running,
        categories
    };
}
