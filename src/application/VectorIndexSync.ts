import type { FailedFileReport, IngestedFileReport } from '../domain/model/IngestionReport.js';
import type { FailureKind } from '../domain/model/ManifestEntry.js';
import type { SourceFile } from '../domain/model/SourceFile.js';
import { vectorRecordId, type VectorRecord } from '../domain/model/VectorRecord.js';
import type { FileManifest } from '../domain/repository/FileManifest.js';
import type { VectorIndexRepository } from '../domain/repository/VectorIndexRepository.js';
import type { EmbeddingProvider } from '../domain/service/EmbeddingProvider.js';
import {
    ContextLengthExceededError,
    EmbeddingServiceUnavailableError,
    IndexWriteFailureError,
    describeCause
} from '../domain/errors.js';
import { BoundedPool } from '../infrastructure/concurrency/BoundedPool.js';
import type { PreparedFile } from './DocumentLoader.js';
import logger from '../infrastructure/logger/index.js';

export interface MergeReport {
    outcome: 'completed' | 'aborted';
    reason: string | null;
    ingested: IngestedFileReport[];
    failed: FailedFileReport[];
    /** Files left uncommitted because the batch aborted. */
    pending: string[];
    embeddingCalls: number;
}

export interface VectorIndexSyncOptions {
    embeddingConcurrency: number;
}

/**
 * Embeds prepared chunks and merges them into the vector index.
 *
 * Per file the order is fixed: embed every chunk, write all records in one
 * index commit (deleting superseded records first), then record the file in
 * the manifest. A file whose commit did not happen keeps no manifest success
 * and is fully redone on the next run.
 */
export class VectorIndexSync {
    constructor(
        private indexRepo: VectorIndexRepository,
        private embeddingProvider: EmbeddingProvider,
        private manifest: FileManifest,
        private options: VectorIndexSyncOptions
    ) {}

    async merge(files: PreparedFile[], supersededFileIdentities: ReadonlySet<string>): Promise<MergeReport> {
        const report: MergeReport = {
            outcome: 'completed',
            reason: null,
            ingested: [],
            failed: [],
            pending: [],
            embeddingCalls: 0
        };

        if (files.length === 0) {
            return report;
        }

        const pool = new BoundedPool(this.options.embeddingConcurrency);
        const batch: BatchState = { pool, abortedBy: null, report };

        await Promise.all(
            files.map(file => this.mergeFile(file, supersededFileIdentities.has(file.source.identity), batch))
        );

        if (batch.abortedBy) {
            report.outcome = 'aborted';
            report.reason = batch.abortedBy.message;
            logger.error(
                `Ingestion batch aborted: ${batch.abortedBy.message}. ` +
                `${report.pending.length} file(s) left for the next run`
            );
        }

        return report;
    }

    /** Drops the records and manifest entries of files that disappeared. */
    async removeFiles(identities: string[]): Promise<string[]> {
        const removed: string[] = [];

        for (const identity of identities) {
            try {
                const deleted = await this.indexRepo.deleteByFile(identity);
                await this.manifest.remove(identity);
                removed.push(identity);
                logger.info(`Removed from index: ${identity} (${deleted} records)`);
            } catch (error) {
                logger.error(`Failed to remove ${identity} from index`, error);
            }
        }

        return removed;
    }

    private async mergeFile(file: PreparedFile, supersede: boolean, batch: BatchState): Promise<void> {
        const { source, chunks } = file;
        const { report } = batch;

        let embeddings: number[][];
        try {
            embeddings = await Promise.all(chunks.map(chunk => batch.pool.run(() => {
                report.embeddingCalls++;
                return this.embeddingProvider.embed(chunk.text);
            })));
        } catch (error) {
            if (error instanceof ContextLengthExceededError) {
                await this.fail(source, 'EmbeddingRejected', error.message, report);
                return;
            }

            const outage = error instanceof EmbeddingServiceUnavailableError
                ? error
                : new EmbeddingServiceUnavailableError(`Embedding failed: ${describeCause(error)}`);
            if (!batch.abortedBy) {
                batch.abortedBy = outage;
                batch.pool.close(outage);
            }
            report.pending.push(source.identity);
            return;
        }

        // Nothing commits once the batch is aborting
        if (batch.abortedBy) {
            report.pending.push(source.identity);
            return;
        }

        const ingestedAt = new Date();
        const records: VectorRecord[] = chunks.map((chunk, i) => ({
            id: vectorRecordId(source.identity, chunk.ordinal),
            fileIdentity: source.identity,
            ordinal: chunk.ordinal,
            embedding: embeddings[i] ?? [],
            text: chunk.text,
            metadata: {
                filePath: source.identity,
                format: source.format,
                category: source.category,
                ingestedAt,
                startOffset: chunk.startOffset,
                endOffset: chunk.endOffset
            }
        }));

        try {
            await this.indexRepo.commitFile({ fileIdentity: source.identity, records, supersede });
        } catch (error) {
            const failure = new IndexWriteFailureError(source.identity, error);
            await this.fail(source, failure.kind, failure.message, report);
            return;
        }

        try {
            await this.manifest.recordSuccess(source.identity, source.contentHash, records.length, ingestedAt, {
                size: source.size,
                modifiedAtMs: source.modifiedAt.getTime(),
                category: source.category
            });
        } catch (error) {
            // Records are in the index; the next run re-upserts the same ids
            logger.error(`Manifest commit failed for ${source.identity}`, error);
            report.failed.push({
                identity: source.identity,
                kind: 'IndexWriteFailure',
                message: `Manifest commit failed: ${describeCause(error)}`
            });
            return;
        }

        report.ingested.push({ identity: source.identity, chunkCount: records.length, change: file.change });
        logger.info(`Indexed: ${source.identity} (${records.length} chunks)`);
    }

    private async fail(
        source: SourceFile,
        kind: FailureKind,
        message: string,
        report: MergeReport
    ): Promise<void> {
        logger.warn(`Failed to ingest ${source.identity}: ${message}`);
        report.failed.push({ identity: source.identity, kind, message });
        try {
            await this.manifest.recordFailure(source.identity, { kind, message }, {
                contentHash: source.contentHash,
                size: source.size,
                modifiedAtMs: source.modifiedAt.getTime(),
                category: source.category
            });
        } catch (error) {
            logger.error(`Could not record failure for ${source.identity}`, error);
        }
    }
}

interface BatchState {
    pool: BoundedPool;
    abortedBy: EmbeddingServiceUnavailableError | null;
    report: MergeReport;
}
