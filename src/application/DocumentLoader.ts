import * as fs from 'fs/promises';
import * as path from 'path';
import type { LexIndexConfig } from '../domain/model/Config.js';
import type { Chunk } from '../domain/model/Chunk.js';
import type { FailedFileReport } from '../domain/model/IngestionReport.js';
import {
    isRetryableFailure,
    wasEverIndexed,
    type ManifestEntry,
    type ObservedFile
} from '../domain/model/ManifestEntry.js';
import { UNCATEGORIZED, type SourceFile } from '../domain/model/SourceFile.js';
import type { FileManifest } from '../domain/repository/FileManifest.js';
import {
    CorruptFileError,
    EmptyDocumentError,
    FileIngestionError,
    UnsupportedFormatError
} from '../domain/errors.js';
import type { ExtractorRegistry } from '../adapter/extractors/ExtractorRegistry.js';
import type { FileScanner, ScannedFile } from '../infrastructure/filesystem/FileScanner.js';
import type { Chunker } from './Chunker.js';
import logger from '../infrastructure/logger/index.js';

export type FileChange = 'new' | 'changed';

export interface PreparedFile {
    source: SourceFile;
    chunks: Chunk[];
    change: FileChange;
}

export interface LoadOptions {
    /** Retry files whose last ingestion failed even if they did not change. */
    force?: boolean;
}

export interface LoadResult {
    files: PreparedFile[];
    /** Identities whose existing vector records must go before new ones land. */
    superseded: Set<string>;
    failed: FailedFileReport[];
    unchanged: number;
    /** Manifest identities under the documents root that no longer exist. */
    removed: string[];
}

type Classification = FileChange | 'unchanged';

export class DocumentLoader {
    constructor(
        private config: LexIndexConfig,
        private scanner: FileScanner,
        private extractors: ExtractorRegistry,
        private manifest: FileManifest,
        private chunker: Chunker
    ) {}

    /** Creates the documents root and its category folders when missing. */
    async ensureLayout(): Promise<void> {
        const root = this.config.paths.documentsDir;
        for (const category of this.config.ingestion.categories) {
            await fs.mkdir(path.join(root, category), { recursive: true });
        }
    }

    async load(options: LoadOptions = {}): Promise<LoadResult> {
        const result: LoadResult = {
            files: [],
            superseded: new Set(),
            failed: [],
            unchanged: 0,
            removed: []
        };

        const scan = await this.scanner.scanDirectory(this.config.paths.documentsDir);
        logger.info(`Found ${scan.files.length} candidate files under ${this.config.paths.documentsDir}`);

        for (const file of scan.files) {
            const category = scan.root ? this.categoryOf(scan.root, file.path) : UNCATEGORIZED;
            await this.loadFile(file, category, options, result);
        }

        // A partial scan cannot tell a deleted file from an unreadable folder
        if (scan.root && scan.complete) {
            result.removed = this.findRemoved(scan.root, new Set(scan.files.map(file => file.path)));
        }

        logger.info(
            `Scan complete: ${result.files.length} to ingest, ${result.unchanged} unchanged, ` +
            `${result.failed.length} failed, ${result.removed.length} removed`
        );

        return result;
    }

    private async loadFile(
        file: ScannedFile,
        category: string,
        options: LoadOptions,
        result: LoadResult
    ): Promise<void> {
        const entry = this.manifest.lookup(file.path);

        if (this.isFastPathUnchanged(entry, file)) {
            logger.debug(`Unchanged (size and mtime match): ${file.path}`);
            result.unchanged++;
            return;
        }

        const observed: ObservedFile = {
            contentHash: '',
            size: file.size,
            modifiedAtMs: file.modifiedAt.getTime(),
            category
        };

        let content: Buffer;
        try {
            const hashed = await this.scanner.hashFile(file.path);
            content = hashed.content;
            observed.contentHash = hashed.hash;
        } catch (error) {
            await this.recordFailure(new CorruptFileError(file.path, error), observed, result);
            return;
        }

        const classification = this.classify(entry, observed.contentHash, options);
        if (classification === 'unchanged') {
            logger.debug(`Unchanged: ${file.path}`);
            result.unchanged++;
            return;
        }

        try {
            const format = this.extractors.formatOf(file.path);
            if (!format) {
                throw new UnsupportedFormatError(file.path, path.extname(file.path).toLowerCase());
            }

            const source: SourceFile = {
                identity: file.path,
                contentHash: observed.contentHash,
                format,
                size: file.size,
                modifiedAt: file.modifiedAt,
                category
            };

            const text = await this.extractors.extract(file.path, content);
            const length = text.trim().length;
            if (length < this.config.ingestion.minTextLength) {
                throw new EmptyDocumentError(file.path, length, this.config.ingestion.minTextLength);
            }

            const chunks = this.chunker.chunk(source.identity, text);
            if (entry) {
                result.superseded.add(source.identity);
            }
            result.files.push({ source, chunks, change: classification });
            logger.debug(`Prepared ${chunks.length} chunks (${classification}): ${file.path}`);
        } catch (error) {
            if (error instanceof FileIngestionError) {
                await this.recordFailure(error, observed, result);
                return;
            }
            throw error;
        }
    }

    private classify(entry: ManifestEntry | null, contentHash: string, options: LoadOptions): Classification {
        if (!entry) {
            return 'new';
        }
        if (entry.status === 'succeeded') {
            return entry.contentHash === contentHash ? 'unchanged' : 'changed';
        }
        // Same bytes that failed before
        if (entry.contentHash === contentHash && !options.force && !isRetryableFailure(entry)) {
            return 'unchanged';
        }
        return wasEverIndexed(entry) ? 'changed' : 'new';
    }

    private isFastPathUnchanged(entry: ManifestEntry | null, file: ScannedFile): boolean {
        return (
            this.config.ingestion.mtimeFastPath &&
            entry !== null &&
            entry.status === 'succeeded' &&
            entry.size === file.size &&
            entry.modifiedAtMs === file.modifiedAt.getTime()
        );
    }

    private async recordFailure(
        error: FileIngestionError,
        observed: ObservedFile,
        result: LoadResult
    ): Promise<void> {
        logger.warn(`Skipping ${error.filePath}: ${error.message}`);
        result.failed.push({ identity: error.filePath, kind: error.kind, message: error.message });
        await this.manifest.recordFailure(error.filePath, { kind: error.kind, message: error.message }, observed);
    }

    private categoryOf(root: string, filePath: string): string {
        const [first] = path.relative(root, filePath).split(path.sep);
        return first !== undefined && this.config.ingestion.categories.includes(first) ? first : UNCATEGORIZED;
    }

    private findRemoved(root: string, present: Set<string>): string[] {
        const prefix = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
        return this.manifest
            .listAll()
            .map(entry => entry.identity)
            .filter(identity => identity.startsWith(prefix) && !present.has(identity));
    }
}
