import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { FileManifest, ManifestLoadResult } from '../../domain/repository/FileManifest.js';
import type { FailureReason, ManifestEntry, ObservedFile } from '../../domain/model/ManifestEntry.js';
import { UNCATEGORIZED } from '../../domain/model/SourceFile.js';
import { ManifestCorruptionError } from '../../domain/errors.js';
import logger from '../logger/index.js';

const MANIFEST_VERSION = 1;

const entrySchema = z.object({
    identity: z.string().min(1),
    contentHash: z.string(),
    chunkCount: z.number().int().nonnegative(),
    ingestedAt: z.string().datetime(),
    status: z.enum(['succeeded', 'failed']),
    failure: z.object({
        kind: z.enum(['UnsupportedFormat', 'CorruptFile', 'EmptyDocument', 'IndexWriteFailure', 'EmbeddingRejected']),
        message: z.string()
    }).nullable(),
    size: z.number().int().nonnegative(),
    modifiedAtMs: z.number().nonnegative(),
    category: z.string()
});

// Entries are stored keyed by identity, without repeating it
const storedEntrySchema = entrySchema.omit({ identity: true });

const manifestSchema = z.object({
    version: z.literal(MANIFEST_VERSION),
    lastRunAt: z.string().datetime().nullable(),
    entries: z.record(z.string(), storedEntrySchema)
});

type RawManifest = z.infer<typeof manifestSchema>;
type RawEntry = z.infer<typeof entrySchema>;
type StoredEntry = z.infer<typeof storedEntrySchema>;

interface ManifestState {
    entries: Map<string, ManifestEntry>;
    lastRunAt: Date | null;
}

/**
 * Manifest persisted as a single JSON document next to the vector index.
 * Every mutation rewrites the file through a temp file and a rename, so a
 * crash leaves either the previous or the new manifest on disk.
 */
export class JsonFileManifest implements FileManifest {
    private entries: Map<string, ManifestEntry> = new Map();
    private lastRunAt: Date | null = null;
    private writeChain: Promise<void> = Promise.resolve();

    constructor(private readonly manifestPath: string) {}

    getPath(): string {
        return this.manifestPath;
    }

    async load(): Promise<ManifestLoadResult> {
        this.entries.clear();
        this.lastRunAt = null;

        let content: string;
        try {
            content = await fs.readFile(this.manifestPath, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) {
                logger.debug(`No manifest at ${this.manifestPath}, starting empty`);
                return { entries: 0, recovered: false };
            }
            return this.recover(new ManifestCorruptionError(this.manifestPath, error));
        }

        let raw: RawManifest;
        try {
            raw = manifestSchema.parse(JSON.parse(content));
        } catch (error) {
            return this.recover(new ManifestCorruptionError(this.manifestPath, error));
        }

        for (const [identity, entry] of Object.entries(raw.entries)) {
            this.entries.set(identity, fromRaw({ ...entry, identity }));
        }
        this.lastRunAt = raw.lastRunAt ? new Date(raw.lastRunAt) : null;

        logger.debug(`Manifest loaded: ${this.entries.size} entries`);
        return { entries: this.entries.size, recovered: false };
    }

    lookup(identity: string): ManifestEntry | null {
        const entry = this.entries.get(identity);
        return entry ? { ...entry } : null;
    }

    async recordSuccess(
        identity: string,
        contentHash: string,
        chunkCount: number,
        timestamp: Date,
        observed?: Omit<ObservedFile, 'contentHash'>
    ): Promise<void> {
        await this.mutate(next => {
            const previous = next.entries.get(identity);
            next.entries.set(identity, {
                identity,
                contentHash,
                chunkCount,
                ingestedAt: timestamp,
                status: 'succeeded',
                failure: null,
                size: observed?.size ?? previous?.size ?? 0,
                modifiedAtMs: observed?.modifiedAtMs ?? previous?.modifiedAtMs ?? 0,
                category: observed?.category ?? previous?.category ?? UNCATEGORIZED
            });
        });
    }

    async recordFailure(identity: string, reason: FailureReason, observed?: ObservedFile): Promise<void> {
        await this.mutate(next => {
            const previous = next.entries.get(identity);
            next.entries.set(identity, {
                identity,
                contentHash: observed?.contentHash ?? previous?.contentHash ?? '',
                // Records of an earlier version may still be in the index
                chunkCount: previous?.chunkCount ?? 0,
                ingestedAt: new Date(),
                status: 'failed',
                failure: { ...reason },
                size: observed?.size ?? previous?.size ?? 0,
                modifiedAtMs: observed?.modifiedAtMs ?? previous?.modifiedAtMs ?? 0,
                category: observed?.category ?? previous?.category ?? UNCATEGORIZED
            });
        });
    }

    async remove(identity: string): Promise<void> {
        if (!this.entries.has(identity)) {
            return;
        }
        await this.mutate(next => {
            next.entries.delete(identity);
        });
    }

    async clear(): Promise<void> {
        await this.mutate(next => {
            next.entries.clear();
        });
    }

    listAll(): ManifestEntry[] {
        return sortedCopies(this.entries);
    }

    getLastRunAt(): Date | null {
        return this.lastRunAt;
    }

    async setLastRunAt(timestamp: Date): Promise<void> {
        await this.mutate(next => {
            next.lastRunAt = timestamp;
        });
    }

    /**
     * Applies a change to a copy of the manifest, writes the copy, and only
     * then makes it the current state. Lookups never see a change that did
     * not reach the disk. Writes are serialized so each change builds on the
     * one before it.
     */
    private mutate(change: (next: ManifestState) => void): Promise<void> {
        const write = this.writeChain.then(async () => {
            const next: ManifestState = { entries: new Map(this.entries), lastRunAt: this.lastRunAt };
            change(next);
            await this.writeAtomically(serialize(next));
            this.entries = next.entries;
            this.lastRunAt = next.lastRunAt;
        });
        // Keep the chain alive after a failed write; the caller still sees the error
        this.writeChain = write.catch((error: unknown) => {
            logger.error(`Failed to persist manifest: ${this.manifestPath}`, error);
        });
        return write;
    }

    private async writeAtomically(content: string): Promise<void> {
        await fs.mkdir(path.dirname(this.manifestPath), { recursive: true });
        const tmpPath = `${this.manifestPath}.${process.pid}.tmp`;
        await fs.writeFile(tmpPath, content, 'utf-8');
        await fs.rename(tmpPath, this.manifestPath);
    }

    private async recover(error: ManifestCorruptionError): Promise<ManifestLoadResult> {
        logger.warn(`${error.message}. Falling back to full re-ingestion.`);

        const asidePath = `${this.manifestPath}.corrupt-${Date.now()}`;
        try {
            await fs.rename(this.manifestPath, asidePath);
            logger.warn(`Corrupt manifest moved to ${asidePath}`);
        } catch (renameError) {
            logger.warn(`Could not move corrupt manifest aside: ${this.manifestPath}`, renameError);
        }

        return { entries: 0, recovered: true };
    }
}

function sortedCopies(entries: Map<string, ManifestEntry>): ManifestEntry[] {
    return [...entries.values()]
        .map(entry => ({ ...entry }))
        .sort((a, b) => (a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0));
}

function serialize(state: ManifestState): string {
    const entries: Record<string, StoredEntry> = {};
    for (const entry of sortedCopies(state.entries)) {
        const { identity, ...rest } = toRaw(entry);
        entries[identity] = rest;
    }
    return JSON.stringify(
        {
            version: MANIFEST_VERSION,
            lastRunAt: state.lastRunAt?.toISOString() ?? null,
            entries
        },
        null,
        2
    );
}

function fromRaw(raw: RawEntry): ManifestEntry {
    return {
        ...raw,
        ingestedAt: new Date(raw.ingestedAt),
        failure: raw.failure ? { ...raw.failure } : null
    };
}

function toRaw(entry: ManifestEntry): RawEntry {
    return {
        ...entry,
        ingestedAt: entry.ingestedAt.toISOString(),
        failure: entry.failure ? { ...entry.failure } : null
    };
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
