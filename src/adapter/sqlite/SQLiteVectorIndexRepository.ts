import type { FormatTag } from '../../domain/model/SourceFile.js';
import type { FileWrite, ScoredVectorRecord, VectorRecord } from '../../domain/model/VectorRecord.js';
import type { VectorIndexRepository } from '../../domain/repository/VectorIndexRepository.js';
import type { IndexDatabase } from '../../infrastructure/database/DatabaseManager.js';
import logger from '../../infrastructure/logger/index.js';

export class SQLiteVectorIndexRepository implements VectorIndexRepository {
    private readonly commitTransaction: (write: FileWrite) => void;

    constructor(private readonly db: IndexDatabase) {
        this.commitTransaction = db.transaction((write: FileWrite) => {
            if (write.supersede) {
                this.deleteByFileSync(write.fileIdentity);
            }
            for (const record of write.records) {
                this.upsertSync(record);
            }
            this.deleteOrdinalsFromSync(write.fileIdentity, write.records.length);
        });
    }

    async upsert(record: VectorRecord): Promise<void> {
        this.upsertSync(record);
    }

    async deleteByFile(fileIdentity: string): Promise<number> {
        return this.deleteByFileSync(fileIdentity);
    }

    async deleteOrdinalsFrom(fileIdentity: string, fromOrdinal: number): Promise<number> {
        return this.deleteOrdinalsFromSync(fileIdentity, fromOrdinal);
    }

    async commitFile(write: FileWrite): Promise<void> {
        // better-sqlite3 rolls the whole transaction back if anything throws
        this.commitTransaction(write);
        logger.debug(`Committed ${write.records.length} records for ${write.fileIdentity}`);
    }

    async query(embedding: number[], k: number): Promise<ScoredVectorRecord[]> {
        if (k <= 0) {
            return [];
        }

        const rows = this.db.prepare(`
            SELECT vr.*, vi.embedding, vi.distance
            FROM vec_index vi
            JOIN vector_records vr ON vr.rowid_vec = vi.rowid
            WHERE vi.embedding MATCH ?
            AND k = ?
            ORDER BY vi.distance
        `).all(toVectorBuffer(embedding), k) as RawSearchResult[];

        return rows.map(row => ({
            record: this.mapRowToRecord(row),
            // L2 distance mapped to a (0, 1] similarity
            score: 1 / (1 + row.distance)
        }));
    }

    async count(): Promise<number> {
        const result = this.db.prepare('SELECT COUNT(*) as count FROM vector_records').get() as { count: number };
        return result.count;
    }

    async countByFile(fileIdentity: string): Promise<number> {
        const result = this.db.prepare(
            'SELECT COUNT(*) as count FROM vector_records WHERE file_identity = ?'
        ).get(fileIdentity) as { count: number };
        return result.count;
    }

    async findByFile(fileIdentity: string): Promise<VectorRecord[]> {
        const rows = this.db.prepare(`
            SELECT vr.*, vi.embedding
            FROM vector_records vr
            JOIN vec_index vi ON vr.rowid_vec = vi.rowid
            WHERE vr.file_identity = ?
            ORDER BY vr.ordinal
        `).all(fileIdentity) as RawVectorRecord[];

        return rows.map(row => this.mapRowToRecord(row));
    }

    private upsertSync(record: VectorRecord): void {
        const vecBuffer = toVectorBuffer(record.embedding);
        const existing = this.db.prepare(
            'SELECT rowid_vec FROM vector_records WHERE id = ?'
        ).get(record.id) as { rowid_vec: number } | undefined;

        if (existing) {
            this.db.prepare('UPDATE vec_index SET embedding = ? WHERE rowid = ?')
                .run(vecBuffer, BigInt(existing.rowid_vec));

            this.db.prepare(`
                UPDATE vector_records
                SET file_identity = ?, ordinal = ?, content = ?, format = ?, category = ?,
                    ingested_at = ?, start_offset = ?, end_offset = ?
                WHERE id = ?
            `).run(
                record.fileIdentity,
                record.ordinal,
                record.text,
                record.metadata.format,
                record.metadata.category,
                record.metadata.ingestedAt.toISOString(),
                record.metadata.startOffset,
                record.metadata.endOffset,
                record.id
            );
            return;
        }

        const result = this.db.prepare('INSERT INTO vec_index(embedding) VALUES (?)').run(vecBuffer);

        this.db.prepare(`
            INSERT INTO vector_records
                (id, file_identity, ordinal, content, format, category, ingested_at, start_offset, end_offset, rowid_vec)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            record.id,
            record.fileIdentity,
            record.ordinal,
            record.text,
            record.metadata.format,
            record.metadata.category,
            record.metadata.ingestedAt.toISOString(),
            record.metadata.startOffset,
            record.metadata.endOffset,
            result.lastInsertRowid
        );
    }

    private deleteByFileSync(fileIdentity: string): number {
        const rows = this.db.prepare(
            'SELECT rowid_vec FROM vector_records WHERE file_identity = ?'
        ).all(fileIdentity) as { rowid_vec: number }[];

        return this.deleteRows(rows, 'DELETE FROM vector_records WHERE file_identity = ?', [fileIdentity]);
    }

    private deleteOrdinalsFromSync(fileIdentity: string, fromOrdinal: number): number {
        const rows = this.db.prepare(
            'SELECT rowid_vec FROM vector_records WHERE file_identity = ? AND ordinal >= ?'
        ).all(fileIdentity, fromOrdinal) as { rowid_vec: number }[];

        return this.deleteRows(
            rows,
            'DELETE FROM vector_records WHERE file_identity = ? AND ordinal >= ?',
            [fileIdentity, fromOrdinal]
        );
    }

    private deleteRows(rows: { rowid_vec: number }[], recordsSql: string, params: unknown[]): number {
        if (rows.length === 0) {
            return 0;
        }

        const deleteVec = this.db.prepare('DELETE FROM vec_index WHERE rowid = ?');
        for (const row of rows) {
            deleteVec.run(BigInt(row.rowid_vec));
        }

        const result = this.db.prepare(recordsSql).run(...params);
        logger.debug(`Deleted ${result.changes} vector records`);
        return result.changes;
    }

    private mapRowToRecord(row: RawVectorRecord): VectorRecord {
        const float32Array = new Float32Array(
            row.embedding.buffer,
            row.embedding.byteOffset,
            row.embedding.byteLength / 4
        );

        return {
            id: row.id,
            fileIdentity: row.file_identity,
            ordinal: row.ordinal,
            embedding: Array.from(float32Array),
            text: row.content,
            metadata: {
                filePath: row.file_identity,
                format: row.format,
                category: row.category,
                ingestedAt: new Date(row.ingested_at),
                startOffset: row.start_offset,
                endOffset: row.end_offset
            }
        };
    }
}

function toVectorBuffer(embedding: number[]): Buffer {
    return Buffer.from(new Float32Array(embedding).buffer);
}

interface RawVectorRecord {
    id: string;
    file_identity: string;
    ordinal: number;
    content: string;
    format: FormatTag;
    category: string;
    ingested_at: string;
    start_offset: number;
    end_offset: number;
    rowid_vec: number;
    embedding: Buffer;
}

interface RawSearchResult extends RawVectorRecord {
    distance: number;
}
