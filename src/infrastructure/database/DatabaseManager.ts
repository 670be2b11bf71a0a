import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import * as path from 'path';
import { ensureDir } from '../../domain/model/Config.js';
import logger from '../logger/index.js';

export interface EmbeddingMetadata {
    modelName: string;
    dimensions: number;
    createdAt: Date;
}

export type IndexDatabase = Database.Database;

export const INDEX_DB_FILE = 'index.db';

const METADATA_SCHEMA = `
    CREATE TABLE IF NOT EXISTS embedding_metadata (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        model_name TEXT NOT NULL,
        dimensions INTEGER NOT NULL,
        created_at TEXT NOT NULL
    );
`;

const RECORDS_SCHEMA = `
    CREATE TABLE IF NOT EXISTS vector_records (
        id TEXT PRIMARY KEY,
        file_identity TEXT NOT NULL,
        ordinal INTEGER NOT NULL,
        content TEXT NOT NULL,
        format TEXT NOT NULL,
        category TEXT NOT NULL,
        ingested_at TEXT NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        rowid_vec INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_records_file ON vector_records(file_identity, ordinal);
`;

/**
 * Opens the index database inside `indexDir` (or in memory for ':memory:')
 * and loads the sqlite-vec extension. The vector table is created separately
 * once the embedding dimensions are known.
 */
export function openIndexDatabase(indexDir: string): IndexDatabase {
    let location = ':memory:';
    if (indexDir !== ':memory:') {
        ensureDir(indexDir);
        location = path.join(indexDir, INDEX_DB_FILE);
    }

    logger.debug(`Opening index database at ${location}`);

    const db = new Database(location);
    db.pragma('journal_mode = WAL');

    sqliteVec.load(db);
    logger.debug('sqlite-vec extension loaded');

    db.exec(METADATA_SCHEMA);
    db.exec(RECORDS_SCHEMA);

    logger.info(`Index database ready at ${location}`);
    return db;
}

export function createVecIndex(db: IndexDatabase, dimensions: number): void {
    db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS vec_index USING vec0(
            embedding float[${dimensions}]
        );
    `);
    logger.debug(`Created vec_index with ${dimensions} dimensions`);
}

export function getEmbeddingMetadata(db: IndexDatabase): EmbeddingMetadata | null {
    const row = db.prepare(
        'SELECT model_name, dimensions, created_at FROM embedding_metadata WHERE id = 1'
    ).get() as { model_name: string; dimensions: number; created_at: string } | undefined;

    if (!row) {
        return null;
    }

    return {
        modelName: row.model_name,
        dimensions: row.dimensions,
        createdAt: new Date(row.created_at)
    };
}

export function setEmbeddingMetadata(db: IndexDatabase, metadata: EmbeddingMetadata): void {
    db.prepare(`
        INSERT OR REPLACE INTO embedding_metadata (id, model_name, dimensions, created_at)
        VALUES (1, ?, ?, ?)
    `).run(metadata.modelName, metadata.dimensions, metadata.createdAt.toISOString());

    logger.debug(`Set embedding metadata: model=${metadata.modelName}, dimensions=${metadata.dimensions}`);
}

/** Drops every stored vector and recreates the tables for new dimensions. */
export function resetForModelChange(db: IndexDatabase, newDimensions: number): void {
    logger.info(`Resetting vector index for model change (new dimensions: ${newDimensions})`);

    db.exec('DROP TABLE IF EXISTS vector_records');
    db.exec('DROP TABLE IF EXISTS vec_index');

    createVecIndex(db, newDimensions);
    db.exec(RECORDS_SCHEMA);

    logger.info('Vector index reset for model change complete');
}

export type ModelSetupResult = 'created' | 'unchanged' | 'reset';

/**
 * Reconciles the stored embedding metadata with the model in use.
 * 'created' and 'reset' both mean the index holds no vectors from this model,
 * so every document has to be embedded again.
 */
export function setupEmbeddingModel(
    db: IndexDatabase,
    modelName: string,
    dimensions: number
): ModelSetupResult {
    const existing = getEmbeddingMetadata(db);
    const metadata = { modelName, dimensions, createdAt: new Date() };

    if (!existing) {
        logger.info(`First time setup: creating vec_index with ${dimensions} dimensions`);
        createVecIndex(db, dimensions);
        setEmbeddingMetadata(db, metadata);
        return 'created';
    }

    if (existing.modelName === modelName && existing.dimensions === dimensions) {
        logger.debug(`Embedding model unchanged: ${modelName}`);
        // Partial initialization may have left the table out
        createVecIndex(db, dimensions);
        return 'unchanged';
    }

    if (existing.modelName === modelName) {
        logger.warn(
            `Dimension mismatch for model ${modelName}: ` +
            `stored=${existing.dimensions}, actual=${dimensions}. Resetting index.`
        );
    } else {
        logger.warn(
            `Embedding model changed: ${existing.modelName} -> ${modelName}. ` +
            `Clearing existing embeddings; all documents will be re-ingested.`
        );
    }

    resetForModelChange(db, dimensions);
    setEmbeddingMetadata(db, metadata);
    return 'reset';
}
