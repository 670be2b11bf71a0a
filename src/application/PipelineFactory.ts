import * as path from 'path';
import { ensureDir, loadConfig, type LexIndexConfig } from '../domain/model/Config.js';
import type { EmbeddingProvider } from '../domain/service/EmbeddingProvider.js';
import { EmbeddingServiceUnavailableError } from '../domain/errors.js';
import {
    openIndexDatabase,
    setupEmbeddingModel,
    type ModelSetupResult
} from '../infrastructure/database/DatabaseManager.js';
import { FileScanner } from '../infrastructure/filesystem/FileScanner.js';
import { JsonFileManifest } from '../infrastructure/manifest/JsonFileManifest.js';
import { IngestionLock } from '../infrastructure/process/IngestionLock.js';
import { SQLiteVectorIndexRepository } from '../adapter/sqlite/SQLiteVectorIndexRepository.js';
import { OllamaEmbeddingProvider } from '../adapter/ollama/OllamaEmbeddingProvider.js';
import { createDefaultExtractorRegistry } from '../adapter/extractors/ExtractorRegistry.js';
import { Chunker } from './Chunker.js';
import { DocumentLoader } from './DocumentLoader.js';
import { VectorIndexSync } from './VectorIndexSync.js';
import { SearchUseCase } from './SearchUseCase.js';
import { RetrievalPipeline } from './RetrievalPipeline.js';
import logger from '../infrastructure/logger/index.js';

export const MANIFEST_FILE = 'manifest.json';

export interface PipelineOverrides {
    embeddingProvider?: EmbeddingProvider;
}

export function manifestPathFor(config: LexIndexConfig): string {
    return path.join(config.paths.indexDir, MANIFEST_FILE);
}

/**
 * Wires the pipeline on its real adapters. The embedding model is probed
 * first so the vector table can be created with the right dimensions.
 */
export async function createRetrievalPipeline(
    config: LexIndexConfig = loadConfig(),
    overrides: PipelineOverrides = {}
): Promise<RetrievalPipeline> {
    ensureDir(config.paths.indexDir);

    const embeddingProvider = overrides.embeddingProvider
        ?? new OllamaEmbeddingProvider(config.ollama.host, config.ollama.model);

    logger.info(`Probing embedding model: ${embeddingProvider.getModelName()}`);
    const connectionOk = await embeddingProvider.testConnection();
    if (!connectionOk) {
        throw new EmbeddingServiceUnavailableError(
            `Cannot reach the embedding service or model '${embeddingProvider.getModelName()}' is not available`
        );
    }
    const dimensions = embeddingProvider.getDimensions();
    logger.info(`Model ${embeddingProvider.getModelName()} has ${dimensions} dimensions`);

    const db = openIndexDatabase(config.paths.indexDir);
    let setup: ModelSetupResult;
    try {
        setup = setupEmbeddingModel(db, embeddingProvider.getModelName(), dimensions);
    } catch (error) {
        db.close();
        throw error;
    }

    const indexRepo = new SQLiteVectorIndexRepository(db);
    const manifest = new JsonFileManifest(manifestPathFor(config));
    const chunker = new Chunker({
        maxSize: config.ingestion.chunkSize,
        overlap: config.ingestion.chunkOverlap
    });
    const loader = new DocumentLoader(
        config,
        new FileScanner(config),
        createDefaultExtractorRegistry(),
        manifest,
        chunker
    );
    const sync = new VectorIndexSync(indexRepo, embeddingProvider, manifest, {
        embeddingConcurrency: config.ingestion.embeddingConcurrency
    });

    return new RetrievalPipeline({
        manifest,
        loader,
        sync,
        lock: IngestionLock.inDirectory(config.paths.indexDir),
        searchUseCase: new SearchUseCase(indexRepo, embeddingProvider),
        indexWasReset: setup !== 'unchanged',
        onClose: () => db.close()
    });
}
