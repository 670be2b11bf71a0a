export { RetrievalPipeline, buildIngestionStatus } from './application/RetrievalPipeline.js';
export type { RetrievalPipelineDependencies } from './application/RetrievalPipeline.js';
export { createRetrievalPipeline, manifestPathFor, MANIFEST_FILE } from './application/PipelineFactory.js';
export type { PipelineOverrides } from './application/PipelineFactory.js';
export { DocumentLoader } from './application/DocumentLoader.js';
export type { LoadOptions, LoadResult, PreparedFile } from './application/DocumentLoader.js';
export { VectorIndexSync } from './application/VectorIndexSync.js';
export type { MergeReport } from './application/VectorIndexSync.js';
export { Chunker } from './application/Chunker.js';
export { SearchUseCase } from './application/SearchUseCase.js';

export { ExtractorRegistry, createDefaultExtractorRegistry } from './adapter/extractors/ExtractorRegistry.js';
export { SQLiteVectorIndexRepository } from './adapter/sqlite/SQLiteVectorIndexRepository.js';
export { OllamaEmbeddingProvider } from './adapter/ollama/OllamaEmbeddingProvider.js';
export { JsonFileManifest } from './infrastructure/manifest/JsonFileManifest.js';

export { loadConfig, createDefaultConfig } from './domain/model/Config.js';
export type { LexIndexConfig } from './domain/model/Config.js';
export type { IngestionReport, IngestionStatus } from './domain/model/IngestionReport.js';
export type { SearchResult, SearchOptions } from './domain/model/SearchResult.js';
export type { Chunk, ChunkingOptions } from './domain/model/Chunk.js';
export type { ManifestEntry, FailureKind } from './domain/model/ManifestEntry.js';
export type { VectorRecord } from './domain/model/VectorRecord.js';
export type { FormatExtractor } from './domain/service/FormatExtractor.js';
export type { EmbeddingProvider } from './domain/service/EmbeddingProvider.js';
export type { VectorIndexRepository } from './domain/repository/VectorIndexRepository.js';
export type { FileManifest } from './domain/repository/FileManifest.js';
export * from './domain/errors.js';
