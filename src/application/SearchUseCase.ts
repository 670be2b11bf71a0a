import type { SearchResult, SearchOptions } from '../domain/model/SearchResult.js';
import { DEFAULT_SEARCH_OPTIONS } from '../domain/model/SearchResult.js';
import type { VectorIndexRepository } from '../domain/repository/VectorIndexRepository.js';
import type { EmbeddingProvider } from '../domain/service/EmbeddingProvider.js';
import logger from '../infrastructure/logger/index.js';

export class SearchUseCase {
    constructor(
        private indexRepo: VectorIndexRepository,
        private embeddingProvider: EmbeddingProvider
    ) {}

    async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
        const opts = { ...DEFAULT_SEARCH_OPTIONS, ...options };

        logger.debug(`Searching: "${query}" with options:`, opts);

        const queryEmbedding = await this.embeddingProvider.embed(query);
        const results = await this.indexRepo.query(queryEmbedding, opts.limit);

        const searchResults: SearchResult[] = results
            .filter(r => r.score >= opts.minScore)
            .map(r => ({
                path: r.record.metadata.filePath,
                ordinal: r.record.ordinal,
                category: r.record.metadata.category,
                content: r.record.text,
                score: r.score
            }));

        logger.debug(`Found ${searchResults.length} results`);

        return searchResults;
    }
}
