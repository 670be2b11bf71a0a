import { Ollama } from 'ollama';
import type { EmbeddingProvider } from '../../domain/service/EmbeddingProvider.js';
import {
    ContextLengthExceededError,
    EmbeddingModelNotFoundError,
    EmbeddingServiceUnavailableError
} from '../../domain/errors.js';
import logger from '../../infrastructure/logger/index.js';

export class OllamaEmbeddingProvider implements EmbeddingProvider {
    private client: Ollama;
    private model: string;
    private dimensions: number = 768; // nomic-embed-text default

    constructor(host: string, model: string) {
        this.client = new Ollama({ host });
        this.model = model;
        logger.debug(`OllamaEmbeddingProvider initialized with host=${host}, model=${model}`);
    }

    async embed(text: string): Promise<number[]> {
        let embedding: number[];
        try {
            const response = await this.client.embeddings({
                model: this.model,
                prompt: text
            });
            embedding = response.embedding;
        } catch (error) {
            throw this.classifyError(error);
        }

        if (!embedding || embedding.length === 0) {
            throw new EmbeddingServiceUnavailableError('Empty embedding returned from Ollama');
        }

        if (embedding.length !== this.dimensions) {
            this.dimensions = embedding.length;
            logger.debug(`Updated embedding dimensions to ${this.dimensions}`);
        }

        return embedding;
    }

    getModelName(): string {
        return this.model;
    }

    getDimensions(): number {
        return this.dimensions;
    }

    async testConnection(): Promise<boolean> {
        try {
            await this.embed('test');
            logger.debug(`Ollama connection test successful, dimensions=${this.dimensions}`);
            return true;
        } catch (error) {
            logger.error('Ollama connection test failed', error);
            return false;
        }
    }

    private classifyError(error: unknown): Error {
        const message = error instanceof Error ? error.message : String(error);

        if (message.includes('context length') || message.includes('input length')) {
            return new ContextLengthExceededError('Input text exceeds model context length');
        }

        if (message.includes('not found') || message.includes('404')) {
            logger.error(`Model '${this.model}' not found. Run: ollama pull ${this.model}`);
            return new EmbeddingModelNotFoundError(
                `Model '${this.model}' not found. Run: ollama pull ${this.model}`
            );
        }

        if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
            logger.error('Cannot connect to Ollama. Is it running? Start with: ollama serve');
            return new EmbeddingServiceUnavailableError(
                'Cannot connect to Ollama. Is it running? Start with: ollama serve'
            );
        }

        // Anything else from the transport is treated as an outage of the service
        return new EmbeddingServiceUnavailableError(`Ollama embedding request failed: ${message}`);
    }
}
