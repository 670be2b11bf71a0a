import { OllamaEmbeddingProvider } from '../../src/adapter/ollama/OllamaEmbeddingProvider.js';
import {
    ContextLengthExceededError,
    EmbeddingModelNotFoundError,
    EmbeddingServiceUnavailableError
} from '../../src/domain/errors.js';

const { embeddings } = vi.hoisted(() => ({ embeddings: vi.fn() }));

vi.mock('ollama', () => ({
    Ollama: class {
        embeddings = embeddings;
    }
}));

describe('OllamaEmbeddingProvider', () => {
    let provider: OllamaEmbeddingProvider;

    beforeEach(() => {
        embeddings.mockReset();
        provider = new OllamaEmbeddingProvider('http://localhost:11434', 'nomic-embed-text');
    });

    it('returns the embedding and learns its dimensions', async () => {
        embeddings.mockResolvedValue({ embedding: [0.1, 0.2, 0.3] });

        await expect(provider.embed('Article 12')).resolves.toEqual([0.1, 0.2, 0.3]);
        expect(provider.getDimensions()).toBe(3);
        expect(embeddings).toHaveBeenCalledWith({ model: 'nomic-embed-text', prompt: 'Article 12' });
    });

    it('classifies a refused connection as an outage', async () => {
        embeddings.mockRejectedValue(new Error('fetch failed: connect ECONNREFUSED 127.0.0.1:11434'));

        await expect(provider.embed('x')).rejects.toBeInstanceOf(EmbeddingServiceUnavailableError);
    });

    it('classifies a missing model', async () => {
        embeddings.mockRejectedValue(new Error('model "nomic-embed-text" not found, try pulling it first'));

        const error = await provider.embed('x').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EmbeddingModelNotFoundError);
        expect(error).toBeInstanceOf(EmbeddingServiceUnavailableError);
    });

    it('classifies an oversized input', async () => {
        embeddings.mockRejectedValue(new Error('the input length exceeds the context length'));

        await expect(provider.embed('x')).rejects.toBeInstanceOf(ContextLengthExceededError);
    });

    it('rejects an empty embedding', async () => {
        embeddings.mockResolvedValue({ embedding: [] });

        await expect(provider.embed('x')).rejects.toThrow('Empty embedding returned from Ollama');
    });

    it('reports the connection state without throwing', async () => {
        embeddings.mockResolvedValueOnce({ embedding: [1, 2] });
        await expect(provider.testConnection()).resolves.toBe(true);

        embeddings.mockRejectedValueOnce(new Error('fetch failed'));
        await expect(provider.testConnection()).resolves.toBe(false);
    });
});
