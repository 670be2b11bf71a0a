import { createRetrievalPipeline } from '../../src/application/PipelineFactory.js';
import { EmbeddingServiceUnavailableError } from '../../src/domain/errors.js';
import { FakeEmbeddingProvider } from '../helpers/FakeEmbeddingProvider.js';
import { createWorkspace, words, type Workspace } from '../helpers/workspace.js';

describe('createRetrievalPipeline', () => {
    let workspace: Workspace;

    beforeEach(async () => {
        workspace = await createWorkspace();
        await workspace.write('codes/a.txt', words(50));
        await workspace.write('b.md', words(119) + 'abcdefghij');
    });

    afterEach(async () => {
        await workspace.cleanup();
    });

    it('ingests into the SQLite index and stays idempotent across restarts', async () => {
        const firstProvider = new FakeEmbeddingProvider('model-a');
        const first = await createRetrievalPipeline(workspace.config, { embeddingProvider: firstProvider });
        const firstReport = await first.start();
        first.close();

        expect(firstReport.outcome).toBe('completed');
        expect(firstReport.embeddingCalls).toBe(6);

        const secondProvider = new FakeEmbeddingProvider('model-a');
        const second = await createRetrievalPipeline(workspace.config, { embeddingProvider: secondProvider });
        const secondReport = await second.start();

        expect(secondReport.embeddingCalls).toBe(0);
        expect(secondReport.unchanged).toBe(2);

        const results = await second.search(words(40), { limit: 2 });
        second.close();

        expect(results).toHaveLength(2);
        expect(results.map(r => r.content)).toEqual([words(40), words(40)]);
    });

    it('re-ingests everything after the embedding model changes', async () => {
        const first = await createRetrievalPipeline(workspace.config, {
            embeddingProvider: new FakeEmbeddingProvider('model-a')
        });
        await first.start();
        first.close();

        const switched = await createRetrievalPipeline(workspace.config, {
            embeddingProvider: new FakeEmbeddingProvider('model-b')
        });
        const report = await switched.start();
        switched.close();

        expect(report.ingested.map(f => f.change)).toEqual(['new', 'new']);
        expect(report.embeddingCalls).toBe(6);
    });

    it('refuses to start without a reachable embedding service', async () => {
        const provider = new FakeEmbeddingProvider();
        provider.available = false;

        await expect(createRetrievalPipeline(workspace.config, { embeddingProvider: provider }))
            .rejects.toBeInstanceOf(EmbeddingServiceUnavailableError);
    });
});
