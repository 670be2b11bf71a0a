import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createDefaultConfig, type LexIndexConfig } from '../../src/domain/model/Config.js';
import { createDefaultExtractorRegistry } from '../../src/adapter/extractors/ExtractorRegistry.js';
import { FileScanner } from '../../src/infrastructure/filesystem/FileScanner.js';
import { JsonFileManifest } from '../../src/infrastructure/manifest/JsonFileManifest.js';
import { IngestionLock } from '../../src/infrastructure/process/IngestionLock.js';
import { Chunker } from '../../src/application/Chunker.js';
import { DocumentLoader } from '../../src/application/DocumentLoader.js';
import { VectorIndexSync } from '../../src/application/VectorIndexSync.js';
import { SearchUseCase } from '../../src/application/SearchUseCase.js';
import { RetrievalPipeline } from '../../src/application/RetrievalPipeline.js';
import { MANIFEST_FILE } from '../../src/application/PipelineFactory.js';
import { FakeEmbeddingProvider } from './FakeEmbeddingProvider.js';
import { InMemoryVectorIndexRepository } from './InMemoryVectorIndexRepository.js';

export interface Workspace {
    root: string;
    documentsDir: string;
    indexDir: string;
    manifestPath: string;
    config: LexIndexConfig;
    /** Canonical path of a file under the documents root. */
    doc(relativePath: string): string;
    write(relativePath: string, content: string | Buffer): Promise<string>;
    remove(relativePath: string): Promise<void>;
    cleanup(): Promise<void>;
}

export async function createWorkspace(): Promise<Workspace> {
    const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'lexindex-test-')));
    const documentsDir = path.join(root, 'documents');
    const indexDir = path.join(root, 'index');
    await fs.mkdir(documentsDir, { recursive: true });

    const defaults = createDefaultConfig();
    const config: LexIndexConfig = {
        ...defaults,
        paths: { indexDir, documentsDir },
        ingestion: {
            ...defaults.ingestion,
            chunkSize: 400,
            chunkOverlap: 50,
            embeddingConcurrency: 2
        }
    };

    const doc = (relativePath: string) => path.join(documentsDir, relativePath);

    return {
        root,
        documentsDir,
        indexDir,
        manifestPath: path.join(indexDir, MANIFEST_FILE),
        config,
        doc,
        async write(relativePath, content) {
            const target = doc(relativePath);
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, content);
            return target;
        },
        async remove(relativePath) {
            await fs.rm(doc(relativePath), { force: true });
        },
        async cleanup() {
            await fs.rm(root, { recursive: true, force: true });
        }
    };
}

export interface TestPipeline {
    pipeline: RetrievalPipeline;
    manifest: JsonFileManifest;
    provider: FakeEmbeddingProvider;
    repo: InMemoryVectorIndexRepository;
}

export function buildPipeline(
    workspace: Workspace,
    options: {
        provider?: FakeEmbeddingProvider;
        repo?: InMemoryVectorIndexRepository;
        indexWasReset?: boolean;
        config?: LexIndexConfig;
    } = {}
): TestPipeline {
    const config = options.config ?? workspace.config;
    const provider = options.provider ?? new FakeEmbeddingProvider();
    const repo = options.repo ?? new InMemoryVectorIndexRepository();
    const manifest = new JsonFileManifest(workspace.manifestPath);

    const loader = new DocumentLoader(
        config,
        new FileScanner(config),
        createDefaultExtractorRegistry(),
        manifest,
        new Chunker({ maxSize: config.ingestion.chunkSize, overlap: config.ingestion.chunkOverlap })
    );
    const sync = new VectorIndexSync(repo, provider, manifest, {
        embeddingConcurrency: config.ingestion.embeddingConcurrency
    });

    const pipeline = new RetrievalPipeline({
        manifest,
        loader,
        sync,
        lock: IngestionLock.inDirectory(config.paths.indexDir),
        searchUseCase: new SearchUseCase(repo, provider),
        indexWasReset: options.indexWasReset ?? false
    });

    return { pipeline, manifest, provider, repo };
}

/** `count` repetitions of "abcdefghi " (ten characters each). */
export function words(count: number): string {
    return 'abcdefghi '.repeat(count);
}
