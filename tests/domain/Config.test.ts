import * as fs from 'fs/promises';
import * as path from 'path';
import { createDefaultConfig, loadConfig } from '../../src/domain/model/Config.js';
import { createWorkspace, type Workspace } from '../helpers/workspace.js';

describe('loadConfig', () => {
    let workspace: Workspace;
    let configPath: string;

    const writeConfig = (content: unknown) =>
        fs.writeFile(configPath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');

    beforeEach(async () => {
        workspace = await createWorkspace();
        configPath = path.join(workspace.root, 'config.json');
    });

    afterEach(async () => {
        await workspace.cleanup();
    });

    it('returns the defaults when no file exists', () => {
        expect(loadConfig(configPath)).toEqual(createDefaultConfig());
    });

    it('merges a partial file over the defaults', async () => {
        await writeConfig({
            ollama: { model: 'mxbai-embed-large' },
            ingestion: { chunkSize: 800, embeddingConcurrency: 2 }
        });

        const config = loadConfig(configPath);

        expect(config.ollama).toEqual({ host: 'http://localhost:11434', model: 'mxbai-embed-large' });
        expect(config.ingestion.chunkSize).toBe(800);
        expect(config.ingestion.chunkOverlap).toBe(200);
        expect(config.ingestion.embeddingConcurrency).toBe(2);
        expect(config.ingestion.categories).toEqual(['laws', 'codes', 'articles', 'court_practice']);
    });

    it('resolves relative paths against the config file', async () => {
        await writeConfig({ paths: { documentsDir: 'docs', indexDir: './data/index' } });

        expect(loadConfig(configPath).paths).toEqual({
            documentsDir: path.join(workspace.root, 'docs'),
            indexDir: path.join(workspace.root, 'data', 'index')
        });
    });

    it('falls back to the defaults for an invalid file', async () => {
        await writeConfig({ ingestion: { chunkSize: -5 } });

        expect(loadConfig(configPath)).toEqual(createDefaultConfig());
    });

    it('falls back to the defaults for malformed JSON', async () => {
        await writeConfig('{ "ollama": ');

        expect(loadConfig(configPath)).toEqual(createDefaultConfig());
    });

    it('restores default chunking when the overlap is not smaller than the size', async () => {
        await writeConfig({ ingestion: { chunkSize: 100, chunkOverlap: 100 } });

        const config = loadConfig(configPath);

        expect(config.ingestion.chunkSize).toBe(1000);
        expect(config.ingestion.chunkOverlap).toBe(200);
    });
});
