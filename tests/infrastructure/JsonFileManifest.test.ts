import * as fs from 'fs/promises';
import * as path from 'path';
import { JsonFileManifest } from '../../src/infrastructure/manifest/JsonFileManifest.js';
import { createWorkspace, type Workspace } from '../helpers/workspace.js';

describe('JsonFileManifest', () => {
    let workspace: Workspace;
    let manifest: JsonFileManifest;

    beforeEach(async () => {
        workspace = await createWorkspace();
        manifest = new JsonFileManifest(workspace.manifestPath);
    });

    afterEach(async () => {
        await workspace.cleanup();
    });

    it('starts empty when no manifest exists', async () => {
        await expect(manifest.load()).resolves.toEqual({ entries: 0, recovered: false });
        expect(manifest.listAll()).toEqual([]);
        expect(manifest.getLastRunAt()).toBeNull();
    });

    it('persists successes across instances', async () => {
        const ingestedAt = new Date('2026-03-01T10:00:00.000Z');
        await manifest.load();
        await manifest.recordSuccess('/docs/laws/a.txt', 'hash-a', 2, ingestedAt, {
            size: 500,
            modifiedAtMs: 1000,
            category: 'laws'
        });

        const reopened = new JsonFileManifest(workspace.manifestPath);
        await expect(reopened.load()).resolves.toEqual({ entries: 1, recovered: false });
        expect(reopened.lookup('/docs/laws/a.txt')).toEqual({
            identity: '/docs/laws/a.txt',
            contentHash: 'hash-a',
            chunkCount: 2,
            ingestedAt,
            status: 'succeeded',
            failure: null,
            size: 500,
            modifiedAtMs: 1000,
            category: 'laws'
        });
    });

    it('leaves no temporary file behind after a write', async () => {
        await manifest.load();
        await manifest.recordSuccess('/docs/a.txt', 'h', 1, new Date());

        expect(await fs.readdir(workspace.indexDir)).toEqual(['manifest.json']);
    });

    it('keeps the previous chunk count when a file fails', async () => {
        await manifest.load();
        await manifest.recordSuccess('/docs/a.txt', 'old', 3, new Date());
        await manifest.recordFailure(
            '/docs/a.txt',
            { kind: 'CorruptFile', message: 'bad bytes' },
            { contentHash: 'new', size: 10, modifiedAtMs: 5, category: 'uncategorized' }
        );

        expect(manifest.lookup('/docs/a.txt')).toMatchObject({
            contentHash: 'new',
            chunkCount: 3,
            status: 'failed',
            failure: { kind: 'CorruptFile', message: 'bad bytes' }
        });
    });

    it('removes and clears entries', async () => {
        await manifest.load();
        await manifest.recordSuccess('/docs/a.txt', 'a', 1, new Date());
        await manifest.recordSuccess('/docs/b.txt', 'b', 1, new Date());

        await manifest.remove('/docs/a.txt');
        expect(manifest.listAll().map(e => e.identity)).toEqual(['/docs/b.txt']);

        await manifest.clear();
        const reopened = new JsonFileManifest(workspace.manifestPath);
        await expect(reopened.load()).resolves.toEqual({ entries: 0, recovered: false });
    });

    it('keeps lookups unchanged when a write fails', async () => {
        await manifest.load();
        await manifest.recordSuccess('/docs/a.txt', 'hash-1', 2, new Date());
        const blocker = `${workspace.manifestPath}.${process.pid}.tmp`;
        await fs.mkdir(blocker);

        await expect(manifest.recordSuccess('/docs/a.txt', 'hash-2', 3, new Date())).rejects.toThrow();
        await expect(manifest.recordFailure('/docs/b.txt', { kind: 'CorruptFile', message: 'bad bytes' }))
            .rejects.toThrow();
        await expect(manifest.remove('/docs/a.txt')).rejects.toThrow();
        await expect(manifest.clear()).rejects.toThrow();
        await expect(manifest.setLastRunAt(new Date())).rejects.toThrow();

        expect(manifest.lookup('/docs/a.txt')).toMatchObject({ contentHash: 'hash-1', chunkCount: 2, status: 'succeeded' });
        expect(manifest.lookup('/docs/b.txt')).toBeNull();
        expect(manifest.getLastRunAt()).toBeNull();

        await fs.rmdir(blocker);
        await manifest.recordSuccess('/docs/a.txt', 'hash-2', 3, new Date());

        const reopened = new JsonFileManifest(workspace.manifestPath);
        await reopened.load();
        expect(reopened.listAll().map(e => [e.identity, e.contentHash])).toEqual([['/docs/a.txt', 'hash-2']]);
    });

    it('lists entries sorted by identity', async () => {
        await manifest.load();
        await manifest.recordSuccess('/docs/c.txt', 'c', 1, new Date());
        await manifest.recordSuccess('/docs/a.txt', 'a', 1, new Date());
        await manifest.recordSuccess('/docs/b.txt', 'b', 1, new Date());

        expect(manifest.listAll().map(e => e.identity)).toEqual(['/docs/a.txt', '/docs/b.txt', '/docs/c.txt']);
    });

    it('serializes concurrent writes', async () => {
        await manifest.load();
        await Promise.all(
            Array.from({ length: 10 }, (_, i) => manifest.recordSuccess(`/docs/${i}.txt`, `h${i}`, 1, new Date()))
        );

        const reopened = new JsonFileManifest(workspace.manifestPath);
        await expect(reopened.load()).resolves.toEqual({ entries: 10, recovered: false });
    });

    it('persists the last run timestamp', async () => {
        const runAt = new Date('2026-03-02T08:30:00.000Z');
        await manifest.load();
        await manifest.setLastRunAt(runAt);

        const reopened = new JsonFileManifest(workspace.manifestPath);
        await reopened.load();
        expect(reopened.getLastRunAt()).toEqual(runAt);
    });

    it('moves an unparsable manifest aside and starts empty', async () => {
        await fs.mkdir(workspace.indexDir, { recursive: true });
        await fs.writeFile(workspace.manifestPath, '{ "version": 1, "entries": {', 'utf-8');

        await expect(manifest.load()).resolves.toEqual({ entries: 0, recovered: true });

        const files = await fs.readdir(workspace.indexDir);
        expect(files).toHaveLength(1);
        expect(files[0]).toMatch(/^manifest\.json\.corrupt-\d+$/);
    });

    it('treats a manifest that fails validation as corrupt', async () => {
        await fs.mkdir(workspace.indexDir, { recursive: true });
        await fs.writeFile(
            workspace.manifestPath,
            JSON.stringify({ version: 1, lastRunAt: null, entries: { '/docs/a.txt': { contentHash: 5 } } }),
            'utf-8'
        );

        await expect(manifest.load()).resolves.toEqual({ entries: 0, recovered: true });
        expect(manifest.lookup('/docs/a.txt')).toBeNull();
    });

    it('writes the manifest next to the index', () => {
        expect(path.dirname(manifest.getPath())).toBe(workspace.indexDir);
    });
});
