import { Command } from 'commander';
import { loadConfig } from '../../domain/model/Config.js';
import { manifestPathFor } from '../../application/PipelineFactory.js';
import { buildIngestionStatus } from '../../application/RetrievalPipeline.js';
import { JsonFileManifest } from '../../infrastructure/manifest/JsonFileManifest.js';
import { IngestionLock } from '../../infrastructure/process/IngestionLock.js';
import { formatStatus } from '../utils/output.js';

export const statusCommand = new Command('status')
    .description('Show what the manifest records about ingested documents')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
        const config = loadConfig();
        const manifest = new JsonFileManifest(manifestPathFor(config));
        await manifest.load();

        const lock = IngestionLock.inDirectory(config.paths.indexDir);
        const holderPid = await lock.readPid();
        const running = holderPid !== null && lock.isProcessRunning(holderPid);

        const status = buildIngestionStatus(manifest.listAll(), manifest.getLastRunAt(), null, running);
        console.log(formatStatus(status, options.json ?? false));
    });
