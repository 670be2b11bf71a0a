import { Command } from 'commander';
import { createRetrievalPipeline } from '../../application/PipelineFactory.js';
import { formatReport } from '../utils/output.js';

export const ingestCommand = new Command('ingest')
    .description('Scan the documents folder and sync new or changed files into the index')
    .option('-f, --force', 'Retry files whose last ingestion failed')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: { force?: boolean; json?: boolean }) => {
        const pipeline = await createRetrievalPipeline();

        try {
            const report = await pipeline.start({ force: options.force ?? false });
            console.log(formatReport(report, options.json ?? false));
            if (report.outcome === 'aborted') {
                process.exitCode = 1;
            }
        } finally {
            pipeline.close();
        }
    });
