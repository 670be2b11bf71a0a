import { Command } from 'commander';
import { createRetrievalPipeline } from '../../application/PipelineFactory.js';
import { formatSearchResults, formatError } from '../utils/output.js';

export const searchCommand = new Command('search')
    .description('Search the index for passages similar to a query')
    .argument('<query>', 'Search query')
    .option('-l, --limit <number>', 'Maximum number of results', '5')
    .option('-j, --json', 'Output as JSON')
    .action(async (query: string, options: { limit: string; json?: boolean }) => {
        const limit = parseInt(options.limit, 10);
        if (isNaN(limit) || limit < 1) {
            console.error(formatError(`Invalid limit: ${options.limit}`));
            process.exitCode = 1;
            return;
        }

        const pipeline = await createRetrievalPipeline();
        try {
            const startTime = Date.now();
            const results = await pipeline.search(query, { limit });
            console.log(formatSearchResults(results, Date.now() - startTime, options.json ?? false));
        } finally {
            pipeline.close();
        }
    });
