#!/usr/bin/env node

import { Command } from 'commander';
import { ingestCommand, statusCommand, searchCommand } from './commands/index.js';
import { formatError } from './utils/output.js';

// Global error handler - show clean error message without stack trace
process.on('uncaughtException', (error) => {
    console.error(formatError(error.message));
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    console.error(formatError(message));
    process.exit(1);
});

const program = new Command();

program
    .name('lexindex')
    .description('Incremental ingestion of legal documents into a local vector index')
    .version('0.1.0');

program.addCommand(ingestCommand);
program.addCommand(statusCommand);
program.addCommand(searchCommand);

await program.parseAsync();
