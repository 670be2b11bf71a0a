import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import logger from '../../infrastructure/logger/index.js';

export interface LexIndexConfig {
    paths: {
        /** Primary index directory: vector database, manifest and lock file. */
        indexDir: string;
        /** Secondary documents root, one subdirectory per category. */
        documentsDir: string;
    };
    ollama: {
        host: string;
        model: string;
    };
    ingestion: {
        extensions: string[];
        ignorePatterns: string[];
        maxFileSize: number;
        minTextLength: number;
        categories: string[];
        chunkSize: number;
        chunkOverlap: number;
        embeddingConcurrency: number;
        mtimeFastPath: boolean;
    };
}

export function getLexIndexDir(): string {
    return process.env['LEXINDEX_HOME'] || path.join(os.homedir(), '.lexindex');
}

export function getConfigPath(): string {
    return path.join(getLexIndexDir(), 'config.json');
}

export function createDefaultConfig(): LexIndexConfig {
    return {
        paths: {
            indexDir: path.join(getLexIndexDir(), 'index'),
            documentsDir: path.resolve('documents')
        },
        ollama: {
            host: 'http://localhost:11434',
            model: 'nomic-embed-text'
        },
        ingestion: {
            extensions: ['.txt', '.md', '.markdown', '.pdf', '.docx'],
            ignorePatterns: ['.git', 'node_modules', '~$*', '.DS_Store'],
            maxFileSize: 10 * 1024 * 1024, // 10MB
            minTextLength: 50,
            categories: ['laws', 'codes', 'articles', 'court_practice'],
            chunkSize: 1000,
            chunkOverlap: 200,
            embeddingConcurrency: 4,
            mtimeFastPath: false
        }
    };
}

const userConfigSchema = z.object({
    paths: z.object({
        indexDir: z.string().min(1),
        documentsDir: z.string().min(1)
    }).partial().optional(),
    ollama: z.object({
        host: z.string().url(),
        model: z.string().min(1)
    }).partial().optional(),
    ingestion: z.object({
        extensions: z.array(z.string().startsWith('.')),
        ignorePatterns: z.array(z.string()),
        maxFileSize: z.number().int().positive(),
        minTextLength: z.number().int().nonnegative(),
        categories: z.array(z.string().min(1)),
        chunkSize: z.number().int().positive(),
        chunkOverlap: z.number().int().nonnegative(),
        embeddingConcurrency: z.number().int().positive(),
        mtimeFastPath: z.boolean()
    }).partial().optional()
});

type UserConfig = z.infer<typeof userConfigSchema>;

export function ensureDir(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
        fs.mkdirSync(dirPath, { recursive: true });
    }
}

export function loadConfig(configPath: string = getConfigPath()): LexIndexConfig {
    const defaults = createDefaultConfig();

    if (!fs.existsSync(configPath)) {
        return defaults;
    }

    try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed = userConfigSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
            logger.warn(`Invalid config at ${configPath}, using defaults: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
            return defaults;
        }
        const merged = mergeConfig(defaults, parsed.data, path.dirname(configPath));
        if (merged.ingestion.chunkOverlap >= merged.ingestion.chunkSize) {
            logger.warn(
                `chunkOverlap (${merged.ingestion.chunkOverlap}) must be smaller than chunkSize ` +
                `(${merged.ingestion.chunkSize}), using default chunking`
            );
            merged.ingestion.chunkSize = defaults.ingestion.chunkSize;
            merged.ingestion.chunkOverlap = defaults.ingestion.chunkOverlap;
        }
        return merged;
    } catch (error) {
        logger.warn(`Failed to read config at ${configPath}, using defaults`, error);
        return defaults;
    }
}

function mergeConfig(base: LexIndexConfig, override: UserConfig, configDir: string): LexIndexConfig {
    const paths = { ...base.paths, ...override.paths };

    // Relative paths in the config file are relative to the file itself
    return {
        paths: {
            indexDir: path.resolve(configDir, paths.indexDir),
            documentsDir: path.resolve(configDir, paths.documentsDir)
        },
        ollama: {
            ...base.ollama,
            ...override.ollama
        },
        ingestion: {
            ...base.ingestion,
            ...override.ingestion
        }
    };
}
