import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import micromatch from 'micromatch';
import type { LexIndexConfig } from '../../domain/model/Config.js';
import logger from '../logger/index.js';

export interface ScannedFile {
    /** Canonical absolute path (symlinks resolved). */
    path: string;
    size: number;
    modifiedAt: Date;
}

export interface ScanResult {
    /** Canonical root, or null when it does not exist. */
    root: string | null;
    files: ScannedFile[];
    /** False when some directory could not be listed. */
    complete: boolean;
}

export interface FileScannerOptions {
    extensions: string[];
    ignorePatterns: string[];
    maxFileSize: number;
}

export class FileScanner {
    private options: FileScannerOptions;

    constructor(config: Pick<LexIndexConfig, 'ingestion'>) {
        this.options = {
            extensions: config.ingestion.extensions.map(ext => ext.toLowerCase()),
            ignorePatterns: config.ingestion.ignorePatterns,
            maxFileSize: config.ingestion.maxFileSize
        };
    }

    isSupported(filePath: string): boolean {
        const ext = path.extname(filePath).toLowerCase();
        return this.options.extensions.includes(ext) && !this.shouldIgnore(filePath);
    }

    shouldIgnore(filePath: string): boolean {
        return micromatch.isMatch(filePath, this.options.ignorePatterns, {
            dot: true,
            contains: true
        });
    }

    async scanDirectory(dirPath: string): Promise<ScanResult> {
        const files: ScannedFile[] = [];
        const seen = new Set<string>();

        let root: string;
        try {
            root = await fs.realpath(dirPath);
        } catch (error) {
            logger.warn(`Documents root not available: ${dirPath}`, error);
            return { root: null, files, complete: false };
        }

        let complete = true;

        const scan = async (currentPath: string): Promise<void> => {
            const entries = await fs.readdir(currentPath, { withFileTypes: true }).catch((error: unknown) => {
                logger.error(`Failed to scan directory: ${currentPath}`, error);
                complete = false;
                return null;
            });
            if (!entries) {
                return;
            }

            for (const entry of entries) {
                const fullPath = path.join(currentPath, entry.name);

                if (this.shouldIgnore(fullPath)) {
                    continue;
                }

                if (entry.isDirectory()) {
                    await scan(fullPath);
                } else if ((entry.isFile() || entry.isSymbolicLink()) && this.isSupported(fullPath)) {
                    const file = await this.describe(fullPath);
                    if (file && !seen.has(file.path)) {
                        seen.add(file.path);
                        files.push(file);
                    }
                }
            }
        };

        await scan(root);
        return { root, files, complete };
    }

    async hashFile(filePath: string): Promise<{ hash: string; content: Buffer }> {
        const content = await fs.readFile(filePath);
        const hash = createHash('sha256').update(content).digest('hex');
        return { hash, content };
    }

    private async describe(filePath: string): Promise<ScannedFile | null> {
        try {
            const canonical = await fs.realpath(filePath);
            const stats = await fs.stat(canonical);

            if (!stats.isFile()) {
                return null;
            }

            if (stats.size > this.options.maxFileSize) {
                logger.warn(`File too large, skipping: ${filePath} (${stats.size} bytes > ${this.options.maxFileSize})`);
                return null;
            }

            return {
                path: canonical,
                size: stats.size,
                modifiedAt: stats.mtime
            };
        } catch (error) {
            logger.error(`Failed to stat file: ${filePath}`, error);
            return null;
        }
    }
}
