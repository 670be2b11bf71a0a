import * as fs from 'fs/promises';
import * as path from 'path';
import logger from '../logger/index.js';

export const LOCK_FILE = 'ingest.lock';

export type LockAttempt =
    | { acquired: true }
    | { acquired: false; holderPid: number | null };

/**
 * Cross-process guard for ingestion passes: a lock file holding the pid of
 * the owner. A lock left behind by a dead process is taken over.
 */
export class IngestionLock {
    private held = false;

    constructor(private readonly lockPath: string) {}

    static inDirectory(indexDir: string): IngestionLock {
        return new IngestionLock(path.join(indexDir, LOCK_FILE));
    }

    isHeld(): boolean {
        return this.held;
    }

    async acquire(): Promise<LockAttempt> {
        if (this.held) {
            return { acquired: false, holderPid: process.pid };
        }

        await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

        for (let attempt = 0; attempt < 2; attempt++) {
            try {
                await fs.writeFile(this.lockPath, process.pid.toString(), { encoding: 'utf-8', flag: 'wx' });
                this.held = true;
                logger.debug(`Ingestion lock acquired: ${this.lockPath}`);
                return { acquired: true };
            } catch (error) {
                if (!isAlreadyExists(error)) {
                    throw error;
                }
            }

            const holderPid = await this.readPid();
            if (holderPid !== null && holderPid !== process.pid && this.isProcessRunning(holderPid)) {
                return { acquired: false, holderPid };
            }

            logger.warn(`Removing stale ingestion lock (pid ${holderPid ?? 'unknown'})`);
            await fs.rm(this.lockPath, { force: true });
        }

        return { acquired: false, holderPid: await this.readPid() };
    }

    async release(): Promise<void> {
        if (!this.held) {
            return;
        }
        this.held = false;
        try {
            await fs.rm(this.lockPath, { force: true });
            logger.debug('Ingestion lock released');
        } catch (error) {
            logger.warn('Failed to release ingestion lock', error);
        }
    }

    async readPid(): Promise<number | null> {
        try {
            const content = await fs.readFile(this.lockPath, 'utf-8');
            const pid = parseInt(content.trim(), 10);
            return isNaN(pid) ? null : pid;
        } catch {
            return null;
        }
    }

    isProcessRunning(pid: number): boolean {
        try {
            // Sending signal 0 tests if process exists
            process.kill(pid, 0);
            return true;
        } catch {
            return false;
        }
    }
}

function isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
