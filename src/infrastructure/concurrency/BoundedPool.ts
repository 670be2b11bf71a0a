/**
 * Runs async tasks with at most `limit` in flight. Once closed, queued tasks
 * are rejected with the close reason and new ones are refused, which lets a
 * batch stop issuing requests after a fatal error.
 */
export class BoundedPool {
    private active = 0;
    private queue: Array<() => void> = [];
    private closedWith: Error | null = null;

    constructor(private readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`Pool limit must be a positive integer, got ${limit}`);
        }
    }

    get isClosed(): boolean {
        return this.closedWith !== null;
    }

    run<T>(task: () => Promise<T>): Promise<T> {
        if (this.closedWith) {
            return Promise.reject(this.closedWith);
        }

        return new Promise<T>((resolve, reject) => {
            const start = () => {
                if (this.closedWith) {
                    reject(this.closedWith);
                    return;
                }
                this.active++;
                void Promise.resolve().then(task).then(resolve, reject).finally(() => {
                    this.active--;
                    this.next();
                });
            };

            if (this.active < this.limit && this.queue.length === 0) {
                start();
            } else {
                this.queue.push(start);
            }
        });
    }

    /** Rejects everything still queued; tasks already running finish normally. */
    close(reason: Error): void {
        if (this.closedWith) {
            return;
        }
        this.closedWith = reason;
        const pending = this.queue;
        this.queue = [];
        for (const start of pending) {
            start();
        }
    }

    private next(): void {
        const start = this.queue.shift();
        if (start) {
            start();
        }
    }
}
