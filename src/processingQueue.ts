import logger from './logger.js';

export type QueueCallback = (err?: unknown) => void;
export type QueueTask = (callback: QueueCallback) => void;

/**
 * Runs tasks strictly one after another, in push order.
 */
export class ProcessingQueue {
    queue: QueueTask[];
    processing: boolean;
    private idleWaiters: Array<() => void> = [];

    constructor(private readonly name = 'queue') {
        this.queue = [];
        this.processing = false;
    }

    push(f: QueueTask = cb => cb()): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    /**
     * Queues a promise-returning task. Its failure is logged, never thrown into the queue.
     */
    pushAsync(task: () => Promise<void>): void {
        this.push(cb => {
            task().then(
                () => cb(),
                err => cb(err)
            );
        });
    }

    /**
     * Resolves once every queued task has run.
     */
    drain(): Promise<void> {
        if (!this.processing) return Promise.resolve();
        return new Promise(resolve => this.idleWaiters.push(resolve));
    }

    get length(): number {
        return this.queue.length;
    }

    private execute(): void {
        const first = this.queue.shift();
        if (!first) {
            this.idle();
            return;
        }
        let settled = false;
        const next: QueueCallback = err => {
            if (settled) return;
            settled = true;
            if (err) {
                logger.error(`[${this.name}] Error in ProcessingQueue task:`, err);
            }
            if (this.queue.length > 0) {
                this.execute();
            } else {
                this.idle();
            }
        };
        try {
            first(next);
        } catch (err) {
            next(err);
        }
    }

    private idle(): void {
        this.processing = false;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }
}

export default ProcessingQueue;
