import { JobCancelledError } from '../../domain/errors/PipelineErrors';

interface Waiter {
    resolve: () => void;
    reject: (error: Error) => void;
}

/**
 * Simple semaphore for limiting concurrent operations.
 * A waiter whose signal aborts leaves the queue without taking a permit.
 */
export class Semaphore {
    private permits: number;
    private waiting: Waiter[] = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new Error(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.permits = permits;
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            throw new JobCancelledError();
        }
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise((resolve, reject) => {
            const waiter: Waiter = {
                resolve: () => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve();
                },
                reject,
            };
            const onAbort = () => {
                this.waiting = this.waiting.filter((w) => w !== waiter);
                reject(new JobCancelledError());
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiting.push(waiter);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next.resolve();
        } else {
            this.permits++;
        }
    }

    /**
     * Runs fn while holding a permit.
     */
    async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.acquire(signal);
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    available(): number {
        return this.permits;
    }

    queued(): number {
        return this.waiting.length;
    }
}

/**
 * Bounds concurrent calls per provider. One semaphore per provider name,
 * created on first use.
 */
export class ProviderGate {
    private readonly semaphores = new Map<string, Semaphore>();

    constructor(private readonly limitPerProvider: number = 2) { }

    run<T>(provider: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        return this.semaphoreFor(provider).use(fn, signal);
    }

    /**
     * Calls currently holding a permit for the provider.
     */
    inUse(provider: string): number {
        const semaphore = this.semaphores.get(provider);
        return semaphore ? this.limitPerProvider - semaphore.available() : 0;
    }

    private semaphoreFor(provider: string): Semaphore {
        let semaphore = this.semaphores.get(provider);
        if (!semaphore) {
            semaphore = new Semaphore(this.limitPerProvider);
            this.semaphores.set(provider, semaphore);
        }
        return semaphore;
    }
}
