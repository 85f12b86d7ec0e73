import { ArtifactCodec, ContentCache } from '../../../../src/infrastructure/cache/ContentCache';
import { InMemoryCacheStore } from '../../../../src/infrastructure/cache/InMemoryCacheStore';
import { CacheEntry, CacheEntryInfo, ICacheStore } from '../../../../src/domain/ports/ICacheStore';
import { CacheError, JobCancelledError } from '../../../../src/domain/errors/PipelineErrors';

interface Counter {
    n: number;
}

const counterCodec: ArtifactCodec<Counter> = {
    stage: 'script',
    accepts: (value: unknown): value is Counter =>
        typeof value === 'object' && value !== null && 'n' in value && typeof value.n === 'number',
};

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

class BrokenStore implements ICacheStore {
    async read(fingerprint: string): Promise<CacheEntry | null> {
        throw new CacheError('read', fingerprint, 'disk unavailable');
    }
    async write(entry: CacheEntry): Promise<void> {
        throw new CacheError('write', entry.fingerprint, 'disk unavailable');
    }
    async delete(): Promise<void> {
        return undefined;
    }
    async list(): Promise<CacheEntryInfo[]> {
        return [];
    }
}

class SlowWriteStore extends InMemoryCacheStore {
    readonly release = deferred<void>();
    writes = 0;

    async write(entry: CacheEntry): Promise<void> {
        this.writes++;
        await this.release.promise;
        await super.write(entry);
    }
}

describe('ContentCache', () => {
    let store: InMemoryCacheStore;
    let cache: ContentCache;

    beforeEach(() => {
        store = new InMemoryCacheStore();
        cache = new ContentCache(store);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('getOrCompute', () => {
        it('should compute on a miss and serve the next request from the cache', async () => {
            const compute = jest.fn(async () => ({ n: 1 }));

            const first = await cache.getOrCompute('fp-a', counterCodec, compute);
            const second = await cache.getOrCompute('fp-a', counterCodec, compute);

            expect(first).toEqual({ value: { n: 1 }, cached: false, shared: false, stored: true });
            expect(second).toEqual({ value: { n: 1 }, cached: true, shared: false, stored: true });
            expect(compute).toHaveBeenCalledTimes(1);
        });

        it('should return frozen artifacts', async () => {
            const { value } = await cache.getOrCompute('fp-a', counterCodec, async () => ({ n: 1 }));

            expect(Object.isFrozen(value)).toBe(true);
        });

        it('should run one computation for concurrent requesters', async () => {
            const gate = deferred<Counter>();
            const compute = jest.fn(() => gate.promise);

            const a = cache.getOrCompute('fp-a', counterCodec, compute);
            const b = cache.getOrCompute('fp-a', counterCodec, compute);
            await flush();
            expect(cache.inflightCount()).toBe(1);

            gate.resolve({ n: 7 });
            const [ra, rb] = await Promise.all([a, b]);

            expect(compute).toHaveBeenCalledTimes(1);
            expect(ra.shared).toBe(false);
            expect(rb.shared).toBe(true);
            expect(rb.value).toEqual({ n: 7 });
            expect(cache.inflightCount()).toBe(0);
        });

        it('should pass a failure to every requester and commit nothing', async () => {
            const compute = jest.fn(async (): Promise<Counter> => {
                throw new Error('provider down');
            });

            const a = cache.getOrCompute('fp-a', counterCodec, compute);
            const b = cache.getOrCompute('fp-a', counterCodec, compute);

            await Promise.all([
                expect(a).rejects.toThrow('provider down'),
                expect(b).rejects.toThrow('provider down'),
            ]);
            expect(store.size()).toBe(0);
        });

        it('should keep the value out of the cache when shouldCommit declines', async () => {
            const result = await cache.getOrCompute('fp-a', counterCodec, async () => ({ n: 1 }), {
                shouldCommit: (value) => value.n > 1,
            });

            expect(result.stored).toBe(false);
            expect(store.size()).toBe(0);
        });

        it('should reject a requester whose signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort();
            const compute = jest.fn(async () => ({ n: 1 }));

            await expect(cache.getOrCompute('fp-a', counterCodec, compute, { signal: controller.signal })).rejects.toBeInstanceOf(JobCancelledError);
            expect(compute).not.toHaveBeenCalled();
        });

        it('should abort the computation when its only requester cancels', async () => {
            const controller = new AbortController();
            let computeSignal: AbortSignal | undefined;
            const compute = (signal: AbortSignal) => {
                computeSignal = signal;
                return new Promise<Counter>((resolve) => {
                    signal.addEventListener('abort', () => resolve({ n: 1 }));
                });
            };

            const pending = cache.getOrCompute('fp-a', counterCodec, compute, { signal: controller.signal });
            await flush();
            controller.abort();

            await expect(pending).rejects.toBeInstanceOf(JobCancelledError);
            await flush();
            expect(computeSignal?.aborted).toBe(true);
            expect(store.size()).toBe(0);
            expect(cache.inflightCount()).toBe(0);
        });

        it('should remove an entry whose write finished after the last requester cancelled', async () => {
            const slow = new SlowWriteStore();
            const slowCache = new ContentCache(slow);
            const controller = new AbortController();

            const pending = slowCache.getOrCompute('fp-a', counterCodec, async () => ({ n: 1 }), { signal: controller.signal });
            await flush();
            expect(slow.writes).toBe(1);
            controller.abort();
            await expect(pending).rejects.toBeInstanceOf(JobCancelledError);

            slow.release.resolve();
            await flush();

            expect(slow.size()).toBe(0);
            expect(await slowCache.get('fp-a', counterCodec)).toBeNull();
            expect(slowCache.inflightCount()).toBe(0);
        });

        it('should keep computing for the remaining requesters when one cancels', async () => {
            const gate = deferred<Counter>();
            let computeSignal: AbortSignal | undefined;
            const compute = (signal: AbortSignal) => {
                computeSignal = signal;
                return gate.promise;
            };
            const controller = new AbortController();

            const leaving = cache.getOrCompute('fp-a', counterCodec, compute, { signal: controller.signal });
            const staying = cache.getOrCompute('fp-a', counterCodec, compute);
            await flush();
            controller.abort();
            await expect(leaving).rejects.toBeInstanceOf(JobCancelledError);

            gate.resolve({ n: 3 });
            const result = await staying;

            expect(computeSignal?.aborted).toBe(false);
            expect(result.value).toEqual({ n: 3 });
            expect(result.stored).toBe(true);
            expect(store.size()).toBe(1);
        });

        it('should treat storage failures as misses', async () => {
            const broken = new ContentCache(new BrokenStore());

            const result = await broken.getOrCompute('fp-a', counterCodec, async () => ({ n: 1 }));

            expect(result).toEqual({ value: { n: 1 }, cached: false, shared: false, stored: false });
        });
    });

    describe('put', () => {
        it('should leave an existing entry untouched', async () => {
            expect(await cache.put('fp-a', 'script', { n: 1 })).toBe(true);
            expect(await cache.put('fp-a', 'script', { n: 2 })).toBe(true);

            expect(await cache.get('fp-a', counterCodec)).toEqual({ n: 1 });
            expect(store.size()).toBe(1);
        });
    });

    describe('get', () => {
        it('should drop entries of another stage', async () => {
            await cache.put('fp-a', 'narration', { n: 1 });

            expect(await cache.get('fp-a', counterCodec)).toBeNull();
            expect(store.size()).toBe(0);
        });

        it('should drop entries whose media is gone', async () => {
            await cache.put('fp-a', 'script', { n: 1 });
            const validating: ArtifactCodec<Counter> = { ...counterCodec, validate: async () => false };

            expect(await cache.get('fp-a', validating)).toBeNull();
            expect(store.size()).toBe(0);
        });

        it('should expire entries older than maxAgeSeconds', async () => {
            const expiring = new ContentCache(store, { maxAgeSeconds: 60 });
            await store.write({
                fingerprint: 'fp-old',
                stage: 'script',
                artifact: { n: 1 },
                createdAt: new Date(Date.now() - 120_000).toISOString(),
                sizeBytes: 7,
            });

            expect(await expiring.get('fp-old', counterCodec)).toBeNull();
            expect(store.size()).toBe(0);
        });
    });

    describe('evict', () => {
        it('should remove the oldest entries beyond maxEntries', async () => {
            const bounded = new ContentCache(store, { maxEntries: 2 });
            await store.write({ fingerprint: 'fp-1', stage: 'script', artifact: { n: 1 }, createdAt: '2026-01-01T00:00:00.000Z', sizeBytes: 7 });
            await store.write({ fingerprint: 'fp-2', stage: 'script', artifact: { n: 2 }, createdAt: '2026-01-02T00:00:00.000Z', sizeBytes: 7 });

            await bounded.put('fp-3', 'script', { n: 3 });

            expect((await store.list()).map((info) => info.fingerprint).sort()).toEqual(['fp-2', 'fp-3']);
        });

        it('should remove entries until the byte limit holds', async () => {
            const bounded = new ContentCache(store, { maxEntries: 0, maxBytes: 10 });
            await store.write({ fingerprint: 'fp-1', stage: 'script', artifact: { n: 1 }, createdAt: '2026-01-01T00:00:00.000Z', sizeBytes: 6 });
            await store.write({ fingerprint: 'fp-2', stage: 'script', artifact: { n: 2 }, createdAt: '2026-01-02T00:00:00.000Z', sizeBytes: 6 });

            expect(await bounded.evict()).toBe(1);
            expect((await store.list()).map((info) => info.fingerprint)).toEqual(['fp-2']);
        });
    });
});
