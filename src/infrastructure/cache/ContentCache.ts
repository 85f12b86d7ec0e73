import { deepFreeze } from '../../domain/entities/Immutable';
import { CacheEntry, CacheEntryInfo, CacheStageName, ICacheStore } from '../../domain/ports/ICacheStore';
import { CacheError, JobCancelledError, getErrorMessage } from '../../domain/errors/PipelineErrors';

export interface ContentCacheOptions {
    /** 0 disables the limit */
    maxEntries: number;
    /** 0 disables the limit */
    maxBytes: number;
    /** 0 disables expiry */
    maxAgeSeconds: number;
}

const DEFAULT_OPTIONS: ContentCacheOptions = {
    maxEntries: 500,
    maxBytes: 0,
    maxAgeSeconds: 0,
};

/**
 * Describes one artifact type: which stage it belongs to, how to recognise it
 * after deserialization, and how to check that a hit is still usable.
 */
export interface ArtifactCodec<T> {
    stage: CacheStageName;
    accepts(value: unknown): value is T;
    /** Returns false when files the artifact references are gone */
    validate?(artifact: T): Promise<boolean>;
}

export interface CacheLookup<T> {
    value: T;
    /** Served from the cache rather than computed */
    cached: boolean;
    /** Joined a computation started by another requester */
    shared: boolean;
    /** The artifact is in the cache after this call */
    stored: boolean;
}

export interface ComputeOptions<T> {
    /** Detaches this requester when aborted */
    signal?: AbortSignal;
    /** Returning false keeps the result out of the cache */
    shouldCommit?: (value: T) => boolean;
}

interface FlightResult {
    value: unknown;
    cached: boolean;
    stored: boolean;
}

interface Flight {
    promise: Promise<FlightResult>;
    controller: AbortController;
    waiters: number;
}

type CommitOutcome = 'written' | 'existing' | 'failed';

function shortFingerprint(fingerprint: string): string {
    return fingerprint.substring(0, 12);
}

/**
 * Content-addressed store of stage artifacts.
 *
 * Storage failures never escape: a failed read is a miss, a failed write is
 * logged and the computed value is still returned.
 */
export class ContentCache {
    private readonly options: ContentCacheOptions;
    private readonly inflight = new Map<string, Flight>();

    constructor(
        private readonly store: ICacheStore,
        options: Partial<ContentCacheOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    /**
     * Returns the artifact for a fingerprint, or null on a miss.
     * Expired, malformed and invalid hits are removed and reported as misses.
     */
    async get<T>(fingerprint: string, codec: ArtifactCodec<T>): Promise<T | null> {
        let entry: CacheEntry | null;
        try {
            entry = await this.store.read(fingerprint);
        } catch (error) {
            this.logStoreError(error);
            return null;
        }
        if (!entry) {
            return null;
        }

        if (this.isExpired(entry)) {
            await this.invalidate(fingerprint);
            return null;
        }

        const artifact = entry.artifact;
        if (entry.stage !== codec.stage || !codec.accepts(artifact)) {
            console.warn(`[Cache] Entry ${shortFingerprint(fingerprint)} does not hold a ${codec.stage} artifact, dropping`);
            await this.invalidate(fingerprint);
            return null;
        }

        if (codec.validate && !(await codec.validate(artifact))) {
            console.warn(`[Cache] Entry ${shortFingerprint(fingerprint)} references missing media, recomputing`);
            await this.invalidate(fingerprint);
            return null;
        }

        return deepFreeze(artifact);
    }

    /**
     * Commits an artifact. An existing entry is left untouched.
     * @returns true when an entry for the fingerprint is stored afterwards
     */
    async put<T>(fingerprint: string, stage: CacheStageName, artifact: T): Promise<boolean> {
        return (await this.commit(fingerprint, stage, artifact)) !== 'failed';
    }

    private async commit<T>(fingerprint: string, stage: CacheStageName, artifact: T): Promise<CommitOutcome> {
        try {
            if (await this.store.read(fingerprint)) {
                return 'existing';
            }
            const sizeBytes = Buffer.byteLength(JSON.stringify(artifact), 'utf-8');
            await this.store.write({
                fingerprint,
                stage,
                artifact,
                createdAt: new Date().toISOString(),
                sizeBytes,
            });
        } catch (error) {
            this.logStoreError(error);
            return 'failed';
        }

        await this.evict();
        return 'written';
    }

    async invalidate(fingerprint: string): Promise<void> {
        try {
            await this.store.delete(fingerprint);
        } catch (error) {
            this.logStoreError(error);
        }
    }

    /**
     * Drops expired entries, then the oldest entries until the count and size
     * limits hold.
     * @returns number of entries removed
     */
    async evict(): Promise<number> {
        let infos: CacheEntryInfo[];
        try {
            infos = await this.store.list();
        } catch (error) {
            this.logStoreError(error);
            return 0;
        }

        const doomed = new Set<string>();
        const live = infos
            .filter((info) => {
                if (this.isExpired(info)) {
                    doomed.add(info.fingerprint);
                    return false;
                }
                return true;
            })
            .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));

        let count = live.length;
        let bytes = live.reduce((sum, info) => sum + info.sizeBytes, 0);
        const { maxEntries, maxBytes } = this.options;
        for (const info of live) {
            const overCount = maxEntries > 0 && count > maxEntries;
            const overBytes = maxBytes > 0 && bytes > maxBytes;
            if (!overCount && !overBytes) {
                break;
            }
            doomed.add(info.fingerprint);
            count--;
            bytes -= info.sizeBytes;
        }

        for (const fingerprint of doomed) {
            await this.invalidate(fingerprint);
        }
        if (doomed.size > 0) {
            console.log(`[Cache] Evicted ${doomed.size} entries`);
        }
        return doomed.size;
    }

    /**
     * Returns the cached artifact, or computes it once no matter how many
     * requesters ask concurrently.
     *
     * Each requester may pass its own signal. Aborting it detaches only that
     * requester; the shared computation is aborted when the last one detaches,
     * and an aborted computation commits nothing.
     */
    async getOrCompute<T>(
        fingerprint: string,
        codec: ArtifactCodec<T>,
        compute: (signal: AbortSignal) => Promise<T>,
        options: ComputeOptions<T> = {}
    ): Promise<CacheLookup<T>> {
        if (options.signal?.aborted) {
            throw new JobCancelledError();
        }

        const existing = this.inflight.get(fingerprint);
        const flight = existing ?? this.startFlight(fingerprint, codec, compute, options.shouldCommit);
        const result = await this.join(fingerprint, flight, options.signal);

        if (!codec.accepts(result.value)) {
            throw new Error(`Computation for ${shortFingerprint(fingerprint)} returned an unexpected ${codec.stage} artifact`);
        }
        return { value: result.value, cached: result.cached, shared: existing !== undefined, stored: result.stored };
    }

    /**
     * Number of computations currently running.
     */
    inflightCount(): number {
        return this.inflight.size;
    }

    private startFlight<T>(
        fingerprint: string,
        codec: ArtifactCodec<T>,
        compute: (signal: AbortSignal) => Promise<T>,
        shouldCommit?: (value: T) => boolean
    ): Flight {
        const controller = new AbortController();

        const run = async (): Promise<FlightResult> => {
            const hit = await this.get(fingerprint, codec);
            if (hit !== null) {
                return { value: hit, cached: true, stored: true };
            }

            const value = await compute(controller.signal);
            if (controller.signal.aborted) {
                throw new JobCancelledError('Computation was abandoned by all requesters');
            }
            let stored = false;
            if (!shouldCommit || shouldCommit(value)) {
                const outcome = await this.commit(fingerprint, codec.stage, value);
                if (outcome === 'written' && controller.signal.aborted) {
                    // The last requester left while the entry was being written
                    await this.invalidate(fingerprint);
                    throw new JobCancelledError('Computation was abandoned by all requesters');
                }
                stored = outcome !== 'failed';
            }
            return { value: deepFreeze(value), cached: false, stored };
        };

        const flight: Flight = {
            promise: run().finally(() => {
                if (this.inflight.get(fingerprint) === flight) {
                    this.inflight.delete(fingerprint);
                }
            }),
            controller,
            waiters: 0,
        };

        // Observed here too, so a flight abandoned by every requester never rejects unhandled
        flight.promise.catch((error: unknown) => {
            if (!(error instanceof JobCancelledError)) {
                console.warn(`[Cache] Computation for ${shortFingerprint(fingerprint)} failed: ${getErrorMessage(error)}`);
            }
        });

        this.inflight.set(fingerprint, flight);
        return flight;
    }

    private join(fingerprint: string, flight: Flight, signal?: AbortSignal): Promise<FlightResult> {
        flight.waiters++;

        return new Promise((resolve, reject) => {
            let settled = false;

            const detach = () => {
                flight.waiters--;
                if (flight.waiters === 0) {
                    flight.controller.abort();
                    if (this.inflight.get(fingerprint) === flight) {
                        this.inflight.delete(fingerprint);
                    }
                }
            };

            const onAbort = () => {
                if (settled) {
                    return;
                }
                settled = true;
                detach();
                reject(new JobCancelledError());
            };

            signal?.addEventListener('abort', onAbort, { once: true });

            flight.promise.then(
                (result) => {
                    if (settled) {
                        return;
                    }
                    settled = true;
                    flight.waiters--;
                    signal?.removeEventListener('abort', onAbort);
                    resolve(result);
                },
                (error: unknown) => {
                    if (settled) {
                        return;
                    }
                    settled = true;
                    flight.waiters--;
                    signal?.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    private isExpired(info: { createdAt: string }): boolean {
        if (this.options.maxAgeSeconds <= 0) {
            return false;
        }
        const created = Date.parse(info.createdAt);
        return Number.isNaN(created) || Date.now() - created > this.options.maxAgeSeconds * 1000;
    }

    private logStoreError(error: unknown): void {
        if (error instanceof CacheError) {
            console.warn(`[Cache] ${error.operation} failed${error.fingerprint ? ` for ${shortFingerprint(error.fingerprint)}` : ''}: ${error.message}`);
            return;
        }
        console.warn(`[Cache] Store error: ${getErrorMessage(error)}`);
    }
}
