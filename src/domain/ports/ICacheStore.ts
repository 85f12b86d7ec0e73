import { StageName } from '../entities/PipelineJob';

/**
 * Stage name recorded with a cache entry. 'render' holds a job's final video.
 */
export type CacheStageName = StageName | 'render';

/**
 * A persisted cache entry.
 */
export interface CacheEntry<T = unknown> {
    fingerprint: string;
    stage: CacheStageName;
    artifact: T;
    /** ISO timestamp of the first commit */
    createdAt: string;
    /** Size of the serialized artifact in bytes */
    sizeBytes: number;
}

export type CacheEntryInfo = Omit<CacheEntry, 'artifact'>;

/**
 * ICacheStore - storage backend of the content cache.
 * Methods throw CacheError on I/O failure.
 * Implementations: FileCacheStore, InMemoryCacheStore, RedisCacheStore
 */
export interface ICacheStore {
    read(fingerprint: string): Promise<CacheEntry | null>;

    /** Writes the entry atomically; a partially written entry is never readable */
    write(entry: CacheEntry): Promise<void>;

    delete(fingerprint: string): Promise<void>;

    list(): Promise<CacheEntryInfo[]>;
}
