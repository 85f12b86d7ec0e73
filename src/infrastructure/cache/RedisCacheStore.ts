import Redis from 'ioredis';
import { CacheEntry, CacheEntryInfo, ICacheStore } from '../../domain/ports/ICacheStore';
import { CacheError, getErrorMessage } from '../../domain/errors/PipelineErrors';
import { parseCacheEntry, parseCacheEntryInfo, serializeCacheEntry, toEntryInfo } from './CacheEntryCodec';

/**
 * Redis Cache Store
 *
 * Entries live under `<prefix>entry:<fingerprint>`; a hash at `<prefix>index`
 * keeps their metadata so eviction can list them without loading artifacts.
 */
export class RedisCacheStore implements ICacheStore {
    private client: Redis;
    private readonly prefix: string;

    constructor(redisUrlOrClient: string | Redis, prefix: string = 'reel-cache:') {
        this.prefix = prefix;
        this.client = typeof redisUrlOrClient === 'string'
            ? new Redis(redisUrlOrClient, {
                retryStrategy: (times) => Math.min(times * 50, 2000),
                maxRetriesPerRequest: 3,
            })
            : redisUrlOrClient;

        this.client.on('error', (err) => {
            console.error('[Cache] Redis error:', err);
        });
    }

    async read(fingerprint: string): Promise<CacheEntry | null> {
        let data: string | null;
        try {
            data = await this.client.get(this.entryKey(fingerprint));
        } catch (error) {
            throw new CacheError('read', fingerprint, `Redis read failed: ${getErrorMessage(error)}`, { cause: error });
        }
        if (data === null) {
            return null;
        }
        const entry = parseCacheEntry(data);
        if (!entry) {
            throw new CacheError('read', fingerprint, 'Corrupt cache entry in Redis');
        }
        return entry;
    }

    async write(entry: CacheEntry): Promise<void> {
        try {
            // MULTI/EXEC keeps the entry and its index row in step
            await this.client
                .multi()
                .set(this.entryKey(entry.fingerprint), serializeCacheEntry(entry))
                .hset(this.indexKey(), entry.fingerprint, JSON.stringify(toEntryInfo(entry)))
                .exec();
        } catch (error) {
            throw new CacheError('write', entry.fingerprint, `Redis write failed: ${getErrorMessage(error)}`, { cause: error });
        }
    }

    async delete(fingerprint: string): Promise<void> {
        try {
            await this.client
                .multi()
                .del(this.entryKey(fingerprint))
                .hdel(this.indexKey(), fingerprint)
                .exec();
        } catch (error) {
            throw new CacheError('delete', fingerprint, `Redis delete failed: ${getErrorMessage(error)}`, { cause: error });
        }
    }

    async list(): Promise<CacheEntryInfo[]> {
        let rows: Record<string, string>;
        try {
            rows = await this.client.hgetall(this.indexKey());
        } catch (error) {
            throw new CacheError('list', null, `Redis list failed: ${getErrorMessage(error)}`, { cause: error });
        }

        const infos: CacheEntryInfo[] = [];
        for (const row of Object.values(rows)) {
            let parsed: unknown;
            try {
                parsed = JSON.parse(row);
            } catch {
                continue;
            }
            const info = parseCacheEntryInfo(parsed);
            if (info) {
                infos.push(info);
            }
        }
        return infos;
    }

    /**
     * Gracefully close the Redis connection.
     */
    async disconnect(): Promise<void> {
        await this.client.quit();
    }

    private entryKey(fingerprint: string): string {
        return `${this.prefix}entry:${fingerprint}`;
    }

    private indexKey(): string {
        return `${this.prefix}index`;
    }
}
