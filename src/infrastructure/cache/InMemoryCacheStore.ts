/**
 * In-Memory Cache Store
 *
 * Keeps serialized entries in a Map, so every read returns a fresh copy just
 * like the persistent stores. Used for development and tests.
 */

import { CacheEntry, CacheEntryInfo, ICacheStore } from '../../domain/ports/ICacheStore';
import { parseCacheEntry, serializeCacheEntry, toEntryInfo } from './CacheEntryCodec';

export class InMemoryCacheStore implements ICacheStore {
    private entries: Map<string, { info: CacheEntryInfo; data: string }> = new Map();

    async read(fingerprint: string): Promise<CacheEntry | null> {
        const stored = this.entries.get(fingerprint);
        return stored ? parseCacheEntry(stored.data) : null;
    }

    async write(entry: CacheEntry): Promise<void> {
        this.entries.set(entry.fingerprint, { info: toEntryInfo(entry), data: serializeCacheEntry(entry) });
    }

    async delete(fingerprint: string): Promise<void> {
        this.entries.delete(fingerprint);
    }

    async list(): Promise<CacheEntryInfo[]> {
        return Array.from(this.entries.values()).map((stored) => ({ ...stored.info }));
    }

    /**
     * Number of stored entries (for tests and monitoring).
     */
    size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}
