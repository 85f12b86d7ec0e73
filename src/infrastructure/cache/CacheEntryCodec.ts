import { CacheEntry, CacheEntryInfo, CacheStageName } from '../../domain/ports/ICacheStore';

const STAGE_NAMES: readonly CacheStageName[] = ['script', 'narration', 'captions', 'footage', 'composition', 'render'];

function isCacheStageName(value: unknown): value is CacheStageName {
    return STAGE_NAMES.some((stage) => stage === value);
}

/**
 * Parses a serialized entry, returning null when the payload is not an entry.
 */
export function parseCacheEntry(raw: string): CacheEntry | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null || !('artifact' in parsed)) {
        return null;
    }
    const info = parseCacheEntryInfo(parsed);
    return info ? { ...info, artifact: parsed.artifact } : null;
}

export function parseCacheEntryInfo(value: unknown): CacheEntryInfo | null {
    if (typeof value !== 'object' || value === null) {
        return null;
    }
    if (!('fingerprint' in value) || !('stage' in value) || !('createdAt' in value) || !('sizeBytes' in value)) {
        return null;
    }
    const { fingerprint, stage, createdAt, sizeBytes } = value;
    if (
        typeof fingerprint !== 'string' ||
        !isCacheStageName(stage) ||
        typeof createdAt !== 'string' ||
        typeof sizeBytes !== 'number'
    ) {
        return null;
    }
    return { fingerprint, stage, createdAt, sizeBytes };
}

export function serializeCacheEntry(entry: CacheEntry): string {
    return JSON.stringify(entry);
}

export function toEntryInfo(entry: CacheEntry): CacheEntryInfo {
    return {
        fingerprint: entry.fingerprint,
        stage: entry.stage,
        createdAt: entry.createdAt,
        sizeBytes: entry.sizeBytes,
    };
}
