import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { CacheEntry, CacheEntryInfo, ICacheStore } from '../../domain/ports/ICacheStore';
import { CacheError, getErrorMessage } from '../../domain/errors/PipelineErrors';
import { parseCacheEntry, serializeCacheEntry } from './CacheEntryCodec';

const FINGERPRINT_PATTERN = /^[a-f0-9]{16,128}$/;

function isMissingFile(error: unknown): boolean {
    // fs errors can come from another realm, so check the shape rather than the class
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores one JSON file per fingerprint under `<cacheDir>/entries`.
 * Entries are written to a temporary file and renamed into place, so a reader
 * never sees a partially written entry.
 */
export class FileCacheStore implements ICacheStore {
    private readonly entriesDir: string;

    constructor(cacheDir: string) {
        this.entriesDir = path.join(cacheDir, 'entries');
        fs.mkdirSync(this.entriesDir, { recursive: true });
    }

    async read(fingerprint: string): Promise<CacheEntry | null> {
        const filePath = this.entryPath(fingerprint);
        let raw: string;
        try {
            raw = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw new CacheError('read', fingerprint, `Failed to read cache entry: ${getErrorMessage(error)}`, { cause: error });
        }

        const entry = parseCacheEntry(raw);
        if (!entry || entry.fingerprint !== fingerprint) {
            throw new CacheError('read', fingerprint, `Corrupt cache entry at ${filePath}`);
        }
        return entry;
    }

    async write(entry: CacheEntry): Promise<void> {
        const finalPath = this.entryPath(entry.fingerprint);
        const tempPath = `${finalPath}.${uuidv4()}.tmp`;
        try {
            await fs.promises.writeFile(tempPath, serializeCacheEntry(entry), 'utf-8');
            await fs.promises.rename(tempPath, finalPath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw new CacheError('write', entry.fingerprint, `Failed to write cache entry: ${getErrorMessage(error)}`, { cause: error });
        }
    }

    async delete(fingerprint: string): Promise<void> {
        try {
            await fs.promises.rm(this.entryPath(fingerprint), { force: true });
        } catch (error) {
            throw new CacheError('delete', fingerprint, `Failed to delete cache entry: ${getErrorMessage(error)}`, { cause: error });
        }
    }

    async list(): Promise<CacheEntryInfo[]> {
        let files: string[];
        try {
            files = await fs.promises.readdir(this.entriesDir);
        } catch (error) {
            throw new CacheError('list', null, `Failed to list cache entries: ${getErrorMessage(error)}`, { cause: error });
        }

        const infos: CacheEntryInfo[] = [];
        for (const file of files) {
            if (!file.endsWith('.json')) {
                continue;
            }
            const fingerprint = file.slice(0, -'.json'.length);
            try {
                const entry = await this.read(fingerprint);
                if (entry) {
                    infos.push({
                        fingerprint: entry.fingerprint,
                        stage: entry.stage,
                        createdAt: entry.createdAt,
                        sizeBytes: entry.sizeBytes,
                    });
                }
            } catch (error) {
                // Unreadable entries are dropped so they stop counting against the limits.
                console.warn(`[Cache] Removing unreadable entry ${fingerprint}: ${getErrorMessage(error)}`);
                await this.delete(fingerprint);
            }
        }
        return infos;
    }

    private entryPath(fingerprint: string): string {
        if (!FINGERPRINT_PATTERN.test(fingerprint)) {
            throw new CacheError('read', fingerprint, `Invalid fingerprint: ${fingerprint}`);
        }
        return path.join(this.entriesDir, `${fingerprint}.json`);
    }
}
