import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { IMediaStore } from '../../domain/ports/IMediaStore';
import { providerErrorFromHttp } from '../http/ProviderHttpError';

function sha256(value: string | Buffer): string {
    return createHash('sha256').update(value).digest('hex');
}

function normalizeExtension(extension: string): string {
    return extension.replace(/^\./, '').toLowerCase() || 'bin';
}

/**
 * Media store on the local filesystem.
 *
 * Layout under the root directory:
 * - blobs/      bytes written by adapters, named by content hash
 * - downloads/  remote files, named by URL hash
 * - outputs/    rendered tracks and videos, named by the caller (fingerprints)
 */
export class LocalMediaStore implements IMediaStore {
    private readonly blobsDir: string;
    private readonly downloadsDir: string;
    private readonly outputsDir: string;

    constructor(private readonly rootDir: string) {
        this.blobsDir = path.join(rootDir, 'blobs');
        this.downloadsDir = path.join(rootDir, 'downloads');
        this.outputsDir = path.join(rootDir, 'outputs');
        for (const dir of [this.blobsDir, this.downloadsDir, this.outputsDir]) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    async writeBuffer(data: Buffer, extension: string): Promise<string> {
        const finalPath = path.join(this.blobsDir, `${sha256(data)}.${normalizeExtension(extension)}`);
        if (await this.exists(finalPath)) {
            return finalPath;
        }

        const tempPath = this.tempPathFor(finalPath);
        try {
            await fs.promises.writeFile(tempPath, data);
            await fs.promises.rename(tempPath, finalPath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw error;
        }
        return finalPath;
    }

    async download(url: string, extension: string, signal?: AbortSignal): Promise<string> {
        const finalPath = path.join(this.downloadsDir, `${sha256(url)}.${normalizeExtension(extension)}`);
        if (await this.exists(finalPath)) {
            return finalPath;
        }

        const tempPath = this.tempPathFor(finalPath);
        try {
            const response = await axios.get<Readable>(url, {
                responseType: 'stream',
                signal,
                timeout: 120000,
            });
            await pipeline(response.data, fs.createWriteStream(tempPath), { signal });
            await fs.promises.rename(tempPath, finalPath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw providerErrorFromHttp('download', error, 'no_results');
        }

        console.log(`[MediaStore] Downloaded ${url} -> ${path.basename(finalPath)}`);
        return finalPath;
    }

    outputPath(name: string, extension: string): string {
        const safeName = name.replace(/[^A-Za-z0-9_-]/g, '_');
        return path.join(this.outputsDir, `${safeName}.${normalizeExtension(extension)}`);
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fs.promises.access(filePath, fs.constants.R_OK);
            return true;
        } catch {
            return false;
        }
    }

    async remove(filePath: string): Promise<void> {
        await fs.promises.rm(filePath, { force: true });
    }

    /**
     * Temporary sibling of a final path; renamed into place once complete.
     */
    tempPathFor(finalPath: string): string {
        return `${finalPath}.${uuidv4()}.part`;
    }
}
