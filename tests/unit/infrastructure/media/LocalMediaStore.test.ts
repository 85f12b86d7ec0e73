import { createHash } from 'crypto';
import fs from 'fs';
import nock from 'nock';
import os from 'os';
import path from 'path';
import { JobCancelledError, ProviderError } from '../../../../src/domain/errors/PipelineErrors';
import { LocalMediaStore } from '../../../../src/infrastructure/media/LocalMediaStore';
import { silenceConsole } from '../../../helpers/harness';

const CDN = 'https://cdn.test';

function sha256(value: string | Buffer): string {
    return createHash('sha256').update(value).digest('hex');
}

describe('LocalMediaStore', () => {
    silenceConsole();

    let rootDir: string;
    let store: LocalMediaStore;

    beforeEach(() => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reel-media-'));
        store = new LocalMediaStore(rootDir);
    });

    afterEach(() => {
        nock.cleanAll();
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it('should create its directory layout', () => {
        expect(fs.readdirSync(rootDir).sort()).toEqual(['blobs', 'downloads', 'outputs']);
    });

    describe('writeBuffer', () => {
        it('should name blobs by content hash', async () => {
            const data = Buffer.from('narration bytes');

            const filePath = await store.writeBuffer(data, '.MP3');

            expect(filePath).toBe(path.join(rootDir, 'blobs', `${sha256(data)}.mp3`));
            expect(fs.readFileSync(filePath, 'utf-8')).toBe('narration bytes');
        });

        it('should return the same path for the same bytes', async () => {
            const first = await store.writeBuffer(Buffer.from('same'), 'wav');
            const second = await store.writeBuffer(Buffer.from('same'), 'wav');

            expect(second).toBe(first);
            expect(fs.readdirSync(path.join(rootDir, 'blobs'))).toHaveLength(1);
        });
    });

    describe('download', () => {
        it('should download a URL once', async () => {
            const url = `${CDN}/clips/1.mp4`;
            const scope = nock(CDN).get('/clips/1.mp4').once().reply(200, 'video bytes');

            const first = await store.download(url, 'mp4');
            const second = await store.download(url, 'mp4');

            expect(first).toBe(path.join(rootDir, 'downloads', `${sha256(url)}.mp4`));
            expect(second).toBe(first);
            expect(fs.readFileSync(first, 'utf-8')).toBe('video bytes');
            expect(scope.isDone()).toBe(true);
        });

        it('should leave nothing behind when the server refuses', async () => {
            nock(CDN).get('/clips/gone.mp4').reply(404, 'Not Found');

            const error = await store.download(`${CDN}/clips/gone.mp4`, 'mp4').catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toMatchObject({
                provider: 'download',
                code: 'no_results',
                retryable: false,
                message: 'download request failed (404): Request failed with status code 404',
            });
            expect(fs.readdirSync(path.join(rootDir, 'downloads'))).toEqual([]);
        });

        it('should stop when the signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(store.download(`${CDN}/clips/2.mp4`, 'mp4', controller.signal)).rejects.toBeInstanceOf(JobCancelledError);
            expect(fs.readdirSync(path.join(rootDir, 'downloads'))).toEqual([]);
        });
    });

    it('should sanitise output names', () => {
        expect(store.outputPath('reel/../x y', 'MP4')).toBe(path.join(rootDir, 'outputs', 'reel____x_y.mp4'));
    });

    it('should report and remove files', async () => {
        const filePath = await store.writeBuffer(Buffer.from('temp'), 'bin');

        expect(await store.exists(filePath)).toBe(true);
        await store.remove(filePath);
        expect(await store.exists(filePath)).toBe(false);
        await expect(store.remove(filePath)).resolves.toBeUndefined();
    });

    it('should give each temporary file a unique name', () => {
        const target = path.join(rootDir, 'outputs', 'a.mp4');

        expect(store.tempPathFor(target)).toMatch(/a\.mp4\.[0-9a-f-]{36}\.part$/);
        expect(store.tempPathFor(target)).not.toBe(store.tempPathFor(target));
    });
});
