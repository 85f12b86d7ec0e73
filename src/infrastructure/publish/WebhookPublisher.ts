import axios from 'axios';
import FormData from 'form-data';
import fs from 'fs';
import { PublishMetadata, PublishReceipt, RenderedVideo } from '../../domain/entities/RenderedVideo';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IPublisher } from '../../domain/ports/IPublisher';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { providerErrorFromHttp } from '../http/ProviderHttpError';

interface WebhookResponse {
    id?: string | number;
    url?: string;
}

/**
 * Publishes a finished reel by posting the MP4 and its metadata as
 * multipart/form-data to a webhook (an automation hook or a small upload service).
 */
export class WebhookPublisher implements IPublisher {
    readonly name = 'webhook';

    constructor(
        private readonly webhookUrl: string,
        private readonly token?: string
    ) {
        if (!webhookUrl) {
            throw new Error('Publish webhook URL is required');
        }
    }

    async upload(video: RenderedVideo, metadata: PublishMetadata, context: AdapterContext): Promise<PublishReceipt> {
        if (!fs.existsSync(video.videoPath)) {
            throw new ProviderError(this.name, 'invalid_prompt', `Rendered video not found at ${video.videoPath}`);
        }

        const form = new FormData();
        form.append('file', fs.createReadStream(video.videoPath), {
            filename: `reel_${video.fingerprint.substring(0, 12)}.mp4`,
            contentType: 'video/mp4',
        });
        form.append('jobId', context.jobId);
        form.append('title', metadata.title ?? '');
        form.append('description', metadata.description ?? '');
        form.append('hashtags', JSON.stringify(metadata.hashtags ?? []));
        form.append('durationSeconds', String(video.durationSeconds));

        console.log(`[${context.jobId}] [Publish] Uploading ${video.videoPath} to webhook`);

        let data: WebhookResponse;
        try {
            const response = await axios.post<WebhookResponse>(this.webhookUrl, form, {
                headers: {
                    ...form.getHeaders(),
                    ...(this.token ? { Authorization: `Bearer ${this.token}` } : {}),
                },
                maxBodyLength: Infinity,
                signal: context.signal,
                timeout: 300000,
            });
            data = response.data ?? {};
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'invalid_prompt');
        }

        return {
            remoteId: data.id !== undefined ? String(data.id) : video.fingerprint,
            url: data.url,
            publishedAt: new Date(),
        };
    }
}
