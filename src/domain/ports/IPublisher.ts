import { PublishMetadata, PublishReceipt, RenderedVideo } from '../entities/RenderedVideo';
import { AdapterContext } from './IStageAdapter';

/**
 * IPublisher - Port for uploading a finished reel.
 * Only invoked for jobs that reached `succeeded`.
 * Implementations: WebhookPublisher
 */
export interface IPublisher {
    readonly name: string;

    upload(video: RenderedVideo, metadata: PublishMetadata, context: AdapterContext): Promise<PublishReceipt>;
}
