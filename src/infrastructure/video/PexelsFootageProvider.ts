import axios from 'axios';
import { FootageCandidate } from '../../domain/entities/FootageClip';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { FootageQuery, IFootageProvider } from '../../domain/ports/IFootageProvider';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { providerErrorFromHttp } from '../http/ProviderHttpError';

interface PexelsVideoFile {
    link?: string;
    width?: number | null;
    height?: number | null;
    file_type?: string;
}

interface PexelsVideo {
    id: number;
    duration: number;
    width: number;
    height: number;
    video_files?: PexelsVideoFile[];
}

interface PexelsSearchResponse {
    videos?: PexelsVideo[];
}

/**
 * Picks the mp4 rendition closest to 1080 pixels wide without going far above it.
 */
export function selectPexelsFile(files: PexelsVideoFile[]): PexelsVideoFile | undefined {
    const mp4 = files.filter((file) => file.link && (file.file_type ?? 'video/mp4') === 'video/mp4');
    const score = (file: PexelsVideoFile) => Math.abs(Math.min(file.width ?? 0, file.height ?? 0) - 1080);
    return [...mp4].sort((a, b) => score(a) - score(b))[0];
}

/**
 * Pexels Video Search in portrait orientation.
 */
export class PexelsFootageProvider implements IFootageProvider {
    readonly name = 'pexels';

    private readonly apiKey: string;

    constructor(
        apiKey: string,
        private readonly perPage: number = 10,
        private readonly baseUrl: string = 'https://api.pexels.com'
    ) {
        if (!apiKey) {
            throw new Error('Pexels API key is required');
        }
        this.apiKey = apiKey;
    }

    async search(query: FootageQuery, context: AdapterContext): Promise<FootageCandidate[]> {
        const keywords = query.keywords.trim();
        console.log(`[${context.jobId}] [Pexels] Searching for: "${keywords}"`);

        let videos: PexelsVideo[];
        try {
            const response = await axios.get<PexelsSearchResponse>(`${this.baseUrl}/videos/search`, {
                params: {
                    query: keywords,
                    orientation: 'portrait',
                    per_page: this.perPage,
                },
                headers: { Authorization: this.apiKey },
                signal: context.signal,
                timeout: 30000,
            });
            videos = response.data.videos ?? [];
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'no_results');
        }

        const candidates: FootageCandidate[] = [];
        for (const video of videos) {
            if (video.duration < query.minDurationSeconds) {
                continue;
            }
            const file = selectPexelsFile(video.video_files ?? []);
            if (!file?.link) {
                continue;
            }
            candidates.push({
                id: `pexels:${video.id}`,
                provider: this.name,
                url: file.link,
                durationSeconds: video.duration,
                width: file.width ?? video.width,
                height: file.height ?? video.height,
                searchTerm: keywords,
            });
        }

        if (candidates.length === 0) {
            throw new ProviderError(this.name, 'no_results', `No videos found on Pexels for query: ${keywords}`);
        }
        return candidates;
    }
}
