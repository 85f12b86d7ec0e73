import axios from 'axios';
import { FootageCandidate } from '../../domain/entities/FootageClip';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { FootageQuery, IFootageProvider } from '../../domain/ports/IFootageProvider';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { providerErrorFromHttp } from '../http/ProviderHttpError';

interface PixabayRendition {
    url?: string;
    width?: number;
    height?: number;
}

interface PixabayHit {
    id: number;
    duration: number;
    videos?: {
        large?: PixabayRendition;
        medium?: PixabayRendition;
        small?: PixabayRendition;
    };
}

interface PixabaySearchResponse {
    hits?: PixabayHit[];
}

/**
 * Pixabay Video Search. Falls back to the first keyword when a multi-word
 * query finds nothing.
 */
export class PixabayFootageProvider implements IFootageProvider {
    readonly name = 'pixabay';

    private readonly apiKey: string;

    constructor(
        apiKey: string,
        private readonly perPage: number = 10,
        private readonly baseUrl: string = 'https://pixabay.com/api/videos/'
    ) {
        if (!apiKey) {
            throw new Error('Pixabay API key is required');
        }
        this.apiKey = apiKey;
    }

    async search(query: FootageQuery, context: AdapterContext): Promise<FootageCandidate[]> {
        const keywords = this.cleanQuery(query.keywords);
        console.log(`[${context.jobId}] [Pixabay] Searching for: "${keywords}"`);

        let hits = await this.fetchHits(keywords, context);
        if (hits.length === 0 && keywords.split(' ').length > 1) {
            const broadQuery = keywords.split(' ')[0];
            console.log(`[${context.jobId}] [Pixabay] No results, retrying with broader query: "${broadQuery}"`);
            hits = await this.fetchHits(broadQuery, context);
        }

        const candidates: FootageCandidate[] = [];
        for (const hit of hits) {
            if (hit.duration < query.minDurationSeconds) {
                continue;
            }
            const rendition = hit.videos?.large?.url ? hit.videos.large : hit.videos?.medium?.url ? hit.videos.medium : hit.videos?.small;
            if (!rendition?.url) {
                continue;
            }
            candidates.push({
                id: `pixabay:${hit.id}`,
                provider: this.name,
                url: rendition.url,
                durationSeconds: hit.duration,
                width: rendition.width ?? 0,
                height: rendition.height ?? 0,
                searchTerm: keywords,
            });
        }

        if (candidates.length === 0) {
            throw new ProviderError(this.name, 'no_results', `No videos found on Pixabay for query: ${keywords}`);
        }
        return candidates;
    }

    private async fetchHits(keywords: string, context: AdapterContext): Promise<PixabayHit[]> {
        try {
            const response = await axios.get<PixabaySearchResponse>(this.baseUrl, {
                params: {
                    key: this.apiKey,
                    q: keywords,
                    video_type: 'film',
                    per_page: this.perPage,
                    safesearch: true,
                },
                signal: context.signal,
                timeout: 30000,
            });
            return response.data.hits ?? [];
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'no_results');
        }
    }

    private cleanQuery(keywords: string): string {
        return keywords
            .replace(new RegExp('[.,/#!$%^&*;:{}=\\-_`~()]', 'g'), ' ')
            .replace(/\s{2,}/g, ' ')
            .trim()
            .substring(0, 100);
    }
}
