import { FootageCandidate } from '../entities/FootageClip';
import { AdapterContext } from './IStageAdapter';

export interface FootageQuery {
    keywords: string;
    /** Clips shorter than this are not returned */
    minDurationSeconds: number;
}

/**
 * IFootageProvider - Port for stock footage search.
 * Returns candidates ordered by provider relevance.
 * Fails with ProviderError{no_results, provider_unavailable}.
 * Implementations: PexelsFootageProvider, PixabayFootageProvider
 */
export interface IFootageProvider {
    readonly name: string;

    search(query: FootageQuery, context: AdapterContext): Promise<FootageCandidate[]>;
}
