// services/feeds/IFeedAdapter.ts
import type { ICandidate, IFeedSource } from '../../types';

export interface IFeedAdapter {
    name: string;
    /** Throws SourceUnavailableError when the feed cannot be fetched or parsed. */
    fetchCandidates(source: IFeedSource, now: Date): Promise<ICandidate[]>;
}
