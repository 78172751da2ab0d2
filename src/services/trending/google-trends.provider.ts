import googleTrends from 'google-trends-api';
import { TrendingCache } from '../../cache/trending-cache';
import { FetchOutcome, Platform, TrendingProvider } from '../../types';
import { errorMessage } from '../../utils/errors';
import { log } from '../../utils/logger';
import { emptyOutcome, fromCache, rankByPosition, saveToCache } from './records';

export type RealTimeTrendsFn = (options: { geo: string; category?: string }) => Promise<string>;

// Google real-time trends categories
const TRENDS_CATEGORY = new Map<string, string>([
    ['business', 'b'],
    ['technology', 't'],
    ['fitness', 'm'],
    ['events', 'e'],
]);

const MAX_STORIES = 10;

export interface GoogleTrendsProviderDeps {
    cache: TrendingCache;
    geo?: string;
    realTimeTrends?: RealTimeTrendsFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * First entity name of every trending story, in ranking order.
 */
export function parseTrendingStories(response: string): string[] {
    const data: unknown = JSON.parse(response);
    if (!isRecord(data) || !isRecord(data.storySummaries)) return [];

    const stories = data.storySummaries.trendingStories;
    if (!Array.isArray(stories)) return [];

    const topics: string[] = [];
    for (const story of stories.slice(0, MAX_STORIES)) {
        if (!isRecord(story) || !Array.isArray(story.entityNames)) continue;

        const [entity] = story.entityNames;
        if (typeof entity === 'string') {
            topics.push(entity);
        }
    }

    return topics;
}

/**
 * Google Trends real-time stories as hashtags. Keyless, so it is always tried;
 * any failure (including Google returning HTML instead of JSON) degrades to
 * an empty success.
 */
export class GoogleTrendsProvider implements TrendingProvider {
    readonly name = 'google_trends';
    readonly kind = 'api' as const;
    private readonly cache: TrendingCache;
    private readonly geo: string;
    private readonly realTimeTrends: RealTimeTrendsFn;

    constructor(deps: GoogleTrendsProviderDeps) {
        this.cache = deps.cache;
        this.geo = deps.geo ?? 'US';
        this.realTimeTrends = deps.realTimeTrends ?? googleTrends.realTimeTrends;
    }

    async fetch(category: string, platform: Platform): Promise<FetchOutcome> {
        const cached = fromCache(this.cache, this.name, category, platform);
        if (cached) return cached;

        try {
            const response = await this.realTimeTrends({
                geo: this.geo,
                category: TRENDS_CATEGORY.get(category.toLowerCase()) ?? 'all',
            });

            const records = rankByPosition(parseTrendingStories(response), {
                source: this.name,
                category,
                platform,
                baseScore: 700,
            });

            saveToCache(this.cache, this.name, category, platform, records);
            log.trending(`Fetched ${records.length} topics from Google Trends`, category);

            return { records, source: this.name, category, platform, success: true };
        } catch (error) {
            log.warn('Failed to fetch Google Trends', { category, error: errorMessage(error) });
            return emptyOutcome(this.name, category, platform, errorMessage(error));
        }
    }
}

export default GoogleTrendsProvider;
