import { TwitterApi } from 'twitter-api-v2';
import { TrendingCache } from '../../cache/trending-cache';
import config from '../../config';
import { FetchOutcome, Platform, TrendingHashtagRecord, TrendingProvider } from '../../types';
import { errorMessage } from '../../utils/errors';
import { hashtagKey, normalizeHashtag } from '../../utils/hashtags';
import { log } from '../../utils/logger';
import { emptyOutcome, fromCache, saveToCache } from './records';

export interface XTrend {
    name: string;
    tweet_volume?: number | null;
}

// The slice of the X v1.1 client this provider needs
export interface XTrendsClient {
    trendsByPlace(woeid: number): Promise<Array<{ trends: XTrend[] }>>;
}

export interface XTrendsProviderDeps {
    cache: TrendingCache;
    keywordsFor: (category: string) => string[];
    woeid?: number;
    // null means no credentials
    client?: XTrendsClient | null;
}

function defaultClient(): XTrendsClient | null {
    if (!config.twitter.bearerToken) return null;
    return new TwitterApi(config.twitter.bearerToken).readOnly.v1;
}

/**
 * X (Twitter) trends for one location. Uses tweet volume as a real engagement
 * score when X reports it.
 */
export class XTrendsProvider implements TrendingProvider {
    readonly name = 'x_trends';
    readonly kind = 'api' as const;
    private readonly cache: TrendingCache;
    private readonly keywordsFor: (category: string) => string[];
    private readonly woeid: number;
    private readonly client: XTrendsClient | null;

    constructor(deps: XTrendsProviderDeps) {
        this.cache = deps.cache;
        this.keywordsFor = deps.keywordsFor;
        this.woeid = deps.woeid ?? config.twitter.trendsWoeid;
        this.client = deps.client === undefined ? defaultClient() : deps.client;
    }

    async fetch(category: string, platform: Platform): Promise<FetchOutcome> {
        const cached = fromCache(this.cache, this.name, category, platform);
        if (cached) return cached;

        if (!this.client) {
            log.debug('X trends skipped - no bearer token configured');
            return emptyOutcome(this.name, category, platform);
        }

        try {
            const matches = await this.client.trendsByPlace(this.woeid);
            log.api('X', `/trends/place?id=${this.woeid}`, 200);

            const trends = matches.flatMap(match => match.trends);
            const records = this.toRecords(trends, category, platform);

            saveToCache(this.cache, this.name, category, platform, records);
            log.trending(`Fetched ${records.length} hashtags from X trends`, category);

            return { records, source: this.name, category, platform, success: true };
        } catch (error) {
            log.warn('X trends request failed', { category, error: errorMessage(error) });
            return emptyOutcome(this.name, category, platform, errorMessage(error));
        }
    }

    private toRecords(trends: XTrend[], category: string, platform: Platform): TrendingHashtagRecord[] {
        const keywords = this.keywordsFor(category);
        const fetchedAt = new Date();
        const records: TrendingHashtagRecord[] = [];

        for (const trend of trends) {
            if (!trend.name.startsWith('#')) continue;

            const tag = normalizeHashtag(trend.name);
            if (!tag) continue;

            const key = hashtagKey(tag);
            if (keywords.length > 0 && !keywords.some(keyword => key.includes(keyword))) continue;

            const position = records.length;
            const volume = trend.tweet_volume;
            records.push(Object.freeze({
                tag,
                platform,
                source: this.name,
                engagementScore: typeof volume === 'number' && volume > 0 ? volume : 600 - position * 50,
                category,
                fetchedAt,
            }));
        }

        return records;
    }
}

export default XTrendsProvider;
