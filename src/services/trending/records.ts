import { TrendingCache } from '../../cache/trending-cache';
import { FetchOutcome, Platform, TrendingHashtagRecord } from '../../types';
import { normalizeHashtag } from '../../utils/hashtags';
import { log } from '../../utils/logger';

export interface RankingOptions {
    source: string;
    category: string;
    platform: Platform;
    baseScore: number;
    scoreStep?: number;
    baseGrowth?: number;
    growthStep?: number;
}

/**
 * Turn an ordered tag list into records. No real metrics exist for these tags,
 * so rank position stands in: the first tag scores highest and every later
 * position loses a fixed step.
 */
export function rankByPosition(tags: readonly string[], options: RankingOptions): TrendingHashtagRecord[] {
    const { source, category, platform, baseScore, scoreStep = 50, baseGrowth, growthStep = 0.005 } = options;
    const fetchedAt = new Date();
    const records: TrendingHashtagRecord[] = [];

    for (const raw of tags) {
        const tag = normalizeHashtag(raw);
        if (!tag) continue;

        const position = records.length;
        records.push(Object.freeze({
            tag,
            platform,
            source,
            engagementScore: baseScore - position * scoreStep,
            growthRate: baseGrowth === undefined ? undefined : baseGrowth - position * growthStep,
            category,
            fetchedAt,
        }));
    }

    return records;
}

export function emptyOutcome(source: string, category: string, platform: Platform, error?: string): FetchOutcome {
    return { records: [], source, category, platform, success: true, error };
}

export function fromCache(
    cache: TrendingCache,
    provider: string,
    category: string,
    platform: Platform
): FetchOutcome | undefined {
    const records = cache.get(TrendingCache.key(provider, category, platform));
    if (!records) return undefined;

    log.debug(`Using cached ${provider} data`, { category, platform, count: records.length });

    return {
        records,
        source: `${provider}_cache`,
        category,
        platform,
        success: true,
    };
}

export function saveToCache(
    cache: TrendingCache,
    provider: string,
    category: string,
    platform: Platform,
    records: readonly TrendingHashtagRecord[]
): void {
    if (records.length > 0) {
        cache.put(TrendingCache.key(provider, category, platform), records);
    }
}
