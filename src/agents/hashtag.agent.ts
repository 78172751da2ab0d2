import { getPlatformGuideline } from '../config/platforms';
import {
    CategoryResult,
    EnhancedHashtagResult,
    HashtagRequest,
    HashtagSuggester,
    HashtagSuggestions,
    Platform,
    TrendingHashtagRecord,
} from '../types';
import { errorMessage } from '../utils/errors';
import { dedupeHashtags, hashtagKey, normalizeHashtags } from '../utils/hashtags';
import { log } from '../utils/logger';
import { TrendingAggregator } from './aggregator.agent';

export const DEFAULT_CATEGORY = 'general';

// Real trending records requested per generation
const TRENDING_FETCH_COUNT = 8;

// Slots per bucket in the final list
const BUCKET_SLOTS = { trending: 5, niche: 5, popular: 5, branded: 3 };

const MIN_POPULAR = 5;
const POPULAR_BACKFILL = 3;

// Engagement score assumed for records without one
const DEFAULT_ENGAGEMENT = 500;

export interface MergedBuckets {
    trending: string[];
    niche: string[];
    popular: string[];
    branded: string[];
}

export function resolveCategory(classification?: CategoryResult): string {
    if (classification?.success && classification.primaryCategory && classification.primaryCategory !== 'unknown') {
        return classification.primaryCategory;
    }
    return DEFAULT_CATEGORY;
}

/**
 * Label the candidate pool. `trending` is the real trending signal; the other
 * buckets come from the AI. A thin popular bucket is topped up with trending
 * tags that the trending slots will not already place.
 */
export function mergeBuckets(
    request: HashtagRequest,
    trending: readonly TrendingHashtagRecord[],
    suggestions: HashtagSuggestions
): MergedBuckets {
    const trendingTags = normalizeHashtags(trending.map(record => record.tag));
    const popular = normalizeHashtags(suggestions.popular);

    if (popular.length < MIN_POPULAR) {
        const placed = request.includeTrending ? trendingTags.slice(0, BUCKET_SLOTS.trending) : [];
        const taken = new Set([...placed, ...popular].map(hashtagKey));

        const backfill = trendingTags
            .filter(tag => !taken.has(hashtagKey(tag)))
            .slice(0, POPULAR_BACKFILL);
        popular.push(...backfill);
    }

    return {
        trending: trendingTags,
        niche: normalizeHashtags(suggestions.niche),
        popular,
        branded: normalizeHashtags(suggestions.branded),
    };
}

/**
 * Bucket priority order, case-insensitive dedup (first spelling wins), then the quota.
 */
export function assembleHashtags(request: HashtagRequest, buckets: MergedBuckets): string[] {
    const candidates = [
        ...(request.includeTrending ? buckets.trending.slice(0, BUCKET_SLOTS.trending) : []),
        ...(request.includeNiche ? buckets.niche.slice(0, BUCKET_SLOTS.niche) : []),
        ...buckets.popular.slice(0, BUCKET_SLOTS.popular),
        ...(request.includeBranded ? buckets.branded.slice(0, BUCKET_SLOTS.branded) : []),
    ];

    const limit = Math.min(request.maxHashtags, getPlatformGuideline(request.platform).maxHashtags);
    return dedupeHashtags(candidates).slice(0, Math.max(0, limit));
}

const clamp = (value: number) => Math.min(10, Math.max(1, value));

export function calculateEngagementPotential(
    hashtags: readonly string[],
    trending: readonly TrendingHashtagRecord[]
): number {
    let score = 5.0;

    const trendingKeys = new Set(trending.map(record => hashtagKey(record.tag)));
    const matches = hashtags.filter(tag => trendingKeys.has(hashtagKey(tag))).length;
    score += matches * 0.5;

    const count = hashtags.length;
    if (count >= 8) score += 1.0;
    if (count >= 10 && count <= 15) score += 0.5;

    if (count < 5) {
        score -= 1.0;
    } else if (count > 25) {
        score -= 0.5;
    }

    return clamp(score);
}

export function calculateTrendingScore(trending: readonly TrendingHashtagRecord[]): number {
    if (trending.length === 0) return 3.0;

    const total = trending.reduce((sum, record) => sum + (record.engagementScore ?? DEFAULT_ENGAGEMENT), 0);
    const average = total / trending.length;

    // 1000 average engagement maps to 10
    return clamp((average / 1000) * 10);
}

export function synthesize(
    request: HashtagRequest,
    trending: readonly TrendingHashtagRecord[],
    suggestions: HashtagSuggestions
): EnhancedHashtagResult {
    const buckets = mergeBuckets(request, trending, suggestions);
    const hashtags = assembleHashtags(request, buckets);

    const aiGeneratedHashtags = dedupeHashtags(normalizeHashtags([
        ...suggestions.trending,
        ...suggestions.popular,
        ...suggestions.niche,
        ...suggestions.branded,
    ]));

    return {
        hashtags,
        trendingHashtags: buckets.trending,
        nicheHashtags: buckets.niche,
        popularHashtags: buckets.popular,
        brandedHashtags: buckets.branded,
        aiGeneratedHashtags,
        realTrendingHashtags: [...trending],
        platform: request.platform,
        totalCount: hashtags.length,
        engagementPotential: calculateEngagementPotential(hashtags, trending),
        trendingScore: calculateTrendingScore(trending),
        success: true,
    };
}

export function failedResult(platform: Platform, error: string): EnhancedHashtagResult {
    return {
        hashtags: [],
        trendingHashtags: [],
        nicheHashtags: [],
        popularHashtags: [],
        brandedHashtags: [],
        aiGeneratedHashtags: [],
        realTrendingHashtags: [],
        platform,
        totalCount: 0,
        success: false,
        error,
    };
}

/**
 * Hashtag synthesis: real trending signal + AI suggestions -> ranked, quota-bound list.
 * Only a failed AI suggestion step fails the result; missing trending data does not.
 */
export class HashtagAgent {
    constructor(
        private readonly aggregator: TrendingAggregator,
        private readonly suggester: HashtagSuggester
    ) { }

    async generate(request: HashtagRequest): Promise<EnhancedHashtagResult> {
        try {
            const category = resolveCategory(request.classification);
            const trending = await this.fetchRealTrending(category, request.platform);

            const outcome = await this.suggester.suggest(request, trending);
            if (!outcome.success) {
                log.warn('AI hashtag suggestion failed', { error: outcome.error });
                return failedResult(request.platform, outcome.error);
            }

            const result = synthesize(request, trending, outcome.suggestions);

            log.hashtags(`Generated ${result.totalCount} hashtags`, {
                category,
                platform: request.platform,
                realTrending: trending.length,
                engagementPotential: result.engagementPotential,
                trendingScore: result.trendingScore,
            });

            return result;
        } catch (error) {
            log.error('Error generating hashtags', { error: errorMessage(error) });
            return failedResult(request.platform, errorMessage(error));
        }
    }

    private async fetchRealTrending(category: string, platform: Platform): Promise<TrendingHashtagRecord[]> {
        const result = await this.aggregator.fetch(category, platform, TRENDING_FETCH_COUNT);

        if (!result.success) {
            log.warn('No real trending data, continuing with AI suggestions only', {
                category,
                error: result.error,
            });
            return [];
        }

        log.info(`Found ${result.records.length} real trending hashtags for ${category}`);
        return result.records;
    }
}

export default HashtagAgent;
