// Platforms with hashtag guidelines
export type Platform = 'instagram' | 'facebook' | 'twitter';

export const SUPPORTED_PLATFORMS: readonly Platform[] = ['instagram', 'facebook', 'twitter'];

export function isPlatform(value: string): value is Platform {
    return SUPPORTED_PLATFORMS.some(platform => platform === value);
}

// One candidate hashtag as produced by a provider. Never mutated once stored.
export interface TrendingHashtagRecord {
    readonly tag: string;
    readonly platform: Platform;
    readonly source: string;
    readonly engagementScore?: number;
    readonly growthRate?: number;
    readonly category: string;
    readonly fetchedAt: Date;
}

// Result of a single provider invocation
export interface FetchOutcome {
    records: readonly TrendingHashtagRecord[];
    source: string;
    category: string;
    platform: Platform;
    success: boolean;
    error?: string;
}

export type ProviderKind = 'scrape' | 'api' | 'curated';

// Uniform strategy interface every trending source implements
export interface TrendingProvider {
    readonly name: string;
    readonly kind: ProviderKind;
    fetch(category: string, platform: Platform): Promise<FetchOutcome>;
}

// Aggregator output
export interface AggregateResult {
    records: TrendingHashtagRecord[];
    source: string;
    attemptedSources: string[];
    category: string;
    platform: Platform;
    success: boolean;
    error?: string;
}

// Content categorizer output
export interface CategoryResult {
    primaryCategory: string;
    secondaryCategories: string[];
    confidenceScore: number;
    description: string;
    success: boolean;
    error?: string;
}

export interface HashtagRequest {
    imagePath: string;
    classification?: CategoryResult;
    platform: Platform;
    maxHashtags: number;
    includeTrending: boolean;
    includeNiche: boolean;
    includeBranded: boolean;
    brandName?: string;
}

export type HashtagBucket = 'trending' | 'popular' | 'niche' | 'branded';

export type HashtagSuggestions = Record<HashtagBucket, string[]>;

export type SuggestionOutcome =
    | { success: true; suggestions: HashtagSuggestions }
    | { success: false; error: string };

// Produces AI hashtag buckets for an image, given the real trending tags as context
export interface HashtagSuggester {
    suggest(request: HashtagRequest, trending: readonly TrendingHashtagRecord[]): Promise<SuggestionOutcome>;
}

export type AnalysisResult =
    | { success: true; content: string }
    | { success: false; error: string };

// Image understanding collaborator
export interface ImageAnalyzer {
    analyze(imagePath: string, prompt: string): Promise<AnalysisResult>;
}

export interface EnhancedHashtagResult {
    hashtags: string[];
    trendingHashtags: string[];
    nicheHashtags: string[];
    popularHashtags: string[];
    brandedHashtags: string[];
    aiGeneratedHashtags: string[];
    realTrendingHashtags: TrendingHashtagRecord[];
    platform: Platform;
    totalCount: number;
    engagementPotential?: number;
    trendingScore?: number;
    success: boolean;
    error?: string;
}
