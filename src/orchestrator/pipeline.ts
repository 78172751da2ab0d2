import { HashtagAgent } from '../agents/hashtag.agent';
import { TrendingAggregator } from '../agents/aggregator.agent';
import { TrendingCache } from '../cache/trending-cache';
import config from '../config';
import { categoryKeywords, loadCategoryTaxonomy } from '../config/catalog';
import { AIService } from '../services/ai';
import { CategorizerService } from '../services/ai/categorizer.service';
import { createVisionModels } from '../services/ai/models';
import { SuggestionService } from '../services/ai/suggestion.service';
import { SourceBlocklist } from '../services/trending/blocklist';
import { CuratedProvider } from '../services/trending/curated.provider';
import { GoogleTrendsProvider } from '../services/trending/google-trends.provider';
import { createScrapeProviders } from '../services/trending/scrape.provider';
import { XTrendsProvider } from '../services/trending/x-trends.provider';
import {
    AggregateResult,
    CategoryResult,
    EnhancedHashtagResult,
    HashtagRequest,
    Platform,
} from '../types';
import { log } from '../utils/logger';

export interface RunOptions {
    platform?: Platform;
    maxHashtags?: number;
    includeTrending?: boolean;
    includeNiche?: boolean;
    includeBranded?: boolean;
    brandName?: string;
}

export interface PipelineRun {
    classification: CategoryResult;
    result: EnhancedHashtagResult;
    durationMs: number;
}

// Anything that can classify an image
export interface ImageCategorizer {
    categorize(imagePath: string): Promise<CategoryResult>;
}

export interface PipelineDeps {
    aggregator: TrendingAggregator;
    agent: HashtagAgent;
    categorizer: ImageCategorizer;
    blocklist: SourceBlocklist;
}

/**
 * Image -> category -> hashtags
 */
export class HashtagPipeline {
    private readonly aggregator: TrendingAggregator;
    private readonly agent: HashtagAgent;
    private readonly categorizer: ImageCategorizer;
    private readonly blocklist: SourceBlocklist;

    constructor(deps: PipelineDeps) {
        this.aggregator = deps.aggregator;
        this.agent = deps.agent;
        this.categorizer = deps.categorizer;
        this.blocklist = deps.blocklist;
    }

    async run(imagePath: string, options: RunOptions = {}): Promise<PipelineRun> {
        const startTime = Date.now();
        log.info('🚀 Pipeline started', { imagePath });

        const classification = await this.categorizer.categorize(imagePath);

        const request: HashtagRequest = {
            imagePath,
            // A failed classification is dropped, not fatal
            classification: classification.success ? classification : undefined,
            platform: options.platform ?? config.hashtags.defaultPlatform,
            maxHashtags: options.maxHashtags ?? config.hashtags.maxHashtags,
            includeTrending: options.includeTrending ?? true,
            includeNiche: options.includeNiche ?? true,
            includeBranded: options.includeBranded ?? false,
            brandName: options.brandName,
        };

        const result = await this.agent.generate(request);
        const durationMs = Date.now() - startTime;

        if (result.success) {
            log.info(`✅ Pipeline complete in ${(durationMs / 1000).toFixed(1)}s`, {
                category: classification.primaryCategory,
                hashtags: result.totalCount,
            });
        } else {
            log.error('❌ Pipeline failed', { error: result.error });
        }

        return { classification, result, durationMs };
    }

    trending(category: string, platform: Platform, maxCount: number = config.trending.maxCount): Promise<AggregateResult> {
        return this.aggregator.fetch(category, platform, maxCount);
    }

    blockedSources(): string[] {
        return this.blocklist.list();
    }

    get sources(): string[] {
        return this.aggregator.providerNames;
    }
}

/**
 * Wire the production graph from config
 */
export function createPipeline(): HashtagPipeline {
    const cache = new TrendingCache(config.trending.cacheTtlSeconds);
    const blocklist = new SourceBlocklist();
    const curated = new CuratedProvider();
    const taxonomy = loadCategoryTaxonomy();

    // Priority order: scrape, then API, then the curated floor
    const aggregator = new TrendingAggregator(
        [
            ...createScrapeProviders({ cache, blocklist, curated }),
            new GoogleTrendsProvider({ cache }),
            new XTrendsProvider({ cache, keywordsFor: category => categoryKeywords(taxonomy, category) }),
            curated,
        ],
        { timeoutMs: config.trending.providerTimeoutMs, dispatch: config.trending.dispatch }
    );

    const ai = new AIService(createVisionModels());
    const agent = new HashtagAgent(aggregator, new SuggestionService(ai));
    const categorizer = new CategorizerService(ai, taxonomy);

    log.info('Pipeline ready', { sources: aggregator.providerNames, ai: ai.getStatus() });

    return new HashtagPipeline({ aggregator, agent, categorizer, blocklist });
}

export default HashtagPipeline;
