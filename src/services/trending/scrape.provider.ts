import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { TrendingCache } from '../../cache/trending-cache';
import config from '../../config';
import { FetchOutcome, Platform, TrendingProvider } from '../../types';
import { errorMessage } from '../../utils/errors';
import { normalizeHashtag } from '../../utils/hashtags';
import { log } from '../../utils/logger';
import { SourceBlocklist } from './blocklist';
import { CuratedProvider } from './curated.provider';
import { emptyOutcome, fromCache, rankByPosition, saveToCache } from './records';

// Fewer scraped tags than this and the curated table fills in
export const MIN_SCRAPED_RECORDS = 5;

export interface ScrapeSource {
    name: string;
    host: string;
    buildUrl: (category: string) => string;
    selector: string;
    maxTags: number;
    baseScore: number;
    baseGrowth: number;
    // Omitted means every platform
    platforms?: Platform[];
}

const slug = (category: string) => encodeURIComponent(category.toLowerCase());

export const SCRAPE_SOURCES: ScrapeSource[] = [
    {
        name: 'top_hashtags',
        host: 'top-hashtags.com',
        buildUrl: category => `https://top-hashtags.com/instagram/${slug(category)}/`,
        selector: '.entry-content .tag-box',
        maxTags: 20,
        baseScore: 1000,
        baseGrowth: 0.15,
        platforms: ['instagram'],
    },
    {
        name: 'all_hashtag',
        host: 'all-hashtag.com',
        buildUrl: category => `https://all-hashtag.com/top-hashtags.php?keyword=${slug(category)}`,
        selector: '.copy-hashtags',
        maxTags: 15,
        baseScore: 900,
        baseGrowth: 0.12,
    },
    {
        name: 'hashtags_for_likes',
        host: 'hashtagsforlikes.co',
        buildUrl: category => `https://hashtagsforlikes.co/hashtag/${slug(category)}`,
        selector: '.hashtag-item',
        maxTags: 10,
        baseScore: 800,
        baseGrowth: 0.10,
    },
];

const BROWSER_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
};

export interface ScrapeProviderDeps {
    cache: TrendingCache;
    blocklist: SourceBlocklist;
    curated: CuratedProvider;
    client?: AxiosInstance;
}

/**
 * Scrapes one public hashtag-ranking page. Network trouble never escapes:
 * a 403 blocklists the host, anything else is logged, and both come back
 * as an empty success.
 */
export class ScrapeProvider implements TrendingProvider {
    readonly kind = 'scrape' as const;
    private readonly cache: TrendingCache;
    private readonly blocklist: SourceBlocklist;
    private readonly curated: CuratedProvider;
    private readonly client: AxiosInstance;

    constructor(private readonly source: ScrapeSource, deps: ScrapeProviderDeps) {
        this.cache = deps.cache;
        this.blocklist = deps.blocklist;
        this.curated = deps.curated;
        this.client = deps.client ?? axios.create({
            timeout: config.trending.providerTimeoutMs,
            headers: BROWSER_HEADERS,
            responseType: 'text',
        });
    }

    get name(): string {
        return this.source.name;
    }

    get host(): string {
        return this.source.host;
    }

    async fetch(category: string, platform: Platform): Promise<FetchOutcome> {
        const cached = fromCache(this.cache, this.name, category, platform);
        if (cached) return cached;

        if (this.source.platforms && !this.source.platforms.includes(platform)) {
            return emptyOutcome(this.name, category, platform);
        }

        if (this.blocklist.has(this.host)) {
            log.debug(`Skipping ${this.host} - known to be blocking requests`);
            return emptyOutcome(this.name, category, platform);
        }

        let tags: string[];
        try {
            const url = this.source.buildUrl(category);
            const response = await this.client.get<string>(url);
            log.api(this.host, url, response.status);
            tags = this.extractTags(String(response.data));
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 403) {
                this.blocklist.add(this.host, '403 Forbidden');
                return emptyOutcome(this.name, category, platform);
            }

            log.warn(`Scraping ${this.host} failed`, { category, error: errorMessage(error) });
            return emptyOutcome(this.name, category, platform, errorMessage(error));
        }

        const records = rankByPosition(tags, {
            source: this.name,
            category,
            platform,
            baseScore: this.source.baseScore,
            baseGrowth: this.source.baseGrowth,
        });

        if (records.length < MIN_SCRAPED_RECORDS) {
            log.info(`Limited results from ${this.host} for ${category}, supplementing with curated hashtags`);
            records.push(...this.curated.lookup(category, platform));
        }

        saveToCache(this.cache, this.name, category, platform, records);
        log.trending(`Scraped ${tags.length} hashtags from ${this.host}`, category, { platform });

        return {
            records,
            source: this.name,
            category,
            platform,
            success: true,
        };
    }

    /**
     * Elements may hold a single tag or a block of `#tags`; either way the
     * document order is the ranking.
     */
    extractTags(html: string): string[] {
        const $ = cheerio.load(html);
        const tags: string[] = [];

        $(this.source.selector).each((_, element) => {
            const text = $(element).text().trim();
            if (!text) return;

            const tokens = text.includes('#') ? text.match(/#[\p{L}\p{N}_]+/gu) ?? [] : [text];
            for (const token of tokens) {
                const tag = normalizeHashtag(token);
                if (tag) tags.push(tag);
            }
        });

        return tags.slice(0, this.source.maxTags);
    }
}

export function createScrapeProviders(deps: ScrapeProviderDeps): ScrapeProvider[] {
    return SCRAPE_SOURCES.map(source => new ScrapeProvider(source, deps));
}

export default ScrapeProvider;
