import { DispatchMode } from '../config';
import {
    AggregateResult,
    FetchOutcome,
    Platform,
    ProviderKind,
    TrendingHashtagRecord,
    TrendingProvider,
} from '../types';
import { errorMessage, withTimeout } from '../utils/errors';
import { hashtagKey } from '../utils/hashtags';
import { log } from '../utils/logger';

export interface AggregatorOptions {
    timeoutMs?: number;
    dispatch?: DispatchMode;
}

interface RankedEntry {
    record: TrendingHashtagRecord;
    order: number;
}

const score = (record: TrendingHashtagRecord) => record.engagementScore ?? 0;

// Scraped pages first, then APIs, then the curated floor
const KIND_PRIORITY: Record<ProviderKind, number> = { scrape: 0, api: 1, curated: 2 };

/**
 * Calls every provider (scrape, then API, then curated), pools their records,
 * deduplicates case-insensitively and ranks by engagement score.
 */
export class TrendingAggregator {
    private readonly providers: TrendingProvider[];
    private readonly timeoutMs: number;
    private readonly dispatch: DispatchMode;

    // Providers of the same kind keep the order they were given in
    constructor(providers: TrendingProvider[], options: AggregatorOptions = {}) {
        this.providers = [...providers].sort((a, b) => KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind]);
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.dispatch = options.dispatch ?? 'parallel';
    }

    get providerNames(): string[] {
        return this.providers.map(p => p.name);
    }

    async fetch(category: string, platform: Platform, maxCount: number = 15): Promise<AggregateResult> {
        log.trending('Aggregation started', category, { platform, maxCount, dispatch: this.dispatch });

        const outcomes = await this.dispatchAll(category, platform);
        const attemptedSources = this.providers.map(p => p.name);

        const pool: TrendingHashtagRecord[] = [];
        for (const outcome of outcomes) {
            if (outcome.success && outcome.records.length > 0) {
                pool.push(...outcome.records);
                log.debug(`Collected ${outcome.records.length} hashtags from ${outcome.source}`);
            }
        }

        if (pool.length === 0) {
            log.warn('No trending hashtags found from any source', { category, platform, attemptedSources });
            return {
                records: [],
                source: attemptedSources.join(','),
                attemptedSources,
                category,
                platform,
                success: false,
                error: 'No trending hashtags found from any source',
            };
        }

        const ranked = this.rank(pool).slice(0, Math.max(0, maxCount));

        log.trending('Aggregation complete', category, {
            pooled: pool.length,
            returned: ranked.length,
            sources: outcomes.filter(o => o.records.length > 0).map(o => o.source),
        });

        return {
            records: ranked,
            source: attemptedSources.join(','),
            attemptedSources,
            category,
            platform,
            success: true,
        };
    }

    /**
     * One representative per normalized tag: the highest engagement score wins,
     * ties go to the earliest. Result is sorted by score, descending, with
     * equal scores kept in pool (provider priority) order.
     */
    rank(pool: readonly TrendingHashtagRecord[]): TrendingHashtagRecord[] {
        const best = new Map<string, RankedEntry>();

        pool.forEach((record, order) => {
            const key = hashtagKey(record.tag);
            const current = best.get(key);
            if (!current || score(record) > score(current.record)) {
                best.set(key, { record, order });
            }
        });

        return [...best.values()]
            .sort((a, b) => score(b.record) - score(a.record) || a.order - b.order)
            .map(entry => entry.record);
    }

    private async dispatchAll(category: string, platform: Platform): Promise<FetchOutcome[]> {
        if (this.dispatch === 'sequential') {
            const outcomes: FetchOutcome[] = [];
            for (const provider of this.providers) {
                outcomes.push(await this.callProvider(provider, category, platform));
            }
            return outcomes;
        }

        return Promise.all(this.providers.map(provider => this.callProvider(provider, category, platform)));
    }

    // A provider that throws or times out counts as an empty success
    private async callProvider(provider: TrendingProvider, category: string, platform: Platform): Promise<FetchOutcome> {
        try {
            return await withTimeout(provider.fetch(category, platform), this.timeoutMs, provider.name);
        } catch (error) {
            log.warn(`Provider ${provider.name} failed`, { category, platform, error: errorMessage(error) });
            return {
                records: [],
                source: provider.name,
                category,
                platform,
                success: true,
                error: errorMessage(error),
            };
        }
    }
}

export default TrendingAggregator;
