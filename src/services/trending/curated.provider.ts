import { CuratedTable, loadCuratedTable } from '../../config/catalog';
import { FetchOutcome, Platform, TrendingHashtagRecord, TrendingProvider } from '../../types';
import { log } from '../../utils/logger';
import { rankByPosition } from './records';

/**
 * Hand-maintained (category, platform) table. Never fails and never touches
 * the network; an unknown category simply yields nothing.
 */
export class CuratedProvider implements TrendingProvider {
    readonly name = 'curated';
    readonly kind = 'curated' as const;

    constructor(private readonly table: CuratedTable = loadCuratedTable()) { }

    lookup(category: string, platform: Platform): TrendingHashtagRecord[] {
        const tags = this.table[category.toLowerCase()]?.[platform] ?? [];

        return rankByPosition(tags, {
            source: this.name,
            category,
            platform,
            baseScore: 800,
            baseGrowth: 0.12,
            growthStep: 0.015,
        });
    }

    async fetch(category: string, platform: Platform): Promise<FetchOutcome> {
        const records = this.lookup(category, platform);

        log.debug(`Curated table lookup`, { category, platform, count: records.length });

        return {
            records,
            source: this.name,
            category,
            platform,
            success: true,
        };
    }
}

export default CuratedProvider;
