import { Platform, TrendingHashtagRecord } from '../types';

interface CacheEntry {
    records: readonly TrendingHashtagRecord[];
    storedAt: number;
}

/**
 * In-process cache of provider results keyed by (provider, category, platform).
 * Staleness is checked on read; stale entries stay in the map but are never returned.
 */
export class TrendingCache {
    private entries = new Map<string, CacheEntry>();
    private readonly ttlMs: number;

    constructor(ttlSeconds: number = 3600, private readonly now: () => number = Date.now) {
        this.ttlMs = ttlSeconds * 1000;
    }

    static key(provider: string, category: string, platform: Platform): string {
        return `${provider}_${category.toLowerCase()}_${platform}`;
    }

    get(key: string): readonly TrendingHashtagRecord[] | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        if (this.now() - entry.storedAt >= this.ttlMs) {
            return undefined;
        }

        return entry.records;
    }

    // Last write wins
    put(key: string, records: readonly TrendingHashtagRecord[]): void {
        this.entries.set(key, {
            records: Object.freeze(records.map(record => Object.freeze({ ...record }))),
            storedAt: this.now(),
        });
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}

export default TrendingCache;
