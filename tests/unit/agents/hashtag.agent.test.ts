import nock from 'nock';
import { TrendingAggregator } from '../../../src/agents/aggregator.agent';
import {
    HashtagAgent,
    assembleHashtags,
    calculateEngagementPotential,
    calculateTrendingScore,
    mergeBuckets,
    resolveCategory,
} from '../../../src/agents/hashtag.agent';
import { TrendingCache } from '../../../src/cache/trending-cache';
import { SourceBlocklist } from '../../../src/services/trending/blocklist';
import { CuratedProvider } from '../../../src/services/trending/curated.provider';
import { SCRAPE_SOURCES, createScrapeProviders } from '../../../src/services/trending/scrape.provider';
import {
    CategoryResult,
    HashtagRequest,
    HashtagSuggester,
    HashtagSuggestions,
    SuggestionOutcome,
} from '../../../src/types';
import { fakeProvider, record } from '../../helpers/records';

function request(overrides: Partial<HashtagRequest> = {}): HashtagRequest {
    return {
        imagePath: 'photo.jpg',
        platform: 'instagram',
        maxHashtags: 15,
        includeTrending: true,
        includeNiche: true,
        includeBranded: false,
        ...overrides,
    };
}

function suggestions(overrides: Partial<HashtagSuggestions> = {}): HashtagSuggestions {
    return { trending: [], popular: [], niche: [], branded: [], ...overrides };
}

function suggester(outcome: SuggestionOutcome): HashtagSuggester & { suggest: jest.Mock } {
    return { suggest: jest.fn().mockResolvedValue(outcome) };
}

const foodClassification: CategoryResult = {
    primaryCategory: 'food',
    secondaryCategories: [],
    confidenceScore: 0.9,
    description: 'A bowl of ramen',
    success: true,
};

describe('hashtag synthesis', () => {
    describe('resolveCategory', () => {
        it('should fall back to general without a usable classification', () => {
            expect(resolveCategory(undefined)).toBe('general');
            expect(resolveCategory({ ...foodClassification, primaryCategory: 'unknown' })).toBe('general');
            expect(resolveCategory({ ...foodClassification, success: false })).toBe('general');
            expect(resolveCategory(foodClassification)).toBe('food');
        });
    });

    describe('mergeBuckets', () => {
        it('should backfill popular with trending tags the trending slots do not place', () => {
            const trending = ['#t1', '#t2', '#t3', '#t4', '#t5', '#t6', '#t7'].map((tag, i) => record(tag, 900 - i));

            const buckets = mergeBuckets(request(), trending, suggestions({ popular: ['#pop'] }));

            expect(buckets.popular).toEqual(['#pop', '#t6', '#t7']);
        });

        it('should backfill from the top when trending slots are off', () => {
            const trending = ['#t1', '#t2', '#t3', '#t4'].map((tag, i) => record(tag, 900 - i));

            const buckets = mergeBuckets(request({ includeTrending: false }), trending, suggestions());

            expect(buckets.popular).toEqual(['#t1', '#t2', '#t3']);
        });

        it('should leave a full popular bucket alone', () => {
            const popular = ['#p1', '#p2', '#p3', '#p4', '#p5'];

            const buckets = mergeBuckets(request(), [record('#t1', 900)], suggestions({ popular }));

            expect(buckets.popular).toEqual(popular);
        });
    });

    describe('assembleHashtags', () => {
        it('should fill buckets in priority order and stop at the limit', () => {
            const hashtags = assembleHashtags(request({ maxHashtags: 5, includeBranded: true }), {
                trending: ['#trendA', '#trendB', '#trendC'],
                niche: ['#nicheA', '#nicheB', '#nicheC'],
                popular: ['#popA'],
                branded: ['#brandA'],
            });

            expect(hashtags).toEqual(['#trendA', '#trendB', '#trendC', '#nicheA', '#nicheB']);
        });

        it('should place popular before branded when the limit reaches both', () => {
            const hashtags = assembleHashtags(request({ maxHashtags: 30, includeBranded: true }), {
                trending: ['#trend1', '#trend2'],
                niche: ['#niche1', '#niche2'],
                popular: ['#pop1', '#pop2'],
                branded: ['#brand1', '#brand2'],
            });

            expect(hashtags).toEqual([
                '#trend1', '#trend2', '#niche1', '#niche2', '#pop1', '#pop2', '#brand1', '#brand2',
            ]);
        });

        it('should skip disabled buckets', () => {
            const hashtags = assembleHashtags(request({ includeTrending: false, includeNiche: false }), {
                trending: ['#trend'],
                niche: ['#niche'],
                popular: ['#pop'],
                branded: ['#brand'],
            });

            expect(hashtags).toEqual(['#pop']);
        });

        it('should cap at the platform maximum', () => {
            const niche = ['#n1', '#n2', '#n3', '#n4', '#n5'];
            const popular = ['#p1', '#p2', '#p3'];

            const hashtags = assembleHashtags(request({ platform: 'twitter', maxHashtags: 15 }), {
                trending: [], niche, popular, branded: [],
            });

            expect(hashtags).toEqual(niche);
        });
    });

    describe('calculateEngagementPotential', () => {
        const tags = (n: number) => Array.from({ length: n }, (_, i) => `#tag${i}`);

        it('should reward trending matches and a count in the sweet spot', () => {
            const trending = [record('#TAG0', 900), record('#tag1', 800), record('#other', 700)];
            // 5 + 2 * 0.5 + 1 + 0.5
            expect(calculateEngagementPotential(tags(10), trending)).toBe(7.5);
        });

        it('should penalise too few or too many tags', () => {
            expect(calculateEngagementPotential(tags(3), [])).toBe(4);
            expect(calculateEngagementPotential(tags(30), [])).toBe(5.5);
        });

        it('should stay within 1..10', () => {
            const many = tags(12);
            expect(calculateEngagementPotential(many, many.map(tag => record(tag, 1)))).toBe(10);
            expect(calculateEngagementPotential([], [])).toBe(4);
        });
    });

    describe('calculateTrendingScore', () => {
        it('should be 3 without trending data', () => {
            expect(calculateTrendingScore([])).toBe(3);
        });

        it('should scale the mean engagement to 0..10 and clamp', () => {
            expect(calculateTrendingScore([record('#a', 400), record('#b', 600)])).toBeCloseTo(5);
            expect(calculateTrendingScore([record('#unscored')])).toBeCloseTo(5);
            expect(calculateTrendingScore([record('#big', 50000)])).toBe(10);
            expect(calculateTrendingScore([record('#tiny', 10)])).toBe(1);
        });
    });
});

describe('HashtagAgent', () => {
    it('should look up trends for the classified category', async () => {
        const provider = fakeProvider('curated', [record('#ramen', 800)]);
        const agent = new HashtagAgent(
            new TrendingAggregator([provider]),
            suggester({ success: true, suggestions: suggestions({ niche: ['#noodles'] }) })
        );

        await agent.generate(request({ classification: foodClassification, platform: 'facebook' }));

        expect(provider.fetch).toHaveBeenCalledWith('food', 'facebook');
    });

    it('should pass the real trending records to the suggester', async () => {
        const ai = suggester({ success: true, suggestions: suggestions() });
        const agent = new HashtagAgent(new TrendingAggregator([fakeProvider('curated', [record('#ramen', 800)])]), ai);

        const req = request();
        await agent.generate(req);

        expect(ai.suggest).toHaveBeenCalledWith(req, [expect.objectContaining({ tag: '#ramen' })]);
    });

    it('should collapse case variants across trending and AI buckets', async () => {
        const agent = new HashtagAgent(
            new TrendingAggregator([fakeProvider('curated', [record('#Food', 900)])]),
            suggester({ success: true, suggestions: suggestions({ niche: ['#food', '#pasta'] }) })
        );

        const result = await agent.generate(request());

        expect(result.hashtags).toEqual(['#Food', '#pasta']);
        expect(result.totalCount).toBe(2);
    });

    it('should return a failed result when the AI suggestion step fails', async () => {
        const agent = new HashtagAgent(
            new TrendingAggregator([fakeProvider('curated', [record('#food', 800)])]),
            suggester({ success: false, error: 'rate limited' })
        );

        const result = await agent.generate(request());

        expect(result).toEqual({
            hashtags: [],
            trendingHashtags: [],
            nicheHashtags: [],
            popularHashtags: [],
            brandedHashtags: [],
            aiGeneratedHashtags: [],
            realTrendingHashtags: [],
            platform: 'instagram',
            totalCount: 0,
            success: false,
            error: 'rate limited',
        });
    });

    it('should still succeed from AI suggestions alone when no trends are found', async () => {
        const agent = new HashtagAgent(
            new TrendingAggregator([fakeProvider('curated', [])]),
            suggester({
                success: true,
                suggestions: suggestions({ popular: ['#one', '#two', '#three', '#four', '#five'], niche: ['#six'] }),
            })
        );

        const result = await agent.generate(request());

        expect(result.success).toBe(true);
        expect(result.realTrendingHashtags).toEqual([]);
        expect(result.hashtags).toEqual(['#six', '#one', '#two', '#three', '#four', '#five']);
        expect(result.trendingScore).toBe(3);
        // 6 tags: no count bonus, no penalty
        expect(result.engagementPotential).toBe(5);
    });

    describe('with 30 unique candidates', () => {
        const numbered = (prefix: string, n: number) => Array.from({ length: n }, (_, i) => `#${prefix}${i + 1}`);

        function crowdedAgent(): HashtagAgent {
            const real = numbered('real', 10).map((tag, i) => record(tag, 1000 - i * 50));
            return new HashtagAgent(
                new TrendingAggregator([fakeProvider('curated', real)]),
                suggester({
                    success: true,
                    suggestions: suggestions({
                        trending: numbered('aitrend', 5),
                        popular: numbered('pop', 7),
                        niche: numbered('niche', 6),
                        branded: numbered('brand', 4),
                    }),
                })
            );
        }

        it('should return exactly maxHashtags from the highest priority bucket', async () => {
            const result = await crowdedAgent().generate(request({ maxHashtags: 5, includeBranded: true }));

            expect(result.realTrendingHashtags).toHaveLength(8);
            expect(result.hashtags).toEqual(['#real1', '#real2', '#real3', '#real4', '#real5']);
            expect(result.totalCount).toBe(5);
        });

        it('should move on to niche then popular when trending is off', async () => {
            const result = await crowdedAgent().generate(request({ maxHashtags: 8, includeTrending: false, includeBranded: true }));

            expect(result.hashtags).toEqual([
                '#niche1', '#niche2', '#niche3', '#niche4', '#niche5', '#pop1', '#pop2', '#pop3',
            ]);
        });
    });

    it('should report every AI tag once in aiGeneratedHashtags', async () => {
        const agent = new HashtagAgent(
            new TrendingAggregator([fakeProvider('curated', [])]),
            suggester({
                success: true,
                suggestions: suggestions({
                    trending: ['#Summer'],
                    popular: ['#summer', '#beach'],
                    niche: ['#tidepools'],
                    branded: ['#Acme'],
                }),
            })
        );

        const result = await agent.generate(request({ includeBranded: true }));

        expect(result.aiGeneratedHashtags).toEqual(['#Summer', '#beach', '#tidepools', '#Acme']);
        expect(result.brandedHashtags).toEqual(['#Acme']);
    });

    describe('with every scrape source blocked', () => {
        beforeEach(() => {
            nock.disableNetConnect();
        });

        afterEach(() => {
            nock.enableNetConnect();
        });

        it('should rank food/instagram from the curated table alone', async () => {
            const cache = new TrendingCache();
            const blocklist = new SourceBlocklist();
            SCRAPE_SOURCES.forEach(source => blocklist.add(source.host, 'test'));
            const curated = new CuratedProvider();

            const aggregator = new TrendingAggregator([...createScrapeProviders({ cache, blocklist, curated }), curated]);
            const agent = new HashtagAgent(aggregator, suggester({
                success: true,
                suggestions: suggestions({ niche: ['#ramenlover'], popular: ['#dinner'] }),
            }));

            const result = await agent.generate(request({ classification: foodClassification }));

            expect(result.success).toBe(true);
            expect(result.realTrendingHashtags.map(r => r.tag)).toEqual([
                '#foodie2025',
                '#healthyrecipes',
                '#plantbasedmeals',
                '#foodphotography',
                '#homecooking',
            ]);
            expect(result.realTrendingHashtags.every(r => r.source === 'curated')).toBe(true);
            expect(result.trendingScore).toBeCloseTo(7);
            expect(result.hashtags.slice(0, 6)).toEqual([
                '#foodie2025',
                '#healthyrecipes',
                '#plantbasedmeals',
                '#foodphotography',
                '#homecooking',
                '#ramenlover',
            ]);
            expect(result.engagementPotential).toBeGreaterThanOrEqual(1);
            expect(result.engagementPotential).toBeLessThanOrEqual(10);
        });
    });
});
