import { getPlatformGuideline } from '../../config/platforms';
import {
    HashtagBucket,
    HashtagRequest,
    HashtagSuggester,
    HashtagSuggestions,
    ImageAnalyzer,
    SuggestionOutcome,
    TrendingHashtagRecord,
} from '../../types';
import { errorMessage } from '../../utils/errors';
import { dedupeHashtags, extractHashtags, normalizeHashtags } from '../../utils/hashtags';
import { log } from '../../utils/logger';

const BUCKETS: readonly HashtagBucket[] = ['trending', 'popular', 'niche', 'branded'];

const BUCKET_KEYS: Record<HashtagBucket, string> = {
    trending: 'trending_hashtags',
    popular: 'popular_hashtags',
    niche: 'niche_hashtags',
    branded: 'branded_hashtags',
};

// [start, end) slices of the free-text fallback
const FALLBACK_SLICES: Record<HashtagBucket, [number, number]> = {
    trending: [0, 3],
    popular: [3, 8],
    niche: [8, 12],
    branded: [12, 15],
};

const DESCRIPTION_PROMPT = `Describe this image for social media in 2-3 sentences.
Mention the main subject, setting, mood and any visible brands or text.`;

export function emptySuggestions(): HashtagSuggestions {
    return { trending: [], popular: [], niche: [], branded: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Parse the model reply into buckets.
 * Markdown fences and surrounding prose are tolerated; when no JSON object
 * can be read the `#tags` found in the text are split across the buckets.
 */
export function parseSuggestions(text: string): HashtagSuggestions {
    const cleaned = text.replace(/```json\s*/gi, '').replace(/```\s*/g, '');
    const match = cleaned.match(/\{[\s\S]*\}/);

    if (match) {
        try {
            const parsed: unknown = JSON.parse(match[0]);
            if (isRecord(parsed)) {
                return {
                    trending: dedupeHashtags(normalizeHashtags(stringList(parsed[BUCKET_KEYS.trending]))),
                    popular: dedupeHashtags(normalizeHashtags(stringList(parsed[BUCKET_KEYS.popular]))),
                    niche: dedupeHashtags(normalizeHashtags(stringList(parsed[BUCKET_KEYS.niche]))),
                    branded: dedupeHashtags(normalizeHashtags(stringList(parsed[BUCKET_KEYS.branded]))),
                };
            }
        } catch (error) {
            log.debug('Hashtag reply is not valid JSON, extracting tags from text', { error: errorMessage(error) });
        }
    }

    const tags = extractHashtags(text);
    const suggestions = emptySuggestions();
    for (const bucket of BUCKETS) {
        const [start, end] = FALLBACK_SLICES[bucket];
        suggestions[bucket] = normalizeHashtags(tags.slice(start, end));
    }
    return suggestions;
}

export function buildHashtagPrompt(
    request: HashtagRequest,
    trending: readonly TrendingHashtagRecord[],
    description?: string
): string {
    const guideline = getPlatformGuideline(request.platform);
    const [optimalMin, optimalMax] = guideline.optimalRange;
    const classification = request.classification;

    const lines = [
        `Suggest hashtags for this image on ${request.platform}.`,
        `Platform style: ${guideline.style}. Optimal count: ${optimalMin}-${optimalMax}, maximum ${guideline.maxHashtags}.`,
    ];

    if (description) {
        lines.push(`Image description: ${description}`);
    }

    if (classification?.success) {
        const secondary = classification.secondaryCategories.join(', ') || 'none';
        lines.push(`Primary category: ${classification.primaryCategory}. Secondary categories: ${secondary}.`);
    }

    if (trending.length > 0) {
        lines.push(`Currently trending in this category: ${trending.map(record => record.tag).join(' ')}`);
        lines.push('Use the trending tags that fit the image.');
    }

    if (request.includeBranded && request.brandName) {
        lines.push(`Include branded hashtags for "${request.brandName}".`);
    }

    lines.push(
        '',
        'Respond with JSON only:',
        '{',
        '  "trending_hashtags": ["#tag"],',
        '  "popular_hashtags": ["#tag"],',
        '  "niche_hashtags": ["#tag"],',
        '  "branded_hashtags": ["#tag"]',
        '}'
    );

    return lines.join('\n');
}

/**
 * 🏷️ AI hashtag suggestions for an image, primed with the real trending tags
 */
export class SuggestionService implements HashtagSuggester {
    constructor(private readonly analyzer: ImageAnalyzer) { }

    async describe(imagePath: string): Promise<string | undefined> {
        const result = await this.analyzer.analyze(imagePath, DESCRIPTION_PROMPT);
        if (!result.success) {
            log.warn('Image description failed, continuing without it', { error: result.error });
            return undefined;
        }
        return result.content.trim();
    }

    async suggest(request: HashtagRequest, trending: readonly TrendingHashtagRecord[]): Promise<SuggestionOutcome> {
        const description = await this.describe(request.imagePath);
        const prompt = buildHashtagPrompt(request, trending, description);

        const result = await this.analyzer.analyze(request.imagePath, prompt);
        if (!result.success) {
            return { success: false, error: result.error };
        }

        const suggestions = parseSuggestions(result.content);
        log.hashtags('AI suggestions parsed', {
            trending: suggestions.trending.length,
            popular: suggestions.popular.length,
            niche: suggestions.niche.length,
            branded: suggestions.branded.length,
        });

        return { success: true, suggestions };
    }
}

export default SuggestionService;
