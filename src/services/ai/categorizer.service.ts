import { CategoryTaxonomy } from '../../config/catalog';
import { CategoryResult, ImageAnalyzer } from '../../types';
import { errorMessage } from '../../utils/errors';
import { log } from '../../utils/logger';

export const UNKNOWN_CATEGORY = 'unknown';

// Confidence given to a category recovered from free text
const TEXT_MATCH_CONFIDENCE = 0.6;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clampConfidence(value: unknown): number {
    const n = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(n)) return 0;
    return Math.min(1, Math.max(0, n));
}

export function unknownCategory(description: string, error?: string): CategoryResult {
    return {
        primaryCategory: UNKNOWN_CATEGORY,
        secondaryCategories: [],
        confidenceScore: 0,
        description,
        success: error === undefined,
        ...(error !== undefined ? { error } : {}),
    };
}

export function buildCategorizationPrompt(taxonomy: CategoryTaxonomy): string {
    const categories = Object.entries(taxonomy)
        .map(([name, definition]) => `- ${name}: ${definition.subcategories.join(', ')}`)
        .join('\n');

    return `Classify this image into one primary category and up to 3 secondary categories.

Available categories:
${categories}

Respond with JSON only:
{
  "primary_category": "category_name",
  "secondary_categories": ["category_name"],
  "confidence_score": 0.0,
  "description": "one sentence about the image"
}`;
}

/**
 * Parse a classification reply against the taxonomy.
 * Unknown primaries become `unknown` at half confidence; without JSON the
 * first taxonomy name mentioned in the text is taken.
 */
export function parseCategorization(text: string, taxonomy: CategoryTaxonomy): CategoryResult {
    const names = Object.keys(taxonomy);
    const match = text.replace(/```json\s*/gi, '').replace(/```\s*/g, '').match(/\{[\s\S]*\}/);

    if (match) {
        try {
            const parsed: unknown = JSON.parse(match[0]);
            if (isRecord(parsed)) {
                let primary = typeof parsed.primary_category === 'string'
                    ? parsed.primary_category.trim().toLowerCase()
                    : UNKNOWN_CATEGORY;
                let confidence = clampConfidence(parsed.confidence_score);

                if (!names.includes(primary)) {
                    primary = UNKNOWN_CATEGORY;
                    confidence = confidence / 2;
                }

                const secondary = Array.isArray(parsed.secondary_categories)
                    ? parsed.secondary_categories
                        .filter((item): item is string => typeof item === 'string')
                        .map(item => item.trim().toLowerCase())
                        .filter(item => item !== primary && names.includes(item))
                    : [];

                return {
                    primaryCategory: primary,
                    secondaryCategories: [...new Set(secondary)],
                    confidenceScore: confidence,
                    description: typeof parsed.description === 'string' ? parsed.description : '',
                    success: true,
                };
            }
        } catch (error) {
            log.debug('Categorization reply is not valid JSON', { error: errorMessage(error) });
        }
    }

    const lower = text.toLowerCase();
    const mentioned = names.find(name => lower.includes(name));
    if (!mentioned) {
        return unknownCategory(text.trim());
    }

    return {
        primaryCategory: mentioned,
        secondaryCategories: [],
        confidenceScore: TEXT_MATCH_CONFIDENCE,
        description: text.trim(),
        success: true,
    };
}

/**
 * 🗂️ Maps an image to a taxonomy category
 */
export class CategorizerService {
    constructor(
        private readonly analyzer: ImageAnalyzer,
        private readonly taxonomy: CategoryTaxonomy
    ) { }

    async categorize(imagePath: string): Promise<CategoryResult> {
        const result = await this.analyzer.analyze(imagePath, buildCategorizationPrompt(this.taxonomy));

        if (!result.success) {
            log.warn('Categorization failed', { imagePath, error: result.error });
            return unknownCategory('', result.error);
        }

        const category = parseCategorization(result.content, this.taxonomy);
        log.info(`🗂️ Categorized as ${category.primaryCategory}`, {
            secondary: category.secondaryCategories,
            confidence: category.confidenceScore,
        });
        return category;
    }
}

export default CategorizerService;
