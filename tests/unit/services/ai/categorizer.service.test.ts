import { CategoryTaxonomy } from '../../../../src/config/catalog';
import {
    CategorizerService,
    buildCategorizationPrompt,
    parseCategorization,
} from '../../../../src/services/ai/categorizer.service';
import { ImageAnalyzer } from '../../../../src/types';

const taxonomy: CategoryTaxonomy = {
    food: { subcategories: ['cooking', 'restaurants'], keywords: ['food'] },
    travel: { subcategories: ['beaches'], keywords: ['travel'] },
    fitness: { subcategories: ['yoga'], keywords: [] },
};

describe('parseCategorization', () => {
    it('should read JSON and keep only known secondary categories', () => {
        const reply = '```json\n{"primary_category": "Food", "secondary_categories": ["travel", "food", "cars", "travel"],'
            + ' "confidence_score": 0.9, "description": "A plate of pasta"}\n```';

        expect(parseCategorization(reply, taxonomy)).toEqual({
            primaryCategory: 'food',
            secondaryCategories: ['travel'],
            confidenceScore: 0.9,
            description: 'A plate of pasta',
            success: true,
        });
    });

    it('should mark an unknown primary and halve the confidence', () => {
        const result = parseCategorization('{"primary_category": "cars", "confidence_score": 0.8}', taxonomy);

        expect(result.primaryCategory).toBe('unknown');
        expect(result.confidenceScore).toBeCloseTo(0.4);
        expect(result.success).toBe(true);
    });

    it('should clamp the confidence to 0..1', () => {
        expect(parseCategorization('{"primary_category": "food", "confidence_score": 7}', taxonomy).confidenceScore).toBe(1);
        expect(parseCategorization('{"primary_category": "food", "confidence_score": "high"}', taxonomy).confidenceScore).toBe(0);
    });

    it('should fall back to the first category named in free text', () => {
        expect(parseCategorization('This looks like a travel photo at sunset.', taxonomy)).toEqual({
            primaryCategory: 'travel',
            secondaryCategories: [],
            confidenceScore: 0.6,
            description: 'This looks like a travel photo at sunset.',
            success: true,
        });
    });

    it('should be unknown when nothing matches', () => {
        expect(parseCategorization('A blurry picture.', taxonomy)).toEqual({
            primaryCategory: 'unknown',
            secondaryCategories: [],
            confidenceScore: 0,
            description: 'A blurry picture.',
            success: true,
        });
    });
});

describe('CategorizerService', () => {
    it('should list the taxonomy in the prompt', () => {
        const prompt = buildCategorizationPrompt(taxonomy);

        expect(prompt).toContain('- food: cooking, restaurants');
        expect(prompt).toContain('- fitness: yoga');
    });

    it('should return a failed result when the analyzer fails', async () => {
        const analyzer: ImageAnalyzer = {
            analyze: jest.fn().mockResolvedValue({ success: false, error: 'All providers down' }),
        };

        const result = await new CategorizerService(analyzer, taxonomy).categorize('photo.jpg');

        expect(result).toEqual({
            primaryCategory: 'unknown',
            secondaryCategories: [],
            confidenceScore: 0,
            description: '',
            success: false,
            error: 'All providers down',
        });
    });

    it('should parse the analyzer reply', async () => {
        const analyzer: ImageAnalyzer = {
            analyze: jest.fn().mockResolvedValue({ success: true, content: '{"primary_category": "fitness", "confidence_score": 0.7}' }),
        };

        const result = await new CategorizerService(analyzer, taxonomy).categorize('photo.jpg');

        expect(result.primaryCategory).toBe('fitness');
        expect(result.confidenceScore).toBe(0.7);
    });
});
