import { AnalysisResult, ImageAnalyzer } from '../../types';
import { errorMessage } from '../../utils/errors';
import { log } from '../../utils/logger';
import { ImageService, LoadedImage } from '../image/image.service';

export interface VisionModel {
    readonly name: string;
    analyze(image: LoadedImage, prompt: string): Promise<string>;
}

/**
 * Unified image analyzer
 * Tries each vision model in order and falls back to the next when one fails
 */
export class AIService implements ImageAnalyzer {
    constructor(
        private readonly models: VisionModel[],
        private readonly images: ImageService = new ImageService()
    ) {
        if (models.length === 0) {
            throw new Error('No AI provider configured! Add GEMINI_API_KEY or MISTRAL_API_KEY to .env');
        }
    }

    async analyze(imagePath: string, prompt: string): Promise<AnalysisResult> {
        let image: LoadedImage;
        try {
            image = await this.images.load(imagePath);
        } catch (error) {
            log.error('Could not read image', { imagePath, error: errorMessage(error) });
            return { success: false, error: errorMessage(error) };
        }

        let lastError = 'No AI provider available';

        for (const model of this.models) {
            try {
                const content = await model.analyze(image, prompt);
                return { success: true, content };
            } catch (error) {
                lastError = errorMessage(error);
                log.warn(`${model.name} failed, trying next provider...`, { error: lastError.slice(0, 80) });
            }
        }

        log.error('All AI providers failed', { error: lastError });
        return { success: false, error: lastError };
    }

    getStatus(): { providers: string[]; preferred: string } {
        return {
            providers: this.models.map(m => m.name),
            preferred: this.models[0].name,
        };
    }
}

export default AIService;
