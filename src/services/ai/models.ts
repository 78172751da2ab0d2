import config from '../../config';
import { log } from '../../utils/logger';
import { GeminiService } from './gemini.service';
import { VisionModel } from './index';
import { MistralService } from './mistral.service';

/**
 * Vision models that have credentials, preferred provider first
 */
export function createVisionModels(): VisionModel[] {
    const models: VisionModel[] = [];

    if (config.ai.geminiApiKey) {
        models.push(new GeminiService());
        log.info('🔷 Gemini initialized');
    }

    if (config.ai.mistralApiKey) {
        models.push(new MistralService());
        log.info('🟠 Mistral initialized');
    }

    const preferred = config.ai.preferredProvider;
    return models.sort((a, b) => Number(b.name === preferred) - Number(a.name === preferred));
}
