import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import config from '../../config';
import { log } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { LoadedImage } from '../image/image.service';
import { VisionModel } from './index';

/**
 * Google Gemini vision model
 * Rate limited to 1 call every 4 seconds to stay inside the free tier
 */
export class GeminiService implements VisionModel {
    readonly name = 'gemini';
    private genAI: GoogleGenerativeAI;
    private model: GenerativeModel;
    private lastCallTime: number = 0;
    private readonly MIN_CALL_INTERVAL = 4000;

    constructor(apiKey: string = config.ai.geminiApiKey, modelName: string = config.ai.geminiModel) {
        this.genAI = new GoogleGenerativeAI(apiKey);
        this.model = this.genAI.getGenerativeModel({ model: modelName });
    }

    /**
     * Wait for rate limit before making a call
     */
    private async waitForRateLimit(): Promise<void> {
        const now = Date.now();
        const timeSinceLastCall = now - this.lastCallTime;

        if (timeSinceLastCall < this.MIN_CALL_INTERVAL) {
            const waitTime = this.MIN_CALL_INTERVAL - timeSinceLastCall;
            log.debug(`⏳ Rate limiting: waiting ${(waitTime / 1000).toFixed(1)}s`);
            await this.delay(waitTime);
        }

        this.lastCallTime = Date.now();
    }

    private delay(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }

    /**
     * Ask Gemini about an image. No retry on rate limit - the caller falls back
     * to the next model instead.
     */
    async analyze(image: LoadedImage, prompt: string): Promise<string> {
        await this.waitForRateLimit();

        try {
            log.debug('Gemini request', { promptLength: prompt.length, imageBytes: image.bytes });

            const result = await this.model.generateContent([
                prompt,
                { inlineData: { data: image.base64, mimeType: image.mimeType } },
            ]);
            const text = result.response.text();

            log.debug('Gemini response', { responseLength: text.length });

            return text;
        } catch (error) {
            const message = errorMessage(error);
            if (message.includes('429') || message.includes('Too Many')) {
                log.warn('Gemini rate limited - handing over to fallback');
            } else {
                log.error('Gemini failed', { error: message.slice(0, 80) });
            }
            throw error;
        }
    }
}

export default GeminiService;
