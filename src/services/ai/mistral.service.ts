import { Mistral } from '@mistralai/mistralai';
import config from '../../config';
import { log } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { LoadedImage } from '../image/image.service';
import { VisionModel } from './index';

/**
 * Mistral Pixtral vision model
 * Backup provider when Gemini fails or hits rate limits
 */
export class MistralService implements VisionModel {
    readonly name = 'mistral';
    private client: Mistral;
    private lastCallTime: number = 0;
    private readonly MIN_CALL_INTERVAL = 3000; // 3 seconds between calls

    constructor(apiKey: string = config.ai.mistralApiKey, private readonly modelName: string = config.ai.mistralModel) {
        this.client = new Mistral({ apiKey });
    }

    private async waitForRateLimit(): Promise<void> {
        const now = Date.now();
        const timeSinceLastCall = now - this.lastCallTime;

        if (timeSinceLastCall < this.MIN_CALL_INTERVAL) {
            const waitTime = this.MIN_CALL_INTERVAL - timeSinceLastCall;
            log.debug(`⏳ Mistral rate limiting: waiting ${(waitTime / 1000).toFixed(1)}s`);
            await this.delay(waitTime);
        }

        this.lastCallTime = Date.now();
    }

    private delay(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }

    /**
     * Ask Pixtral about an image, backing off on rate limits
     */
    async analyze(image: LoadedImage, prompt: string, maxRetries: number = 3): Promise<string> {
        await this.waitForRateLimit();

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                log.debug('Mistral request', { attempt, promptLength: prompt.length });

                const response = await this.client.chat.complete({
                    model: this.modelName,
                    messages: [
                        {
                            role: 'user',
                            content: [
                                { type: 'text', text: prompt },
                                { type: 'image_url', imageUrl: `data:${image.mimeType};base64,${image.base64}` },
                            ],
                        },
                    ],
                });

                const content = response.choices?.[0]?.message?.content;
                const text = typeof content === 'string'
                    ? content
                    : (content ?? []).map(chunk => ('text' in chunk ? chunk.text : '')).join('');

                log.debug('Mistral response', { responseLength: text.length });

                return text;
            } catch (error) {
                lastError = error;
                const message = errorMessage(error);

                if (message.includes('429') || message.includes('rate')) {
                    const waitTime = Math.pow(2, attempt) * 2000;
                    log.warn(`Mistral rate limited, waiting ${waitTime / 1000}s`);
                    await this.delay(waitTime);
                    continue;
                }

                log.error('Mistral analysis failed', { error: message, attempt });
                break;
            }
        }

        throw lastError instanceof Error ? lastError : new Error('Mistral analysis failed');
    }
}

export default MistralService;
