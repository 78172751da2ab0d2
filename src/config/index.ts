import dotenv from 'dotenv';
import path from 'path';
import { Platform, isPlatform } from '../types';

export type AIProviderName = 'gemini' | 'mistral';
export type DispatchMode = 'parallel' | 'sequential';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

function intFromEnv(name: string, fallback: number): number {
    const parsed = parseInt(process.env[name] || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function listFromEnv(name: string, fallback: string): string[] {
    return (process.env[name] || fallback).split(',').map(v => v.trim()).filter(v => v);
}

function platformFromEnv(name: string, fallback: Platform): Platform {
    const value = process.env[name] || '';
    return isPlatform(value) ? value : fallback;
}

const preferredProvider: AIProviderName = process.env.AI_PREFERRED_PROVIDER === 'mistral' ? 'mistral' : 'gemini';
const dispatch: DispatchMode = process.env.TRENDING_DISPATCH === 'sequential' ? 'sequential' : 'parallel';

export const config = {
    // AI Providers (vision capable)
    ai: {
        geminiApiKey: process.env.GEMINI_API_KEY || '',
        mistralApiKey: process.env.MISTRAL_API_KEY || '',
        geminiModel: process.env.GEMINI_MODEL || 'gemini-1.5-flash',
        mistralModel: process.env.MISTRAL_MODEL || 'pixtral-12b-2409',
        preferredProvider,
    },

    // X (Twitter) API - read only, used for trends
    twitter: {
        bearerToken: process.env.X_BEARER_TOKEN || '',
        trendsWoeid: intFromEnv('X_TRENDS_WOEID', 1),
    },

    // Trending aggregation
    trending: {
        cacheTtlSeconds: intFromEnv('TRENDING_CACHE_TTL_SECONDS', 3600),
        providerTimeoutMs: intFromEnv('TRENDING_PROVIDER_TIMEOUT_MS', 10000),
        dispatch,
        maxCount: intFromEnv('TRENDING_MAX_COUNT', 15),
    },

    // Hashtag generation defaults
    hashtags: {
        defaultPlatform: platformFromEnv('DEFAULT_PLATFORM', 'instagram'),
        maxHashtags: intFromEnv('MAX_HASHTAGS', 15),
        supportedPlatforms: listFromEnv('SUPPORTED_PLATFORMS', 'instagram,facebook,twitter').filter(isPlatform),
    },

    // App Settings
    app: {
        env: process.env.NODE_ENV || 'development',
        logLevel: process.env.LOG_LEVEL || 'info',
        logToFile: process.env.LOG_TO_FILE !== 'false',
        dataDir: process.env.DATA_DIR || path.resolve(__dirname, '../../data'),
    },
};

// Validate required config
export function validateConfig(): { valid: boolean; missing: string[] } {
    const missing: string[] = [];

    // At least one vision provider is needed for suggestions
    if (!config.ai.geminiApiKey && !config.ai.mistralApiKey) {
        missing.push('GEMINI_API_KEY or MISTRAL_API_KEY');
    }

    if (config.hashtags.supportedPlatforms.length === 0) {
        missing.push('SUPPORTED_PLATFORMS');
    }

    return {
        valid: missing.length === 0,
        missing,
    };
}

export default config;
