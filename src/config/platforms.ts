import { Platform } from '../types';

export interface PlatformGuideline {
    maxHashtags: number;
    optimalRange: [number, number];
    style: string;
}

// Per-platform hashtag limits
export const PLATFORM_GUIDELINES: Record<Platform, PlatformGuideline> = {
    instagram: {
        maxHashtags: 30,
        optimalRange: [8, 15],
        style: 'mix of popular and niche',
    },
    facebook: {
        maxHashtags: 10,
        optimalRange: [3, 7],
        style: 'fewer, more targeted',
    },
    twitter: {
        maxHashtags: 5,
        optimalRange: [1, 3],
        style: 'one or two topical tags',
    },
};

export function getPlatformGuideline(platform: Platform): PlatformGuideline {
    return PLATFORM_GUIDELINES[platform] ?? PLATFORM_GUIDELINES.instagram;
}
