export const MIN_HASHTAG_LENGTH = 3;
export const MAX_HASHTAG_LENGTH = 100;

/**
 * Normalize a raw tag into `#` + letters/digits.
 * Returns null when the result is shorter than 3 or longer than 100 characters.
 */
export function normalizeHashtag(raw: string): string | null {
    const body = raw.replace(/[^\p{L}\p{N}]/gu, '');
    const tag = `#${body}`;
    // Length in code points, so astral letters count once
    const length = [...tag].length;

    if (length < MIN_HASHTAG_LENGTH || length > MAX_HASHTAG_LENGTH) {
        return null;
    }

    return tag;
}

export function normalizeHashtags(raw: readonly string[]): string[] {
    const tags: string[] = [];
    for (const item of raw) {
        const tag = normalizeHashtag(item);
        if (tag) tags.push(tag);
    }
    return tags;
}

// Case-insensitive identity used for every dedup
export function hashtagKey(tag: string): string {
    return tag.toLowerCase();
}

/**
 * Remove case-insensitive duplicates, keeping the first-seen spelling and order.
 */
export function dedupeHashtags(tags: readonly string[]): string[] {
    const seen = new Set<string>();
    const unique: string[] = [];

    for (const tag of tags) {
        const key = hashtagKey(tag);
        if (!seen.has(key)) {
            seen.add(key);
            unique.push(tag);
        }
    }

    return unique;
}

// Pull `#tokens` out of free text, first-seen unique
export function extractHashtags(text: string): string[] {
    return dedupeHashtags(text.match(/#[A-Za-z0-9_]+/g) ?? []);
}
