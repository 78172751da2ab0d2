import * as fs from 'fs';
import * as path from 'path';
import { log } from '../../utils/logger';

export interface LoadedImage {
    path: string;
    mimeType: string;
    base64: string;
    bytes: number;
}

const MIME_TYPES: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
    '.gif': 'image/gif',
};

// Vision APIs reject larger inline payloads
const MAX_IMAGE_BYTES = 20 * 1024 * 1024;

/**
 * 🖼️ Reads images from disk for the vision models
 */
export class ImageService {
    mimeTypeFor(imagePath: string): string | undefined {
        return MIME_TYPES[path.extname(imagePath).toLowerCase()];
    }

    async load(imagePath: string): Promise<LoadedImage> {
        const resolved = path.resolve(imagePath);

        if (!fs.existsSync(resolved)) {
            throw new Error(`Image file not found: ${imagePath}`);
        }

        const mimeType = this.mimeTypeFor(resolved);
        if (!mimeType) {
            throw new Error(`Unsupported image type: ${path.extname(resolved) || 'none'}`);
        }

        const data = await fs.promises.readFile(resolved);
        if (data.length > MAX_IMAGE_BYTES) {
            throw new Error(`Image too large (${(data.length / 1024 / 1024).toFixed(1)}MB, max 20MB)`);
        }

        log.debug('🖼️ Image loaded', { path: resolved, mimeType, bytes: data.length });

        return {
            path: resolved,
            mimeType,
            base64: data.toString('base64'),
            bytes: data.length,
        };
    }
}

export default ImageService;
