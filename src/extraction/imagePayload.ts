import { promises as fs } from 'fs';
import * as path from 'path';
import type { ImageMimeType, ImagePayload } from './types.js';

const MIME_TYPES: Record<string, ImageMimeType> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp'
};

export const SUPPORTED_IMAGE_EXTENSIONS = Object.keys(MIME_TYPES);

export class UnsupportedImageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedImageError';
  }
}

export function isSupportedMimeType(value: string): value is ImageMimeType {
  return Object.values(MIME_TYPES).some(mimeType => mimeType === value);
}

export function mimeTypeForFile(filePath: string): ImageMimeType | undefined {
  return MIME_TYPES[path.extname(filePath).toLowerCase()];
}

/**
 * Read a page image from disk; only JPEG, PNG and WebP are accepted
 */
export async function loadImagePayload(filePath: string): Promise<ImagePayload> {
  const mimeType = mimeTypeForFile(filePath);
  if (!mimeType) {
    throw new UnsupportedImageError(
      `Unsupported image type "${path.extname(filePath) || filePath}". Allowed: ${SUPPORTED_IMAGE_EXTENSIONS.join(', ')}`
    );
  }

  const data = await fs.readFile(filePath);
  if (data.length === 0) {
    throw new UnsupportedImageError(`Image file is empty: ${filePath}`);
  }

  return { data, mimeType, filename: path.basename(filePath) };
}
