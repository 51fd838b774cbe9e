import { promises as fpm } from 'fs';
import sharp from 'sharp';
import { getFileExt } from '../io/fs';

/** extensions of the formats the platform stores as images */
export const SUPPORTED_IMG_EXTS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.jfif',
  '.png',
  '.webp',
  '.tiff',
  '.tif',
  '.avif'
];

/** extension normalized images are written with */
export const DEFAULT_IMG_EXT = '.png';

export class UnsupportedImageFormat extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedImageFormat';
  }
}

/** Case-insensitive check of a file extension (`.jpg`, `.PNG`...). */
export function isValidExt(ext: string): boolean {
  return SUPPORTED_IMG_EXTS.includes(ext.toLowerCase());
}

export function hasValidExt(filePath: string): boolean {
  return isValidExt(getFileExt(filePath));
}

/**
 * Throws `UnsupportedImageFormat` when the path does not end with one of
 * `SUPPORTED_IMG_EXTS`.
 */
export function validateExt(filePath: string): void {
  if (!hasValidExt(filePath)) {
    throw new UnsupportedImageFormat(
      `Unsupported image extension: "${getFileExt(filePath)}" for file "${filePath}". ` +
        `Only the following extensions are supported: ${SUPPORTED_IMG_EXTS.join(', ')}.`
    );
  }
}

export type NormalizeOptions = {
  /** apply the EXIF orientation to the pixels */
  normalizeExif?: boolean;
  removeAlpha?: boolean;
};

/**
 * Rewrites an image in place as PNG: EXIF orientation applied to the pixels
 * and the alpha channel dropped, depending on the options.
 */
export async function normalizeImage(filePath: string, options: NormalizeOptions = {}): Promise<void> {
  const { normalizeExif = true, removeAlpha = true } = options;
  let image = sharp(await fpm.readFile(filePath));
  if (normalizeExif) {
    image = image.rotate();
  } else {
    image = image.withMetadata();
  }
  if (removeAlpha) {
    image = image.removeAlpha();
  }
  const content = await image.png().toBuffer();
  await fpm.writeFile(filePath, content);
}
