import { createReadStream, promises as fpm } from 'fs';
import path from 'path';
import jsSHA from 'jssha';

/**
 * Content hash used by the platform to address stored files: SHA-256 of the
 * file bytes, base64-encoded.
 *
 * @param filePath path of the file to hash
 *
 * @returns {Promise<string>}
 */
export async function getFileHash(filePath: string): Promise<string> {
  const shaObj = new jsSHA('SHA-256', 'UINT8ARRAY');
  const stream = createReadStream(filePath);
  for await (const chunk of stream) {
    if (typeof chunk === 'string') {
      shaObj.update(Buffer.from(chunk));
    } else {
      shaObj.update(chunk);
    }
  }
  return shaObj.getHash('B64');
}

/**
 * Hash of an in-memory buffer, same encoding as `getFileHash`.
 */
export function getBufferHash(content: Uint8Array): string {
  const shaObj = new jsSHA('SHA-256', 'UINT8ARRAY');
  shaObj.update(content);
  return shaObj.getHash('B64');
}

/**
 * Creates the parent directory of a path if it does not exist yet.
 */
export async function ensureBasePath(filePath: string): Promise<void> {
  await fpm.mkdir(path.dirname(filePath), { recursive: true });
}

/** `/a/b/image.jpeg` -> `image` */
export function getFileName(filePath: string): string {
  return path.parse(filePath).name;
}

/** `/a/b/image.jpeg` -> `.jpeg` */
export function getFileExt(filePath: string): string {
  return path.parse(filePath).ext;
}

/** `/a/b/image.jpeg` -> `image.jpeg` */
export function getFileNameWithExt(filePath: string): string {
  return path.basename(filePath);
}

/**
 * Removes everything inside a directory but keeps the directory itself.
 */
export async function cleanDir(dirPath: string): Promise<void> {
  const entries = await fpm.readdir(dirPath);
  await Promise.all(
    entries.map((entry) => fpm.rm(path.join(dirPath, entry), { recursive: true, force: true }))
  );
}
