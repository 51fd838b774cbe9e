import { promises as fpm } from 'fs';
import FormData from 'form-data';
import { ensureBasePath, getFileHash, getFileNameWithExt } from '../io/fs';
import { JsonObject } from '../io/json';
import { ProgressCallback } from '../progress';
import { batched } from '../utils';
import { ModuleApi } from './ModuleApi';

const HASHES_BATCH_SIZE = 900;

/**
 * Images and videos are stored by content hash: bytes are uploaded once and
 * every dataset item refers to them by hash. This base holds the shared
 * check-upload-register flow.
 */
export abstract class ItemApi<Info> extends ModuleApi<Info> {
  protected abstract readonly hashesMethod: string;
  protected abstract readonly uploadMethod: string;
  protected abstract readonly bulkAddMethod: string;
  protected abstract readonly downloadMethod: string;
  /** key of the item list in `bulkAddMethod` bodies */
  protected abstract readonly itemsField: string;

  /**
   * Asks which of the given hashes already have content on the server.
   *
   * @param hashes content hashes to look up
   *
   * @returns {Promise<string[]>} the subset that exists remotely
   */
  public async checkExistingHashes(hashes: string[]): Promise<string[]> {
    const existing: string[] = [];
    for (const batch of batched(hashes, HASHES_BATCH_SIZE)) {
      const found = await this.api.post<string[]>(this.hashesMethod, { hashes: batch });
      existing.push(...found);
    }
    return existing;
  }

  /**
   * Adds items to a dataset from content that is already on the server.
   *
   * @param datasetId id of the destination dataset
   * @param names item names, one per hash
   * @param hashes content hashes
   * @param progressCb called with the number of items added by each batch
   * @param metas optional per-item metadata
   *
   * @returns {Promise<Info[]>}
   */
  public async uploadHashes(
    datasetId: number,
    names: string[],
    hashes: string[],
    progressCb?: ProgressCallback,
    metas?: JsonObject[]
  ): Promise<Info[]> {
    if (names.length !== hashes.length) {
      throw new Error(`Inconsistency: ${names.length} names but ${hashes.length} hashes`);
    }
    if (metas !== undefined && metas.length !== names.length) {
      throw new Error(`Inconsistency: ${names.length} names but ${metas.length} metas`);
    }
    const items = names.map((name, index) => {
      const item: JsonObject = { title: name, hash: hashes[index] };
      if (metas !== undefined) {
        item.meta = metas[index];
      }
      return item;
    });

    const results: Info[] = [];
    for (const batch of batched(items)) {
      const infos = await this.api.post<Info[]>(this.bulkAddMethod, {
        datasetId,
        [this.itemsField]: batch
      });
      results.push(...infos);
      progressCb?.(batch.length);
    }
    return results;
  }

  /**
   * Uploads local files to a dataset. Content the server already has is not
   * sent again.
   *
   * @param datasetId id of the destination dataset
   * @param names item names, one per path
   * @param paths local file paths
   * @param progressCb called with the number of items added by each batch
   * @param metas optional per-item metadata
   *
   * @returns {Promise<Info[]>}
   */
  public async uploadPaths(
    datasetId: number,
    names: string[],
    paths: string[],
    progressCb?: ProgressCallback,
    metas?: JsonObject[]
  ): Promise<Info[]> {
    if (names.length !== paths.length) {
      throw new Error(`Inconsistency: ${names.length} names but ${paths.length} paths`);
    }
    const hashes = await Promise.all(paths.map((filePath) => getFileHash(filePath)));
    await this.uploadContent(paths, hashes);
    return this.uploadHashes(datasetId, names, hashes, progressCb, metas);
  }

  /**
   * Sends the bytes of every file whose hash the server does not know yet.
   * Each distinct hash is sent once.
   */
  protected async uploadContent(paths: string[], hashes: string[]): Promise<void> {
    const pathByHash = new Map<string, string>();
    hashes.forEach((hash, index) => {
      if (!pathByHash.has(hash)) {
        pathByHash.set(hash, paths[index]);
      }
    });
    const remote = new Set(await this.checkExistingHashes([...pathByHash.keys()]));
    const missing = [...pathByHash.entries()].filter(([hash]) => !remote.has(hash));

    for (const batch of batched(missing)) {
      const form = new FormData();
      for (const [hash, filePath] of batch) {
        form.append(hash, await fpm.readFile(filePath), {
          filename: getFileNameWithExt(filePath)
        });
      }
      await this.api.post<unknown>(this.uploadMethod, form);
    }
  }

  /**
   * Downloads content by hash to local paths.
   *
   * @param hashes content hashes
   * @param paths destination paths, one per hash
   */
  public async downloadPathsByHashes(hashes: string[], paths: string[]): Promise<void> {
    if (hashes.length !== paths.length) {
      throw new Error(`Inconsistency: ${hashes.length} hashes but ${paths.length} paths`);
    }
    for (let index = 0, length = hashes.length; index < length; ++index) {
      const content = await this.api.post<Buffer>(
        this.downloadMethod,
        { hash: hashes[index] },
        { responseType: 'arraybuffer' }
      );
      await ensureBasePath(paths[index]);
      await fpm.writeFile(paths[index], content);
    }
  }
}
