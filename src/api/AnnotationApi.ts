import type { Api } from './Api';
import { JsonObject } from '../io/json';
import { batched } from '../utils';

/**
 * Image annotations, exchanged in the platform's JSON format
 * (`{ description, tags, size, objects }`).
 */
export class AnnotationApi {
  private readonly api: Api;

  constructor(api: Api) {
    this.api = api;
  }

  /**
   * Replaces the annotation of one image.
   *
   * @param imageId id of the image
   * @param annotation annotation JSON
   */
  public async uploadJson(imageId: number, annotation: JsonObject): Promise<void> {
    const image = await this.api.image.getInfoByIdStrict(imageId);
    await this.uploadJsons(image.datasetId, [imageId], [annotation]);
  }

  /**
   * Replaces the annotations of several images of the same dataset.
   *
   * @param datasetId id of the dataset the images belong to
   * @param imageIds ids of the images
   * @param annotations annotation JSON, one per image
   */
  public async uploadJsons(
    datasetId: number,
    imageIds: number[],
    annotations: JsonObject[]
  ): Promise<void> {
    if (imageIds.length !== annotations.length) {
      throw new Error(
        `Inconsistency: ${imageIds.length} images but ${annotations.length} annotations`
      );
    }
    const items = imageIds.map((entityId, index) => ({ entityId, annotation: annotations[index] }));
    for (const batch of batched(items)) {
      await this.api.post<unknown>('annotations.bulk.add', { datasetId, annotations: batch });
    }
  }

  /**
   * Fetches the annotation of one image.
   *
   * @returns {Promise<JsonObject>}
   */
  public async downloadJson(imageId: number): Promise<JsonObject> {
    const info = await this.api.post<{ imageId: number; annotation: JsonObject }>(
      'annotations.info',
      { imageId }
    );
    return info.annotation;
  }
}
