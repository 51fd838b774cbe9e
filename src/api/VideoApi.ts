import type { Api } from './Api';
import { ProjectMeta } from '../annotation/ProjectMeta';
import { TagCollection, VideoTag } from '../annotation/tags';
import { JsonObject } from '../io/json';
import { ItemApi } from './ItemApi';
import { VideoInfo } from './types';

/**
 * Tags attached to videos, with optional frame ranges.
 */
export class VideoTagApi {
  private readonly api: Api;

  constructor(api: Api) {
    this.api = api;
  }

  /**
   * Adds tags to a video. Tag metas without a platform id are resolved by
   * name against the project meta.
   *
   * @param entityId id of the video
   * @param projectId id of the project the video belongs to
   * @param tags tags to add
   *
   * @returns {Promise<number[]>} ids of the created tags
   */
  public async appendToEntity(
    entityId: number,
    projectId: number,
    tags: TagCollection<VideoTag>
  ): Promise<number[]> {
    let meta: ProjectMeta | null = null;
    const payload: JsonObject[] = [];
    for (const tag of tags) {
      let tagId = tag.meta.id;
      if (tagId === undefined) {
        meta ??= ProjectMeta.fromJson(await this.api.project.getMeta(projectId));
        tagId = meta.getTagMeta(tag.name)?.id;
      }
      if (tagId === undefined) {
        throw new Error(`Tag "${tag.name}" is not defined in project ${projectId}`);
      }
      const item: JsonObject = { tagId, entityId };
      if (tag.value !== null) {
        item.value = tag.value;
      }
      if (tag.frameRange !== undefined) {
        item.frameRange = [tag.frameRange[0], tag.frameRange[1]];
      }
      payload.push(item);
    }
    if (payload.length === 0) {
      return [];
    }
    const created = await this.api.post<{ id: number }[]>('videos.tags.bulk.add', {
      projectId,
      tags: payload
    });
    return created.map((tag) => tag.id);
  }
}

export class VideoApi extends ItemApi<VideoInfo> {
  protected readonly infoMethod = 'videos.info';
  protected readonly hashesMethod = 'videos.internal.hashes.list';
  protected readonly uploadMethod = 'videos.bulk.upload';
  protected readonly bulkAddMethod = 'videos.bulk.add';
  protected readonly downloadMethod = 'videos.download-by-hash';
  protected readonly itemsField = 'videos';

  readonly tag: VideoTagApi;

  constructor(api: Api) {
    super(api);
    this.tag = new VideoTagApi(api);
  }
}
