import type { Api } from './Api';
import { ApiError } from './errors';
import { Filter } from './types';

/**
 * Shared shape of the platform's entity modules: `<module>.info` answers
 * with the entity, or 404 when it does not exist.
 */
export abstract class ModuleApi<Info> {
  protected readonly api: Api;
  protected abstract readonly infoMethod: string;

  constructor(api: Api) {
    this.api = api;
  }

  /**
   * Fetches an entity by id.
   *
   * @param id id of the entity
   * @param raiseError throw when the entity does not exist instead of returning `null`
   *
   * @returns {Promise<Info | null>}
   */
  public async getInfoById(id: number, raiseError = false): Promise<Info | null> {
    try {
      return await this.api.post<Info>(this.infoMethod, { id });
    } catch (err) {
      if (!raiseError && err instanceof ApiError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }

  /**
   * Same as `getInfoById` but never returns `null`.
   */
  public async getInfoByIdStrict(id: number): Promise<Info> {
    const info = await this.getInfoById(id, true);
    if (info === null) {
      throw new Error(`${this.infoMethod}: entity with id=${id} not found`);
    }
    return info;
  }
}

/**
 * Module whose entities live inside a parent (projects in a workspace,
 * datasets in a project) and are unique by name within it.
 */
export abstract class ChildModuleApi<Info extends { name: string }> extends ModuleApi<Info> {
  protected abstract readonly listMethod: string;
  protected abstract readonly parentField: string;

  /**
   * Lists the entities of a parent.
   *
   * @param parentId id of the parent entity
   * @param filters optional list of field filters
   *
   * @returns {Promise<Info[]>}
   */
  public async getList(parentId: number, filters: Filter[] = []): Promise<Info[]> {
    return this.api.getListAllPages<Info>(this.listMethod, {
      [this.parentField]: parentId,
      filter: filters
    });
  }

  /**
   * Finds an entity by its exact name.
   *
   * @returns {Promise<Info | null>}
   */
  public async getInfoByName(parentId: number, name: string): Promise<Info | null> {
    const items = await this.getList(parentId, [{ field: 'name', operator: '=', value: name }]);
    return items.find((item) => item.name === name) ?? null;
  }

  /**
   * Returns `name` if it is unused in the parent, otherwise the first free
   * of `name_001`, `name_002`, ...
   *
   * @example
   * await api.dataset.getFreeName(projectId, 'ds0'); // 'ds0_001' when 'ds0' is taken
   */
  public async getFreeName(parentId: number, name: string): Promise<string> {
    const taken = new Set((await this.getList(parentId)).map((item) => item.name));
    let candidate = name;
    for (let index = 1; taken.has(candidate); ++index) {
      candidate = `${name}_${index.toString().padStart(3, '0')}`;
    }
    return candidate;
  }
}
