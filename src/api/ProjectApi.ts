import { JsonObject } from '../io/json';
import { ChildModuleApi } from './ModuleApi';
import { ProjectInfo, ProjectType } from './types';

export type CreateProjectOptions = {
  type?: ProjectType;
  description?: string;
  /** pick a free `<name>_NNN` instead of failing when the name is taken */
  changeNameIfConflict?: boolean;
};

export class ProjectApi extends ChildModuleApi<ProjectInfo> {
  protected readonly infoMethod = 'projects.info';
  protected readonly listMethod = 'projects.list';
  protected readonly parentField = 'workspaceId';

  /**
   * Finds a project by name and, optionally, checks its type.
   *
   * @param workspaceId id of the workspace
   * @param name name of the project
   * @param expectedType project type the caller requires
   * @param raiseError throw when the project does not exist
   *
   * @returns {Promise<ProjectInfo | null>}
   */
  public async getInfoByNameChecked(
    workspaceId: number,
    name: string,
    expectedType?: ProjectType,
    raiseError = false
  ): Promise<ProjectInfo | null> {
    const info = await this.getInfoByName(workspaceId, name);
    if (info === null) {
      if (raiseError) {
        throw new Error(`Project "${name}" not found in workspace ${workspaceId}`);
      }
      return null;
    }
    if (expectedType !== undefined && info.type !== expectedType) {
      throw new Error(
        `Project "${name}" has type "${info.type}", but type "${expectedType}" is expected`
      );
    }
    return info;
  }

  /**
   * Creates a project.
   *
   * @param workspaceId id of the workspace
   * @param name name of the project
   * @param options type, description and conflict handling
   *
   * @returns {Promise<ProjectInfo>}
   */
  public async create(
    workspaceId: number,
    name: string,
    options: CreateProjectOptions = {}
  ): Promise<ProjectInfo> {
    const title = options.changeNameIfConflict ? await this.getFreeName(workspaceId, name) : name;
    return this.api.post<ProjectInfo>('projects.add', {
      workspaceId,
      title,
      type: options.type ?? 'images',
      description: options.description ?? ''
    });
  }

  /**
   * Returns the existing project with this name or creates it.
   */
  public async getOrCreate(
    workspaceId: number,
    name: string,
    options: Omit<CreateProjectOptions, 'changeNameIfConflict'> = {}
  ): Promise<ProjectInfo> {
    const existing = await this.getInfoByName(workspaceId, name);
    return existing ?? this.create(workspaceId, name, options);
  }

  /**
   * Fetches the project meta: object classes and tag definitions.
   *
   * @returns {Promise<JsonObject>}
   */
  public async getMeta(id: number): Promise<JsonObject> {
    return this.api.post<JsonObject>('projects.meta', { id });
  }
}
