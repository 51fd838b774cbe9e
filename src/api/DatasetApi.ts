import { ChildModuleApi } from './ModuleApi';
import { DatasetInfo } from './types';

export class DatasetApi extends ChildModuleApi<DatasetInfo> {
  protected readonly infoMethod = 'datasets.info';
  protected readonly listMethod = 'datasets.list';
  protected readonly parentField = 'projectId';

  /**
   * Creates a dataset in a project.
   *
   * @param projectId id of the project
   * @param name name of the dataset
   * @param description optional description
   * @param changeNameIfConflict pick a free `<name>_NNN` when the name is taken
   *
   * @returns {Promise<DatasetInfo>}
   */
  public async create(
    projectId: number,
    name: string,
    description = '',
    changeNameIfConflict = false
  ): Promise<DatasetInfo> {
    const datasetName = changeNameIfConflict ? await this.getFreeName(projectId, name) : name;
    return this.api.post<DatasetInfo>('datasets.add', {
      projectId,
      name: datasetName,
      description
    });
  }

  /**
   * Returns the existing dataset with this name or creates it.
   */
  public async getOrCreate(projectId: number, name: string, description = ''): Promise<DatasetInfo> {
    const existing = await this.getInfoByName(projectId, name);
    return existing ?? this.create(projectId, name, description);
  }
}
