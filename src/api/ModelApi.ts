import { ModuleApi } from './ModuleApi';
import { ModelInfo } from './types';

export class ModelApi extends ModuleApi<ModelInfo> {
  protected readonly infoMethod = 'models.info';

  /**
   * Ids of the tasks currently serving a model.
   *
   * @param modelId id of the model
   *
   * @returns {Promise<number[]>}
   */
  public async getDeployTasks(modelId: number): Promise<number[]> {
    const tasks = await this.api.post<{ id: number }[]>('models.info.deployed', { id: modelId });
    return tasks.map((task) => task.id);
  }
}
