import type { Api } from './Api';
import { JsonObject } from '../io/json';
import { sleep } from '../utils';
import { ApiError, TaskFinishedWithError } from './errors';
import type { SendRequestOptions } from './TaskApi';

/**
 * Application instances are tasks that run a web server inside an agent.
 * Their routes are reached through the task's direct request channel.
 */
export class AppApi {
  private readonly api: Api;

  constructor(api: Api) {
    this.api = api;
  }

  /**
   * Calls a route of a running application.
   */
  public async sendRequest<T = JsonObject>(
    taskId: number,
    method: string,
    data: JsonObject,
    options: SendRequestOptions = {}
  ): Promise<T> {
    return this.api.task.sendRequest<T>(taskId, method, data, options);
  }

  /**
   * Whether an application has started and answers requests.
   *
   * @param taskId id of the application task
   *
   * @returns {Promise<boolean>}
   */
  public async isReadyForApiCalls(taskId: number): Promise<boolean> {
    const info = await this.api.task.getInfoById(taskId);
    if (info === null) {
      return false;
    }
    this.api.task.raiseForStatus(info.status);
    if (info.status === 'stopped' || info.status === 'finished') {
      throw new TaskFinishedWithError(`Task ${taskId} is already ${info.status}`);
    }
    if (info.status !== 'started') {
      return false;
    }
    try {
      const response = await this.sendRequest<{ running?: boolean }>(
        taskId,
        'is_running',
        {},
        { retries: 1, raiseError: true, timeout: 5 }
      );
      return response.running === true;
    } catch (err) {
      if (err instanceof ApiError) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Polls `isReadyForApiCalls`.
   *
   * @param taskId id of the application task
   * @param attempts number of checks
   * @param attemptDelaySec pause between checks
   *
   * @returns {Promise<boolean>} `false` when the application never became ready
   */
  public async waitUntilReadyForApiCalls(
    taskId: number,
    attempts = 10,
    attemptDelaySec = 10
  ): Promise<boolean> {
    for (let attempt = 0; attempt < attempts; ++attempt) {
      if (await this.isReadyForApiCalls(taskId)) {
        return true;
      }
      if (attempt + 1 < attempts) {
        await sleep(attemptDelaySec);
      }
    }
    return false;
  }
}
