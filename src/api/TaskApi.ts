import { createReadStream, createWriteStream, promises as fpm } from 'fs';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import FormData from 'form-data';
import { ensureBasePath, getFileHash, getFileName, getFileNameWithExt } from '../io/fs';
import { isJsonObject, JsonObject, JsonValue } from '../io/json';
import { ProgressCallback } from '../progress';
import { batched, sleep, takeWithDefault } from '../utils';
import { ApiError, TaskFinishedWithError, WaitingTimeExceeded } from './errors';
import { ModuleApi } from './ModuleApi';
import {
  Filter,
  ImportFile,
  isTaskStatus,
  LogLevel,
  PluginTaskType,
  RestartPolicy,
  StartedTask,
  TASK_STATUSES,
  TaskContext,
  TaskInfo,
  TaskStatus
} from './types';

export const MAX_WAIT_ATTEMPTS = 999;
export const WAIT_ATTEMPT_TIMEOUT_SEC = 1;
const APP_READY_ATTEMPT_DELAY_SEC = 10;

/** statuses after which waiting for anything else is pointless */
const WAIT_STOP_STATUSES: readonly TaskStatus[] = ['finished', 'deployed', 'stopped'];

export type TaskField = {
  field: string;
  payload: JsonValue;
  append?: boolean;
  recursive?: boolean;
};

export type SendRequestOptions = {
  context?: JsonObject;
  /** ask the platform not to wait for the application's answer */
  skipResponse?: boolean;
  /** seconds the platform waits for the application */
  timeout?: number;
  outsideRequest?: boolean;
  retries?: number;
  raiseError?: boolean;
};

export type StartOptions = {
  agentId?: number;
  appId?: number;
  moduleId?: number;
  workspaceId?: number;
  description?: string;
  params?: JsonObject;
  logLevel?: LogLevel;
  usersIds?: number[];
  appVersion?: string;
  isBranch?: boolean;
  taskName?: string;
  restartPolicy?: RestartPolicy;
  proxyKeepUrl?: boolean;
  /** route name -> task id the application forwards those requests to */
  redirectRequests?: Record<string, number>;
  limitByWorkspace?: boolean;
};

export type DeployModelAppOptions = Omit<StartOptions, 'appId' | 'moduleId' | 'workspaceId'> & {
  deployParams?: JsonObject;
  /** seconds to wait for the serving application to answer requests */
  timeout?: number;
};

export type OutputIcon = {
  className: string;
  color: string;
  backgroundColor: string;
};

type RawStartedTask = {
  id?: number;
  taskId?: number;
  [key: string]: JsonValue | undefined;
};

type CustomOutput = {
  fileUrl?: string;
  description?: string;
  icon?: string;
  color?: string;
  backgroundColor?: string;
  download?: boolean;
};

/**
 * Tasks: everything the platform runs on an agent (imports, training,
 * served models, applications).
 *
 * Besides lifecycle calls, a task exposes two channels used to drive
 * applications remotely: a key-value store of fields (`setFields` /
 * `getFields`) and direct requests routed to the application's web server
 * (`sendRequest`).
 *
 * @example
 * const api = Api.fromEnv();
 * const task = await api.task.start({ agentId: 7, moduleId: 42, workspaceId: 12 });
 * await api.task.wait(task.id, 'started');
 */
export class TaskApi extends ModuleApi<TaskInfo> {
  protected readonly infoMethod = 'tasks.info';

  /**
   * Lists the tasks of a workspace.
   *
   * @param workspaceId id of the workspace
   * @param filters optional field filters, e.g. `[{ field: 'id', operator: '=', value: 121230 }]`
   *
   * @returns {Promise<TaskInfo[]>}
   */
  public async getList(workspaceId: number, filters: Filter[] = []): Promise<TaskInfo[]> {
    return this.api.getListAllPages<TaskInfo>('tasks.list', { workspaceId, filter: filters });
  }

  /**
   * Fetches the current status of a task.
   *
   * @param taskId id of the task
   *
   * @returns {Promise<TaskStatus>}
   */
  public async getStatus(taskId: number): Promise<TaskStatus> {
    const info = await this.getInfoByIdStrict(taskId);
    if (!isTaskStatus(info.status)) {
      throw new Error(`Task ${taskId} has unknown status ${JSON.stringify(info.status)}`);
    }
    return info.status;
  }

  /**
   * Throws `TaskFinishedWithError` when the status is `error`.
   */
  public raiseForStatus(status: TaskStatus): void {
    if (status === 'error') {
      throw new TaskFinishedWithError('Task finished with status error');
    }
  }

  /**
   * Polls a task until it reaches `targetStatus`, or any of `finished`,
   * `deployed`, `stopped`.
   *
   * @param taskId id of the task
   * @param targetStatus status to wait for
   * @param waitAttempts number of status checks
   * @param waitAttemptTimeoutSec pause between checks
   *
   * @returns {Promise<void>}
   */
  public async wait(
    taskId: number,
    targetStatus: TaskStatus,
    waitAttempts?: number,
    waitAttemptTimeoutSec?: number
  ): Promise<void> {
    const attempts = waitAttempts || MAX_WAIT_ATTEMPTS;
    const timeoutSec = waitAttemptTimeoutSec || WAIT_ATTEMPT_TIMEOUT_SEC;
    for (let attempt = 0; attempt < attempts; ++attempt) {
      const status = await this.getStatus(taskId);
      this.raiseForStatus(status);
      if (status === targetStatus || WAIT_STOP_STATUSES.includes(status)) {
        return;
      }
      await sleep(timeoutSec);
    }
    throw new WaitingTimeExceeded(
      `Waiting time exceeded: total waiting time ${attempts * timeoutSec} seconds, ` +
        `i.e. ${attempts} attempts for ${timeoutSec} seconds each`
    );
  }

  /**
   * Uploads a data-transformation archive for a task.
   *
   * @param taskId id of the task
   * @param archivePath local path of the tar archive
   * @param progressCb called with the megabytes sent so far
   */
  public async uploadDtlArchive(
    taskId: number,
    archivePath: string,
    progressCb?: ProgressCallback
  ): Promise<void> {
    const form = new FormData();
    form.append('id', String(taskId));
    form.append('name', getFileName(archivePath));
    form.append('archive', createReadStream(archivePath), {
      filename: getFileNameWithExt(archivePath),
      contentType: 'application/x-tar'
    });
    await this.api.post<unknown>('tasks.upload.dtl_archive', form, {
      onUploadProgress:
        progressCb === undefined ? undefined : (loaded) => progressCb(loaded / 1024 / 1024)
    });
  }

  /**
   * Runs a data-transformation graph.
   *
   * @returns {Promise<number>} id of the created task
   */
  public async runDtl(workspaceId: number, dtlGraph: JsonObject, agentId?: number): Promise<number> {
    const response = await this.api.post<{ taskId: number }>('tasks.run.dtl', {
      workspaceId,
      config: dtlGraph,
      advanced: { agentId: agentId ?? null }
    });
    return response.taskId;
  }

  private async runPluginTask(
    taskType: PluginTaskType,
    agentId: number,
    modelId: number,
    projectId: number,
    resultName: string,
    config: JsonObject
  ): Promise<number> {
    const model = await this.api.model.getInfoByIdStrict(modelId);
    const response = await this.api.post<{ taskId: number }>('tasks.run.plugin', {
      taskType,
      agentId,
      pluginId: model.pluginId,
      version: null,
      config,
      projects: [projectId],
      models: [modelId],
      name: resultName
    });
    return response.taskId;
  }

  /**
   * Starts training a model plugin on a project.
   *
   * @param agentId id of the agent to run on
   * @param inputProjectId id of the training project
   * @param inputModelId id of the model to start from
   * @param resultNnName name of the resulting model
   * @param trainConfig plugin-specific training configuration
   *
   * @returns {Promise<number>} id of the created task
   */
  public async runTrain(
    agentId: number,
    inputProjectId: number,
    inputModelId: number,
    resultNnName: string,
    trainConfig: JsonObject = {}
  ): Promise<number> {
    return this.runPluginTask(
      'train',
      agentId,
      inputModelId,
      inputProjectId,
      resultNnName,
      trainConfig
    );
  }

  /**
   * Starts inference of a model plugin over a project.
   *
   * @returns {Promise<number>} id of the created task
   */
  public async runInference(
    agentId: number,
    inputProjectId: number,
    inputModelId: number,
    resultProjectName: string,
    inferenceConfig: JsonObject = {}
  ): Promise<number> {
    return this.runPluginTask(
      'inference',
      agentId,
      inputModelId,
      inputProjectId,
      resultProjectName,
      inferenceConfig
    );
  }

  /**
   * Training metrics reported by a train task, or `null` when it has none.
   *
   * @returns {Promise<JsonObject | null>}
   */
  public async getTrainingMetrics(taskId: number): Promise<JsonObject | null> {
    try {
      return await this.api.post<JsonObject>('tasks.train-metrics', { taskId });
    } catch (err) {
      if (err instanceof ApiError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }

  private async startDeploy(
    agentId: number,
    modelId: number,
    restartPolicy: RestartPolicy = 'never',
    settings: JsonObject = { gpu_device: 0 }
  ): Promise<number> {
    const response = await this.api.post<{ taskId: number }>('tasks.run.deploy', {
      agentId,
      modelId,
      restartPolicy,
      settings,
      pluginId: null,
      version: null
    });
    return response.taskId;
  }

  /**
   * Serves a model and waits until it is deployed. An already running
   * deploy task of the model is reused.
   *
   * @param agentId id of the agent to run on
   * @param modelId id of the model
   *
   * @returns {Promise<number>} id of the deploy task
   */
  public async deployModel(agentId: number, modelId: number): Promise<number> {
    const taskId = await this.deployModelAsync(agentId, modelId);
    await this.wait(taskId, 'deployed');
    return taskId;
  }

  /**
   * Same as `deployModel` without waiting.
   *
   * @returns {Promise<number>} id of the deploy task
   */
  public async deployModelAsync(agentId: number, modelId: number): Promise<number> {
    const taskIds = await this.api.model.getDeployTasks(modelId);
    if (taskIds.length > 0) {
      return taskIds[0];
    }
    return this.startDeploy(agentId, modelId);
  }

  /**
   * Team and workspace a task runs in.
   *
   * @returns {Promise<TaskContext>}
   */
  public async getContext(taskId: number): Promise<TaskContext> {
    return this.api.post<TaskContext>('GetTaskContext', { id: taskId });
  }

  /**
   * Starts an application, from either an installed app (`appId`) or an
   * ecosystem module (`moduleId`).
   *
   * @param options what to run, where, and how
   *
   * @returns {Promise<StartedTask>}
   *
   * @example
   * const task = await api.task.start({
   *   agentId: 7,
   *   moduleId: 42,
   *   workspaceId: 12,
   *   params: { state: { modelId: 3 } }
   * });
   */
  public async start(options: StartOptions): Promise<StartedTask> {
    const { appId, moduleId } = options;
    if (appId !== undefined && moduleId !== undefined) {
      throw new Error('Only one of the arguments (appId or moduleId) have to be defined');
    }
    if (appId === undefined && moduleId === undefined) {
      throw new Error('One of the arguments (appId or moduleId) have to be defined');
    }
    const data: Record<string, unknown> = {
      agentId: options.agentId ?? null,
      workspaceId: options.workspaceId ?? null,
      description: options.description ?? 'application description',
      params: takeWithDefault<JsonObject>(options.params, { state: {} }),
      logLevel: options.logLevel ?? 'info',
      userIds: options.usersIds ?? [],
      appVersion: options.appVersion ?? '',
      isBranch: options.isBranch ?? false,
      taskName: options.taskName ?? 'pythonSpawned',
      restartPolicy: options.restartPolicy ?? 'never',
      proxyKeepUrl: options.proxyKeepUrl ?? false,
      advancedSettings: { limitByWorkspace: options.limitByWorkspace ?? false }
    };
    if (options.redirectRequests !== undefined && Object.keys(options.redirectRequests).length > 0) {
      data.redirectRequests = options.redirectRequests;
    }
    if (appId !== undefined) {
      data.appId = appId;
    }
    if (moduleId !== undefined) {
      data.moduleId = moduleId;
    }
    const response = await this.api.post<RawStartedTask[]>('tasks.run.app', data);
    const task = response[0];
    if (task === undefined) {
      throw new Error('tasks.run.app returned no task');
    }
    const id = task.id ?? task.taskId;
    if (id === undefined) {
      throw new Error('tasks.run.app returned a task without id');
    }
    return { ...task, id };
  }

  /**
   * Asks a task to stop.
   *
   * @returns {Promise<TaskStatus>} status right after the request
   */
  public async stop(taskId: number): Promise<TaskStatus> {
    const response = await this.api.post<{ status: string }>('tasks.stop', { id: taskId });
    if (!isTaskStatus(response.status)) {
      throw new Error(`tasks.stop returned unknown status ${JSON.stringify(response.status)}`);
    }
    return response.status;
  }

  /**
   * Files attached to an import task.
   *
   * @returns {Promise<ImportFile[]>}
   */
  public async getImportFilesList(taskId: number): Promise<ImportFile[]> {
    return this.api.post<ImportFile[]>('tasks.import.files_list', { id: taskId });
  }

  /**
   * Streams one file of an import task to disk.
   *
   * @param taskId id of the import task
   * @param filePath path of the file inside the task
   * @param savePath local destination
   */
  public async downloadImportFile(taskId: number, filePath: string, savePath: string): Promise<void> {
    const stream = await this.api.post<Readable>(
      'tasks.import.download_file',
      { id: taskId, filename: filePath },
      { responseType: 'stream' }
    );
    await ensureBasePath(savePath);
    await pipeline(stream, createWriteStream(savePath));
  }

  /**
   * Creates a task that is not bound to an agent, so the calling process can
   * report its own progress and outputs through it.
   *
   * @returns {Promise<number>} id of the created task
   */
  public async createTaskDetached(workspaceId: number, taskType?: string): Promise<number> {
    const data: Record<string, unknown> = {
      workspaceId,
      script: 'xxx',
      advanced: { ignoreAgent: true }
    };
    if (taskType !== undefined) {
      data.type = taskType;
    }
    const response = await this.api.post<{ taskId: number }>('tasks.run.python', data);
    return response.taskId;
  }

  public async submitLogs(logs: JsonObject[]): Promise<void> {
    await this.api.post<unknown>('tasks.logs.add', { logs });
  }

  /**
   * Attaches local files to a task. Files whose content the server already
   * stores are attached by hash; only the others are uploaded.
   *
   * @param taskId id of the task
   * @param absPaths local paths of the files
   * @param names names the files get inside the task, one per path
   * @param progressCb called with the number of files attached at each step
   */
  public async uploadFiles(
    taskId: number,
    absPaths: string[],
    names: string[],
    progressCb?: ProgressCallback
  ): Promise<void> {
    if (absPaths.length !== names.length) {
      throw new Error('Inconsistency: absPaths.length != names.length');
    }
    if (absPaths.length === 0) {
      return;
    }

    const hashes = await Promise.all(absPaths.map((filePath) => getFileHash(filePath)));
    const namesByHash = new Map<string, string[]>();
    hashes.forEach((hash, index) => {
      namesByHash.set(hash, [...(namesByHash.get(hash) ?? []), names[index]]);
    });

    const remoteHashes = new Set(await this.api.image.checkExistingHashes([...namesByHash.keys()]));
    const byHash: { name: string; hash: string }[] = [];
    for (const hash of remoteHashes) {
      for (const name of namesByHash.get(hash) ?? []) {
        byHash.push({ name, hash });
      }
    }
    for (const batch of batched(byHash)) {
      await this.api.post<unknown>('tasks.files.bulk.add-by-hash', { taskId, files: batch });
    }
    progressCb?.(byHash.length);

    const items = absPaths.map((filePath, index) => ({
      filePath,
      name: names[index],
      hash: hashes[index]
    }));
    for (const batch of batched(items)) {
      const form = new FormData();
      let count = 0;
      for (let index = 0, length = batch.length; index < length; ++index) {
        const { filePath, name, hash } = batch[index];
        if (remoteHashes.has(hash)) {
          continue;
        }
        form.append(`${index}`, JSON.stringify({ fullpath: name, hash }));
        form.append(`${index}-file`, await fpm.readFile(filePath), { filepath: name });
        count += 1;
      }
      if (count > 0) {
        await this.api.post<unknown>('tasks.files.bulk.upload', form);
        progressCb?.(count);
      }
    }
  }

  /**
   * Writes fields of a task's key-value store. Running applications read
   * these as their input.
   *
   * @param taskId id of the task
   * @param fields `field` is a dot-separated path, `payload` its new value
   *
   * @returns {Promise<JsonObject>}
   */
  public async setFields(taskId: number, fields: TaskField[]): Promise<JsonObject> {
    fields.forEach((obj, index) => {
      for (const key of ['field', 'payload']) {
        if (!(key in obj)) {
          throw new Error(`Object #${index} does not have field "${key}"`);
        }
      }
    });
    return this.api.post<JsonObject>('tasks.data.set', { taskId, fields });
  }

  /**
   * `setFields` from a `{ field: payload }` object.
   */
  public async setFieldsFromDict(taskId: number, fields: JsonObject): Promise<JsonObject> {
    return this.setFields(
      taskId,
      Object.entries(fields).map(([field, payload]) => ({ field, payload }))
    );
  }

  /**
   * Writes one field.
   *
   * @param taskId id of the task
   * @param field dot-separated path of the field, e.g. `data.progress`
   * @param payload new value
   * @param append append to a list (or merge into an object) instead of replacing
   * @param recursive merge nested objects instead of replacing them
   *
   * @returns {Promise<JsonObject>}
   */
  public async setField(
    taskId: number,
    field: string,
    payload: JsonValue,
    append = false,
    recursive = false
  ): Promise<JsonObject> {
    return this.setFields(taskId, [{ field, payload, append, recursive }]);
  }

  /**
   * Reads fields of a task's key-value store.
   *
   * @returns {Promise<JsonObject>} field path -> value
   */
  public async getFields(taskId: number, fields: string[]): Promise<JsonObject> {
    const response = await this.api.post<{ result: JsonObject }>('tasks.data.get', {
      taskId,
      fields
    });
    return response.result;
  }

  public async getField(taskId: number, field: string): Promise<JsonValue | undefined> {
    const result = await this.getFields(taskId, [field]);
    return result[field];
  }

  private async validateCheckpointsSupport(taskId: number): Promise<void> {
    const info = await this.getInfoByIdStrict(taskId);
    if (info.type !== 'train') {
      throw new Error(
        `Task (id=${taskId}) has type "${info.type}". Checkpoints are available only for tasks of type "train"`
      );
    }
  }

  /**
   * Checkpoints saved by a train task.
   *
   * @returns {Promise<JsonObject[]>}
   */
  public async listCheckpoints(taskId: number): Promise<JsonObject[]> {
    await this.validateCheckpointsSupport(taskId);
    return this.api.post<JsonObject[]>('tasks.checkpoints.list', { id: taskId });
  }

  /**
   * Removes the checkpoints of a train task that were not kept as models.
   */
  public async deleteUnusedCheckpoints(taskId: number): Promise<JsonObject> {
    await this.validateCheckpointsSupport(taskId);
    return this.api.post<JsonObject>('tasks.checkpoints.clear', { id: taskId });
  }

  private async setOutput(taskId: number, output: JsonObject): Promise<JsonObject> {
    return this.api.post<JsonObject>('tasks.output.set', { taskId, output });
  }

  /**
   * Shows a project as the result of a task.
   *
   * @param taskId id of the task
   * @param projectId id of the project
   * @param projectName name to show; looked up with the preview when omitted
   * @param projectPreview preview image URL
   *
   * @returns {Promise<JsonObject>}
   */
  public async setOutputProject(
    taskId: number,
    projectId: number,
    projectName?: string,
    projectPreview?: string
  ): Promise<JsonObject> {
    let title = projectName;
    let preview = projectPreview;
    if (title === undefined) {
      const project = await this.api.project.getInfoByIdStrict(projectId);
      title = project.name;
      preview = project.imagePreviewUrl ?? undefined;
    }
    const project: JsonObject = { id: projectId, title };
    if (preview !== undefined) {
      project.preview = preview;
    }
    return this.setOutput(taskId, { project });
  }

  private async setCustomOutput(
    taskId: number,
    fileId: number,
    fileName: string,
    options: CustomOutput = {}
  ): Promise<JsonObject> {
    const icon: OutputIcon = {
      className: options.icon ?? 'zmdi zmdi-file-text',
      color: options.color ?? '#33c94c',
      backgroundColor: options.backgroundColor ?? '#d9f7e4'
    };
    return this.setOutput(taskId, {
      general: {
        icon,
        title: fileName,
        titleUrl: options.fileUrl ?? this.api.file.getUrl(fileId),
        download: options.download ?? false,
        description: options.description ?? 'File'
      }
    });
  }

  /**
   * Shows a report file as the result of a task.
   */
  public async setOutputReport(
    taskId: number,
    fileId: number,
    fileName: string,
    description = 'Report'
  ): Promise<JsonObject> {
    return this.setCustomOutput(taskId, fileId, fileName, {
      description,
      icon: 'zmdi zmdi-receipt'
    });
  }

  /**
   * Shows a downloadable archive as the result of a task.
   *
   * @param fileUrl link to download; the file's storage path when omitted
   */
  public async setOutputArchive(
    taskId: number,
    fileId: number,
    fileName: string,
    fileUrl?: string
  ): Promise<JsonObject> {
    const url = fileUrl ?? (await this.api.file.getInfoByIdStrict(fileId)).storagePath;
    return this.setCustomOutput(taskId, fileId, fileName, {
      fileUrl: url,
      description: 'Download archive',
      icon: 'zmdi zmdi-archive',
      download: true
    });
  }

  /**
   * Shows a downloadable file as the result of a task.
   */
  public async setOutputFileDownload(
    taskId: number,
    fileId: number,
    fileName: string,
    fileUrl?: string,
    download = true
  ): Promise<JsonObject> {
    const url = fileUrl ?? (await this.api.file.getInfoByIdStrict(fileId)).storagePath;
    return this.setCustomOutput(taskId, fileId, fileName, {
      fileUrl: url,
      description: 'Download file',
      icon: 'zmdi zmdi-file',
      download
    });
  }

  public async setOutputDirectory(
    taskId: number,
    fileId: number,
    directoryPath: string
  ): Promise<JsonObject> {
    return this.setCustomOutput(taskId, fileId, directoryPath, {
      description: 'Directory',
      icon: 'zmdi zmdi-folder'
    });
  }

  /**
   * Shows an error as the result of a task.
   *
   * @param taskId id of the task
   * @param title short error title
   * @param description details shown under the title
   * @param showLogs offer a link to the task logs
   *
   * @returns {Promise<JsonObject>}
   */
  public async setOutputError(
    taskId: number,
    title: string,
    description?: string,
    showLogs = true
  ): Promise<JsonObject> {
    const general: JsonObject = {
      icon: {
        className: 'zmdi zmdi-alert-octagon',
        color: '#ff83a6',
        backgroundColor: '#ffeae9'
      },
      title,
      showLogs,
      isError: true
    };
    if (description !== undefined) {
      general.description = description;
    }
    return this.setOutput(taskId, { general });
  }

  /**
   * Shows a text message as the result of a task.
   *
   * @param zmdiIcon icon name from the Material Design Iconic Font, without the `zmdi` prefix class
   */
  public async setOutputText(
    taskId: number,
    title: string,
    description?: string,
    showLogs = false,
    zmdiIcon = 'zmdi-comment-alt-text',
    iconColor = '#33c94c',
    backgroundColor = '#d9f7e4'
  ): Promise<JsonObject> {
    const general: JsonObject = {
      icon: {
        className: `zmdi ${zmdiIcon}`,
        color: iconColor,
        backgroundColor
      },
      title,
      showLogs,
      isError: false
    };
    if (description !== undefined) {
      general.description = description;
    }
    return this.setOutput(taskId, { general });
  }

  /**
   * Attaches experiment information (model, metrics, artifacts) to a train task.
   */
  public async setOutputExperiment(taskId: number, experimentInfo: JsonObject): Promise<JsonObject> {
    return this.setOutput(taskId, { experiment: { data: { ...experimentInfo } } });
  }

  /**
   * Calls a route of a running application through the platform.
   *
   * @param taskId id of the application task
   * @param method route name
   * @param data request state
   * @param options context, timeouts and retry policy
   *
   * @returns {Promise<T>} the application's answer
   *
   * @example
   * const info = await api.task.sendRequest(taskId, 'get_session_info', {});
   */
  public async sendRequest<T = JsonObject>(
    taskId: number,
    method: string,
    data: JsonObject,
    options: SendRequestOptions = {}
  ): Promise<T> {
    if (!isJsonObject(data)) {
      throw new TypeError('data argument has to be a dict');
    }
    const context: JsonObject = {
      ...options.context,
      outside_request: options.outsideRequest ?? true
    };
    return this.api.post<T>(
      'tasks.request.direct',
      {
        taskId,
        command: method,
        context,
        state: data,
        skipResponse: options.skipResponse ?? false,
        timeout: options.timeout ?? 60
      },
      { retries: options.retries ?? 10, raiseError: options.raiseError ?? false }
    );
  }

  /**
   * Updates a task's meta.
   *
   * @param taskId id of the task
   * @param data fields of the meta to set
   * @param agentStorageFolder host directory of the agent's storage
   * @param relativeAppDir application directory inside `agentStorageFolder`
   */
  public async updateMeta(
    taskId: number,
    data: JsonObject,
    agentStorageFolder?: string,
    relativeAppDir?: string
  ): Promise<void> {
    if ((agentStorageFolder === undefined) !== (relativeAppDir === undefined)) {
      throw new Error(
        'Both arguments (agentStorageFolder and relativeAppDir) has to be defined or undefined'
      );
    }
    const body: JsonObject = { ...data, id: taskId };
    if (agentStorageFolder !== undefined && relativeAppDir !== undefined) {
      body.agentStorageFolder = { hostDir: agentStorageFolder, folder: relativeAppDir };
    }
    await this.api.post<unknown>('tasks.meta.update', body);
  }

  /**
   * Pushes widget data (as a JSON patch) and state to an application's page.
   * Empty parts are left out of the payload.
   *
   * @returns {Promise<JsonObject>}
   */
  public async updateAppContent(
    taskId: number,
    dataPatch?: JsonObject[],
    state?: JsonObject
  ): Promise<JsonObject> {
    const payload: JsonObject = {};
    if (dataPatch !== undefined && dataPatch.length > 0) {
      payload.data = dataPatch;
    }
    if (state !== undefined && Object.keys(state).length > 0) {
      payload.state = state;
    }
    return this.api.post<JsonObject>('tasks.app-v2.data.set', { taskId, payload });
  }

  /**
   * Sets the status of a task (for detached tasks driven by the caller).
   */
  public async updateStatus(taskId: number, status: string): Promise<void> {
    if (!isTaskStatus(status)) {
      throw new Error(
        `Invalid status value: ${status}. Allowed values: ${TASK_STATUSES.join(', ')}`
      );
    }
    await this.api.post<unknown>('tasks.status.update', { id: taskId, status });
  }

  /**
   * Asks a serving application to load a model.
   */
  public async deployModelFromApi(taskId: number, deployParams: JsonObject): Promise<void> {
    await this.sendRequest(
      taskId,
      'deploy_from_api',
      { deploy_params: deployParams },
      { raiseError: true }
    );
  }

  /**
   * Starts a serving application, waits until it answers requests and asks
   * it to load a model.
   *
   * @param moduleId ecosystem module of the serving application
   * @param workspaceId id of the workspace to run in
   * @param options start options, `deployParams` and a `timeout` in seconds (100 by default)
   *
   * @returns {Promise<StartedTask>}
   */
  public async deployModelApp(
    moduleId: number,
    workspaceId: number,
    options: DeployModelAppOptions = {}
  ): Promise<StartedTask> {
    const { deployParams = {}, timeout = 100, ...startOptions } = options;
    const task = await this.start({ ...startOptions, moduleId, workspaceId });
    const attempts = Math.floor((timeout + APP_READY_ATTEMPT_DELAY_SEC) / APP_READY_ATTEMPT_DELAY_SEC);
    const ready = await this.api.app.waitUntilReadyForApiCalls(
      task.id,
      attempts,
      APP_READY_ATTEMPT_DELAY_SEC
    );
    if (!ready) {
      throw new Error(`Task ${task.id} is not ready for API calls after ${timeout} seconds.`);
    }
    console.info('Deploying model from API');
    await this.deployModelFromApi(task.id, deployParams);
    return task;
  }
}
