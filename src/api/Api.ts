import axios, { AxiosInstance, CreateAxiosDefaults, ResponseType } from 'axios';
import FormData from 'form-data';
import { sleep } from '../utils';
import { AnnotationApi } from './AnnotationApi';
import { AppApi } from './AppApi';
import { DatasetApi } from './DatasetApi';
import { toApiError } from './errors';
import { FileApi } from './FileApi';
import { ImageApi } from './ImageApi';
import { LabelingJobApi } from './LabelingJobApi';
import { ModelApi } from './ModelApi';
import { ProjectApi } from './ProjectApi';
import { TaskApi } from './TaskApi';
import { PageResponse } from './types';
import { VideoApi } from './VideoApi';
import { WorkspaceApi } from './WorkspaceApi';

const API_PATH = '/public/api/v3/';
const DEFAULT_RETRY_COUNT = 10;
const DEFAULT_RETRY_SLEEP_SEC = 1;
const MAX_RETRY_SLEEP_SEC = 60;
const PAGE_SIZE = 500;
const RETRY_STATUS_CODES = [408, 429, 500, 502, 503, 504, 509];

export type RequestBody = Record<string, unknown> | FormData;

export type ApiOptions = {
  /** attempts per call before giving up on network errors and retryable statuses */
  retryCount?: number;
  /** first pause between attempts; doubles on every retry, capped at one minute */
  retrySleepSec?: number;
  headers?: Record<string, string>;
  /** merged into the underlying axios instance (timeout, proxy, adapter...) */
  axiosConfig?: CreateAxiosDefaults;
};

export type PostOptions = {
  retries?: number;
  /** fail on the first error instead of retrying */
  raiseError?: boolean;
  responseType?: ResponseType;
  /** bytes sent so far, for multipart uploads */
  onUploadProgress?: (loadedBytes: number) => void;
};

/**
 * Prefixes a bare host with http:// and drops trailing slashes.
 *
 * @example
 * normalizeServerAddress('localhost:8080/'); // 'http://localhost:8080'
 */
export function normalizeServerAddress(address: string): string {
  let result = address.trim().replace(/\/+$/, '');
  if (!/^https?:\/\//i.test(result)) {
    result = `http://${result}`;
  }
  return result;
}

function isRetryable(err: unknown): boolean {
  if (!axios.isAxiosError(err)) {
    return false;
  }
  if (err.code === 'ERR_CANCELED') {
    return false;
  }
  if (err.response === undefined) {
    return true;
  }
  return RETRY_STATUS_CODES.includes(err.response.status);
}

/**
 * Connection to the platform. Every call is a POST of a JSON (or multipart)
 * body to `<server>/public/api/v3/<method>`, authenticated by the API token.
 *
 * @example
 * const api = new Api('https://app.example.com', 'test-token');
 * const info = await api.task.getInfoById(121230);
 */
export class Api {
  readonly serverAddress: string;
  readonly retryCount: number;
  readonly retrySleepSec: number;

  readonly task: TaskApi;
  readonly project: ProjectApi;
  readonly dataset: DatasetApi;
  readonly image: ImageApi;
  readonly video: VideoApi;
  readonly annotation: AnnotationApi;
  readonly model: ModelApi;
  readonly file: FileApi;
  readonly app: AppApi;
  readonly workspace: WorkspaceApi;
  readonly labelingJob: LabelingJobApi;

  private client: AxiosInstance;
  private headers: Record<string, string>;
  private additionalFields: Record<string, unknown> = {};

  /**
   *
   * @param serverAddress - address of the platform instance, with or without scheme
   * @param token - API token of the user the SDK acts for
   * @param options - retry policy, extra headers and axios settings
   */
  constructor(serverAddress: string, token: string, options: ApiOptions = {}) {
    if (token === '') {
      throw new Error('API token is empty');
    }
    this.serverAddress = normalizeServerAddress(serverAddress);
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    this.retrySleepSec = options.retrySleepSec ?? DEFAULT_RETRY_SLEEP_SEC;
    this.headers = { 'x-api-key': token, ...options.headers };
    this.client = axios.create({
      ...options.axiosConfig,
      baseURL: `${this.serverAddress}${API_PATH}`
    });

    this.task = new TaskApi(this);
    this.project = new ProjectApi(this);
    this.dataset = new DatasetApi(this);
    this.image = new ImageApi(this);
    this.video = new VideoApi(this);
    this.annotation = new AnnotationApi(this);
    this.model = new ModelApi(this);
    this.file = new FileApi(this);
    this.app = new AppApi(this);
    this.workspace = new WorkspaceApi(this);
    this.labelingJob = new LabelingJobApi(this);
  }

  /**
   * Builds a connection from `SERVER_ADDRESS` and `API_TOKEN`, plus the
   * optional `API_RETRY_COUNT` and `API_RETRY_SLEEP_SEC`.
   *
   * @param env - environment to read, `process.env` by default
   * @param options - overrides for what the environment does not carry
   *
   * @returns {Api}
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, options: ApiOptions = {}): Api {
    const serverAddress = env.SERVER_ADDRESS;
    const token = env.API_TOKEN;
    if (serverAddress === undefined || serverAddress === '') {
      throw new Error('Environment variable SERVER_ADDRESS is not defined');
    }
    if (token === undefined || token === '') {
      throw new Error('Environment variable API_TOKEN is not defined');
    }
    const retryCount = env.API_RETRY_COUNT !== undefined ? Number(env.API_RETRY_COUNT) : undefined;
    const retrySleepSec =
      env.API_RETRY_SLEEP_SEC !== undefined ? Number(env.API_RETRY_SLEEP_SEC) : undefined;
    for (const [name, value] of [
      ['API_RETRY_COUNT', retryCount],
      ['API_RETRY_SLEEP_SEC', retrySleepSec]
    ] as const) {
      if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
        throw new Error(`Environment variable ${name} must be a non-negative number`);
      }
    }
    return new Api(serverAddress, token, {
      ...options,
      retryCount: retryCount ?? options.retryCount,
      retrySleepSec: retrySleepSec ?? options.retrySleepSec
    });
  }

  /**
   * Adds a field to the body of every subsequent JSON call, e.g. the id of
   * the task the calls are made on behalf of.
   */
  public addAdditionalField(key: string, value: unknown): void {
    this.additionalFields[key] = value;
  }

  public addHeader(key: string, value: string): void {
    this.headers[key] = value;
  }

  /**
   * Calls a platform method.
   *
   * Network failures and overload statuses are retried with exponential
   * sleeps. Multipart bodies are sent once: their streams cannot be replayed.
   *
   * @param method platform method, e.g. `tasks.info`
   * @param data JSON body or multipart form
   * @param options per-call retry and response settings
   *
   * @returns {Promise<T>} the decoded response body
   */
  public async post<T>(method: string, data: RequestBody, options: PostOptions = {}): Promise<T> {
    const isForm = data instanceof FormData;
    const body = isForm ? data : { ...data, ...this.additionalFields };
    const headers = isForm ? { ...this.headers, ...data.getHeaders() } : this.headers;
    const retries = isForm ? 1 : options.retries ?? this.retryCount;

    for (let attempt = 0; ; ++attempt) {
      try {
        const response = await this.client.post<T>(method, body, {
          headers,
          responseType: options.responseType,
          onUploadProgress:
            options.onUploadProgress === undefined
              ? undefined
              : (event) => options.onUploadProgress?.(event.loaded)
        });
        return response.data;
      } catch (err) {
        if (options.raiseError || !isRetryable(err) || attempt + 1 >= retries) {
          throw toApiError(method, err);
        }
        const sleepSec = Math.min(this.retrySleepSec * 2 ** attempt, MAX_RETRY_SLEEP_SEC);
        console.warn(
          `Retrying "${method}" (attempt ${attempt + 2}/${retries}) in ${sleepSec}s: ${toApiError(method, err).message}`
        );
        await sleep(sleepSec);
      }
    }
  }

  /**
   * Fetches every page of a list method and concatenates the entities.
   *
   * @param method list method, e.g. `tasks.list`
   * @param data filters and parent ids
   * @param limit stop once this many entities are collected
   *
   * @returns {Promise<T[]>}
   */
  public async getListAllPages<T>(
    method: string,
    data: Record<string, unknown>,
    limit?: number
  ): Promise<T[]> {
    const first = await this.post<PageResponse<T>>(method, {
      ...data,
      page: 1,
      per_page: PAGE_SIZE
    });
    const results = [...first.entities];
    for (let page = 2; page <= first.pagesCount; ++page) {
      if (limit !== undefined && results.length >= limit) {
        break;
      }
      const response = await this.post<PageResponse<T>>(method, {
        ...data,
        page,
        per_page: PAGE_SIZE
      });
      results.push(...response.entities);
    }
    return limit !== undefined ? results.slice(0, limit) : results;
  }
}
