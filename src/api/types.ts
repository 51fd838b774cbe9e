import { JsonObject, JsonValue } from '../io/json';

export type TaskStatus =
  | 'queued'
  | 'consumed'
  | 'started'
  | 'deployed'
  | 'error'
  | 'finished'
  | 'terminating'
  | 'stopped';

export const TASK_STATUSES: readonly TaskStatus[] = [
  'queued',
  'consumed',
  'started',
  'deployed',
  'error',
  'finished',
  'terminating',
  'stopped'
];

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export type RestartPolicy = 'never' | 'on_error';

export type PluginTaskType = 'train' | 'inference' | 'inference_rpc' | 'smarttool' | 'custom';

export type LogLevel = 'info' | 'debug' | 'warning' | 'error';

export type ProjectType =
  | 'images'
  | 'videos'
  | 'volumes'
  | 'point_clouds'
  | 'point_cloud_episodes';

export type FilterOperator = '=' | 'eq' | '!=' | 'not' | 'in' | '!in' | '>' | '>=' | '<' | '<=';

export type Filter = {
  field: string;
  operator: FilterOperator;
  value: JsonValue;
};

export type PageResponse<T> = {
  total: number;
  perPage: number;
  pagesCount: number;
  entities: T[];
};

export type TaskInfo = {
  id: number;
  workspaceId: number;
  description: string;
  type: string;
  status: TaskStatus;
  startedAt: string;
  finishedAt: string | null;
  userId: number;
  meta: JsonObject;
  settings: JsonObject;
  agentName: string | null;
  userLogin: string;
  teamId: number;
  agentId: number | null;
};

/** First item of a `tasks.run.app` response; `id` is filled from `taskId` when missing. */
export type StartedTask = {
  id: number;
  taskId?: number;
  [key: string]: JsonValue | undefined;
};

export type TaskContext = {
  team: { id: number; name: string };
  workspace: { id: number; name: string };
  [key: string]: JsonValue;
};

export type ImportFile = {
  filename: string;
  hash: string;
  [key: string]: JsonValue;
};

export type ProjectInfo = {
  id: number;
  name: string;
  description: string;
  size: string;
  readme: string;
  workspaceId: number;
  imagesCount: number;
  itemsCount: number;
  datasetsCount: number;
  createdAt: string;
  updatedAt: string;
  type: ProjectType;
  imagePreviewUrl: string | null;
};

export type DatasetInfo = {
  id: number;
  name: string;
  description: string;
  size: string;
  projectId: number;
  imagesCount: number;
  itemsCount: number;
  createdAt: string;
  updatedAt: string;
};

export type ImageInfo = {
  id: number;
  name: string;
  hash: string;
  mime: string;
  ext: string;
  size: number;
  width: number;
  height: number;
  datasetId: number;
  meta: JsonObject;
  createdAt: string;
  updatedAt: string;
};

export type VideoInfo = {
  id: number;
  name: string;
  hash: string;
  datasetId: number;
  framesCount: number;
  meta: JsonObject;
  createdAt: string;
  updatedAt: string;
};

export type ModelInfo = {
  id: number;
  name: string;
  pluginId: number;
  workspaceId: number;
  size: string;
  createdAt: string;
  updatedAt: string;
};

export type FileInfo = {
  id: number;
  name: string;
  path: string;
  storagePath: string;
  fullStorageUrl: string;
  teamId: number;
  sizeb: number;
  hash: string;
};

export type WorkspaceInfo = {
  id: number;
  name: string;
  description: string;
  teamId: number;
};

export type LabelingJobEntity = {
  id: number;
  name: string;
  reviewStatus: string;
};

export type LabelingJobInfo = {
  id: number;
  name: string;
  status: string;
  projectId: number;
  datasetId: number;
  entities: LabelingJobEntity[];
};
