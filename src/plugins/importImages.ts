import { promises as fpm } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Api, ApiOptions } from '../api/Api';
import { ImportFile, ProjectInfo } from '../api/types';
import { DEFAULT_IMG_EXT, normalizeImage, UnsupportedImageFormat, validateExt } from '../imaging/image';
import { cleanDir, getFileExt, getFileName, getFileNameWithExt } from '../io/fs';
import { loadJsonFile, validateJson } from '../io/json';
import { Progress } from '../progress';
import { batched, randStr } from '../utils';
import { runMain } from './runMain';
import { getTaskPaths, TaskPaths } from './taskPaths';

export const DEFAULT_DATASET_NAME = 'ds0';
const UPLOAD_BATCH_SIZE = 10;

export const importTaskConfigSchema = z.object({
  task_id: z.number().int(),
  append_to_existing_project: z.boolean().default(false),
  server_address: z.string().min(1),
  api_token: z.string().min(1),
  options: z
    .object({
      normalize_exif: z.boolean().default(true),
      remove_alpha_channel: z.boolean().default(true)
    })
    .default({}),
  project_name: z.string().optional(),
  res_names: z.object({ project: z.string() }).optional()
});

export type ImportTaskConfig = z.infer<typeof importTaskConfigSchema>;

export type ImportImagesOptions = {
  paths?: TaskPaths;
  /** merged over the task config's connection settings */
  apiOptions?: ApiOptions;
};

export type ImportResult = {
  project: ProjectInfo;
  /** dataset name -> number of images added */
  itemsCount: Record<string, number>;
};

/**
 * Dataset an uploaded file goes to: the name of the directory holding it,
 * `ds0` for files at the archive root.
 *
 * @example
 * getDatasetName('/import/cats/01.jpg'); // 'cats'
 * getDatasetName('/01.jpg'); // 'ds0'
 */
export function getDatasetName(filePath: string): string {
  const dirName = path.posix.basename(path.posix.dirname(filePath));
  return dirName === '' || dirName === '.' ? DEFAULT_DATASET_NAME : dirName;
}

/**
 * Sorts the uploaded files into datasets. Files that are not images are
 * skipped with a warning; a name already taken in its dataset gets a random
 * suffix.
 *
 * @returns dataset name -> (item name -> content hash)
 */
export function groupByDataset(files: ImportFile[]): Map<string, Map<string, string>> {
  const datasets = new Map<string, Map<string, string>>();
  for (const file of files) {
    const originalPath = file.filename;
    try {
      validateExt(originalPath);
    } catch (err) {
      if (err instanceof UnsupportedImageFormat) {
        console.warn(`File skipped "${originalPath}": ${err.message}`);
        continue;
      }
      throw err;
    }
    const dsName = getDatasetName(originalPath);
    const items = datasets.get(dsName) ?? new Map<string, string>();
    datasets.set(dsName, items);

    let itemName = getFileNameWithExt(originalPath);
    if (items.has(itemName)) {
      const newName = `${getFileName(originalPath)}_${randStr(5)}${getFileExt(originalPath)}`;
      console.warn(`Name "${itemName}" already exists in dataset "${dsName}": renamed to "${newName}"`);
      itemName = newName;
    }
    items.set(itemName, file.hash);
  }
  return datasets;
}

export function readImportTaskConfig(configPath: string): ImportTaskConfig {
  const raw = loadJsonFile(configPath);
  validateJson(raw, importTaskConfigSchema, true);
  return importTaskConfigSchema.parse(raw);
}

async function openProject(api: Api, config: ImportTaskConfig, workspaceId: number): Promise<ProjectInfo> {
  const projectName = config.project_name ?? config.res_names?.project;
  if (projectName === undefined) {
    throw new Error('Task config defines neither "project_name" nor "res_names.project"');
  }
  if (!config.append_to_existing_project) {
    return api.project.create(workspaceId, projectName, { type: 'images', changeNameIfConflict: true });
  }
  const existing = await api.project.getInfoByNameChecked(workspaceId, projectName, 'images');
  if (existing === null) {
    throw new Error(`Project "${projectName}" not found in workspace ${workspaceId}`);
  }
  return existing;
}

/**
 * Adds the files uploaded to an import task to an images project.
 *
 * Images already stored on the server are added by hash. When EXIF
 * normalization or alpha removal is on, every image is downloaded,
 * rewritten and uploaded again instead.
 */
export async function importImages(options: ImportImagesOptions = {}): Promise<ImportResult> {
  const paths = options.paths ?? getTaskPaths();
  await fpm.mkdir(paths.resultsDir, { recursive: true });

  const config = readImportTaskConfig(paths.taskConfigPath);
  const taskId = config.task_id;
  const normalizeExif = config.options.normalize_exif;
  const removeAlpha = config.options.remove_alpha_channel;
  const needDownload = normalizeExif || removeAlpha;

  const api = new Api(config.server_address, config.api_token, { retryCount: 5, ...options.apiOptions });
  const taskInfo = await api.task.getInfoByIdStrict(taskId);
  api.addAdditionalField('taskId', taskId);
  api.addHeader('x-task-id', String(taskId));

  const project = await openProject(api, config, taskInfo.workspaceId);
  const files = await api.task.getImportFilesList(taskId);
  const itemsCount: Record<string, number> = {};

  for (const [dsName, items] of groupByDataset(files)) {
    const dataset = await api.dataset.getOrCreate(project.id, dsName);
    const names = [...items.keys()];
    const hashes = [...items.values()];
    const localPaths = hashes.map((hash) =>
      path.join(paths.resultsDir, `${hash.replace(/\//g, 'a')}${DEFAULT_IMG_EXT}`)
    );
    const progress = new Progress(`Dataset: "${dsName}"`, names.length);

    const nameBatches = batched(names, UPLOAD_BATCH_SIZE);
    const hashBatches = batched(hashes, UPLOAD_BATCH_SIZE);
    const pathBatches = batched(localPaths, UPLOAD_BATCH_SIZE);
    for (let index = 0; index < nameBatches.length; ++index) {
      if (needDownload) {
        await api.image.downloadPathsByHashes(hashBatches[index], pathBatches[index]);
        for (const localPath of pathBatches[index]) {
          await normalizeImage(localPath, { normalizeExif, removeAlpha });
        }
        await api.image.uploadPaths(dataset.id, nameBatches[index], pathBatches[index]);
        await cleanDir(paths.resultsDir);
      } else {
        await api.image.uploadHashes(dataset.id, nameBatches[index], hashBatches[index]);
      }
      progress.itersDoneReport(nameBatches[index].length);
    }
    itemsCount[dsName] = names.length;
  }

  if (Object.keys(itemsCount).length === 0) {
    const entity = config.append_to_existing_project ? 'Dataset' : 'Project';
    throw new Error(`${entity} wasn't created: 0 files were added`);
  }
  console.info(JSON.stringify({ event_type: 'project_created', project_id: project.id }));
  return { project, itemsCount };
}

async function main(): Promise<void> {
  await importImages();
  console.info(JSON.stringify({ event_type: 'import_applet_complete' }));
}

if (require.main === module) {
  void runMain('IMPORT_IMAGES', main);
}
