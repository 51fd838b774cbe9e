import { promises as fpm } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { ImportFile } from '../src/api/types';
import { getBufferHash } from '../src/io/fs';
import { getDatasetName, groupByDataset, importImages } from '../src/plugins/importImages';
import { getTaskPaths, TaskPaths } from '../src/plugins/taskPaths';
import { FAKE_SERVER, FAKE_TOKEN, FakePlatform, formParts } from './fakePlatform';

let platform: FakePlatform;
let paths: TaskPaths;
let info: jest.SpyInstance;
let warn: jest.SpyInstance;

function page<T>(entities: T[]) {
  return { total: entities.length, perPage: 500, pagesCount: 1, entities };
}

async function writeConfig(extra: Record<string, unknown> = {}): Promise<void> {
  await fpm.writeFile(
    paths.taskConfigPath,
    JSON.stringify({
      task_id: 100,
      append_to_existing_project: false,
      server_address: FAKE_SERVER,
      api_token: FAKE_TOKEN,
      project_name: 'Imported',
      ...extra
    })
  );
}

function servePlatform(files: ImportFile[]): void {
  let nextDatasetId = 20;
  platform
    .on('tasks.info', () => ({ id: 100, workspaceId: 12, status: 'started' }))
    .on('projects.list', () => page([]))
    .on('projects.add', (body) => ({ id: 8, name: body.title, type: body.type }))
    .on('tasks.import.files_list', () => files)
    .on('datasets.list', () => page([]))
    .on('datasets.add', (body) => ({ id: nextDatasetId++, name: body.name }))
    .on('images.bulk.add', () => []);
}

function run() {
  return importImages({
    paths,
    apiOptions: { retrySleepSec: 0, axiosConfig: { adapter: platform.adapter } }
  });
}

beforeEach(async () => {
  platform = new FakePlatform();
  paths = getTaskPaths({ TASK_DATA_DIR: await fpm.mkdtemp(path.join(os.tmpdir(), 'import-')) });
  info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  info.mockRestore();
  warn.mockRestore();
  await fpm.rm(paths.dataDir, { recursive: true, force: true });
});

test('task paths default to /task_data', () => {
  expect(getTaskPaths({})).toEqual({
    dataDir: '/task_data',
    taskConfigPath: '/task_data/task_config.json',
    resultsDir: '/task_data/results'
  });
});

test('dataset name is the parent directory', () => {
  expect(getDatasetName('/import/cats/01.jpg')).toBe('cats');
  expect(getDatasetName('/01.jpg')).toBe('ds0');
  expect(getDatasetName('01.jpg')).toBe('ds0');
});

test('grouping skips non-images and renames duplicates', () => {
  const groups = groupByDataset([
    { filename: '/cats/a.png', hash: 'h1' },
    { filename: '/cats/notes.txt', hash: 'h2' },
    { filename: '/dogs/x.JPG', hash: 'h3' },
    { filename: '/more/dogs/x.JPG', hash: 'h4' }
  ]);

  expect([...groups.keys()]).toEqual(['cats', 'dogs']);
  expect([...(groups.get('cats') ?? new Map<string, string>()).entries()]).toEqual([['a.png', 'h1']]);
  const dogs = [...(groups.get('dogs') ?? new Map<string, string>()).keys()];
  expect(dogs[0]).toBe('x.JPG');
  expect(dogs[1]).toMatch(/^x_[a-zA-Z0-9]{5}\.JPG$/);
  expect(warn).toHaveBeenNthCalledWith(
    1,
    'File skipped "/cats/notes.txt": Unsupported image extension: ".txt" for file "/cats/notes.txt". ' +
      'Only the following extensions are supported: .jpg, .jpeg, .jfif, .png, .webp, .tiff, .tif, .avif.'
  );
  expect(warn).toHaveBeenNthCalledWith(
    2,
    `Name "x.JPG" already exists in dataset "dogs": renamed to "${dogs[1]}"`
  );
});

test('images already on the server are added by hash', async () => {
  await writeConfig({ options: { normalize_exif: false, remove_alpha_channel: false } });
  servePlatform([
    { filename: '/cats/a.png', hash: 'h1' },
    { filename: '/top.png', hash: 'h3' }
  ]);

  const result = await run();

  expect(result.project.id).toBe(8);
  expect(result.itemsCount).toEqual({ cats: 1, ds0: 1 });
  expect(platform.methods()).toEqual([
    'tasks.info',
    'projects.list',
    'projects.add',
    'tasks.import.files_list',
    'datasets.list',
    'datasets.add',
    'images.bulk.add',
    'datasets.list',
    'datasets.add',
    'images.bulk.add'
  ]);
  expect(platform.callsOf('projects.add')[0].body).toEqual({
    workspaceId: 12,
    title: 'Imported',
    type: 'images',
    description: '',
    taskId: 100
  });
  expect(platform.callsOf('images.bulk.add').map((call) => call.body)).toEqual([
    { datasetId: 20, images: [{ title: 'a.png', hash: 'h1' }], taskId: 100 },
    { datasetId: 21, images: [{ title: 'top.png', hash: 'h3' }], taskId: 100 }
  ]);
  expect(platform.callsOf('images.bulk.add')[0].headers['x-task-id']).toBe('100');
  expect(info).toHaveBeenLastCalledWith('{"event_type":"project_created","project_id":8}');
});

test('images are normalized and uploaded again', async () => {
  await writeConfig();
  servePlatform([{ filename: '/cats/a.png', hash: 'h/1' }]);
  const rgba = await sharp({
    create: { width: 4, height: 3, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 0.5 } }
  })
    .png()
    .toBuffer();
  platform
    .on('images.download-by-hash', () => rgba)
    .on('images.internal.hashes.list', () => [])
    .on('images.bulk.upload', () => ({}));

  await run();

  expect(platform.callsOf('images.download-by-hash')[0].body).toEqual({ hash: 'h/1', taskId: 100 });
  const form = platform.callsOf('images.bulk.upload')[0].form;
  expect(form).toBeDefined();
  if (form === undefined) {
    return;
  }
  const [part] = formParts(form);
  const content = Buffer.from(part.content, 'latin1');
  const metadata = await sharp(content).metadata();
  expect(part.filename).toBe('ha1.png');
  expect(metadata.channels).toBe(3);
  expect(metadata.width).toBe(4);
  expect(platform.callsOf('images.bulk.add')[0].body).toEqual({
    datasetId: 20,
    images: [{ title: 'a.png', hash: getBufferHash(content) }],
    taskId: 100
  });
  expect(await fpm.readdir(paths.resultsDir)).toEqual([]);
});

test('appending needs the project to exist', async () => {
  await writeConfig({ append_to_existing_project: true, project_name: undefined, res_names: { project: 'Old' } });
  servePlatform([]);

  await expect(run()).rejects.toThrow('Project "Old" not found in workspace 12');
});

test('an import without images fails', async () => {
  await writeConfig();
  servePlatform([{ filename: '/cats/readme.md', hash: 'h1' }]);

  await expect(run()).rejects.toThrow("Project wasn't created: 0 files were added");
});

test('the task config is validated', async () => {
  await fpm.writeFile(paths.taskConfigPath, JSON.stringify({ task_id: 'x' }));

  await expect(run()).rejects.toThrow('JSON data is invalid. See error message for more details.');
  expect(platform.calls).toHaveLength(0);
});
