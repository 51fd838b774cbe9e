import { promises as fpm } from 'fs';
import os from 'os';
import path from 'path';
import {
  cleanDir,
  ensureBasePath,
  getBufferHash,
  getFileExt,
  getFileHash,
  getFileName,
  getFileNameWithExt
} from '../src/io/fs';
import { Progress } from '../src/progress';
import { batched, randStr, takeWithDefault } from '../src/utils';

test('batched', () => {
  expect(batched([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  expect(batched([], 3)).toEqual([]);
  expect(batched(Array.from({ length: 51 }, (_, index) => index)).map((batch) => batch.length)).toEqual([
    50, 1
  ]);
  expect(() => batched([1], 0)).toThrow('batchSize must be positive, got 0');
});

test('takeWithDefault replaces only null and undefined', () => {
  expect(takeWithDefault(null, 5)).toBe(5);
  expect(takeWithDefault(undefined, 'x')).toBe('x');
  expect(takeWithDefault(0, 5)).toBe(0);
});

test('randStr', () => {
  expect(randStr(5)).toMatch(/^[a-zA-Z0-9]{5}$/);
});

test('file name helpers', () => {
  expect(getFileName('/a/b/image.jpeg')).toBe('image');
  expect(getFileExt('/a/b/image.jpeg')).toBe('.jpeg');
  expect(getFileNameWithExt('/a/b/image.jpeg')).toBe('image.jpeg');
  expect(getFileExt('/a/b/README')).toBe('');
});

describe('on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fpm.mkdtemp(path.join(os.tmpdir(), 'fs-'));
  });

  afterEach(async () => {
    await fpm.rm(dir, { recursive: true, force: true });
  });

  test('file hash is base64 sha-256 of the content', async () => {
    const file = path.join(dir, 'hello.txt');
    await fpm.writeFile(file, 'hello');
    const hash = await getFileHash(file);
    expect(hash).toBe('LPJNul+wow4m6DsqxbninhsWHlwfp0JecwQzYpOLmCQ=');
    expect(getBufferHash(Buffer.from('hello'))).toBe(hash);
  });

  test('ensureBasePath and cleanDir', async () => {
    const nested = path.join(dir, 'x', 'y', 'file.txt');
    await ensureBasePath(nested);
    await fpm.writeFile(nested, 'content');
    await fpm.writeFile(path.join(dir, 'top.txt'), 'content');

    await cleanDir(dir);

    expect(await fpm.readdir(dir)).toEqual([]);
  });
});

test('progress reports one json line per step', () => {
  const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  const progress = new Progress('Dataset: "ds0"', 3);

  progress.itersDoneReport(2);
  progress.callback(1);

  expect(info.mock.calls).toEqual([
    ['{"event_type":"progress","message":"Dataset: \\"ds0\\"","current":2,"total":3}'],
    ['{"event_type":"progress","message":"Dataset: \\"ds0\\"","current":3,"total":3}']
  ]);
  expect(progress.isDone()).toBe(true);
  info.mockRestore();
});
