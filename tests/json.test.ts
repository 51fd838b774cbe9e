import { promises as fpm } from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import {
  dumpJsonFile,
  dumpJsonFileAsync,
  flattenJson,
  loadJsonFile,
  modifyKeys,
  validateJson
} from '../src/io/json';

let dir: string;

beforeEach(async () => {
  dir = await fpm.mkdtemp(path.join(os.tmpdir(), 'json-'));
});

afterEach(async () => {
  await fpm.rm(dir, { recursive: true, force: true });
});

test('dump and load', async () => {
  const file = path.join(dir, 'ann.json');
  dumpJsonFile({ size: { height: 800, width: 1067 } }, file, 2);

  expect(await fpm.readFile(file, 'utf-8')).toBe(
    '{\n  "size": {\n    "height": 800,\n    "width": 1067\n  }\n}'
  );
  expect(loadJsonFile(file)).toEqual({ size: { height: 800, width: 1067 } });
});

test('async dump indents with four spaces by default', async () => {
  const file = path.join(dir, 'meta.json');
  await dumpJsonFileAsync({ tags: [] }, file);
  expect(await fpm.readFile(file, 'utf-8')).toBe('{\n    "tags": []\n}');
});

test('load errors name the path', async () => {
  const broken = path.join(dir, 'broken.json');
  await fpm.writeFile(broken, '{"a": ');
  const list = path.join(dir, 'list.json');
  await fpm.writeFile(list, '[1, 2]');

  expect(() => loadJsonFile(dir)).toThrow(`The path ${dir} is a directory, not a file.`);
  expect(() => loadJsonFile(path.join(dir, 'missing.json'))).toThrow(
    `File with path ${path.join(dir, 'missing.json')} was not found.`
  );
  expect(() => loadJsonFile(broken)).toThrow(`Can not decode json file with path ${broken}:`);
  expect(() => loadJsonFile(list)).toThrow(`Json file with path ${list} does not contain an object.`);
});

test('flattenJson joins nested keys and keeps arrays', () => {
  expect(flattenJson({ a: { b: 1, c: { d: 2 } }, e: [1, { f: 3 }], g: null })).toEqual({
    'a.b': 1,
    'a.c.d': 2,
    e: [1, { f: 3 }],
    g: null
  });
  expect(flattenJson({ a: { b: 1 } }, '/')).toEqual({ 'a/b': 1 });
});

test('modifyKeys adds prefix and suffix', () => {
  expect(modifyKeys({ '1': 'example', '3': 4 }, 'pr_', '_su')).toEqual({
    pr_1_su: 'example',
    pr_3_su: 4
  });
  expect(modifyKeys({ a: 1 }, undefined, '_x')).toEqual({ a_x: 1 });
});

test('validateJson against a schema', () => {
  const schema = z.object({ name: z.string(), count: z.number().int() });

  expect(validateJson({ name: 'a', count: 1 }, schema)).toBe(true);
  expect(validateJson({ name: 'a', count: 1.5 }, schema)).toBe(false);
  expect(() => validateJson({ name: 1 }, schema, true)).toThrow(
    'JSON data is invalid. See error message for more details.'
  );
});
