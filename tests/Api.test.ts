import FormData from 'form-data';
import { Api, normalizeServerAddress } from '../src/api/Api';
import { ApiError } from '../src/api/errors';
import * as utils from '../src/utils';
import { FakeNetworkFailure, FakePlatform, reply } from './fakePlatform';

let platform: FakePlatform;
let warn: jest.SpyInstance;

beforeEach(() => {
  platform = new FakePlatform();
  warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  warn.mockRestore();
});

test('server address normalization', () => {
  expect(normalizeServerAddress('localhost:8080/')).toBe('http://localhost:8080');
  expect(normalizeServerAddress('https://app.example.com//')).toBe('https://app.example.com');
  expect(normalizeServerAddress(' HTTP://host ')).toBe('HTTP://host');
});

test('empty token is rejected', () => {
  expect(() => new Api('localhost', '')).toThrow('API token is empty');
});

test('calls carry the token, extra headers and additional fields', async () => {
  platform.on('tasks.info', (body) => ({ id: body.id }));
  const api = platform.api();
  api.addAdditionalField('taskId', 77);
  api.addHeader('x-task-id', '77');

  const response = await api.post<{ id: number }>('tasks.info', { id: 5 });

  expect(response).toEqual({ id: 5 });
  const [call] = platform.calls;
  expect(call.body).toEqual({ id: 5, taskId: 77 });
  expect(call.headers['x-api-key']).toBe('test-secret');
  expect(call.headers['x-task-id']).toBe('77');
});

test('overloaded server is retried until it answers', async () => {
  platform
    .once('tasks.info', () => reply(503))
    .once('tasks.info', () => new FakeNetworkFailure())
    .on('tasks.info', () => ({ id: 1 }));

  const response = await platform.api().post<{ id: number }>('tasks.info', { id: 1 });

  expect(response.id).toBe(1);
  expect(platform.callsOf('tasks.info')).toHaveLength(3);
  expect(warn).toHaveBeenCalledTimes(2);
  expect(warn).toHaveBeenNthCalledWith(
    1,
    'Retrying "tasks.info" (attempt 2/10) in 0s: tasks.info failed with status 503: Request failed with status code 503'
  );
});

test('retries stop after retryCount attempts', async () => {
  platform.on('tasks.info', () => reply(502, { error: 'bad gateway' }));
  const api = platform.api({ retryCount: 3 });

  await expect(api.post('tasks.info', { id: 1 })).rejects.toThrow(
    'tasks.info failed with status 502: bad gateway'
  );
  expect(platform.callsOf('tasks.info')).toHaveLength(3);
});

test('retry sleeps double each time and stop growing at a minute', async () => {
  const sleep = jest.spyOn(utils, 'sleep').mockResolvedValue(undefined);
  platform.on('tasks.info', () => reply(503));
  const api = platform.api({ retryCount: 9, retrySleepSec: 1 });

  await expect(api.post('tasks.info', { id: 1 })).rejects.toThrow(
    'tasks.info failed with status 503: Request failed with status code 503'
  );

  expect(sleep.mock.calls.map(([seconds]) => seconds)).toEqual([1, 2, 4, 8, 16, 32, 60, 60]);
  expect(platform.calls).toHaveLength(9);
  expect(warn).toHaveBeenLastCalledWith(
    'Retrying "tasks.info" (attempt 9/9) in 60s: tasks.info failed with status 503: Request failed with status code 503'
  );
  sleep.mockRestore();
});

test('client errors are not retried', async () => {
  platform.on('projects.add', () => reply(400, { details: { message: 'name is taken' } }));

  const error = await platform
    .api()
    .post('projects.add', { title: 'p' })
    .catch((err: unknown) => err);

  expect(error).toBeInstanceOf(ApiError);
  if (error instanceof ApiError) {
    expect(error.status).toBe(400);
    expect(error.method).toBe('projects.add');
    expect(error.message).toBe('projects.add failed with status 400: name is taken');
    expect(error.details).toEqual({ details: { message: 'name is taken' } });
  }
  expect(platform.calls).toHaveLength(1);
});

test('raiseError fails on the first retryable error', async () => {
  platform.on('tasks.request.direct', () => reply(503, { message: 'busy' }));

  await expect(
    platform.api().post('tasks.request.direct', {}, { raiseError: true })
  ).rejects.toThrow('tasks.request.direct failed with status 503: busy');
  expect(platform.calls).toHaveLength(1);
});

test('multipart bodies are sent once and untouched', async () => {
  platform.on('images.bulk.upload', () => reply(503));
  const api = platform.api();
  api.addAdditionalField('taskId', 1);
  const form = new FormData();
  form.append('hash', 'content');

  await expect(api.post('images.bulk.upload', form)).rejects.toBeInstanceOf(ApiError);

  const calls = platform.callsOf('images.bulk.upload');
  expect(calls).toHaveLength(1);
  expect(calls[0].form).toBe(form);
  expect(calls[0].headers['content-type']).toBe(
    `multipart/form-data; boundary=${form.getBoundary()}`
  );
});

test('all pages of a list are collected', async () => {
  platform.on('tasks.list', (body) => {
    const page = Number(body.page);
    return {
      total: 5,
      perPage: 2,
      pagesCount: 3,
      entities: page < 3 ? [page * 10, page * 10 + 1] : [30]
    };
  });
  const api = platform.api();

  expect(await api.getListAllPages<number>('tasks.list', { workspaceId: 3 })).toEqual([
    10, 11, 20, 21, 30
  ]);
  expect(platform.calls.map((call) => call.body)).toEqual([
    { workspaceId: 3, page: 1, per_page: 500 },
    { workspaceId: 3, page: 2, per_page: 500 },
    { workspaceId: 3, page: 3, per_page: 500 }
  ]);
});

test('page fetching stops at the limit', async () => {
  platform.on('tasks.list', (body) => ({
    total: 6,
    perPage: 2,
    pagesCount: 3,
    entities: [Number(body.page), Number(body.page)]
  }));

  const items = await platform.api().getListAllPages<number>('tasks.list', {}, 3);

  expect(items).toEqual([1, 1, 2]);
  expect(platform.calls).toHaveLength(2);
});

describe('fromEnv', () => {
  test('reads address, token and retry settings', () => {
    const api = Api.fromEnv({
      SERVER_ADDRESS: 'platform.test/',
      API_TOKEN: 'test-secret',
      API_RETRY_COUNT: '4',
      API_RETRY_SLEEP_SEC: '0.5'
    });
    expect(api.serverAddress).toBe('http://platform.test');
    expect(api.retryCount).toBe(4);
    expect(api.retrySleepSec).toBe(0.5);
  });

  test('defaults retry settings', () => {
    const api = Api.fromEnv({ SERVER_ADDRESS: 'https://platform.test', API_TOKEN: 'test-secret' });
    expect(api.retryCount).toBe(10);
    expect(api.retrySleepSec).toBe(1);
  });

  test('names the missing variable', () => {
    expect(() => Api.fromEnv({ API_TOKEN: 'test-secret' })).toThrow(
      'Environment variable SERVER_ADDRESS is not defined'
    );
    expect(() => Api.fromEnv({ SERVER_ADDRESS: 'platform.test' })).toThrow(
      'Environment variable API_TOKEN is not defined'
    );
  });

  test('rejects a malformed retry count', () => {
    expect(() =>
      Api.fromEnv({ SERVER_ADDRESS: 'platform.test', API_TOKEN: 'test-secret', API_RETRY_COUNT: 'x' })
    ).toThrow('Environment variable API_RETRY_COUNT must be a non-negative number');
  });
});
