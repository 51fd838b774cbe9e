// in-process stand-in for the platform, installed as the axios adapter of an Api

import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import { Api, ApiOptions } from '../src/api/Api';
import { isJsonObject, JsonObject } from '../src/io/json';

export const FAKE_SERVER = 'http://platform.test';
export const FAKE_TOKEN = 'test-secret';

export type RecordedCall = {
  method: string;
  body: JsonObject;
  form?: FormData;
  headers: Record<string, string>;
};

export type FakeHandler = (body: JsonObject, call: RecordedCall) => unknown;

/** a non-2xx answer */
export class FakeReply {
  constructor(readonly status: number, readonly data: unknown = {}) {}
}

/** the connection drops before any answer */
export class FakeNetworkFailure {}

export function reply(status: number, data: unknown = {}): FakeReply {
  return new FakeReply(status, data);
}

export type FormPart = {
  name: string;
  filename?: string;
  content: string;
};

/**
 * Splits an in-memory multipart body into its parts. Works only for forms
 * built from strings and buffers.
 */
export function formParts(form: FormData): FormPart[] {
  const raw = form.getBuffer().toString('latin1');
  const chunks = raw.split(`--${form.getBoundary()}`).slice(1, -1);
  return chunks.map((chunk) => {
    const headerEnd = chunk.indexOf('\r\n\r\n');
    const headers = chunk.slice(2, headerEnd);
    const content = chunk.slice(headerEnd + 4, chunk.length - 2);
    const name = /name="([^"]*)"/.exec(headers);
    const filename = /filename="([^"]*)"/.exec(headers);
    return {
      name: name === null ? '' : name[1],
      filename: filename === null ? undefined : filename[1],
      content
    };
  });
}

function parseBody(data: unknown): JsonObject {
  if (typeof data !== 'string' || data === '') {
    return {};
  }
  const parsed: unknown = JSON.parse(data);
  return isJsonObject(parsed) ? parsed : {};
}

function recordHeaders(config: InternalAxiosRequestConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(config.headers.toJSON())) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    }
  }
  return headers;
}

export class FakePlatform {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, FakeHandler>();
  private readonly queued = new Map<string, FakeHandler[]>();

  /** answers every call of `method` */
  public on(method: string, handler: FakeHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /** answers the next call of `method` only, before any `on` handler */
  public once(method: string, handler: FakeHandler): this {
    this.queued.set(method, [...(this.queued.get(method) ?? []), handler]);
    return this;
  }

  public callsOf(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  public methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const method = config.url ?? '';
    const isForm = config.data instanceof FormData;
    const call: RecordedCall = {
      method,
      body: isForm ? {} : parseBody(config.data),
      headers: recordHeaders(config)
    };
    if (config.data instanceof FormData) {
      call.form = config.data;
    }
    this.calls.push(call);

    const handler = this.queued.get(method)?.shift() ?? this.handlers.get(method);
    const result =
      handler === undefined
        ? reply(404, { error: `Unknown method ${method}` })
        : await handler(call.body, call);

    if (result instanceof FakeNetworkFailure) {
      throw new AxiosError('socket hang up', 'ECONNRESET', config);
    }
    const status = result instanceof FakeReply ? result.status : 200;
    const response: AxiosResponse = {
      data: result instanceof FakeReply ? result.data : result,
      status,
      statusText: String(status),
      headers: {},
      config
    };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }
    return response;
  };

  /** An `Api` wired to this platform, with no pause between retries. */
  public api(options: ApiOptions = {}): Api {
    return new Api(FAKE_SERVER, FAKE_TOKEN, {
      retrySleepSec: 0,
      ...options,
      axiosConfig: { ...options.axiosConfig, adapter: this.adapter }
    });
  }
}
