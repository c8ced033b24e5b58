// src/test-utils/fake-api.ts
// In-process stand-in for the HTTP API, plugged into axios as its adapter.

import { AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { Readable } from 'stream';
import { vi } from 'vitest';
import winston from 'winston';
import { DocSearchClient, DocSearchClientOptions } from '../client';

export const TEST_API_KEY = 'test-key';
export const TEST_BASE_URL = 'https://api.docsearch.test';

export interface FakeReply {
  status: number;
  /** Serialized as JSON. */
  body?: unknown;
  /** Sent verbatim instead of `body`. */
  text?: string;
}

export interface RecordedCall {
  method: string;
  url: string;
  baseURL?: string;
  headers: AxiosHeaders;
  params?: unknown;
  timeout?: number;
  /** Decoded JSON request body, when there was one. */
  json?: unknown;
  /** Bytes of a streamed or buffered body. */
  bytes?: Buffer;
}

const readBody = async (data: unknown): Promise<{ json?: unknown; bytes?: Buffer }> => {
  if (typeof data === 'string') {
    return { json: JSON.parse(data) };
  }
  if (Buffer.isBuffer(data)) {
    return { bytes: data };
  }
  if (data instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of data) {
      chunks.push(Buffer.from(chunk));
    }
    return { bytes: Buffer.concat(chunks) };
  }
  return {};
};

export const silentLogger = winston.createLogger({ silent: true });

/**
 * Replies are queued per `METHOD url`; each call takes the next one and the
 * last reply keeps repeating. An `Error` reply rejects like a network failure.
 */
export class FakeApi {
  readonly calls: RecordedCall[] = [];
  private replies = new Map<string, Array<FakeReply | Error>>();

  on(method: string, url: string, ...replies: Array<FakeReply | Error>): this {
    const key = `${method.toUpperCase()} ${url}`;
    this.replies.set(key, [...(this.replies.get(key) ?? []), ...replies]);
    return this;
  }

  callsTo(method: string, url: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method.toUpperCase() && call.url === url);
  }

  readonly adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const body = await readBody(config.data);
    this.calls.push({
      method,
      url,
      baseURL: config.baseURL,
      headers: AxiosHeaders.from(config.headers),
      params: config.params,
      timeout: config.timeout,
      ...body,
    });

    const queue = this.replies.get(`${method} ${url}`);
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (reply === undefined) {
      throw new Error(`No fake reply for ${method} ${url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const data = reply.text ?? (reply.body === undefined ? '' : JSON.stringify(reply.body));
    return { data, status: reply.status, statusText: String(reply.status), headers: {}, config };
  });
}

export function createTestClient(api: FakeApi, options: DocSearchClientOptions = {}): DocSearchClient {
  return new DocSearchClient({
    apiKey: TEST_API_KEY,
    baseUrl: TEST_BASE_URL,
    logger: silentLogger,
    adapter: api.adapter,
    ...options,
  });
}
