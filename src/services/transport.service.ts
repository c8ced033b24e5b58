// src/services/transport.service.ts

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { UPLOAD_TIMEOUT_MULTIPLIER } from '../config';
import { APIError, AuthenticationError, ConnectionError, NotFoundError } from '../errors';
import { SDK_VERSION } from '../version';
import { Logger } from './base/types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface TransportOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  /** Replaces axios' HTTP adapter, e.g. to route through a proxy agent or an in-process fake. */
  adapter?: AxiosRequestConfig['adapter'];
}

export interface StorageUpload {
  contentType: string;
  contentLength: number;
}

// Bodies are kept as raw text so error responses can be reported verbatim.
const keepRawBody = [(data: unknown) => data];

const bodyText = (data: unknown): string => {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
};

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Picks the most useful message from an error body: `detail`, then `message`,
 * then the raw text, then the bare status.
 */
export function extractErrorMessage(status: number, text: string): string {
  const fallback = text || `HTTP ${status}`;
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return fallback;
  }
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    for (const key of ['detail', 'message']) {
      const value: unknown = Reflect.get(data, key);
      if (value !== undefined && value !== null) {
        return typeof value === 'string' ? value : JSON.stringify(value);
      }
    }
  }
  return fallback;
}

/** Validates a decoded body, reporting a shape mismatch as an API error. */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new APIError(`Unexpected response from ${source}${where}: ${issue.message}`, {
      responseBody: JSON.stringify(data),
    });
  }
  return parsed.data;
}

export class Transport {
  private api: AxiosInstance;
  private storage: AxiosInstance;
  private logger: Logger;

  constructor(options: TransportOptions) {
    this.logger = options.logger;
    const userAgent = `docsearch-node/${SDK_VERSION}`;

    this.api = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'X-API-Key': options.apiKey,
        'User-Agent': userAgent,
        'Content-Type': 'application/json',
      },
      responseType: 'text',
      transformResponse: keepRawBody,
      validateStatus: () => true,
      adapter: options.adapter,
    });

    // Presigned URLs carry their own authorization; the API key must not leak to storage.
    this.storage = axios.create({
      timeout: options.timeoutMs * UPLOAD_TIMEOUT_MULTIPLIER,
      headers: { 'User-Agent': userAgent },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
      responseType: 'text',
      transformResponse: keepRawBody,
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  /**
   * Sends one authenticated API call and returns the decoded JSON body.
   * 204 and empty bodies decode to `{}`.
   */
  public async request(method: HttpMethod, path: string, body?: unknown, params?: QueryParams): Promise<unknown> {
    const requestId = uuidv4();
    const startTime = Date.now();
    this.logger.debug('Sending API request', { method, path, requestId });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.api.request<unknown>({
        method,
        url: path,
        data: body,
        params,
        headers: { 'X-Request-Id': requestId },
      });
    } catch (error: unknown) {
      this.logger.warn('API request failed before a response was received', {
        method,
        path,
        requestId,
        error: reasonOf(error),
      });
      throw new ConnectionError(`Request failed: ${reasonOf(error)}`, error);
    }

    const status = response.status;
    const text = bodyText(response.data);
    this.logger.debug('Received API response', { method, path, requestId, status, duration: Date.now() - startTime });

    if (status === 401 || status === 403) {
      throw new AuthenticationError(extractErrorMessage(status, text));
    }
    if (status === 404) {
      throw new NotFoundError(extractErrorMessage(status, text));
    }
    if (status >= 400) {
      this.logger.error('API request returned an error status', { method, path, requestId, status });
      throw new APIError(extractErrorMessage(status, text), { statusCode: status, responseBody: text });
    }
    if (status === 204 || text.trim() === '') {
      return {};
    }

    try {
      return JSON.parse(text);
    } catch (error: unknown) {
      throw new APIError(`Invalid JSON in response to ${method} ${path}`, {
        statusCode: status,
        responseBody: text,
        cause: error,
      });
    }
  }

  /** PUTs raw bytes to a presigned storage URL. The response body is not JSON and is only read on failure. */
  public async putToStorage(url: string, body: Readable | Buffer, upload: StorageUpload): Promise<void> {
    const startTime = Date.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.storage.put<unknown>(url, body, {
        headers: {
          'Content-Type': upload.contentType,
          'Content-Length': upload.contentLength,
        },
      });
    } catch (error: unknown) {
      this.logger.warn('Storage upload failed before a response was received', { error: reasonOf(error) });
      throw new ConnectionError(`Failed to upload file to storage: ${reasonOf(error)}`, error);
    }

    if (response.status >= 400) {
      const text = bodyText(response.data);
      this.logger.error('Storage upload rejected', { status: response.status });
      throw new APIError(`Failed to upload file to storage: ${text}`, {
        statusCode: response.status,
        responseBody: text,
      });
    }
    this.logger.debug('Storage upload complete', { bytes: upload.contentLength, duration: Date.now() - startTime });
  }
}
