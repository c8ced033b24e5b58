// src/services/upload.service.ts

import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import mime from 'mime-types';
import { setTimeout as delay } from 'timers/promises';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS } from '../config';
import { DocSearchError, FileNotFoundError, PollTimeoutError, ProcessingError, ValidationError } from '../errors';
import {
  FileRecord,
  fileResponseSchema,
  UploadInitResponse,
  isFailed,
  uploadInitResponseSchema,
} from '../models/file.model';
import { BaseService } from './base/BaseService';
import { ServiceConfig } from './base/types';
import { parseResponse } from './transport.service';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

export interface WaitOptions {
  /** Constant delay between status checks. */
  pollIntervalMs?: number;
  /** Wall-clock budget for the whole wait. */
  pollTimeoutMs?: number;
}

export interface UploadOptions extends WaitOptions {
  /** Poll until the file is ready (default true). */
  waitForReady?: boolean;
  /** Caller's own id for the file, usable later as a search filter. */
  referenceId?: string;
  metadata?: Record<string, unknown>;
}

export interface UploadServiceConfig extends ServiceConfig {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface InitUploadPayload {
  filename: string;
  size: number;
  mime_type: string;
  reference_id?: string;
  metadata?: Record<string, unknown>;
}

const isMissingPathError = (error: unknown): boolean =>
  error instanceof Error &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EISDIR');

export function inferMimeType(filePath: string): string {
  return mime.lookup(filePath) || DEFAULT_MIME_TYPE;
}

/**
 * Drives a file through init, storage PUT and confirm, and tracks the
 * server-side processing that follows.
 */
export class UploadService extends BaseService {
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(config: UploadServiceConfig) {
    super(config);
    this.sleep = config.sleep ?? ((ms: number) => delay(ms));
    this.now = config.now ?? Date.now;
  }

  public async uploadFile(projectId: string, filePath: string, options: UploadOptions = {}): Promise<FileRecord> {
    const { handle, stats } = await this.openLocalFile(filePath);
    const init = await this.initAndStore(projectId, filePath, handle, stats.size, options).finally(() => handle.close());

    const confirmPath = await this.routes.path('fileConfirm', { project: projectId, file: init.file_id });
    const file = parseResponse(
      fileResponseSchema,
      await this.transport.request('POST', confirmPath),
      `POST ${confirmPath}`
    );
    this.logger.info('Upload confirmed', { projectId, fileId: file.id, status: file.status });

    if (options.waitForReady === false) {
      return file;
    }
    return this.waitForReady(projectId, file.id, options);
  }

  private async initAndStore(
    projectId: string,
    filePath: string,
    handle: FileHandle,
    size: number,
    options: UploadOptions
  ): Promise<UploadInitResponse> {
    const filename = path.basename(filePath);
    const mimeType = inferMimeType(filePath);

    const payload: InitUploadPayload = { filename, size, mime_type: mimeType };
    if (options.referenceId) payload.reference_id = options.referenceId;
    if (options.metadata && Object.keys(options.metadata).length > 0) payload.metadata = options.metadata;

    this.logger.info('Initializing upload', { projectId, filename, size, mimeType });
    const initPath = await this.routes.path('fileInit', { project: projectId });
    const init = parseResponse(
      uploadInitResponseSchema,
      await this.transport.request('POST', initPath, payload),
      `POST ${initPath}`
    );

    await this.transport.putToStorage(init.upload_url, handle.createReadStream({ autoClose: false }), {
      contentType: mimeType,
      contentLength: size,
    });
    return init;
  }

  public async getFileStatus(projectId: string, fileId: string): Promise<FileRecord> {
    const statusPath = await this.routes.path('fileStatus', { project: projectId, file: fileId });
    const response = await this.transport.request('GET', statusPath);
    return parseResponse(fileResponseSchema, response, `GET ${statusPath}`);
  }

  /**
   * Polls at a constant interval until the file is ready. A failed status
   * ends the wait at once; otherwise the wait ends when the timeout has
   * elapsed. There is no cancellation: race the returned promise to stop early.
   */
  public async waitForReady(projectId: string, fileId: string, options: WaitOptions = {}): Promise<FileRecord> {
    const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const timeout = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    if (!(interval >= 0) || !(timeout >= 0)) {
      throw new ValidationError('pollIntervalMs and pollTimeoutMs must be non-negative numbers');
    }

    const startTime = this.now();
    for (;;) {
      const file = await this.getFileStatus(projectId, fileId);

      if (file.status === 'ready') {
        this.logger.info('File is ready', { fileId, totalChunks: file.totalChunks });
        return file;
      }
      if (isFailed(file.status)) {
        this.logger.error('File processing failed', { fileId, status: file.status, error: file.errorMessage });
        throw new ProcessingError(file);
      }
      if (this.now() - startTime >= timeout) {
        this.logger.warn('Timed out waiting for file', { fileId, status: file.status, timeout });
        throw new PollTimeoutError(file);
      }

      this.logger.debug('File still processing', { fileId, status: file.status });
      await this.sleep(interval);
    }
  }

  public async deleteFile(projectId: string, fileId: string): Promise<void> {
    const filePath = await this.routes.path('file', { project: projectId, file: fileId });
    await this.transport.request('DELETE', filePath);
    this.logger.info('File deleted', { projectId, fileId });
  }

  /** Opens the file before any request is sent; the caller owns the handle. */
  private async openLocalFile(filePath: string): Promise<{ handle: FileHandle; stats: fs.Stats }> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'r');
    } catch (error: unknown) {
      if (isMissingPathError(error)) {
        throw new FileNotFoundError(filePath);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocSearchError(`Cannot read ${filePath}: ${reason}`, { cause: error });
    }

    const stats = await handle.stat();
    if (!stats.isFile()) {
      await handle.close();
      throw new FileNotFoundError(filePath);
    }
    return { handle, stats };
  }
}
