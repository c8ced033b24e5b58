// src/client.ts

import { AxiosRequestConfig } from 'axios';
import {
  LogLevel,
  RouteProfileName,
  readApiKey,
  readBaseUrl,
  readLogLevel,
  readRouteProfile,
  readTimeoutMs,
} from './config';
import { AuthenticationError, ValidationError } from './errors';
import { FileRecord } from './models/file.model';
import { ApiKeyContext, Project } from './models/project.model';
import { SearchResults } from './models/search.model';
import { Logger } from './services/base/types';
import { OrganizationContext } from './services/organization-context';
import { ProjectService } from './services/project.service';
import { RouteResolver, RouteTemplates, resolveRouteTemplates } from './services/routes';
import { SearchOptions, SearchService } from './services/search.service';
import { Transport } from './services/transport.service';
import { UploadOptions, UploadService, WaitOptions } from './services/upload.service';
import { createServiceLogger } from './utils/logger';

export interface DocSearchClientOptions {
  /** Falls back to DOCSEARCH_API_KEY. */
  apiKey?: string;
  /** Falls back to DOCSEARCH_BASE_URL, then the hosted service. */
  baseUrl?: string;
  /** Per-request timeout for API calls. Storage uploads get ten times this. */
  timeoutMs?: number;
  /** Built-in path layout; falls back to DOCSEARCH_ROUTES. */
  routes?: RouteProfileName;
  /** Individual path templates that replace the profile's. */
  routeOverrides?: Partial<RouteTemplates>;
  /** Used for every service instead of the default winston console loggers. */
  logger?: Logger;
  logLevel?: LogLevel;
  adapter?: AxiosRequestConfig['adapter'];
}

/**
 * Client for the DocSearch ingestion and search API.
 *
 * ```ts
 * const client = new DocSearchClient(); // reads DOCSEARCH_API_KEY
 * const file = await client.uploadFile(projectId, './handbook.pdf', { referenceId: 'HB-2024' });
 * const results = await client.search('parental leave', {
 *   projectId,
 *   filters: { referenceId: 'HB-2024', pageRange: { gte: 1, lte: 40 } },
 * });
 * for (const hit of results) console.log(hit.score, hit.fileName);
 * ```
 */
export class DocSearchClient {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;

  private organization: OrganizationContext;
  private projects: ProjectService;
  private uploads: UploadService;
  private searches: SearchService;

  constructor(options: DocSearchClientOptions = {}) {
    const apiKey = options.apiKey || readApiKey();
    if (!apiKey) {
      throw new AuthenticationError('No API key provided. Pass the apiKey option or set DOCSEARCH_API_KEY.');
    }
    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl || readBaseUrl()).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? readTimeoutMs();
    if (!(this.timeoutMs > 0)) {
      throw new ValidationError(`timeoutMs must be a positive number, got ${this.timeoutMs}`);
    }

    const sharedLogger = options.logger;
    const logLevel = sharedLogger ? undefined : options.logLevel ?? readLogLevel();
    const loggerFor = (service: string): Logger => sharedLogger ?? createServiceLogger(service, logLevel);

    const transport = new Transport({
      apiKey: this.apiKey,
      baseUrl: this.baseUrl,
      timeoutMs: this.timeoutMs,
      logger: loggerFor('Transport'),
      adapter: options.adapter,
    });
    const templates = resolveRouteTemplates(options.routes ?? readRouteProfile(), options.routeOverrides);
    this.organization = new OrganizationContext(transport, templates.me, loggerFor('OrganizationContext'));
    const routes = new RouteResolver(templates, this.organization);

    this.projects = new ProjectService({ logger: loggerFor('ProjectService'), transport, routes });
    this.uploads = new UploadService({ logger: loggerFor('UploadService'), transport, routes });
    this.searches = new SearchService({ logger: loggerFor('SearchService'), transport, routes });
  }

  /** Organization the API key belongs to; fetched once, then cached. */
  public getOrganizationId(): Promise<string> {
    return this.organization.getOrganizationId();
  }

  public getContext(): Promise<ApiKeyContext> {
    return this.organization.resolve();
  }

  public listProjects(): Promise<Project[]> {
    return this.projects.listProjects();
  }

  /**
   * Uploads a local file and, unless `waitForReady` is false, waits until
   * processing finishes.
   */
  public uploadFile(projectId: string, filePath: string, options?: UploadOptions): Promise<FileRecord> {
    return this.uploads.uploadFile(projectId, filePath, options);
  }

  public getFileStatus(projectId: string, fileId: string): Promise<FileRecord> {
    return this.uploads.getFileStatus(projectId, fileId);
  }

  public waitForReady(projectId: string, fileId: string, options?: WaitOptions): Promise<FileRecord> {
    return this.uploads.waitForReady(projectId, fileId, options);
  }

  public deleteFile(projectId: string, fileId: string): Promise<void> {
    return this.uploads.deleteFile(projectId, fileId);
  }

  public search(query: string, options?: SearchOptions): Promise<SearchResults> {
    return this.searches.search(query, options);
  }
}
