// src/services/search.service.ts

import { ValidationError } from '../errors';
import { MetadataFilters, MetadataFiltersPayload, toApiFormat } from '../models/filters.model';
import { SearchResults, searchResponseSchema, toSearchResults } from '../models/search.model';
import { BaseService } from './base/BaseService';
import { parseResponse } from './transport.service';

export const DEFAULT_TOP_K = 10;
export const DEFAULT_MIN_SCORE = 0.7;

export interface SearchOptions {
  /** Limit the search to one project. */
  projectId?: string;
  /** Limit the search to these files. */
  fileIds?: string[];
  /** Upper bound on semantic results; the server enforces it. */
  topK?: number;
  /** Similarity threshold between 0 and 1. */
  minScore?: number;
  filters?: MetadataFilters;
}

export interface SearchRequestPayload {
  query: string;
  top_k: number;
  min_score: number;
  project_id?: string;
  file_ids?: string[];
  metadata_filters?: MetadataFiltersPayload;
}

export class SearchService extends BaseService {
  public buildPayload(query: string, options: SearchOptions = {}): SearchRequestPayload {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const minScore = options.minScore ?? DEFAULT_MIN_SCORE;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }
    if (!Number.isFinite(minScore)) {
      throw new ValidationError(`minScore must be a number, got ${minScore}`);
    }

    const payload: SearchRequestPayload = { query, top_k: topK, min_score: minScore };
    if (options.projectId) payload.project_id = options.projectId;
    if (options.fileIds && options.fileIds.length > 0) payload.file_ids = options.fileIds;
    if (options.filters) {
      const metadataFilters = toApiFormat(options.filters);
      if (Object.keys(metadataFilters).length > 0) payload.metadata_filters = metadataFilters;
    }
    return payload;
  }

  public async search(query: string, options: SearchOptions = {}): Promise<SearchResults> {
    const payload = this.buildPayload(query, options);
    const searchPath = await this.routes.path('search');

    const response = parseResponse(
      searchResponseSchema,
      await this.transport.request('POST', searchPath, payload),
      `POST ${searchPath}`
    );
    const results = toSearchResults(response, query);

    this.logger.debug('Search complete', {
      semantic: results.length,
      structured: results.hasStructured,
      route: results.routing?.route,
      searchTimeMs: results.searchTimeMs,
    });
    return results;
  }
}
