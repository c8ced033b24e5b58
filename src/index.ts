// DocSearch Node.js client: file uploads and semantic search.

export { SDK_VERSION } from './version';

// Client
export { DocSearchClient } from './client';
export type { DocSearchClientOptions } from './client';

// Types
export {
  FILE_STATUSES,
  isFailed,
  isFileStatus,
  isProcessing,
  isTerminal,
} from './models/file.model';
export type { FileRecord, FileStatus } from './models/file.model';
export type { ApiKeyContext, Project } from './models/project.model';
export { toApiFormat } from './models/filters.model';
export type { MetadataFilters, MetadataFiltersPayload, PageRange } from './models/filters.model';
export { SearchResults } from './models/search.model';
export type {
  BoundingBoxes,
  ColumnInfo,
  ResultsContainer,
  SearchResult,
  SearchRouting,
  StructuredResult,
} from './models/search.model';
export type { SearchOptions } from './services/search.service';
export type { UploadOptions, WaitOptions } from './services/upload.service';
export { ROUTE_PROFILES } from './services/routes';
export type { RouteName, RouteTemplates } from './services/routes';
export type { Logger } from './services/base/types';

// Errors
export {
  APIError,
  AuthenticationError,
  ConnectionError,
  DocSearchError,
  FileNotFoundError,
  NotFoundError,
  PollTimeoutError,
  ProcessingError,
  ValidationError,
} from './errors';
