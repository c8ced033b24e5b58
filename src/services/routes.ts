// src/services/routes.ts

import { RouteProfileName } from '../config';
import { ValidationError } from '../errors';
import type { OrganizationContext } from './organization-context';

export type RouteName = 'me' | 'projects' | 'fileInit' | 'fileConfirm' | 'fileStatus' | 'file' | 'search';

/** Path templates relative to the base URL. Placeholders: {org}, {project}, {file}. */
export type RouteTemplates = Record<RouteName, string>;

export interface RouteParams {
  project?: string;
  file?: string;
}

// Deployments expose the same operations under two layouts: organization-scoped
// paths, and an /sdk prefix where the API key itself fixes the organization and project.
export const ROUTE_PROFILES: Record<RouteProfileName, RouteTemplates> = {
  organization: {
    me: '/api-keys/me',
    projects: '/organizations/{org}/projects/',
    fileInit: '/projects/{project}/files/init',
    fileConfirm: '/projects/{project}/files/{file}/confirm',
    fileStatus: '/projects/{project}/files/{file}/status',
    file: '/projects/{project}/files/{file}',
    search: '/organizations/{org}/search/',
  },
  sdk: {
    me: '/sdk/me',
    projects: '/sdk/projects',
    fileInit: '/sdk/files/init',
    fileConfirm: '/sdk/files/{file}/confirm',
    fileStatus: '/sdk/files/{file}/status',
    file: '/sdk/files/{file}',
    search: '/sdk/search',
  },
};

const PLACEHOLDER = /\{([^{}]*)\}/g;
const KNOWN_PLACEHOLDERS = new Set(['org', 'project', 'file']);

const placeholdersOf = (template: string): string[] => Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);

/**
 * Merges caller overrides into a built-in profile and checks every template.
 * The `me` route resolves the organization, so it cannot depend on it.
 */
export function resolveRouteTemplates(
  profile: RouteProfileName,
  overrides: Partial<RouteTemplates> = {}
): RouteTemplates {
  const templates: RouteTemplates = { ...ROUTE_PROFILES[profile], ...overrides };

  for (const [name, template] of Object.entries(templates)) {
    if (!template.startsWith('/')) {
      throw new ValidationError(`Route '${name}' must start with '/', got '${template}'`);
    }
    const unknown = placeholdersOf(template).filter((key) => !KNOWN_PLACEHOLDERS.has(key));
    if (unknown.length > 0) {
      throw new ValidationError(`Route '${name}' uses unknown placeholder {${unknown[0]}}`);
    }
  }
  if (placeholdersOf(templates.me).length > 0) {
    throw new ValidationError(`Route 'me' cannot contain placeholders, got '${templates.me}'`);
  }
  return templates;
}

export class RouteResolver {
  constructor(
    private readonly templates: RouteTemplates,
    private readonly organization: OrganizationContext
  ) {}

  /**
   * Expands a route into a request path. The organization id is looked up
   * only for templates that contain {org}.
   */
  public async path(name: RouteName, params: RouteParams = {}): Promise<string> {
    const template = this.templates[name];
    const keys = placeholdersOf(template);
    const values: Record<string, string | undefined> = {
      project: params.project,
      file: params.file,
    };
    if (keys.includes('org')) {
      values.org = await this.organization.getOrganizationId();
    }

    return template.replace(PLACEHOLDER, (_match, key: string) => {
      const value = values[key];
      if (value === undefined || value === '') {
        throw new ValidationError(`Route '${name}' needs a ${key} id`);
      }
      return encodeURIComponent(value);
    });
  }
}
