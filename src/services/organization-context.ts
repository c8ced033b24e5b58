// src/services/organization-context.ts

import { ApiKeyContext, apiKeyContextSchema } from '../models/project.model';
import { Logger } from './base/types';
import { Transport, parseResponse } from './transport.service';

export type OrganizationState =
  | { readonly status: 'unresolved' }
  | { readonly status: 'resolved'; readonly context: ApiKeyContext };

/**
 * Resolves what the API key belongs to on first use and keeps it for the
 * lifetime of the client. Nothing invalidates it.
 *
 * Lookups started before the first one finishes each send their own request.
 * They all receive the same answer, and whichever settles last stores it.
 */
export class OrganizationContext {
  private state: OrganizationState = { status: 'unresolved' };

  constructor(
    private readonly transport: Transport,
    private readonly mePath: string,
    private readonly logger: Logger
  ) {}

  public get current(): OrganizationState {
    return this.state;
  }

  public async resolve(): Promise<ApiKeyContext> {
    if (this.state.status === 'resolved') {
      return this.state.context;
    }
    const response = await this.transport.request('GET', this.mePath);
    const context = parseResponse(apiKeyContextSchema, response, `GET ${this.mePath}`);
    this.state = { status: 'resolved', context };
    this.logger.info('Resolved API key context', { organizationId: context.organizationId });
    return context;
  }

  public async getOrganizationId(): Promise<string> {
    const context = await this.resolve();
    return context.organizationId;
  }
}
