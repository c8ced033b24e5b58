// src/services/project.service.ts

import { Project, projectResponseSchema } from '../models/project.model';
import { BaseService } from './base/BaseService';
import { parseResponse } from './transport.service';

export class ProjectService extends BaseService {
  public async listProjects(): Promise<Project[]> {
    const path = await this.routes.path('projects');
    const response = await this.transport.request('GET', path);

    if (!Array.isArray(response)) {
      this.logger.warn('Project listing did not return an array', { path });
      return [];
    }
    return response.map((item: unknown) => parseResponse(projectResponseSchema, item, `GET ${path}`));
  }
}
