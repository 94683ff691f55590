import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { toQuery } from '../../common/utils/serialization';
import { Project } from '../../models/project.model';
import { ProjectFiltersDto } from './dto/project-filters.dto';

const PROJECTS: ResourceDefinition<Project> = {
  model: Project,
  path: 'v2/projects',
  resource: 'projects',
  singular: 'project',
  plural: 'projects',
};

@Injectable()
export class ProjectsService extends CachedResourceService<Project> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, PROJECTS);
  }

  async getAll(filters: ProjectFiltersDto = {}): Promise<Project[]> {
    return this.list(toQuery(ProjectFiltersDto, filters));
  }

  async getAllActive(): Promise<Project[]> {
    return this.getAll({ view: 'active' });
  }

  async create(project: Partial<Project>): Promise<Project> {
    return this.insert(project);
  }
}
