import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { requireId } from '../../common/utils/require-id';
import { toQuery } from '../../common/utils/serialization';
import { Task } from '../../models/task.model';
import { TaskFiltersDto } from './dto/task-filters.dto';

const TASKS: ResourceDefinition<Task> = {
  model: Task,
  path: 'v2/tasks',
  resource: 'tasks',
  singular: 'task',
  plural: 'tasks',
};

@Injectable()
export class TasksService extends CachedResourceService<Task> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, TASKS);
  }

  async getAll(filters: TaskFiltersDto = {}): Promise<Task[]> {
    return this.list(toQuery(TaskFiltersDto, filters));
  }

  async getAllByProject(projectUrl: string): Promise<Task[]> {
    return this.getAll({ project: requireId(projectUrl, 'projectUrl') });
  }

  /**
   * Tasks belong to a project, which the API takes as a query parameter.
   */
  async create(projectUrl: string, task: Partial<Task>): Promise<Task> {
    return this.insert(task, { project: requireId(projectUrl, 'projectUrl') });
  }
}
