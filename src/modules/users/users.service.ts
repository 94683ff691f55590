import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { toQuery } from '../../common/utils/serialization';
import { User } from '../../models/user.model';
import { UserFiltersDto } from './dto/user-filters.dto';

const USERS: ResourceDefinition<User> = {
  model: User,
  path: 'v2/users',
  resource: 'users',
  singular: 'user',
  plural: 'users',
};

function byLastName(a: User, b: User): number {
  return (a.lastName ?? '').localeCompare(b.lastName ?? '');
}

@Injectable()
export class UsersService extends CachedResourceService<User> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, USERS);
  }

  async getAll(filters: UserFiltersDto = {}): Promise<User[]> {
    return this.list(toQuery(UserFiltersDto, filters));
  }

  /**
   * Visible users with the Employee role, by last name.
   */
  async getAllActiveEmployees(): Promise<User[]> {
    return this.visibleWithRole('Employee', byLastName);
  }

  async getAllDirectors(): Promise<User[]> {
    return this.visibleWithRole('Director');
  }

  async create(user: Partial<User>): Promise<User> {
    return this.insert(user);
  }

  private async visibleWithRole(
    role: string,
    order?: (a: User, b: User) => number,
  ): Promise<User[]> {
    return this.cacheService.getOrFetchList(this.keys, { role, hidden: false }, async () => {
      const users = (await this.getAll()).filter((user) => user.hidden === false && user.role === role);
      return order ? users.sort(order) : users;
    });
  }
}
