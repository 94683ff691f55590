import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { InvalidArgumentError } from '../../common/errors/ledger.errors';
import { requireId } from '../../common/utils/require-id';
import { toPayloadList, toQuery } from '../../common/utils/serialization';
import { Timeslip } from '../../models/timeslip.model';
import { TimeslipFiltersDto } from './dto/timeslip-filters.dto';

const TIMESLIPS: ResourceDefinition<Timeslip> = {
  model: Timeslip,
  path: 'v2/timeslips',
  resource: 'timeslips',
  singular: 'timeslip',
  plural: 'timeslips',
};

@Injectable()
export class TimeslipsService extends CachedResourceService<Timeslip> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, TIMESLIPS);
  }

  async getAll(filters: TimeslipFiltersDto = {}): Promise<Timeslip[]> {
    return this.list(toQuery(TimeslipFiltersDto, filters));
  }

  async getByProject(projectUrl: string): Promise<Timeslip[]> {
    return this.getAll({ project: requireId(projectUrl, 'projectUrl') });
  }

  /**
   * Every timeslip of one user between two dates (inclusive), billed or not.
   */
  async getByUserAndDateRange(userUrl: string, fromDate: string, toDate: string): Promise<Timeslip[]> {
    return this.getAll({
      user: requireId(userUrl, 'userUrl'),
      fromDate,
      toDate,
      view: 'all',
    });
  }

  async create(timeslip: Partial<Timeslip>): Promise<Timeslip> {
    return this.insert(timeslip);
  }

  async createBatch(timeslips: readonly Partial<Timeslip>[]): Promise<Timeslip[]> {
    if (timeslips.length === 0) {
      throw new InvalidArgumentError('createBatch needs at least one timeslip');
    }

    return this.cacheService.mutateAndInvalidate(async () => {
      const created = this.readRecords(
        await this.apiClient.post(
          TIMESLIPS.path,
          toPayloadList(Timeslip, timeslips, TIMESLIPS.plural),
        ),
      );
      this.logger.debug(`Created ${created.length} timeslips`);
      return created;
    }, this.keys.invalidation());
  }

  async startTimer(id: string): Promise<Timeslip> {
    const timeslipId = requireId(id);
    return this.cacheService.mutateAndInvalidate(
      async () => this.readRecord(await this.apiClient.post(`${this.entityPath(timeslipId)}/timer`)),
      this.keys.invalidation(timeslipId),
    );
  }

  async stopTimer(id: string): Promise<Timeslip> {
    const timeslipId = requireId(id);
    return this.cacheService.mutateAndInvalidate(
      async () => this.readRecord(await this.apiClient.delete(`${this.entityPath(timeslipId)}/timer`)),
      this.keys.invalidation(timeslipId),
    );
  }
}
