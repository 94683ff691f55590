import { Logger } from '@nestjs/common';
import { ClassConstructor } from 'class-transformer';
import { ApiClientService, QueryParams } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import { ResourceCacheKeys } from '../../infrastructure/cache/cache-keys';
import { Filters } from '../utils/filters';
import { requireId } from '../utils/require-id';
import { toPayload, toRecord, toRecords } from '../utils/serialization';

export interface ResourceDefinition<T extends object> {
  model: ClassConstructor<T>;
  /** Endpoint relative to the API root, e.g. `v2/timeslips` */
  path: string;
  /** Prefix of the resource's cache keys */
  resource: string;
  /** Envelope of one record */
  singular: string;
  /** Envelope of a list */
  plural: string;
  /** Filter values the API applies when the filter is omitted */
  defaults?: Filters;
}

/**
 * Reads and writes of one API resource through the cache-aside layer.
 * Reads go through `getOrFetch`, writes through `mutateAndInvalidate` with
 * keys from the resource's {@link ResourceCacheKeys}.
 */
export abstract class CachedResourceService<T extends object> {
  protected readonly logger: Logger;
  protected readonly keys: ResourceCacheKeys;

  protected constructor(
    protected readonly apiClient: ApiClientService,
    protected readonly cacheService: CacheService,
    protected readonly definition: ResourceDefinition<T>,
  ) {
    this.logger = new Logger(new.target.name);
    this.keys = cacheService.keysFor(definition.resource, definition.defaults);
  }

  async getById(id: string): Promise<T> {
    const recordId = requireId(id);
    return this.cacheService.getOrFetch(this.keys.entity(recordId), async () =>
      this.readRecord(await this.apiClient.get(this.entityPath(recordId))),
    );
  }

  /**
   * POST to the collection endpoint. A new record can show up in any list,
   * so every list key of the resource is invalidated.
   */
  protected async insert(input: Partial<T>, query?: QueryParams): Promise<T> {
    return this.cacheService.mutateAndInvalidate(async () => {
      const created = this.readRecord(
        await this.apiClient.post(this.definition.path, this.payload(input), query),
      );
      this.logger.debug(`Created ${this.definition.singular}`);
      return created;
    }, this.keys.invalidation());
  }

  async update(id: string, changes: Partial<T>): Promise<T> {
    const recordId = requireId(id);
    return this.cacheService.mutateAndInvalidate(async () => {
      const updated = this.readRecord(
        await this.apiClient.put(this.entityPath(recordId), this.payload(changes)),
      );
      this.logger.debug(`Updated ${this.definition.singular} ${recordId}`);
      return updated;
    }, this.keys.invalidation(recordId));
  }

  async delete(id: string): Promise<void> {
    const recordId = requireId(id);
    await this.cacheService.mutateAndInvalidate(async () => {
      await this.apiClient.delete(this.entityPath(recordId));
      this.logger.debug(`Deleted ${this.definition.singular} ${recordId}`);
    }, this.keys.invalidation(recordId));
  }

  /**
   * Cached list read. `query` holds wire names, as produced by `toQuery`.
   */
  protected async list(query: QueryParams = {}): Promise<T[]> {
    return this.cacheService.getOrFetchList(this.keys, query, async () =>
      this.readRecords(await this.apiClient.get(this.definition.path, query)),
    );
  }

  protected entityPath(id: string): string {
    return `${this.definition.path}/${encodeURIComponent(id)}`;
  }

  protected payload(input: Partial<T>): Record<string, unknown> {
    return toPayload(this.definition.model, input, this.definition.singular);
  }

  protected readRecord(body: unknown): T {
    return toRecord(this.definition.model, body, this.definition.singular);
  }

  protected readRecords(body: unknown): T[] {
    return toRecords(this.definition.model, body, this.definition.plural);
  }
}
