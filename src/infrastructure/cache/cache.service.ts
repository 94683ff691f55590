import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheFetcher, CacheMutator, CacheOptions } from './cache.types';
import { CACHE_CONSTANTS } from './cache.constants';
import { CacheStoreService } from './cache-store.service';
import { ResourceCacheKeys } from './cache-keys';
import { Filters } from '../../common/utils/filters';
import { InvalidArgumentError } from '../../common/errors/ledger.errors';

/**
 * Cache-aside accessor shared by every resource service.
 *
 * @example
 * // Read path
 * const timeslip = await cacheService.getOrFetch(
 *   keys.entity(id),
 *   () => this.fetchTimeslip(id),
 * );
 *
 * // Write path: invalidate on success only
 * await cacheService.mutateAndInvalidate(
 *   () => this.apiClient.delete(`v2/timeslips/${id}`),
 *   keys.invalidation(id),
 * );
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);
  private readonly enabled: boolean;
  private readonly defaultTtl: number;
  private readonly registries = new Map<string, ResourceCacheKeys>();

  constructor(
    private readonly store: CacheStoreService,
    private readonly configService: ConfigService,
  ) {
    this.enabled = this.configService.get<boolean>('cache.enabled', true);
    this.defaultTtl = this.configService.get<number>('cache.ttl', CACHE_CONSTANTS.DEFAULT_TTL);

    if (!this.enabled) {
      this.logger.warn('Cache is disabled. Every read goes to the API.');
    }
  }

  /**
   * Key builder of a resource. Callers asking for the same resource share
   * one instance, hence one registry of list keys.
   *
   * @throws InvalidArgumentError when the resource is already registered
   * with other defaults
   */
  keysFor(resource: string, defaults: Filters = {}): ResourceCacheKeys {
    const existing = this.registries.get(resource);
    if (existing) {
      if (!existing.hasDefaults(defaults)) {
        throw new InvalidArgumentError(`"${resource}" is already registered with other defaults`);
      }
      return existing;
    }
    const keys = new ResourceCacheKeys(resource, defaults);
    this.registries.set(resource, keys);
    return keys;
  }

  private resolveTtl(options?: CacheOptions): number {
    const ttl = options?.ttl ?? this.defaultTtl;
    if (typeof ttl !== 'number' || !Number.isFinite(ttl) || ttl <= 0) {
      throw new InvalidArgumentError('ttl must be a positive finite number of seconds');
    }
    return ttl;
  }

  /**
   * Returns the fresh cached value for `key`, or runs `fetcher`, caches its
   * result and returns it.
   *
   * A fetcher failure is rethrown as is and nothing gets cached. Concurrent
   * misses on one key each run their own fetcher; the last write wins.
   */
  async getOrFetch<T>(key: string, fetcher: CacheFetcher<T>, options?: CacheOptions): Promise<T> {
    return this.read(key, fetcher, options);
  }

  /**
   * {@link getOrFetch} for a list of `keys`' resource. Once the list is
   * stored, its key is tracked so the resource's next mutation drops it.
   */
  async getOrFetchList<T>(
    keys: ResourceCacheKeys,
    filters: Filters,
    fetcher: CacheFetcher<T>,
    options?: CacheOptions,
  ): Promise<T> {
    const key = keys.collection(filters);
    return this.read(key, fetcher, options, (expiresAt) => keys.track(key, expiresAt));
  }

  private async read<T>(
    key: string,
    fetcher: CacheFetcher<T>,
    options: CacheOptions | undefined,
    onStored?: (expiresAt: number) => void,
  ): Promise<T> {
    const ttl = this.resolveTtl(options);

    if (!this.enabled) {
      return fetcher();
    }

    const cached = await this.store.get<T>(key);
    if (cached.found) {
      this.logger.debug(`Cache hit for "${key}"`);
      return cached.value;
    }

    this.logger.debug(`Cache miss for "${key}"`);
    const value = await fetcher();
    await this.store.set(key, value, ttl);
    onStored?.(Date.now() + ttl * 1000);
    return value;
  }

  /**
   * Runs `mutator`; once it has succeeded, removes every key in `keys`.
   * A failed mutation is rethrown and leaves the cache untouched.
   */
  async mutateAndInvalidate<T>(mutator: CacheMutator<T>, keys: readonly string[]): Promise<T> {
    const result = await mutator();

    if (this.enabled) {
      await this.invalidate(keys);
    }

    return result;
  }

  /**
   * Keys are untracked before they are removed: a list stored while the
   * removal is under way is tracked again and falls to the next mutation.
   */
  async invalidate(keys: readonly string[]): Promise<void> {
    const unique = [...new Set(keys)];
    for (const registry of this.registries.values()) {
      registry.forget(unique);
    }

    await Promise.all(unique.map((key) => this.store.remove(key)));

    this.logger.debug(`Invalidated ${unique.length} key(s): ${unique.join(', ')}`);
  }

  /**
   * Empties the whole backend (ATTENTION: not only this client's keys)
   */
  async reset(): Promise<void> {
    for (const registry of this.registries.values()) {
      registry.forget(registry.registeredCollections());
    }
    await this.store.clear();
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}
