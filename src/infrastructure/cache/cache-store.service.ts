import { Injectable, Inject, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { ConfigService } from '@nestjs/config';
import { CacheEntry, CacheLookup } from './cache.types';
import { CACHE_CONSTANTS } from './cache.constants';
import { errorMessage, errorStack } from '../../common/utils/error-details';

/**
 * Process-wide key/value store with per-entry expiry.
 *
 * Values are boxed in a {@link CacheEntry} so that `null` and `undefined`
 * results are hits like any other value. Backend failures are logged and
 * read as misses: the store never throws.
 */
@Injectable()
export class CacheStoreService {
  private readonly logger = new Logger(CacheStoreService.name);
  private readonly namespace: string;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
    private readonly configService: ConfigService,
  ) {
    this.namespace = this.configService.get<string>(
      'cache.namespace',
      CACHE_CONSTANTS.DEFAULT_NAMESPACE,
    );
  }

  /**
   * Format: {namespace}:{key}
   */
  private buildKey(key: string): string {
    return [this.namespace, key].join(CACHE_CONSTANTS.KEY_SEPARATOR);
  }

  async get<T>(key: string): Promise<CacheLookup<T>> {
    let entry: CacheEntry<T> | undefined;
    try {
      // cache-manager may return null for a missing key
      entry = (await this.cacheManager.get<CacheEntry<T>>(this.buildKey(key))) ?? undefined;
    } catch (error) {
      this.logger.error(`Error getting cache key "${key}": ${errorMessage(error)}`, errorStack(error));
      return { found: false };
    }

    if (!entry) {
      return { found: false };
    }

    if (Date.now() >= entry.expiresAt) {
      await this.remove(key);
      return { found: false };
    }

    return { found: true, value: entry.value };
  }

  /**
   * Stores `value` under `key` for `ttl` seconds, replacing any previous entry.
   */
  async set<T>(key: string, value: T, ttl: number): Promise<void> {
    const ttlMs = ttl * 1000;
    const entry: CacheEntry<T> = { value, expiresAt: Date.now() + ttlMs };

    try {
      await this.cacheManager.set(this.buildKey(key), entry, ttlMs);
    } catch (error) {
      this.logger.error(`Error setting cache key "${key}": ${errorMessage(error)}`, errorStack(error));
    }
  }

  async remove(key: string): Promise<void> {
    try {
      await this.cacheManager.del(this.buildKey(key));
    } catch (error) {
      this.logger.error(`Error deleting cache key "${key}": ${errorMessage(error)}`, errorStack(error));
    }
  }

  /**
   * Drops every entry of the backend, not only this namespace's.
   */
  async clear(): Promise<void> {
    try {
      await this.cacheManager.clear();
      this.logger.warn('Cache has been reset');
    } catch (error) {
      this.logger.error(`Error resetting cache: ${errorMessage(error)}`, errorStack(error));
    }
  }
}
