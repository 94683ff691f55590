import { Module, Global } from '@nestjs/common';
import { CacheModule as NestCacheModule } from '@nestjs/cache-manager';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Keyv } from 'keyv';
import KeyvRedis from '@keyv/redis';
import { CacheStoreService } from './cache-store.service';
import { CacheService } from './cache.service';
import { CACHE_CONSTANTS } from './cache.constants';

/**
 * Global cache module.
 *
 * Entries live in process memory unless CACHE_REDIS_URL points at a Redis
 * server shared by several processes.
 */
@Global()
@Module({
  imports: [
    NestCacheModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const redisUrl = configService.get<string>('cache.redisUrl');
        const keyv = redisUrl
          ? new Keyv({ store: new KeyvRedis(redisUrl) })
          : new Keyv();

        return {
          stores: [keyv],
          // cache-manager expects milliseconds
          ttl: configService.get<number>('cache.ttl', CACHE_CONSTANTS.DEFAULT_TTL) * 1000,
        };
      },
      inject: [ConfigService],
    }),
  ],
  providers: [CacheStoreService, CacheService],
  exports: [CacheStoreService, CacheService],
})
export class CacheModule {}
