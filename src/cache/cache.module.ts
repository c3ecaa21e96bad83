import { Global, Module } from '@nestjs/common';
import { caching } from 'cache-manager';
import type { Cache } from 'cache-manager';
import { redisStore } from 'cache-manager-redis-yet';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';

export const CACHE_TOKEN = Symbol('LINK_MONITOR_CACHE');

/** 엔드포인트 매핑 캐시. LINK_MONITOR_REDIS_URL 이 있으면 Redis, 없으면 프로세스 메모리. */
@Global()
@Module({
  providers: [
    {
      provide: CACHE_TOKEN,
      inject: [MONITOR_CONFIG],
      useFactory: async (config: MonitorConfig): Promise<Cache> => {
        const ttl = config.hubble.endpointCacheTtlMs;

        if (config.redisUrl) {
          const store = await redisStore({
            url: config.redisUrl,
            ttl,
          });
          return caching(store);
        }

        return caching('memory', {
          ttl,
          max: 10_000,
        });
      },
    },
  ],
  exports: [CACHE_TOKEN],
})
export class CacheModule {}
