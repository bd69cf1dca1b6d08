import { Global, Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { RedisService } from './redis.service';
import { KeyValueStore } from './key-value-store';
import { CacheService } from './cache.service';
import { CacheInvalidationService } from './cache-invalidation.service';

@Global()
@Module({
  imports: [AppConfigModule],
  providers: [
    RedisService,
    { provide: KeyValueStore, useExisting: RedisService },
    CacheService,
    CacheInvalidationService,
  ],
  exports: [CacheService, CacheInvalidationService],
})
export class RedisModule {}
