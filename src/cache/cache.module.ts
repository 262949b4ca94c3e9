import { Module, Global, Logger } from '@nestjs/common';
import { CacheModule as NestCacheModule, CacheOptions } from '@nestjs/cache-manager';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { createKeyv } from '@keyv/redis';
import { CacheService } from '../common/services/cache.service';

@Global()
@Module({
  imports: [
    NestCacheModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService): CacheOptions => {
        const redisUrl = configService.get<string>('REDIS_URL');
        if (!redisUrl) {
          new Logger('CacheModule').log(
            'REDIS_URL not set, using the in-memory cache store'
          );
          return { ttl: 300000 };
        }
        return {
          stores: [createKeyv(redisUrl)],
          ttl: 300000, // 5 minutes in milliseconds
        };
      },
      inject: [ConfigService],
    }),
  ],
  providers: [CacheService],
  exports: [CacheService],
})
export class CacheModule {}
