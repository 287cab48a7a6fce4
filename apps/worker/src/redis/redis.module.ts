import { Global, Inject, Logger, Module, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { WorkerConfigService } from '../config/config.service';
import { REDIS_CLIENT } from './redis.constants';

const logger = new Logger('Redis');

/**
 * Shared ioredis client for the pattern store and price history.
 * Connects lazily, so a worker running on the memory store never opens a
 * connection.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [WorkerConfigService],
      useFactory: (config: WorkerConfigService): Redis => {
        const redisConfig = config.redis;
        const client = new Redis({
          host: redisConfig.host,
          port: redisConfig.port,
          password: redisConfig.password,
          db: redisConfig.db,
          maxRetriesPerRequest: null,
          lazyConnect: true,
        });

        client.on('error', (error: Error) => {
          logger.error(`Redis connection error: ${error.message}`, error.stack);
        });

        client.on('connect', () => {
          logger.log(`Redis connected to ${redisConfig.host}:${redisConfig.port}`);
        });

        return client;
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnModuleDestroy {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  /**
   * Cleanup method for graceful shutdown
   */
  async onModuleDestroy() {
    if (this.redis.status === 'wait') {
      this.redis.disconnect();
      return;
    }
    await this.redis.quit();
    logger.log('Redis connection closed');
  }
}
