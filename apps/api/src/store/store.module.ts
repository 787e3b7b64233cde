import { Global, Logger, Module } from '@nestjs/common';
import Redis from 'ioredis';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { InMemoryKeyValueStore } from './in-memory-kv.store';
import { KV_STORE, type KeyValueStore } from './kv-store.types';
import { RedisKeyValueStore } from './redis-kv.store';

const logger = new Logger('StoreModule');

function createStore(config: AppConfig): KeyValueStore {
  if (config.store.driver === 'memory') {
    logger.warn('Using the in-memory store; data is lost on exit');
    return new InMemoryKeyValueStore();
  }
  const redis = new Redis(config.store.redisUrl, {
    maxRetriesPerRequest: 3,
  });
  redis.on('error', (err: Error) => {
    logger.error(`Redis connection error: ${err.message}`);
  });
  return new RedisKeyValueStore(redis, config.store.namespace);
}

@Global()
@Module({
  providers: [
    {
      provide: KV_STORE,
      useFactory: createStore,
      inject: [APP_CONFIG],
    },
  ],
  exports: [KV_STORE],
})
export class StoreModule {}
