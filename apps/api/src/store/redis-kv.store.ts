import { Logger, type OnModuleDestroy } from '@nestjs/common';
import type Redis from 'ioredis';
import type { KeyValueStore } from './kv-store.types';

export type RedisClient = Pick<Redis, 'get' | 'set' | 'del' | 'scan' | 'quit'>;

const SCAN_COUNT = 200;

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, (c) => `\\${c}`);
}

export class RedisKeyValueStore implements KeyValueStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisKeyValueStore.name);
  private readonly prefix: string;

  constructor(
    private readonly redis: RedisClient,
    namespace: string,
  ) {
    this.prefix = namespace ? `${namespace}:` : '';
  }

  async get(key: string): Promise<string | null> {
    return await this.redis.get(this.prefix + key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(this.prefix + key, value);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }

  async keys(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(this.prefix + prefix)}*`;
    const found = new Set<string>();
    let cursor = '0';
    do {
      const [nextCursor, batch] = await this.redis.scan(
        cursor,
        'MATCH',
        pattern,
        'COUNT',
        SCAN_COUNT,
      );
      cursor = nextCursor;
      for (const k of batch) found.add(k.slice(this.prefix.length));
    } while (cursor !== '0');
    return [...found];
  }

  async onModuleDestroy() {
    try {
      await this.redis.quit();
    } catch (err) {
      this.logger.warn(
        `Redis quit failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
