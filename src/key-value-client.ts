import Redis from 'ioredis';

/** The handful of string commands the Redis-backed stores need. */
export interface IKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
}

export class IORedisKeyValueClient implements IKeyValueClient {
  constructor(private readonly redis: Redis) {}

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined) {
      await this.redis.set(key, value, 'EX', ttlSeconds);
      return;
    }
    await this.redis.set(key, value);
  }
}

export function createRedisClient(url: string = process.env.REDIS_URL ?? 'redis://localhost:6379') {
  return new IORedisKeyValueClient(new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 }));
}
