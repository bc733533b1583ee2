import { Redis, type RedisOptions } from 'ioredis';

const CONNECT_TIMEOUT_MS = 5000;

export function parseRedisOptions(redisUrlRaw: string): RedisOptions {
  const redisUrl = new URL(redisUrlRaw);
  const redisDbPath = redisUrl.pathname.replace('/', '');

  return {
    lazyConnect: false,
    // BullMQ workers block on Redis and require this to be disabled.
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    connectTimeout: CONNECT_TIMEOUT_MS,
    ...(redisUrl.protocol.startsWith('rediss') ? { tls: {} } : {}),
    host: redisUrl.hostname,
    port: Number.parseInt(redisUrl.port || '6379', 10),
    password: redisUrl.password || undefined,
    username: redisUrl.username || undefined,
    db: Number.parseInt(redisDbPath || '0', 10),
  };
}

export function createRedisConnection(redisUrl: string): Redis {
  return new Redis(parseRedisOptions(redisUrl));
}

export interface RedisHealthClient {
  ping(): Promise<string>;
}

export async function pingRedis(redis: RedisHealthClient): Promise<'connected' | 'disconnected'> {
  try {
    const result = await redis.ping();
    return result.toUpperCase() === 'PONG' ? 'connected' : 'disconnected';
  } catch {
    return 'disconnected';
  }
}
