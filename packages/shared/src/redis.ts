import type { RedisOptions } from 'ioredis';

/**
 * Connection options for every Redis client in the service, so BullMQ and
 * dialog state share one server and database. `rediss:` enables TLS.
 */
export function parseRedisUrl(url: string): RedisOptions {
  const parsed = new URL(url);
  if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
    throw new Error(`Unsupported Redis URL scheme "${parsed.protocol}"`);
  }

  const dbPath = parsed.pathname.replace(/^\//, '');
  const db = dbPath === '' ? 0 : Number(dbPath);
  if (!Number.isInteger(db) || db < 0) {
    throw new Error(`Invalid Redis database "${dbPath}" in REDIS_URL`);
  }

  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    // BullMQ workers block on Redis and require this.
    maxRetriesPerRequest: null,
  };
}
