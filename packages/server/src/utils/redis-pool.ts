// packages/server/src/utils/redis-pool.ts
import IORedis from "ioredis";
import type { Redis as RedisClient } from "ioredis";
import { logger } from "../logging";

let _client: RedisClient | null = null;

export function getRedis(url: string): RedisClient {
  if (_client) return _client;

  _client = new IORedis(url, {
    maxRetriesPerRequest: 1,
    lazyConnect: false,
    enableReadyCheck: true,
  });
  _client.on("error", (err) => logger.error({ err }, "Redis connection error"));
  return _client;
}

export async function disconnectRedis(): Promise<void> {
  if (_client) {
    const client = _client;
    _client = null;
    try {
      await client.quit();
    } catch (err) {
      logger.warn({ err }, "Redis quit failed; disconnecting");
      client.disconnect();
    }
  }
}
