import { Redis } from "ioredis";
import { config } from "./config.js";
import { componentLogger } from "./logger.js";

const logger = componentLogger("redis");

let client: Redis | null = null;

export function getRedisClient(): Redis {
  if (!client) {
    const redis = new Redis(config.REDIS_URL, {
      lazyConnect: false,
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
    });

    redis.on("connect", () => {
      logger.info({ event: "redis_connect" }, "Redis connection established");
    });
    redis.on("error", (error: Error) => {
      logger.error({ error, event: "redis_error" }, "Redis client error");
    });
    redis.on("close", () => {
      logger.warn({ event: "redis_close" }, "Redis connection closed");
    });

    client = redis;
  }

  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) {
    return;
  }

  const redis = client;
  client = null;

  try {
    await redis.quit();
  } catch (error) {
    logger.warn({ error, event: "redis_quit_error" }, "Error quitting Redis connection");
  }
  redis.removeAllListeners();
}
