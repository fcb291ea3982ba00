import Redis from "ioredis";
import { logger } from "./lib/logger";

export function createRedis(url: string): Redis {
  const redis = new Redis(url, { maxRetriesPerRequest: 3, lazyConnect: true });
  redis.on("error", (err: Error) => logger.error("Redis error", { error: err.message }));
  return redis;
}
