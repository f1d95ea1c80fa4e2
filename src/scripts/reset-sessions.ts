import dotenv from "dotenv";
import { resolveAppConfig } from "../config/appConfig.js";
import { createRedisClient, RedisSessionStore } from "../store/session-store.js";
import { logger } from "../observability/logger.js";

/** Delete every stored session under the configured key prefix. */
async function main(): Promise<void> {
  dotenv.config();
  const config = resolveAppConfig();
  const client = createRedisClient(config.redis.url);
  if (!client) {
    logger.warn("REDIS_URL not set, nothing to reset");
    return;
  }
  const store = new RedisSessionStore({ client, keyPrefix: config.redis.keyPrefix, ttlSeconds: config.redis.ttlSeconds });
  try {
    const removed = await store.clearAll();
    logger.info({ removed, keyPrefix: config.redis.keyPrefix }, "Sessions cleared");
  } finally {
    client.disconnect();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, "Session reset failed");
  process.exitCode = 1;
});
