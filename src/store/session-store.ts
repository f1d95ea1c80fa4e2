import { Redis } from "ioredis";
import type { SessionRecord } from "../langgraph/state.js";
import { createLogger } from "../observability/logger.js";

const log = createLogger("session-store");

// The subset of ioredis the store relies on.
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, patternToken: "MATCH", pattern: string, countToken: "COUNT", count: number): Promise<[string, string[]]>;
}

export type StoreStatus = {
  backend: "redis" | "memory";
  fallbackEntries: number;
};

export interface SessionStore {
  /** Raw stored record, or null when the user has no session. */
  load(userId: string): Promise<unknown>;
  /** Persists the record with a fresh `last_updated` and returns what was written. */
  save(userId: string, record: SessionRecord): Promise<SessionRecord>;
  delete(userId: string): Promise<boolean>;
  /** Removes every session under the store's prefix. Returns the number removed. */
  clearAll(): Promise<number>;
  status(): StoreStatus;
}

export type RedisSessionStoreOptions = {
  client: KeyValueClient | null;
  keyPrefix: string;
  ttlSeconds: number;
  now?: () => number;
};

function parseRecord(raw: string | null | undefined, key: string): unknown {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    log.warn({ key, err: error }, "Stored session is not valid JSON, treating as new");
    return null;
  }
}

/**
 * Session persistence on Redis with a TTL per key. Whenever Redis is missing
 * or a command fails, the store degrades to a Map owned by this instance.
 * The fallback is best-effort: nothing in it is copied back to Redis later.
 */
export class RedisSessionStore implements SessionStore {
  private readonly client: KeyValueClient | null;
  private readonly keyPrefix: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly fallback = new Map<string, string>();

  constructor(options: RedisSessionStoreOptions) {
    this.client = options.client;
    this.keyPrefix = options.keyPrefix;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
  }

  keyFor(userId: string): string {
    return `${this.keyPrefix}user:${userId}`;
  }

  async load(userId: string): Promise<unknown> {
    const key = this.keyFor(userId);
    if (!this.client) return parseRecord(this.fallback.get(key), key);
    try {
      return parseRecord(await this.client.get(key), key);
    } catch (error) {
      log.warn({ key, err: error }, "Redis read failed, using in-memory fallback");
      return parseRecord(this.fallback.get(key), key);
    }
  }

  async save(userId: string, record: SessionRecord): Promise<SessionRecord> {
    const key = this.keyFor(userId);
    const written: SessionRecord = { ...record, last_updated: this.now() };
    const payload = JSON.stringify(written);
    if (!this.client) {
      this.fallback.set(key, payload);
      return written;
    }
    try {
      await this.client.set(key, payload, "EX", this.ttlSeconds);
    } catch (error) {
      log.warn({ key, err: error }, "Redis write failed, using in-memory fallback");
      this.fallback.set(key, payload);
    }
    return written;
  }

  async delete(userId: string): Promise<boolean> {
    const key = this.keyFor(userId);
    const removedLocally = this.fallback.delete(key);
    if (!this.client) return removedLocally;
    try {
      return (await this.client.del(key)) > 0 || removedLocally;
    } catch (error) {
      log.warn({ key, err: error }, "Redis delete failed");
      return removedLocally;
    }
  }

  async clearAll(): Promise<number> {
    let removed = 0;
    for (const key of [...this.fallback.keys()]) {
      if (key.startsWith(this.keyPrefix)) {
        this.fallback.delete(key);
        removed += 1;
      }
    }
    if (!this.client) return removed;

    let cursor = "0";
    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", `${this.keyPrefix}user:*`, "COUNT", 100);
      if (keys.length) removed += await this.client.del(...keys);
      cursor = next;
    } while (cursor !== "0");
    return removed;
  }

  status(): StoreStatus {
    return { backend: this.client ? "redis" : "memory", fallbackEntries: this.fallback.size };
  }
}

/**
 * Connect to Redis when a URL is configured. Commands fail fast while the
 * connection is down so turns fall back instead of queueing.
 */
export function createRedisClient(url: string | null): Redis | null {
  if (!url) return null;
  const client = new Redis(url, {
    connectTimeout: 5000,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  });
  client.on("error", (error: Error) => {
    log.warn({ err: error }, "Redis connection error");
  });
  return client;
}
