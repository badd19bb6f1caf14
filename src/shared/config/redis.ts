import { createClient } from "redis";
import type { ZodType, ZodTypeDef } from "zod";
import type { Config } from "./environment";
import { createModuleLogger } from "./logger";
import type { CacheStore, MessageBroker } from "@/shared/types/cache.types";

const moduleLogger = createModuleLogger("Redis");

type RedisClient = ReturnType<typeof createClient>;

export class RedisManager implements CacheStore, MessageBroker {
  private readonly client: RedisClient;
  private readonly publisher: RedisClient;
  private readonly subscriber: RedisClient;

  constructor(redis: Config["redis"]) {
    const redisConfig = {
      socket: {
        host: redis.host,
        port: redis.port,
      },
      ...(redis.password && { password: redis.password }),
      database: redis.db,
    };

    this.client = createClient(redisConfig);
    this.publisher = createClient(redisConfig);
    this.subscriber = createClient(redisConfig);

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.on("connect", () => moduleLogger.info("✅ Redis client connected"));
    this.client.on("error", (error: unknown) => moduleLogger.error({ error }, "❌ Redis client error"));

    this.publisher.on("connect", () => moduleLogger.info("✅ Redis publisher connected"));
    this.publisher.on("error", (error: unknown) => moduleLogger.error({ error }, "❌ Redis publisher error"));

    this.subscriber.on("connect", () => moduleLogger.info("✅ Redis subscriber connected"));
    this.subscriber.on("error", (error: unknown) => moduleLogger.error({ error }, "❌ Redis subscriber error"));
  }

  public async connect(): Promise<void> {
    await Promise.all([this.client.connect(), this.publisher.connect(), this.subscriber.connect()]);
    moduleLogger.info("✅ All Redis connections established");
  }

  public async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch (error) {
      moduleLogger.warn({ error }, "Redis health check failed");
      return false;
    }
  }

  // Cache operations
  public async setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const serializedValue = JSON.stringify(value);

    if (ttlSeconds) {
      await this.client.setEx(key, ttlSeconds, serializedValue);
    } else {
      await this.client.set(key, serializedValue);
    }
  }

  public async getJson<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const value = await this.client.get(key);

    if (!value) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(value);
    } catch (error) {
      moduleLogger.warn({ key, error }, "Discarding unparseable cache entry");
      await this.client.del(key);
      return null;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      moduleLogger.warn({ key, issues: parsed.error.issues }, "Discarding stale cache entry");
      await this.client.del(key);
      return null;
    }

    return parsed.data;
  }

  public async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  public async exists(key: string): Promise<boolean> {
    const result = await this.client.exists(key);
    return result === 1;
  }

  // Rate limiting
  public async increment(key: string, windowMs: number): Promise<{ count: number; ttlMs: number }> {
    const count = await this.client.incr(key);

    if (count === 1) {
      await this.client.pExpire(key, windowMs);
      return { count, ttlMs: windowMs };
    }

    const ttlMs = await this.client.pTTL(key);
    return { count, ttlMs: ttlMs > 0 ? ttlMs : windowMs };
  }

  public async decrement(key: string): Promise<void> {
    await this.client.decr(key);
  }

  // Pub/Sub operations
  public async publish(channel: string, message: string): Promise<void> {
    await this.publisher.publish(channel, message);
  }

  public async subscribe(channel: string, listener: (message: string) => void): Promise<void> {
    await this.subscriber.subscribe(channel, (message: string) => listener(message));
  }

  public async close(): Promise<void> {
    try {
      await Promise.all([this.client.quit(), this.publisher.quit(), this.subscriber.quit()]);
      moduleLogger.info("Redis connections closed");
    } catch (error) {
      moduleLogger.error({ error }, "Error closing Redis connections");
    }
  }
}
