import type { ZodType, ZodTypeDef } from "zod";

export interface CacheStore {
  /** Returns null for a miss and for a cached value that no longer matches the schema. */
  getJson<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null>;
  setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Increments a counter, starting its expiry window on the first hit. */
  increment(key: string, windowMs: number): Promise<{ count: number; ttlMs: number }>;
  decrement(key: string): Promise<void>;
}

export interface MessageBroker {
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, listener: (message: string) => void): Promise<void>;
}
