import express from "express";
import request from "supertest";
import { afterEach, describe, expect, it, vi } from "vitest";
import { InMemoryCacheStore } from "@/__tests__/helpers/in-memory-stores";
import { CacheRateLimitStore, createRateLimiters } from "../rate-limit.middleware";

describe("CacheRateLimitStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("counts hits per key under its prefix", async () => {
    const cache = new InMemoryCacheStore();
    const store = new CacheRateLimitStore(cache, "general");

    await store.increment("10.0.0.1");
    const second = await store.increment("10.0.0.1");
    const other = await store.increment("10.0.0.2");

    expect(second.totalHits).toBe(2);
    expect(other.totalHits).toBe(1);
    expect(await cache.exists("rate_limit:general:10.0.0.1")).toBe(true);
  });

  it("reports when the window resets", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-03-01T08:00:00Z"));
    const store = new CacheRateLimitStore(new InMemoryCacheStore(), "general");

    const info = await store.increment("10.0.0.1");

    expect(info.resetTime).toEqual(new Date("2025-03-01T08:01:00Z"));
  });

  it("decrements and resets keys", async () => {
    const store = new CacheRateLimitStore(new InMemoryCacheStore(), "booking");

    await store.increment("patient-1");
    await store.increment("patient-1");
    await store.decrement("patient-1");
    expect((await store.increment("patient-1")).totalHits).toBe(2);

    await store.resetKey("patient-1");
    expect((await store.increment("patient-1")).totalHits).toBe(1);
  });
});

describe("createRateLimiters", () => {
  const appWith = (maxRequests: number) => {
    const limiters = createRateLimiters(new InMemoryCacheStore(), { windowMs: 60_000, maxRequests });
    const app = express();
    app.use(limiters.general);
    app.get("/health", (_req, res) => {
      res.json({ ok: true });
    });
    app.get("/things", (_req, res) => {
      res.json({ ok: true });
    });
    return app;
  };

  it("rejects requests over the limit with the standard envelope", async () => {
    const app = appWith(2);

    await request(app).get("/things").expect(200);
    await request(app).get("/things").expect(200);
    const response = await request(app).get("/things");

    expect(response.status).toBe(429);
    expect(response.body).toEqual({
      success: false,
      message: "Too many requests, please try again later",
      code: "RATE_LIMIT_EXCEEDED",
    });
  });

  it("never limits the health check", async () => {
    const app = appWith(1);

    await request(app).get("/health").expect(200);
    await request(app).get("/health").expect(200);
  });
});
