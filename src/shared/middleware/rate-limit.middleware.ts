import rateLimit, { ClientRateLimitInfo, Options, RateLimitRequestHandler, Store } from "express-rate-limit";
import type { Config } from "@/shared/config/environment";
import { ApiResponse, CACHE_KEYS } from "@/shared/types/common.types";
import type { CacheStore } from "@/shared/types/cache.types";

// Rate limit store backed by the shared cache (Redis in production)
export class CacheRateLimitStore implements Store {
  private windowMs = 60_000;

  constructor(
    private readonly cache: CacheStore,
    public readonly prefix: string
  ) {}

  init(options: Options): void {
    this.windowMs = options.windowMs;
  }

  async increment(key: string): Promise<ClientRateLimitInfo> {
    const { count, ttlMs } = await this.cache.increment(this.keyFor(key), this.windowMs);

    return {
      totalHits: count,
      resetTime: new Date(Date.now() + ttlMs),
    };
  }

  async decrement(key: string): Promise<void> {
    await this.cache.decrement(this.keyFor(key));
  }

  async resetKey(key: string): Promise<void> {
    await this.cache.del(this.keyFor(key));
  }

  private keyFor(key: string): string {
    return CACHE_KEYS.RATE_LIMIT(`${this.prefix}:${key}`);
  }
}

const limitMessage = (message: string, code: string): ApiResponse => ({
  success: false,
  message,
  code,
});

export interface RateLimiters {
  global: RateLimitRequestHandler;
  general: RateLimitRequestHandler;
  booking: RateLimitRequestHandler;
}

const skipSystemPaths = (path: string): boolean => path.startsWith("/health") || path.startsWith("/docs");

export const createRateLimiters = (cache: CacheStore, settings: Config["rateLimit"]): RateLimiters => {
  // Global limit per address, more generous than the per-route one
  const perAddress = rateLimit({
    windowMs: settings.windowMs,
    limit: settings.maxRequests * 2,
    message: limitMessage("Too many requests from this IP, please try again later", "RATE_LIMIT_EXCEEDED"),
    standardHeaders: true,
    legacyHeaders: false,
    store: new CacheRateLimitStore(cache, "global"),
    skip: (req) => skipSystemPaths(req.path),
  });

  // General rate limiting
  const general = rateLimit({
    windowMs: settings.windowMs,
    limit: settings.maxRequests,
    message: limitMessage("Too many requests, please try again later", "RATE_LIMIT_EXCEEDED"),
    standardHeaders: true,
    legacyHeaders: false,
    store: new CacheRateLimitStore(cache, "general"),
    skip: (req) => skipSystemPaths(req.path),
  });

  // Booking creation is limited per user rather than per address
  const booking = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 10, // 10 bookings per minute
    message: limitMessage("Too many booking requests, please slow down", "BOOKING_RATE_LIMIT_EXCEEDED"),
    standardHeaders: true,
    legacyHeaders: false,
    store: new CacheRateLimitStore(cache, "booking"),
    keyGenerator: (req) => req.user?.id ?? req.ip ?? "anonymous",
  });

  return { global: perAddress, general, booking };
};
