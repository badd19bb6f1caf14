import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanString = z
  .enum(["true", "false"])
  .transform((val) => val === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  APP_NAME: z.string().default("Clinic Booking API"),
  API_VERSION: z.string().default("v1"),

  // Database
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_NAME: z.string().min(1),
  DB_USER: z.string().min(1),
  DB_PASSWORD: z.string().min(1),
  DB_CONNECTION_LIMIT: z.coerce.number().int().positive().default(10),

  // Redis
  REDIS_HOST: z.string().default("localhost"),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),

  // JWT
  JWT_ACCESS_SECRET: z.string().min(32),
  JWT_ISSUER: z.string().default("clinic-booking"),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),

  // CORS
  ALLOWED_ORIGINS: z.string().default("http://localhost:3000"),

  // WebSocket
  SOCKET_IO_CORS_ORIGINS: z.string().default("http://localhost:3000"),

  // Swagger
  SWAGGER_ENABLED: booleanString.default("true"),

  // Payment gateway
  PAYMENT_GATEWAY_URL: z.string().url().default("https://api.razorpay.com/v1"),
  PAYMENT_KEY_ID: z.string().optional(),
  PAYMENT_KEY_SECRET: z.string().optional(),
  PAYMENT_CHECKOUT_URL: z.string().url().default("https://checkout.razorpay.com/v1/checkout"),
  PAYMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  MEETING_BASE_URL: z.string().url().default("https://meet.example.com"),

  // Booking policy
  BOOKING_TIMEZONE: z.string().default("UTC"),
  BOOKING_CURRENCY: z.string().length(3).default("INR"),
  BOOKING_MIN_SLOT_MINUTES: z.coerce.number().int().positive().default(15),
  BOOKING_RESCHEDULE_NOTICE_MINUTES: z.coerce.number().int().min(0).default(120),
  BOOKING_MAX_ADVANCE_DAYS: z.coerce.number().int().positive().default(90),
  BOOKING_FOLLOW_UP_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
  BOOKING_FULL_REFUND_NOTICE_HOURS: z.coerce.number().int().min(0).default(24),
  BOOKING_LATE_CANCELLATION_REFUND_PERCENT: z.coerce.number().min(0).max(100).default(100),
  BOOKING_EMERGENCY_LEAD_MINUTES: z.coerce.number().int().min(0).default(15),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const env = parsed.data;

const splitList = (value: string): string[] => value.split(",").map((item) => item.trim());

export const config = {
  app: {
    name: env.APP_NAME,
    port: env.PORT,
    env: env.NODE_ENV,
    apiVersion: env.API_VERSION,
    isDevelopment: env.NODE_ENV === "development",
    isProduction: env.NODE_ENV === "production",
    isTest: env.NODE_ENV === "test",
  },

  database: {
    host: env.DB_HOST,
    port: env.DB_PORT,
    name: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    connectionLimit: env.DB_CONNECTION_LIMIT,
  },

  redis: {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
  },

  jwt: {
    accessSecret: env.JWT_ACCESS_SECRET,
    issuer: env.JWT_ISSUER,
  },

  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
  },

  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
  },

  cors: {
    origins: splitList(env.ALLOWED_ORIGINS),
  },

  websocket: {
    corsOrigins: splitList(env.SOCKET_IO_CORS_ORIGINS),
  },

  swagger: {
    enabled: env.SWAGGER_ENABLED,
  },

  payment: {
    baseUrl: env.PAYMENT_GATEWAY_URL,
    keyId: env.PAYMENT_KEY_ID,
    keySecret: env.PAYMENT_KEY_SECRET,
    checkoutUrl: env.PAYMENT_CHECKOUT_URL,
    timeoutMs: env.PAYMENT_TIMEOUT_MS,
  },

  meeting: {
    baseUrl: env.MEETING_BASE_URL,
  },

  booking: {
    timezone: env.BOOKING_TIMEZONE,
    currency: env.BOOKING_CURRENCY,
    minSlotMinutes: env.BOOKING_MIN_SLOT_MINUTES,
    rescheduleNoticeMinutes: env.BOOKING_RESCHEDULE_NOTICE_MINUTES,
    maxAdvanceBookingDays: env.BOOKING_MAX_ADVANCE_DAYS,
    followUpWindowDays: env.BOOKING_FOLLOW_UP_WINDOW_DAYS,
    fullRefundNoticeHours: env.BOOKING_FULL_REFUND_NOTICE_HOURS,
    lateCancellationRefundPercent: env.BOOKING_LATE_CANCELLATION_REFUND_PERCENT,
    emergencyLeadMinutes: env.BOOKING_EMERGENCY_LEAD_MINUTES,
  },
} as const;

export type Config = typeof config;
