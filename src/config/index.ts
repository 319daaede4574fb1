import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables
dotenv.config();

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

// Environment variable schema validation
const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // HTTP
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),

  // HubSpot
  HUBSPOT_BASE_URL: z.string().url().default("https://api.hubapi.com"),
  ASSOCIATION_OBJECT_TYPES: commaList.default("contacts,companies,deals,tickets"),

  // Sessions and caching
  SESSION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(3600),
  SESSION_CLEANUP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(900),

  // Upstream calls
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RATE_LIMIT_PER_SECOND: z.coerce.number().positive().default(8),
  HUBSPOT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
});

// Validate environment variables
const envValidation = envSchema.safeParse(process.env);

if (!envValidation.success) {
  console.error("❌ Environment variable validation failed:");
  console.error(envValidation.error.format());
  process.exit(1);
}

const env = envValidation.data;

// Export configuration
export const config = {
  env: env.NODE_ENV,
  server: {
    port: env.PORT,
    host: env.HOST,
  },
  hubspot: {
    baseUrl: env.HUBSPOT_BASE_URL,
    associationObjectTypes: env.ASSOCIATION_OBJECT_TYPES,
    maxRetries: env.MAX_RETRIES,
    rateLimitPerSecond: env.RATE_LIMIT_PER_SECOND,
    timeoutMs: env.HUBSPOT_TIMEOUT_MS,
  },
  session: {
    timeoutMs: env.SESSION_TIMEOUT_SECONDS * 1000,
    cleanupIntervalMs: env.SESSION_CLEANUP_INTERVAL_SECONDS * 1000,
  },
  cache: {
    ttlMs: env.CACHE_TTL_SECONDS * 1000,
  },
  logging: {
    level: env.LOG_LEVEL,
  },
} as const;

export default config;
