/**
 * Runtime Configuration & Validation
 * Uses Zod schemas to validate environment variables at startup.
 * Commands call `loadConfig()` and get typed, validated config or a clear error.
 */
import { z } from "zod";
import type { RateLimits } from "./types.js";

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

// ─── Schema Definitions ───────────────────────────────────────────────

const appSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

const upstreamSchema = z.object({
  UPSTREAM_BASE_URL: z.string().url("UPSTREAM_BASE_URL must be a valid URL").default("http://127.0.0.1:8080"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  UPSTREAM_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  UPSTREAM_HEALTH_PATH: z.string().startsWith("/").default("/health"),
  CACHE_TTL_SECONDS: z.coerce.number().positive().default(600),
  MARKET_STATUS_TTL_SECONDS: z.coerce.number().positive().default(30),
});

const transportSchema = z.object({
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  WS_PORT: z.coerce.number().int().min(0).max(65535).default(5555),
  ZMQ_ENDPOINT: z.string().min(1).default("tcp://0.0.0.0:5556"),
  ZMQ_CLIENT_ID: z.string().min(1).default("queue"),
  TOOL_CLIENT_ID: z.string().min(1).default("tools"),
  ENABLE_HTTP: flag("true"),
  ENABLE_WS: flag("true"),
  ENABLE_ZMQ: flag("false"),
  RESTART_SECRET: z.string().min(8, "RESTART_SECRET must be at least 8 characters").optional(),
});

const snapshotSchema = z.object({
  STOCK_MAP_PATH: z.string().min(1).default("data/stockmap.json"),
  SNAPSHOT_TIMEOUT_MS: z.coerce.number().int().min(30_000, "SNAPSHOT_TIMEOUT_MS must be at least 30000").default(30_000),
  SNAPSHOT_REFRESH_HOURS: z.coerce.number().min(0).default(24),
});

const rateLimitSchema = z.object({
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().positive().default(60),
  RATE_LIMIT_HEALTH: z.coerce.number().int().positive().default(50),
  RATE_LIMIT_VALIDATION: z.coerce.number().int().positive().default(120),
  RATE_LIMIT_MARKET_DATA: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_WEBSOCKET_CONNECTION: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WEBSOCKET_MESSAGE: z.coerce.number().int().positive().default(50),
  RATE_LIMIT_DEFAULT: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_SWEEP_THRESHOLD: z.coerce.number().int().positive().default(1000),
  RATE_LIMIT_STALE_SECONDS: z.coerce.number().positive().default(300),
});

// ─── Full Config Schema ───────────────────────────────────────────────

export const configSchema = appSchema
  .merge(upstreamSchema)
  .merge(transportSchema)
  .merge(snapshotSchema)
  .merge(rateLimitSchema);

export type GatewayConfig = z.infer<typeof configSchema>;

// ─── Partial Schemas (for commands that only need a subset) ───────────

export const snapshotConfigSchema = appSchema.merge(upstreamSchema).merge(snapshotSchema);
export type SnapshotConfig = z.infer<typeof snapshotConfigSchema>;

// ─── Loader ───────────────────────────────────────────────────────────

/**
 * Validate and load config from the environment.
 * Pass a specific schema for command-level validation, or omit for full config.
 */
export function loadConfig(): GatewayConfig;
export function loadConfig<T extends z.ZodTypeAny>(schema: T, env?: NodeJS.ProcessEnv): z.infer<T>;
export function loadConfig(schema?: z.ZodTypeAny, env: NodeJS.ProcessEnv = process.env): unknown {
  const target = schema ?? configSchema;
  const result = target.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`[GatewayConfig] Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export function rateLimitsFrom(config: z.infer<typeof rateLimitSchema>): RateLimits {
  return {
    health: config.RATE_LIMIT_HEALTH,
    validation: config.RATE_LIMIT_VALIDATION,
    market_data: config.RATE_LIMIT_MARKET_DATA,
    websocket_connection: config.RATE_LIMIT_WEBSOCKET_CONNECTION,
    websocket_message: config.RATE_LIMIT_WEBSOCKET_MESSAGE,
    default: config.RATE_LIMIT_DEFAULT,
  };
}
