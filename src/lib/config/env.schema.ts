import { z } from "zod";

/**
 * Boolean env strings: "false" and "0" are false, anything else is true.
 */
const booleanTransform = (s: string) => s !== "false" && s !== "0";

/**
 * Environment schema
 */
export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DSN: z.preprocess((val) => {
    // Empty values and the sample template both mean "not configured"
    if (!val || typeof val !== "string") return undefined;
    if (val.includes("user:password@host:port")) return undefined;
    return val;
  }, z.string().url("Invalid database URL").optional()),
  // Do not use z.coerce.boolean() here: Boolean("false") === true
  AUTO_MIGRATE: z.string().default("true").transform(booleanTransform),
  EMBEDDED_DB: z.string().default("false").transform(booleanTransform),
  EMBEDDED_DB_DIR: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().optional(),
  DB_POOL_IDLE_TIMEOUT: z.coerce.number().int().nonnegative().optional(),
  DB_POOL_CONNECT_TIMEOUT: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SESSION_IDLE_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
  // 0 disables the background sweep; expiry then happens only on verification
  SESSION_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().nonnegative().default(0),
});

/**
 * Parsed environment
 */
export type EnvConfig = z.infer<typeof EnvSchema>;

let _envConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!_envConfig) {
    _envConfig = EnvSchema.parse(process.env);
  }
  return _envConfig;
}

/** @internal Test-only: drop the cached environment */
export function resetEnvConfigCache(): void {
  _envConfig = null;
}
