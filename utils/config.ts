import "dotenv/config";
import { z } from "zod";

const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

const envSchema = z.object({
  LATE_PAYMENT_GRACE_PERIOD_IN_DAYS: z.coerce.number().int().min(0).default(1),
  PAYMENTS_TO_UNLOCK: z.coerce.number().int().min(1).default(2),
  MISSED_PAYMENT_PERIODS_TO_DEFAULT: z.coerce.number().int().min(1).default(2),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

export type LogLevel = (typeof LOG_LEVELS)[number];
export type EngineConfig = z.infer<typeof envSchema>;

/**
 * Parses engine settings from the environment (`.env` is loaded by dotenv).
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return envSchema.parse(env);
}

export const config: EngineConfig = loadConfig();

export { LOG_LEVELS };
