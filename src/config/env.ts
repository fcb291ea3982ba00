/**
 * Validates environment variables at boot.
 * Fails fast with clear error messages if any are missing or invalid.
 */

import { z } from "zod";

const numeric = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .optional()
    .transform((v) => v ?? fallback);

const envSchema = z.object({
  // Server
  PORT: numeric(3001),
  CORS_ORIGIN: z.string().optional(),

  // Redis (optional: events stay in process without it)
  REDIS_URL: z.string().url("REDIS_URL must be a valid Redis connection string").optional(),

  // Pacing
  STEP_DELAY_MS: numeric(1000),
  BOT_THINK_MS: numeric(600),
  ANIMATION_MS: numeric(350),
  BANNER_TTL_MS: numeric(2500),

  // Presentation
  SOUND_CONFIG_PATH: z.string().min(1).optional().transform((v) => v ?? "config/sounds.json"),
  DEFAULT_THEME_ID: z.string().min(1).optional().transform((v) => v ?? "forest-green-pro"),

  // Node env
  NODE_ENV: z.enum(["development", "production", "test"]).optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type Env = z.infer<typeof envSchema>;

export type EnvResult = { ok: true; env: Env } | { ok: false; issues: string[] };

/**
 * Parses an environment record without side effects.
 */
export function parseEnv(source: Record<string, string | undefined>): EnvResult {
  const result = envSchema.safeParse(source);
  if (result.success) return { ok: true, env: result.data };
  return {
    ok: false,
    issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
  };
}

/**
 * Validates environment variables and returns typed config.
 * Exits the process on validation failure with detailed error messages.
 */
export function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.ok) {
    console.error("❌ Environment validation failed:");
    console.error("");
    for (const issue of result.issues) {
      console.error(`  ${issue}`);
    }
    console.error("");
    console.error("Please check your .env file and ensure all required variables are set.");
    process.exit(1);
  }

  return result.env;
}

/**
 * Logs validated config (safe: hides sensitive values).
 */
export function logEnvSummary(env: Env) {
  console.log("✅ Environment validated:");
  console.log(`  NODE_ENV: ${env.NODE_ENV ?? "development"}`);
  console.log(`  PORT: ${env.PORT}`);
  console.log(`  REDIS_URL: ${env.REDIS_URL ? maskConnectionString(env.REDIS_URL) : "[IN-MEMORY]"}`);
  console.log(`  CORS_ORIGIN: ${env.CORS_ORIGIN ?? "http://localhost:3000"}`);
  console.log(`  STEP_DELAY_MS: ${env.STEP_DELAY_MS}`);
  console.log(`  BOT_THINK_MS: ${env.BOT_THINK_MS}`);
  console.log(`  ANIMATION_MS: ${env.ANIMATION_MS}`);
  console.log(`  SOUND_CONFIG_PATH: ${env.SOUND_CONFIG_PATH}`);
}

export function maskConnectionString(url: string): string {
  try {
    const u = new URL(url);
    if (u.password) u.password = "***";
    return u.toString();
  } catch {
    return "[INVALID_URL]";
  }
}
