import { z } from "zod";

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  APP_ORIGIN: z.string().url().default("http://localhost:5173"),
  DATABASE_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // Single owner account
  ADMIN_USERNAME: z.string().min(1),
  ADMIN_PASSWORD: z.string().min(8),
  AUTH_JWT_SECRET: z.string().min(32),
  SESSION_TTL: z.coerce.number().int().positive().default(604800), // 7 days in seconds

  // Screenshots
  UPLOAD_DIR: z.string().min(1).default("uploads"),
  MAX_UPLOAD_MB: z.coerce.number().min(1).max(50).default(10),

  DISCIPLINE_SCORE_POLICY: z.enum(["always", "any-flag"]).default("any-flag"),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    console.error("❌ Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment variables");
  }

  return result.data;
}
