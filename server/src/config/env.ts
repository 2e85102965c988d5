// server/src/config/env.ts
/** Environment loader: reads .env, validates with Zod, exports typed config and CORS origins array. */
import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),

  // Data layer
  MONGO_URI: z.string().default("mongodb://localhost:27017/stayhold_dev"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_NAMESPACE: z.string().default("stayhold:dev"),

  // Auth (tokens are issued elsewhere; we only verify)
  JWT_SECRET: z
    .string()
    .min(16, "JWT_SECRET must be at least 16 chars")
    .default("dev_only_change_me"),
  JWT_ACCESS_TTL_SECS: z.coerce.number().int().positive().default(900),
  JWT_ISS: z.string().default("stayhold-api"),
  JWT_AUD: z.string().default("stayhold-clients"),

  // Payment processor (Chapa-style REST API)
  SITE_URL: z.string().url().default("http://localhost:3001"),
  PAYMENT_BASE_URL: z.string().url().default("https://api.chapa.co/v1"),
  PAYMENT_SECRET_KEY: z.string().default(""),
  PAYMENT_WEBHOOK_SECRET: z.string().optional().default(""),
  PAYMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PAYMENT_DEFAULT_CURRENCY: z
    .string()
    .length(3)
    .transform((v) => v.toUpperCase())
    .default("ETB"),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // Pretty-print Zod issues then exit
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;

// parsed CORS allowlist as array
export const corsOrigins = env.CORS_ORIGINS.split(",")
  .map((s) => s.trim())
  .filter(Boolean);

/** Where the processor posts (or redirects with) transaction notifications. */
export function paymentCallbackUrl(): string {
  return `${env.SITE_URL.replace(/\/+$/, "")}/webhooks/payments`;
}

/** Where the guest lands after the hosted checkout page. */
export function paymentReturnUrl(): string {
  return `${env.SITE_URL.replace(/\/+$/, "")}/payment/success`;
}
