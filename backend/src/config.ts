import "dotenv/config";
import path from "path";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(process.cwd(), "backend", ".env") }); // Also check subfolder if run from root
import { z } from "zod";

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim().toLowerCase())
        .filter(Boolean),
    );

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8004),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  API_KEY: z.string().default(""),
  CORS_ORIGINS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean),
    ),
  DATABASE_URL: z.string().default("./intake.db"),

  GOOGLE_CLIENT_ID: z.string().default(""),
  GOOGLE_CLIENT_SECRET: z.string().default(""),
  GOOGLE_REDIRECT_URI: z.string().url().default("http://127.0.0.1:8004/api/mailbox/google/callback"),
  ENCRYPTION_KEY: z.string().min(16).default("change-this-to-a-32-byte-random-secret"),
  MAILBOX_ADDRESS: z.string().default(""),

  POLL_CRON: z.string().default("*/5 * * * *"),
  FOLLOWUP_POLL_CRON: z.string().default("*/15 * * * *"),
  POLL_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(365).default(14),
  APPLICATION_KEYWORDS: csv("application,internship"),
  ATTACHMENT_DIR: z.string().default("./attachments"),
  MAX_ATTACHMENT_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  ALLOWED_ATTACHMENT_TYPES: csv("pdf,doc,docx,jpg,jpeg,png,xlsx"),

  S3_ENDPOINT: z.string().default(""),
  S3_REGION: z.string().default("us-east-1"),
  S3_BUCKET: z.string().default("student-applications"),
  S3_ACCESS_KEY: z.string().default(""),
  S3_SECRET_KEY: z.string().default(""),
  S3_FORCE_PATH_STYLE: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  PRESIGNED_URL_TTL_SECONDS: z.coerce.number().int().positive().default(3600),

  VALIDATOR_BASE_URL: z.string().url().default("http://127.0.0.1:8005"),

  HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  VALIDATION_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  NOTIFY_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(2),
  STORAGE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  VALIDATION_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(4000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10000),

  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(5),
  BREAKER_RECOVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  MAX_CONCURRENT_APPLICATIONS: z.coerce.number().int().min(1).max(64).default(3),
  INFO_REQUIRED_DEADLINE_DAYS: z.coerce.number().int().positive().default(7),
  PROGRAM_NAME: z.string().default("Student Internship Program"),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n");
  throw new Error(`Invalid environment configuration:\n${details}`);
}

export const config = parsed.data;

export type AppConfig = typeof config;

export const hasGoogleConfig =
  config.GOOGLE_CLIENT_ID.length > 0 && config.GOOGLE_CLIENT_SECRET.length > 0;
