// src/middleware/validateEnv.ts
import { z } from "zod";
import { GEMINI_OPENAI_BASE_URL } from "../services/contentGenerator";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/**
 * Environment variable validation schema.
 * Validated once at startup; everything downstream reads the typed AppConfig.
 */
const envSchema = z
  .object({
    // Server
    PORT: z.coerce.number().int().positive().default(8080),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    URL: z.string().url("URL must be the public service URL"),
    GCP_PROJECT_ID: z.string().min(1, "GCP_PROJECT_ID is required"),

    // Telegram
    TELEGRAM_TOKEN: z.string().min(1, "TELEGRAM_TOKEN is required"),
    BOT_MODE: z.enum(["webhook", "polling"]).default("webhook"),
    TELEGRAM_WEBHOOK_SECRET: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, "TELEGRAM_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and -")
      .optional(),

    // WHOOP
    WHOOP_CLIENT_ID: z.string().min(1, "WHOOP_CLIENT_ID is required"),
    WHOOP_CLIENT_SECRET: z.string().min(1, "WHOOP_CLIENT_SECRET is required"),

    // Generative API (OpenAI-compatible)
    GENAI_API_KEY: z.string().min(1, "GENAI_API_KEY is required"),
    GENAI_BASE_URL: z.string().url().default(GEMINI_OPENAI_BASE_URL),
    GENAI_MODEL: z.string().default("gemini-2.0-flash"),

    // Scheduler identity
    SCHEDULER_SERVICE_ACCOUNT: z.string().email().optional(),

    // Storage
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().optional(),
    ENCRYPTION_KEY: z.string().optional(),

    // Budgets
    REQUEST_BUDGET_MS: millis(280_000),
    WEBHOOK_BUDGET_MS: millis(50_000),
    GENAI_TIMEOUT_MS: millis(20_000),
    TOKEN_SAFETY_MARGIN_MS: millis(60_000),
    TRIGGER_BUCKET_MINUTES: z.coerce.number().int().min(1).max(1440).default(60),

    // In-process schedules
    LOCAL_SCHEDULER: flag,
    SCHEDULE_TIMEZONE: z.string().default("UTC"),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === "postgres") {
      if (!env.DATABASE_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["DATABASE_URL"], message: "DATABASE_URL is required for postgres storage" });
      }
      if (!env.ENCRYPTION_KEY) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["ENCRYPTION_KEY"], message: "ENCRYPTION_KEY is required for postgres storage" });
      }
    }
    if (env.BOT_MODE === "webhook" && !env.TELEGRAM_WEBHOOK_SECRET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["TELEGRAM_WEBHOOK_SECRET"], message: "TELEGRAM_WEBHOOK_SECRET is required in webhook mode" });
    }
    if (env.WEBHOOK_BUDGET_MS >= env.REQUEST_BUDGET_MS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["WEBHOOK_BUDGET_MS"], message: "WEBHOOK_BUDGET_MS must be below REQUEST_BUDGET_MS" });
    }
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Env["NODE_ENV"];
  serviceUrl: string;
  projectId: string;
  telegram: {
    token: string;
    mode: Env["BOT_MODE"];
    webhookSecret?: string;
  };
  whoop: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
  };
  genai: {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  scheduler: {
    serviceAccount?: string;
    local: boolean;
    timezone: string;
    bucketMinutes: number;
  };
  storage:
    | { driver: "memory" }
    | { driver: "postgres"; databaseUrl: string; encryptionKey: string };
  budgets: {
    requestMs: number;
    webhookMs: number;
    tokenSafetyMarginMs: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

function toConfig(env: Env): AppConfig {
  const serviceUrl = env.URL.replace(/\/+$/, "");

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    serviceUrl,
    projectId: env.GCP_PROJECT_ID,
    telegram: {
      token: env.TELEGRAM_TOKEN,
      mode: env.BOT_MODE,
      ...(env.TELEGRAM_WEBHOOK_SECRET ? { webhookSecret: env.TELEGRAM_WEBHOOK_SECRET } : {}),
    },
    whoop: {
      clientId: env.WHOOP_CLIENT_ID,
      clientSecret: env.WHOOP_CLIENT_SECRET,
      redirectUri: `${serviceUrl}/whoop/callback`,
    },
    genai: {
      apiKey: env.GENAI_API_KEY,
      baseUrl: env.GENAI_BASE_URL,
      model: env.GENAI_MODEL,
      timeoutMs: env.GENAI_TIMEOUT_MS,
    },
    scheduler: {
      ...(env.SCHEDULER_SERVICE_ACCOUNT ? { serviceAccount: env.SCHEDULER_SERVICE_ACCOUNT } : {}),
      local: env.LOCAL_SCHEDULER,
      timezone: env.SCHEDULE_TIMEZONE,
      bucketMinutes: env.TRIGGER_BUCKET_MINUTES,
    },
    storage:
      env.STORAGE_DRIVER === "postgres" && env.DATABASE_URL && env.ENCRYPTION_KEY
        ? { driver: "postgres", databaseUrl: env.DATABASE_URL, encryptionKey: env.ENCRYPTION_KEY }
        : { driver: "memory" },
    budgets: {
      requestMs: env.REQUEST_BUDGET_MS,
      webhookMs: env.WEBHOOK_BUDGET_MS,
      tokenSafetyMarginMs: env.TOKEN_SAFETY_MARGIN_MS,
    },
  };
}

/**
 * Validates environment variables.
 * Throws ConfigError listing every problem; logs warnings for risky-but-valid settings.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.errors.map((error) => `${error.path.join(".")}: ${error.message}`);
    console.error("Environment validation failed:");
    issues.forEach((issue) => console.error(`  - ${issue}`));
    throw new ConfigError(issues);
  }

  const env = result.data;
  const warnings: string[] = [];

  if (!env.SCHEDULER_SERVICE_ACCOUNT) {
    warnings.push("SCHEDULER_SERVICE_ACCOUNT is not set - any Google identity with the right audience can trigger jobs");
  }

  if (env.STORAGE_DRIVER === "memory" && env.NODE_ENV === "production") {
    warnings.push("STORAGE_DRIVER=memory in production - tokens and dispatch records are lost on restart");
  }

  if (env.BOT_MODE === "polling" && !env.LOCAL_SCHEDULER) {
    warnings.push("BOT_MODE=polling without LOCAL_SCHEDULER - scheduled jobs only run when called over HTTP");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return toConfig(env);
}

export default validateEnvironment;
