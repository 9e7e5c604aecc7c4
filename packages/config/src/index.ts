import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z
  .object({
    // ===========================================================================
    // Environment
    // ===========================================================================
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),

    // ===========================================================================
    // Database (PostgreSQL)
    // ===========================================================================
    DATABASE_URL: z.string().url(),
    DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),

    // ===========================================================================
    // Email provider
    // ===========================================================================
    EMAIL_PROVIDER: z.enum(["brevo", "resend", "mock"]).default("brevo"),
    BREVO_API_URL: z.string().url().default("https://api.brevo.com/v3"),

    // Mock provider settings (dry runs and local development)
    MOCK_MODE: z.enum(["success", "fail", "random"]).default("success"),
    MOCK_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.1),
    MOCK_LATENCY_MS: z.coerce.number().min(0).default(50),

    // ===========================================================================
    // Dispatch scheduling
    // ===========================================================================
    /** Idle wake-up interval for each dispatch unit and for unit discovery */
    POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(2000),
    /** Attempts per recipient before a transient failure becomes terminal */
    MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    /** In-flight leases older than this are reverted to pending */
    LEASE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
    /** Upper bound on a single provider call */
    SEND_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),
    /** rolling = 24h from the first send in the window, calendar = UTC day */
    QUOTA_DAY_WINDOW: z.enum(["rolling", "calendar"]).default("rolling"),
    /** Backoff bounds when persistence is unavailable */
    STORAGE_RETRY_BASE_MS: z.coerce.number().int().min(10).default(1000),
    STORAGE_RETRY_MAX_MS: z.coerce.number().int().min(10).default(60_000),

    // ===========================================================================
    // Templates
    // ===========================================================================
    TEMPLATES_DIR: z.string().default("data/templates"),
    DEFAULT_TEMPLATE: z.string().default("mail.html"),
    TITLE_CASE_NAMES: stringBoolean.default(true),

    // ===========================================================================
    // Server (health + metrics)
    // ===========================================================================
    PORT: z.coerce.number().default(6001),
    SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  })
  .refine((cfg) => cfg.SEND_TIMEOUT_MS < cfg.LEASE_TIMEOUT_MS, {
    message: "SEND_TIMEOUT_MS must be shorter than LEASE_TIMEOUT_MS",
    path: ["SEND_TIMEOUT_MS"],
  });

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
