import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, LogLevel } from "./logger.js";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_API_URL = "http://localhost:3986";
export const DEFAULT_TIMEOUT_SEC = 30;
export const DEFAULT_IMAGE = "python:3.10-slim";
export const DEFAULT_LOG_FILE = "/tmp/sandbox-mcp.log";

const booleanFlag = z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() === "true");

const envSchema = z.object({
    SANDBOX_API_KEY: z
        .string({ required_error: "SANDBOX_API_KEY environment variable is required" })
        .trim()
        .min(1, "SANDBOX_API_KEY environment variable is required"),
    SANDBOX_API_URL: z.string().url().default(DEFAULT_API_URL),
    SANDBOX_TIMEOUT: z.coerce.number().positive().default(DEFAULT_TIMEOUT_SEC),
    SANDBOX_TARGET: z.string().min(1).default("local"),
    SANDBOX_VERIFY_SSL: booleanFlag,
    SANDBOX_IMAGE: z.string().min(1).default(DEFAULT_IMAGE),
    SANDBOX_PREVIEW_DOMAIN: z.string().min(1).optional(),
    SANDBOX_LOG_FILE: z.string().default(DEFAULT_LOG_FILE),
    SANDBOX_LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

/**
 * Read once at startup and never re-read. The core receives it as an opaque
 * client configuration.
 */
export interface ServerConfig {
    readonly apiKey: string;
    readonly apiUrl: string;
    readonly timeoutSec: number;
    readonly target: string;
    readonly verifySsl: boolean;
    readonly image: string;
    readonly previewDomain: string;
    readonly logFile?: string;
    readonly logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
    // Blank values count as unset so `FOO=` in a .env file falls back to the default.
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const message = parsed.error.issues
            .map((issue) => (issue.message.includes(String(issue.path[0])) ? issue.message : `${issue.path.join(".")}: ${issue.message}`))
            .join("; ");
        throw new ConfigError(message);
    }

    const values = parsed.data;
    const apiUrl = values.SANDBOX_API_URL.replace(/\/+$/, "");
    return Object.freeze({
        apiKey: values.SANDBOX_API_KEY,
        apiUrl,
        timeoutSec: values.SANDBOX_TIMEOUT,
        target: values.SANDBOX_TARGET,
        verifySsl: values.SANDBOX_VERIFY_SSL,
        image: values.SANDBOX_IMAGE,
        previewDomain: values.SANDBOX_PREVIEW_DOMAIN ?? new URL(apiUrl).hostname,
        logFile: env.SANDBOX_LOG_FILE === "" ? undefined : values.SANDBOX_LOG_FILE,
        logLevel: values.SANDBOX_LOG_LEVEL
    });
}
