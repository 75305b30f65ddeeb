/**
 * Render configuration.
 *
 * The mode flag and base URL are plain values threaded into every render
 * call; nothing here is held in a process-wide singleton.
 */

import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const renderConfigSchema = z.object({
  /** Development mode renders raw files and rehashes on every render */
  development: z.boolean().default(false),
  /** Prefix for file based resource URLs */
  baseUrl: z.string().default(""),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type RenderConfig = z.infer<typeof renderConfigSchema>;
export type RenderConfigInput = z.input<typeof renderConfigSchema>;

// Environment values arrive as strings
const envSchema = z.object({
  ASSETWEAVE_DEVELOPMENT: z.stringbool().optional(),
  ASSETWEAVE_BASE_URL: z.string().optional(),
  ASSETWEAVE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Validates a partial configuration and fills in defaults.
 *
 * @throws ConfigError with a readable summary of every invalid field
 */
export function defineConfig(input: RenderConfigInput = {}): RenderConfig {
  const result = renderConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid render configuration:\n${z.prettifyError(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

export type LoadConfigOptions = {
  /** Variables to read. Defaults to `process.env` */
  env?: Record<string, string | undefined>;
  /** Load a `.env` file into `process.env` first (path or `true` for ./.env) */
  dotenv?: boolean | string;
};

/**
 * Reads the render configuration from environment variables:
 *
 * - ASSETWEAVE_DEVELOPMENT: "true" / "false" (also "1", "yes", ...)
 * - ASSETWEAVE_BASE_URL
 * - ASSETWEAVE_LOG_LEVEL: debug | info | warn | error
 */
export function loadConfigFromEnv(options: LoadConfigOptions = {}): RenderConfig {
  if (options.dotenv) {
    loadEnv(
      typeof options.dotenv === "string" ? { path: options.dotenv } : undefined
    );
  }

  const env = options.env ?? process.env;
  const result = envSchema.safeParse({
    ASSETWEAVE_DEVELOPMENT: env.ASSETWEAVE_DEVELOPMENT,
    ASSETWEAVE_BASE_URL: env.ASSETWEAVE_BASE_URL,
    ASSETWEAVE_LOG_LEVEL: env.ASSETWEAVE_LOG_LEVEL,
  });

  if (!result.success) {
    throw new ConfigError(
      `Invalid environment configuration:\n${z.prettifyError(result.error)}`,
      { cause: result.error }
    );
  }

  return defineConfig({
    development: result.data.ASSETWEAVE_DEVELOPMENT,
    baseUrl: result.data.ASSETWEAVE_BASE_URL,
    logLevel: result.data.ASSETWEAVE_LOG_LEVEL,
  });
}
