/**
 * Process configuration
 *
 * Built once at startup from the environment (and `.env`) and passed to every
 * component. Nothing else reads process.env.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";
import { parseLogLevel } from "./logger.js";

export const DEFAULT_GEOCODER_BASE_URL = "https://nominatim.openstreetmap.org";
export const DEFAULT_GEOCODER_USER_AGENT = "inventory-sync/1.0";

const REQUIRED_VARIABLES = [
  "INVENTORY_API_BASE_URL",
  "NETWORK_ID",
  "API_KEY_ID",
  "API_SECRET",
] as const;

// ============================================================================
// Schema
// ============================================================================

const LogLevelSchema = Type.Union([
  Type.Literal("trace"),
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
  Type.Literal("fatal"),
]);

export const AppConfigSchema = Type.Object({
  inventory: Type.Object({
    baseUrl: Type.String({ pattern: "^https?://" }),
    networkId: Type.String({ minLength: 1 }),
    apiKeyId: Type.String({ minLength: 1 }),
    apiSecret: Type.String({ minLength: 1 }),
  }),
  geocoder: Type.Object({
    baseUrl: Type.String({ pattern: "^https?://" }),
    userAgent: Type.String({ minLength: 1 }),
  }),
  dryRun: Type.Boolean(),
  logLevel: LogLevelSchema,
  logFile: Type.Optional(Type.String()),
});

export type AppConfig = Static<typeof AppConfigSchema>;

export type Environment = Record<string, string | undefined>;

// ============================================================================
// Loader
// ============================================================================

function readVariable(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Build the run configuration from environment variables
 *
 * @throws ConfigError when a required variable is missing or a value is invalid
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const missing = REQUIRED_VARIABLES.filter(
    (name) => readVariable(env, name) === undefined
  );
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      [...missing]
    );
  }

  const rawLevel = readVariable(env, "LOG_LEVEL");
  const logLevel = parseLogLevel(rawLevel ?? "info");
  if (logLevel === undefined) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${rawLevel ?? ""}`);
  }

  const config: AppConfig = {
    inventory: {
      baseUrl: stripTrailingSlash(readVariable(env, "INVENTORY_API_BASE_URL") ?? ""),
      networkId: readVariable(env, "NETWORK_ID") ?? "",
      apiKeyId: readVariable(env, "API_KEY_ID") ?? "",
      apiSecret: readVariable(env, "API_SECRET") ?? "",
    },
    geocoder: {
      baseUrl: stripTrailingSlash(
        readVariable(env, "GEOCODER_BASE_URL") ?? DEFAULT_GEOCODER_BASE_URL
      ),
      userAgent:
        readVariable(env, "GEOCODER_USER_AGENT") ?? DEFAULT_GEOCODER_USER_AGENT,
    },
    dryRun: (readVariable(env, "DRY_RUN") ?? "false").toLowerCase() === "true",
    logLevel,
    logFile: readVariable(env, "LOG_FILE"),
  };

  if (!Value.Check(AppConfigSchema, config)) {
    const problems = [...Value.Errors(AppConfigSchema, config)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  return Object.freeze(config);
}
