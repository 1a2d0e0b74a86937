/**
 * Per-invocation wiring: configuration, logger and API clients
 */

import { Geocoder } from "../../client/geocoder.js";
import { RetryingHttpClient, sleep } from "../../client/http.js";
import { InventoryClient } from "../../client/inventory.js";
import { RETRY_DEFAULTS, backoffSchedule } from "../../client/retry.js";
import { loadConfig, type AppConfig, type Environment } from "../../config.js";
import { ConfigError, errorMessage } from "../../errors.js";
import { createLogger, parseLogLevel, type Logger } from "../../logger.js";

import { printError } from "./display.js";

export interface GlobalOptions {
  dryRun?: boolean;
  logLevel?: string;
}

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  inventory: InventoryClient;
  geocoder: Geocoder;
}

/**
 * Merge command-line flags over the environment configuration.
 * Dry-run is on when either source enables it.
 */
export function resolveConfig(
  options: GlobalOptions,
  env?: Environment
): AppConfig {
  const config = loadConfig(env);

  let logLevel = config.logLevel;
  if (options.logLevel !== undefined) {
    const parsed = parseLogLevel(options.logLevel);
    if (parsed === undefined) {
      throw new ConfigError(`Invalid --log-level: ${options.logLevel}`);
    }
    logLevel = parsed;
  }

  return {
    ...config,
    dryRun: config.dryRun || options.dryRun === true,
    logLevel,
  };
}

export function createRuntime(
  options: GlobalOptions,
  env?: Environment
): Runtime {
  const config = resolveConfig(options, env);
  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  logger.info({ logLevel: config.logLevel }, "Logging initialized");
  logger.debug(
    {
      maxAttempts: RETRY_DEFAULTS.maxAttempts,
      waitsMs: backoffSchedule(RETRY_DEFAULTS),
    },
    "HTTP retry plan"
  );

  const inventory = new InventoryClient(
    new RetryingHttpClient({
      logger: logger.child({ module: "inventory-api" }),
      sleep,
    }),
    { ...config.inventory, dryRun: config.dryRun }
  );

  const geocoder = new Geocoder(
    new RetryingHttpClient({
      logger: logger.child({ module: "geocoder" }),
      sleep,
    }),
    config.geocoder
  );

  if (config.dryRun) {
    logger.info("Dry run mode ENABLED (no PATCH/POST will be performed)");
  }

  return { config, logger, inventory, geocoder };
}

/**
 * Create the runtime, or report the setup failure and set exit code 1
 */
export function startRuntime(options: GlobalOptions): Runtime | undefined {
  try {
    return createRuntime(options);
  } catch (error) {
    printError(errorMessage(error));
    process.exitCode = 1;
    return undefined;
  }
}
