import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, {
  type DestinationStream,
  type Level,
  type Logger,
  type LoggerOptions,
} from "pino";

export type { Logger };

export interface LoggerSettings {
  level: Level;
  file?: string;
}

const LEVELS: readonly Level[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

const LEVEL_ALIASES: Record<string, Level> = {
  warning: "warn",
  critical: "fatal",
};

function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

/**
 * Normalize a user-supplied level name (e.g. "INFO", "WARNING") to a pino level
 */
export function parseLogLevel(value: string | undefined): Level | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  const name = value.trim().toLowerCase();
  const alias = LEVEL_ALIASES[name];
  if (alias !== undefined) {
    return alias;
  }

  return isLevel(name) ? name : undefined;
}

// Build the destination stream
function createDestination(
  settings: LoggerSettings
): DestinationStream | undefined {
  if (settings.file === undefined || settings.file === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(settings.file);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Create streams for both stdout and file
  const streams: pino.StreamEntry[] = [
    { level: settings.level, stream: process.stdout },
    {
      level: settings.level,
      stream: pino.destination({
        dest: settings.file,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams) as DestinationStream;
}

/**
 * Create the root logger for one run
 */
export function createLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = { level: settings.level };
  const destination = createDestination(settings);

  const logger =
    destination !== undefined ? pino(options, destination) : pino(options);

  if (settings.file !== undefined && settings.file !== "") {
    logger.info(
      { logFile: settings.file, logLevel: settings.level },
      "Logging to file enabled"
    );
  }

  return logger;
}

/**
 * Logger that discards everything, for tests and library callers
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
