/**
 * Error types shared by the loaders, clients and sync pipelines
 */

// ============================================================================
// Setup Errors (abort the run before any record is processed)
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export class CsvSchemaError extends Error {
  code = "CSV_SCHEMA_ERROR" as const;
  missingColumns: string[];

  constructor(missingColumns: string[], found: string[]) {
    super(
      `CSV missing required columns: ${missingColumns.join(", ")} (found: ${found.join(", ")})`
    );
    this.name = "CsvSchemaError";
    this.missingColumns = missingColumns;
  }
}

export class CsvValidationError extends Error {
  code = "CSV_VALIDATION_ERROR" as const;
  details: string[];

  constructor(details: string[]) {
    super(`CSV validation errors:\n${details.join("\n")}`);
    this.name = "CsvValidationError";
    this.details = details;
  }
}

export class NoLocationsPreparedError extends Error {
  code = "NO_LOCATIONS_PREPARED" as const;

  constructor(message: string) {
    super(message);
    this.name = "NoLocationsPreparedError";
  }
}

// ============================================================================
// Remote Call Errors
// ============================================================================

export class HttpClientError extends Error {
  code = "CLIENT_ERROR" as const;
  statusCode: number;
  body: string;

  constructor(message: string, statusCode: number, body: string) {
    super(message);
    this.name = "HttpClientError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class RetriesExhaustedError extends Error {
  code = "RETRIES_EXHAUSTED" as const;
  attempts: number;
  lastStatus?: number;

  constructor(
    message: string,
    attempts: number,
    lastStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
    this.lastStatus = lastStatus;
  }
}

export class UnexpectedResponseError extends Error {
  code = "UNEXPECTED_RESPONSE" as const;

  constructor(message: string) {
    super(message);
    this.name = "UnexpectedResponseError";
  }
}

export class GeocodeNotFoundError extends Error {
  code = "GEOCODE_NOT_FOUND" as const;
  address: string;

  constructor(address: string) {
    super(`No geocoding result found for address: ${address}`);
    this.name = "GeocodeNotFoundError";
    this.address = address;
  }
}

/**
 * Render any thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}
