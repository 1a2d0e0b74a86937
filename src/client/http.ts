/**
 * Retrying HTTP operation
 *
 * Executes one HTTP call with bounded retries and exponential backoff:
 * - 2xx returns immediately
 * - 4xx (except 429) logs the body and fails without retrying
 * - 5xx, 429 and network failures are retried until the policy is exhausted
 * - a 2xx body rejected by the request's `validate` check is retried the same way
 */

import {
  HttpClientError,
  RetriesExhaustedError,
  errorMessage,
} from "../errors.js";

import {
  RETRY_DEFAULTS,
  classifyStatus,
  initialRetryState,
  nextRetryState,
  resumeAfterWait,
  type AttemptingState,
  type RetryPolicy,
} from "./retry.js";

import type { Logger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PATCH";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /** Short label used in log lines, e.g. "location PATCH" */
  description: string;
  /** Bindings added to every log line for this call (device, location id, ...) */
  context?: Record<string, unknown>;
  /**
   * Check run on a 2xx body. Throwing marks the attempt as failed and it is
   * retried like a server error; the last thrown error surfaces on exhaustion.
   */
  validate?: (body: string) => void;
}

export interface RequestOptions {
  dryRun?: boolean;
}

export type HttpResult =
  | { kind: "dry-run" }
  | { kind: "response"; status: number; body: string };

export interface RetryingHttpClientDeps {
  logger: Logger;
  fetch?: FetchFn;
  sleep?: SleepFn;
  policy?: RetryPolicy;
}

type AttemptResult =
  | { kind: "response"; status: number; body: string }
  | { kind: "network-error"; error: unknown };

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Client
// ============================================================================

export class RetryingHttpClient {
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: SleepFn;
  readonly policy: RetryPolicy;

  constructor(deps: RetryingHttpClientDeps) {
    this.logger = deps.logger;
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.sleepFn = deps.sleep ?? sleep;
    this.policy = deps.policy ?? RETRY_DEFAULTS;
  }

  /**
   * Perform the request, retrying per policy.
   *
   * @throws HttpClientError on a non-retryable status
   * @throws RetriesExhaustedError once every attempt has failed
   */
  async request(
    request: HttpRequest,
    options: RequestOptions = {}
  ): Promise<HttpResult> {
    const log = this.logger.child({
      method: request.method,
      url: request.url,
      ...request.context,
    });

    if (options.dryRun === true) {
      log.info(
        { payload: request.body },
        `[dry-run] Would ${request.method} ${request.url}`
      );
      return { kind: "dry-run" };
    }

    let state: AttemptingState = initialRetryState(this.policy);

    for (;;) {
      const { attempt } = state;
      const maxAttempts = this.policy.maxAttempts;

      log.info(
        { attempt, maxAttempts },
        `${request.description} attempt ${String(attempt)}/${String(maxAttempts)}`
      );

      const result = await this.attempt(request);

      if (result.kind === "network-error") {
        const next = nextRetryState(state, "retryable", this.policy);
        log.warn(
          { attempt, maxAttempts, error: errorMessage(result.error) },
          `Network error during ${request.description}`
        );

        if (next.phase !== "retrying") {
          throw new RetriesExhaustedError(
            `${request.description} failed after ${String(attempt)} attempt(s): ${errorMessage(result.error)}`,
            attempt,
            undefined,
            { cause: result.error }
          );
        }

        await this.sleepFn(next.waitMs);
        state = resumeAfterWait(next);
        continue;
      }

      const { status, body } = result;
      const next = nextRetryState(state, classifyStatus(status), this.policy);

      switch (next.phase) {
        case "succeeded": {
          const rejection = checkBody(request, body);
          if (rejection === undefined) {
            log.info(
              { status, attempt },
              `${request.description} succeeded (status=${String(status)})`
            );
            return result;
          }

          const retry = nextRetryState(state, "retryable", this.policy);
          log.warn(
            { status, attempt, maxAttempts, error: rejection.message },
            `Unusable response during ${request.description}`
          );
          if (retry.phase !== "retrying") {
            throw rejection;
          }
          await this.sleepFn(retry.waitMs);
          state = resumeAfterWait(retry);
          continue;
        }

        case "fatal":
          log.error(
            { status, response: body },
            `Client error ${String(status)} during ${request.description}`
          );
          throw new HttpClientError(
            `${request.description} failed with status ${String(status)}`,
            status,
            body
          );

        case "retrying":
          log.warn(
            { status, attempt, maxAttempts, response: body },
            `Server error ${String(status)} during ${request.description}`
          );
          await this.sleepFn(next.waitMs);
          state = resumeAfterWait(next);
          continue;

        case "exhausted":
          log.warn(
            { status, attempt, maxAttempts, response: body },
            `Server error ${String(status)} during ${request.description}`
          );
          throw new RetriesExhaustedError(
            `${request.description} failed after ${String(attempt)} attempt(s) with status ${String(status)}`,
            attempt,
            status
          );

        default:
          // nextRetryState never yields "attempting"
          throw new Error(`Unexpected retry phase: ${next.phase}`);
      }
    }
  }

  private async attempt(request: HttpRequest): Promise<AttemptResult> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...request.headers,
    };
    const init: RequestInit = {
      method: request.method,
      headers,
      signal: AbortSignal.timeout(request.timeoutMs),
    };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(request.body);
    }

    const startTime = performance.now();
    try {
      const response = await this.fetchFn(request.url, init);
      const body = await response.text();
      const duration = Math.round(performance.now() - startTime);

      this.logger.debug(
        {
          method: request.method,
          url: request.url,
          status: response.status,
          duration: `${String(duration)}ms`,
        },
        "Received response"
      );

      return { kind: "response", status: response.status, body };
    } catch (error) {
      return { kind: "network-error", error };
    }
  }
}

function checkBody(request: HttpRequest, body: string): Error | undefined {
  if (request.validate === undefined) {
    return undefined;
  }
  try {
    request.validate(body);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error : new Error(errorMessage(error));
  }
}

/**
 * Parse a JSON response body, returning `unknown` for schema validation
 */
export function parseJsonBody(body: string): unknown {
  return body.trim() === "" ? null : (JSON.parse(body) as unknown);
}

/**
 * Encode a Basic authorization header value
 */
export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}
