/**
 * Retry policy for outbound HTTP calls
 *
 * A small state machine driven by response classification. Every function here
 * is pure: the HTTP client owns the sleeping and the I/O.
 */

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
}

export const RETRY_DEFAULTS: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
});

export type Classification = "success" | "retryable" | "fatal";

// ============================================================================
// States
// ============================================================================

export interface AttemptingState {
  phase: "attempting";
  attempt: number;
  delayMs: number;
}

export interface RetryingState {
  phase: "retrying";
  attempt: number;
  waitMs: number;
  nextDelayMs: number;
}

export interface SucceededState {
  phase: "succeeded";
  attempt: number;
}

export interface ExhaustedState {
  phase: "exhausted";
  attempt: number;
}

export interface FatalState {
  phase: "fatal";
  attempt: number;
}

export type RetryState =
  | AttemptingState
  | RetryingState
  | SucceededState
  | ExhaustedState
  | FatalState;

// ============================================================================
// Transitions
// ============================================================================

/**
 * Classify an HTTP status code.
 * 429 is the only 4xx worth retrying.
 */
export function classifyStatus(status: number): Classification {
  if (status >= 200 && status < 300) {
    return "success";
  }
  if (status === 429 || (status >= 500 && status < 600)) {
    return "retryable";
  }
  return "fatal";
}

export function initialRetryState(
  policy: RetryPolicy = RETRY_DEFAULTS
): AttemptingState {
  return { phase: "attempting", attempt: 1, delayMs: policy.initialDelayMs };
}

export function nextRetryState(
  state: AttemptingState,
  classification: Classification,
  policy: RetryPolicy = RETRY_DEFAULTS
): RetryState {
  switch (classification) {
    case "success":
      return { phase: "succeeded", attempt: state.attempt };
    case "fatal":
      return { phase: "fatal", attempt: state.attempt };
    case "retryable":
      if (state.attempt >= policy.maxAttempts) {
        return { phase: "exhausted", attempt: state.attempt };
      }
      return {
        phase: "retrying",
        attempt: state.attempt,
        waitMs: state.delayMs,
        nextDelayMs: state.delayMs * policy.backoffMultiplier,
      };
  }
}

export function resumeAfterWait(state: RetryingState): AttemptingState {
  return {
    phase: "attempting",
    attempt: state.attempt + 1,
    delayMs: state.nextDelayMs,
  };
}

/**
 * Waits the policy would schedule before each retry, in order
 */
export function backoffSchedule(policy: RetryPolicy = RETRY_DEFAULTS): number[] {
  const waits: number[] = [];
  let state: RetryState = initialRetryState(policy);

  while (state.phase === "attempting") {
    const next = nextRetryState(state, "retryable", policy);
    if (next.phase !== "retrying") {
      break;
    }
    waits.push(next.waitMs);
    state = resumeAfterWait(next);
  }

  return waits;
}
