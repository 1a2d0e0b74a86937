import { describe, it, expect } from "vitest";

import {
  RETRY_DEFAULTS,
  backoffSchedule,
  classifyStatus,
  initialRetryState,
  nextRetryState,
  resumeAfterWait,
  type RetryPolicy,
} from "../../../src/client/retry.js";

describe("client/retry", () => {
  describe("classifyStatus", () => {
    it("should treat 2xx as success", () => {
      expect(classifyStatus(200)).toBe("success");
      expect(classifyStatus(201)).toBe("success");
      expect(classifyStatus(299)).toBe("success");
    });

    it("should treat client errors as fatal", () => {
      expect(classifyStatus(400)).toBe("fatal");
      expect(classifyStatus(401)).toBe("fatal");
      expect(classifyStatus(404)).toBe("fatal");
      expect(classifyStatus(499)).toBe("fatal");
    });

    it("should retry rate limiting and server errors", () => {
      expect(classifyStatus(429)).toBe("retryable");
      expect(classifyStatus(500)).toBe("retryable");
      expect(classifyStatus(503)).toBe("retryable");
      expect(classifyStatus(599)).toBe("retryable");
    });

    it("should treat anything else as fatal", () => {
      expect(classifyStatus(302)).toBe("fatal");
      expect(classifyStatus(600)).toBe("fatal");
    });
  });

  describe("state transitions", () => {
    it("should start on attempt 1 with the initial delay", () => {
      expect(initialRetryState()).toEqual({
        phase: "attempting",
        attempt: 1,
        delayMs: 1000,
      });
    });

    it("should succeed without waiting", () => {
      expect(nextRetryState(initialRetryState(), "success")).toEqual({
        phase: "succeeded",
        attempt: 1,
      });
    });

    it("should stop immediately on a fatal classification", () => {
      expect(nextRetryState(initialRetryState(), "fatal")).toEqual({
        phase: "fatal",
        attempt: 1,
      });
    });

    it("should double the delay after each retryable failure", () => {
      const first = nextRetryState(initialRetryState(), "retryable");
      expect(first).toEqual({
        phase: "retrying",
        attempt: 1,
        waitMs: 1000,
        nextDelayMs: 2000,
      });
      if (first.phase !== "retrying") throw new Error("expected retrying");

      const second = resumeAfterWait(first);
      expect(second).toEqual({ phase: "attempting", attempt: 2, delayMs: 2000 });

      const third = nextRetryState(second, "retryable");
      expect(third).toEqual({
        phase: "retrying",
        attempt: 2,
        waitMs: 2000,
        nextDelayMs: 4000,
      });
    });

    it("should exhaust on the final attempt without scheduling a wait", () => {
      const last = { phase: "attempting" as const, attempt: 3, delayMs: 4000 };
      expect(nextRetryState(last, "retryable")).toEqual({
        phase: "exhausted",
        attempt: 3,
      });
    });

    it("should still report success on the final attempt", () => {
      const last = { phase: "attempting" as const, attempt: 3, delayMs: 4000 };
      expect(nextRetryState(last, "success")).toEqual({
        phase: "succeeded",
        attempt: 3,
      });
    });
  });

  describe("backoffSchedule", () => {
    it("should wait 1s then 2s with the default policy", () => {
      expect(RETRY_DEFAULTS.maxAttempts).toBe(3);
      expect(backoffSchedule()).toEqual([1000, 2000]);
    });

    it("should follow a custom policy", () => {
      const policy: RetryPolicy = {
        maxAttempts: 4,
        initialDelayMs: 100,
        backoffMultiplier: 3,
      };
      expect(backoffSchedule(policy)).toEqual([100, 300, 900]);
    });

    it("should never wait with a single attempt", () => {
      expect(
        backoffSchedule({ maxAttempts: 1, initialDelayMs: 1000, backoffMultiplier: 2 })
      ).toEqual([]);
    });
  });
});
