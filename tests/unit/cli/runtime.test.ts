import { describe, it, expect } from "vitest";

import { createRuntime, resolveConfig } from "../../../src/cli/utils/runtime.js";
import { ConfigError } from "../../../src/errors.js";

const env = {
  INVENTORY_API_BASE_URL: "https://inventory.test/api",
  NETWORK_ID: "100",
  API_KEY_ID: "test-key",
  API_SECRET: "test-secret",
  LOG_LEVEL: "error",
};

describe("cli/utils/runtime", () => {
  describe("resolveConfig", () => {
    it("should keep environment values without flags", () => {
      const config = resolveConfig({}, env);

      expect(config.dryRun).toBe(false);
      expect(config.logLevel).toBe("error");
    });

    it("should enable dry-run from the flag", () => {
      expect(resolveConfig({ dryRun: true }, env).dryRun).toBe(true);
    });

    it("should keep dry-run from the environment when the flag is absent", () => {
      expect(resolveConfig({}, { ...env, DRY_RUN: "true" }).dryRun).toBe(true);
    });

    it("should let --log-level override LOG_LEVEL", () => {
      expect(resolveConfig({ logLevel: "DEBUG" }, env).logLevel).toBe("debug");
    });

    it("should reject an unknown --log-level", () => {
      expect(() => resolveConfig({ logLevel: "chatty" }, env)).toThrow(
        ConfigError
      );
    });
  });

  describe("createRuntime", () => {
    it("should wire clients from the configuration", () => {
      const runtime = createRuntime({ dryRun: true }, env);

      expect(runtime.config.dryRun).toBe(true);
      expect(runtime.inventory.locationsUrl).toBe(
        "https://inventory.test/api/networks/100/locations"
      );
      expect(runtime.geocoder.searchUrl("HQ")).toBe(
        "https://nominatim.openstreetmap.org/search?q=HQ&format=json&addressdetails=1&limit=1"
      );
    });

    it("should fail before any wiring when configuration is missing", () => {
      expect(() => createRuntime({}, {})).toThrow(ConfigError);
    });
  });
});
