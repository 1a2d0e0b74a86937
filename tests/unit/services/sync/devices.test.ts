import { describe, it, expect, vi } from "vitest";

import { RetryingHttpClient, type HttpResult } from "../../../../src/client/http.js";
import { InventoryClient } from "../../../../src/client/inventory.js";
import { HttpClientError } from "../../../../src/errors.js";
import { createSilentLogger } from "../../../../src/logger.js";
import { LocationLookup, TagCatalog } from "../../../../src/services/references.js";
import {
  exitCodeFor,
  runDeviceSync,
  tagsInRecords,
  type DeviceMutations,
} from "../../../../src/services/sync/index.js";
import {
  createFetchMock,
  createSleepRecorder,
  type FetchHandler,
} from "../../../mocks/fetch.js";

import type { DeviceRecord } from "../../../../src/types/index.js";

const logger = createSilentLogger();

const lookup = LocationLookup.fromLocations(
  [
    { id: "loc-1", name: "Building A" },
    { id: "loc-2", name: "Building B" },
  ],
  logger
);

const tags = TagCatalog.fromTags([{ name: "core" }, { name: "edge" }]);

const ok: HttpResult = { kind: "response", status: 200, body: "" };

function createMutations() {
  return {
    setDeviceLocation: vi.fn<DeviceMutations["setDeviceLocation"]>(() =>
      Promise.resolve(ok)
    ),
    addDeviceTags: vi.fn<DeviceMutations["addDeviceTags"]>(() =>
      Promise.resolve(ok)
    ),
  };
}

function createInventory(handler: FetchHandler, dryRun = false) {
  const fetchMock = createFetchMock(handler);
  const sleeper = createSleepRecorder();
  const client = new InventoryClient(
    new RetryingHttpClient({
      logger,
      fetch: fetchMock.fetch,
      sleep: sleeper.sleep,
    }),
    {
      baseUrl: "https://inventory.test/api",
      networkId: "100",
      apiKeyId: "test-key",
      apiSecret: "test-secret",
      dryRun,
    }
  );
  return { client, calls: fetchMock.calls, waits: sleeper.waits };
}

const threeDevices: DeviceRecord[] = [
  { device: "sw-1", location: "Building A", row: 2 },
  { device: "sw-2", location: "Annex", row: 3 },
  { device: "sw-3", location: "building b", row: 4 },
];

describe("services/sync/devices", () => {
  it("should update every resolvable device in file order", async () => {
    const client = createMutations();

    const outcome = await runDeviceSync(
      [
        { device: "sw-1", location: "Building A", row: 2 },
        { device: "sw-2", location: "BUILDING B", tag: "Core", row: 3 },
      ],
      lookup,
      tags,
      { client, logger }
    );

    expect(client.setDeviceLocation.mock.calls).toEqual([
      ["sw-1", "loc-1"],
      ["sw-2", "loc-2"],
    ]);
    expect(client.addDeviceTags.mock.calls).toEqual([[["sw-2"], ["Core"]]]);
    expect(outcome).toEqual({ processed: 2, succeeded: 2, failures: [] });
    expect(exitCodeFor(outcome)).toBe(0);
  });

  it("should skip a device with an unknown tag without any mutation", async () => {
    const client = createMutations();

    const outcome = await runDeviceSync(
      [{ device: "sw-1", location: "Building A", tag: "wan", row: 2 }],
      lookup,
      tags,
      { client, logger }
    );

    expect(outcome.failures).toEqual([
      { record: "sw-1", row: 2, stage: "tag", reason: "Unknown tag 'wan'" },
    ]);
    expect(client.setDeviceLocation).not.toHaveBeenCalled();
    expect(client.addDeviceTags).not.toHaveBeenCalled();
  });

  it("should continue past an unresolved location", async () => {
    const client = createMutations();

    const outcome = await runDeviceSync(threeDevices, lookup, tags, {
      client,
      logger,
    });

    expect(client.setDeviceLocation.mock.calls).toEqual([
      ["sw-1", "loc-1"],
      ["sw-3", "loc-2"],
    ]);
    expect(outcome.failures).toEqual([
      {
        record: "sw-2",
        row: 3,
        stage: "location-lookup",
        reason: "Unknown location 'Annex'",
      },
    ]);
    expect(outcome.processed).toBe(3);
    expect(outcome.succeeded).toBe(2);
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it("should not tag a device whose location update failed", async () => {
    const client = createMutations();
    client.setDeviceLocation.mockRejectedValueOnce(
      new HttpClientError("Location PATCH failed with status 404", 404, "")
    );

    const outcome = await runDeviceSync(
      [
        { device: "sw-1", location: "Building A", tag: "core", row: 2 },
        { device: "sw-2", location: "Building B", tag: "edge", row: 3 },
      ],
      lookup,
      tags,
      { client, logger }
    );

    expect(outcome.failures).toEqual([
      {
        record: "sw-1",
        row: 2,
        stage: "location-update",
        reason: "Location PATCH failed with status 404",
      },
    ]);
    expect(client.addDeviceTags.mock.calls).toEqual([[["sw-2"], ["edge"]]]);
  });

  it("should keep the location change when tagging fails", async () => {
    const client = createMutations();
    client.addDeviceTags.mockRejectedValueOnce(new Error("tag rejected"));

    const outcome = await runDeviceSync(
      [{ device: "sw-1", location: "Building A", tag: "core", row: 2 }],
      lookup,
      tags,
      { client, logger }
    );

    expect(client.setDeviceLocation).toHaveBeenCalledTimes(1);
    expect(outcome.failures).toEqual([
      { record: "sw-1", row: 2, stage: "tag-update", reason: "tag rejected" },
    ]);
    expect(outcome.succeeded).toBe(0);
  });

  it("should produce the same result when run twice", async () => {
    const first = createMutations();
    const second = createMutations();

    const a = await runDeviceSync(threeDevices, lookup, tags, { client: first, logger });
    const b = await runDeviceSync(threeDevices, lookup, tags, { client: second, logger });

    expect(b).toEqual(a);
    expect(second.setDeviceLocation.mock.calls).toEqual(
      first.setDeviceLocation.mock.calls
    );
  });

  describe("against the inventory client", () => {
    it("should retry a failing device and carry on with the rest", async () => {
      const { client, calls, waits } = createInventory((call) => {
        const body = call.body;
        const isSw2 =
          typeof body === "object" && body !== null && "sw-2" in body;
        return isSw2 ? { status: 500, body: "unavailable" } : { status: 200 };
      });

      const outcome = await runDeviceSync(
        [
          { device: "sw-1", location: "Building A", row: 2 },
          { device: "sw-2", location: "Building B", row: 3 },
          { device: "sw-3", location: "Building A", row: 4 },
        ],
        lookup,
        tags,
        { client, logger }
      );

      expect(calls.map((call) => call.body)).toEqual([
        { "sw-1": "loc-1" },
        { "sw-2": "loc-2" },
        { "sw-2": "loc-2" },
        { "sw-2": "loc-2" },
        { "sw-3": "loc-1" },
      ]);
      expect(waits).toEqual([1000, 2000]);
      expect(outcome.failures).toHaveLength(1);
      expect(outcome.failures[0]).toMatchObject({
        record: "sw-2",
        stage: "location-update",
      });
    });

    it("should issue mutation calls only for resolvable records", async () => {
      const { client, calls } = createInventory(() => ({ status: 200 }));

      const outcome = await runDeviceSync(threeDevices, lookup, tags, {
        client,
        logger,
      });

      expect(calls.map((call) => call.body)).toEqual([
        { "sw-1": "loc-1" },
        { "sw-3": "loc-2" },
      ]);
      expect(outcome.failures).toHaveLength(1);
      expect(exitCodeFor(outcome)).toBe(1);
    });

    it("should make no outbound calls in dry-run mode", async () => {
      const { client, calls } = createInventory(() => ({ status: 500 }), true);

      const outcome = await runDeviceSync(
        [
          { device: "sw-1", location: "Building A", tag: "core", row: 2 },
          { device: "sw-3", location: "Building B", row: 3 },
        ],
        lookup,
        tags,
        { client, logger }
      );

      expect(calls).toHaveLength(0);
      expect(outcome).toEqual({ processed: 2, succeeded: 2, failures: [] });
      expect(exitCodeFor(outcome)).toBe(0);
    });
  });

  describe("tagsInRecords", () => {
    it("should collect distinct tags", () => {
      expect(
        tagsInRecords([
          { device: "a", location: "x", tag: "core", row: 2 },
          { device: "b", location: "x", row: 3 },
          { device: "c", location: "x", tag: "core", row: 4 },
        ])
      ).toEqual(new Set(["core"]));
    });
  });
});
