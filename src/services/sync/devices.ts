/**
 * Device sync: move each device to its location and attach its tag
 *
 * Records are processed one at a time in file order. A failed record is
 * counted and skipped; it never stops the run. A tag failure after a
 * successful location update leaves the location change in place.
 */

import { errorMessage } from "../../errors.js";

import { OutcomeRecorder } from "./outcome.js";

import type { HttpResult } from "../../client/http.js";
import type { Logger } from "../../logger.js";
import type { DeviceRecord, RunOutcome } from "../../types/index.js";
import type { LocationLookup, TagCatalog } from "../references.js";

export interface DeviceMutations {
  setDeviceLocation(device: string, locationId: string): Promise<HttpResult>;
  addDeviceTags(devices: string[], tags: string[]): Promise<HttpResult>;
}

export interface DeviceSyncDeps {
  client: DeviceMutations;
  logger: Logger;
}

/**
 * Tags referenced by the records, for deciding whether the tag catalog is needed
 */
export function tagsInRecords(records: readonly DeviceRecord[]): Set<string> {
  const tags = new Set<string>();
  for (const record of records) {
    if (record.tag !== undefined) {
      tags.add(record.tag);
    }
  }
  return tags;
}

export async function runDeviceSync(
  records: readonly DeviceRecord[],
  locations: LocationLookup,
  tags: TagCatalog,
  deps: DeviceSyncDeps
): Promise<RunOutcome> {
  const { client, logger } = deps;
  const outcome = new OutcomeRecorder();

  for (const [index, record] of records.entries()) {
    const { device, tag } = record;
    const log = logger.child({ device, row: record.row });
    const progress = `[${String(index + 1)}/${String(records.length)}]`;

    if (tag !== undefined && !tags.has(tag)) {
      log.error({ tag }, `Tag '${tag}' not found in inventory (device '${device}')`);
      outcome.failure(device, record.row, "tag", `Unknown tag '${tag}'`);
      continue;
    }

    const locationId = locations.resolve(record.location);
    if (locationId === undefined) {
      log.error(
        { location: record.location },
        `No location found matching name '${record.location}' for device '${device}'`
      );
      outcome.failure(
        device,
        record.row,
        "location-lookup",
        `Unknown location '${record.location}'`
      );
      continue;
    }

    log.info(
      { location: record.location, locationId, tag },
      `${progress} Processing device '${device}' -> location '${record.location}' (id=${locationId})`
    );

    try {
      await client.setDeviceLocation(device, locationId);
    } catch (error) {
      log.error({ error: errorMessage(error) }, `Failed to update location for device '${device}'`);
      outcome.failure(device, record.row, "location-update", errorMessage(error));
      continue;
    }

    if (tag !== undefined) {
      try {
        await client.addDeviceTags([device], [tag]);
      } catch (error) {
        log.error({ tag, error: errorMessage(error) }, `Failed to tag device '${device}'`);
        outcome.failure(device, record.row, "tag-update", errorMessage(error));
        continue;
      }
    }

    outcome.success();
  }

  const result = outcome.toOutcome();
  if (result.failures.length > 0) {
    logger.error(
      { failures: result.failures.length, processed: result.processed },
      `Completed with ${String(result.failures.length)} failure(s).`
    );
  } else {
    logger.info(
      { processed: result.processed },
      "All device updates completed successfully."
    );
  }

  return result;
}
