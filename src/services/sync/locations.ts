/**
 * Location sync: fill in coordinates, then create each location
 */

import { writeFileSync } from "node:fs";

import { NoLocationsPreparedError, errorMessage } from "../../errors.js";
import { resolveCoordinates, type CoordinateDeps } from "../coordinates.js";

import { OutcomeRecorder } from "./outcome.js";

import type { HttpResult } from "../../client/http.js";
import type { Logger } from "../../logger.js";
import type {
  LocationPayload,
  LocationRecord,
  RunOutcome,
} from "../../types/index.js";

export const DEFAULT_DRY_RUN_OUTPUT = "locations_payload.json";

export interface LocationMutations {
  createLocation(location: LocationPayload): Promise<HttpResult>;
}

export interface LocationSyncDeps {
  client: LocationMutations;
  coordinates: CoordinateDeps;
  logger: Logger;
  dryRun: boolean;
  /** Where the prepared payload is written in dry-run mode */
  dryRunOutput?: string;
}

export interface LocationSyncResult {
  outcome: RunOutcome;
  payload: LocationPayload[];
}

export function writePayloadFile(
  payload: readonly LocationPayload[],
  filePath: string
): void {
  writeFileSync(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
}

/**
 * @throws NoLocationsPreparedError when there is nothing to send
 */
export async function runLocationSync(
  records: readonly LocationRecord[],
  deps: LocationSyncDeps
): Promise<LocationSyncResult> {
  const { client, logger } = deps;
  const outcome = new OutcomeRecorder();

  if (records.length === 0) {
    throw new NoLocationsPreparedError("No valid locations found in CSV.");
  }

  // Coordinates first, so the whole payload can be reviewed before any POST
  const prepared: { location: LocationPayload; row: number }[] = [];

  for (const [index, record] of records.entries()) {
    const log = logger.child({ locationId: record.id, row: record.row });
    log.debug(`[${String(index + 1)}/${String(records.length)}] Preparing location`);

    try {
      const { lat, lng } = await resolveCoordinates(record, deps.coordinates);
      prepared.push({
        location: { id: record.id, name: record.name, lat, lng },
        row: record.row,
      });
    } catch (error) {
      log.error(
        { address: record.address, error: errorMessage(error) },
        `FAILED geocoding '${record.name}'`
      );
      outcome.failure(record.id, record.row, "geocode", errorMessage(error));
    }
  }

  const payload = prepared.map((entry) => entry.location);

  logger.info(
    { prepared: payload.length, total: records.length },
    `Successfully prepared coordinates for ${String(payload.length)} of ${String(records.length)} location(s)`
  );

  if (payload.length === 0) {
    throw new NoLocationsPreparedError(
      "No locations successfully prepared with coordinates."
    );
  }

  logger.info({ payload }, "Final location payload");

  if (deps.dryRun) {
    const output = deps.dryRunOutput ?? DEFAULT_DRY_RUN_OUTPUT;
    writePayloadFile(payload, output);
    logger.info({ file: output }, `Dry run: payload written to ${output}`);
  }

  logger.info(
    { count: payload.length },
    `Posting ${String(payload.length)} location(s) individually`
  );

  for (const { location, row } of prepared) {
    try {
      await client.createLocation(location);
      outcome.success();
    } catch (error) {
      logger.error(
        { locationId: location.id, error: errorMessage(error) },
        `Failed to POST location id=${location.id}`
      );
      outcome.failure(location.id, row, "location-create", errorMessage(error));
    }
  }

  const result = outcome.toOutcome();
  if (result.failures.length > 0) {
    logger.error(
      { failures: result.failures.length, processed: result.processed },
      `Completed with ${String(result.failures.length)} failure(s).`
    );
  } else {
    logger.info({ processed: result.processed }, "All locations completed successfully.");
  }

  return { outcome: result, payload };
}
