/**
 * Coordinate resolution for location records
 */

import type { SleepFn } from "../client/http.js";
import type { Logger } from "../logger.js";
import type { Coordinates, LocationRecord } from "../types/index.js";

export const GEOCODE_DELAY_MS = 1000;

export interface AddressGeocoder {
  geocode(address: string): Promise<Coordinates>;
}

export interface CoordinateDeps {
  geocoder: AddressGeocoder;
  sleep: SleepFn;
  logger: Logger;
  /** Pause after every geocoding call, to stay under the service's rate limit */
  delayMs?: number;
}

export function hasCoordinates(
  record: LocationRecord
): record is LocationRecord & Coordinates {
  return record.lat !== undefined && record.lng !== undefined;
}

/**
 * Return the record's own coordinates, or geocode its address.
 * The delay follows every geocoding call, successful or not, and is skipped
 * when no call was made.
 */
export async function resolveCoordinates(
  record: LocationRecord,
  deps: CoordinateDeps
): Promise<Coordinates> {
  if (hasCoordinates(record)) {
    deps.logger.info(
      { locationId: record.id, lat: record.lat, lng: record.lng },
      `Using existing lat/lng for '${record.name}'`
    );
    return { lat: record.lat, lng: record.lng };
  }

  deps.logger.info(
    { locationId: record.id, address: record.address },
    `Geocoding address for '${record.name}'`
  );

  try {
    const coordinates = await deps.geocoder.geocode(record.address);
    deps.logger.info(
      { locationId: record.id, ...coordinates },
      `Geocoded '${record.name}'`
    );
    return coordinates;
  } finally {
    await deps.sleep(deps.delayMs ?? GEOCODE_DELAY_MS);
  }
}
