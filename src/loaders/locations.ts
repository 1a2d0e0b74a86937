/**
 * Locations CSV loader
 *
 * Required columns: id, name, address. Optional: lat, lng.
 * Incomplete rows are skipped with a warning and loading continues.
 */

import { assertColumns, cell, readCsvFile, rowNumber, type CsvTable } from "./csv.js";

import type { Logger } from "../logger.js";
import type { LocationRecord } from "../types/index.js";

export const LOCATION_COLUMNS = ["id", "name", "address"] as const;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseCoordinate(
  value: string,
  field: "lat" | "lng",
  locationId: string,
  logger: Logger
): number | undefined {
  if (value === "") {
    return undefined;
  }

  const parsed = DECIMAL_PATTERN.test(value) ? Number.parseFloat(value) : NaN;
  if (!Number.isFinite(parsed)) {
    logger.warn(
      { locationId, field, value },
      `Invalid ${field} '${value}' for id=${locationId}, ignoring`
    );
    return undefined;
  }
  return parsed;
}

export function locationsFromTable(
  table: CsvTable,
  logger: Logger
): LocationRecord[] {
  assertColumns(table, LOCATION_COLUMNS);

  const hasLat = table.columns.includes("lat");
  const hasLng = table.columns.includes("lng");
  const locations: LocationRecord[] = [];

  for (const [index, row] of table.rows.entries()) {
    const line = rowNumber(index);
    const id = cell(row, "id");
    const name = cell(row, "name");
    const address = cell(row, "address");

    if (id === "" || name === "" || address === "") {
      logger.warn(
        { row: line, values: row },
        "Skipping incomplete row (missing id/name/address)"
      );
      continue;
    }

    const lat = hasLat
      ? parseCoordinate(cell(row, "lat"), "lat", id, logger)
      : undefined;
    const lng = hasLng
      ? parseCoordinate(cell(row, "lng"), "lng", id, logger)
      : undefined;

    locations.push(
      Object.freeze({
        id,
        name,
        address,
        ...(lat !== undefined ? { lat } : {}),
        ...(lng !== undefined ? { lng } : {}),
        row: line,
      })
    );
  }

  return locations;
}

/**
 * @throws CsvSchemaError when a required column is missing
 */
export function loadLocationRecords(
  filePath: string,
  logger: Logger
): LocationRecord[] {
  logger.info({ file: filePath }, "Loading locations CSV");
  const locations = locationsFromTable(readCsvFile(filePath), logger);
  logger.info(
    { locationCount: locations.length },
    `Loaded ${String(locations.length)} location(s) from CSV`
  );
  return locations;
}
