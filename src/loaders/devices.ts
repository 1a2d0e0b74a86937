/**
 * Devices CSV loader
 *
 * Required columns: device, location. Optional: tag (one tag per row).
 * Every row problem is collected and reported together; nothing is loaded
 * when any row is invalid.
 */

import { CsvValidationError } from "../errors.js";

import { assertColumns, cell, readCsvFile, rowNumber, type CsvTable } from "./csv.js";

import type { Logger } from "../logger.js";
import type { DeviceRecord } from "../types/index.js";

export const DEVICE_COLUMNS = ["device", "location"] as const;

export const TAG_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

export function devicesFromTable(table: CsvTable): DeviceRecord[] {
  assertColumns(table, DEVICE_COLUMNS);

  const hasTagColumn = table.columns.includes("tag");
  const devices: DeviceRecord[] = [];
  const errors: string[] = [];

  for (const [index, row] of table.rows.entries()) {
    const line = rowNumber(index);
    const device = cell(row, "device");
    const location = cell(row, "location");
    const tag = hasTagColumn ? cell(row, "tag") : "";

    if (device === "" || location === "") {
      errors.push(
        `Row ${String(line)}: missing device/location -> ${JSON.stringify(row)}`
      );
      continue;
    }

    if (tag !== "" && !isValidTag(tag)) {
      errors.push(
        `Row ${String(line)}: invalid tag '${tag}' (must be letters/numbers/_/-)`
      );
      continue;
    }

    devices.push(
      Object.freeze({
        device,
        location,
        ...(tag !== "" ? { tag } : {}),
        row: line,
      })
    );
  }

  if (errors.length > 0) {
    throw new CsvValidationError(errors);
  }

  return devices;
}

/**
 * @throws CsvSchemaError when a required column is missing
 * @throws CsvValidationError when any row is invalid
 */
export function loadDeviceRecords(
  filePath: string,
  logger: Logger
): DeviceRecord[] {
  logger.info({ file: filePath }, "Loading devices CSV");
  const devices = devicesFromTable(readCsvFile(filePath));
  logger.info(
    { deviceCount: devices.length },
    `Loaded ${String(devices.length)} device mapping(s) from CSV`
  );
  return devices;
}
