/**
 * Shared CSV reading for the record loaders
 */

import fs from "node:fs";

import { parse } from "csv-parse/sync";

import { CsvSchemaError } from "../errors.js";

export type CsvRow = Record<string, string>;

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
}

function toRow(value: unknown): CsvRow {
  const row: CsvRow = {};
  if (typeof value === "object" && value !== null) {
    for (const [key, cell] of Object.entries(value)) {
      row[key] = typeof cell === "string" ? cell : "";
    }
  }
  return row;
}

/**
 * Parse CSV text with a header row into column names and rows
 */
export function parseCsv(content: string): CsvTable {
  let columns: string[] = [];

  const parsed: unknown = parse(content, {
    columns: (header: string[]) => {
      columns = header.map((name) => name.trim());
      return columns;
    },
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  const rows = Array.isArray(parsed) ? parsed.map(toRow) : [];
  return { columns, rows };
}

export function readCsvFile(filePath: string): CsvTable {
  const content = fs.readFileSync(filePath, "utf-8");
  return parseCsv(content);
}

/**
 * @throws CsvSchemaError listing every required column the header lacks
 */
export function assertColumns(
  table: CsvTable,
  required: readonly string[]
): void {
  const missing = required.filter((name) => !table.columns.includes(name));
  if (missing.length > 0) {
    throw new CsvSchemaError([...missing].sort(), table.columns);
  }
}

export function cell(row: CsvRow, column: string): string {
  return (row[column] ?? "").trim();
}

/**
 * Line number of the n-th data row (0-based), counting the header as row 1
 */
export function rowNumber(index: number): number {
  return index + 2;
}
