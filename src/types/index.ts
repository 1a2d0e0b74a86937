// Inventory sync record and run types

// =====================
// Input Records
// =====================

/**
 * One row of a devices CSV: device name, location name and an optional tag
 */
export interface DeviceRecord {
  readonly device: string;
  readonly location: string;
  readonly tag?: string;
  /** 1-based line number in the source file (header is row 1) */
  readonly row: number;
}

/**
 * One row of a locations CSV. Coordinates are optional and geocoded when absent.
 */
export interface LocationRecord {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly lat?: number;
  readonly lng?: number;
  readonly row: number;
}

export interface Coordinates {
  lat: number;
  lng: number;
}

/**
 * Body of POST /networks/{networkId}/locations
 */
export interface LocationPayload {
  id: string;
  name: string;
  lat: number;
  lng: number;
}

// =====================
// Run Outcome
// =====================

export type FailureStage =
  | "tag"
  | "location-lookup"
  | "location-update"
  | "tag-update"
  | "geocode"
  | "location-create";

export interface RecordFailure {
  /** Device name or location id */
  record: string;
  row: number;
  stage: FailureStage;
  reason: string;
}

export interface RunOutcome {
  processed: number;
  succeeded: number;
  failures: RecordFailure[];
}
