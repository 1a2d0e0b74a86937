/**
 * Reference lookups built once per run
 *
 * - LocationLookup: location name (case-insensitive) -> remote location id
 * - TagCatalog: set of device tag names known to the network
 */

import { UnexpectedResponseError } from "../errors.js";

import type {
  RemoteDeviceTag,
  RemoteLocation,
} from "../client/schemas.js";
import type { Logger } from "../logger.js";

export interface NameConflict {
  name: string;
  previousId: string;
  id: string;
}

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Text form of a loosely typed remote field; absent or structured values are ""
 */
export function fieldText(value: unknown): string {
  switch (typeof value) {
    case "string":
      return value.trim();
    case "number":
    case "bigint":
    case "boolean":
      return String(value);
    default:
      return "";
  }
}

// ============================================================================
// LocationLookup
// ============================================================================

export class LocationLookup {
  private constructor(
    private readonly byName: ReadonlyMap<string, string>,
    readonly conflicts: readonly NameConflict[]
  ) {
    Object.freeze(this);
  }

  /**
   * Build the lookup from the remote location list.
   * A name seen twice with different ids is reported and the later id wins.
   *
   * @throws UnexpectedResponseError when no usable location is present
   */
  static fromLocations(
    locations: readonly RemoteLocation[],
    logger: Logger
  ): LocationLookup {
    const byName = new Map<string, string>();
    const conflicts: NameConflict[] = [];

    for (const location of locations) {
      const id = fieldText(location.id);
      const name = fieldText(location.name);
      if (id === "" || name === "") {
        continue;
      }

      const key = normalizeKey(name);
      const previousId = byName.get(key);
      if (previousId !== undefined && previousId !== id) {
        logger.warn(
          { name, previousId, id },
          `Duplicate location name detected: '${name}' -> ids [${previousId}, ${id}]`
        );
        conflicts.push({ name, previousId, id });
      }
      byName.set(key, id);
    }

    if (byName.size === 0) {
      throw new UnexpectedResponseError(
        "No locations returned from API; cannot continue."
      );
    }

    return new LocationLookup(byName, Object.freeze(conflicts));
  }

  get size(): number {
    return this.byName.size;
  }

  resolve(name: string): string | undefined {
    return this.byName.get(normalizeKey(name));
  }
}

// ============================================================================
// TagCatalog
// ============================================================================

export class TagCatalog {
  private constructor(private readonly names: ReadonlySet<string>) {
    Object.freeze(this);
  }

  static fromTags(tags: readonly RemoteDeviceTag[]): TagCatalog {
    const names = new Set<string>();
    for (const tag of tags) {
      const name = fieldText(tag.name);
      if (name !== "") {
        names.add(normalizeKey(name));
      }
    }
    return new TagCatalog(names);
  }

  static empty(): TagCatalog {
    return new TagCatalog(new Set<string>());
  }

  get size(): number {
    return this.names.size;
  }

  has(tag: string): boolean {
    return this.names.has(normalizeKey(tag));
  }
}

// ============================================================================
// Remote fetch
// ============================================================================

export interface ReferenceSource {
  listLocations(): Promise<RemoteLocation[]>;
  listDeviceTags(): Promise<RemoteDeviceTag[]>;
}

export async function fetchLocationLookup(
  source: ReferenceSource,
  logger: Logger
): Promise<LocationLookup> {
  logger.info("Fetching locations from inventory API");
  const locations = await source.listLocations();
  const lookup = LocationLookup.fromLocations(locations, logger);
  logger.info(
    { locationCount: lookup.size },
    `Discovered ${String(lookup.size)} location(s) from API`
  );
  return lookup;
}

export async function fetchTagCatalog(
  source: ReferenceSource,
  logger: Logger
): Promise<TagCatalog> {
  logger.info("Fetching existing device tags from inventory API");
  const tags = await source.listDeviceTags();
  const catalog = TagCatalog.fromTags(tags);
  logger.info(
    { tagCount: catalog.size },
    `Discovered ${String(catalog.size)} tag(s) from API`
  );
  return catalog;
}
