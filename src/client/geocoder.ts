/**
 * Address geocoding against a Nominatim-compatible search endpoint
 */

import { Value } from "@sinclair/typebox/value";

import { GeocodeNotFoundError, UnexpectedResponseError } from "../errors.js";
import type { Coordinates } from "../types/index.js";

import { parseJsonBody, type RetryingHttpClient } from "./http.js";
import { GeocodeResultSchema } from "./schemas.js";

export const GEOCODE_TIMEOUT_MS = 10_000;

export interface GeocoderOptions {
  baseUrl: string;
  userAgent: string;
}

export class Geocoder {
  constructor(
    private readonly http: RetryingHttpClient,
    private readonly options: GeocoderOptions
  ) {}

  searchUrl(address: string): string {
    const params = new URLSearchParams({
      q: address,
      format: "json",
      addressdetails: "1",
      limit: "1",
    });
    return `${this.options.baseUrl}/search?${params.toString()}`;
  }

  /**
   * Resolve an address to the coordinates of the first candidate.
   * An unparseable body or an empty candidate list is retried like a server
   * error.
   *
   * @throws GeocodeNotFoundError when every attempt returned no candidates
   */
  async geocode(address: string): Promise<Coordinates> {
    const result = await this.http.request({
      method: "GET",
      url: this.searchUrl(address),
      headers: { "User-Agent": this.options.userAgent },
      timeoutMs: GEOCODE_TIMEOUT_MS,
      description: "Geocoding",
      context: { address },
      validate: (body) => {
        decodeCandidate(address, body);
      },
    });

    if (result.kind !== "response") {
      throw new UnexpectedResponseError("Geocoding returned no response");
    }

    return decodeCandidate(address, result.body);
  }
}

function decodeCandidate(address: string, body: string): Coordinates {
  let data: unknown;
  try {
    data = parseJsonBody(body);
  } catch {
    throw new UnexpectedResponseError(
      `Geocoding returned invalid JSON for address: ${address}`
    );
  }

  if (!Value.Check(GeocodeResultSchema, data)) {
    throw new UnexpectedResponseError(
      `Unexpected geocoding response for address: ${address}`
    );
  }

  const first = data[0];
  if (first === undefined) {
    throw new GeocodeNotFoundError(address);
  }

  const lat = Number(first.lat);
  const lng = Number(first.lon);
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
    throw new UnexpectedResponseError(
      `Geocoding returned invalid coordinates for address: ${address}`
    );
  }

  return { lat, lng };
}
