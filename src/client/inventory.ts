/**
 * Network inventory API client
 *
 * Basic-auth JSON client for the locations, atlas and device-tags endpoints of
 * one network. Every call goes through the retrying HTTP client; only
 * mutations honor dry-run.
 */

import { Value } from "@sinclair/typebox/value";

import { UnexpectedResponseError } from "../errors.js";
import type { LocationPayload } from "../types/index.js";

import {
  basicAuthHeader,
  parseJsonBody,
  type HttpResult,
  type RetryingHttpClient,
} from "./http.js";
import {
  DeviceTagListSchema,
  LocationListSchema,
  type RemoteDeviceTag,
  type RemoteLocation,
} from "./schemas.js";

export const INVENTORY_TIMEOUT_MS = 30_000;

export interface InventoryClientOptions {
  baseUrl: string;
  networkId: string;
  apiKeyId: string;
  apiSecret: string;
  dryRun: boolean;
}

export class InventoryClient {
  private readonly networkUrl: string;
  private readonly authorization: string;

  constructor(
    private readonly http: RetryingHttpClient,
    private readonly options: InventoryClientOptions
  ) {
    this.networkUrl = `${options.baseUrl}/networks/${encodeURIComponent(options.networkId)}`;
    this.authorization = basicAuthHeader(options.apiKeyId, options.apiSecret);
  }

  get locationsUrl(): string {
    return `${this.networkUrl}/locations`;
  }

  get atlasUrl(): string {
    return `${this.networkUrl}/atlas`;
  }

  get deviceTagsUrl(): string {
    return `${this.networkUrl}/device-tags`;
  }

  /**
   * Fetch every location defined for the network
   */
  async listLocations(): Promise<RemoteLocation[]> {
    const data = await this.getJson(this.locationsUrl, "locations GET");
    if (!Value.Check(LocationListSchema, data)) {
      throw new UnexpectedResponseError(
        `Unexpected response shape from locations endpoint: ${preview(data)}`
      );
    }
    return data;
  }

  /**
   * Fetch the device tags known to the network
   */
  async listDeviceTags(): Promise<RemoteDeviceTag[]> {
    const data = await this.getJson(this.deviceTagsUrl, "device tags GET");
    if (!Value.Check(DeviceTagListSchema, data)) {
      throw new UnexpectedResponseError(
        `Unexpected response shape from device-tags endpoint: ${preview(data)}`
      );
    }
    return data.tags;
  }

  /**
   * Move a device to a location (PATCH /atlas)
   */
  async setDeviceLocation(
    device: string,
    locationId: string
  ): Promise<HttpResult> {
    return this.http.request(
      {
        method: "PATCH",
        url: this.atlasUrl,
        headers: { Authorization: this.authorization },
        body: { [device]: locationId },
        timeoutMs: INVENTORY_TIMEOUT_MS,
        description: "Location PATCH",
        context: { device, locationId },
      },
      { dryRun: this.options.dryRun }
    );
  }

  /**
   * Attach existing tags to devices
   */
  async addDeviceTags(devices: string[], tags: string[]): Promise<HttpResult> {
    return this.http.request(
      {
        method: "POST",
        url: `${this.deviceTagsUrl}?action=addBatchTo`,
        headers: { Authorization: this.authorization },
        body: { devices, tags },
        timeoutMs: INVENTORY_TIMEOUT_MS,
        description: "Tag POST",
        context: { devices, tags },
      },
      { dryRun: this.options.dryRun }
    );
  }

  /**
   * Create a location with coordinates
   */
  async createLocation(location: LocationPayload): Promise<HttpResult> {
    return this.http.request(
      {
        method: "POST",
        url: this.locationsUrl,
        headers: { Authorization: this.authorization },
        body: location,
        timeoutMs: INVENTORY_TIMEOUT_MS,
        description: "Location POST",
        context: { locationId: location.id },
      },
      { dryRun: this.options.dryRun }
    );
  }

  private async getJson(url: string, description: string): Promise<unknown> {
    const result = await this.http.request({
      method: "GET",
      url,
      headers: { Authorization: this.authorization },
      timeoutMs: INVENTORY_TIMEOUT_MS,
      description,
    });

    if (result.kind !== "response") {
      throw new UnexpectedResponseError(`${description} returned no response`);
    }

    try {
      return parseJsonBody(result.body);
    } catch {
      throw new UnexpectedResponseError(
        `${description} returned invalid JSON: ${result.body.slice(0, 200)}`
      );
    }
  }
}

function preview(data: unknown): string {
  return JSON.stringify(data)?.slice(0, 200) ?? String(data);
}
