/**
 * Response shapes for the remote APIs, checked at the boundary
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Inventory API
// ============================================================================

// Entries without an id or name are skipped by the resolver, not rejected here
export const RemoteLocationSchema = Type.Object({
  id: Type.Optional(Type.Unknown()),
  name: Type.Optional(Type.Unknown()),
});

export const LocationListSchema = Type.Array(RemoteLocationSchema);

export const DeviceTagListSchema = Type.Object({
  tags: Type.Array(
    Type.Object({
      name: Type.Optional(Type.Unknown()),
    })
  ),
});

export type RemoteLocation = Static<typeof RemoteLocationSchema>;
export type RemoteDeviceTag = Static<typeof DeviceTagListSchema>["tags"][number];

// ============================================================================
// Geocoding API
// ============================================================================

const GeocodeCandidateSchema = Type.Object({
  lat: Type.Union([Type.String(), Type.Number()]),
  lon: Type.Union([Type.String(), Type.Number()]),
});

export const GeocodeResultSchema = Type.Array(GeocodeCandidateSchema);
