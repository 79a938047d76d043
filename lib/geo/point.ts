/**
 * GeoJSON points are [longitude, latitude]; forms and Leaflet speak
 * latitude first. Conversions live here so the order is swapped in one place.
 */

import { geoPointSchema, type GeoPoint } from "@/lib/schemas";

export function pointFromLatLng(latitude: number, longitude: number): GeoPoint {
  return geoPointSchema.parse({ type: "Point", coordinates: [longitude, latitude] });
}

export function latitudeOf(point: GeoPoint): number {
  return point.coordinates[1];
}

export function longitudeOf(point: GeoPoint): number {
  return point.coordinates[0];
}

/** Leaflet's [lat, lng] tuple. */
export function toLatLngTuple(point: GeoPoint): [number, number] {
  return [latitudeOf(point), longitudeOf(point)];
}

/**
 * Location change requested by a separate latitude/longitude pair:
 * both given sets the point, both missing clears it, and a lone coordinate
 * leaves the stored location untouched (undefined).
 */
export function locationFromCoordinates(
  latitude: number | null | undefined,
  longitude: number | null | undefined
): GeoPoint | null | undefined {
  const hasLat = latitude !== null && latitude !== undefined;
  const hasLng = longitude !== null && longitude !== undefined;
  if (hasLat && hasLng) return pointFromLatLng(latitude, longitude);
  if (!hasLat && !hasLng) return null;
  return undefined;
}
