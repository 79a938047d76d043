import type { GeoPoint, ProfileRecord } from "@/lib/schemas";
import { getFullName } from "@/lib/accounts/display";

export interface LocationProperties {
  id: string;
  username: string;
  full_name: string;
  home_address: string | null;
}

export interface LocationFeature {
  type: "Feature";
  geometry: GeoPoint;
  properties: LocationProperties;
}

export interface LocationFeatureCollection {
  type: "FeatureCollection";
  features: LocationFeature[];
}

/** One feature per profile with a location; the rest are skipped. */
export function buildLocationsFeatureCollection(
  profiles: ProfileRecord[]
): LocationFeatureCollection {
  const features: LocationFeature[] = [];
  for (const profile of profiles) {
    if (!profile.location) continue;
    features.push({
      type: "Feature",
      geometry: profile.location,
      properties: {
        id: profile.id,
        username: profile.username,
        full_name: getFullName(profile),
        home_address: profile.home_address,
      },
    });
  }
  return { type: "FeatureCollection", features };
}
