/**
 * UI-facing types: API response shapes shared by client components and hooks.
 */

export type {
  ProfileRepresentation,
  UserRepresentation,
  CurrentUserRepresentation,
} from "@/lib/profiles/serializers";

export type {
  LocationFeature,
  LocationFeatureCollection,
  LocationProperties,
} from "@/lib/geo/feature-collection";

export type { ActivityLog, ActivityAction, GeoPoint } from "@/lib/schemas";

/** Minimal user info the site header needs. */
export interface HeaderUser {
  username: string;
  is_staff: boolean;
  is_superuser: boolean;
}
