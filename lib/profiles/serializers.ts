/**
 * JSON representations returned by the REST API.
 */

import type { GeoPoint, ProfileRecord, User } from "@/lib/schemas";

export interface ProfileRepresentation {
  id: string;
  username: string;
  email: string;
  home_address: string | null;
  phone_number: string | null;
  location: GeoPoint | null;
  created_at: string;
  updated_at: string;
}

export interface UserRepresentation {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  date_joined: string;
  profile: ProfileRepresentation | null;
}

/** The signed-in user, with the flags the UI needs to show admin links. */
export interface CurrentUserRepresentation extends UserRepresentation {
  is_staff: boolean;
  is_superuser: boolean;
}

export function serializeProfile(profile: ProfileRecord): ProfileRepresentation {
  return {
    id: profile.id,
    username: profile.username,
    email: profile.email,
    home_address: profile.home_address,
    phone_number: profile.phone_number,
    location: profile.location,
    created_at: profile.created_at,
    updated_at: profile.updated_at,
  };
}

export function serializeUser(user: User, profile: ProfileRecord | null): UserRepresentation {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    first_name: user.first_name,
    last_name: user.last_name,
    date_joined: user.date_joined,
    profile: profile ? serializeProfile(profile) : null,
  };
}

export function serializeCurrentUser(
  user: User,
  profile: ProfileRecord | null
): CurrentUserRepresentation {
  return {
    ...serializeUser(user, profile),
    is_staff: user.is_staff,
    is_superuser: user.is_superuser,
  };
}
